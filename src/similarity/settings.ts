/**
 * Retrieval settings
 *
 * Validates the flat, string-keyed settings map a caller hands to a
 * retrieval and turns it into typed settings. Unknown keys are ignored,
 * absent keys take the defaults below.
 */

import { z } from 'zod';
import { invalidConfiguration } from './errors.js';

/**
 * Raw settings as they come from configuration files, CLI flags or a CMS
 */
export type RawSettings = Readonly<Record<string, string | number | boolean | undefined>>;

/**
 * Mode tokens accepted in `similarityMode`
 */
export const MODE_TOKENS = ['auto', 'lexical', 'vector', 'hybrid', 'mlt', 'knn'] as const;

/**
 * Integer that also accepts its string form
 */
const intSetting = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

/**
 * Float that also accepts its string form
 */
const floatSetting = (fallback: number) => z.coerce.number().finite().default(fallback);

const listSetting = z.coerce.string().default('');

export const SimilaritySettingsSchema = z
  .object({
    similarityMode: z.string().trim().toLowerCase().default('auto'),
    hybridStrategy: z.enum(['dual', 'native']).default('dual'),
    maxResults: intSetting(6, 1),
    minTermFreq: intSetting(1, 0),
    minDocFreq: intSetting(1, 0),
    mltFields: z.string().default('content,title,keywords'),
    boostFields: z.string().default('content^0.5,title^1.2,keywords^2.0'),
    vectorTopK: intSetting(50, 1),
    vectorModelName: z.string().default('llm'),
    vectorField: z.string().default('vector'),
    lexicalWeight: floatSetting(0.4),
    vectorWeight: floatSetting(0.6),
    smltMltWeight: z.coerce.number().finite().optional(),
    smltVectorWeight: z.coerce.number().finite().optional(),
    minScore: floatSetting(0),
    minScoreRatio: floatSetting(0),
    allowedTypes: listSetting,
    excludeContentTypes: listSetting,
    filterByPids: listSetting,
  })
  .transform(({ smltMltWeight, smltVectorWeight, ...rest }) => ({
    ...rest,
    lexicalWeight: smltMltWeight ?? rest.lexicalWeight,
    vectorWeight: smltVectorWeight ?? rest.vectorWeight,
  }));

/**
 * Validated retrieval settings
 */
export type SimilaritySettings = z.infer<typeof SimilaritySettingsSchema>;

/**
 * Settings with every default applied
 */
export const DEFAULT_SETTINGS: SimilaritySettings = SimilaritySettingsSchema.parse({});

/**
 * Drop empty-string values so they fall back to defaults
 */
function compact(raw: RawSettings): Record<string, string | number | boolean> {
  const result: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined || value === '') continue;
    result[key] = value;
  }
  return result;
}

/**
 * Parse a raw settings map
 *
 * @throws RetrievalError (INVALID_CONFIGURATION) listing every rejected key
 */
export function parseSettings(raw: RawSettings = {}): SimilaritySettings {
  const result = SimilaritySettingsSchema.safeParse(compact(raw));
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw invalidConfiguration(`Invalid similarity settings: ${details}`);
  }
  return result.data;
}

/**
 * Merge layered raw settings maps, later maps winning
 */
export function mergeSettings(...layers: RawSettings[]): Record<string, string | number | boolean> {
  const merged: Record<string, string | number | boolean> = {};
  for (const layer of layers) {
    Object.assign(merged, compact(layer));
  }
  return merged;
}
