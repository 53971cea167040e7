/**
 * Query builder: retrieval request → backend query descriptors
 *
 * Produces Solr query syntax. Every literal taken from a request or from
 * configuration goes through `escapeQueryValue`, or travels in a separate
 * request parameter, before it reaches a query string.
 */

import { invalidConfiguration } from './errors.js';
import type { SimilaritySettings } from './settings.js';
import type {
  Algorithm,
  DocumentRef,
  FilterClauses,
  FusionPolicy,
  LexicalParameters,
  QueryDescriptor,
  RetrievalPath,
  VectorParameters,
} from './types.js';

/**
 * Row multiplier for sub-queries feeding fusion; deduplication shrinks the pool
 */
export const HYBRID_ROW_FACTOR = 2;

/**
 * Request parameter carrying the vector query text
 */
export const VECTOR_TEXT_PARAM = 'vectorText';

/**
 * Characters with meaning in the Lucene/Solr standard query grammar
 */
const QUERY_SYNTAX_PATTERN = /[+\-&|!(){}[\]^"~*?:\\/\s]/g;

/**
 * Field and model names allowed in local parameters and field lists
 */
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

/**
 * Backslash-escape every query-syntax character in a literal value
 */
export function escapeQueryValue(value: string): string {
  return value.replace(QUERY_SYNTAX_PATTERN, (char) => `\\${char}`);
}

/**
 * Split a comma-separated list, dropping blanks
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * Parse a comma-separated list of container ids
 *
 * @throws RetrievalError (INVALID_CONFIGURATION) on a non-integer entry
 */
export function parseIdList(value: string): number[] {
  return parseList(value).map((item) => {
    if (!/^\d+$/.test(item)) {
      throw invalidConfiguration(`Invalid container id "${item}" in filter list`);
    }
    return Number(item);
  });
}

function assertIdentifier(name: string, what: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw invalidConfiguration(`Invalid ${what} "${name}"`);
  }
  return name;
}

/**
 * Parse a comma-separated field list such as `content,title,keywords`
 */
export function parseFieldList(value: string): string[] {
  return parseList(value).map((field) => assertIdentifier(field, 'field name'));
}

/**
 * Parse weighted fields such as `content^0.5,title^1.2 keywords^2.0`
 *
 * Fields may be separated by commas or whitespace; a field without a
 * weight gets 1.
 */
export function parseFieldWeights(value: string): Record<string, number> {
  const weights: Record<string, number> = {};
  for (const entry of value.split(/[\s,]+/)) {
    if (entry === '') continue;
    const [field = '', weightText] = entry.split('^', 2);
    assertIdentifier(field, 'boost field');
    const weight = weightText === undefined ? 1 : Number(weightText);
    if (!Number.isFinite(weight) || weight < 0) {
      throw invalidConfiguration(`Invalid boost weight "${entry}"`);
    }
    weights[field] = weight;
  }
  return weights;
}

/**
 * Type and container filters from settings
 */
export function buildFilterClauses(settings: SimilaritySettings): FilterClauses {
  return {
    allowedTypes: parseList(settings.allowedTypes),
    excludedTypes: parseList(settings.excludeContentTypes),
    containerIds: parseIdList(settings.filterByPids),
  };
}

/**
 * Filter queries for type and container restrictions
 *
 * An allow-list replaces the deny-list. A purely negative clause is anchored
 * on `*:*` so it filters instead of matching nothing.
 */
export function buildFilterQueries(filters: FilterClauses): string[] {
  const queries: string[] = [];

  if (filters.allowedTypes.length > 0) {
    const types = filters.allowedTypes.map(escapeQueryValue).join(' OR ');
    queries.push(`type:(${types})`);
  } else if (filters.excludedTypes.length > 0) {
    const negations = filters.excludedTypes.map((t) => `-type:${escapeQueryValue(t)}`);
    queries.push(`*:* ${negations.join(' ')}`);
  }

  if (filters.containerIds.length > 0) {
    queries.push(`pid:(${filters.containerIds.map(String).join(' OR ')})`);
  }

  return queries;
}

/**
 * Point-lookup query for a document reference (`type == T AND uid == U`)
 */
export function buildDocumentLookupQuery(ref: DocumentRef): string {
  return `type:${escapeQueryValue(ref.type)} AND uid:${String(ref.id)}`;
}

function lexicalParameters(settings: SimilaritySettings): LexicalParameters {
  return {
    fields: parseFieldList(settings.mltFields),
    fieldWeights: parseFieldWeights(settings.boostFields),
    minTermFreq: settings.minTermFreq,
    minDocFreq: settings.minDocFreq,
  };
}

function freeze(descriptor: QueryDescriptor): QueryDescriptor {
  Object.freeze(descriptor.filterQueries);
  return Object.freeze(descriptor);
}

/**
 * MoreLikeThis descriptor anchored on the indexed source document
 */
export function buildLexicalDescriptor(
  target: DocumentRef,
  sourceBackendId: string,
  settings: SimilaritySettings,
  rows: number
): QueryDescriptor {
  const filters = buildFilterClauses(settings);
  return freeze({
    algorithm: 'lexical',
    target,
    sourceBackendId,
    query: `id:${escapeQueryValue(sourceBackendId)}`,
    filterQueries: buildFilterQueries(filters),
    filters,
    rows,
    lexical: lexicalParameters(settings),
  });
}

/**
 * KNN text-to-vector descriptor
 *
 * The source text is referenced through a parameter (`v=$vectorText`) so it
 * is never parsed as query syntax. The source document itself is excluded.
 */
export function buildVectorDescriptor(
  target: DocumentRef,
  sourceText: string,
  settings: SimilaritySettings,
  rows: number
): QueryDescriptor {
  const filters = buildFilterClauses(settings);
  const vector: VectorParameters = {
    topK: settings.vectorTopK,
    modelName: assertIdentifier(settings.vectorModelName, 'vector model name'),
    field: assertIdentifier(settings.vectorField, 'vector field'),
    text: sourceText,
  };
  const excludeSelf = `-(${buildDocumentLookupQuery(target)})`;

  return freeze({
    algorithm: 'vector',
    target,
    query:
      `{!knn_text_to_vector model=${vector.modelName} f=${vector.field} ` +
      `topK=${String(vector.topK)} v=$${VECTOR_TEXT_PARAM}}`,
    filterQueries: [`*:* ${excludeSelf}`, ...buildFilterQueries(filters)],
    filters,
    rows,
    vector,
  });
}

/**
 * Single-request descriptor for a backend that fuses lexical and vector
 * similarity itself
 */
export function buildNativeHybridDescriptor(
  target: DocumentRef,
  sourceBackendId: string,
  settings: SimilaritySettings,
  rows: number
): QueryDescriptor {
  const filters = buildFilterClauses(settings);
  const fusion: FusionPolicy = {
    lexicalWeight: settings.lexicalWeight,
    vectorWeight: settings.vectorWeight,
  };
  return freeze({
    algorithm: 'hybrid-native',
    target,
    sourceBackendId,
    query: `id:${escapeQueryValue(sourceBackendId)}`,
    filterQueries: buildFilterQueries(filters),
    filters,
    rows,
    lexical: lexicalParameters(settings),
    fusion: Object.freeze(fusion),
  });
}

/**
 * Check every field, model and id setting a descriptor would use
 *
 * Descriptors are built only after the source document has been resolved;
 * this lets a caller reject bad settings before any backend call.
 *
 * @throws RetrievalError (INVALID_CONFIGURATION)
 */
export function validateQuerySettings(settings: SimilaritySettings): void {
  buildFilterClauses(settings);
  lexicalParameters(settings);
  assertIdentifier(settings.vectorModelName, 'vector model name');
  assertIdentifier(settings.vectorField, 'vector field');
}

/**
 * Rows to request per backend call for a retrieval path
 */
export function rowsForPath(path: RetrievalPath, settings: SimilaritySettings): number {
  if (path === 'hybrid' && settings.hybridStrategy === 'dual') {
    return settings.maxResults * HYBRID_ROW_FACTOR;
  }
  return settings.maxResults;
}

/**
 * Algorithms a retrieval path runs, one backend call each
 */
export function algorithmsForPath(path: RetrievalPath, settings: SimilaritySettings): Algorithm[] {
  switch (path) {
    case 'lexical':
      return ['lexical'];
    case 'vector':
      return ['vector'];
    case 'hybrid':
      return settings.hybridStrategy === 'native' ? ['hybrid-native'] : ['lexical', 'vector'];
  }
}

/**
 * Inputs resolved from the backend before a descriptor can be built
 */
export interface DescriptorInputs {
  target: DocumentRef;
  settings: SimilaritySettings;
  rows: number;
  /** Backend id of the source document (lexical and native hybrid) */
  sourceBackendId?: string;
  /** Source document text (vector) */
  sourceText?: string;
}

/**
 * Build the descriptor for one algorithm
 *
 * @throws RetrievalError (INVALID_CONFIGURATION) when a required input is missing
 */
export function buildDescriptor(algorithm: Algorithm, inputs: DescriptorInputs): QueryDescriptor {
  const { target, settings, rows, sourceBackendId, sourceText } = inputs;

  if (algorithm === 'vector') {
    if (sourceText === undefined) {
      throw invalidConfiguration('Vector queries need the source document text');
    }
    return buildVectorDescriptor(target, sourceText, settings, rows);
  }

  if (sourceBackendId === undefined) {
    throw invalidConfiguration(`${algorithm} queries need the source document backend id`);
  }
  return algorithm === 'lexical'
    ? buildLexicalDescriptor(target, sourceBackendId, settings, rows)
    : buildNativeHybridDescriptor(target, sourceBackendId, settings, rows);
}
