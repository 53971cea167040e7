/**
 * Response parser: raw backend payload → ordered candidates
 *
 * The result list may sit in one of several structurally different
 * sections depending on the request handler and the backend's named-list
 * encoding. Each known shape is a strategy; strategies run in order and the
 * first match wins. No match yields an empty list and a diagnostic event.
 */

import { z } from 'zod';
import { getLogger, type LikewiseLogger } from '../logging/logger.js';
import { RetrievalErrorCode } from './errors.js';
import { buildSnippet, buildTypeLabel, flattenField, collapseWhitespace } from './snippet.js';
import {
  createDocumentRef,
  type Algorithm,
  type AlgorithmOrigin,
  type Candidate,
  type RawBackendResponse,
  type Subscores,
} from './types.js';

/**
 * Known encodings of a "named section containing a result list"
 *
 * - pairs: flat alternating key/value array (`json.nl=flat`)
 * - keyed: object keyed by the source document's backend id (`json.nl=map`)
 * - direct: `docs` on the structure itself or on its `response` member
 */
export type SectionShape = 'pairs' | 'keyed' | 'direct';

/**
 * A located result section
 */
export interface LocatedSection {
  shape: SectionShape;
  docs: unknown[];
}

/**
 * Shape-matching strategy over a section container
 */
interface SectionStrategy {
  shape: SectionShape;
  match(container: unknown, sourceBackendId: string | undefined): unknown[] | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * `docs` array of a structure, if it has one
 */
function docsOf(value: unknown): unknown[] | null {
  if (isRecord(value) && Array.isArray(value.docs)) {
    return value.docs;
  }
  return null;
}

const pairsStrategy: SectionStrategy = {
  shape: 'pairs',
  match(container) {
    if (!Array.isArray(container)) return null;
    for (let i = 0; i + 1 < container.length; i += 2) {
      const docs = docsOf(container[i + 1]);
      if (docs !== null) return docs;
    }
    return null;
  },
};

/**
 * Top-level members that never hold a keyed result section
 */
const NON_SECTION_KEYS: ReadonlySet<string> = new Set(['responseHeader', 'response', 'match', 'debug']);

const keyedStrategy: SectionStrategy = {
  shape: 'keyed',
  match(container, sourceBackendId) {
    if (!isRecord(container)) return null;
    if (sourceBackendId !== undefined) {
      const docs = docsOf(container[sourceBackendId]);
      if (docs !== null) return docs;
    }
    for (const [key, value] of Object.entries(container)) {
      if (NON_SECTION_KEYS.has(key)) continue;
      const docs = docsOf(value);
      if (docs !== null) return docs;
    }
    return null;
  },
};

const directStrategy: SectionStrategy = {
  shape: 'direct',
  match(container) {
    const docs = docsOf(container);
    if (docs !== null) return docs;
    return isRecord(container) ? docsOf(container.response) : null;
  },
};

/**
 * Strategies in the order they are tried
 */
const SECTION_STRATEGIES: readonly SectionStrategy[] = [pairsStrategy, keyedStrategy, directStrategy];

/**
 * Locate the result section of a payload
 *
 * When a MoreLikeThis component answer (`moreLikeThis`) is present it is the
 * only place searched: the main `response` then holds the source document.
 */
export function locateSection(
  payload: unknown,
  sourceBackendId?: string
): LocatedSection | null {
  const container =
    isRecord(payload) && payload.moreLikeThis !== undefined ? payload.moreLikeThis : payload;

  for (const strategy of SECTION_STRATEGIES) {
    const docs = strategy.match(container, sourceBackendId);
    if (docs !== null) {
      return { shape: strategy.shape, docs };
    }
  }
  return null;
}

/**
 * Text field that may be single- or multi-valued
 */
const textField = z
  .union([z.string(), z.array(z.coerce.string()), z.number().transform(String)])
  .catch('');

const optionalNumber = z.coerce.number().finite().optional().catch(undefined);

/**
 * One backend document, every field tolerant of absence or odd types
 */
const BackendDocumentSchema = z.object({
  title: textField,
  url: textField,
  type: z.string().trim().min(1).catch('pages'),
  uid: z.coerce.number().int().catch(0),
  score: z.coerce.number().finite().catch(0),
  pid: optionalNumber,
  content: textField,
  mlt_score: optionalNumber,
  vector_score: optionalNumber,
});

type BackendDocument = z.infer<typeof BackendDocumentSchema>;

function originOf(algorithm: Algorithm): AlgorithmOrigin {
  return algorithm === 'hybrid-native' ? 'hybrid' : algorithm;
}

function subscoresOf(algorithm: Algorithm, doc: BackendDocument): Subscores {
  switch (algorithm) {
    case 'lexical':
      return { lexicalScore: doc.score };
    case 'vector':
      return { vectorScore: doc.score };
    case 'hybrid-native': {
      const subscores: Subscores = {};
      if (doc.mlt_score !== undefined) subscores.lexicalScore = doc.mlt_score;
      if (doc.vector_score !== undefined) subscores.vectorScore = doc.vector_score;
      return subscores;
    }
  }
}

/**
 * Normalize one backend document into a candidate
 *
 * Returns null for documents without a positive integer uid, which cannot
 * be referenced, deduplicated or linked.
 */
export function toCandidate(raw: unknown, algorithm: Algorithm): Candidate | null {
  const doc = BackendDocumentSchema.parse(isRecord(raw) ? raw : {});
  if (doc.uid <= 0) {
    return null;
  }

  const candidate: Candidate = {
    title: collapseWhitespace(flattenField(doc.title)),
    url: flattenField(doc.url).trim(),
    type: doc.type,
    typeLabel: buildTypeLabel(doc.type),
    score: doc.score,
    subscores: subscoresOf(algorithm, doc),
    snippet: buildSnippet(doc.content),
    documentRef: createDocumentRef(doc.type, doc.uid),
    algorithmOrigin: originOf(algorithm),
  };
  if (doc.pid !== undefined) {
    candidate.containerId = doc.pid;
  }
  return candidate;
}

/**
 * Parse a raw backend response into candidates, in backend order
 */
export function parseResponse(
  response: RawBackendResponse,
  logger: LikewiseLogger = getLogger()
): Candidate[] {
  const section = locateSection(response.payload, response.sourceBackendId);

  if (section === null) {
    logger.warn(
      {
        code: RetrievalErrorCode.UNPARSABLE_RESPONSE,
        algorithm: response.algorithm,
        availableKeys: isRecord(response.payload) ? Object.keys(response.payload) : [],
      },
      'No result section found in backend response'
    );
    return [];
  }

  const candidates: Candidate[] = [];
  let skipped = 0;
  for (const raw of section.docs) {
    const candidate = toCandidate(raw, response.algorithm);
    if (candidate === null) {
      skipped++;
    } else {
      candidates.push(candidate);
    }
  }

  if (skipped > 0) {
    logger.debug(
      { algorithm: response.algorithm, skipped },
      'Skipped backend documents without a usable uid'
    );
  }

  return candidates;
}
