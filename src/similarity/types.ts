/**
 * Core types for similar-document retrieval
 */

/**
 * Identifies a content item independent of its search-index representation
 */
export interface DocumentRef {
  readonly type: string;
  readonly id: number;
}

/**
 * Backend query algorithm
 *
 * - lexical: MoreLikeThis (TF-IDF over term vectors)
 * - vector: KNN over dense embeddings (text-to-vector on the backend)
 * - hybrid-native: single request to a backend that fuses both itself
 */
export type Algorithm = 'lexical' | 'vector' | 'hybrid-native';

/**
 * Concrete retrieval path chosen by the mode selector
 */
export type RetrievalPath = 'lexical' | 'vector' | 'hybrid';

/**
 * Where a candidate came from after parsing or fusion
 */
export type AlgorithmOrigin = 'lexical' | 'vector' | 'hybrid';

/**
 * Per-algorithm contributions to a candidate's score
 */
export interface Subscores {
  lexicalScore?: number;
  vectorScore?: number;
}

/**
 * Normalized output unit of the response parser
 *
 * `score` is on the backend's native scale before fusion and on the
 * weighted [0, lexicalWeight + vectorWeight] scale after it.
 */
export interface Candidate {
  title: string;
  url: string;
  type: string;
  typeLabel: string;
  score: number;
  subscores: Subscores;
  snippet: string;
  documentRef: DocumentRef;
  algorithmOrigin: AlgorithmOrigin;
  /** Parent container of the document, when the backend returns it */
  containerId?: number;
}

/**
 * Ordered candidates, highest score first, unique by document reference
 */
export type RankedResultSet = readonly Candidate[];

/**
 * Weights for combining normalized lexical and vector scores
 */
export interface FusionPolicy {
  lexicalWeight: number;
  vectorWeight: number;
}

/**
 * Type and container filter clauses shared by every backend call
 */
export interface FilterClauses {
  readonly allowedTypes: readonly string[];
  readonly excludedTypes: readonly string[];
  readonly containerIds: readonly number[];
}

/**
 * Lexical (MoreLikeThis) parameters
 */
export interface LexicalParameters {
  readonly fields: readonly string[];
  readonly fieldWeights: Readonly<Record<string, number>>;
  readonly minTermFreq: number;
  readonly minDocFreq: number;
}

/**
 * Vector (KNN) parameters
 */
export interface VectorParameters {
  readonly topK: number;
  readonly modelName: string;
  readonly field: string;
  /** Source text translated to a vector by the backend */
  readonly text: string;
}

/**
 * Backend-ready description of one retrieval call
 *
 * `query` and `filterQueries` are already escaped for the backend grammar.
 * Built once per call and frozen before dispatch.
 */
export interface QueryDescriptor {
  readonly algorithm: Algorithm;
  readonly target: DocumentRef;
  /** Backend-native id of the target, for queries anchored on the indexed document */
  readonly sourceBackendId?: string;
  readonly query: string;
  readonly filterQueries: readonly string[];
  readonly filters: FilterClauses;
  readonly rows: number;
  readonly lexical?: LexicalParameters;
  readonly vector?: VectorParameters;
  /** Weights handed to a backend that fuses natively */
  readonly fusion?: Readonly<FusionPolicy>;
}

/**
 * Opaque, algorithm-tagged backend payload
 */
export interface RawBackendResponse {
  readonly algorithm: Algorithm;
  readonly payload: unknown;
  readonly sourceBackendId?: string;
}

/**
 * Backend partition for one site root and language
 */
export interface PartitionKey {
  readonly rootContainerId: number;
  readonly languageId: number;
}

/**
 * Create an immutable document reference
 *
 * @throws RangeError when the id is not a positive integer or the type is empty
 */
export function createDocumentRef(type: string, id: number): DocumentRef {
  if (type.trim() === '') {
    throw new RangeError('Document type must not be empty');
  }
  if (!Number.isInteger(id) || id <= 0) {
    throw new RangeError(`Document id must be a positive integer, got ${String(id)}`);
  }
  return Object.freeze({ type, id });
}

/**
 * Stable map key for a document reference
 */
export function documentKey(ref: DocumentRef): string {
  return `${ref.type}:${String(ref.id)}`;
}
