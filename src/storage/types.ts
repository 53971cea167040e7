/**
 * Storage types for precomputed similarities
 */

import type { AlgorithmOrigin } from '../similarity/types.js';

/**
 * Value of the `source` column for rows written by this tool
 */
export const SIMILARITY_SOURCE = 'solr';

/**
 * A stored suggestion row
 */
export interface SimilarityRecord {
  source_type: string;
  source_id: number;
  root_container_id: number;
  language_id: number;
  source: string;
  rank: number;
  target_type: string;
  target_id: number;
  title: string;
  url: string;
  type_label: string;
  score: number;
  lexical_score: number | null;
  vector_score: number | null;
  snippet: string;
  algorithm: AlgorithmOrigin;
  created_at: string;
}

/**
 * Storage error
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly code: StorageErrorCode,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

/**
 * Storage error codes
 */
export enum StorageErrorCode {
  /** Database initialization failed */
  INIT_FAILED = 'INIT_FAILED',
  /** Transaction failed */
  TRANSACTION_FAILED = 'TRANSACTION_FAILED',
  /** Storage used after close */
  CLOSED = 'CLOSED',
}
