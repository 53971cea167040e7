/**
 * Backend and partition interfaces
 */

import type { DocumentRef, PartitionKey, QueryDescriptor, RawBackendResponse } from '../similarity/types.js';

/**
 * A search backend partition (one Solr core)
 */
export interface SearchBackend {
  /** Identifier used in logs, usually the core URL */
  readonly name: string;

  /**
   * Run one descriptor
   * @throws RetrievalError (BACKEND_UNAVAILABLE or BACKEND_QUERY_ERROR)
   */
  execute(descriptor: QueryDescriptor): Promise<RawBackendResponse>;

  /**
   * Backend-native id of an indexed document, or null when it is not indexed
   */
  resolveDocumentId(ref: DocumentRef): Promise<string | null>;

  /**
   * Plain title and body text of an indexed document, or null when it is not indexed
   */
  resolveDocumentText(ref: DocumentRef): Promise<string | null>;
}

/**
 * Opens backends for partitions
 */
export interface BackendConnector {
  /**
   * @throws RetrievalError (BACKEND_UNAVAILABLE) when no backend serves the partition
   */
  connect(key: PartitionKey): SearchBackend;
}

/**
 * Resolves the partition a document lives in
 */
export interface PartitionResolver {
  /**
   * @throws RetrievalError (ROUTING_FAILED)
   */
  resolvePartition(ref: DocumentRef, languageId: number): Promise<PartitionKey>;
}
