/**
 * Connection manager: partition → backend core
 */

import type { BackendConfig, SiteConfig } from '../config/schema.js';
import { RetrievalError, RetrievalErrorCode } from '../similarity/errors.js';
import type { PartitionKey } from '../similarity/types.js';
import { SolrBackend } from './solr-backend.js';
import type { BackendConnector, SearchBackend } from './types.js';

/**
 * Creates a backend for a core URL
 */
export type BackendFactory = (coreUrl: string, config: BackendConfig) => SearchBackend;

const createSolrBackend: BackendFactory = (coreUrl, config) => new SolrBackend(coreUrl, config);

/**
 * Maps (site root, language) to the configured core and caches one backend per core
 */
export class ConnectionManager implements BackendConnector {
  private backends = new Map<string, SearchBackend>();

  constructor(
    private config: BackendConfig,
    private sites: readonly SiteConfig[],
    private factory: BackendFactory = createSolrBackend
  ) {}

  /**
   * Core name serving a partition, or null when none is configured
   */
  coreFor(key: PartitionKey): string | null {
    const site = this.sites.find((s) => s.rootContainerId === key.rootContainerId);
    return site?.cores[String(key.languageId)] ?? null;
  }

  connect(key: PartitionKey): SearchBackend {
    const core = this.coreFor(key);
    if (core === null) {
      throw new RetrievalError(
        `No backend core configured for root ${key.rootContainerId}, language ${key.languageId}`,
        RetrievalErrorCode.BACKEND_UNAVAILABLE
      );
    }

    const coreUrl = `${this.config.baseUrl.replace(/\/+$/, '')}/${encodeURIComponent(core)}`;
    let backend = this.backends.get(coreUrl);
    if (backend === undefined) {
      backend = this.factory(coreUrl, this.config);
      this.backends.set(coreUrl, backend);
    }
    return backend;
  }
}
