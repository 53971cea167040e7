/**
 * Partition routing with fallback
 */

import type { SiteConfig } from '../config/schema.js';
import { getLogger, type LikewiseLogger } from '../logging/logger.js';
import { RetrievalErrorCode, toRetrievalError } from '../similarity/errors.js';
import type { DocumentRef, PartitionKey } from '../similarity/types.js';
import type { PartitionResolver } from './types.js';

export interface PartitionRouterOptions {
  sites: readonly SiteConfig[];
  /** Root used when resolution fails and no site is configured */
  defaultRootContainerId: number;
  logger?: LikewiseLogger;
}

export class PartitionRouter {
  private logger: LikewiseLogger;

  constructor(
    private resolver: PartitionResolver,
    private options: PartitionRouterOptions
  ) {
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Root container used when resolution fails
   */
  fallbackRootContainerId(): number {
    return this.options.sites[0]?.rootContainerId ?? this.options.defaultRootContainerId;
  }

  /**
   * Resolve the partition for a document. Never rejects.
   */
  async route(ref: DocumentRef, languageId: number): Promise<PartitionKey> {
    try {
      return await this.resolver.resolvePartition(ref, languageId);
    } catch (error) {
      const err = toRetrievalError(error, RetrievalErrorCode.ROUTING_FAILED);
      const rootContainerId = this.fallbackRootContainerId();
      this.logger.warn(
        {
          event: 'RoutingFailed',
          type: ref.type,
          id: ref.id,
          languageId,
          fallbackRootContainerId: rootContainerId,
          error: err.message,
        },
        `Partition resolution failed, falling back to root ${rootContainerId}`
      );
      return { rootContainerId, languageId };
    }
  }
}
