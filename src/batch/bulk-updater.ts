/**
 * Bulk precomputation of similar documents per site
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { SiteConfig } from '../config/schema.js';
import { enumerateDocuments, type ContentTree } from '../content/tree.js';
import { getLogger, type LikewiseLogger } from '../logging/logger.js';
import type { SimilarityService } from '../similarity/service.js';
import type { RawSettings } from '../similarity/settings.js';
import type { DocumentRef } from '../similarity/types.js';
import type { SimilarityStore } from '../storage/similarity-store.js';

export type BulkStatus = 'updated' | 'error';

export interface BulkProgressEvent {
  site: string;
  ref: DocumentRef;
  status: BulkStatus;
  /** Suggestions stored for the document */
  stored: number;
  /** Documents handled so far in this site */
  processed: number;
  /** Documents in this site */
  total: number;
  error?: string;
}

export interface SiteRunResult {
  site: string;
  rootContainerId: number;
  updated: number;
  errors: number;
}

export interface BulkRunResult {
  updated: number;
  errors: number;
  perSite: SiteRunResult[];
}

export interface BulkRunOptions {
  sites: readonly SiteConfig[];
  languageId: number;
  settings: RawSettings;
  onProgress?: (event: BulkProgressEvent) => void;
}

export interface BulkUpdaterOptions {
  /** Node kinds skipped along with their subtrees */
  excludedKinds: readonly string[];
  /** Pause between two documents */
  delayMs: number;
  logger?: LikewiseLogger;
}

export class BulkUpdater {
  private logger: LikewiseLogger;

  constructor(
    private service: Pick<SimilarityService, 'findSimilar' | 'resolveSettings'>,
    private store: Pick<SimilarityStore, 'persist'>,
    private tree: ContentTree,
    private options: BulkUpdaterOptions
  ) {
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Compute and store suggestions for every document of every site
   *
   * Settings, merged with the service defaults, are validated once before any
   * site is processed; a failing document is counted and the run continues.
   *
   * @throws RetrievalError (INVALID_CONFIGURATION) for invalid settings
   */
  async run(options: BulkRunOptions): Promise<BulkRunResult> {
    const { path } = this.service.resolveSettings(options.settings);
    this.logger.debug({ path, sites: options.sites.length }, 'Starting bulk update');

    const result: BulkRunResult = { updated: 0, errors: 0, perSite: [] };

    for (const site of options.sites) {
      const siteResult = await this.runSite(site, options);
      result.updated += siteResult.updated;
      result.errors += siteResult.errors;
      result.perSite.push(siteResult);
    }

    this.logger.info(
      { updated: result.updated, errors: result.errors, sites: result.perSite.length },
      'Bulk update finished'
    );
    return result;
  }

  private async runSite(site: SiteConfig, options: BulkRunOptions): Promise<SiteRunResult> {
    const { languageId, settings, onProgress } = options;
    const refs = [
      ...enumerateDocuments(this.tree, site.rootContainerId, this.options.excludedKinds),
    ];
    const siteResult: SiteRunResult = {
      site: site.identifier,
      rootContainerId: site.rootContainerId,
      updated: 0,
      errors: 0,
    };

    this.logger.info(
      { site: site.identifier, rootContainerId: site.rootContainerId, documents: refs.length },
      'Updating site'
    );

    for (const [index, ref] of refs.entries()) {
      if (index > 0 && this.options.delayMs > 0) {
        await sleep(this.options.delayMs);
      }

      try {
        const results = await this.service.findSimilar(ref, settings, languageId);
        const stored = this.store.persist(ref, site.rootContainerId, languageId, results);
        siteResult.updated++;
        onProgress?.({
          site: site.identifier,
          ref,
          status: 'updated',
          stored,
          processed: index + 1,
          total: refs.length,
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        siteResult.errors++;
        this.logger.warn(
          { site: site.identifier, type: ref.type, id: ref.id, error: message },
          'Failed to update similarities'
        );
        onProgress?.({
          site: site.identifier,
          ref,
          status: 'error',
          stored: 0,
          processed: index + 1,
          total: refs.length,
          error: message,
        });
      }
    }

    return siteResult;
  }
}
