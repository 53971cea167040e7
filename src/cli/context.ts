/**
 * CLI context manager
 *
 * Provides shared component initialization for CLI commands.
 */

import { loadConfig, type LoadConfigOptions } from '../config/config.js';
import type { LikewiseConfig } from '../config/schema.js';
import { ConnectionManager } from '../backend/connection-manager.js';
import { PartitionRouter } from '../backend/partition-router.js';
import { ContentTree, ContentTreePartitionResolver } from '../content/tree.js';
import { createLogger, setDefaultLogger, type LikewiseLogger } from '../logging/logger.js';
import { SimilarityService } from '../similarity/service.js';
import { SimilarityStore } from '../storage/similarity-store.js';

/**
 * CLI context containing all initialized components
 */
export interface CLIContext {
  /** Loaded configuration */
  config: LikewiseConfig;
  logger: LikewiseLogger;
  /** Content tree; empty when none is configured */
  tree: ContentTree;
  service: SimilarityService;
  /** Similarity storage (SQLite), null unless requested */
  store: SimilarityStore | null;
  /** Close all connections */
  close(): void;
}

/**
 * Options for creating CLI context
 */
export interface CreateContextOptions extends LoadConfigOptions {
  /** Open the similarity database */
  openStore?: boolean;
  /** Force debug logging */
  verbose?: boolean;
}

/**
 * Create CLI context with all components initialized
 */
export function createCLIContext(options: CreateContextOptions = {}): CLIContext {
  const config = loadConfig(options);

  const logger = createLogger(
    options.verbose === true ? { ...config.logging, level: 'debug' } : config.logging
  );
  setDefaultLogger(logger);

  const treePath = config.contentTree.path;
  const tree =
    treePath !== undefined && treePath !== '' ? ContentTree.load(treePath) : new ContentTree([]);

  const router = new PartitionRouter(new ContentTreePartitionResolver(tree, config.sites), {
    sites: config.sites,
    defaultRootContainerId: config.routing.defaultRootContainerId,
    logger,
  });

  const service = new SimilarityService({
    connector: new ConnectionManager(config.backend, config.sites),
    router,
    vectorEnabled: config.backend.vectorEnabled,
    timeoutMs: config.backend.timeoutMs,
    defaultSettings: config.settings,
    logger,
  });

  const store = options.openStore === true ? SimilarityStore.create(config.storage.databasePath) : null;

  return {
    config,
    logger,
    tree,
    service,
    store,
    close(): void {
      store?.close();
    },
  };
}

/**
 * Run a function with CLI context, ensuring cleanup on exit
 */
export async function withContext<T>(
  fn: (context: CLIContext) => Promise<T>,
  options: CreateContextOptions = {}
): Promise<T> {
  const context = createCLIContext(options);
  try {
    return await fn(context);
  } finally {
    context.close();
  }
}
