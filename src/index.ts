/**
 * likewise - similar-document retrieval over a Solr search backend
 *
 * Main entry point for the library exports.
 */

// Configuration exports
export * from './config/schema.js';
export * from './config/config.js';
export * from './config/paths.js';

// Logging exports
export * from './logging/logger.js';

// Retrieval core
export * from './similarity/types.js';
export * from './similarity/errors.js';
export * from './similarity/settings.js';
export * from './similarity/mode-selector.js';
export * from './similarity/query-builder.js';
export * from './similarity/response-parser.js';
export * from './similarity/snippet.js';
export * from './similarity/fusion.js';
export * from './similarity/policy-filter.js';
export * from './similarity/service.js';

// Backend
export * from './backend/types.js';
export * from './backend/solr-backend.js';
export * from './backend/connection-manager.js';
export * from './backend/partition-router.js';

// Content tree, storage, bulk
export * from './content/tree.js';
export * from './storage/types.js';
export * from './storage/similarity-store.js';
export * from './batch/bulk-updater.js';

// Version info
export const VERSION = '0.1.0';
