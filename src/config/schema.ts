/**
 * Configuration schema for likewise
 *
 * Validates configuration using Zod and provides TypeScript types.
 */

import { z } from 'zod';
import { getDefaultDatabasePath } from './paths.js';

/**
 * How MoreLikeThis queries reach the backend
 *
 * - mlt: dedicated MoreLikeThis request handler (results under `response`)
 * - select: MoreLikeThis search component on /select (results under `moreLikeThis`)
 */
export const LexicalHandlerSchema = z.enum(['mlt', 'select']);

/**
 * Encoding of named lists in JSON responses (Solr `json.nl`)
 */
export const JsonNamedListSchema = z.enum(['map', 'flat']);

/**
 * Search backend (Solr) connection configuration
 */
export const BackendConfigSchema = z.object({
  baseUrl: z.string().url().default('http://localhost:8983/solr'),
  /** Budget for a single backend call */
  timeoutMs: z.number().int().min(100).max(120000).default(5000),
  /** Capability signal used by `auto` mode */
  vectorEnabled: z.boolean().default(false),
  lexicalHandler: LexicalHandlerSchema.default('mlt'),
  /** Request handler path of the native semantic MoreLikeThis plugin */
  nativeHandler: z.string().min(1).default('smlt'),
  jsonNl: JsonNamedListSchema.default('map'),
  username: z.string().optional(),
  password: z.string().optional(),
});

/**
 * A site: one root container with a backend core per language
 */
export const SiteConfigSchema = z.object({
  identifier: z.string().min(1),
  rootContainerId: z.number().int().positive(),
  /** Core name keyed by language id */
  cores: z.record(z.string().regex(/^\d+$/), z.string().min(1)).default({}),
});

/**
 * Partition routing configuration
 */
export const RoutingConfigSchema = z.object({
  /** Root container used when routing fails and no site is configured */
  defaultRootContainerId: z.number().int().positive().default(1),
});

/**
 * Content tree source used for routing and bulk enumeration
 */
export const ContentTreeConfigSchema = z.object({
  path: z.string().optional(),
});

/**
 * Bulk precomputation configuration
 */
export const BulkConfigSchema = z.object({
  /** Structural node kinds that are neither processed nor descended into */
  excludedKinds: z.array(z.string()).default(['folder', 'recycler', 'separator']),
  /** Pause between two documents of the same partition */
  delayMs: z.number().int().min(0).default(0),
});

/**
 * SQLite similarity storage configuration
 */
export const StorageConfigSchema = z.object({
  databasePath: z.string().default(getDefaultDatabasePath()),
});

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  file: z.string().optional(),
  pretty: z.boolean().default(false),
});

/**
 * Complete likewise configuration schema
 */
export const LikewiseConfigSchema = z.object({
  backend: BackendConfigSchema.default({}),
  sites: z.array(SiteConfigSchema).default([]),
  routing: RoutingConfigSchema.default({}),
  contentTree: ContentTreeConfigSchema.default({}),
  bulk: BulkConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  /** Default retrieval settings map, overridable per request */
  settings: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).default({}),
});

/**
 * TypeScript types derived from schemas
 */
export type LexicalHandler = z.infer<typeof LexicalHandlerSchema>;
export type JsonNamedList = z.infer<typeof JsonNamedListSchema>;
export type BackendConfig = z.infer<typeof BackendConfigSchema>;
export type SiteConfig = z.infer<typeof SiteConfigSchema>;
export type RoutingConfig = z.infer<typeof RoutingConfigSchema>;
export type ContentTreeConfig = z.infer<typeof ContentTreeConfigSchema>;
export type BulkConfig = z.infer<typeof BulkConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LikewiseConfig = z.infer<typeof LikewiseConfigSchema>;

/**
 * Default configuration (all defaults applied)
 */
export const DEFAULT_CONFIG: LikewiseConfig = LikewiseConfigSchema.parse({});

/**
 * Validate and parse configuration object
 * @param config - Raw configuration object
 * @returns Validated and typed configuration
 * @throws ZodError if validation fails
 */
export function validateConfig(config: unknown): LikewiseConfig {
  return LikewiseConfigSchema.parse(config);
}
