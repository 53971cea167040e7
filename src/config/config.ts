/**
 * Configuration loader for likewise
 *
 * Loads configuration from file, applies environment variable overrides,
 * and validates the result against the schema.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { type LikewiseConfig, DEFAULT_CONFIG, validateConfig } from './schema.js';
import { getGlobalConfigPath } from './paths.js';

/**
 * Configuration file names to search for in project directories (in order of priority)
 */
const CONFIG_FILE_NAMES = ['likewise.config.json', 'likewise.json', '.likewiserc.json'];

/**
 * Map of environment variable names to configuration paths
 * All environment variables use the LIKEWISE_ prefix.
 */
const ENV_MAPPINGS: Record<string, string[]> = {
  // Backend
  LIKEWISE_BACKEND_URL: ['backend', 'baseUrl'],
  LIKEWISE_BACKEND_TIMEOUT_MS: ['backend', 'timeoutMs'],
  LIKEWISE_BACKEND_VECTOR_ENABLED: ['backend', 'vectorEnabled'],
  LIKEWISE_BACKEND_LEXICAL_HANDLER: ['backend', 'lexicalHandler'],
  LIKEWISE_BACKEND_USERNAME: ['backend', 'username'],
  LIKEWISE_BACKEND_PASSWORD: ['backend', 'password'],
  // Routing
  LIKEWISE_DEFAULT_ROOT_CONTAINER_ID: ['routing', 'defaultRootContainerId'],
  // Content tree
  LIKEWISE_CONTENT_TREE: ['contentTree', 'path'],
  // Bulk
  LIKEWISE_BULK_DELAY_MS: ['bulk', 'delayMs'],
  // Logging
  LIKEWISE_LOG_LEVEL: ['logging', 'level'],
  LIKEWISE_LOG_FILE: ['logging', 'file'],
  LIKEWISE_LOG_PRETTY: ['logging', 'pretty'],
  // Storage
  LIKEWISE_DATABASE_PATH: ['storage', 'databasePath'],
};

/**
 * Configuration paths holding integers
 */
const NUMERIC_PATHS = [
  'backend.timeoutMs',
  'routing.defaultRootContainerId',
  'bulk.delayMs',
];

/**
 * Deep merge two objects
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value in an object using a path array
 */
function setNestedValue(
  obj: Record<string, unknown>,
  path: string[],
  value: unknown
): void {
  let current = obj;
  for (let i = 0; i < path.length - 1; i++) {
    const key = path[i];
    if (key === undefined) continue;
    const next = current[key];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
  const lastKey = path[path.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string, path: string[]): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  if (NUMERIC_PATHS.includes(path.join('.'))) {
    const num = parseInt(value, 10);
    if (!isNaN(num)) return num;
  }

  return value;
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const [envKey, path] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedValue(config, path, parseEnvValue(value, path));
    }
  }

  return config;
}

/**
 * Find configuration file in specified directory or up the directory tree,
 * falling back to the global config in ~/.likewise/config.json
 */
function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = resolve(startDir);
  const root = resolve('/');

  while (currentDir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = resolve(currentDir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    currentDir = resolve(currentDir, '..');
  }

  const globalConfig = getGlobalConfigPath();
  if (existsSync(globalConfig)) {
    return globalConfig;
  }

  return null;
}

/**
 * Load configuration from a JSON file
 */
function loadFileConfig(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load configuration from ${filePath}: ${message}`);
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`Failed to load configuration from ${filePath}: expected a JSON object`);
  }
  return parsed;
}

/**
 * Configuration loader options
 */
export interface LoadConfigOptions {
  /** Explicit path to configuration file */
  configPath?: string;
  /** Directory to start searching for config file */
  searchDir?: string;
  /** Skip loading from file */
  skipFile?: boolean;
  /** Skip environment variable overrides */
  skipEnv?: boolean;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Additional configuration to merge */
  overrides?: Record<string, unknown>;
}

/**
 * Load and validate likewise configuration
 *
 * Configuration is loaded in the following order (later overrides earlier):
 * 1. Default configuration
 * 2. Configuration file (if found)
 * 3. Environment variables
 * 4. Explicit overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): LikewiseConfig {
  let config: Record<string, unknown> = { ...DEFAULT_CONFIG };

  if (options.skipFile !== true) {
    const configPath = options.configPath ?? findConfigFile(options.searchDir);
    if (configPath !== null) {
      config = deepMerge(config, loadFileConfig(configPath));
    }
  }

  if (options.skipEnv !== true) {
    config = deepMerge(config, loadEnvConfig(options.env ?? process.env));
  }

  if (options.overrides !== undefined) {
    config = deepMerge(config, options.overrides);
  }

  return validateConfig(config);
}

/**
 * Create a configuration instance with partial overrides
 */
export function createConfig(overrides: Record<string, unknown>): LikewiseConfig {
  return validateConfig(deepMerge({ ...DEFAULT_CONFIG }, overrides));
}
