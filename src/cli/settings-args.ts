/**
 * Settings from command-line flags
 */

import type { RawSettings } from '../similarity/settings.js';
import { InvalidArgumentError } from './errors.js';

/**
 * `--mode` values and the settings they imply
 *
 * `smlt` selects the backend's native hybrid handler.
 */
const MODE_SETTINGS: Readonly<Record<string, RawSettings>> = {
  auto: { similarityMode: 'auto' },
  lexical: { similarityMode: 'lexical' },
  mlt: { similarityMode: 'lexical' },
  vector: { similarityMode: 'vector' },
  knn: { similarityMode: 'vector' },
  hybrid: { similarityMode: 'hybrid', hybridStrategy: 'dual' },
  smlt: { similarityMode: 'hybrid', hybridStrategy: 'native' },
};

export const CLI_MODES = Object.keys(MODE_SETTINGS);

/**
 * Settings for a `--mode` flag
 */
export function modeSettings(mode: string | undefined, allowed: readonly string[] = CLI_MODES): RawSettings {
  if (mode === undefined) return {};
  const key = mode.trim().toLowerCase();
  const settings = MODE_SETTINGS[key];
  if (settings === undefined || !allowed.includes(key)) {
    throw new InvalidArgumentError(`--mode must be one of: ${allowed.join(', ')}`);
  }
  return settings;
}

/**
 * Commander collector for repeated `--set key=value` flags
 */
export function collectPair(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse `key=value` pairs into a settings map
 */
export function parseSetPairs(pairs: readonly string[]): RawSettings {
  const settings: Record<string, string> = {};
  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index <= 0) {
      throw new InvalidArgumentError(`--set expects key=value, got "${pair}"`);
    }
    settings[pair.slice(0, index).trim()] = pair.slice(index + 1).trim();
  }
  return settings;
}

/**
 * Parse a non-negative integer flag
 */
export function parseIntegerFlag(value: string | undefined, flag: string, fallback: number, min = 0): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new InvalidArgumentError(`${flag} must be an integer of at least ${String(min)}`);
  }
  return parsed;
}
