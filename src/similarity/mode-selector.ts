/**
 * Mode selection: configured mode token + backend capability → retrieval path
 */

import { MODE_TOKENS } from './settings.js';
import { invalidConfiguration } from './errors.js';
import type { RetrievalPath } from './types.js';

export type ModeToken = (typeof MODE_TOKENS)[number];

const MODE_TOKEN_SET: ReadonlySet<string> = new Set(MODE_TOKENS);

function isModeToken(value: string): value is ModeToken {
  return MODE_TOKEN_SET.has(value);
}

/**
 * Resolve a mode token to exactly one retrieval path
 *
 * `auto` runs hybrid when the backend has vector search, lexical otherwise.
 * Explicit tokens ignore the capability signal. `mlt` and `knn` are accepted
 * as aliases of `lexical` and `vector`.
 *
 * @throws RetrievalError (INVALID_CONFIGURATION) for unknown tokens
 */
export function selectMode(mode: string, vectorEnabled: boolean): RetrievalPath {
  const token = mode.trim().toLowerCase();
  if (!isModeToken(token)) {
    throw invalidConfiguration(
      `Unknown similarity mode "${mode}". Expected one of: ${MODE_TOKENS.join(', ')}`
    );
  }

  switch (token) {
    case 'auto':
      return vectorEnabled ? 'hybrid' : 'lexical';
    case 'lexical':
    case 'mlt':
      return 'lexical';
    case 'vector':
    case 'knn':
      return 'vector';
    case 'hybrid':
      return 'hybrid';
  }
}
