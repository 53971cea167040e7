/**
 * Result policy: type, container and score filters plus truncation
 */

import { buildFilterClauses } from './query-builder.js';
import type { SimilaritySettings } from './settings.js';
import type { Candidate, FilterClauses, RankedResultSet } from './types.js';

export interface ResultPolicy extends FilterClauses {
  /** Absolute score floor; 0 or below disables it */
  minScore: number;
  /** Fraction of the top score a candidate must reach; 0 or below disables it */
  minScoreRatio: number;
  maxResults: number;
}

export function resultPolicyFromSettings(settings: SimilaritySettings): ResultPolicy {
  return {
    ...buildFilterClauses(settings),
    minScore: settings.minScore,
    minScoreRatio: settings.minScoreRatio,
    maxResults: settings.maxResults,
  };
}

/**
 * Apply the result policy to an already ranked list. Order is preserved.
 */
export function applyResultPolicy(ranked: RankedResultSet, policy: ResultPolicy): RankedResultSet {
  // ratio is measured against the top score before any filtering
  const topScore = ranked[0]?.score ?? 0;

  let results: Candidate[] = [...ranked];

  if (policy.allowedTypes.length > 0) {
    const allowed = new Set(policy.allowedTypes);
    results = results.filter((c) => allowed.has(c.type));
  } else if (policy.excludedTypes.length > 0) {
    const excluded = new Set(policy.excludedTypes);
    results = results.filter((c) => !excluded.has(c.type));
  }

  if (policy.containerIds.length > 0) {
    const containers = new Set(policy.containerIds);
    results = results.filter((c) => c.containerId === undefined || containers.has(c.containerId));
  }

  if (policy.minScore > 0) {
    results = results.filter((c) => c.score >= policy.minScore);
  }

  if (policy.minScoreRatio > 0) {
    const floor = topScore * policy.minScoreRatio;
    results = results.filter((c) => c.score >= floor);
  }

  return results.slice(0, policy.maxResults);
}
