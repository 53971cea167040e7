/**
 * Weighted score fusion of lexical and vector result lists
 *
 * Scores from different algorithms are on unrelated scales, so each list is
 * normalized by its own maximum before the weighted sum.
 */

import { documentKey, type Candidate, type FusionPolicy, type RankedResultSet } from './types.js';

/**
 * Divide every score by the list maximum
 *
 * A maximum of zero or below leaves the list untouched.
 */
export function normalizeScores(list: readonly Candidate[]): Candidate[] {
  let max = 0;
  for (const candidate of list) {
    if (candidate.score > max) max = candidate.score;
  }
  if (max <= 0) {
    return list.map((candidate) => ({ ...candidate }));
  }
  return list.map((candidate) => ({ ...candidate, score: candidate.score / max }));
}

interface FusionEntry {
  candidate: Candidate;
  lexicalScore: number;
  vectorScore: number;
  dual: boolean;
  order: number;
}

/**
 * Merge lexical and vector lists into one ranked list
 *
 * A document found by both keeps the lexical record's display fields and is
 * marked `hybrid`. At equal fused score dual-origin records rank first, then
 * the order in which the records were first seen.
 */
export function fuseResults(
  lexical: readonly Candidate[],
  vector: readonly Candidate[],
  policy: FusionPolicy,
  limit: number
): RankedResultSet {
  const entries = new Map<string, FusionEntry>();

  for (const candidate of normalizeScores(lexical)) {
    const key = documentKey(candidate.documentRef);
    if (entries.has(key)) continue;
    entries.set(key, {
      candidate,
      lexicalScore: candidate.score,
      vectorScore: 0,
      dual: false,
      order: entries.size,
    });
  }

  const seenVector = new Set<string>();
  for (const candidate of normalizeScores(vector)) {
    const key = documentKey(candidate.documentRef);
    if (seenVector.has(key)) continue;
    seenVector.add(key);

    const existing = entries.get(key);
    if (existing === undefined) {
      entries.set(key, {
        candidate,
        lexicalScore: 0,
        vectorScore: candidate.score,
        dual: false,
        order: entries.size,
      });
    } else {
      existing.vectorScore = candidate.score;
      existing.dual = true;
    }
  }

  const fused = [...entries.values()].map((entry) => ({
    entry,
    score: policy.lexicalWeight * entry.lexicalScore + policy.vectorWeight * entry.vectorScore,
  }));

  fused.sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score;
    if (a.entry.dual !== b.entry.dual) return a.entry.dual ? -1 : 1;
    return a.entry.order - b.entry.order;
  });

  return fused.slice(0, Math.max(0, limit)).map(({ entry, score }) => ({
    ...entry.candidate,
    score,
    subscores: { lexicalScore: entry.lexicalScore, vectorScore: entry.vectorScore },
    algorithmOrigin: entry.dual ? 'hybrid' : entry.candidate.algorithmOrigin,
  }));
}
