import { describe, it, expect } from 'vitest';
import { fuseResults, normalizeScores } from '../../../src/similarity/fusion.js';
import { documentKey } from '../../../src/similarity/types.js';
import { candidate } from '../../fixtures/similarity.js';

const weights = { lexicalWeight: 0.4, vectorWeight: 0.6 };

describe('fusion', () => {
  describe('normalizeScores', () => {
    it('should divide by the maximum', () => {
      const normalized = normalizeScores([candidate('pages', 1, 10), candidate('pages', 2, 5)]);
      expect(normalized.map((c) => c.score)).toEqual([1, 0.5]);
    });

    it('should leave lists with a non-positive maximum untouched', () => {
      const normalized = normalizeScores([candidate('pages', 1, 0), candidate('pages', 2, -1)]);
      expect(normalized.map((c) => c.score)).toEqual([0, -1]);
    });

    it('should not modify its input', () => {
      const input = [candidate('pages', 1, 4)];
      normalizeScores(input);
      expect(input[0]?.score).toBe(4);
    });
  });

  describe('fuseResults', () => {
    const lexical = [
      candidate('pages', 1, 10, { title: 'A' }),
      candidate('pages', 2, 5, { title: 'B lexical' }),
    ];
    const vector = [
      candidate('pages', 2, 0.8, { title: 'B vector', algorithmOrigin: 'vector' }),
      candidate('pages', 3, 0.4, { title: 'C', algorithmOrigin: 'vector' }),
    ];

    it('should rank by weighted normalized score', () => {
      const fused = fuseResults(lexical, vector, weights, 10);

      expect(fused.map((c) => c.documentRef.id)).toEqual([2, 1, 3]);
      expect(fused[0]?.score).toBeCloseTo(0.8);
      expect(fused[1]?.score).toBeCloseTo(0.4);
      expect(fused[2]?.score).toBeCloseTo(0.3);
    });

    it('should merge a document found by both into one hybrid record', () => {
      const fused = fuseResults(lexical, vector, weights, 10);
      const merged = fused[0];

      expect(merged?.title).toBe('B lexical');
      expect(merged?.algorithmOrigin).toBe('hybrid');
      expect(merged?.subscores).toEqual({ lexicalScore: 0.5, vectorScore: 1 });
    });

    it('should zero-fill the missing subscore of single-origin records', () => {
      const fused = fuseResults(lexical, vector, weights, 10);

      expect(fused[1]?.subscores).toEqual({ lexicalScore: 1, vectorScore: 0 });
      expect(fused[1]?.algorithmOrigin).toBe('lexical');
      expect(fused[2]?.subscores).toEqual({ lexicalScore: 0, vectorScore: 0.5 });
      expect(fused[2]?.algorithmOrigin).toBe('vector');
    });

    it('should keep every document once and within score bounds', () => {
      const fused = fuseResults(
        [...lexical, candidate('pages', 1, 3)],
        [...vector, candidate('pages', 3, 0.1)],
        weights,
        10
      );
      const keys = fused.map((c) => documentKey(c.documentRef));

      expect(new Set(keys).size).toBe(keys.length);
      for (const c of fused) {
        expect(c.score).toBeGreaterThanOrEqual(0);
        expect(c.score).toBeLessThanOrEqual(1);
      }
    });

    it('should keep the first occurrence of a duplicate within one list', () => {
      const fused = fuseResults([candidate('pages', 1, 2), candidate('pages', 1, 1)], [], weights, 10);

      expect(fused).toHaveLength(1);
      expect(fused[0]?.subscores.lexicalScore).toBe(1);
    });

    it('should rank dual-origin records first at equal score, then by first appearance', () => {
      const even = { lexicalWeight: 0.5, vectorWeight: 0.5 };
      const fused = fuseResults(
        [candidate('pages', 10, 1), candidate('pages', 20, 0.5)],
        [candidate('pages', 30, 1), candidate('pages', 20, 0.5)],
        even,
        10
      );

      expect(fused.map((c) => c.score)).toEqual([0.5, 0.5, 0.5]);
      expect(fused.map((c) => c.documentRef.id)).toEqual([20, 10, 30]);
    });

    it('should truncate to the limit', () => {
      expect(fuseResults(lexical, vector, weights, 2)).toHaveLength(2);
    });

    it('should fuse a single non-empty list', () => {
      const fused = fuseResults(lexical, [], weights, 10);
      expect(fused.map((c) => c.score)).toEqual([0.4, 0.2]);
    });
  });
});
