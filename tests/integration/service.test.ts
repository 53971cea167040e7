import { describe, it, expect } from 'vitest';
import { PartitionRouter } from '../../src/backend/partition-router.js';
import type { BackendConnector, PartitionResolver, SearchBackend } from '../../src/backend/types.js';
import type { LikewiseLogger } from '../../src/logging/logger.js';
import { RetrievalError, RetrievalErrorCode } from '../../src/similarity/errors.js';
import { SimilarityService } from '../../src/similarity/service.js';
import type { RawSettings } from '../../src/similarity/settings.js';
import { createDocumentRef, type PartitionKey } from '../../src/similarity/types.js';
import { createCapturingLogger, directPayload, FakeBackend, silentLogger } from '../fixtures/similarity.js';

const source = createDocumentRef('pages', 1);

const lexicalPayload = directPayload([
  { uid: 2, title: 'Two', score: 4 },
  { uid: 3, title: 'Three', score: 2 },
]);
const vectorPayload = directPayload([
  { uid: 3, title: 'Three (vector)', score: 0.9 },
  { uid: 4, title: 'Four', score: 0.45 },
]);

const resolveToSite: PartitionResolver = {
  resolvePartition: (_ref, languageId) => Promise.resolve({ rootContainerId: 1, languageId }),
};

interface ServiceSetup {
  vectorEnabled?: boolean;
  timeoutMs?: number;
  defaultSettings?: RawSettings;
  resolver?: PartitionResolver;
  connector?: BackendConnector;
  logger?: LikewiseLogger;
}

function createService(
  backend: SearchBackend,
  setup: ServiceSetup = {}
): { service: SimilarityService; partitions: PartitionKey[] } {
  const partitions: PartitionKey[] = [];
  const connector: BackendConnector = setup.connector ?? {
    connect: (key) => {
      partitions.push(key);
      return backend;
    },
  };
  const router = new PartitionRouter(setup.resolver ?? resolveToSite, {
    sites: [],
    defaultRootContainerId: 7,
    logger: silentLogger,
  });
  const service = new SimilarityService({
    connector,
    router,
    vectorEnabled: setup.vectorEnabled ?? true,
    timeoutMs: setup.timeoutMs ?? 1000,
    ...(setup.defaultSettings !== undefined ? { defaultSettings: setup.defaultSettings } : {}),
    logger: setup.logger ?? silentLogger,
  });
  return { service, partitions };
}

describe('SimilarityService', () => {
  describe('lexical path', () => {
    it('should return backend order and raw scores', async () => {
      const backend = new FakeBackend({ responses: { lexical: lexicalPayload } });
      const { service } = createService(backend);

      const results = await service.findSimilar(source, { similarityMode: 'lexical' });

      expect(results.map((c) => [c.documentRef.id, c.score])).toEqual([
        [2, 4],
        [3, 2],
      ]);
      expect(results[0]?.algorithmOrigin).toBe('lexical');
      expect(backend.calls).toHaveLength(1);
      expect(backend.calls[0]?.query).toBe('id:site\\/pages\\/1');
      expect(backend.calls[0]?.rows).toBe(6);
    });

    it('should run lexical in auto mode without vector search', async () => {
      const backend = new FakeBackend({ responses: { lexical: lexicalPayload, vector: vectorPayload } });
      const { service } = createService(backend, { vectorEnabled: false });

      const detailed = await service.findSimilarDetailed(source);

      expect(detailed.diagnostics.path).toBe('lexical');
      expect(backend.calls.map((call) => call.algorithm)).toEqual(['lexical']);
    });
  });

  describe('hybrid path', () => {
    it('should fuse lexical and vector results', async () => {
      const backend = new FakeBackend({ responses: { lexical: lexicalPayload, vector: vectorPayload } });
      const { service } = createService(backend);

      const results = await service.findSimilar(source, { similarityMode: 'hybrid' });

      expect(results.map((c) => c.documentRef.id)).toEqual([3, 2, 4]);
      expect(results[0]?.score).toBeCloseTo(0.8);
      expect(results[1]?.score).toBeCloseTo(0.4);
      expect(results[2]?.score).toBeCloseTo(0.3);
      expect(results[0]?.title).toBe('Three');
      expect(results[0]?.algorithmOrigin).toBe('hybrid');
    });

    it('should request twice the result count from each algorithm', async () => {
      const backend = new FakeBackend({ responses: { lexical: lexicalPayload, vector: vectorPayload } });
      const { service } = createService(backend);

      await service.findSimilar(source, { similarityMode: 'hybrid', maxResults: 3 });

      expect(backend.calls.map((call) => [call.algorithm, call.rows])).toEqual([
        ['lexical', 6],
        ['vector', 6],
      ]);
      expect(backend.calls[1]?.vector?.text).toBe('source text');
    });

    it('should send one native query for the native strategy', async () => {
      const backend = new FakeBackend({
        responses: {
          'hybrid-native': directPayload([{ uid: 5, score: 0.7, mlt_score: 0.4, vector_score: 0.9 }]),
        },
      });
      const { service } = createService(backend);

      const results = await service.findSimilar(source, {
        similarityMode: 'hybrid',
        hybridStrategy: 'native',
      });

      expect(backend.calls.map((call) => call.algorithm)).toEqual(['hybrid-native']);
      expect(results.map((c) => [c.documentRef.id, c.score, c.algorithmOrigin])).toEqual([[5, 0.7, 'hybrid']]);
    });

    it('should keep lexical results when the vector query fails', async () => {
      const backend = new FakeBackend({
        responses: { lexical: lexicalPayload, vector: new Error('model not loaded') },
      });
      const { service } = createService(backend);

      const detailed = await service.findSimilarDetailed(source, { similarityMode: 'hybrid' });

      expect(detailed.results.map((c) => c.documentRef.id)).toEqual([2, 3]);
      expect(detailed.results[0]?.score).toBeCloseTo(0.4);
      expect(detailed.results[1]?.score).toBeCloseTo(0.2);
      expect(detailed.diagnostics.subQueries).toEqual([
        { algorithm: 'lexical', candidates: 2 },
        {
          algorithm: 'vector',
          candidates: 0,
          error: { code: RetrievalErrorCode.BACKEND_UNAVAILABLE, message: 'model not loaded' },
        },
      ]);
    });

    it('should time out a sub-query that never answers', async () => {
      const backend = new FakeBackend({ responses: { lexical: lexicalPayload } });
      const { service } = createService(backend, { timeoutMs: 20 });

      const detailed = await service.findSimilarDetailed(source, { similarityMode: 'hybrid' });

      expect(detailed.results.map((c) => c.documentRef.id)).toEqual([2, 3]);
      expect(detailed.diagnostics.subQueries[1]?.error?.code).toBe(RetrievalErrorCode.BACKEND_UNAVAILABLE);
      expect(detailed.diagnostics.subQueries[1]?.error?.message).toBe('vector query timed out after 20ms');
    });

    it('should return nothing and log an error when every sub-query fails', async () => {
      const { logger, entries } = createCapturingLogger();
      const backend = new FakeBackend({
        responses: { lexical: new Error('down'), vector: new Error('down') },
      });
      const { service } = createService(backend, { logger });

      const results = await service.findSimilar(source, { similarityMode: 'hybrid' });

      expect(results).toEqual([]);
      expect(entries.filter((entry) => entry.level === 50).map((entry) => entry.msg)).toEqual([
        'All sub-queries failed',
      ]);
    });
  });

  describe('degraded retrievals', () => {
    it('should return nothing for a source document that is not indexed', async () => {
      const { logger, entries } = createCapturingLogger();
      const backend = new FakeBackend({
        sourceId: null,
        sourceText: null,
        responses: { lexical: lexicalPayload, vector: vectorPayload },
      });
      const { service } = createService(backend, { logger });

      const detailed = await service.findSimilarDetailed(source, { similarityMode: 'hybrid' });

      expect(detailed.results).toEqual([]);
      expect(backend.calls).toEqual([]);
      expect(detailed.diagnostics.subQueries.map((q) => q.error?.code)).toEqual([
        RetrievalErrorCode.NOT_INDEXED,
        RetrievalErrorCode.NOT_INDEXED,
      ]);
      expect(entries.some((entry) => entry.level === 50)).toBe(false);
    });

    it('should return nothing when no backend serves the partition', async () => {
      const backend = new FakeBackend({ responses: { lexical: lexicalPayload } });
      const { service } = createService(backend, {
        connector: {
          connect: () => {
            throw new RetrievalError('No backend core configured', RetrievalErrorCode.BACKEND_UNAVAILABLE);
          },
        },
      });

      const detailed = await service.findSimilarDetailed(source, { similarityMode: 'lexical' });

      expect(detailed.results).toEqual([]);
      expect(detailed.diagnostics.backend).toBeNull();
      expect(detailed.diagnostics.subQueries).toEqual([]);
    });

    it('should route to the fallback partition when resolution fails', async () => {
      const backend = new FakeBackend({ responses: { lexical: lexicalPayload } });
      const { service, partitions } = createService(backend, {
        resolver: {
          resolvePartition: () =>
            Promise.reject(new RetrievalError('not in tree', RetrievalErrorCode.ROUTING_FAILED)),
        },
      });

      const detailed = await service.findSimilarDetailed(source, { similarityMode: 'lexical' }, 2);

      expect(partitions).toEqual([{ rootContainerId: 7, languageId: 2 }]);
      expect(detailed.diagnostics.partition).toEqual({ rootContainerId: 7, languageId: 2 });
      expect(detailed.results).toHaveLength(2);
    });
  });

  describe('settings', () => {
    it('should reject an unknown mode before contacting the backend', async () => {
      const backend = new FakeBackend({ responses: { lexical: lexicalPayload } });
      const { service, partitions } = createService(backend);

      await expect(service.findSimilar(source, { similarityMode: 'fuzzy' })).rejects.toMatchObject({
        code: RetrievalErrorCode.INVALID_CONFIGURATION,
      });
      expect(partitions).toEqual([]);
      expect(backend.calls).toEqual([]);
    });

    it('should layer request settings over the configured defaults', async () => {
      const backend = new FakeBackend({ responses: { lexical: lexicalPayload } });
      const { service } = createService(backend, {
        defaultSettings: { similarityMode: 'lexical', maxResults: 1 },
      });

      expect(await service.findSimilar(source)).toHaveLength(1);
      expect(await service.findSimilar(source, { maxResults: 2 })).toHaveLength(2);
    });

    it('should apply the result policy', async () => {
      const backend = new FakeBackend({ responses: { lexical: lexicalPayload } });
      const { service } = createService(backend);

      const results = await service.findSimilar(source, { similarityMode: 'lexical', minScore: 3 });

      expect(results.map((c) => c.documentRef.id)).toEqual([2]);
    });
  });
});
