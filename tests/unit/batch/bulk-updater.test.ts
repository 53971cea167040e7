import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BulkUpdater, type BulkProgressEvent } from '../../../src/batch/bulk-updater.js';
import { PartitionRouter } from '../../../src/backend/partition-router.js';
import type { SiteConfig } from '../../../src/config/schema.js';
import { ContentTree } from '../../../src/content/tree.js';
import { RetrievalError, RetrievalErrorCode } from '../../../src/similarity/errors.js';
import { SimilarityService, type ResolvedSettings } from '../../../src/similarity/service.js';
import { parseSettings, type RawSettings } from '../../../src/similarity/settings.js';
import { createDocumentRef, type DocumentRef, type RankedResultSet } from '../../../src/similarity/types.js';
import { SimilarityStore } from '../../../src/storage/similarity-store.js';
import { candidate, directPayload, FakeBackend, silentLogger } from '../../fixtures/similarity.js';

const timers = vi.hoisted(() => {
  const timeline: string[] = [];
  const pause = vi.fn((ms: number) => {
    timeline.push(`pause ${String(ms)}`);
    return Promise.resolve();
  });
  return { timeline, pause };
});

vi.mock('node:timers/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:timers/promises')>();
  return { ...actual, setTimeout: timers.pause };
});

const tree = new ContentTree([
  { id: 1, parentId: 0, kind: 'page', type: 'pages' },
  { id: 2, parentId: 1, kind: 'page', type: 'pages' },
  { id: 3, parentId: 1, kind: 'page', type: 'pages' },
  { id: 4, parentId: 1, kind: 'folder', type: 'pages' },
  { id: 10, parentId: 0, kind: 'page', type: 'pages' },
]);

const main: SiteConfig = { identifier: 'main', rootContainerId: 1, cores: { '0': 'core_en' } };
const second: SiteConfig = { identifier: 'second', rootContainerId: 10, cores: { '0': 'core_two' } };

interface ServiceCall {
  ref: DocumentRef;
  settings: RawSettings | undefined;
  languageId: number | undefined;
}

/**
 * Service answering one suggestion per document and failing for page 2
 */
function createService(): {
  service: {
    findSimilar: (ref: DocumentRef, settings?: RawSettings, languageId?: number) => Promise<RankedResultSet>;
    resolveSettings: (settings?: RawSettings) => ResolvedSettings;
  };
  calls: ServiceCall[];
} {
  const calls: ServiceCall[] = [];
  return {
    calls,
    service: {
      resolveSettings: (settings) => ({ settings: parseSettings(settings ?? {}), path: 'lexical' }),
      findSimilar: (ref, settings, languageId) => {
        calls.push({ ref, settings, languageId });
        timers.timeline.push(`find ${String(ref.id)}`);
        if (ref.id === 2) {
          return Promise.reject(new RetrievalError('backend down', RetrievalErrorCode.BACKEND_UNAVAILABLE));
        }
        return Promise.resolve([candidate('pages', 100 + ref.id, 0.5)]);
      },
    },
  };
}

describe('BulkUpdater', () => {
  let store: SimilarityStore;

  beforeEach(() => {
    store = SimilarityStore.create(':memory:');
    timers.timeline.length = 0;
    timers.pause.mockClear();
  });

  afterEach(() => {
    store.close();
  });

  function createUpdater(
    service: ReturnType<typeof createService>['service'] | SimilarityService,
    delayMs = 0
  ): BulkUpdater {
    return new BulkUpdater(service, store, tree, {
      excludedKinds: ['folder', 'recycler', 'separator'],
      delayMs,
      logger: silentLogger,
    });
  }

  /**
   * Real service over an in-process backend answering every lexical query
   */
  function createRealService(defaultSettings: RawSettings = {}): {
    service: SimilarityService;
    backend: FakeBackend;
  } {
    const backend = new FakeBackend({
      responses: { lexical: directPayload([{ uid: 50, title: 'Fifty', score: 2 }]) },
    });
    const router = new PartitionRouter(
      { resolvePartition: (_ref, languageId) => Promise.resolve({ rootContainerId: 1, languageId }) },
      { sites: [main], defaultRootContainerId: 1, logger: silentLogger }
    );
    const service = new SimilarityService({
      connector: { connect: () => backend },
      router,
      vectorEnabled: false,
      timeoutMs: 1000,
      defaultSettings,
      logger: silentLogger,
    });
    return { service, backend };
  }

  it('should store suggestions and continue past failing documents', async () => {
    const { service } = createService();

    const result = await createUpdater(service).run({ sites: [main], languageId: 0, settings: {} });

    expect(result).toEqual({
      updated: 2,
      errors: 1,
      perSite: [{ site: 'main', rootContainerId: 1, updated: 2, errors: 1 }],
    });
    expect(store.countRows(1)).toBe(2);
    expect(store.listForDocument(createDocumentRef('pages', 3), 0).map((row) => row.target_id)).toEqual([103]);
  });

  it('should pass settings and language to every retrieval', async () => {
    const { service, calls } = createService();

    await createUpdater(service).run({
      sites: [main],
      languageId: 1,
      settings: { similarityMode: 'lexical' },
    });

    expect(calls.map((call) => call.ref.id)).toEqual([1, 2, 3]);
    for (const call of calls) {
      expect(call.settings).toEqual({ similarityMode: 'lexical' });
      expect(call.languageId).toBe(1);
    }
  });

  it('should report progress per document', async () => {
    const { service } = createService();
    const events: BulkProgressEvent[] = [];

    await createUpdater(service).run({
      sites: [main],
      languageId: 0,
      settings: {},
      onProgress: (event) => events.push(event),
    });

    expect(events.map((event) => [event.ref.id, event.status, event.processed, event.total])).toEqual([
      [1, 'updated', 1, 3],
      [2, 'error', 2, 3],
      [3, 'updated', 3, 3],
    ]);
    expect(events[0]?.stored).toBe(1);
    expect(events[1]?.error).toBe('backend down');
    expect(events[1]?.stored).toBe(0);
  });

  it('should process sites in order', async () => {
    const { service } = createService();

    const result = await createUpdater(service).run({
      sites: [main, second],
      languageId: 0,
      settings: {},
    });

    expect(result.perSite.map((site) => [site.site, site.updated, site.errors])).toEqual([
      ['main', 2, 1],
      ['second', 1, 0],
    ]);
    expect(result.updated).toBe(3);
  });

  it('should reject invalid settings before any retrieval', async () => {
    const { service, calls } = createService();

    await expect(
      createUpdater(service).run({ sites: [main], languageId: 0, settings: { maxResults: 'many' } })
    ).rejects.toMatchObject({ code: RetrievalErrorCode.INVALID_CONFIGURATION });
    expect(calls).toEqual([]);
  });

  it('should reject an invalid container filter before any document is processed', async () => {
    const { service, backend } = createRealService();

    await expect(
      createUpdater(service).run({ sites: [main], languageId: 0, settings: { filterByPids: 'abc' } })
    ).rejects.toMatchObject({ code: RetrievalErrorCode.INVALID_CONFIGURATION });
    expect(backend.lookups).toEqual([]);
    expect(backend.calls).toEqual([]);
    expect(store.countRows(1)).toBe(0);
  });

  it('should reject invalid configured default settings', async () => {
    const { service, backend } = createRealService({ vectorField: 'bad field' });

    await expect(
      createUpdater(service).run({ sites: [main], languageId: 0, settings: {} })
    ).rejects.toMatchObject({ code: RetrievalErrorCode.INVALID_CONFIGURATION });
    expect(backend.calls).toEqual([]);
  });

  it('should store suggestions through a real service', async () => {
    const { service, backend } = createRealService();

    const result = await createUpdater(service).run({
      sites: [main],
      languageId: 0,
      settings: { similarityMode: 'lexical' },
    });

    expect(result.updated).toBe(3);
    expect(backend.calls).toHaveLength(3);
    expect(store.listForDocument(createDocumentRef('pages', 2), 0).map((row) => row.target_id)).toEqual([50]);
  });

  it('should pause between documents but not before the first', async () => {
    const { service } = createService();

    await createUpdater(service, 25).run({ sites: [main], languageId: 0, settings: {} });

    expect(timers.timeline).toEqual(['find 1', 'pause 25', 'find 2', 'pause 25', 'find 3']);
    expect(timers.pause).toHaveBeenCalledTimes(2);
  });

  it('should not pause without a delay', async () => {
    const { service } = createService();

    await createUpdater(service).run({ sites: [main], languageId: 0, settings: {} });

    expect(timers.pause).not.toHaveBeenCalled();
    expect(timers.timeline).toEqual(['find 1', 'find 2', 'find 3']);
  });
});
