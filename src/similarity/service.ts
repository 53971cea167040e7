/**
 * Similarity service
 *
 * Orchestrates one retrieval: settings, mode, partition, backend calls,
 * fusion and result policy. Backend faults degrade to an empty or partial
 * result; only configuration errors reach the caller.
 */

import { err, ok, ResultAsync, type Result } from 'neverthrow';
import type { PartitionRouter } from '../backend/partition-router.js';
import type { BackendConnector, SearchBackend } from '../backend/types.js';
import { createChildLogger, getLogger, type LikewiseLogger } from '../logging/logger.js';
import { RetrievalError, RetrievalErrorCode, toRetrievalError } from './errors.js';
import { fuseResults } from './fusion.js';
import { selectMode } from './mode-selector.js';
import { applyResultPolicy, resultPolicyFromSettings } from './policy-filter.js';
import {
  algorithmsForPath,
  buildDescriptor,
  rowsForPath,
  validateQuerySettings,
  type DescriptorInputs,
} from './query-builder.js';
import { parseResponse } from './response-parser.js';
import { mergeSettings, parseSettings, type RawSettings, type SimilaritySettings } from './settings.js';
import type {
  Algorithm,
  Candidate,
  DocumentRef,
  PartitionKey,
  RankedResultSet,
  RetrievalPath,
} from './types.js';

/**
 * Outcome of one backend sub-query
 */
export interface SubQueryDiagnostic {
  algorithm: Algorithm;
  candidates: number;
  error?: {
    code: RetrievalErrorCode;
    message: string;
  };
}

/**
 * What a retrieval did, for explain output
 */
export interface RetrievalDiagnostics {
  path: RetrievalPath;
  partition: PartitionKey;
  /** Backend name, or null when no backend serves the partition */
  backend: string | null;
  subQueries: SubQueryDiagnostic[];
  durationMs: number;
}

export interface DetailedRetrieval {
  results: RankedResultSet;
  settings: SimilaritySettings;
  diagnostics: RetrievalDiagnostics;
}

/**
 * Settings after layering, validation and mode selection
 */
export interface ResolvedSettings {
  settings: SimilaritySettings;
  path: RetrievalPath;
}

export interface SimilarityServiceOptions {
  connector: BackendConnector;
  router: PartitionRouter;
  /** Backend offers vector search; drives `auto` mode */
  vectorEnabled: boolean;
  /** Budget for each backend call */
  timeoutMs: number;
  /** Settings layered under every request's settings */
  defaultSettings?: RawSettings;
  logger?: LikewiseLogger;
}

/**
 * Reject with BACKEND_UNAVAILABLE when `promise` does not settle in time
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new RetrievalError(
          `${label} timed out after ${timeoutMs}ms`,
          RetrievalErrorCode.BACKEND_UNAVAILABLE
        )
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function notIndexed(ref: DocumentRef): RetrievalError {
  return new RetrievalError(
    `Document ${ref.type}:${ref.id} is not indexed`,
    RetrievalErrorCode.NOT_INDEXED
  );
}

export class SimilarityService {
  private logger: LikewiseLogger;

  constructor(private options: SimilarityServiceOptions) {
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Layer `rawSettings` over the configured defaults and validate the result
   *
   * @throws RetrievalError (INVALID_CONFIGURATION) for invalid settings
   */
  resolveSettings(rawSettings: RawSettings = {}): ResolvedSettings {
    const settings = parseSettings(mergeSettings(this.options.defaultSettings ?? {}, rawSettings));
    const path = selectMode(settings.similarityMode, this.options.vectorEnabled);
    validateQuerySettings(settings);
    return { settings, path };
  }

  /**
   * Documents similar to `ref`, best first
   *
   * @throws RetrievalError (INVALID_CONFIGURATION) for invalid settings
   */
  async findSimilar(
    ref: DocumentRef,
    settings: RawSettings = {},
    languageId: number = 0
  ): Promise<RankedResultSet> {
    const { results } = await this.findSimilarDetailed(ref, settings, languageId);
    return results;
  }

  /**
   * Same as findSimilar, with diagnostics
   */
  async findSimilarDetailed(
    ref: DocumentRef,
    rawSettings: RawSettings = {},
    languageId: number = 0
  ): Promise<DetailedRetrieval> {
    const start = Date.now();
    const logger = createChildLogger(this.logger, { type: ref.type, id: ref.id, languageId });

    const { settings, path } = this.resolveSettings(rawSettings);
    const policy = resultPolicyFromSettings(settings);

    const partition = await this.options.router.route(ref, languageId);
    const diagnostics: RetrievalDiagnostics = {
      path,
      partition,
      backend: null,
      subQueries: [],
      durationMs: 0,
    };
    const finish = (results: RankedResultSet): DetailedRetrieval => {
      diagnostics.durationMs = Date.now() - start;
      return { results, settings, diagnostics };
    };

    let backend: SearchBackend;
    try {
      backend = this.options.connector.connect(partition);
    } catch (error) {
      const e = toRetrievalError(error);
      logger.error(
        { code: e.code, partition, error: e.message },
        'No backend connection for partition'
      );
      return finish([]);
    }
    diagnostics.backend = backend.name;

    const algorithms = algorithmsForPath(path, settings);
    const rows = rowsForPath(path, settings);
    const outcomes = await Promise.all(
      algorithms.map(async (algorithm) => ({
        algorithm,
        result: await this.subQuery(algorithm, backend, { target: ref, settings, rows }, logger),
      }))
    );

    const lists: Candidate[][] = [];
    let failures = 0;
    for (const { algorithm, result } of outcomes) {
      if (result.isOk()) {
        lists.push(result.value);
        diagnostics.subQueries.push({ algorithm, candidates: result.value.length });
        continue;
      }

      failures++;
      const error = result.error;
      lists.push([]);
      diagnostics.subQueries.push({
        algorithm,
        candidates: 0,
        error: { code: error.code, message: error.message },
      });
      if (error.code === RetrievalErrorCode.NOT_INDEXED) {
        logger.info({ algorithm }, 'Source document is not indexed');
      } else {
        logger.warn({ algorithm, code: error.code, error: error.message }, 'Sub-query failed');
      }
    }

    if (failures === outcomes.length) {
      const indexed = diagnostics.subQueries.some(
        (q) => q.error?.code !== RetrievalErrorCode.NOT_INDEXED
      );
      if (indexed) {
        logger.error({ path, failures }, 'All sub-queries failed');
      }
      return finish([]);
    }

    const ranked =
      algorithms.length === 2
        ? fuseResults(
            lists[0] ?? [],
            lists[1] ?? [],
            { lexicalWeight: settings.lexicalWeight, vectorWeight: settings.vectorWeight },
            rows
          )
        : (lists[0] ?? []);

    return finish(applyResultPolicy(ranked, policy));
  }

  /**
   * Resolve what the algorithm needs from the index, then run it
   */
  private subQuery(
    algorithm: Algorithm,
    backend: SearchBackend,
    inputs: DescriptorInputs,
    logger: LikewiseLogger
  ): ResultAsync<Candidate[], RetrievalError> {
    const { timeoutMs } = this.options;

    return ResultAsync.fromPromise(this.resolveInputs(algorithm, backend, inputs), (error) =>
      toRetrievalError(error)
    )
      .andThen((resolved) => resolved)
      .andThen((resolved) =>
        ResultAsync.fromPromise(
          (async () => {
            const descriptor = buildDescriptor(algorithm, resolved);
            return withTimeout(backend.execute(descriptor), timeoutMs, `${algorithm} query`);
          })(),
          (error) => toRetrievalError(error)
        )
      )
      .map((raw) => parseResponse(raw, logger));
  }

  private async resolveInputs(
    algorithm: Algorithm,
    backend: SearchBackend,
    inputs: DescriptorInputs
  ): Promise<Result<DescriptorInputs, RetrievalError>> {
    const { timeoutMs } = this.options;
    const { target } = inputs;

    if (algorithm === 'vector') {
      const sourceText = await withTimeout(
        backend.resolveDocumentText(target),
        timeoutMs,
        'source text lookup'
      );
      return sourceText === null ? err(notIndexed(target)) : ok({ ...inputs, sourceText });
    }

    const sourceBackendId = await withTimeout(
      backend.resolveDocumentId(target),
      timeoutMs,
      'source id lookup'
    );
    return sourceBackendId === null ? err(notIndexed(target)) : ok({ ...inputs, sourceBackendId });
  }
}
