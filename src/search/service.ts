/**
 * Search service / request dispatcher for partlens
 *
 * validate → optimise → cache lookup → router lease → backend under a
 * deadline → cache put → typed outcome.
 *
 * A backend keeps running after the caller's deadline only until its next
 * checkpoint; if it finishes anyway its result is still cached and its lease
 * released. A result that settles after the deadline is reported as a timeout
 * even when no timer fired in between.
 *
 * Outcomes carry copies of the cached result items.
 */

import type { AdaptiveCache } from '../cache/adaptive-cache.js';
import { makeCacheKey } from '../cache/key.js';
import { QueryConfigSchema, type QueryConfig } from '../config/schema.js';
import { getComponentLogger, logOperationError, type PartlensLogger } from '../logging/logger.js';
import { getDefaultLexicon, optimize, type Lexicon, type QueryContext } from '../query/processor.js';
import type { ResourceRouter } from '../router/resource-router.js';
import { RouterError, RouterErrorCode, type WorkerLease, type WorkerStats } from '../router/types.js';
import type { VectorIndexEngine } from '../vector/engine.js';
import {
  type BackendRequest,
  type BackendResult,
  type IndexStats,
  type SearchBackend,
  type SearchMeta,
  type SearchOutcome,
  type SearchRequest,
  type SearchResultItem,
  type SearchWarning,
  DeadlineExceededError,
  SearchRequestSchema,
} from './types.js';

/**
 * Cached value for one query signature
 */
export interface CachedResultSet {
  results: SearchResultItem[];
  snapshotVersion: number;
  partial: boolean;
}

export interface SearchServiceOptions {
  engine: VectorIndexEngine;
  router: ResourceRouter;
  /** Static worker id → backend table */
  backends: ReadonlyMap<string, SearchBackend>;
  cache?: AdaptiveCache<CachedResultSet>;
  config?: QueryConfig;
  lexicon?: Lexicon;
  logger?: PartlensLogger;
  now?: () => number;
}

type Settled = { ok: true; result: BackendResult } | { ok: false; error: unknown };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function copyResults(results: readonly SearchResultItem[]): SearchResultItem[] {
  return results.map((item) => ({ ...item, matchedFields: [...item.matchedFields] }));
}

function errorCode(error: Error, fallback: string): string {
  return 'code' in error && typeof error.code === 'string' ? error.code : fallback;
}

/**
 * Resolve with the promise, or reject once the signal aborts
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then((value) => {
      signal.removeEventListener('abort', onAbort);
      resolve(value);
    });
  });
}

export class SearchService {
  private readonly config: QueryConfig;
  private readonly lexicon: Lexicon;
  private readonly logger: PartlensLogger;
  private readonly now: () => number;
  private completed = 0;
  private totalLatencyMs = 0;

  constructor(private readonly options: SearchServiceOptions) {
    this.config = options.config ?? QueryConfigSchema.parse({});
    this.lexicon = options.lexicon ?? getDefaultLexicon();
    this.logger = options.logger ?? getComponentLogger('search');
    this.now = options.now ?? Date.now;
  }

  async search(request: SearchRequest): Promise<SearchOutcome> {
    const started = this.now();
    const warnings: SearchWarning[] = [];

    const parsed = SearchRequestSchema.safeParse(request);
    if (!parsed.success) {
      return {
        status: 'invalid_request',
        message: 'Invalid search request',
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`),
        warnings,
      };
    }

    const { queryText, filters } = parsed.data;
    const topK = parsed.data.topK ?? this.config.defaultTopK;
    const timeoutMs = parsed.data.timeoutMs ?? this.config.defaultTimeoutMs;
    const issues: string[] = [];
    if (queryText.length > this.config.maxQueryLength) {
      issues.push(`queryText: longer than ${this.config.maxQueryLength} characters`);
    }
    if (topK > this.config.maxTopK) {
      issues.push(`topK: at most ${this.config.maxTopK}`);
    }
    if (issues.length > 0) {
      return { status: 'invalid_request', message: 'Invalid search request', issues, warnings };
    }

    const context = optimize(queryText, filters, this.lexicon);
    const { engine } = this.options;
    if (engine.isStale(started)) {
      warnings.push({
        code: 'STALE_INDEX',
        message: `Index snapshot ${engine.getSnapshot().version} is older than the freshness bound`,
      });
    }

    const cacheKey = makeCacheKey({
      normalized: context.normalized,
      filters: context.filters,
      topK,
      modelVersion: engine.modelVersion,
      lexiconVersion: context.lexiconVersion,
    });

    const generation = this.options.cache?.generation ?? 0;
    const cached = this.options.cache?.get(cacheKey);
    if (cached !== undefined) {
      return this.ok(cached, context, warnings, { cached: true, workerId: undefined, started });
    }

    const deadline = started + timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new DeadlineExceededError(timeoutMs)), timeoutMs);
    const checkpoint = (): void => {
      if (!controller.signal.aborted && this.now() > deadline) {
        controller.abort(new DeadlineExceededError(timeoutMs));
      }
      controller.signal.throwIfAborted();
    };

    try {
      let lease: WorkerLease;
      try {
        lease = await this.options.router.acquire({}, controller.signal);
      } catch (error) {
        return this.routingFailure(error, controller.signal, started, warnings);
      }

      const backend = this.options.backends.get(lease.workerId);
      if (backend === undefined) {
        lease.release({ ok: false, latencyMs: 0 });
        return {
          status: 'error',
          code: 'UNKNOWN_BACKEND',
          message: `No backend is mapped to worker ${lease.workerId}`,
          warnings,
        };
      }

      const execution = this.execute(backend, lease, {
        context,
        topK,
        signal: controller.signal,
        checkpoint,
        cacheKey,
        generation,
      });

      let settled: Settled;
      try {
        settled = await untilAborted(execution, controller.signal);
      } catch {
        return { status: 'timeout', results: [], warnings, elapsedMs: this.now() - started };
      }

      if (!settled.ok) {
        if (controller.signal.aborted) {
          return { status: 'timeout', results: [], warnings, elapsedMs: this.now() - started };
        }
        const err = settled.error instanceof Error ? settled.error : new Error(String(settled.error));
        logOperationError(this.logger, 'search', err, { workerId: lease.workerId });
        return {
          status: 'error',
          code: errorCode(err, 'BACKEND_FAILED'),
          message: err.message,
          warnings,
        };
      }

      // the backend may have run without yielding, so the timer never fired
      if (this.now() > deadline) {
        return { status: 'timeout', results: [], warnings, elapsedMs: this.now() - started };
      }

      const value: CachedResultSet = {
        results: settled.result.results,
        snapshotVersion: settled.result.snapshotVersion,
        partial: settled.result.partial,
      };
      return this.ok(value, context, warnings, { cached: false, workerId: lease.workerId, started });
    } finally {
      clearTimeout(timer);
    }
  }

  getIndexStats(): IndexStats {
    const snapshot = this.options.engine.getSnapshot();
    return {
      count: snapshot.count,
      avgQueryLatency: this.completed === 0 ? 0 : this.totalLatencyMs / this.completed,
      cacheHitRate: this.options.cache?.stats().hitRate ?? 0,
      snapshotVersion: snapshot.version,
      modelVersion: snapshot.modelVersion,
      stale: this.options.engine.isStale(this.now()),
      graphSize: snapshot.graphSize,
      tailSize: snapshot.tailSize,
      snapshotCreatedAt: snapshot.createdAt,
    };
  }

  getWorkerStats(): WorkerStats[] {
    return this.options.router.getWorkerStats();
  }

  /**
   * Run the backend and settle its lease; never rejects
   */
  private async execute(
    backend: SearchBackend,
    lease: WorkerLease,
    work: BackendRequest & { cacheKey: string; generation: number }
  ): Promise<Settled> {
    const { cacheKey, generation, ...request } = work;
    const started = this.now();
    try {
      const result = await backend.execute(request);
      const latencyMs = this.now() - started;
      lease.release({ ok: true, latencyMs });

      this.options.cache?.put(
        cacheKey,
        { results: result.results, snapshotVersion: result.snapshotVersion, partial: result.partial },
        { costMs: latencyMs, recordIds: result.recordIds, computedAt: generation }
      );
      return { ok: true, result };
    } catch (error) {
      lease.release({ ok: false, latencyMs: this.now() - started });
      if (!request.signal.aborted) {
        this.logger.warn({ workerId: lease.workerId, error: errorMessage(error) }, 'Search backend failed');
      }
      return { ok: false, error };
    }
  }

  private routingFailure(
    error: unknown,
    signal: AbortSignal,
    started: number,
    warnings: SearchWarning[]
  ): SearchOutcome {
    if (signal.aborted) {
      return { status: 'timeout', results: [], warnings, elapsedMs: this.now() - started };
    }
    if (error instanceof RouterError) {
      if (error.code === RouterErrorCode.OVERLOAD) {
        return { status: 'overload', message: error.message, warnings };
      }
      if (error.code === RouterErrorCode.NO_AVAILABLE_WORKER) {
        return { status: 'no_available_worker', message: error.message, warnings };
      }
      return { status: 'error', code: error.code, message: error.message, warnings };
    }
    return { status: 'error', code: 'ROUTING_FAILED', message: errorMessage(error), warnings };
  }

  private ok(
    value: CachedResultSet,
    context: QueryContext,
    warnings: SearchWarning[],
    source: { cached: boolean; workerId: string | undefined; started: number }
  ): SearchOutcome {
    const latencyMs = this.now() - source.started;
    this.completed++;
    this.totalLatencyMs += latencyMs;

    if (value.partial) {
      warnings.push({
        code: 'PARTIAL_RESULTS',
        message: 'Filters left fewer matching parts than requested',
      });
    }

    const meta: SearchMeta = {
      cached: source.cached,
      workerId: source.workerId,
      latencyMs,
      snapshotVersion: value.snapshotVersion,
      intent: context.intent,
      lexiconVersion: context.lexiconVersion,
      normalizedQuery: context.normalized,
      expandedTerms: context.expandedTerms,
    };
    return { status: 'ok', results: copyResults(value.results), warnings, meta };
  }
}
