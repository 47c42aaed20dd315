/**
 * Component wiring shared by the CLI and the MCP server
 *
 * storage → embedder → index (restored from the latest snapshot) → cache →
 * ranker → router with local search workers → search service → ingestor
 */

import { AdaptiveCache } from '../cache/adaptive-cache.js';
import type { PartlensConfig } from '../config/schema.js';
import { createEmbeddingProvider, toProviderConfig } from '../embeddings/provider.js';
import type { EmbeddingProvider } from '../embeddings/types.js';
import { Ingestor } from '../ingest/ingestor.js';
import { getComponentLogger, withLogging, type PartlensLogger } from '../logging/logger.js';
import { SimilarityRanker } from '../ranking/ranker.js';
import { ResourceRouter } from '../router/resource-router.js';
import type { HeartbeatProbe } from '../router/types.js';
import { LocalSearchBackend } from '../search/backend.js';
import { SearchService, type CachedResultSet } from '../search/service.js';
import type { SearchBackend } from '../search/types.js';
import { PartStorage } from '../storage/parts.js';
import { VectorIndexEngine } from '../vector/engine.js';
import { VectorIndexError } from '../vector/types.js';

export interface Runtime {
  config: PartlensConfig;
  storage: PartStorage;
  embedder: EmbeddingProvider;
  engine: VectorIndexEngine;
  cache: AdaptiveCache<CachedResultSet>;
  ranker: SimilarityRanker;
  router: ResourceRouter;
  backends: ReadonlyMap<string, SearchBackend>;
  service: SearchService;
  ingestor: Ingestor;
  /** Persist the current index and prune old snapshots; returns the row id */
  saveSnapshot(): Promise<number>;
  close(): Promise<void>;
}

export interface CreateRuntimeOptions {
  /** Pre-built embedder, e.g. a test double */
  embedder?: EmbeddingProvider;
  /** Start the cache sweep and worker heartbeat timers */
  background?: boolean;
  logger?: PartlensLogger;
}

/**
 * Load the newest stored snapshot for the embedder's model into the engine.
 * Returns false when none is usable.
 */
async function restoreSnapshot(
  storage: PartStorage,
  engine: VectorIndexEngine,
  logger: PartlensLogger
): Promise<boolean> {
  const stored = storage.snapshots.loadLatest(engine.modelVersion);
  if (stored === null) return false;

  try {
    await withLogging(logger, 'restoreSnapshot', () =>
      engine.importSnapshot(stored.snapshot, { createdAt: stored.createdAt })
    );
    return true;
  } catch (error) {
    if (!(error instanceof VectorIndexError)) throw error;
    logger.warn({ snapshotId: stored.id, code: error.code }, 'Stored snapshot unusable, starting empty');
    return false;
  }
}

export async function createRuntime(
  config: PartlensConfig,
  options: CreateRuntimeOptions = {}
): Promise<Runtime> {
  const logger = options.logger ?? getComponentLogger('runtime');
  const storage = PartStorage.create(config.storage.databasePath);

  let embedder: EmbeddingProvider;
  try {
    embedder = options.embedder ?? (await createEmbeddingProvider(toProviderConfig(config.embedding)));
  } catch (error) {
    storage.close();
    throw error;
  }

  const engine = new VectorIndexEngine({
    dimension: embedder.dimensions,
    modelVersion: embedder.modelVersion,
    config: config.index,
  });
  await restoreSnapshot(storage, engine, logger);

  const cache = new AdaptiveCache<CachedResultSet>({ config: config.cache });
  const ranker = new SimilarityRanker(config.ranking);
  const router = new ResourceRouter({ config: config.router });

  const backends = new Map<string, SearchBackend>();
  for (let i = 0; i < config.router.localWorkers; i++) {
    const backend = new LocalSearchBackend({
      id: `local-${i + 1}`,
      engine,
      storage,
      embedder,
      ranker,
      oversample: config.ranking.oversample,
    });
    backends.set(backend.id, backend);
    router.registerWorker({ id: backend.id, capabilities: ['search'] });
  }

  const probe: HeartbeatProbe = async (workerId, signal) => {
    const backend = backends.get(workerId);
    if (backend === undefined) return { ok: false, error: `no backend for ${workerId}` };
    return backend.ping(signal);
  };
  await router.runHeartbeatRound(probe);

  if (options.background === true) {
    cache.startMaintenance();
    router.startHeartbeats(probe);
  }

  const service = new SearchService({
    engine,
    router,
    backends,
    cache,
    config: config.query,
  });

  const ingestor = new Ingestor({
    storage,
    engine,
    embedder,
    cache,
    batchSize: config.embedding.batchSize,
    clearOnNewRecords: config.cache.clearOnNewRecords,
  });

  return {
    config,
    storage,
    embedder,
    engine,
    cache,
    ranker,
    router,
    backends,
    service,
    ingestor,
    async saveSnapshot(): Promise<number> {
      await engine.whenIdle();
      const info = engine.getSnapshot();
      const id = storage.snapshots.save(engine.exportSnapshot(), {
        version: info.version,
        createdAt: info.createdAt,
      });
      const pruned = storage.snapshots.prune(config.index.keepSnapshots);
      logger.info({ snapshotId: id, version: info.version, count: info.count, pruned }, 'Saved index snapshot');
      return id;
    },
    async close(): Promise<void> {
      cache.stop();
      router.stop();
      await engine.whenIdle();
      storage.close();
    },
  };
}
