/**
 * Vector index engine for partlens
 *
 * Readers load `current` once and work against that immutable handle for the
 * whole query. Writers serialise through the write lock, append to the arena
 * or build a fresh arena and graph, and publish by replacing `current`.
 */

import { IndexConfigSchema, type IndexConfig } from '../config/schema.js';
import {
  getComponentLogger,
  logOperationComplete,
  logOperationError,
  type PartlensLogger,
} from '../logging/logger.js';
import { VectorArena } from './arena.js';
import { HnswGraph } from './hnsw.js';
import { WriteLock } from './lock.js';
import { isFiniteVector, normalize, unitCosineDistance } from './math.js';
import {
  type BatchInsertReport,
  type IndexSnapshotInfo,
  type PersistedIndexSnapshot,
  type RejectedVector,
  type VectorHit,
  type VectorItem,
  VectorIndexError,
  VectorIndexErrorCode,
} from './types.js';

/**
 * Immutable handle served to readers
 */
interface IndexSnapshot {
  readonly version: number;
  readonly arena: VectorArena;
  /** Arena slots visible to this snapshot */
  readonly length: number;
  /** Graph over slots [0, graph.size), null in exact-only mode */
  readonly graph: HnswGraph | null;
  readonly liveCount: number;
  readonly createdAt: number;
}

export interface VectorIndexOptions {
  dimension: number;
  modelVersion: string;
  config?: IndexConfig;
  logger?: PartlensLogger;
  now?: () => number;
}

export interface ImportOptions {
  /** Publish time recorded when the snapshot was saved */
  createdAt?: number;
}

const FLOAT32_BYTES = 4;

export function compareHits(a: VectorHit, b: VectorHit): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/**
 * Approximate nearest-neighbour index with an exact fallback
 */
export class VectorIndexEngine {
  readonly dimension: number;
  readonly modelVersion: string;

  private readonly config: IndexConfig;
  private readonly logger: PartlensLogger;
  private readonly now: () => number;
  private readonly lock = new WriteLock();
  private current: IndexSnapshot;
  private compaction: Promise<void> | null = null;

  constructor(options: VectorIndexOptions) {
    if (!Number.isInteger(options.dimension) || options.dimension <= 0) {
      throw new VectorIndexError(
        `Index dimension must be a positive integer, got ${options.dimension}`,
        VectorIndexErrorCode.DIMENSION_MISMATCH
      );
    }

    this.dimension = options.dimension;
    this.modelVersion = options.modelVersion;
    this.config = options.config ?? IndexConfigSchema.parse({});
    this.logger = options.logger ?? getComponentLogger('index');
    this.now = options.now ?? Date.now;
    this.current = {
      version: 0,
      arena: new VectorArena(this.dimension),
      length: 0,
      graph: null,
      liveCount: 0,
      createdAt: this.now(),
    };
  }

  /** Live vectors in the current snapshot */
  get size(): number {
    return this.current.liveCount;
  }

  has(id: string): boolean {
    return this.liveSlot(this.current, id) !== undefined;
  }

  getSnapshot(): IndexSnapshotInfo {
    const snapshot = this.current;
    const graphSize = snapshot.graph?.size ?? 0;
    return {
      version: snapshot.version,
      count: snapshot.liveCount,
      graphSize,
      tailSize: snapshot.length - graphSize,
      modelVersion: this.modelVersion,
      dimension: this.dimension,
      createdAt: snapshot.createdAt,
    };
  }

  /**
   * True when the served snapshot is older than the freshness bound
   */
  isStale(now: number = this.now()): boolean {
    const bound = this.config.freshnessBoundMs;
    if (bound === 0) return false;
    return now - this.current.createdAt > bound;
  }

  /**
   * Insert or replace a single vector
   */
  async insert(id: string, vector: ArrayLike<number>): Promise<void> {
    const unit = this.prepare(id, vector);

    await this.lock.runExclusive(() => {
      const snapshot = this.current;
      const version = snapshot.version + 1;
      const previous = snapshot.arena.append(id, unit, version);
      this.publish({
        version,
        arena: snapshot.arena,
        length: snapshot.arena.length,
        graph: snapshot.graph,
        liveCount: snapshot.liveCount + (previous === undefined ? 1 : 0),
        createdAt: this.now(),
      });
    });

    this.scheduleCompaction();
  }

  /**
   * Merge a batch into the live set and publish a freshly built snapshot.
   * Invalid items are rejected individually; the rest of the batch is applied.
   */
  async insertBatch(items: VectorItem[]): Promise<BatchInsertReport> {
    const started = Date.now();
    const rejected: RejectedVector[] = [];
    const accepted = new Map<string, Float32Array>();

    for (const item of items) {
      try {
        accepted.set(item.id, this.prepare(item.id, item.vector));
      } catch (error) {
        if (!(error instanceof VectorIndexError)) throw error;
        rejected.push({ id: item.id, code: error.code, message: error.message });
      }
    }

    return this.lock.runExclusive(async () => {
      const base = this.current;
      let inserted = 0;
      let replaced = 0;
      for (const id of accepted.keys()) {
        if (this.liveSlot(base, id) !== undefined) {
          replaced++;
        } else {
          inserted++;
        }
      }

      const entries = this.collectLive(base, accepted);
      for (const [id, vector] of accepted) {
        entries.set(id, vector);
      }

      const next = await this.buildSnapshot(entries, base.version + 1, this.now());
      this.publish(next);

      const durationMs = Date.now() - started;
      logOperationComplete(this.logger, 'insertBatch', durationMs, {
        inserted,
        replaced,
        rejected: rejected.length,
        version: next.version,
      });

      return { inserted, replaced, rejected, version: next.version, durationMs };
    });
  }

  /**
   * Remove the vector of an id. Returns false if it was not indexed.
   */
  async remove(id: string): Promise<boolean> {
    const removed = await this.lock.runExclusive(() => {
      const snapshot = this.current;
      const version = snapshot.version + 1;
      if (this.liveSlot(snapshot, id) === undefined) return false;

      snapshot.arena.retire(id, version);
      this.publish({
        ...snapshot,
        version,
        liveCount: snapshot.liveCount - 1,
        createdAt: this.now(),
      });
      return true;
    });

    if (removed) this.scheduleCompaction();
    return removed;
  }

  /**
   * Re-index the live set, dropping superseded slots
   */
  async rebuild(): Promise<BatchInsertReport> {
    return this.insertBatch([]);
  }

  /**
   * Resolves once any background compaction has finished
   */
  async whenIdle(): Promise<void> {
    while (this.compaction !== null) {
      await this.compaction;
    }
  }

  /**
   * k nearest live vectors, ascending by cosine distance, ties by id
   */
  query(vector: ArrayLike<number>, k: number): VectorHit[] {
    const snapshot = this.current;

    if (!Number.isInteger(k) || k < 0) {
      throw new VectorIndexError(`k must be a non-negative integer, got ${k}`, VectorIndexErrorCode.INVALID_QUERY);
    }
    this.assertDimension(vector, 'Query vector');

    if (k === 0 || snapshot.liveCount === 0) return [];

    const query = normalize(vector);
    const graph = snapshot.graph;

    if (graph === null || snapshot.liveCount < this.config.exactThreshold) {
      return this.scan(snapshot, query, 0, snapshot.length).sort(compareHits).slice(0, k);
    }

    const tail = this.scan(snapshot, query, graph.size, snapshot.length);
    const liveInGraph = snapshot.liveCount - tail.length;
    const wanted = Math.min(k, liveInGraph);

    let ef = Math.max(this.config.hnsw.efSearch, k);
    let hits: VectorHit[] = [];
    for (;;) {
      hits = [];
      for (const candidate of graph.search(query, k, ef)) {
        if (!snapshot.arena.isVisible(candidate.slot, snapshot.version)) continue;
        hits.push({ id: snapshot.arena.idAt(candidate.slot), distance: candidate.distance });
      }
      // superseded nodes still occupy graph slots; widen until enough live ones surface
      if (hits.length >= wanted || ef >= graph.size) break;
      ef = Math.min(graph.size, ef * 2);
    }

    return hits.concat(tail).sort(compareHits).slice(0, k);
  }

  /**
   * Serialise the live set of the current snapshot
   */
  exportSnapshot(): PersistedIndexSnapshot {
    const live = this.collectLive(this.current, new Map());
    const idList = [...live.keys()];
    const vectorBlob = new Uint8Array(idList.length * this.dimension * FLOAT32_BYTES);
    const view = new DataView(vectorBlob.buffer, vectorBlob.byteOffset, vectorBlob.byteLength);

    let offset = 0;
    for (const vector of live.values()) {
      for (let i = 0; i < this.dimension; i++) {
        view.setFloat32(offset, vector[i] ?? 0, true);
        offset += FLOAT32_BYTES;
      }
    }

    return { modelVersion: this.modelVersion, dimension: this.dimension, idList, vectorBlob };
  }

  /**
   * Replace the index contents with a persisted snapshot
   */
  async importSnapshot(
    persisted: PersistedIndexSnapshot,
    options: ImportOptions = {}
  ): Promise<IndexSnapshotInfo> {
    if (persisted.modelVersion !== this.modelVersion) {
      throw new VectorIndexError(
        `Snapshot model ${persisted.modelVersion} does not match index model ${this.modelVersion}`,
        VectorIndexErrorCode.INVALID_SNAPSHOT
      );
    }
    if (persisted.dimension !== this.dimension) {
      throw new VectorIndexError(
        `Snapshot dimension ${persisted.dimension} does not match index dimension ${this.dimension}`,
        VectorIndexErrorCode.DIMENSION_MISMATCH
      );
    }
    const expectedBytes = persisted.idList.length * this.dimension * FLOAT32_BYTES;
    if (persisted.vectorBlob.byteLength !== expectedBytes) {
      throw new VectorIndexError(
        `Snapshot blob has ${persisted.vectorBlob.byteLength} bytes, expected ${expectedBytes}`,
        VectorIndexErrorCode.INVALID_SNAPSHOT
      );
    }

    const blob = persisted.vectorBlob;
    const view = new DataView(blob.buffer, blob.byteOffset, blob.byteLength);
    const entries = new Map<string, Float32Array>();
    let offset = 0;
    for (const id of persisted.idList) {
      const vector = new Float32Array(this.dimension);
      for (let i = 0; i < this.dimension; i++) {
        vector[i] = view.getFloat32(offset, true);
        offset += FLOAT32_BYTES;
      }
      if (!isFiniteVector(vector)) {
        throw new VectorIndexError(`Snapshot vector for ${id} is not finite`, VectorIndexErrorCode.INVALID_SNAPSHOT);
      }
      entries.set(id, vector);
    }

    await this.lock.runExclusive(async () => {
      const next = await this.buildSnapshot(
        entries,
        this.current.version + 1,
        options.createdAt ?? this.now()
      );
      this.publish(next);
    });

    return this.getSnapshot();
  }

  private prepare(id: string, vector: ArrayLike<number>): Float32Array {
    if (id === '') {
      throw new VectorIndexError('Vector id must be a non-empty string', VectorIndexErrorCode.INVALID_VECTOR);
    }
    this.assertDimension(vector, `Vector for ${id}`);
    if (!isFiniteVector(vector)) {
      throw new VectorIndexError(`Vector for ${id} has non-finite components`, VectorIndexErrorCode.INVALID_VECTOR);
    }
    return normalize(vector);
  }

  private assertDimension(vector: ArrayLike<number>, what: string): void {
    if (vector.length !== this.dimension) {
      throw new VectorIndexError(
        `${what} has dimension ${vector.length}, index expects ${this.dimension}`,
        VectorIndexErrorCode.DIMENSION_MISMATCH
      );
    }
  }

  private liveSlot(snapshot: IndexSnapshot, id: string): number | undefined {
    const slot = snapshot.arena.slotOf(id);
    if (slot === undefined || slot >= snapshot.length) return undefined;
    return snapshot.arena.isVisible(slot, snapshot.version) ? slot : undefined;
  }

  /**
   * Live vectors of a snapshot in slot order, skipping ids in `exclude`
   */
  private collectLive(snapshot: IndexSnapshot, exclude: Map<string, Float32Array>): Map<string, Float32Array> {
    const live = new Map<string, Float32Array>();
    for (let slot = 0; slot < snapshot.length; slot++) {
      if (!snapshot.arena.isVisible(slot, snapshot.version)) continue;
      const id = snapshot.arena.idAt(slot);
      if (exclude.has(id)) continue;
      live.set(id, snapshot.arena.vectorAt(slot));
    }
    return live;
  }

  private scan(snapshot: IndexSnapshot, query: Float32Array, from: number, to: number): VectorHit[] {
    const hits: VectorHit[] = [];
    for (let slot = from; slot < to; slot++) {
      if (!snapshot.arena.isVisible(slot, snapshot.version)) continue;
      hits.push({
        id: snapshot.arena.idAt(slot),
        distance: unitCosineDistance(query, snapshot.arena.vectorAt(slot)),
      });
    }
    return hits;
  }

  private async buildSnapshot(
    entries: Map<string, Float32Array>,
    version: number,
    createdAt: number
  ): Promise<IndexSnapshot> {
    const arena = new VectorArena(this.dimension);
    for (const [id, vector] of entries) {
      arena.append(id, vector, version);
    }

    const graph =
      arena.length >= this.config.exactThreshold && arena.length > 0
        ? await HnswGraph.build(arena, arena.length, this.config.hnsw, {
            yieldEvery: this.config.rebuildYieldEvery,
          })
        : null;

    return { version, arena, length: arena.length, graph, liveCount: arena.length, createdAt };
  }

  private publish(next: IndexSnapshot): void {
    this.current = next;
    this.logger.debug({ version: next.version, count: next.liveCount }, 'Published index snapshot');
  }

  /**
   * Start a background rebuild when the un-indexed tail or the superseded
   * slot count outgrows its bound
   */
  private scheduleCompaction(): void {
    if (this.compaction !== null) return;

    const snapshot = this.current;
    const tail = snapshot.length - (snapshot.graph?.size ?? 0);
    const needsGraph = snapshot.liveCount >= this.config.exactThreshold;
    const dead = snapshot.length - snapshot.liveCount;
    const tailTooLong = needsGraph && tail > this.config.maxTailSize;
    const tooManyDead = dead > this.config.maxTailSize + snapshot.liveCount;
    if (!tailTooLong && !tooManyDead) return;

    this.compaction = this.rebuild()
      .then(() => undefined)
      .catch((error: unknown) => {
        const err = error instanceof Error ? error : new Error(String(error));
        logOperationError(this.logger, 'compaction', err, { version: snapshot.version });
      })
      .finally(() => {
        this.compaction = null;
      });
  }
}
