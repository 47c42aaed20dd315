/**
 * Adaptive result cache for partlens
 *
 * - Sharded maps keyed by FNV-1a hash of the cache key
 * - Frequency- or cost-based admission; cheap one-off results are not stored
 * - Sampled eviction of the least frequent, least recently used entry
 * - TTL expiry on read plus a background sweep with bounded work per tick
 * - Invalidation by part id through a reverse index; a value computed before
 *   an invalidation of any of its parts is refused by `put`
 */

import { CacheConfigSchema, type CacheConfig } from '../config/schema.js';
import { fnv1a } from '../embeddings/hashing.js';
import { getComponentLogger, logOperationError, type PartlensLogger } from '../logging/logger.js';
import { FrequencySketch } from './sketch.js';

export interface CacheEntry<V> {
  key: string;
  value: V;
  sizeBytes: number;
  createdAt: number;
  expiresAt: number;
  lastAccess: number;
  recordIds: readonly string[];
  costMs: number;
}

export interface PutOptions {
  /** Time the value took to compute */
  costMs?: number;
  /** Part ids the value was derived from */
  recordIds?: readonly string[];
  /** `generation` read before the value was computed */
  computedAt?: number;
}

export interface CacheStats {
  entries: number;
  bytes: number;
  budgetBytes: number;
  hits: number;
  misses: number;
  hitRate: number;
  admitted: number;
  rejected: number;
  evictions: number;
  expirations: number;
  invalidations: number;
}

export interface AdaptiveCacheOptions<V> {
  config?: CacheConfig;
  /** Estimated size of a value in bytes */
  sizeOf?: (value: V) => number;
  now?: () => number;
  random?: () => number;
  logger?: PartlensLogger;
}

/** Shard attempts per eviction sample before giving up on empty shards */
const SAMPLE_ATTEMPT_FACTOR = 4;

function defaultSizeOf(value: unknown): number {
  return JSON.stringify(value).length * 2;
}

/**
 * One shard: a map plus a dense key array for O(1) random sampling
 */
class Shard<V> {
  readonly entries = new Map<string, CacheEntry<V>>();
  private readonly keys: string[] = [];
  private readonly positions = new Map<string, number>();

  get size(): number {
    return this.entries.size;
  }

  get(key: string): CacheEntry<V> | undefined {
    return this.entries.get(key);
  }

  set(entry: CacheEntry<V>): void {
    if (!this.positions.has(entry.key)) {
      this.positions.set(entry.key, this.keys.length);
      this.keys.push(entry.key);
    }
    this.entries.set(entry.key, entry);
  }

  delete(key: string): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    const position = this.positions.get(key);
    if (entry === undefined || position === undefined) return undefined;

    const lastKey = this.keys.pop();
    if (lastKey !== undefined && lastKey !== key) {
      this.keys[position] = lastKey;
      this.positions.set(lastKey, position);
    }
    this.positions.delete(key);
    this.entries.delete(key);
    return entry;
  }

  sample(random: () => number): CacheEntry<V> | undefined {
    if (this.keys.length === 0) return undefined;
    const key = this.keys[Math.floor(random() * this.keys.length)];
    return key === undefined ? undefined : this.entries.get(key);
  }

  clear(): void {
    this.entries.clear();
    this.keys.length = 0;
    this.positions.clear();
  }
}

export class AdaptiveCache<V> {
  private readonly config: CacheConfig;
  private readonly shards: Shard<V>[];
  private readonly sketch: FrequencySketch;
  private readonly byRecord = new Map<string, Set<string>>();
  private readonly sizeOf: (value: V) => number;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly logger: PartlensLogger;

  private bytes = 0;
  /** Bumped by every invalidation */
  private currentGeneration = 0;
  private clearedAt = 0;
  private readonly invalidatedAt = new Map<string, number>();
  private sweepCursor = 0;
  private sweepTimer: NodeJS.Timeout | null = null;
  private counters = {
    hits: 0,
    misses: 0,
    admitted: 0,
    rejected: 0,
    evictions: 0,
    expirations: 0,
    invalidations: 0,
  };

  constructor(options: AdaptiveCacheOptions<V> = {}) {
    this.config = options.config ?? CacheConfigSchema.parse({});
    this.sizeOf = options.sizeOf ?? defaultSizeOf;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? getComponentLogger('cache');
    this.sketch = new FrequencySketch(
      this.config.sketchWidth,
      this.config.sketchDepth,
      this.config.windowMs,
      this.now
    );
    this.shards = [];
    for (let i = 0; i < this.config.shardCount; i++) {
      this.shards.push(new Shard<V>());
    }
  }

  get(key: string): V | undefined {
    if (!this.config.enabled) return undefined;

    this.sketch.increment(key);
    const shard = this.shardFor(key);
    const entry = shard.get(key);
    const now = this.now();

    if (entry === undefined) {
      this.counters.misses++;
      return undefined;
    }

    if (entry.expiresAt <= now) {
      this.removeEntry(shard, entry);
      this.counters.expirations++;
      this.counters.misses++;
      return undefined;
    }

    entry.lastAccess = now;
    this.counters.hits++;
    return entry.value;
  }

  /**
   * Store a value if the admission policy accepts it. Returns whether it was stored.
   */
  put(key: string, value: V, options: PutOptions = {}): boolean {
    if (!this.config.enabled) return false;

    const sizeBytes = this.sizeOf(value) + key.length * 2;
    if (sizeBytes > this.config.memoryBudgetBytes) {
      this.counters.rejected++;
      return false;
    }

    if (options.computedAt !== undefined && this.invalidatedSince(options.computedAt, options.recordIds ?? [])) {
      this.counters.rejected++;
      return false;
    }

    const shard = this.shardFor(key);
    const existing = shard.get(key);
    const costMs = options.costMs ?? 0;
    const frequency = this.sketch.estimate(key);
    const admit =
      existing !== undefined ||
      frequency > this.config.admissionThreshold ||
      costMs > this.config.costBoundMs;

    if (!admit) {
      this.counters.rejected++;
      return false;
    }

    if (existing !== undefined) {
      this.removeEntry(shard, existing);
    }

    const now = this.now();
    const entry: CacheEntry<V> = {
      key,
      value,
      sizeBytes,
      createdAt: now,
      expiresAt: now + this.config.ttlMs,
      lastAccess: now,
      recordIds: [...new Set(options.recordIds ?? [])],
      costMs,
    };

    shard.set(entry);
    this.bytes += sizeBytes;
    for (const recordId of entry.recordIds) {
      let keys = this.byRecord.get(recordId);
      if (keys === undefined) {
        keys = new Set();
        this.byRecord.set(recordId, keys);
      }
      keys.add(key);
    }
    this.counters.admitted++;

    this.evictToBudget(key);
    return true;
  }

  /**
   * Drop every entry derived from a part. Returns the number removed.
   */
  invalidate(recordId: string): number {
    this.invalidatedAt.set(recordId, ++this.currentGeneration);
    const keys = this.byRecord.get(recordId);
    if (keys === undefined) return 0;

    let removed = 0;
    for (const key of [...keys]) {
      const shard = this.shardFor(key);
      const entry = shard.get(key);
      if (entry !== undefined) {
        this.removeEntry(shard, entry);
        removed++;
      }
    }
    this.byRecord.delete(recordId);
    this.counters.invalidations += removed;
    return removed;
  }

  invalidateAll(): number {
    const removed = this.size;
    for (const shard of this.shards) {
      shard.clear();
    }
    this.byRecord.clear();
    this.invalidatedAt.clear();
    this.clearedAt = ++this.currentGeneration;
    this.bytes = 0;
    this.counters.invalidations += removed;
    return removed;
  }

  /**
   * Invalidation counter. Read it before computing a value and pass it to
   * `put` as `computedAt`.
   */
  get generation(): number {
    return this.currentGeneration;
  }

  get size(): number {
    return this.shards.reduce((sum, shard) => sum + shard.size, 0);
  }

  stats(): CacheStats {
    const lookups = this.counters.hits + this.counters.misses;
    return {
      entries: this.size,
      bytes: this.bytes,
      budgetBytes: this.config.memoryBudgetBytes,
      ...this.counters,
      hitRate: lookups === 0 ? 0 : this.counters.hits / lookups,
    };
  }

  /**
   * Remove expired entries from the next shards, examining at most
   * `sweepBatchSize` entries. Returns the number removed.
   */
  sweep(): number {
    const now = this.now();
    let examined = 0;
    let removed = 0;

    for (let visited = 0; visited < this.shards.length && examined < this.config.sweepBatchSize; visited++) {
      const shard = this.shards[this.sweepCursor];
      this.sweepCursor = (this.sweepCursor + 1) % this.shards.length;
      if (shard === undefined) continue;

      const expired: CacheEntry<V>[] = [];
      for (const entry of shard.entries.values()) {
        if (examined >= this.config.sweepBatchSize) break;
        examined++;
        if (entry.expiresAt <= now) expired.push(entry);
      }
      for (const entry of expired) {
        this.removeEntry(shard, entry);
        removed++;
      }
    }

    this.counters.expirations += removed;
    return removed;
  }

  /**
   * Start the background expiry sweep
   */
  startMaintenance(): void {
    if (this.sweepTimer !== null) return;
    this.sweepTimer = setInterval(() => {
      try {
        const removed = this.sweep();
        if (removed > 0) {
          this.logger.debug({ removed }, 'Cache sweep removed expired entries');
        }
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        logOperationError(this.logger, 'cacheSweep', err);
      }
    }, this.config.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer !== null) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private shardFor(key: string): Shard<V> {
    const shard = this.shards[fnv1a(key) % this.shards.length];
    if (shard === undefined) {
      throw new RangeError('Cache has no shards');
    }
    return shard;
  }

  private removeEntry(shard: Shard<V>, entry: CacheEntry<V>): void {
    if (shard.delete(entry.key) === undefined) return;
    this.bytes -= entry.sizeBytes;
    for (const recordId of entry.recordIds) {
      const keys = this.byRecord.get(recordId);
      if (keys === undefined) continue;
      keys.delete(entry.key);
      if (keys.size === 0) this.byRecord.delete(recordId);
    }
  }

  /**
   * Evict sampled victims until the budget holds; `protectedKey` is the entry just admitted
   */
  private evictToBudget(protectedKey: string): void {
    while (this.bytes > this.config.memoryBudgetBytes) {
      let victim: { shard: Shard<V>; entry: CacheEntry<V>; frequency: number } | null = null;
      const attempts = this.config.evictionSampleSize * SAMPLE_ATTEMPT_FACTOR;
      let sampled = 0;

      for (let attempt = 0; attempt < attempts && sampled < this.config.evictionSampleSize; attempt++) {
        const shard = this.shards[Math.floor(this.random() * this.shards.length)];
        const entry = shard?.sample(this.random);
        if (shard === undefined || entry === undefined || entry.key === protectedKey) continue;
        sampled++;

        const frequency = this.sketch.estimate(entry.key);
        if (
          victim === null ||
          frequency < victim.frequency ||
          (frequency === victim.frequency && entry.lastAccess < victim.entry.lastAccess)
        ) {
          victim = { shard, entry, frequency };
        }
      }

      if (victim === null) {
        victim = this.firstUnprotected(protectedKey);
        if (victim === null) return;
      }

      this.removeEntry(victim.shard, victim.entry);
      this.counters.evictions++;
    }
  }

  private firstUnprotected(
    protectedKey: string
  ): { shard: Shard<V>; entry: CacheEntry<V>; frequency: number } | null {
    for (const shard of this.shards) {
      for (const entry of shard.entries.values()) {
        if (entry.key !== protectedKey) {
          return { shard, entry, frequency: this.sketch.estimate(entry.key) };
        }
      }
    }
    return null;
  }

  private invalidatedSince(generation: number, recordIds: readonly string[]): boolean {
    if (this.clearedAt > generation) return true;
    return recordIds.some((id) => (this.invalidatedAt.get(id) ?? 0) > generation);
  }
}
