import { describe, it, expect, beforeEach } from 'vitest';
import { AdaptiveCache } from '../../../src/cache/adaptive-cache.js';
import { makeCacheKey } from '../../../src/cache/key.js';
import { FrequencySketch } from '../../../src/cache/sketch.js';
import { CacheConfigSchema } from '../../../src/config/schema.js';

describe('Adaptive Cache', () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    clock = 1_000_000;
  });

  function createCache(overrides: Record<string, unknown> = {}, sizeOf = () => 100, random?: () => number) {
    return new AdaptiveCache<string>({
      config: CacheConfigSchema.parse({ ttlMs: 1000, ...overrides }),
      sizeOf,
      now,
      ...(random === undefined ? {} : { random }),
    });
  }

  describe('admission', () => {
    it('should reject a value requested only once', () => {
      const cache = createCache();
      cache.get('q1');

      expect(cache.put('q1', 'result')).toBe(false);
      expect(cache.stats().rejected).toBe(1);
    });

    it('should admit a value requested more often than the threshold', () => {
      const cache = createCache();
      cache.get('q1');
      cache.get('q1');

      expect(cache.put('q1', 'result')).toBe(true);
      expect(cache.get('q1')).toBe('result');
    });

    it('should admit expensive values on first sight', () => {
      const cache = createCache();

      expect(cache.put('slow', 'result', { costMs: 251 })).toBe(true);
      expect(cache.put('fast', 'result', { costMs: 250 })).toBe(false);
    });

    it('should always replace an existing entry', () => {
      const cache = createCache();
      cache.put('q1', 'old', { costMs: 1000 });

      expect(cache.put('q1', 'new')).toBe(true);
      expect(cache.get('q1')).toBe('new');
      expect(cache.size).toBe(1);
    });

    it('should reject values larger than the whole budget', () => {
      const cache = createCache({ memoryBudgetBytes: 1024 }, () => 2000);
      expect(cache.put('big', 'x', { costMs: 1000 })).toBe(false);
    });

    it('should store nothing when disabled', () => {
      const cache = createCache({ enabled: false });

      expect(cache.put('q1', 'result', { costMs: 1000 })).toBe(false);
      expect(cache.get('q1')).toBeUndefined();
    });
  });

  describe('expiry', () => {
    it('should expire entries on read after the TTL', () => {
      const cache = createCache();
      cache.put('q1', 'result', { costMs: 1000 });

      clock += 999;
      expect(cache.get('q1')).toBe('result');
      clock += 1;
      expect(cache.get('q1')).toBeUndefined();
      expect(cache.stats()).toMatchObject({ hits: 1, misses: 1, expirations: 1, entries: 0 });
    });

    it('should sweep expired entries', () => {
      const cache = createCache();
      cache.put('a', 'x', { costMs: 1000 });
      cache.put('b', 'x', { costMs: 1000 });
      clock += 500;
      cache.put('c', 'x', { costMs: 1000 });
      clock += 600;

      expect(cache.sweep()).toBe(2);
      expect(cache.size).toBe(1);
    });

    it('should bound the work of one sweep', () => {
      const cache = createCache({ shardCount: 1, sweepBatchSize: 1 });
      cache.put('a', 'x', { costMs: 1000 });
      cache.put('b', 'x', { costMs: 1000 });
      clock += 2000;

      expect(cache.sweep()).toBe(1);
      expect(cache.sweep()).toBe(1);
      expect(cache.size).toBe(0);
    });
  });

  describe('invalidation', () => {
    it('should drop every entry derived from a part', () => {
      const cache = createCache();
      cache.put('q1', 'x', { costMs: 1000, recordIds: ['BBa_A', 'BBa_B'] });
      cache.put('q2', 'x', { costMs: 1000, recordIds: ['BBa_B'] });
      cache.put('q3', 'x', { costMs: 1000, recordIds: ['BBa_C'] });

      expect(cache.invalidate('BBa_B')).toBe(2);
      expect(cache.invalidate('BBa_A')).toBe(0);
      expect(cache.get('q3')).toBe('x');
      expect(cache.stats().invalidations).toBe(2);
    });

    it('should clear everything', () => {
      const cache = createCache();
      cache.put('q1', 'x', { costMs: 1000 });
      cache.put('q2', 'x', { costMs: 1000 });

      expect(cache.invalidateAll()).toBe(2);
      expect(cache.stats()).toMatchObject({ entries: 0, bytes: 0 });
    });
  });

  describe('late writes', () => {
    it('should refuse a value computed before one of its parts was invalidated', () => {
      const cache = createCache();
      const generation = cache.generation;

      cache.invalidate('BBa_A');

      expect(cache.put('q1', 'old', { costMs: 1000, recordIds: ['BBa_A', 'BBa_B'], computedAt: generation })).toBe(false);
      expect(cache.size).toBe(0);
      expect(cache.stats().rejected).toBe(1);
    });

    it('should accept a value whose parts were not invalidated since', () => {
      const cache = createCache();
      const generation = cache.generation;

      cache.invalidate('BBa_C');

      expect(cache.put('q1', 'fresh', { costMs: 1000, recordIds: ['BBa_A'], computedAt: generation })).toBe(true);
      expect(cache.put('q2', 'fresh', { costMs: 1000, recordIds: ['BBa_C'], computedAt: cache.generation })).toBe(true);
    });

    it('should refuse every value computed before a full clear', () => {
      const cache = createCache();
      const generation = cache.generation;

      cache.invalidateAll();

      expect(cache.put('q1', 'old', { costMs: 1000, recordIds: ['BBa_A'], computedAt: generation })).toBe(false);
      expect(cache.put('q1', 'new', { costMs: 1000, recordIds: ['BBa_A'], computedAt: cache.generation })).toBe(true);
    });
  });

  describe('eviction', () => {
    it('should evict the least frequently used sampled entry to stay within budget', () => {
      const sequence = [0, 0, 0.4, 0.4];
      let call = 0;
      const random = () => sequence[call++ % sequence.length] ?? 0;
      const cache = createCache({ memoryBudgetBytes: 1024, shardCount: 1 }, () => 400, random);

      cache.put('k1', 'x', { costMs: 1000 });
      for (let i = 0; i < 5; i++) cache.get('k1');
      cache.put('k2', 'x', { costMs: 1000 });
      cache.put('k3', 'x', { costMs: 1000 });

      expect(cache.stats()).toMatchObject({ entries: 2, bytes: 808, evictions: 1 });
      expect(cache.get('k1')).toBe('x');
      expect(cache.get('k3')).toBe('x');
      expect(cache.get('k2')).toBeUndefined();
    });
  });

  describe('makeCacheKey', () => {
    const base = { normalized: 'strong promoter', filters: {}, topK: 10, modelVersion: 'hashing-v1-256' };

    it('should be insensitive to filter order and case', () => {
      expect(makeCacheKey({ ...base, filters: { types: ['Promoter', 'rbs'], sources: ['igem'] } })).toBe(
        makeCacheKey({ ...base, filters: { types: ['RBS', 'promoter', 'promoter'], sources: ['IGEM'] } })
      );
    });

    it('should separate different result shapes', () => {
      const key = makeCacheKey(base);

      expect(key).toMatch(/^[0-9a-f]{64}$/);
      expect(makeCacheKey({ ...base, topK: 5 })).not.toBe(key);
      expect(makeCacheKey({ ...base, modelVersion: 'other-256' })).not.toBe(key);
      expect(makeCacheKey({ ...base, lexiconVersion: 'v2' })).not.toBe(key);
    });
  });

  describe('FrequencySketch', () => {
    it('should decay counts across windows', () => {
      const sketch = new FrequencySketch(64, 4, 1000, now);
      for (let i = 0; i < 4; i++) sketch.increment('x');

      expect(sketch.estimate('x')).toBe(4);
      clock += 1000;
      expect(sketch.estimate('x')).toBe(4);
      clock += 500;
      expect(sketch.estimate('x')).toBe(2);
      clock += 1500;
      expect(sketch.estimate('x')).toBe(0);
    });
  });
});
