import { describe, it, expect } from 'vitest';
import { IndexConfigSchema } from '../../../src/config/schema.js';
import { VectorIndexEngine } from '../../../src/vector/engine.js';
import { createRandom, normalize, dot } from '../../../src/vector/math.js';
import { VectorIndexError, VectorIndexErrorCode } from '../../../src/vector/types.js';

function randomVectors(count: number, dimension: number, seed: number): number[][] {
  const random = createRandom(seed);
  const vectors: number[][] = [];
  for (let i = 0; i < count; i++) {
    const vector: number[] = [];
    for (let d = 0; d < dimension; d++) {
      vector.push(random() - 0.5);
    }
    vectors.push(vector);
  }
  return vectors;
}

function bruteForce(vectors: number[][], query: number[], k: number): string[] {
  const q = normalize(query);
  return vectors
    .map((v, i) => ({ id: `p${i}`, distance: 1 - dot(q, normalize(v)) }))
    .sort((a, b) => a.distance - b.distance)
    .slice(0, k)
    .map((h) => h.id);
}

describe('VectorIndexEngine', () => {
  describe('exact mode', () => {
    it('should return hits ascending by distance', async () => {
      const engine = new VectorIndexEngine({ dimension: 2, modelVersion: 'test-2' });
      await engine.insert('a', [1, 0]);
      await engine.insert('b', [0, 1]);
      await engine.insert('c', [-1, 0]);

      expect(engine.query([1, 0], 3)).toEqual([
        { id: 'a', distance: 0 },
        { id: 'b', distance: 1 },
        { id: 'c', distance: 2 },
      ]);
    });

    it('should break distance ties by id', async () => {
      const engine = new VectorIndexEngine({ dimension: 2, modelVersion: 'test-2' });
      await engine.insert('zeta', [2, 0]);
      await engine.insert('alpha', [1, 0]);

      expect(engine.query([1, 0], 2).map((h) => h.id)).toEqual(['alpha', 'zeta']);
    });

    it('should return every live vector when k exceeds the count', async () => {
      const engine = new VectorIndexEngine({ dimension: 2, modelVersion: 'test-2' });
      await engine.insert('a', [1, 0]);

      expect(engine.query([0, 1], 10)).toHaveLength(1);
      expect(engine.query([0, 1], 0)).toEqual([]);
    });

    it('should replace the vector of an existing id', async () => {
      const engine = new VectorIndexEngine({ dimension: 2, modelVersion: 'test-2' });
      await engine.insert('a', [1, 0]);
      await engine.insert('a', [0, 1]);

      expect(engine.size).toBe(1);
      expect(engine.query([0, 1], 1)).toEqual([{ id: 'a', distance: 0 }]);
    });

    it('should remove vectors', async () => {
      const engine = new VectorIndexEngine({ dimension: 2, modelVersion: 'test-2' });
      await engine.insert('a', [1, 0]);

      expect(await engine.remove('a')).toBe(true);
      expect(await engine.remove('a')).toBe(false);
      expect(engine.has('a')).toBe(false);
      expect(engine.query([1, 0], 5)).toEqual([]);
    });
  });

  describe('validation', () => {
    it('should reject vectors of the wrong dimension', async () => {
      const engine = new VectorIndexEngine({ dimension: 3, modelVersion: 'test-3' });

      await expect(engine.insert('a', [1, 0])).rejects.toMatchObject({
        code: VectorIndexErrorCode.DIMENSION_MISMATCH,
      });
      expect(() => engine.query([1, 0], 1)).toThrow(VectorIndexError);
    });

    it('should reject a negative k', () => {
      const engine = new VectorIndexEngine({ dimension: 2, modelVersion: 'test-2' });

      try {
        engine.query([1, 0], -1);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(VectorIndexError);
        expect(error).toMatchObject({ code: VectorIndexErrorCode.INVALID_QUERY });
      }
    });

    it('should reject invalid batch items individually', async () => {
      const engine = new VectorIndexEngine({ dimension: 2, modelVersion: 'test-2' });
      await engine.insert('a', [1, 0]);

      const report = await engine.insertBatch([
        { id: 'a', vector: [0, 1] },
        { id: 'b', vector: [Number.NaN, 1] },
        { id: 'c', vector: [1, 1, 1] },
        { id: 'd', vector: [1, 1] },
      ]);

      expect(report.inserted).toBe(1);
      expect(report.replaced).toBe(1);
      expect(report.rejected.map((r) => [r.id, r.code])).toEqual([
        ['b', VectorIndexErrorCode.INVALID_VECTOR],
        ['c', VectorIndexErrorCode.DIMENSION_MISMATCH],
      ]);
      expect(engine.size).toBe(2);
    });
  });

  describe('approximate mode', () => {
    const dimension = 32;
    const vectors = randomVectors(500, dimension, 7);
    const config = IndexConfigSchema.parse({
      exactThreshold: 50,
      hnsw: { m: 16, efConstruction: 200, efSearch: 128, seed: 42 },
    });

    it('should reach the recall target against exact search', async () => {
      const engine = new VectorIndexEngine({ dimension, modelVersion: 'test-32', config });
      await engine.insertBatch(vectors.map((vector, i) => ({ id: `p${i}`, vector })));

      expect(engine.getSnapshot().graphSize).toBe(500);

      const queries = randomVectors(20, dimension, 99);
      let found = 0;
      for (const query of queries) {
        const expected = new Set(bruteForce(vectors, query, 10));
        for (const hit of engine.query(query, 10)) {
          if (expected.has(hit.id)) found++;
        }
      }

      expect(found / (queries.length * 10)).toBeGreaterThanOrEqual(config.recallTarget);
    });

    it('should find each stored vector as its own nearest neighbour', async () => {
      const engine = new VectorIndexEngine({ dimension, modelVersion: 'test-32', config });
      await engine.insertBatch(vectors.map((vector, i) => ({ id: `p${i}`, vector })));

      let selfHits = 0;
      for (let i = 0; i < 50; i++) {
        const vector = vectors[i];
        if (vector === undefined) continue;
        if (engine.query(vector, 1)[0]?.id === `p${i}`) selfHits++;
      }
      expect(selfHits).toBeGreaterThanOrEqual(48);
    });

    it('should scan appended vectors until the next rebuild', async () => {
      const engine = new VectorIndexEngine({ dimension, modelVersion: 'test-32', config });
      await engine.insertBatch(vectors.slice(0, 100).map((vector, i) => ({ id: `p${i}`, vector })));

      const extra = randomVectors(1, dimension, 1234)[0] ?? [];
      await engine.insert('extra', extra);

      expect(engine.getSnapshot().tailSize).toBe(1);
      expect(engine.query(extra, 1)[0]?.id).toBe('extra');

      await engine.rebuild();
      expect(engine.getSnapshot()).toMatchObject({ graphSize: 101, tailSize: 0, count: 101 });
      expect(engine.query(extra, 1)[0]?.id).toBe('extra');
    });

    it('should hide replaced graph nodes from results', async () => {
      const engine = new VectorIndexEngine({ dimension, modelVersion: 'test-32', config });
      await engine.insertBatch(vectors.slice(0, 100).map((vector, i) => ({ id: `p${i}`, vector })));
      const original = vectors[0] ?? [];
      const moved = randomVectors(1, dimension, 555)[0] ?? [];

      await engine.insert('p0', moved);

      const ids = engine.query(original, 100).map((h) => h.id);
      expect(ids.filter((id) => id === 'p0')).toHaveLength(1);
      expect(engine.query(moved, 1)[0]).toMatchObject({ id: 'p0' });
      expect(engine.size).toBe(100);
    });
  });

  describe('snapshots', () => {
    it('should keep serving the previous snapshot while a rebuild runs', async () => {
      const config = IndexConfigSchema.parse({ exactThreshold: 0, rebuildYieldEvery: 10 });
      const engine = new VectorIndexEngine({ dimension: 8, modelVersion: 'test-8', config });
      await engine.insert('old', [1, 0, 0, 0, 0, 0, 0, 0]);
      const before = engine.getSnapshot().version;

      const pending = engine.insertBatch(
        randomVectors(200, 8, 3).map((vector, i) => ({ id: `new${i}`, vector }))
      );
      await new Promise((resolve) => setImmediate(resolve));

      expect(engine.getSnapshot().version).toBe(before);
      expect(engine.query([1, 0, 0, 0, 0, 0, 0, 0], 5).map((h) => h.id)).toEqual(['old']);

      const report = await pending;
      expect(report.version).toBe(before + 1);
      expect(engine.size).toBe(201);
    });

    it('should serialise writers', async () => {
      const engine = new VectorIndexEngine({ dimension: 2, modelVersion: 'test-2' });

      await Promise.all([
        engine.insertBatch([{ id: 'a', vector: [1, 0] }]),
        engine.insert('b', [0, 1]),
        engine.insertBatch([{ id: 'c', vector: [1, 1] }]),
      ]);

      expect(engine.getSnapshot().version).toBe(3);
      expect(engine.size).toBe(3);
    });

    it('should compact the tail in the background', async () => {
      const config = IndexConfigSchema.parse({ exactThreshold: 0, maxTailSize: 1 });
      const engine = new VectorIndexEngine({ dimension: 2, modelVersion: 'test-2', config });
      await engine.insert('a', [1, 0]);
      await engine.insert('b', [0, 1]);
      await engine.whenIdle();

      expect(engine.getSnapshot()).toMatchObject({ count: 2, graphSize: 2, tailSize: 0 });
    });

    it('should round-trip through export and import', async () => {
      const source = new VectorIndexEngine({ dimension: 4, modelVersion: 'test-4' });
      await source.insert('a', [1, 0, 0, 0]);
      await source.insert('b', [0, 1, 0, 0]);
      await source.insert('gone', [0, 0, 1, 0]);
      await source.remove('gone');

      const persisted = source.exportSnapshot();
      expect(persisted.idList).toEqual(['a', 'b']);
      expect(persisted.vectorBlob.byteLength).toBe(2 * 4 * 4);

      const target = new VectorIndexEngine({ dimension: 4, modelVersion: 'test-4' });
      const info = await target.importSnapshot(persisted, { createdAt: 1000 });

      expect(info).toMatchObject({ count: 2, createdAt: 1000, version: 1 });
      expect(target.query([0, 1, 0, 0], 2)).toEqual(source.query([0, 1, 0, 0], 2));
    });

    it('should reject snapshots from another model', async () => {
      const source = new VectorIndexEngine({ dimension: 4, modelVersion: 'model-a' });
      await source.insert('a', [1, 0, 0, 0]);
      const target = new VectorIndexEngine({ dimension: 4, modelVersion: 'model-b' });

      await expect(target.importSnapshot(source.exportSnapshot())).rejects.toMatchObject({
        code: VectorIndexErrorCode.INVALID_SNAPSHOT,
      });
    });

    it('should reject truncated vector blobs', async () => {
      const engine = new VectorIndexEngine({ dimension: 4, modelVersion: 'test-4' });

      await expect(
        engine.importSnapshot({
          modelVersion: 'test-4',
          dimension: 4,
          idList: ['a'],
          vectorBlob: new Uint8Array(8),
        })
      ).rejects.toMatchObject({ code: VectorIndexErrorCode.INVALID_SNAPSHOT });
    });

    it('should report staleness against the freshness bound', async () => {
      let clock = 10_000;
      const config = IndexConfigSchema.parse({ freshnessBoundMs: 1000 });
      const engine = new VectorIndexEngine({
        dimension: 2,
        modelVersion: 'test-2',
        config,
        now: () => clock,
      });

      expect(engine.isStale()).toBe(false);
      clock += 1001;
      expect(engine.isStale()).toBe(true);

      await engine.insert('a', [1, 0]);
      expect(engine.isStale()).toBe(false);
    });
  });
});
