import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { HashingEmbeddingProvider } from '../../../src/embeddings/hashing.js';
import type { EmbeddingVector } from '../../../src/embeddings/types.js';
import { Ingestor, type CacheInvalidator } from '../../../src/ingest/ingestor.js';
import { IngestErrorCode, type IngestEventType } from '../../../src/ingest/types.js';
import { PartStorage } from '../../../src/storage/parts.js';
import { VectorIndexEngine } from '../../../src/vector/engine.js';
import { SAMPLE_PARTS } from '../../fixtures/parts.js';

/**
 * Batch endpoint always fails; single texts fail only when poisoned
 */
class FlakyEmbedder extends HashingEmbeddingProvider {
  embedBatch(): Promise<EmbeddingVector[]> {
    return Promise.reject(new Error('batch endpoint down'));
  }

  async embed(text: string): Promise<EmbeddingVector> {
    if (text.includes('poison')) {
      throw new Error('cannot embed poison');
    }
    const [vector] = await super.embedBatch([text]);
    if (vector === undefined) throw new Error('no vector');
    return vector;
  }
}

function recordingInvalidator(): CacheInvalidator & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    invalidate: (id) => {
      calls.push(`one:${id}`);
      return 1;
    },
    invalidateAll: () => {
      calls.push('all');
      return 7;
    },
  };
}

describe('Ingestor', () => {
  let storage: PartStorage;
  let embedder: HashingEmbeddingProvider;
  let engine: VectorIndexEngine;

  beforeEach(async () => {
    storage = PartStorage.create(':memory:');
    embedder = new HashingEmbeddingProvider(32);
    await embedder.initialize();
    engine = new VectorIndexEngine({ dimension: 32, modelVersion: embedder.modelVersion });
  });

  afterEach(() => {
    storage.close();
  });

  describe('ingest', () => {
    it('should store, embed and index new records', async () => {
      const ingestor = new Ingestor({ storage, engine, embedder });

      const report = await ingestor.ingest(SAMPLE_PARTS);

      expect(report).toMatchObject({
        received: 6,
        inserted: 6,
        updated: 0,
        embedded: 6,
        reused: 0,
        failed: [],
        indexVersion: 1,
      });
      expect(storage.count()).toBe(6);
      expect(engine.size).toBe(6);
    });

    it('should reuse vectors whose text and model are unchanged', async () => {
      const ingestor = new Ingestor({ storage, engine, embedder });
      await ingestor.ingest(SAMPLE_PARTS);

      const report = await ingestor.ingest(SAMPLE_PARTS);

      expect(report).toMatchObject({ inserted: 0, updated: 6, embedded: 0, reused: 6, indexVersion: 1 });
    });

    it('should re-embed only records whose text changed', async () => {
      const ingestor = new Ingestor({ storage, engine, embedder });
      await ingestor.ingest(SAMPLE_PARTS);

      const changed = SAMPLE_PARTS.map((p) =>
        p.id === 'BBa_B0034' ? { ...p, description: 'Weaker ribosome binding site.' } : p
      );
      const report = await ingestor.ingest(changed);

      expect(report).toMatchObject({ updated: 6, embedded: 1, reused: 5, indexVersion: 2 });
      expect(engine.size).toBe(6);
    });

    it('should re-embed stored records missing from the index', async () => {
      await new Ingestor({ storage, engine, embedder }).ingest(SAMPLE_PARTS);
      const freshEngine = new VectorIndexEngine({ dimension: 32, modelVersion: embedder.modelVersion });

      const report = await new Ingestor({ storage, engine: freshEngine, embedder }).ingest(SAMPLE_PARTS);

      expect(report).toMatchObject({ updated: 6, embedded: 6, reused: 0 });
      expect(freshEngine.size).toBe(6);
    });

    it('should isolate invalid records', async () => {
      const ingestor = new Ingestor({ storage, engine, embedder });

      const report = await ingestor.ingest([SAMPLE_PARTS[0], { id: 'BROKEN' }, 'not a record', SAMPLE_PARTS[1]]);

      expect(report.inserted).toBe(2);
      expect(report.failed.map((f) => [f.index, f.id, f.code])).toEqual([
        [1, 'BROKEN', IngestErrorCode.VALIDATION_FAILED],
        [2, undefined, IngestErrorCode.VALIDATION_FAILED],
      ]);
      expect(report.failed[0]?.message).toBe('label: Required; typeHierarchy: Required');
    });

    it('should keep the last record when an id repeats', async () => {
      const ingestor = new Ingestor({ storage, engine, embedder });
      const base = { id: 'DUP_1', typeHierarchy: { level1: 'Other' } };

      const report = await ingestor.ingest([
        { ...base, label: 'first' },
        { ...base, label: 'second' },
      ]);

      expect(report).toMatchObject({ received: 2, inserted: 1, embedded: 1 });
      expect(storage.getPart('DUP_1')?.label).toBe('second');
    });

    it('should reject vectors of the wrong dimension per record', async () => {
      const narrow = new HashingEmbeddingProvider(16);
      await narrow.initialize();
      const ingestor = new Ingestor({ storage, engine, embedder: narrow });

      const report = await ingestor.ingest(SAMPLE_PARTS.slice(0, 2));

      expect(report.failed.map((f) => f.code)).toEqual([
        IngestErrorCode.DIMENSION_MISMATCH,
        IngestErrorCode.DIMENSION_MISMATCH,
      ]);
      expect(report.failed[0]?.message).toBe('Expected 32 dimensions, got 16');
      expect(storage.count()).toBe(0);
    });

    it('should retry a failed embedding batch one record at a time', async () => {
      const flaky = new FlakyEmbedder(32);
      await flaky.initialize();
      const ingestor = new Ingestor({ storage, engine, embedder: flaky });

      const report = await ingestor.ingest([
        SAMPLE_PARTS[0],
        { id: 'BAD_1', label: 'poison pill', typeHierarchy: { level1: 'Other' } },
        SAMPLE_PARTS[2],
      ]);

      expect(report.inserted).toBe(2);
      expect(report.failed).toEqual([
        { index: 1, id: 'BAD_1', code: IngestErrorCode.EMBEDDING_FAILED, message: 'cannot embed poison' },
      ]);
      expect(engine.has('BAD_1')).toBe(false);
    });

    it('should report progress stages in order', async () => {
      const ingestor = new Ingestor({ storage, engine, embedder });
      const stages: IngestEventType[] = [];

      await ingestor.ingest(SAMPLE_PARTS, { onProgress: (event) => stages.push(event.type) });

      expect(stages).toEqual(['started', 'validated', 'embedded', 'stored', 'indexed', 'completed']);
    });
  });

  describe('cache invalidation', () => {
    it('should clear the cache when new records arrive', async () => {
      const cache = recordingInvalidator();
      const report = await new Ingestor({ storage, engine, embedder, cache }).ingest(SAMPLE_PARTS);

      expect(cache.calls).toEqual(['all']);
      expect(report.cacheInvalidated).toBe(7);
    });

    it('should drop only entries of updated records', async () => {
      await new Ingestor({ storage, engine, embedder }).ingest(SAMPLE_PARTS);
      const cache = recordingInvalidator();

      const report = await new Ingestor({ storage, engine, embedder, cache }).ingest(SAMPLE_PARTS.slice(0, 2));

      expect(cache.calls).toEqual(['one:BBa_J23100', 'one:BBa_B0034']);
      expect(report.cacheInvalidated).toBe(2);
    });

    it('should keep unrelated entries when clearing on new records is off', async () => {
      await new Ingestor({ storage, engine, embedder }).ingest(SAMPLE_PARTS.slice(0, 1));
      const cache = recordingInvalidator();

      await new Ingestor({ storage, engine, embedder, cache, clearOnNewRecords: false }).ingest(
        SAMPLE_PARTS.slice(0, 2)
      );

      expect(cache.calls).toEqual(['one:BBa_J23100']);
    });
  });

  describe('remove', () => {
    it('should delete a part from storage, index and cache', async () => {
      const cache = recordingInvalidator();
      const ingestor = new Ingestor({ storage, engine, embedder, cache });
      await ingestor.ingest(SAMPLE_PARTS);
      cache.calls.length = 0;

      expect(await ingestor.remove('BBa_E0040')).toBe(true);
      expect(storage.getPart('BBa_E0040')).toBeNull();
      expect(engine.has('BBa_E0040')).toBe(false);
      expect(cache.calls).toEqual(['one:BBa_E0040']);

      expect(await ingestor.remove('BBa_E0040')).toBe(false);
    });
  });
});
