/**
 * Ingestion pipeline for partlens
 *
 * validate → compose text → embed changed records → store → index → invalidate cache
 *
 * Failures are collected per record; a bad record never aborts the batch.
 */

import type { EmbeddingProvider, EmbeddingVector } from '../embeddings/types.js';
import {
  getComponentLogger,
  logOperationComplete,
  logOperationStart,
  type PartlensLogger,
} from '../logging/logger.js';
import { composeEmbeddingText, PartRecordSchema, type PartRecord } from '../parts/types.js';
import type { PartStorage } from '../storage/parts.js';
import type { PartUpsert } from '../storage/types.js';
import type { VectorIndexEngine } from '../vector/engine.js';
import type { VectorItem } from '../vector/types.js';
import {
  type IngestFailure,
  type IngestOptions,
  type IngestProgressEvent,
  type IngestReport,
  IngestErrorCode,
} from './types.js';

/**
 * The part of the result cache ingestion needs
 */
export interface CacheInvalidator {
  invalidate(recordId: string): number;
  invalidateAll(): number;
}

export interface IngestorOptions {
  storage: PartStorage;
  engine: VectorIndexEngine;
  embedder: EmbeddingProvider;
  cache?: CacheInvalidator;
  /** Texts per embedding request */
  batchSize?: number;
  /** Drop every cached result when a batch adds new records */
  clearOnNewRecords?: boolean;
  logger?: PartlensLogger;
}

interface PendingRecord {
  index: number;
  part: PartRecord;
  text: string;
  /** Whether the stored vector must be recomputed */
  stale: boolean;
  vector?: EmbeddingVector;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Ingestor {
  private readonly batchSize: number;
  private readonly clearOnNewRecords: boolean;
  private readonly logger: PartlensLogger;

  constructor(private readonly options: IngestorOptions) {
    this.batchSize = options.batchSize ?? 32;
    this.clearOnNewRecords = options.clearOnNewRecords ?? true;
    this.logger = options.logger ?? getComponentLogger('ingest');
  }

  async ingest(records: unknown[], options: IngestOptions = {}): Promise<IngestReport> {
    const started = Date.now();
    const total = records.length;
    const emit = (type: IngestProgressEvent['type'], processed?: number): void => {
      const event: IngestProgressEvent = { type, total, timestamp: new Date() };
      if (processed !== undefined) event.processed = processed;
      options.onProgress?.(event);
    };

    logOperationStart(this.logger, 'ingest', { records: total });
    emit('started');

    const failed: IngestFailure[] = [];
    const pending = this.validate(records, failed);
    emit('validated', pending.length);

    const embedded = await this.embedStale(pending, failed);
    emit('embedded', embedded);

    const failedIndexes = new Set(failed.map((failure) => failure.index));
    const ready = pending.filter((record) => !failedIndexes.has(record.index));
    const storeResults = this.store(ready, failed);
    emit('stored', storeResults.size);

    const stored = ready.filter((record) => storeResults.has(record.part.id));
    const indexVersion = await this.index(stored, failed);
    emit('indexed', stored.length);

    let inserted = 0;
    let updated = 0;
    for (const result of storeResults.values()) {
      if (result === 'inserted') inserted++;
      else updated++;
    }

    const cacheInvalidated = this.invalidate(storeResults);
    const reused = stored.filter((record) => !record.stale).length;

    const report: IngestReport = {
      received: total,
      inserted,
      updated,
      embedded: stored.length - reused,
      reused,
      failed: failed.sort((a, b) => a.index - b.index),
      indexVersion,
      cacheInvalidated,
      durationMs: Date.now() - started,
    };

    logOperationComplete(this.logger, 'ingest', report.durationMs, {
      inserted,
      updated,
      embedded: report.embedded,
      failed: failed.length,
      indexVersion,
    });
    emit('completed', total - failed.length);
    return report;
  }

  /**
   * Delete a part from storage, the index and cached results
   */
  async remove(id: string): Promise<boolean> {
    const deleted = this.options.storage.deletePart(id);
    const unindexed = await this.options.engine.remove(id);
    if (deleted || unindexed) {
      this.options.cache?.invalidate(id);
      this.logger.info({ id }, 'Removed part');
    }
    return deleted || unindexed;
  }

  /**
   * Parse records and decide which need a fresh vector. Later duplicates of
   * an id win.
   */
  private validate(records: unknown[], failed: IngestFailure[]): PendingRecord[] {
    const byId = new Map<string, PendingRecord>();

    records.forEach((raw, index) => {
      const parsed = PartRecordSchema.safeParse(raw);
      if (!parsed.success) {
        failed.push({
          index,
          id: rawId(raw),
          code: IngestErrorCode.VALIDATION_FAILED,
          message: parsed.error.issues
            .map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`)
            .join('; '),
        });
        return;
      }
      const part = parsed.data;
      byId.delete(part.id);
      byId.set(part.id, { index, part, text: composeEmbeddingText(part), stale: true });
    });

    const pending = [...byId.values()];
    const states = this.options.storage.getEmbeddingStates(pending.map((record) => record.part.id));
    const modelVersion = this.options.embedder.modelVersion;

    for (const record of pending) {
      const state = states.get(record.part.id);
      record.stale =
        state === undefined ||
        state.text !== record.text ||
        state.modelVersion !== modelVersion ||
        !this.options.engine.has(record.part.id);
    }
    return pending;
  }

  /**
   * Embed stale records in provider batches. A failed batch is retried one
   * record at a time so a single bad text only fails itself.
   */
  private async embedStale(pending: PendingRecord[], failed: IngestFailure[]): Promise<number> {
    const stale = pending.filter((record) => record.stale);
    const dimension = this.options.engine.dimension;
    let done = 0;

    for (let i = 0; i < stale.length; i += this.batchSize) {
      const batch = stale.slice(i, i + this.batchSize);
      let vectors: (EmbeddingVector | Error)[];
      try {
        vectors = await this.options.embedder.embedBatch(batch.map((record) => record.text));
        if (vectors.length !== batch.length) {
          throw new Error(`Provider returned ${vectors.length} vectors for ${batch.length} texts`);
        }
      } catch (error) {
        this.logger.warn({ error: messageOf(error), size: batch.length }, 'Embedding batch failed, retrying per record');
        vectors = await Promise.all(
          batch.map((record) =>
            this.options.embedder
              .embed(record.text)
              .catch((err: unknown) => (err instanceof Error ? err : new Error(String(err))))
          )
        );
      }

      batch.forEach((record, j) => {
        const vector = vectors[j];
        if (vector === undefined || vector instanceof Error) {
          failed.push({
            index: record.index,
            id: record.part.id,
            code: IngestErrorCode.EMBEDDING_FAILED,
            message: vector instanceof Error ? vector.message : 'No vector returned',
          });
        } else if (vector.length !== dimension) {
          failed.push({
            index: record.index,
            id: record.part.id,
            code: IngestErrorCode.DIMENSION_MISMATCH,
            message: `Expected ${dimension} dimensions, got ${vector.length}`,
          });
        } else {
          record.vector = vector;
          done++;
        }
      });
    }
    return done;
  }

  private store(ready: PendingRecord[], failed: IngestFailure[]): Map<string, 'inserted' | 'updated'> {
    if (ready.length === 0) return new Map();

    const modelVersion = this.options.embedder.modelVersion;
    const upserts: PartUpsert[] = ready.map((record) =>
      record.vector === undefined
        ? { part: record.part }
        : { part: record.part, embedding: { text: record.text, modelVersion } }
    );

    try {
      return this.options.storage.upsertParts(upserts);
    } catch (error) {
      const message = messageOf(error);
      this.logger.error({ error: message, size: ready.length }, 'Storing part batch failed');
      for (const record of ready) {
        failed.push({ index: record.index, id: record.part.id, code: IngestErrorCode.STORAGE_FAILED, message });
      }
      return new Map();
    }
  }

  private async index(stored: PendingRecord[], failed: IngestFailure[]): Promise<number> {
    const items: VectorItem[] = [];
    const indexById = new Map<string, number>();
    for (const record of stored) {
      if (record.vector === undefined) continue;
      items.push({ id: record.part.id, vector: record.vector });
      indexById.set(record.part.id, record.index);
    }

    if (items.length === 0) return this.options.engine.getSnapshot().version;

    const report = await this.options.engine.insertBatch(items);
    for (const rejected of report.rejected) {
      failed.push({
        index: indexById.get(rejected.id) ?? -1,
        id: rejected.id,
        code: IngestErrorCode.INDEX_REJECTED,
        message: rejected.message,
      });
    }
    return report.version;
  }

  private invalidate(results: Map<string, 'inserted' | 'updated'>): number {
    const cache = this.options.cache;
    if (cache === undefined || results.size === 0) return 0;

    const hasNew = [...results.values()].includes('inserted');
    if (hasNew && this.clearOnNewRecords) {
      return cache.invalidateAll();
    }

    let dropped = 0;
    for (const [id, result] of results) {
      if (result === 'updated') dropped += cache.invalidate(id);
    }
    return dropped;
  }
}

function rawId(raw: unknown): string | undefined {
  if (typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string') {
    return raw.id;
  }
  return undefined;
}
