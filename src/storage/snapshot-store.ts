/**
 * Persisted vector index snapshots
 */

import type { Database as DatabaseType } from 'better-sqlite3';
import { z } from 'zod';
import type { PersistedIndexSnapshot } from '../vector/types.js';
import { type SnapshotRow, StorageError, StorageErrorCode } from './types.js';

const IdListSchema = z.array(z.string());

export interface SnapshotMeta {
  /** Index version at export time */
  version: number;
  /** Publish time of the exported snapshot (epoch millis) */
  createdAt: number;
}

export interface StoredSnapshot extends SnapshotMeta {
  id: number;
  snapshot: PersistedIndexSnapshot;
}

export class SnapshotStore {
  constructor(private readonly db: DatabaseType) {}

  /**
   * Persist a snapshot; returns its row id
   */
  save(snapshot: PersistedIndexSnapshot, meta: SnapshotMeta): number {
    const blob = Buffer.from(
      snapshot.vectorBlob.buffer,
      snapshot.vectorBlob.byteOffset,
      snapshot.vectorBlob.byteLength
    );

    try {
      const result = this.db
        .prepare<[number, string, number, string, Buffer, number, number]>(
          `INSERT INTO index_snapshots
             (version, model_version, dimension, id_list, vector_blob, vector_count, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          meta.version,
          snapshot.modelVersion,
          snapshot.dimension,
          JSON.stringify(snapshot.idList),
          blob,
          snapshot.idList.length,
          meta.createdAt
        );
      return Number(result.lastInsertRowid);
    } catch (error) {
      throw new StorageError(
        'Failed to save index snapshot',
        StorageErrorCode.QUERY_FAILED,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Most recent snapshot, optionally restricted to one model version
   */
  loadLatest(modelVersion?: string): StoredSnapshot | null {
    const row =
      modelVersion === undefined
        ? this.db
            .prepare<[], SnapshotRow>('SELECT * FROM index_snapshots ORDER BY id DESC LIMIT 1')
            .get()
        : this.db
            .prepare<[string], SnapshotRow>(
              'SELECT * FROM index_snapshots WHERE model_version = ? ORDER BY id DESC LIMIT 1'
            )
            .get(modelVersion);

    if (row === undefined) return null;

    let ids: unknown;
    try {
      ids = JSON.parse(row.id_list);
    } catch (error) {
      throw new StorageError(
        `Snapshot ${row.id} has an unreadable id list`,
        StorageErrorCode.CORRUPT_RECORD,
        error instanceof Error ? error : undefined
      );
    }
    const idList = IdListSchema.safeParse(ids);
    if (!idList.success) {
      throw new StorageError(`Snapshot ${row.id} id list is not a string array`, StorageErrorCode.CORRUPT_RECORD);
    }

    return {
      id: row.id,
      version: row.version,
      createdAt: row.created_at,
      snapshot: {
        modelVersion: row.model_version,
        dimension: row.dimension,
        idList: idList.data,
        vectorBlob: new Uint8Array(row.vector_blob.buffer, row.vector_blob.byteOffset, row.vector_blob.byteLength),
      },
    };
  }

  /**
   * Keep the newest `keep` snapshots; returns how many were deleted
   */
  prune(keep: number): number {
    const result = this.db
      .prepare<[number]>(
        `DELETE FROM index_snapshots WHERE id NOT IN (
           SELECT id FROM index_snapshots ORDER BY id DESC LIMIT ?
         )`
      )
      .run(Math.max(0, keep));
    return result.changes;
  }

  count(): number {
    return (
      this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM index_snapshots').get()?.count ?? 0
    );
  }
}
