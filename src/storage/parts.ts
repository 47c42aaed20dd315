/**
 * SQLite part storage for partlens
 *
 * Stores part records, their last embedding state and persisted index
 * snapshots in one better-sqlite3 database.
 */

import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { resolve, dirname } from 'node:path';
import { mkdirSync, existsSync } from 'node:fs';
import { PartRecordSchema, type PartFilters, type PartRecord } from '../parts/types.js';
import { SnapshotStore } from './snapshot-store.js';
import {
  type AvailableFilters,
  type EmbeddingState,
  type ListOptions,
  type PartPage,
  type PartRow,
  type PartStatistics,
  type PartUpsert,
  type UpsertResult,
  StorageError,
  StorageErrorCode,
} from './types.js';

/**
 * Schema version for migrations
 * Increment this when adding new tables/columns
 */
const SCHEMA_VERSION = 1;

/** SQLite limits bound parameters per statement */
const MAX_IDS_PER_STATEMENT = 500;

const DEFAULT_PAGE_SIZE = 20;

/**
 * SQL statements for schema creation
 */
const CREATE_TABLES = `
-- Schema version tracking
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY
);

-- Part catalog
CREATE TABLE IF NOT EXISTS parts (
  id TEXT PRIMARY KEY,
  label TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  sequence TEXT NOT NULL DEFAULT '',
  type_level1 TEXT NOT NULL,
  type_level2 TEXT,
  type_level3 TEXT,
  source_collection TEXT NOT NULL,
  organism TEXT,
  metadata TEXT NOT NULL DEFAULT '{}',
  usage_count INTEGER NOT NULL DEFAULT 0,
  success_rate REAL NOT NULL DEFAULT 0,
  embedding_text TEXT,
  embedding_model TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Persisted vector index snapshots
CREATE TABLE IF NOT EXISTS index_snapshots (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  version INTEGER NOT NULL,
  model_version TEXT NOT NULL,
  dimension INTEGER NOT NULL,
  id_list TEXT NOT NULL,
  vector_blob BLOB NOT NULL,
  vector_count INTEGER NOT NULL,
  created_at INTEGER NOT NULL
);

-- Indexes for filter queries
CREATE INDEX IF NOT EXISTS idx_parts_type1 ON parts(type_level1);
CREATE INDEX IF NOT EXISTS idx_parts_source ON parts(source_collection);
CREATE INDEX IF NOT EXISTS idx_parts_usage ON parts(usage_count);
CREATE INDEX IF NOT EXISTS idx_snapshots_model ON index_snapshots(model_version);
`;

type SqlValue = string | number | null;

interface WhereClause {
  sql: string;
  params: SqlValue[];
}

function placeholders(count: number): string {
  return new Array<string>(count).fill('?').join(', ');
}

/**
 * Translate hard filters into a WHERE clause
 *
 * Type filters match any hierarchy level case-insensitively; `promoter` also
 * matches Regulatory parts whose label mentions a promoter.
 */
function buildWhere(filters: PartFilters | undefined): WhereClause {
  const conditions: string[] = [];
  const params: SqlValue[] = [];

  const types = (filters?.types ?? []).map((t) => t.toLowerCase());
  if (types.length > 0) {
    const list = placeholders(types.length);
    const alternatives = [
      `LOWER(type_level1) IN (${list})`,
      `LOWER(COALESCE(type_level2, '')) IN (${list})`,
      `LOWER(COALESCE(type_level3, '')) IN (${list})`,
    ];
    params.push(...types, ...types, ...types);
    if (types.includes('promoter')) {
      alternatives.push(
        `(LOWER(COALESCE(type_level2, '')) = 'regulatory' AND LOWER(label) LIKE '%promoter%')`
      );
    }
    conditions.push(`(${alternatives.join(' OR ')})`);
  }

  const sources = filters?.sources ?? [];
  if (sources.length > 0) {
    conditions.push(`source_collection IN (${placeholders(sources.length)})`);
    params.push(...sources);
  }

  if (filters?.organism !== undefined) {
    conditions.push(`LOWER(COALESCE(organism, '')) = ?`);
    params.push(filters.organism.toLowerCase());
  }

  return {
    sql: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}

/**
 * Part storage class
 */
export class PartStorage {
  private db: DatabaseType;
  private closed = false;
  private snapshotStore: SnapshotStore | null = null;

  private constructor(db: DatabaseType) {
    this.db = db;
  }

  /**
   * Create and initialize a part storage instance
   *
   * @param databasePath - Path to SQLite database file, or ':memory:'
   */
  static create(databasePath: string): PartStorage {
    const inMemory = databasePath === ':memory:';
    const absolutePath = inMemory ? databasePath : resolve(databasePath);

    if (!inMemory) {
      const parentDir = dirname(absolutePath);
      if (!existsSync(parentDir)) {
        mkdirSync(parentDir, { recursive: true });
      }
    }

    try {
      const db = new Database(absolutePath);

      // Enable WAL mode for better concurrent access
      if (!inMemory) {
        db.pragma('journal_mode = WAL');
      }

      db.exec(CREATE_TABLES);

      const versionResult = db
        .prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1')
        .get();

      if (versionResult === undefined) {
        db.prepare<[number]>('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
      }

      return new PartStorage(db);
    } catch (error) {
      throw new StorageError(
        `Failed to initialize database at ${absolutePath}`,
        StorageErrorCode.INIT_FAILED,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Snapshot store sharing this database
   */
  get snapshots(): SnapshotStore {
    this.snapshotStore ??= new SnapshotStore(this.db);
    return this.snapshotStore;
  }

  /**
   * Insert or update a part. Usage statistics never move backwards on re-ingest.
   */
  upsertPart(part: PartRecord, embedding?: EmbeddingState): UpsertResult {
    const exists =
      this.db.prepare<[string], { found: number }>('SELECT 1 AS found FROM parts WHERE id = ?').get(part.id) !==
      undefined;

    try {
      this.db
        .prepare<{
          id: string;
          label: string;
          description: string;
          sequence: string;
          level1: string;
          level2: string | null;
          level3: string | null;
          source: string;
          organism: string | null;
          metadata: string;
          usage: number;
          successRate: number;
          embeddingText: string | null;
          embeddingModel: string | null;
        }>(
          `INSERT INTO parts (
             id, label, description, sequence, type_level1, type_level2, type_level3,
             source_collection, organism, metadata, usage_count, success_rate,
             embedding_text, embedding_model
           ) VALUES (
             @id, @label, @description, @sequence, @level1, @level2, @level3,
             @source, @organism, @metadata, @usage, @successRate,
             @embeddingText, @embeddingModel
           )
           ON CONFLICT(id) DO UPDATE SET
             label = excluded.label,
             description = excluded.description,
             sequence = excluded.sequence,
             type_level1 = excluded.type_level1,
             type_level2 = excluded.type_level2,
             type_level3 = excluded.type_level3,
             source_collection = excluded.source_collection,
             organism = excluded.organism,
             metadata = excluded.metadata,
             success_rate = CASE WHEN excluded.usage_count >= parts.usage_count
               THEN excluded.success_rate ELSE parts.success_rate END,
             usage_count = MAX(parts.usage_count, excluded.usage_count),
             embedding_text = COALESCE(excluded.embedding_text, parts.embedding_text),
             embedding_model = COALESCE(excluded.embedding_model, parts.embedding_model),
             updated_at = datetime('now')`
        )
        .run({
          id: part.id,
          label: part.label,
          description: part.description,
          sequence: part.sequence,
          level1: part.typeHierarchy.level1,
          level2: part.typeHierarchy.level2 ?? null,
          level3: part.typeHierarchy.level3 ?? null,
          source: part.sourceCollection,
          organism: part.metadata.organism ?? null,
          metadata: JSON.stringify(part.metadata),
          usage: part.usageCount,
          successRate: part.successRate,
          embeddingText: embedding?.text ?? null,
          embeddingModel: embedding?.modelVersion ?? null,
        });
    } catch (error) {
      throw new StorageError(
        `Failed to upsert part ${part.id}`,
        StorageErrorCode.QUERY_FAILED,
        error instanceof Error ? error : undefined
      );
    }

    return exists ? 'updated' : 'inserted';
  }

  /**
   * Upsert many parts in one transaction
   */
  upsertParts(items: PartUpsert[]): Map<string, UpsertResult> {
    const results = new Map<string, UpsertResult>();
    const run = this.db.transaction((batch: PartUpsert[]) => {
      for (const item of batch) {
        results.set(item.part.id, this.upsertPart(item.part, item.embedding));
      }
    });

    try {
      run(items);
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(
        'Failed to upsert part batch',
        StorageErrorCode.TRANSACTION_FAILED,
        error instanceof Error ? error : undefined
      );
    }
    return results;
  }

  /**
   * Get a part by id, or null when absent
   */
  getPart(id: string): PartRecord | null {
    const row = this.db.prepare<[string], PartRow>('SELECT * FROM parts WHERE id = ?').get(id);
    return row === undefined ? null : this.toRecord(row);
  }

  /**
   * Get several parts; absent ids are omitted
   */
  getParts(ids: string[]): Map<string, PartRecord> {
    const parts = new Map<string, PartRecord>();
    const unique = [...new Set(ids)];

    for (let i = 0; i < unique.length; i += MAX_IDS_PER_STATEMENT) {
      const chunk = unique.slice(i, i + MAX_IDS_PER_STATEMENT);
      const rows = this.db
        .prepare<string[], PartRow>(`SELECT * FROM parts WHERE id IN (${placeholders(chunk.length)})`)
        .all(...chunk);
      for (const row of rows) {
        parts.set(row.id, this.toRecord(row));
      }
    }

    return parts;
  }

  /**
   * Last embedding state of the given parts
   */
  getEmbeddingStates(ids: string[]): Map<string, EmbeddingState> {
    const states = new Map<string, EmbeddingState>();
    const unique = [...new Set(ids)];

    for (let i = 0; i < unique.length; i += MAX_IDS_PER_STATEMENT) {
      const chunk = unique.slice(i, i + MAX_IDS_PER_STATEMENT);
      const rows = this.db
        .prepare<string[], Pick<PartRow, 'id' | 'embedding_text' | 'embedding_model'>>(
          `SELECT id, embedding_text, embedding_model FROM parts WHERE id IN (${placeholders(chunk.length)})`
        )
        .all(...chunk);
      for (const row of rows) {
        if (row.embedding_text !== null && row.embedding_model !== null) {
          states.set(row.id, { text: row.embedding_text, modelVersion: row.embedding_model });
        }
      }
    }

    return states;
  }

  /**
   * Delete a part. Returns false when it did not exist.
   */
  deletePart(id: string): boolean {
    const result = this.db.prepare<[string]>('DELETE FROM parts WHERE id = ?').run(id);
    return result.changes > 0;
  }

  /**
   * Filtered, paginated listing
   */
  listParts(filters?: PartFilters, options: ListOptions = {}): PartPage {
    const where = buildWhere(filters);
    const limit = Math.max(0, options.limit ?? DEFAULT_PAGE_SIZE);
    const offset = Math.max(0, options.offset ?? 0);
    const order =
      options.orderBy === 'usage' ? 'usage_count DESC, success_rate DESC, id ASC' : 'id ASC';

    const total = this.db
      .prepare<SqlValue[], { count: number }>(`SELECT COUNT(*) AS count FROM parts ${where.sql}`)
      .get(...where.params);

    const rows = this.db
      .prepare<SqlValue[], PartRow>(`SELECT * FROM parts ${where.sql} ORDER BY ${order} LIMIT ? OFFSET ?`)
      .all(...where.params, limit, offset);

    return {
      totalCount: total?.count ?? 0,
      parts: rows.map((row) => this.toRecord(row)),
    };
  }

  /**
   * Distinct filter values present in the catalog
   */
  getAvailableFilters(): AvailableFilters {
    const distinct = (column: string): string[] =>
      this.db
        .prepare<[], { value: string }>(
          `SELECT DISTINCT ${column} AS value FROM parts WHERE ${column} IS NOT NULL AND ${column} != '' ORDER BY value`
        )
        .all()
        .map((row) => row.value);

    return {
      types: distinct('type_level1'),
      subtypes: distinct('type_level2'),
      sources: distinct('source_collection'),
    };
  }

  /**
   * Catalog statistics
   */
  getStatistics(): PartStatistics {
    const total = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM parts').get();

    const group = (column: string): Record<string, number> => {
      const counts: Record<string, number> = {};
      const rows = this.db
        .prepare<[], { value: string; count: number }>(
          `SELECT ${column} AS value, COUNT(*) AS count FROM parts GROUP BY ${column} ORDER BY count DESC, value ASC`
        )
        .all();
      for (const row of rows) {
        counts[row.value] = row.count;
      }
      return counts;
    };

    return {
      totalParts: total?.count ?? 0,
      byType: group('type_level1'),
      bySource: group('source_collection'),
    };
  }

  /**
   * Record one use of a part, updating the running success rate
   */
  recordUsage(id: string, success: boolean): boolean {
    const result = this.db
      .prepare<[number, string]>(
        `UPDATE parts SET
           success_rate = (success_rate * usage_count + ?) / (usage_count + 1),
           usage_count = usage_count + 1,
           updated_at = datetime('now')
         WHERE id = ?`
      )
      .run(success ? 1 : 0, id);
    return result.changes > 0;
  }

  count(): number {
    return this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM parts').get()?.count ?? 0;
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (!this.closed) {
      this.db.close();
      this.closed = true;
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  private toRecord(row: PartRow): PartRecord {
    let metadata: unknown;
    try {
      metadata = JSON.parse(row.metadata);
    } catch (error) {
      throw new StorageError(
        `Part ${row.id} has unreadable metadata`,
        StorageErrorCode.CORRUPT_RECORD,
        error instanceof Error ? error : undefined
      );
    }

    const parsed = PartRecordSchema.safeParse({
      id: row.id,
      label: row.label,
      description: row.description,
      sequence: row.sequence,
      typeHierarchy: {
        level1: row.type_level1,
        level2: row.type_level2 ?? undefined,
        level3: row.type_level3 ?? undefined,
      },
      sourceCollection: row.source_collection,
      metadata,
      usageCount: row.usage_count,
      successRate: row.success_rate,
    });

    if (!parsed.success) {
      throw new StorageError(
        `Part ${row.id} does not decode: ${parsed.error.message}`,
        StorageErrorCode.CORRUPT_RECORD
      );
    }
    return parsed.data;
  }
}
