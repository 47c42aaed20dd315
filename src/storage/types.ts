/**
 * Storage-related types for partlens
 */

import type { PartRecord } from '../parts/types.js';

/**
 * Part row as stored in the `parts` table
 */
export interface PartRow {
  id: string;
  label: string;
  description: string;
  sequence: string;
  type_level1: string;
  type_level2: string | null;
  type_level3: string | null;
  source_collection: string;
  organism: string | null;
  metadata: string;
  usage_count: number;
  success_rate: number;
  embedding_text: string | null;
  embedding_model: string | null;
  created_at: string;
  updated_at: string;
}

/**
 * Snapshot row as stored in the `index_snapshots` table
 */
export interface SnapshotRow {
  id: number;
  version: number;
  model_version: string;
  dimension: number;
  id_list: string;
  vector_blob: Buffer;
  vector_count: number;
  created_at: number;
}

/**
 * Text and model a part was last embedded with
 */
export interface EmbeddingState {
  text: string;
  modelVersion: string;
}

/**
 * Result of an upsert
 */
export type UpsertResult = 'inserted' | 'updated';

export interface PartUpsert {
  part: PartRecord;
  embedding?: EmbeddingState;
}

export interface ListOptions {
  limit?: number;
  offset?: number;
  /** `id` (default) or `usage` (usage count desc, success rate desc, id asc) */
  orderBy?: 'id' | 'usage';
}

export interface PartPage {
  totalCount: number;
  parts: PartRecord[];
}

export interface AvailableFilters {
  types: string[];
  subtypes: string[];
  sources: string[];
}

export interface PartStatistics {
  totalParts: number;
  byType: Record<string, number>;
  bySource: Record<string, number>;
}

/**
 * Storage error
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly code: StorageErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

/**
 * Storage error codes
 */
export enum StorageErrorCode {
  /** Database initialization failed */
  INIT_FAILED = 'INIT_FAILED',
  /** Record not found */
  NOT_FOUND = 'NOT_FOUND',
  /** Stored row does not decode to a valid record */
  CORRUPT_RECORD = 'CORRUPT_RECORD',
  /** Query execution failed */
  QUERY_FAILED = 'QUERY_FAILED',
  /** Transaction failed */
  TRANSACTION_FAILED = 'TRANSACTION_FAILED',
}
