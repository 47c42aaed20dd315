/**
 * Ingestion types for partlens
 */

/**
 * Progress event types for ingestion
 */
export type IngestEventType = 'started' | 'validated' | 'embedded' | 'indexed' | 'stored' | 'completed';

/**
 * Progress event emitted during an ingest run
 */
export interface IngestProgressEvent {
  type: IngestEventType;
  /** Records received in the batch */
  total: number;
  /** Records processed by the current stage so far */
  processed?: number;
  timestamp: Date;
}

export interface IngestOptions {
  onProgress?: (event: IngestProgressEvent) => void;
}

/**
 * A record that could not be ingested
 */
export interface IngestFailure {
  /** Position in the submitted batch */
  index: number;
  /** Part id, when the record carried a usable one */
  id: string | undefined;
  code: IngestErrorCode;
  message: string;
}

/**
 * Ingest result
 */
export interface IngestReport {
  /** Records submitted */
  received: number;
  /** Records not previously stored */
  inserted: number;
  /** Stored records that were updated */
  updated: number;
  /** Records whose vectors were computed in this run */
  embedded: number;
  /** Records whose stored embedding was still current */
  reused: number;
  failed: IngestFailure[];
  /** Index version after the run */
  indexVersion: number;
  /** Cache entries dropped */
  cacheInvalidated: number;
  durationMs: number;
}

/**
 * Ingestion error codes
 */
export enum IngestErrorCode {
  /** Record failed schema validation */
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  /** Embedding provider failed for the record */
  EMBEDDING_FAILED = 'EMBEDDING_FAILED',
  /** Vector length differs from the index dimension */
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  /** Index refused the vector */
  INDEX_REJECTED = 'INDEX_REJECTED',
  /** Storage write failed */
  STORAGE_FAILED = 'STORAGE_FAILED',
  /** Feed file cannot be read */
  FEED_MISSING = 'FEED_MISSING',
  /** Feed content is not a JSON array or JSON Lines */
  FEED_UNREADABLE = 'FEED_UNREADABLE',
}

/**
 * Ingestion error
 */
export class IngestError extends Error {
  constructor(
    message: string,
    public readonly code: IngestErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'IngestError';
  }
}
