/**
 * Vector index types for partlens
 */

/**
 * A single k-NN hit. Distance is cosine distance (0 = identical direction).
 */
export interface VectorHit {
  id: string;
  distance: number;
}

/**
 * Item accepted by batch inserts
 */
export interface VectorItem {
  id: string;
  vector: ArrayLike<number>;
}

/**
 * Public view of the snapshot currently served to readers
 */
export interface IndexSnapshotInfo {
  /** Monotonic version, bumped by every published write */
  version: number;
  /** Live vectors visible in this snapshot */
  count: number;
  /** Vectors reachable through the HNSW graph */
  graphSize: number;
  /** Appended vectors scanned exactly until the next re-index */
  tailSize: number;
  modelVersion: string;
  dimension: number;
  /** Epoch millis at which this snapshot was published */
  createdAt: number;
}

/**
 * Persisted index layout
 *
 * vectorBlob holds idList.length * dimension little-endian float32 values,
 * row-major in idList order.
 */
export interface PersistedIndexSnapshot {
  modelVersion: string;
  dimension: number;
  idList: string[];
  vectorBlob: Uint8Array;
}

/**
 * A record rejected during a batch insert
 */
export interface RejectedVector {
  id: string;
  code: VectorIndexErrorCode;
  message: string;
}

/**
 * Outcome of a batch insert / rebuild
 */
export interface BatchInsertReport {
  inserted: number;
  replaced: number;
  rejected: RejectedVector[];
  version: number;
  durationMs: number;
}

/**
 * Vector index error codes
 */
export enum VectorIndexErrorCode {
  /** Vector length differs from the index dimension */
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  /** Vector contains NaN or infinite components */
  INVALID_VECTOR = 'INVALID_VECTOR',
  /** Persisted snapshot does not match the index model or layout */
  INVALID_SNAPSHOT = 'INVALID_SNAPSHOT',
  /** Invalid query parameters */
  INVALID_QUERY = 'INVALID_QUERY',
}

/**
 * Vector index error
 */
export class VectorIndexError extends Error {
  constructor(
    message: string,
    public readonly code: VectorIndexErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'VectorIndexError';
  }
}
