/**
 * Embedding types for partlens
 */

/**
 * Embedding vector (array of floats)
 */
export type EmbeddingVector = number[];

/**
 * An embedding tagged with the model version that produced it
 */
export interface VersionedEmbedding {
  vector: EmbeddingVector;
  modelVersion: string;
}

/**
 * Embedding provider interface
 *
 * The engine treats the model as an external capability: text in,
 * fixed-length vector out, versioned by model id.
 */
export interface EmbeddingProvider {
  /** Provider name */
  readonly name: string;

  /** Model version tag attached to every vector this provider produces */
  readonly modelVersion: string;

  /** Vector dimensions */
  readonly dimensions: number;

  /** Maximum tokens per text */
  readonly maxTokens: number;

  /**
   * Generate embedding for a single text
   */
  embed(text: string): Promise<EmbeddingVector>;

  /**
   * Generate embeddings for multiple texts (batched)
   */
  embedBatch(texts: string[]): Promise<EmbeddingVector[]>;

  /**
   * Initialize the provider (connect, warm up, etc.)
   */
  initialize(): Promise<void>;

  /**
   * Check if provider is ready
   */
  isReady(): boolean;
}

/**
 * Embedding provider configuration
 */
export interface EmbeddingProviderConfig {
  provider: 'hashing' | 'remote';
  model: string;
  dimensions: number;
  batchSize: number;
  remoteUrl?: string;
  remoteApiKey?: string;
  requestTimeoutMs?: number;
}

/**
 * Embedding error
 */
export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'EmbeddingError';
  }
}

/**
 * Embedding error codes
 */
export enum EmbeddingErrorCode {
  /** Provider not initialized */
  NOT_INITIALIZED = 'NOT_INITIALIZED',
  /** Embedding generation failed */
  EMBEDDING_FAILED = 'EMBEDDING_FAILED',
  /** Network error (for remote providers) */
  NETWORK_ERROR = 'NETWORK_ERROR',
  /** Provider returned vectors of an unexpected length */
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
}
