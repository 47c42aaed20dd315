/**
 * partlens - retrieval engine for synthetic-biology part catalogs
 *
 * Main entry point for the library exports.
 */

// Configuration exports
export * from './config/schema.js';
export * from './config/config.js';
export * from './config/paths.js';

// Logging exports
export * from './logging/logger.js';

// Engine components
export * from './parts/types.js';
export * from './embeddings/types.js';
export { HashingEmbeddingProvider } from './embeddings/hashing.js';
export { RemoteEmbeddingProvider } from './embeddings/remote.js';
export { createEmbeddingProvider, toProviderConfig } from './embeddings/provider.js';
export * from './vector/types.js';
export { VectorIndexEngine, type VectorIndexOptions, type ImportOptions } from './vector/engine.js';
export * from './query/processor.js';
export * from './ranking/ranker.js';
export * from './cache/adaptive-cache.js';
export { makeCacheKey, type CacheKeyInput } from './cache/key.js';
export * from './router/types.js';
export { ResourceRouter, type ResourceRouterOptions } from './router/resource-router.js';
export * from './search/types.js';
export { LocalSearchBackend, type LocalSearchBackendOptions } from './search/backend.js';
export { SearchService, type SearchServiceOptions, type CachedResultSet } from './search/service.js';
export * from './storage/types.js';
export { PartStorage } from './storage/parts.js';
export { SnapshotStore, type SnapshotMeta, type StoredSnapshot } from './storage/snapshot-store.js';
export * from './ingest/types.js';
export { Ingestor, type IngestorOptions, type CacheInvalidator } from './ingest/ingestor.js';
export { parseFeed, readFeedFile } from './ingest/feed.js';
export * from './api/operations.js';
export { createRuntime, type Runtime, type CreateRuntimeOptions } from './runtime/runtime.js';

// Version info
export { VERSION } from './version.js';
