/**
 * Configuration schema for partlens
 *
 * Validates configuration using Zod and provides TypeScript types.
 * Every ranking, cache and routing coefficient lives here with its default,
 * so policies can be tuned without code changes.
 */

import { z } from 'zod';
import { getDefaultDatabasePath } from './paths.js';

/**
 * Embedding provider configuration
 * Dimensions must match what the provider produces; mismatches are rejected.
 */
export const EmbeddingConfigSchema = z.object({
  provider: z.enum(['hashing', 'remote']).default('hashing'),
  model: z.string().min(1).default('hashing-v1'),
  dimensions: z.number().int().min(8).max(4096).default(256),
  batchSize: z.number().int().min(1).max(256).default(32),
  // Remote provider settings (optional)
  remoteUrl: z.string().url().optional(),
  remoteApiKey: z.string().optional(),
  requestTimeoutMs: z.number().int().min(100).default(10000),
});

/**
 * HNSW graph parameters
 */
export const HnswConfigSchema = z.object({
  /** Max neighbours per node on upper layers (layer 0 keeps 2*m) */
  m: z.number().int().min(2).max(128).default(16),
  /** Candidate list size while building (construction quality) */
  efConstruction: z.number().int().min(4).max(2000).default(200),
  /** Candidate list size while searching (search breadth) */
  efSearch: z.number().int().min(1).max(2000).default(64),
  /** Seed for level assignment, keeps rebuilds reproducible */
  seed: z.number().int().default(42),
});

/**
 * Vector index configuration
 */
export const IndexConfigSchema = z.object({
  hnsw: HnswConfigSchema.default({}),
  /** Below this many live vectors queries use an exact linear scan */
  exactThreshold: z.number().int().min(0).default(1000),
  /** Un-indexed appended vectors tolerated before a background re-index */
  maxTailSize: z.number().int().min(1).default(512),
  /** Inserts processed between event-loop yields during a rebuild */
  rebuildYieldEvery: z.number().int().min(1).default(256),
  /** Served snapshots older than this raise a STALE_INDEX warning (0 disables) */
  freshnessBoundMs: z.number().int().min(0).default(24 * 60 * 60 * 1000),
  /** Recall the approximate mode is tuned for (documented target, used by tests) */
  recallTarget: z.number().min(0).max(1).default(0.9),
  /** Snapshots retained in storage after a save */
  keepSnapshots: z.number().int().min(1).default(3),
});

/**
 * Adaptive cache configuration
 */
export const CacheConfigSchema = z.object({
  enabled: z.boolean().default(true),
  memoryBudgetBytes: z.number().int().min(1024).default(32 * 1024 * 1024),
  ttlMs: z.number().int().min(1).default(5 * 60 * 1000),
  shardCount: z.number().int().min(1).max(256).default(16),
  /** Sliding window for access frequency */
  windowMs: z.number().int().min(1).default(60 * 1000),
  /** Admit when windowed frequency exceeds this */
  admissionThreshold: z.number().min(0).default(1),
  /** Admit regardless of frequency when recomputation took longer than this */
  costBoundMs: z.number().min(0).default(250),
  /** Entries sampled per eviction round */
  evictionSampleSize: z.number().int().min(1).max(64).default(5),
  /** Background sweep period */
  sweepIntervalMs: z.number().int().min(10).default(30 * 1000),
  /** Expired entries examined per shard and sweep tick */
  sweepBatchSize: z.number().int().min(1).default(256),
  sketchWidth: z.number().int().min(64).default(4096),
  sketchDepth: z.number().int().min(1).max(8).default(4),
  /** Drop every cached result set when a batch adds previously unseen records */
  clearOnNewRecords: z.boolean().default(true),
});

/**
 * Worker selection weights
 */
export const RouterWeightsSchema = z.object({
  load: z.number().min(0).default(0.4),
  latency: z.number().min(0).default(0.4),
  health: z.number().min(0).default(0.2),
});

/**
 * Resource router configuration
 */
export const RouterConfigSchema = z.object({
  weights: RouterWeightsSchema.default({}),
  ewmaAlpha: z.number().gt(0).max(1).default(0.3),
  latencyScaleMs: z.number().gt(0).default(100),
  /** Responses slower than this count as slow observations */
  slowLatencyMs: z.number().gt(0).default(1000),
  /** Consecutive slow/error observations before degrading */
  degradeAfter: z.number().int().min(1).default(2),
  /** Consecutive heartbeat failures before marking unhealthy */
  unhealthyAfter: z.number().int().min(1).default(3),
  /** Error-rate EWMA that marks a node unhealthy */
  errorRateThreshold: z.number().gt(0).max(1).default(0.5),
  /** Request outcomes observed before the error-rate EWMA can mark a node unhealthy */
  minErrorSamples: z.number().int().min(1).default(5),
  /** Consecutive successful heartbeats needed to return to healthy */
  recoveryStreak: z.number().int().min(1).default(3),
  /** Default concurrent requests per worker */
  capacity: z.number().int().min(1).default(8),
  /** Requests allowed to wait per worker once capacity is reached */
  queueLimit: z.number().int().min(0).default(32),
  heartbeatIntervalMs: z.number().int().min(10).default(5000),
  /** Transition records kept per worker */
  historyLimit: z.number().int().min(1).default(50),
  /** Local search replicas registered at start-up */
  localWorkers: z.number().int().min(1).max(64).default(2),
});

/**
 * Composite ranking configuration
 */
export const RankingConfigSchema = z.object({
  weights: z
    .object({
      similarity: z.number().min(0).default(0.7),
      filterMatch: z.number().min(0).default(0.2),
      usagePrior: z.number().min(0).default(0.1),
    })
    .default({}),
  /** usageCount at which the popularity prior reaches 0.5 */
  priorScale: z.number().gt(0).default(100),
  /** Vector candidates fetched per requested result */
  oversample: z.number().int().min(1).max(50).default(4),
});

/**
 * Query configuration
 */
export const QueryConfigSchema = z.object({
  defaultTopK: z.number().int().min(1).max(100).default(10),
  maxTopK: z.number().int().min(1).max(500).default(100),
  defaultTimeoutMs: z.number().int().min(1).default(2000),
  maxQueryLength: z.number().int().min(1).default(2000),
});

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  file: z.string().optional(),
  pretty: z.boolean().default(false),
});

/**
 * SQLite storage configuration
 *
 * Default location is cross-platform:
 * - macOS/Linux: ~/.partlens/parts.db
 * - Windows: %LOCALAPPDATA%\partlens\parts.db
 */
export const StorageConfigSchema = z.object({
  databasePath: z.string().default(getDefaultDatabasePath()),
});

/**
 * Complete partlens configuration schema
 */
export const PartlensConfigSchema = z.object({
  embedding: EmbeddingConfigSchema.default({}),
  index: IndexConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  router: RouterConfigSchema.default({}),
  ranking: RankingConfigSchema.default({}),
  query: QueryConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
});

/**
 * TypeScript types derived from schemas
 */
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type HnswConfig = z.infer<typeof HnswConfigSchema>;
export type IndexConfig = z.infer<typeof IndexConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type RouterWeights = z.infer<typeof RouterWeightsSchema>;
export type RouterConfig = z.infer<typeof RouterConfigSchema>;
export type RankingConfig = z.infer<typeof RankingConfigSchema>;
export type QueryConfig = z.infer<typeof QueryConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type PartlensConfig = z.infer<typeof PartlensConfigSchema>;

/**
 * Default configuration (all defaults applied)
 */
export const DEFAULT_CONFIG: PartlensConfig = PartlensConfigSchema.parse({});

/**
 * Validate and parse configuration object
 * @param config - Raw configuration object
 * @returns Validated and typed configuration
 * @throws ZodError if validation fails
 */
export function validateConfig(config: unknown): PartlensConfig {
  return PartlensConfigSchema.parse(config);
}

/**
 * Safe validation that returns result object instead of throwing
 */
export function safeValidateConfig(
  config: unknown
): z.SafeParseReturnType<unknown, PartlensConfig> {
  return PartlensConfigSchema.safeParse(config);
}
