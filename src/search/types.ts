/**
 * Search types for partlens
 */

import { z } from 'zod';
import { PartFiltersSchema, type SourceCollection } from '../parts/types.js';
import type { QueryContext, QueryIntent } from '../query/processor.js';
import type { HeartbeatMetrics } from '../router/types.js';

/**
 * Search request as accepted from callers
 */
export const SearchRequestSchema = z.object({
  queryText: z.string().default(''),
  filters: PartFiltersSchema.default({}),
  topK: z.number().int().min(1).optional(),
  timeoutMs: z.number().int().min(1).optional(),
});

export type SearchRequest = z.input<typeof SearchRequestSchema>;

/**
 * One ranked search hit
 */
export interface SearchResultItem {
  id: string;
  score: number;
  similarity: number;
  matchedFields: string[];
  label: string;
  type: string;
  sourceCollection: SourceCollection;
  description: string;
}

export type SearchWarningCode = 'STALE_INDEX' | 'PARTIAL_RESULTS';

export interface SearchWarning {
  code: SearchWarningCode;
  message: string;
}

export interface SearchMeta {
  cached: boolean;
  workerId: string | undefined;
  latencyMs: number;
  snapshotVersion: number;
  intent: QueryIntent;
  lexiconVersion: string;
  normalizedQuery: string;
  expandedTerms: string[];
}

/**
 * Result of a search. Expected failures are values, not exceptions.
 */
export type SearchOutcome =
  | { status: 'ok'; results: SearchResultItem[]; warnings: SearchWarning[]; meta: SearchMeta }
  | { status: 'timeout'; results: SearchResultItem[]; warnings: SearchWarning[]; elapsedMs: number }
  | { status: 'overload'; message: string; warnings: SearchWarning[] }
  | { status: 'no_available_worker'; message: string; warnings: SearchWarning[] }
  | { status: 'invalid_request'; message: string; issues: string[]; warnings: SearchWarning[] }
  | { status: 'error'; code: string; message: string; warnings: SearchWarning[] };

export type SearchStatus = SearchOutcome['status'];

/**
 * Work handed to a backend
 */
export interface BackendRequest {
  context: QueryContext;
  topK: number;
  signal: AbortSignal;
  /** Throws once the request is aborted or past its deadline */
  checkpoint: () => void;
}

export interface BackendResult {
  results: SearchResultItem[];
  snapshotVersion: number;
  /** Part ids the result set depends on, for cache invalidation */
  recordIds: string[];
  /** Fewer results than requested because filters excluded candidates */
  partial: boolean;
}

/**
 * A search worker reachable through the router
 */
export interface SearchBackend {
  readonly id: string;
  execute(request: BackendRequest): Promise<BackendResult>;
  ping(signal: AbortSignal): Promise<HeartbeatMetrics>;
}

export interface IndexStats {
  count: number;
  avgQueryLatency: number;
  cacheHitRate: number;
  snapshotVersion: number;
  modelVersion: string;
  stale: boolean;
  graphSize: number;
  tailSize: number;
  snapshotCreatedAt: number;
}

/**
 * Abort reason used when a search exceeds its deadline
 */
export class DeadlineExceededError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Search exceeded its ${timeoutMs}ms deadline`);
    this.name = 'DeadlineExceededError';
  }
}
