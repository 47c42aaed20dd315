/**
 * In-process search backend
 *
 * Executes a processed query against the shared index snapshot:
 * embed → k-NN with oversampling → load parts → hard filters → rank → top-k.
 * Passes a checkpoint between stages so a search past its deadline stops early.
 */

import type { EmbeddingProvider } from '../embeddings/types.js';
import { formatPartType } from '../parts/types.js';
import { embeddingText, type QueryContext } from '../query/processor.js';
import {
  compareRanked,
  matchesHardFilters,
  similarityFromDistance,
  type RankCandidate,
  type RankContext,
  type RankedPart,
  type SimilarityRanker,
} from '../ranking/ranker.js';
import type { HeartbeatMetrics } from '../router/types.js';
import type { PartStorage } from '../storage/parts.js';
import type { VectorIndexEngine } from '../vector/engine.js';
import type { BackendRequest, BackendResult, SearchBackend, SearchResultItem } from './types.js';

export interface LocalSearchBackendOptions {
  id: string;
  engine: VectorIndexEngine;
  storage: PartStorage;
  embedder: EmbeddingProvider;
  ranker: SimilarityRanker;
  /** Vector candidates fetched per requested result */
  oversample: number;
}

/** Growth factor of the candidate pool when filters leave too few hits */
const WIDEN_FACTOR = 4;

export function toResultItem(ranked: RankedPart): SearchResultItem {
  return {
    id: ranked.part.id,
    score: ranked.score,
    similarity: ranked.similarity,
    matchedFields: ranked.matchedFields,
    label: ranked.part.label,
    type: formatPartType(ranked.part.typeHierarchy),
    sourceCollection: ranked.part.sourceCollection,
    description: ranked.part.description,
  };
}

export class LocalSearchBackend implements SearchBackend {
  readonly id: string;

  constructor(private readonly options: LocalSearchBackendOptions) {
    this.id = options.id;
  }

  async execute(request: BackendRequest): Promise<BackendResult> {
    const { context, topK, checkpoint } = request;
    checkpoint();

    const snapshotVersion = this.options.engine.getSnapshot().version;
    const rankContext: RankContext = { filters: context.filters, tokens: context.tokens };
    const pinned = this.pinnedParts(context, rankContext);

    let ranked: RankedPart[] = [];
    let partial = false;

    if (context.intent === 'exact_id' && pinned.length > 0) {
      ranked = [];
    } else if (context.normalized === '') {
      const page = this.options.storage.listParts(context.filters, {
        limit: topK * this.options.oversample,
        orderBy: 'usage',
      });
      ranked = this.options.ranker.rank(
        page.parts.map((part) => ({ part, similarity: 0 })),
        rankContext
      );
    } else {
      const vector = await this.options.embedder.embed(embeddingText(context));
      checkpoint();
      const found = this.vectorCandidates(vector, topK, rankContext, checkpoint);
      ranked = found.ranked;
      partial = found.partial;
    }

    checkpoint();
    const pinnedIds = new Set(pinned.map((r) => r.part.id));
    const merged = [...pinned, ...ranked.filter((r) => !pinnedIds.has(r.part.id))].slice(0, topK);

    return {
      results: merged.map(toResultItem),
      snapshotVersion,
      recordIds: merged.map((r) => r.part.id),
      partial,
    };
  }

  async ping(signal: AbortSignal): Promise<HeartbeatMetrics> {
    signal.throwIfAborted();
    const ok = this.options.embedder.isReady() && !this.options.storage.isClosed();
    return ok ? { ok } : { ok, error: 'embedder or storage unavailable' };
  }

  /**
   * Parts named by id in the query, ranked ahead of semantic hits
   */
  private pinnedParts(context: QueryContext, rankContext: RankContext): RankedPart[] {
    if (context.partIds.length === 0) return [];

    const parts = this.options.storage.getParts(context.partIds);
    const pinned: RankedPart[] = [];
    for (const id of context.partIds) {
      const part = parts.get(id);
      if (part === undefined || !matchesHardFilters(part, context.filters)) continue;
      pinned.push(this.options.ranker.rankOne({ part, similarity: 1 }, rankContext));
    }
    return pinned.sort(compareRanked);
  }

  private vectorCandidates(
    vector: number[],
    topK: number,
    rankContext: RankContext,
    checkpoint: () => void
  ): { ranked: RankedPart[]; partial: boolean } {
    const { engine, storage, ranker } = this.options;
    let k = Math.min(engine.size, topK * this.options.oversample);

    for (;;) {
      const hits = engine.query(vector, k);
      const parts = storage.getParts(hits.map((hit) => hit.id));
      const candidates: RankCandidate[] = [];
      let filteredOut = 0;

      for (const hit of hits) {
        const part = parts.get(hit.id);
        if (part === undefined) continue;
        if (!matchesHardFilters(part, rankContext.filters)) {
          filteredOut++;
          continue;
        }
        candidates.push({ part, similarity: similarityFromDistance(hit.distance) });
      }

      if (candidates.length >= topK || k >= engine.size) {
        return {
          ranked: ranker.rank(candidates, rankContext),
          partial: candidates.length < topK && filteredOut > 0,
        };
      }

      checkpoint();
      k = Math.min(engine.size, k * WIDEN_FACTOR);
    }
  }
}
