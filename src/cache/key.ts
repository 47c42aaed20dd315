/**
 * Cache key derivation for search result sets
 */

import { createHash } from 'node:crypto';
import type { PartFilters } from '../parts/types.js';

export interface CacheKeyInput {
  normalized: string;
  filters: PartFilters;
  topK: number;
  modelVersion: string;
  lexiconVersion?: string;
}

/**
 * sha256 of a canonical signature; filter arrays are lower-cased, deduplicated and sorted
 */
export function makeCacheKey(input: CacheKeyInput): string {
  const canonicalList = (values: string[] | undefined): string[] =>
    [...new Set((values ?? []).map((v) => v.toLowerCase()))].sort();

  const signature = JSON.stringify({
    q: input.normalized,
    types: canonicalList(input.filters.types),
    sources: canonicalList(input.filters.sources),
    organism: input.filters.organism?.toLowerCase() ?? null,
    k: input.topK,
    model: input.modelVersion,
    lexicon: input.lexiconVersion ?? null,
  });

  return createHash('sha256').update(signature).digest('hex');
}
