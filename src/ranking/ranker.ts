/**
 * Similarity ranker for partlens
 *
 * Composite score = wSim * similarity + wFilter * filterMatch + wPrior * usagePrior,
 * ordered by score desc, then success rate desc, then id asc.
 */

import { RankingConfigSchema, type RankingConfig } from '../config/schema.js';
import type { PartFilters, PartRecord } from '../parts/types.js';
import { normalizeText } from '../query/processor.js';
import { dot, magnitude } from '../vector/math.js';

export type RankingWeights = RankingConfig['weights'];

export interface FilterMatch {
  score: number;
  matchedFields: string[];
}

export interface RankCandidate {
  part: PartRecord;
  similarity: number;
}

export interface RankedPart {
  part: PartRecord;
  score: number;
  similarity: number;
  filterMatch: number;
  usagePrior: number;
  matchedFields: string[];
}

export interface RankContext {
  filters: PartFilters;
  tokens: string[];
}

/** Type-filter score by the most specific hierarchy level that matched */
const LEVEL_SPECIFICITY = { level3: 1, level2: 0.8, level1: 0.6 } as const;

function clamp01(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return value >= 1 ? 1 : value;
}

/**
 * Cosine similarity clamped to [0, 1]; zero vectors score 0
 */
export function score(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const denominator = magnitude(a) * magnitude(b);
  if (denominator === 0) return 0;
  return clamp01(dot(a, b) / denominator);
}

export function similarityFromDistance(distance: number): number {
  return clamp01(1 - distance);
}

export function combine(
  similarity: number,
  filterMatch: number,
  usagePrior: number,
  weights: RankingWeights
): number {
  return (
    weights.similarity * similarity + weights.filterMatch * filterMatch + weights.usagePrior * usagePrior
  );
}

/**
 * Popularity prior in [0, 1): count / (count + scale)
 */
export function usagePrior(usageCount: number, scale: number): number {
  if (usageCount <= 0) return 0;
  return usageCount / (usageCount + scale);
}

function isPromoterByLabel(part: PartRecord): boolean {
  return (
    part.typeHierarchy.level2?.toLowerCase() === 'regulatory' &&
    part.label.toLowerCase().includes('promoter')
  );
}

/**
 * Hard filter check, the in-memory twin of the storage WHERE clause
 */
export function matchesHardFilters(part: PartRecord, filters: PartFilters | undefined): boolean {
  if (filters === undefined) return true;

  const types = (filters.types ?? []).map((t) => t.toLowerCase());
  if (types.length > 0) {
    const levels = [part.typeHierarchy.level1, part.typeHierarchy.level2, part.typeHierarchy.level3]
      .filter((level): level is string => level !== undefined)
      .map((level) => level.toLowerCase());
    const typeMatch =
      levels.some((level) => types.includes(level)) ||
      (types.includes('promoter') && isPromoterByLabel(part));
    if (!typeMatch) return false;
  }

  const sources = filters.sources ?? [];
  if (sources.length > 0 && !sources.includes(part.sourceCollection)) {
    return false;
  }

  if (filters.organism !== undefined) {
    if (part.metadata.organism?.toLowerCase() !== filters.organism.toLowerCase()) {
      return false;
    }
  }

  return true;
}

function typeSpecificity(part: PartRecord, types: string[]): { score: number; field: string } | null {
  const { level1, level2, level3 } = part.typeHierarchy;
  if (level3 !== undefined && types.includes(level3.toLowerCase())) {
    return { score: LEVEL_SPECIFICITY.level3, field: 'type.level3' };
  }
  if (level2 !== undefined && types.includes(level2.toLowerCase())) {
    return { score: LEVEL_SPECIFICITY.level2, field: 'type.level2' };
  }
  if (types.includes('promoter') && isPromoterByLabel(part)) {
    return { score: LEVEL_SPECIFICITY.level2, field: 'label' };
  }
  if (types.includes(level1.toLowerCase())) {
    return { score: LEVEL_SPECIFICITY.level1, field: 'type.level1' };
  }
  return null;
}

function words(text: string | undefined): Set<string> {
  if (text === undefined) return new Set();
  return new Set(normalizeText(text).split(' '));
}

/**
 * How well a part matches the requested filters or, without filters, the query tokens
 */
export function filterMatchScore(part: PartRecord, filters: PartFilters, tokens: string[]): FilterMatch {
  const matchedFields: string[] = [];
  const components: number[] = [];

  const types = (filters.types ?? []).map((t) => t.toLowerCase());
  if (types.length > 0) {
    const match = typeSpecificity(part, types);
    components.push(match?.score ?? 0);
    if (match !== null) matchedFields.push(match.field);
  }

  const sources = filters.sources ?? [];
  if (sources.length > 0) {
    const hit = sources.includes(part.sourceCollection);
    components.push(hit ? 1 : 0);
    if (hit) matchedFields.push('sourceCollection');
  }

  if (filters.organism !== undefined) {
    const hit = part.metadata.organism?.toLowerCase() === filters.organism.toLowerCase();
    components.push(hit ? 1 : 0);
    if (hit) matchedFields.push('organism');
  }

  // token coverage over label and type fields
  const fieldWords: Array<[string, Set<string>]> = [
    ['id', new Set([part.id.toLowerCase()])],
    ['label', words(part.label)],
    ['type', words([part.typeHierarchy.level1, part.typeHierarchy.level2, part.typeHierarchy.level3].join(' '))],
  ];
  let covered = 0;
  for (const token of tokens) {
    let found = false;
    for (const [field, set] of fieldWords) {
      if (!set.has(token)) continue;
      found = true;
      if (!matchedFields.includes(field)) matchedFields.push(field);
    }
    if (found) covered++;
  }

  const score =
    components.length > 0
      ? components.reduce((sum, value) => sum + value, 0) / components.length
      : tokens.length > 0
        ? covered / tokens.length
        : 0;

  return { score: clamp01(score), matchedFields };
}

/**
 * Composite desc, then success rate desc, then id asc
 */
export function compareRanked(a: RankedPart, b: RankedPart): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.part.successRate !== b.part.successRate) return b.part.successRate - a.part.successRate;
  if (a.part.id === b.part.id) return 0;
  return a.part.id < b.part.id ? -1 : 1;
}

/**
 * Similarity ranker
 */
export class SimilarityRanker {
  private readonly config: RankingConfig;

  constructor(config?: RankingConfig) {
    this.config = config ?? RankingConfigSchema.parse({});
  }

  get weights(): RankingWeights {
    return this.config.weights;
  }

  rankOne(candidate: RankCandidate, context: RankContext): RankedPart {
    const similarity = clamp01(candidate.similarity);
    const match = filterMatchScore(candidate.part, context.filters, context.tokens);
    const prior = usagePrior(candidate.part.usageCount, this.config.priorScale);
    return {
      part: candidate.part,
      score: combine(similarity, match.score, prior, this.config.weights),
      similarity,
      filterMatch: match.score,
      usagePrior: prior,
      matchedFields: match.matchedFields,
    };
  }

  /**
   * Score and order candidates
   */
  rank(candidates: RankCandidate[], context: RankContext): RankedPart[] {
    return candidates.map((candidate) => this.rankOne(candidate, context)).sort(compareRanked);
  }
}
