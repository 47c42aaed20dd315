import { describe, it, expect } from 'vitest';
import {
  SimilarityRanker,
  combine,
  filterMatchScore,
  matchesHardFilters,
  score,
  similarityFromDistance,
  usagePrior,
} from '../../../src/ranking/ranker.js';
import { RankingConfigSchema } from '../../../src/config/schema.js';
import { PartRecordSchema, type PartRecord } from '../../../src/parts/types.js';
import { SAMPLE_PARTS } from '../../fixtures/parts.js';

function fixture(id: string): PartRecord {
  const input = SAMPLE_PARTS.find((p) => p.id === id);
  if (input === undefined) throw new Error(`No fixture ${id}`);
  return PartRecordSchema.parse(input);
}

function plainPart(id: string, successRate: number): PartRecord {
  return PartRecordSchema.parse({ id, label: `Part ${id}`, typeHierarchy: { level1: 'Other' }, successRate });
}

describe('Similarity Ranker', () => {
  describe('score', () => {
    it('should return cosine similarity clamped to [0, 1]', () => {
      expect(score([1, 0], [2, 0])).toBeCloseTo(1, 10);
      expect(score([1, 0], [0, 1])).toBe(0);
      expect(score([1, 0], [-1, 0])).toBe(0);
      expect(score([1, 1], [1, 0])).toBeCloseTo(Math.SQRT1_2, 10);
    });

    it('should score zero vectors as 0', () => {
      expect(score([0, 0], [1, 0])).toBe(0);
    });

    it('should convert cosine distance to similarity', () => {
      expect(similarityFromDistance(0.25)).toBe(0.75);
      expect(similarityFromDistance(1.5)).toBe(0);
    });
  });

  describe('components', () => {
    it('should saturate the usage prior', () => {
      expect(usagePrior(0, 100)).toBe(0);
      expect(usagePrior(100, 100)).toBe(0.5);
      expect(usagePrior(300, 100)).toBe(0.75);
    });

    it('should weight the components', () => {
      const weights = RankingConfigSchema.parse({}).weights;
      expect(combine(1, 0.5, 0.5, weights)).toBeCloseTo(0.85, 10);
    });
  });

  describe('matchesHardFilters', () => {
    it('should match promoters by regulatory label', () => {
      expect(matchesHardFilters(fixture('BBa_J23100'), { types: ['promoter'] })).toBe(true);
      expect(matchesHardFilters(fixture('BBa_E0040'), { types: ['promoter'] })).toBe(false);
    });

    it('should require every filter to hold', () => {
      const cmv = fixture('SG_CMV');
      expect(matchesHardFilters(cmv, { sources: ['snapgene'], organism: 'h. sapiens' })).toBe(true);
      expect(matchesHardFilters(cmv, { sources: ['snapgene'], organism: 'E. coli' })).toBe(false);
      expect(matchesHardFilters(cmv, undefined)).toBe(true);
    });
  });

  describe('filterMatchScore', () => {
    it('should average filter components', () => {
      const match = filterMatchScore(fixture('BBa_J23100'), { types: ['promoter'], sources: ['igem'] }, []);

      expect(match.score).toBeCloseTo(0.9, 10);
      expect(match.matchedFields).toEqual(['label', 'sourceCollection']);
    });

    it('should fall back to token coverage without filters', () => {
      const match = filterMatchScore(fixture('BBa_E0040'), {}, ['gfp', 'coding', 'missing']);

      expect(match.score).toBeCloseTo(2 / 3, 10);
      expect(match.matchedFields).toEqual(['label', 'type']);
    });

    it('should score 0 with neither filters nor tokens', () => {
      expect(filterMatchScore(fixture('BBa_E0040'), {}, [])).toEqual({ score: 0, matchedFields: [] });
    });
  });

  describe('SimilarityRanker', () => {
    it('should compose the score from similarity, filter match and usage', () => {
      const ranker = new SimilarityRanker();
      const [ranked] = ranker.rank([{ part: fixture('BBa_E0040'), similarity: 0.8 }], {
        filters: { types: ['reporter'] },
        tokens: [],
      });

      expect(ranked?.similarity).toBe(0.8);
      expect(ranked?.filterMatch).toBe(0.8);
      expect(ranked?.usagePrior).toBeCloseTo(2 / 3, 10);
      expect(ranked?.score).toBeCloseTo(0.7 * 0.8 + 0.2 * 0.8 + 0.1 * (2 / 3), 10);
      expect(ranked?.matchedFields).toEqual(['type.level2']);
    });

    it('should order by score, then success rate, then id', () => {
      const ranker = new SimilarityRanker();
      const ranked = ranker.rank(
        [
          { part: plainPart('b', 0.5), similarity: 0.5 },
          { part: plainPart('a', 0.5), similarity: 0.5 },
          { part: plainPart('c', 0.9), similarity: 0.5 },
          { part: plainPart('d', 0), similarity: 0.9 },
        ],
        { filters: {}, tokens: [] }
      );

      expect(ranked.map((r) => r.part.id)).toEqual(['d', 'c', 'a', 'b']);
    });

    it('should clamp out-of-range similarity', () => {
      const ranker = new SimilarityRanker(RankingConfigSchema.parse({ weights: { similarity: 1, filterMatch: 0, usagePrior: 0 } }));
      const [ranked] = ranker.rank([{ part: plainPart('x', 0), similarity: 1.4 }], { filters: {}, tokens: [] });

      expect(ranked?.score).toBe(1);
    });
  });
});
