import { describe, it, expect } from 'vitest';
import {
  buildLexicon,
  embeddingText,
  getDefaultLexicon,
  isPartIdToken,
  normalizeText,
  optimize,
} from '../../../src/query/processor.js';

const lexicon = buildLexicon({
  version: 'test-lexicon-1',
  synonyms: {
    GFP: ['Green Fluorescent Protein', 'reporter'],
    promoter: ['regulatory element'],
  },
  vocabulary: { types: ['Promoter', 'RBS'], sources: ['iGEM'] },
  stopWords: ['the', 'for', 'with'],
});

describe('Query Processor', () => {
  describe('normalizeText', () => {
    it('should lower-case, strip punctuation and collapse whitespace', () => {
      expect(normalizeText('  Strong   PROMOTER!! (E. coli) ')).toBe('strong promoter e coli');
    });

    it('should fold compatibility characters', () => {
      expect(normalizeText('ＧＦＰ')).toBe('gfp');
    });

    it('should keep underscores inside identifiers', () => {
      expect(normalizeText('BBa_J23100,')).toBe('bba_j23100');
    });
  });

  describe('isPartIdToken', () => {
    it('should recognise registry-style identifiers', () => {
      expect(isPartIdToken('bba_j23100')).toBe(true);
      expect(isPartIdToken('bba_k1234567')).toBe(true);
      expect(isPartIdToken('promoter')).toBe(false);
    });
  });

  describe('optimize', () => {
    it('should classify a bare identifier as an exact lookup', () => {
      const context = optimize('BBa_J23100', {}, lexicon);

      expect(context.intent).toBe('exact_id');
      expect(context.tokens).toEqual(['bba_j23100']);
      expect(context.partIds).toEqual(['BBa_J23100']);
    });

    it('should drop stop words and one-letter tokens', () => {
      const context = optimize('a promoter for the GFP', {}, lexicon);
      expect(context.tokens).toEqual(['promoter', 'gfp']);
    });

    it('should de-duplicate tokens', () => {
      expect(optimize('gfp GFP gfp', {}, lexicon).tokens).toEqual(['gfp']);
    });

    it('should treat an empty query as filter-heavy', () => {
      const context = optimize('   ', { types: ['promoter'] }, lexicon);

      expect(context.tokens).toEqual([]);
      expect(context.intent).toBe('filter_heavy');
    });

    it('should treat a single token with filters as filter-heavy', () => {
      expect(optimize('strong', { sources: ['igem'] }, lexicon).intent).toBe('filter_heavy');
    });

    it('should treat vocabulary-only queries as filter-heavy', () => {
      expect(optimize('iGEM promoter', {}, lexicon).intent).toBe('filter_heavy');
    });

    it('should classify descriptive queries as informational', () => {
      expect(optimize('strong promoter', { types: ['promoter'] }, lexicon).intent).toBe('informational');
    });

    it('should expand synonyms without repeating query terms', () => {
      const context = optimize('GFP reporter', {}, lexicon);

      expect(context.expandedTerms).toEqual(['green fluorescent protein']);
      expect(embeddingText(context)).toBe('gfp reporter green fluorescent protein');
      expect(context.lexiconVersion).toBe('test-lexicon-1');
    });

    it('should be deterministic', () => {
      expect(optimize('GFP promoter', { organism: 'E. coli' }, lexicon)).toEqual(
        optimize('GFP promoter', { organism: 'E. coli' }, lexicon)
      );
    });
  });

  describe('default lexicon', () => {
    it('should load the bundled lexicon', () => {
      const bundled = getDefaultLexicon();

      expect(bundled.version).toBe('parts-lexicon-1');
      expect(bundled.synonyms.get('gfp')).toEqual(['green fluorescent protein', 'fluorescent reporter']);
      expect(bundled.stopWords.has('the')).toBe(true);
    });
  });
});
