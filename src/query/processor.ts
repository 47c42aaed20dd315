/**
 * Query processor for partlens
 *
 * Turns raw query text into a normalised, expanded query context:
 * - Unicode NFKC, lower-case, punctuation stripped, whitespace collapsed
 * - Stop-word removal (part identifiers are kept intact)
 * - Intent classification (exact_id / filter_heavy / informational)
 * - Synonym expansion from a versioned static lexicon
 *
 * `optimize()` is pure: the same text, filters and lexicon always give the
 * same context.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { hasFilters, type PartFilters } from '../parts/types.js';

/**
 * Closed set of query intents
 */
export type QueryIntent = 'exact_id' | 'filter_heavy' | 'informational';

/**
 * Processed query
 */
export interface QueryContext {
  raw: string;
  normalized: string;
  tokens: string[];
  expandedTerms: string[];
  intent: QueryIntent;
  lexiconVersion: string;
  /** Part identifiers found in the raw text, original case */
  partIds: string[];
  filters: PartFilters;
}

export const LexiconSchema = z.object({
  version: z.string().min(1),
  synonyms: z.record(z.string(), z.array(z.string().min(1))),
  vocabulary: z
    .object({
      types: z.array(z.string()).default([]),
      sources: z.array(z.string()).default([]),
    })
    .default({}),
  stopWords: z.array(z.string()).default([]),
});

export type LexiconData = z.infer<typeof LexiconSchema>;

/**
 * Lookup-ready lexicon
 */
export interface Lexicon {
  version: string;
  synonyms: ReadonlyMap<string, readonly string[]>;
  vocabulary: ReadonlySet<string>;
  stopWords: ReadonlySet<string>;
}

/** Registry-style identifiers such as BBa_J23100 or BBa_K1234567 */
const PART_ID_PATTERN = /\b[A-Za-z]{2,4}_[A-Za-z]{0,2}\d+[A-Za-z0-9]*\b/g;
const PART_ID_TOKEN = /^[a-z]{2,4}_[a-z]{0,2}\d+[a-z0-9]*$/;

const DEFAULT_LEXICON_URL = new URL('../../data/lexicon.json', import.meta.url);

export function buildLexicon(data: LexiconData): Lexicon {
  const synonyms = new Map<string, readonly string[]>();
  for (const [term, expansions] of Object.entries(data.synonyms)) {
    synonyms.set(term.toLowerCase(), expansions.map((e) => normalizeText(e)));
  }
  return {
    version: data.version,
    synonyms,
    vocabulary: new Set(
      [...data.vocabulary.types, ...data.vocabulary.sources].map((w) => w.toLowerCase())
    ),
    stopWords: new Set(data.stopWords.map((w) => w.toLowerCase())),
  };
}

/**
 * Load and validate a lexicon file
 */
export function loadLexicon(path: string | URL): Lexicon {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return buildLexicon(LexiconSchema.parse(raw));
}

let defaultLexicon: Lexicon | null = null;

/**
 * Bundled lexicon (data/lexicon.json), loaded once
 */
export function getDefaultLexicon(): Lexicon {
  defaultLexicon ??= loadLexicon(DEFAULT_LEXICON_URL);
  return defaultLexicon;
}

/**
 * NFKC, lower-case, punctuation to spaces, whitespace collapsed
 */
export function normalizeText(text: string): string {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function isPartIdToken(token: string): boolean {
  return PART_ID_TOKEN.test(token);
}

function extractPartIds(raw: string): string[] {
  const matches = raw.normalize('NFKC').match(PART_ID_PATTERN) ?? [];
  return [...new Set(matches)];
}

function classify(tokens: string[], partIds: string[], filters: PartFilters, lexicon: Lexicon): QueryIntent {
  if (tokens.length === 0) return 'filter_heavy';

  if (partIds.length > 0 && tokens.every(isPartIdToken)) {
    return 'exact_id';
  }

  if (hasFilters(filters) && tokens.length <= 1) {
    return 'filter_heavy';
  }

  if (tokens.every((token) => lexicon.vocabulary.has(token))) {
    return 'filter_heavy';
  }

  return 'informational';
}

function expand(tokens: string[], lexicon: Lexicon): string[] {
  const seen = new Set(tokens);
  const expanded: string[] = [];
  for (const token of tokens) {
    for (const term of lexicon.synonyms.get(token) ?? []) {
      if (seen.has(term)) continue;
      seen.add(term);
      expanded.push(term);
    }
  }
  return expanded;
}

/**
 * Normalise, tokenise, classify and expand a raw query
 */
export function optimize(
  rawQuery: string,
  filters: PartFilters = {},
  lexicon: Lexicon = getDefaultLexicon()
): QueryContext {
  const normalized = normalizeText(rawQuery);
  const tokens = [
    ...new Set(
      normalized
        .split(' ')
        .filter((word) => word.length >= 2 && (isPartIdToken(word) || !lexicon.stopWords.has(word)))
    ),
  ];
  const partIds = extractPartIds(rawQuery);

  return {
    raw: rawQuery,
    normalized,
    tokens,
    expandedTerms: expand(tokens, lexicon),
    intent: classify(tokens, partIds, filters, lexicon),
    lexiconVersion: lexicon.version,
    partIds,
    filters,
  };
}

/**
 * Text handed to the embedder: the normalised query followed by expansions
 */
export function embeddingText(context: QueryContext): string {
  return [context.normalized, ...context.expandedTerms].join(' ').trim();
}
