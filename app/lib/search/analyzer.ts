/**
 * app/lib/search/analyzer.ts
 *
 * Query understanding for the Brick Scout search pipeline.
 *
 * analyzeQuery() decomposes a free-text question into a QueryIntent. Each
 * helper is independently unit-testable and returns `undefined` on no
 * match; none of them throws, whatever the input.
 */
import type {
  PriceModifier,
  QueryIntent,
  SizeModifier,
  TimeModifier,
  Vocabulary,
} from '../types';
import { bestMatch } from './fuzzy';
import { DEFAULT_VOCABULARY, canonicalNames, matchAlias } from './vocabulary';

// Minimum partialRatio() (0–100, exclusive) a canonical theme name needs
// when no alias matched literally.
export const THEME_FUZZY_THRESHOLD = 70;

// Whole-token years 1900–2099 and set numbers of 3–6 digits. A token such as
// "2024" satisfies both and is reported as both. Token boundaries count
// non-ASCII letters, so "café2024" holds neither.
const YEAR_PATTERN = /(?<![\p{L}\p{N}_])(?:19|20)\d{2}(?![\p{L}\p{N}_])/u;
const SET_NUMBER_PATTERN = /(?<![\p{L}\p{N}_])\d{3,6}(?![\p{L}\p{N}_])/u;
const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

export const STOP_WORDS: ReadonlySet<string> = new Set([
  'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'of', 'with', 'by',
  'set', 'sets', 'lego',
]);

/**
 * Canonical theme for `query`: literal alias match first (table order), then
 * the best fuzzy match against the canonical names when it clears
 * THEME_FUZZY_THRESHOLD.
 */
export function extractTheme(query: string, vocabulary: Vocabulary = DEFAULT_VOCABULARY): string | undefined {
  const q = query.toLowerCase();
  const literal = matchAlias(vocabulary.themes, q);
  if (literal !== undefined) return literal;

  const fuzzy = bestMatch(q, canonicalNames(vocabulary.themes));
  return fuzzy && fuzzy.score > THEME_FUZZY_THRESHOLD ? fuzzy.choice : undefined;
}

export function extractTimeModifier(
  query: string,
  vocabulary: Vocabulary = DEFAULT_VOCABULARY,
): TimeModifier | undefined {
  return matchAlias(vocabulary.time, query.toLowerCase());
}

export function extractSizeModifier(
  query: string,
  vocabulary: Vocabulary = DEFAULT_VOCABULARY,
): SizeModifier | undefined {
  return matchAlias(vocabulary.size, query.toLowerCase());
}

export function extractPriceModifier(
  query: string,
  vocabulary: Vocabulary = DEFAULT_VOCABULARY,
): PriceModifier | undefined {
  return matchAlias(vocabulary.price, query.toLowerCase());
}

/** First standalone four-digit year, e.g. "sets from 1999" → 1999. */
export function extractYear(query: string): number | undefined {
  const match = query.match(YEAR_PATTERN);
  return match ? parseInt(match[0], 10) : undefined;
}

/** First standalone run of 3–6 digits, returned verbatim ("00123" stays "00123"). */
export function extractSetNumber(query: string): string | undefined {
  const match = query.match(SET_NUMBER_PATTERN);
  return match ? match[0] : undefined;
}

/**
 * Lower-cased word tokens longer than two characters that are not stop
 * words, in first-seen order. Purely numeric tokens are kept.
 */
export function extractKeywords(query: string): string[] {
  const words = query.toLowerCase().match(WORD_PATTERN) ?? [];
  return words.filter((word) => word.length > 2 && !STOP_WORDS.has(word));
}

// ── Main export ──────────────────────────────────────────────────────────────

/** Parse a free-text query into a frozen QueryIntent. */
export function analyzeQuery(query: string, vocabulary: Vocabulary = DEFAULT_VOCABULARY): QueryIntent {
  const theme = extractTheme(query, vocabulary);
  const timeModifier = extractTimeModifier(query, vocabulary);
  const sizeModifier = extractSizeModifier(query, vocabulary);
  const priceModifier = extractPriceModifier(query, vocabulary);
  const year = extractYear(query);
  const setNumber = extractSetNumber(query);
  const keywords = Object.freeze(extractKeywords(query));

  const intent: QueryIntent = {
    originalQuery: query,
    ...(theme !== undefined && { theme }),
    ...(timeModifier !== undefined && { timeModifier }),
    ...(sizeModifier !== undefined && { sizeModifier }),
    ...(priceModifier !== undefined && { priceModifier }),
    ...(year !== undefined && { year }),
    ...(setNumber !== undefined && { setNumber }),
    keywords,
  };

  return Object.freeze(intent);
}

/** Human-readable breakdown of an intent, one `field=value` pair per signal. */
export function summarizeIntent(intent: QueryIntent): string {
  const fields: Array<[string, string | number | undefined]> = [
    ['theme', intent.theme],
    ['time', intent.timeModifier],
    ['size', intent.sizeModifier],
    ['price', intent.priceModifier],
    ['year', intent.year],
    ['set', intent.setNumber],
  ];
  const parts = fields
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([key, value]) => `${key}=${value}`);
  if (intent.keywords.length > 0) parts.push(`keywords=${intent.keywords.join(',')}`);
  return parts.length > 0 ? parts.join(' ') : '(no signals)';
}
