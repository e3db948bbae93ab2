/**
 * Additive relevance scoring for candidate sets.
 *
 * Every signal is evaluated independently, so one set can collect theme,
 * era, size, price and keyword points at once. The thresholds are fixed
 * policy values, not derived from the catalog.
 */
import type { QueryIntent, SetRecord } from '../types';

export const RANKING_THRESHOLDS = {
  /** "oldest" rewards sets released before this year. */
  oldestBeforeYear: 2000,
  /** "newest" rewards sets released after this year. */
  newestAfterYear: 2010,
  /** "largest" rewards piece counts above this. */
  largestAbovePieces: 1000,
  /** "smallest" rewards piece counts below this. */
  smallestBelowPieces: 100,
  /** "expensive" rewards prices above this (USD). */
  expensiveAbovePrice: 100,
  /** "cheap" rewards prices below this (USD). */
  cheapBelowPrice: 50,
} as const;

export const RANKING_WEIGHTS = {
  theme: 10,
  time: 5,
  size: 3,
  price: 3,
  keywordInName: 2,
  keywordInDescription: 1,
} as const;

export interface ScoredSet {
  record: SetRecord;
  score: number;
}

function timeScore(record: SetRecord, intent: QueryIntent): number {
  if (record.releaseYear === undefined) return 0;
  if (intent.timeModifier === 'oldest' && record.releaseYear < RANKING_THRESHOLDS.oldestBeforeYear) {
    return RANKING_WEIGHTS.time;
  }
  if (intent.timeModifier === 'newest' && record.releaseYear > RANKING_THRESHOLDS.newestAfterYear) {
    return RANKING_WEIGHTS.time;
  }
  return 0;
}

function sizeScore(record: SetRecord, intent: QueryIntent): number {
  if (intent.sizeModifier === 'largest' && record.pieceCount > RANKING_THRESHOLDS.largestAbovePieces) {
    return RANKING_WEIGHTS.size;
  }
  if (intent.sizeModifier === 'smallest' && record.pieceCount < RANKING_THRESHOLDS.smallestBelowPieces) {
    return RANKING_WEIGHTS.size;
  }
  return 0;
}

function priceScore(record: SetRecord, intent: QueryIntent): number {
  if (record.price === undefined) return 0;
  if (intent.priceModifier === 'expensive' && record.price > RANKING_THRESHOLDS.expensiveAbovePrice) {
    return RANKING_WEIGHTS.price;
  }
  if (intent.priceModifier === 'cheap' && record.price < RANKING_THRESHOLDS.cheapBelowPrice) {
    return RANKING_WEIGHTS.price;
  }
  return 0;
}

function keywordScore(record: SetRecord, intent: QueryIntent): number {
  const name = record.name.toLowerCase();
  const description = record.description?.toLowerCase();
  let score = 0;
  for (const keyword of intent.keywords) {
    const k = keyword.toLowerCase();
    if (name.includes(k)) score += RANKING_WEIGHTS.keywordInName;
    if (description !== undefined && description.includes(k)) score += RANKING_WEIGHTS.keywordInDescription;
  }
  return score;
}

/** Relevance of one set to one intent. 0 when nothing matches. */
export function scoreRecord(record: SetRecord, intent: QueryIntent): number {
  let score = 0;
  if (intent.theme && record.theme.toLowerCase().includes(intent.theme.toLowerCase())) {
    score += RANKING_WEIGHTS.theme;
  }
  score += timeScore(record, intent);
  score += sizeScore(record, intent);
  score += priceScore(record, intent);
  score += keywordScore(record, intent);
  return score;
}

/** Score every record without reordering. */
export function scoreResults(records: readonly SetRecord[], intent: QueryIntent): ScoredSet[] {
  return records.map((record) => ({ record, score: scoreRecord(record, intent) }));
}

/**
 * Records ordered by descending score. Equal scores keep their input order;
 * the input array is left untouched.
 */
export function rankResults(records: readonly SetRecord[], intent: QueryIntent): SetRecord[] {
  return scoreResults(records, intent)
    .map((entry, index) => ({ ...entry, index }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map((entry) => entry.record);
}
