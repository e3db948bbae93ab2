/**
 * __tests__/analyzer.test.ts
 *
 * Unit tests for query understanding (app/lib/search/analyzer.ts).
 * Pure functions only: no store, no network.
 */

import { describe, it, expect } from 'vitest';
import {
  analyzeQuery,
  extractKeywords,
  extractPriceModifier,
  extractSetNumber,
  extractSizeModifier,
  extractTheme,
  extractTimeModifier,
  extractYear,
  summarizeIntent,
} from '../app/lib/search/analyzer';
import { freezeVocabulary } from '../app/lib/search/vocabulary';

// ────────────────────────────────────────────────────────────────────────────
// Integration: analyzeQuery()
// ────────────────────────────────────────────────────────────────────────────

describe('analyzeQuery()', () => {
  it('"oldest star wars sets" yields theme, time modifier and keywords without "sets"', () => {
    const intent = analyzeQuery('oldest star wars sets');

    expect(intent.originalQuery).toBe('oldest star wars sets');
    expect(intent.theme).toBe('star wars');
    expect(intent.timeModifier).toBe('oldest');
    expect(intent.sizeModifier).toBeUndefined();
    expect(intent.priceModifier).toBeUndefined();
    expect(intent.year).toBeUndefined();
    expect(intent.setNumber).toBeUndefined();
    expect(intent.keywords).toEqual(['oldest', 'star', 'wars']);
  });

  it('"75192" is a set number, not a year, and stays a numeric keyword', () => {
    const intent = analyzeQuery('75192');

    expect(intent.setNumber).toBe('75192');
    expect(intent.year).toBeUndefined();
    expect(intent.theme).toBeUndefined();
    expect(intent.keywords).toEqual(['75192']);
  });

  it('digits glued to a non-ASCII letter stay inside their keyword', () => {
    const intent = analyzeQuery('café2024 starwrs');

    expect(intent.year).toBeUndefined();
    expect(intent.setNumber).toBeUndefined();
    expect(intent.keywords).toEqual(['café2024', 'starwrs']);
  });

  it('empty input yields an intent with no signals', () => {
    const intent = analyzeQuery('');

    expect(intent).toEqual({ originalQuery: '', keywords: [] });
  });

  it('extracts every modifier family from one query', () => {
    const intent = analyzeQuery('cheap tiny city sets from 2008');

    expect(intent.theme).toBe('city');
    expect(intent.sizeModifier).toBe('smallest');
    expect(intent.priceModifier).toBe('cheap');
    expect(intent.year).toBe(2008);
    expect(intent.keywords).toEqual(['cheap', 'tiny', 'city', 'from', '2008']);
  });

  it('reports a four-digit year as both year and set number', () => {
    const intent = analyzeQuery('Show me 2024 sets');

    expect(intent.year).toBe(2024);
    expect(intent.setNumber).toBe('2024');
  });

  it('is deterministic and returns a frozen intent', () => {
    const a = analyzeQuery('biggest expensive technic');
    const b = analyzeQuery('biggest expensive technic');

    expect(a).toEqual(b);
    expect(Object.isFrozen(a)).toBe(true);
    expect(Object.isFrozen(a.keywords)).toBe(true);
  });

  it('uses an injected vocabulary instead of the defaults', () => {
    const vocabulary = freezeVocabulary({
      themes: [['space', ['space', 'galaxy']]],
      time: [['oldest', ['ancient']]],
      size: [],
      price: [],
    });

    const intent = analyzeQuery('ancient galaxy cruiser', vocabulary);

    expect(intent.theme).toBe('space');
    expect(intent.timeModifier).toBe('oldest');
  });
});

// ────────────────────────────────────────────────────────────────────────────
// Unit: individual helper functions
// ────────────────────────────────────────────────────────────────────────────

describe('extractTheme()', () => {
  it('matches an alias case-insensitively', () => {
    expect(extractTheme('Vintage BATMAN')).toBe('dc');
  });
  it('first theme in table order wins when several aliases match', () => {
    // "city" (second entry) and "technic" (third entry) both occur.
    expect(extractTheme('technic city crane')).toBe('city');
  });
  it('matches short aliases inside longer words', () => {
    expect(extractTheme('sword fight')).toBe('star wars');
  });
  it('falls back to fuzzy matching for misspellings', () => {
    expect(extractTheme('starwrs')).toBe('star wars');
  });
  it('returns undefined when nothing clears the fuzzy threshold', () => {
    expect(extractTheme('bricks')).toBeUndefined();
    expect(extractTheme('pirate ship')).toBeUndefined();
  });
  it('returns undefined for empty input', () => {
    expect(extractTheme('')).toBeUndefined();
  });
});

describe('extractTimeModifier()', () => {
  it('maps "first" to oldest', () => {
    expect(extractTimeModifier('the first ninjago sets')).toBe('oldest');
  });
  it('maps "latest" to newest', () => {
    expect(extractTimeModifier('latest releases')).toBe('newest');
  });
  it('maps "retro" to vintage', () => {
    expect(extractTimeModifier('retro space')).toBe('vintage');
  });
  it('maps "new" to modern', () => {
    expect(extractTimeModifier('new ninjago dragon')).toBe('modern');
  });
  it('returns undefined for unrelated text', () => {
    expect(extractTimeModifier('pirate ship')).toBeUndefined();
  });
});

describe('extractSizeModifier()', () => {
  it('maps "biggest" to largest', () => {
    expect(extractSizeModifier('biggest castle')).toBe('largest');
  });
  it('maps "mini" to smallest', () => {
    expect(extractSizeModifier('mini builds')).toBe('smallest');
  });
  it('maps "average" to medium', () => {
    expect(extractSizeModifier('average sized')).toBe('medium');
  });
  it('returns undefined for unrelated text', () => {
    expect(extractSizeModifier('pirate ship')).toBeUndefined();
  });
});

describe('extractPriceModifier()', () => {
  it('maps "high price" to expensive', () => {
    expect(extractPriceModifier('high price collector sets')).toBe('expensive');
  });
  it('maps "affordable" to cheap', () => {
    expect(extractPriceModifier('affordable gifts')).toBe('cheap');
  });
  it('maps "no cost" to free', () => {
    expect(extractPriceModifier('no cost promo')).toBe('free');
  });
  it('"inexpensive" resolves to expensive because that entry is checked first', () => {
    expect(extractPriceModifier('inexpensive')).toBe('expensive');
  });
});

describe('extractYear()', () => {
  it('returns the first standalone year', () => {
    expect(extractYear('sets from 1999 or 2005')).toBe(1999);
  });
  it('ignores years embedded in longer digit runs', () => {
    expect(extractYear('75192')).toBeUndefined();
  });
  it('ignores years outside 1900–2099', () => {
    expect(extractYear('the 1850 edition')).toBeUndefined();
  });
  it('ignores digits glued to a non-ASCII letter', () => {
    expect(extractYear('café2024')).toBeUndefined();
    expect(extractYear('café 2024')).toBe(2024);
  });
});

describe('extractSetNumber()', () => {
  it('keeps leading zeros', () => {
    expect(extractSetNumber('set 00123')).toBe('00123');
  });
  it('ignores runs shorter than three or longer than six digits', () => {
    expect(extractSetNumber('42 and 1234567')).toBeUndefined();
  });
  it('returns the first match', () => {
    expect(extractSetNumber('10497 or 75192')).toBe('10497');
  });
  it('ignores digits glued to a non-ASCII letter', () => {
    expect(extractSetNumber('ß75192')).toBeUndefined();
    expect(extractSetNumber('75192ñ 10497')).toBe('10497');
  });
});

describe('extractKeywords()', () => {
  it('drops stop words and short tokens but keeps duplicates in order', () => {
    expect(extractKeywords('The LEGO castle of the castle by me')).toEqual(['castle', 'castle']);
  });
  it('returns [] when only stop words remain', () => {
    expect(extractKeywords('The LEGO set of sets')).toEqual([]);
  });
  it('splits on punctuation', () => {
    expect(extractKeywords('castle,dragon!knight')).toEqual(['castle', 'dragon', 'knight']);
  });
});

describe('summarizeIntent()', () => {
  it('lists populated fields', () => {
    expect(summarizeIntent(analyzeQuery('oldest star wars sets'))).toBe(
      'theme=star wars time=oldest keywords=oldest,star,wars',
    );
  });
  it('marks an empty intent', () => {
    expect(summarizeIntent(analyzeQuery(''))).toBe('(no signals)');
  });
});
