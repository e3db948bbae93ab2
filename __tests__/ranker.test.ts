/**
 * __tests__/ranker.test.ts
 *
 * Scoring rules and ordering guarantees of app/lib/search/ranker.ts.
 */

import { describe, it, expect } from 'vitest';
import { analyzeQuery } from '../app/lib/search/analyzer';
import { rankResults, scoreRecord, scoreResults } from '../app/lib/search/ranker';
import type { QueryIntent, SetRecord } from '../app/lib/types';

function intentOf(fields: Partial<QueryIntent>): QueryIntent {
  return { originalQuery: '', keywords: [], ...fields };
}

function set(setId: string, fields: Partial<SetRecord> = {}): SetRecord {
  return { setId, name: `Set ${setId}`, theme: 'Misc', pieceCount: 500, ...fields };
}

// ────────────────────────────────────────────────────────────────────────────
// scoreRecord()
// ────────────────────────────────────────────────────────────────────────────

describe('scoreRecord()', () => {
  it('is 0 for an intent with no signals', () => {
    expect(scoreRecord(set('1'), intentOf({}))).toBe(0);
  });

  it('adds 10 when the record theme contains the intent theme, ignoring case', () => {
    const intent = intentOf({ theme: 'star wars' });
    expect(scoreRecord(set('1', { theme: 'Star Wars' }), intent)).toBe(10);
    expect(scoreRecord(set('2', { theme: 'Star Wars Collector Series' }), intent)).toBe(10);
    expect(scoreRecord(set('3', { theme: 'Space' }), intent)).toBe(0);
  });

  describe('time', () => {
    it('oldest rewards releases strictly before 2000', () => {
      const intent = intentOf({ timeModifier: 'oldest' });
      expect(scoreRecord(set('1', { releaseYear: 1999 }), intent)).toBe(5);
      expect(scoreRecord(set('2', { releaseYear: 2000 }), intent)).toBe(0);
      expect(scoreRecord(set('3'), intent)).toBe(0);
    });

    it('newest rewards releases strictly after 2010', () => {
      const intent = intentOf({ timeModifier: 'newest' });
      expect(scoreRecord(set('1', { releaseYear: 2011 }), intent)).toBe(5);
      expect(scoreRecord(set('2', { releaseYear: 2010 }), intent)).toBe(0);
    });

    it('vintage and modern carry no weight', () => {
      expect(scoreRecord(set('1', { releaseYear: 1980 }), intentOf({ timeModifier: 'vintage' }))).toBe(0);
      expect(scoreRecord(set('2', { releaseYear: 2020 }), intentOf({ timeModifier: 'modern' }))).toBe(0);
    });
  });

  describe('size', () => {
    it('largest rewards piece counts strictly above 1000', () => {
      const intent = intentOf({ sizeModifier: 'largest' });
      expect(scoreRecord(set('1', { pieceCount: 1001 }), intent)).toBe(3);
      expect(scoreRecord(set('2', { pieceCount: 1000 }), intent)).toBe(0);
    });

    it('smallest rewards piece counts strictly below 100, including 0', () => {
      const intent = intentOf({ sizeModifier: 'smallest' });
      expect(scoreRecord(set('1', { pieceCount: 99 }), intent)).toBe(3);
      expect(scoreRecord(set('2', { pieceCount: 100 }), intent)).toBe(0);
      expect(scoreRecord(set('3', { pieceCount: 0 }), intent)).toBe(3);
    });

    it('medium carries no weight', () => {
      expect(scoreRecord(set('1', { pieceCount: 500 }), intentOf({ sizeModifier: 'medium' }))).toBe(0);
    });
  });

  describe('price', () => {
    it('expensive rewards prices strictly above 100', () => {
      const intent = intentOf({ priceModifier: 'expensive' });
      expect(scoreRecord(set('1', { price: 100.01 }), intent)).toBe(3);
      expect(scoreRecord(set('2', { price: 100 }), intent)).toBe(0);
    });

    it('cheap rewards prices strictly below 50, including 0', () => {
      const intent = intentOf({ priceModifier: 'cheap' });
      expect(scoreRecord(set('1', { price: 49.99 }), intent)).toBe(3);
      expect(scoreRecord(set('2', { price: 50 }), intent)).toBe(0);
      expect(scoreRecord(set('3', { price: 0 }), intent)).toBe(3);
    });

    it('an unknown price never scores', () => {
      expect(scoreRecord(set('1'), intentOf({ priceModifier: 'cheap' }))).toBe(0);
      expect(scoreRecord(set('2'), intentOf({ priceModifier: 'expensive' }))).toBe(0);
    });
  });

  it('adds 2 per keyword in the name and 1 per keyword in the description', () => {
    const record = set('1', { name: 'Castle Keep', description: 'A castle with a keep and a moat.' });
    expect(scoreRecord(record, intentOf({ keywords: ['castle', 'keep'] }))).toBe(6);
    expect(scoreRecord(record, intentOf({ keywords: ['moat'] }))).toBe(1);
  });

  it('counts a repeated keyword once per occurrence in the intent', () => {
    const record = set('1', { name: 'Castle Keep' });
    expect(scoreRecord(record, intentOf({ keywords: ['castle', 'castle'] }))).toBe(4);
  });

  it('adds every signal independently', () => {
    const intent = intentOf({
      theme: 'technic',
      timeModifier: 'newest',
      sizeModifier: 'largest',
      priceModifier: 'expensive',
      keywords: ['crane'],
    });
    const record = set('1', {
      name: 'Mobile Crane',
      theme: 'Technic',
      pieceCount: 2500,
      price: 299.99,
      releaseYear: 2019,
      description: 'A crane with a working boom.',
    });
    expect(scoreRecord(record, intent)).toBe(10 + 5 + 3 + 3 + 2 + 1);
  });
});

// ────────────────────────────────────────────────────────────────────────────
// rankResults()
// ────────────────────────────────────────────────────────────────────────────

describe('rankResults()', () => {
  const intent = analyzeQuery('oldest star wars sets');
  const skiff = set('90001-1', { name: 'Desert Skiff', theme: 'Star Wars', pieceCount: 212, releaseYear: 1999 });
  const cruiser = set('90002-1', { name: 'Orbital Command Cruiser', theme: 'Star Wars', pieceCount: 4120, releaseYear: 2017 });
  const catcher = set('90003-1', { name: 'Star Catcher', theme: 'City', pieceCount: 300, releaseYear: 1995 });
  const unrelated = set('90004-1', { name: 'Street Sweeper', theme: 'City', pieceCount: 64, releaseYear: 2008 });

  it('orders by descending score', () => {
    // skiff 15, cruiser 10, catcher 5 + 2, unrelated 0
    expect(rankResults([unrelated, catcher, cruiser, skiff], intent).map((r) => r.setId)).toEqual([
      '90001-1',
      '90002-1',
      '90003-1',
      '90004-1',
    ]);
  });

  it('returns a permutation of its input', () => {
    const input = [catcher, unrelated, skiff, cruiser];
    const ranked = rankResults(input, intent);
    expect(ranked).toHaveLength(input.length);
    expect([...ranked].sort((a, b) => a.setId.localeCompare(b.setId))).toEqual(
      [...input].sort((a, b) => a.setId.localeCompare(b.setId)),
    );
  });

  it('keeps input order among equal scores', () => {
    const a = set('a');
    const b = set('b');
    const c = set('c');
    expect(rankResults([c, a, b], intentOf({ keywords: ['zzz'] })).map((r) => r.setId)).toEqual(['c', 'a', 'b']);
  });

  it('does not modify the input array', () => {
    const input = [unrelated, skiff];
    rankResults(input, intent);
    expect(input).toEqual([unrelated, skiff]);
  });

  it('ranks a set of the analyzed theme at least 10 points up', () => {
    const themed = set('t', { theme: 'Ninjago' });
    const score = scoreRecord(themed, analyzeQuery('ninjago'));
    expect(score).toBeGreaterThanOrEqual(10);
  });

  it('returns [] for no records', () => {
    expect(rankResults([], intent)).toEqual([]);
  });
});

describe('scoreResults()', () => {
  it('pairs each record with its score in input order', () => {
    const intent = intentOf({ sizeModifier: 'smallest' });
    const small = set('s', { pieceCount: 40 });
    const big = set('b', { pieceCount: 4000 });
    expect(scoreResults([big, small], intent)).toEqual([
      { record: big, score: 0 },
      { record: small, score: 3 },
    ]);
  });
});
