import { describe, it, expect } from 'vitest';
import { NO_RESULTS_CONTEXT, SYSTEM_PROMPT, buildContextBlock } from '../app/lib/rag/prompt';

describe('buildContextBlock()', () => {
  it('numbers sets in rank order with their description on the next line', () => {
    const block = buildContextBlock([
      {
        setId: '90001-1',
        name: 'Desert Skiff Patrol',
        theme: 'Star Wars',
        pieceCount: 212,
        price: 29.99,
        releaseYear: 1999,
        description: 'A small skiff with two pilots.',
      },
      { setId: '90006-1', name: 'Pneumatic Loader', theme: 'Technic', pieceCount: 820 },
    ]);

    expect(block).toBe(
      'Retrieved Sets (best match first):\n' +
        '1. 90001-1 "Desert Skiff Patrol" | Star Wars | 1999 | 212 pieces | $29.99\n' +
        '   A small skiff with two pilots.\n' +
        '2. 90006-1 "Pneumatic Loader" | Technic | year unknown | 820 pieces | price unknown',
    );
  });

  it('formats a zero price rather than treating it as unknown', () => {
    expect(buildContextBlock([{ setId: '1-1', name: 'Promo', theme: 'Misc', pieceCount: 5, price: 0 }])).toBe(
      'Retrieved Sets (best match first):\n1. 1-1 "Promo" | Misc | year unknown | 5 pieces | $0.00',
    );
  });

  it('says so when nothing was retrieved', () => {
    expect(buildContextBlock([])).toBe(NO_RESULTS_CONTEXT);
  });
});

describe('SYSTEM_PROMPT', () => {
  it('restricts answers to the retrieved list', () => {
    expect(SYSTEM_PROMPT).toContain('Only talk about sets from the Retrieved Sets list');
  });
});
