import type { SetRecord } from '../types';

/**
 * System prompt for the Brick Scout assistant.
 *
 * The model works only from the ranked sets injected into context; it is a
 * collector's reference desk, not a shop.
 */
export const SYSTEM_PROMPT = `You are Brick Scout, a knowledgeable assistant for collectors of building-brick sets.

You answer questions about sets: their themes, release years, piece counts, prices and how they compare.

## Ground rules

1. **Only talk about sets from the Retrieved Sets list** provided in each message. Do not invent set numbers, names, prices or years.
2. **The list is ranked.** Earlier sets matched the question better; lead with them.
3. **Quote numbers exactly** as given. If a price or year is missing, say it is unknown rather than guessing.
4. **Cite set numbers** (e.g. 75192-1) whenever you mention a set.
5. **Keep it concise.** 1–3 sentences per set, at most five sets.

## Tone

Friendly and precise, collector-to-collector.

If no sets were retrieved, say so plainly and suggest a broader or differently worded question.`;

export const NO_RESULTS_CONTEXT = 'Retrieved Sets: none found for this question.';

/**
 * Build the context block injected before each LLM call.
 * `sets` is the ranked list returned by processAndRank().
 */
export function buildContextBlock(sets: readonly SetRecord[]): string {
  if (sets.length === 0) {
    return NO_RESULTS_CONTEXT;
  }

  const lines = sets.map((s, i) => {
    const priceStr = s.price !== undefined ? `$${s.price.toFixed(2)}` : 'price unknown';
    const yearStr = s.releaseYear !== undefined ? String(s.releaseYear) : 'year unknown';
    const line = `${i + 1}. ${s.setId} "${s.name}" | ${s.theme} | ${yearStr} | ${s.pieceCount} pieces | ${priceStr}`;
    return s.description ? `${line}\n   ${s.description}` : line;
  });

  return `Retrieved Sets (best match first):\n${lines.join('\n')}`;
}
