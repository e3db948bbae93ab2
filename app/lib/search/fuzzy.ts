/**
 * String similarity on a 0–100 scale.
 *
 * ratio() is the normalized indel similarity 200·LCS / (|a| + |b|).
 * partialRatio() scores the shorter string against every same-length window
 * of the longer one (including windows clipped at either end) and keeps the
 * best, so "starwrs" still scores well against "star wars".
 */

function lcsLength(a: string, b: string): number {
  if (!a.length || !b.length) return 0;
  const prev = new Array<number>(b.length + 1).fill(0);
  const curr = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i += 1) {
    curr[0] = 0;
    for (let j = 1; j <= b.length; j += 1) {
      curr[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], curr[j - 1]);
    }
    for (let j = 0; j <= b.length; j += 1) {
      prev[j] = curr[j];
    }
  }
  return prev[b.length];
}

export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return (200 * lcsLength(a, b)) / total;
}

export function partialRatio(a: string, b: string): number {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (!shorter.length) return 0;
  if (longer.includes(shorter)) return 100;

  const width = shorter.length;
  let best = 0;
  for (let start = 1 - width; start < longer.length; start += 1) {
    const window = longer.slice(Math.max(0, start), Math.min(longer.length, start + width));
    best = Math.max(best, ratio(shorter, window));
  }
  return best;
}

/**
 * Best-scoring choice for `query`, or undefined when `choices` is empty.
 * Ties go to the earlier choice.
 */
export function bestMatch<T extends string>(
  query: string,
  choices: readonly T[],
): { choice: T; score: number } | undefined {
  let best: { choice: T; score: number } | undefined;
  for (const choice of choices) {
    const score = partialRatio(query, choice);
    if (!best || score > best.score) best = { choice, score };
  }
  return best;
}
