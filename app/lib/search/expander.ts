import type { QueryIntent } from '../types';

/**
 * Alternative search strings for one intent, in submission order:
 * the trimmed original query, the theme (and "{time} {theme}"), the set
 * number, then every keyword. Blank entries and exact duplicates are
 * dropped, first occurrence kept. An empty query with no signals yields [].
 */
export function buildSearchQueries(intent: QueryIntent): string[] {
  const queries: string[] = [intent.originalQuery];

  if (intent.theme) {
    queries.push(intent.theme);
    if (intent.timeModifier) {
      queries.push(`${intent.timeModifier} ${intent.theme}`);
    }
  }

  if (intent.setNumber) {
    queries.push(intent.setNumber);
  }

  queries.push(...intent.keywords);

  const seen = new Set<string>();
  const result: string[] = [];
  for (const query of queries) {
    const trimmed = query.trim();
    if (!trimmed || seen.has(trimmed)) continue;
    seen.add(trimmed);
    result.push(trimmed);
  }
  return result;
}
