/**
 * app/lib/search/pipeline.ts
 *
 * analyze → expand → fan out to every candidate source → dedupe → rank.
 *
 * Candidate searches run in parallel and are isolated from each other: a
 * source that rejects for one query is logged and contributes nothing for
 * that query, the rest of the request carries on.
 */
import type { CandidateQueries, CandidateSource, ProcessOptions, SetRecord, Vocabulary } from '../types';
import { analyzeQuery, summarizeIntent } from './analyzer';
import { buildSearchQueries } from './expander';
import { rankResults } from './ranker';
import { DEFAULT_VOCABULARY } from './vocabulary';

export function buildCandidateQueries(
  rawText: string,
  vocabulary: Vocabulary = DEFAULT_VOCABULARY,
): CandidateQueries {
  const intent = analyzeQuery(rawText, vocabulary);
  const queries = buildSearchQueries(intent);
  console.debug(`[search] "${rawText}" → ${summarizeIntent(intent)} | ${queries.length} candidate queries`);
  return { intent, queries };
}

/** Merge result lists, keeping the first record seen for each setId. */
export function dedupeById(lists: ReadonlyArray<readonly SetRecord[]>): SetRecord[] {
  const seen = new Set<string>();
  const merged: SetRecord[] = [];
  for (const list of lists) {
    for (const record of list) {
      if (seen.has(record.setId)) continue;
      seen.add(record.setId);
      merged.push(record);
    }
  }
  return merged;
}

/**
 * Submit every query to every source concurrently and merge the results.
 * Result lists are merged in query order, then source order, so the
 * dedupe outcome does not depend on which request finished first.
 */
export async function collectCandidates(
  queries: readonly string[],
  sources: readonly CandidateSource[],
): Promise<SetRecord[]> {
  const jobs = queries.flatMap((query) => sources.map((source) => ({ query, source })));

  const results = await Promise.allSettled(jobs.map(({ query, source }) => source.search(query)));

  const lists: SetRecord[][] = [];
  for (let i = 0; i < results.length; i++) {
    const r = results[i];
    if (r.status === 'fulfilled') {
      lists.push(r.value);
    } else {
      const { query, source } = jobs[i];
      const message = r.reason instanceof Error ? r.reason.message : String(r.reason);
      console.warn(`✗ ${source.name} search for "${query}" failed: ${message}`);
      lists.push([]);
    }
  }

  return dedupeById(lists);
}

/** Full pipeline for one raw query. An empty query never reaches a source. */
export async function processAndRank(
  rawText: string,
  sources: readonly CandidateSource[],
  options: ProcessOptions & { vocabulary?: Vocabulary } = {},
): Promise<SetRecord[]> {
  const { intent, queries } = buildCandidateQueries(rawText, options.vocabulary);
  if (queries.length === 0) return [];

  const candidates = await collectCandidates(queries, sources);
  const ranked = rankResults(candidates, intent);
  return options.limit !== undefined ? ranked.slice(0, options.limit) : ranked;
}
