/**
 * Prints the intent and candidate queries for sample (or given) questions,
 * then ranks the local catalog against each. No network access needed.
 *
 * Usage:  npm run analyze [-- "some question"]
 */
import 'dotenv/config';
import { loadConfig } from '../lib/config';
import { CatalogStore } from '../lib/data/catalog-store';
import { createCandidateSources } from '../lib/rag/assistant';
import { buildCandidateQueries, collectCandidates } from '../lib/search/pipeline';
import { rankResults, scoreRecord } from '../lib/search/ranker';

const sampleQueries = [
  'oldest star wars sets',
  '75192',
  'biggest expensive technic',
  'cheap tiny city sets from 2008',
  'starwrs',
];

async function main(): Promise<void> {
  const config = loadConfig();
  const store = await CatalogStore.open(config.CATALOG_DB_PATH);
  const sources = createCandidateSources({ store });
  const queries = process.argv.length > 2 ? [process.argv.slice(2).join(' ')] : sampleQueries;

  try {
    for (const query of queries) {
      const { intent, queries: candidates } = buildCandidateQueries(query);
      console.log('\nQuery:', query);
      console.log('Intent:', JSON.stringify(intent, null, 2));
      console.log('Candidate queries:', candidates);

      const ranked = rankResults(await collectCandidates(candidates, sources), intent);
      console.log(`Local results: ${ranked.length}`);
      for (const record of ranked.slice(0, 5)) {
        console.log(`  [${scoreRecord(record, intent)}] ${record.setId} ${record.name} (${record.theme})`);
      }
    }
  } finally {
    store.close();
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error('Script failed:', message);
  process.exitCode = 1;
});
