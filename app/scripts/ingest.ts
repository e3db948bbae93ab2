/**
 * Ingest runner: reads data/sets.json (or the file given as the first
 * argument), validates every entry, stores it in the catalog database and,
 * when HUGGINGFACE_API_KEY is set, embeds it into Qdrant.
 *
 * Prerequisites for the semantic index:
 *   1. Qdrant running:  docker compose up -d
 *   2. .env set:        HUGGINGFACE_API_KEY, QDRANT_URL
 *
 * Usage:  npm run ingest [-- path/to/sets.json]
 */
import 'dotenv/config';
import * as path from 'path';
import { loadConfig } from '../lib/config';
import { CatalogStore } from '../lib/data/catalog-store';
import { readSetsFile } from '../lib/data/sets-file';
import { createSemanticIndex } from '../lib/container';

async function main(): Promise<void> {
  const config = loadConfig();
  const src = process.argv[2] ?? path.join(process.cwd(), 'data', 'sets.json');
  const records = readSetsFile(src);

  const store = await CatalogStore.open(config.CATALOG_DB_PATH);
  try {
    store.upsertMany(records);
    console.log(`✓ Stored ${records.length} sets in ${config.CATALOG_DB_PATH} (${store.count()} total).`);
  } finally {
    store.close();
  }

  const semanticIndex = createSemanticIndex(config);
  if (!semanticIndex) {
    console.warn('HUGGINGFACE_API_KEY not set; skipping the semantic index.');
    return;
  }
  await semanticIndex.index(records);
  console.log(`\n✓ Ingestion complete. ${records.length} sets in Qdrant collection "${config.QDRANT_COLLECTION}".`);
}

main().catch((err: unknown) => {
  console.error('Ingest failed:', err);
  process.exitCode = 1;
});
