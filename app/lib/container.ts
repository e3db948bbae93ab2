/**
 * Container: builds the store, semantic index, remote providers and chat
 * model from configuration.
 */
import { QdrantClient } from '@qdrant/js-client-rest';
import type { LanguageModel } from 'ai';
import { requireKey, type AppConfig } from './config';
import { CatalogStore } from './data/catalog-store';
import { BrickOwlProvider } from './providers/brickowl';
import { BricksetProvider } from './providers/brickset';
import { CatalogAggregator } from './providers/catalog';
import { RebrickableProvider } from './providers/rebrickable';
import { createChatModel, createCandidateSources, SetAssistant } from './rag/assistant';
import { createEmbedder } from './rag/embed';
import { SemanticIndex } from './rag/semantic-index';
import type { CandidateSource } from './types';

export interface Container {
  config: AppConfig;
  store: CatalogStore;
  semanticIndex: SemanticIndex | null;
  catalog: CatalogAggregator;
  sources: CandidateSource[];
}

/** Semantic index, or null when no HuggingFace key is configured. */
export function createSemanticIndex(config: AppConfig): SemanticIndex | null {
  if (!config.HUGGINGFACE_API_KEY) return null;
  return new SemanticIndex(
    new QdrantClient({ url: config.QDRANT_URL }),
    createEmbedder(config.HUGGINGFACE_API_KEY),
    config.QDRANT_COLLECTION,
  );
}

/** Providers whose API key is set; the rest are skipped with a notice. */
export function createCatalog(config: AppConfig): CatalogAggregator {
  const skipped: string[] = [];
  const pick = <T>(key: string | undefined, name: string, build: (k: string) => T): T | undefined => {
    if (key) return build(key);
    skipped.push(name);
    return undefined;
  };

  const catalog = new CatalogAggregator({
    brickset: pick(config.BRICKSET_API_KEY, 'Brickset', (k) => new BricksetProvider(k)),
    rebrickable: pick(config.REBRICKABLE_API_KEY, 'Rebrickable', (k) => new RebrickableProvider(k)),
    brickowl: pick(config.BRICKOWL_API_KEY, 'BrickOwl', (k) => new BrickOwlProvider(k)),
  });
  if (skipped.length > 0) {
    console.warn(`Remote providers disabled (no API key): ${skipped.join(', ')}`);
  }
  return catalog;
}

export async function createContainer(config: AppConfig): Promise<Container> {
  const store = await CatalogStore.open(config.CATALOG_DB_PATH);
  const semanticIndex = createSemanticIndex(config);
  if (!semanticIndex) {
    console.warn('HUGGINGFACE_API_KEY not set; semantic search disabled.');
  }
  const catalog = createCatalog(config);
  const sources = createCandidateSources({ store, semanticIndex: semanticIndex ?? undefined, catalog });
  return { config, store, semanticIndex, catalog, sources };
}

/** Assistant over a container. Requires OPENROUTER_API_KEY. */
export function createAssistant(container: Container, model?: LanguageModel): SetAssistant {
  const { config, store, catalog, sources } = container;
  return new SetAssistant({
    sources,
    model: model ?? createChatModel(requireKey(config, 'OPENROUTER_API_KEY'), config.LLM_MODEL),
    limit: config.SEARCH_RESULT_LIMIT,
    store,
    catalog,
  });
}
