import { createOpenAI } from '@ai-sdk/openai';
import { generateText, type CoreMessage, type LanguageModel } from 'ai';
import type { CatalogStore } from '../data/catalog-store';
import { normalizeSetNumber } from '../providers/base';
import type { CatalogAggregator } from '../providers/catalog';
import { processAndRank } from '../search/pipeline';
import type { AssistantResponse, CandidateSource, ChatMessage, SetRecord } from '../types';
import { SYSTEM_PROMPT, buildContextBlock } from './prompt';
import type { SemanticIndex } from './semantic-index';

const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

/** OpenRouter through the OpenAI-compatible provider. */
export function createChatModel(apiKey: string, modelId: string): LanguageModel {
  const openrouter = createOpenAI({ baseURL: OPENROUTER_BASE_URL, apiKey });
  return openrouter(modelId);
}

export interface SourceBackends {
  store?: CatalogStore;
  semanticIndex?: SemanticIndex;
  catalog?: CatalogAggregator;
}

/**
 * Wrap each configured backend as a CandidateSource for the search
 * pipeline. Backends left undefined are simply not searched.
 */
export function createCandidateSources({ store, semanticIndex, catalog }: SourceBackends): CandidateSource[] {
  const sources: CandidateSource[] = [];
  if (store) {
    sources.push({ name: 'catalog-db', search: async (query) => store.searchByText(query) });
  }
  if (semanticIndex) {
    sources.push({ name: 'semantic', search: (query) => semanticIndex.semanticSearch(query) });
  }
  if (catalog && !catalog.isEmpty) {
    sources.push({ name: 'remote-catalog', search: (query) => catalog.searchSets(query) });
  }
  return sources;
}

export interface SetAssistantOptions {
  sources: readonly CandidateSource[];
  model: LanguageModel;
  /** Maximum ranked sets placed in the prompt and returned. */
  limit: number;
  store?: CatalogStore;
  catalog?: CatalogAggregator;
  temperature?: number;
}

/**
 * Question answering over the ranked search pipeline: retrieve and rank
 * sets, then let the model describe them.
 */
export class SetAssistant {
  constructor(private readonly options: SetAssistantOptions) {}

  /** Earlier turns in `history` are passed through; system turns are dropped. */
  async ask(query: string, history: readonly ChatMessage[] = []): Promise<AssistantResponse> {
    const { sources, model, limit, temperature = 0.7 } = this.options;
    const sets = await processAndRank(query, sources, { limit });

    const messages: CoreMessage[] = [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'system', content: buildContextBlock(sets) },
      ...history.flatMap((m): CoreMessage[] => {
        if (m.role === 'user') return [{ role: 'user', content: m.content }];
        if (m.role === 'assistant') return [{ role: 'assistant', content: m.content }];
        return [];
      }),
      { role: 'user', content: query },
    ];

    const { text } = await generateText({ model, messages, temperature });
    return { sets, answer: text };
  }

  lookup(setId: string): Promise<SetRecord | undefined> {
    return lookupSet(setId, this.options);
  }
}

/**
 * Detail lookup for one set: the local store first, then the remote
 * catalog. Undefined when the store misses and no remote provider is
 * configured; a remote miss rejects with ProviderRequestError.
 */
export async function lookupSet(
  setId: string,
  { store, catalog }: Pick<SourceBackends, 'store' | 'catalog'>,
): Promise<SetRecord | undefined> {
  const local = store?.findById(normalizeSetNumber(setId));
  if (local) return local;
  if (!catalog || catalog.isEmpty) return undefined;
  return catalog.fetchSet(setId);
}
