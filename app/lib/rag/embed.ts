import { HfInference } from '@huggingface/inference';

const MODEL = 'sentence-transformers/all-MiniLM-L6-v2';
/** MiniLM produces 384-dimensional vectors. */
export const VECTOR_SIZE = 384;
const MAX_ATTEMPTS = 4;
const BASE_DELAY_MS = 1000;

export type EmbedFn = (text: string) => Promise<number[]>;

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((n) => typeof n === 'number');
}

/** The Inference API answers 503 while a cold model is loading. */
function isModelLoading(err: unknown): boolean {
  const message = err instanceof Error ? err.message : String(err);
  return message.includes('loading') || message.includes('503');
}

/** A single string input yields number[]; some deployments wrap it as number[][]. */
function toVector(result: unknown): number[] {
  if (isNumberArray(result)) return result;
  if (Array.isArray(result) && isNumberArray(result[0])) return result[0];
  throw new Error(`Unexpected embedding shape: ${JSON.stringify(result).slice(0, 80)}`);
}

/**
 * Embedding function for set descriptions and queries, backed by the
 * HuggingFace Inference API. While the model is loading the call is retried
 * with exponential back-off starting at `baseDelayMs`; any other failure
 * rejects straight away.
 */
export function createEmbedder(token: string, baseDelayMs: number = BASE_DELAY_MS): EmbedFn {
  const client = new HfInference(token);

  return async (text) => {
    for (let attempt = 1; ; attempt++) {
      try {
        return toVector(await client.featureExtraction({ model: MODEL, inputs: text }));
      } catch (err: unknown) {
        if (!isModelLoading(err) || attempt >= MAX_ATTEMPTS) throw err;
        const delay = baseDelayMs * 2 ** (attempt - 1);
        console.warn(`Embedding model loading (attempt ${attempt}/${MAX_ATTEMPTS}); retrying in ${delay}ms`);
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  };
}
