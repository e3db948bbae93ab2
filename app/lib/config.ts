/**
 * Environment configuration.
 *
 * Scripts load `.env` through `dotenv/config` before calling loadConfig();
 * library code only ever sees the parsed AppConfig. Provider and model keys
 * are optional at load time: a missing provider key disables that provider,
 * a missing embedding/LLM key fails only when that client is first built.
 */
import { z } from 'zod';

export class ConfigError extends Error {
  constructor(readonly variables: string[], message?: string) {
    super(message ?? `Missing or invalid environment variables: ${variables.join(', ')}`);
    this.name = 'ConfigError';
  }
}

const optionalKey = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z.object({
  QDRANT_URL: z.string().url().default('http://localhost:6333'),
  QDRANT_COLLECTION: z.string().min(1).default('brick_sets'),
  HUGGINGFACE_API_KEY: optionalKey,
  OPENROUTER_API_KEY: optionalKey,
  LLM_MODEL: z.string().min(1).default('mistralai/mistral-7b-instruct'),
  BRICKSET_API_KEY: optionalKey,
  REBRICKABLE_API_KEY: optionalKey,
  BRICKOWL_API_KEY: optionalKey,
  CATALOG_DB_PATH: z.string().min(1).default('data/catalog.db'),
  SEARCH_RESULT_LIMIT: z.coerce.number().int().positive().default(8),
});

export type AppConfig = Readonly<z.infer<typeof envSchema>>;

/** Keys that loadConfig() accepts as absent. */
export type OptionalKey =
  | 'HUGGINGFACE_API_KEY'
  | 'OPENROUTER_API_KEY'
  | 'BRICKSET_API_KEY'
  | 'REBRICKABLE_API_KEY'
  | 'BRICKOWL_API_KEY';

/**
 * Parse `env` (defaults to process.env). Throws ConfigError naming every
 * offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const variables = result.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigError(variables);
  }
  return Object.freeze(result.data);
}

/** Return an optional key, or throw ConfigError when the caller needs it. */
export function requireKey(config: AppConfig, key: OptionalKey): string {
  const value = config[key];
  if (!value) throw new ConfigError([key], `${key} is not set in environment.`);
  return value;
}
