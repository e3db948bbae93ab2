// Rebrickable: authoritative part counts. API v3, `Authorization: key …`.
// Sets carry only a theme id, resolved through /lego/themes/{id}/.
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { SetRecord } from '../types';
import { normalizeSetRecord } from '../utils/normalizer';
import { BaseProvider, createHttpClient, normalizeSetNumber } from './base';

const API_BASE = 'https://rebrickable.com/api/v3';
const SEARCH_PAGE_SIZE = 5;

const rebrickableSetSchema = z.object({
  set_num: z.string(),
  name: z.string(),
  year: z.number().optional(),
  theme_id: z.number(),
  num_parts: z.number(),
});

const themeSchema = z.object({ id: z.number(), name: z.string() });

const searchResponseSchema = z.object({
  count: z.number(),
  results: z.array(z.unknown()),
});

/**
 * Map one raw Rebrickable set plus its resolved theme name to a validated
 * record. Throws a ZodError on malformed input.
 */
export function mapRebrickableSet(raw: unknown, themeName: string): SetRecord {
  const set = rebrickableSetSchema.parse(raw);
  return normalizeSetRecord({
    setId: set.set_num,
    name: set.name,
    theme: themeName,
    pieceCount: set.num_parts,
    ...(set.year !== undefined && { releaseYear: set.year }),
  });
}

export class RebrickableProvider extends BaseProvider {
  readonly name = 'Rebrickable';
  private readonly themeNames = new Map<number, Promise<string>>();

  constructor(apiKey: string, http: AxiosInstance = createHttpClient(API_BASE, { Authorization: `key ${apiKey}` })) {
    super(http);
  }

  async searchSets(query: string): Promise<SetRecord[]> {
    const body = searchResponseSchema.parse(
      await this.request('/lego/sets/', { params: { search: query, page_size: SEARCH_PAGE_SIZE } }),
    );
    return Promise.all(body.results.map((raw) => this.toRecord(raw)));
  }

  async fetchSet(setId: string): Promise<SetRecord> {
    const raw = await this.request(`/lego/sets/${encodeURIComponent(normalizeSetNumber(setId))}/`);
    return this.toRecord(raw);
  }

  private async toRecord(raw: unknown): Promise<SetRecord> {
    const { theme_id } = rebrickableSetSchema.parse(raw);
    return mapRebrickableSet(raw, await this.themeName(theme_id));
  }

  /** Theme names are fetched once per id for the lifetime of the provider. */
  private themeName(themeId: number): Promise<string> {
    let pending = this.themeNames.get(themeId);
    if (!pending) {
      pending = this.request(`/lego/themes/${themeId}/`)
        .then((body) => themeSchema.parse(body).name)
        .catch((err: unknown) => {
          // Forget failures so a later call can retry.
          this.themeNames.delete(themeId);
          throw err;
        });
      this.themeNames.set(themeId, pending);
    }
    return pending;
  }
}
