// BrickOwl: marketplace pricing. Bearer-token auth; set lookups by set
// number, free-text search over the catalog.
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { SetRecord } from '../types';
import { normalizeSetRecord } from '../utils/normalizer';
import { BaseProvider, createHttpClient, normalizeSetNumber } from './base';

const API_BASE = 'https://api.brickowl.com/v1';

const brickOwlSetSchema = z.object({
  set_id: z.string(),
  name: z.string(),
  theme: z.string().nullish(),
  piece_count: z.number().nullish(),
  year: z.number().nullish(),
  retail_price: z.union([z.number(), z.string()]).nullish(),
});

const searchResponseSchema = z.object({ results: z.array(z.unknown()) });

/** BrickOwl sends prices as numbers or decimal strings ("199.99"). */
function parsePrice(value: number | string | null | undefined): number | undefined {
  if (value === null || value === undefined || value === '') return undefined;
  const n = typeof value === 'number' ? value : parseFloat(value.replace(/[^\d.]/g, ''));
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Map one raw BrickOwl catalog entry to a validated record. BrickOwl is
 * used for its price; a missing theme becomes "Unknown" and is expected to
 * be overridden when merged with Brickset data.
 */
export function mapBrickOwlSet(raw: unknown): SetRecord {
  const set = brickOwlSetSchema.parse(raw);
  const price = parsePrice(set.retail_price);
  return normalizeSetRecord({
    setId: normalizeSetNumber(set.set_id),
    name: set.name,
    theme: set.theme?.trim() || 'Unknown',
    pieceCount: set.piece_count ?? 0,
    ...(price !== undefined && { price }),
    ...(set.year != null && { releaseYear: set.year }),
  });
}

export class BrickOwlProvider extends BaseProvider {
  readonly name = 'BrickOwl';

  constructor(apiKey: string, http: AxiosInstance = createHttpClient(API_BASE, { Authorization: `Bearer ${apiKey}` })) {
    super(http);
  }

  async searchSets(query: string): Promise<SetRecord[]> {
    const body = searchResponseSchema.parse(
      await this.request('/catalog/search', { params: { query, type: 'Set' } }),
    );
    return body.results.map(mapBrickOwlSet);
  }

  async fetchSet(setId: string): Promise<SetRecord> {
    const raw = await this.request('/catalog/get_set', { params: { set_id: normalizeSetNumber(setId) } });
    return mapBrickOwlSet(raw);
  }
}
