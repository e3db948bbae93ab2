// Brickset: descriptive catalog data (name, theme, year, pieces, US RRP,
// description). API v3: GET /api/v3.asmx/getSets with a JSON `params` string.
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { SetRecord } from '../types';
import { normalizeSetRecord } from '../utils/normalizer';
import { BaseProvider, ProviderRequestError, createHttpClient, normalizeSetNumber, stripHtml } from './base';

const API_BASE = 'https://brickset.com/api/v3.asmx';
const SEARCH_PAGE_SIZE = 5;

const bricksetSetSchema = z.object({
  setID: z.number(),
  number: z.string(),
  numberVariant: z.number().default(1),
  name: z.string(),
  year: z.number().optional(),
  theme: z.string(),
  pieces: z.number().nullish(),
  LEGOCom: z
    .object({ US: z.object({ retailPrice: z.number().nullish() }).partial().optional() })
    .partial()
    .optional(),
  extendedData: z.object({ description: z.string().nullish() }).partial().optional(),
});

const getSetsResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  matches: z.number().optional(),
  sets: z.array(z.unknown()).default([]),
});

/**
 * Map one raw Brickset set to a validated record. Throws a ZodError when
 * the payload is malformed or the resulting record is invalid.
 */
export function mapBricksetSet(raw: unknown): SetRecord {
  const set = bricksetSetSchema.parse(raw);
  const description = set.extendedData?.description ? stripHtml(set.extendedData.description) : '';
  const price = set.LEGOCom?.US?.retailPrice;

  return normalizeSetRecord({
    setId: `${set.number}-${set.numberVariant}`,
    name: set.name,
    theme: set.theme,
    pieceCount: set.pieces ?? 0,
    ...(price != null && { price }),
    ...(set.year !== undefined && { releaseYear: set.year }),
    ...(description ? { description } : {}),
  });
}

export class BricksetProvider extends BaseProvider {
  readonly name = 'Brickset';

  constructor(
    private readonly apiKey: string,
    http: AxiosInstance = createHttpClient(API_BASE),
  ) {
    super(http);
  }

  async searchSets(query: string): Promise<SetRecord[]> {
    const sets = await this.getSets({ query, pageSize: SEARCH_PAGE_SIZE, extendedData: 1 });
    return sets.map(mapBricksetSet);
  }

  async fetchSet(setId: string): Promise<SetRecord> {
    const setNumber = normalizeSetNumber(setId);
    const [first] = await this.getSets({ setNumber, extendedData: 1 });
    if (first === undefined) {
      throw new ProviderRequestError(this.name, `set ${setNumber} not found`, 404);
    }
    return mapBricksetSet(first);
  }

  private async getSets(params: Record<string, string | number>): Promise<unknown[]> {
    const body = await this.request('/getSets', {
      params: { apiKey: this.apiKey, userHash: '', params: JSON.stringify(params) },
    });
    const parsed = getSetsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderRequestError(this.name, 'unexpected getSets response shape', undefined, {
        cause: parsed.error,
      });
    }
    if (parsed.data.status !== 'success') {
      throw new ProviderRequestError(this.name, parsed.data.message ?? `status "${parsed.data.status}"`);
    }
    return parsed.data.sets;
  }
}
