/**
 * Unified view over the remote catalog providers.
 *
 * fetchSet() asks every configured provider in parallel and merges their
 * answers: descriptive fields from Brickset, part count from Rebrickable,
 * price from BrickOwl. A provider that fails only loses its own fields.
 */
import type { CatalogProvider, SetDetails, SetRecord } from '../types';
import { withDetails } from '../utils/normalizer';
import { ProviderRequestError, normalizeSetNumber } from './base';

/** Number of search hits expanded into full merged records. */
const SEARCH_DETAIL_LIMIT = 5;

export interface CatalogProviders {
  brickset?: CatalogProvider;
  rebrickable?: CatalogProvider;
  brickowl?: CatalogProvider;
}

export class CatalogAggregator implements CatalogProvider {
  readonly name = 'catalog';

  constructor(private readonly providers: CatalogProviders) {}

  /** Providers in merge-priority order (descriptive data first). */
  private get ordered(): CatalogProvider[] {
    const { brickset, rebrickable, brickowl } = this.providers;
    return [brickset, rebrickable, brickowl].filter((p): p is CatalogProvider => p !== undefined);
  }

  get isEmpty(): boolean {
    return this.ordered.length === 0;
  }

  async fetchSet(setId: string): Promise<SetRecord> {
    const setNumber = normalizeSetNumber(setId);
    const providers = this.ordered;
    const results = await Promise.allSettled(providers.map((p) => p.fetchSet(setNumber)));

    const found = new Map<CatalogProvider, SetRecord>();
    const failures: unknown[] = [];
    results.forEach((r, i) => {
      if (r.status === 'fulfilled') {
        found.set(providers[i], r.value);
      } else {
        failures.push(r.reason);
        const message = r.reason instanceof Error ? r.reason.message : String(r.reason);
        console.warn(`✗ ${providers[i].name} lookup for ${setNumber} failed: ${message}`);
      }
    });

    const base = providers.map((p) => found.get(p)).find((r): r is SetRecord => r !== undefined);
    if (!base) {
      throw new ProviderRequestError(this.name, `set ${setNumber} not available from any provider`, undefined, {
        cause: failures[0],
      });
    }

    const details: SetDetails = {};
    const fromRebrickable = this.providers.rebrickable && found.get(this.providers.rebrickable);
    if (fromRebrickable && fromRebrickable.pieceCount > 0) details.pieceCount = fromRebrickable.pieceCount;
    const fromBrickOwl = this.providers.brickowl && found.get(this.providers.brickowl);
    if (fromBrickOwl?.price !== undefined) details.price = fromBrickOwl.price;

    return withDetails(base, { ...details, setId: setNumber });
  }

  /**
   * Search with the first configured provider, then expand the top hits
   * into merged records. A hit whose expansion fails is returned as found.
   */
  async searchSets(query: string): Promise<SetRecord[]> {
    const [primary] = this.ordered;
    if (!primary) return [];

    const hits = (await primary.searchSets(query)).slice(0, SEARCH_DETAIL_LIMIT);
    const merged = await Promise.allSettled(hits.map((hit) => this.fetchSet(hit.setId)));
    return merged.map((r, i) => (r.status === 'fulfilled' ? r.value : hits[i]));
  }
}
