import { QdrantClient } from '@qdrant/js-client-rest';
import { createHash } from 'crypto';
import type { SetRecord } from '../types';
import { describeSetRecord, tryNormalizeSetRecord } from '../utils/normalizer';
import { VECTOR_SIZE, type EmbedFn } from './embed';

// Batch in groups of 50 to stay within Qdrant's payload limit
const BATCH = 50;
const DEFAULT_LIMIT = 5;

// Type alias: Qdrant payloads need an implicit index signature.
export type SetPayload = {
  set_id: string;
  name: string;
  theme: string;
  piece_count: number;
  price: number | null;
  release_year: number | null;
  description: string | null;
};

export function toPayload(record: SetRecord): SetPayload {
  return {
    set_id: record.setId,
    name: record.name,
    theme: record.theme,
    piece_count: record.pieceCount,
    price: record.price ?? null,
    release_year: record.releaseYear ?? null,
    description: record.description ?? null,
  };
}

/**
 * Map a Qdrant payload back to a validated record. Returns undefined when
 * the payload is missing or no longer satisfies the record schema.
 */
export function payloadToRecord(payload: Record<string, unknown> | null | undefined): SetRecord | undefined {
  if (!payload) return undefined;
  const optional = (value: unknown) => (value === null ? undefined : value);
  return tryNormalizeSetRecord({
    setId: payload.set_id,
    name: payload.name,
    theme: payload.theme,
    pieceCount: payload.piece_count,
    price: optional(payload.price),
    releaseYear: optional(payload.release_year),
    description: optional(payload.description),
  });
}

/**
 * Qdrant point ids must be unsigned integers or UUIDs; derive a stable UUID
 * from the set id so re-ingesting a set overwrites its point.
 */
export function pointId(setId: string): string {
  const hex = createHash('sha1').update(setId).digest('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}

/** Text embedded for a set: its description when present, else a summary line. */
export function embeddingText(record: SetRecord): string {
  return record.description?.trim() || describeSetRecord(record);
}

/** Nearest-neighbour search over embedded set descriptions. */
export class SemanticIndex {
  constructor(
    private readonly client: QdrantClient,
    private readonly embed: EmbedFn,
    private readonly collection: string,
  ) {}

  /** Create the collection and its payload indexes unless it already exists. */
  async ensureCollection(): Promise<void> {
    const collections = await this.client.getCollections();
    const exists = collections.collections.some((c) => c.name === this.collection);
    if (exists) {
      console.log(`Collection "${this.collection}" already exists.`);
      return;
    }

    await this.client.createCollection(this.collection, {
      vectors: { size: VECTOR_SIZE, distance: 'Cosine' },
    });

    await Promise.all([
      this.client.createPayloadIndex(this.collection, { field_name: 'theme', field_schema: 'keyword' }),
      this.client.createPayloadIndex(this.collection, { field_name: 'release_year', field_schema: 'integer' }),
      this.client.createPayloadIndex(this.collection, { field_name: 'price', field_schema: 'float' }),
    ]);
    console.log(`Collection "${this.collection}" created.`);
  }

  /** Embed every record and upsert it. */
  async index(records: readonly SetRecord[]): Promise<void> {
    await this.ensureCollection();
    console.log(`\nIndexing ${records.length} sets into Qdrant…`);

    for (let i = 0; i < records.length; i += BATCH) {
      const batch = records.slice(i, i + BATCH);
      const points = await Promise.all(
        batch.map(async (record, j) => {
          console.log(`  [${i + j + 1}/${records.length}] Embedding: ${record.name} (${record.setId})`);
          const vector = await this.embed(embeddingText(record));
          return { id: pointId(record.setId), vector, payload: toPayload(record) };
        }),
      );

      await this.client.upsert(this.collection, { wait: true, points });
      console.log(`  ✓ Batch ${Math.floor(i / BATCH) + 1} upserted (${points.length} points)`);
    }
  }

  /** Sets whose embedded text is closest to `query`, best first. */
  async semanticSearch(query: string, limit: number = DEFAULT_LIMIT): Promise<SetRecord[]> {
    const vector = await this.embed(query);
    const hits = await this.client.search(this.collection, {
      vector,
      limit,
      with_payload: true,
    });

    const records: SetRecord[] = [];
    for (const hit of hits) {
      const record = payloadToRecord(hit.payload);
      if (record) {
        records.push(record);
      } else {
        console.warn(`Skipping Qdrant point ${String(hit.id)}: payload is not a valid set record`);
      }
    }
    return records;
  }
}
