/**
 * Normalizer for SetRecord objects.
 *
 * normalizeSetRecord() is the parse-and-throw boundary: every provider
 * mapper, store row and vector payload goes through it before a record can
 * reach the ranking pipeline.
 */
import { z } from 'zod';
import type { SetRecord } from '../types';

// ── Zod schema ────────────────────────────────────────────────────────────────

/** First year a brick set can plausibly carry. */
export const MIN_RELEASE_YEAR = 1932;
export const MAX_RELEASE_YEAR = 2100;

const nonBlank = z.string().trim().min(1);

export const setRecordSchema = z.object({
  setId: nonBlank,
  name: nonBlank,
  theme: nonBlank,
  pieceCount: z.number().int().nonnegative(),
  price: z.number().finite().nonnegative().optional(),
  releaseYear: z.number().int().min(MIN_RELEASE_YEAR).max(MAX_RELEASE_YEAR).optional(),
  description: z.string().optional(),
});

// ── Exported helpers ──────────────────────────────────────────────────────────

/**
 * Parse raw (unknown) input through the Zod schema and freeze the result.
 * Throws a ZodError on any validation failure; callers decide whether to
 * skip the record or abort.
 */
export function normalizeSetRecord(raw: unknown): SetRecord {
  const parsed = setRecordSchema.parse(raw);
  const record: SetRecord = {
    setId: parsed.setId,
    name: parsed.name,
    theme: parsed.theme,
    pieceCount: parsed.pieceCount,
    ...(parsed.price !== undefined && { price: parsed.price }),
    ...(parsed.releaseYear !== undefined && { releaseYear: parsed.releaseYear }),
    ...(parsed.description !== undefined && { description: parsed.description }),
  };
  return Object.freeze(record);
}

/** Non-throwing variant for bulk loaders that skip bad rows. */
export function tryNormalizeSetRecord(raw: unknown): SetRecord | undefined {
  const result = setRecordSchema.safeParse(raw);
  return result.success ? normalizeSetRecord(result.data) : undefined;
}

/** Produce a new frozen record with some fields replaced. */
export function withDetails(record: SetRecord, details: Partial<SetRecord>): SetRecord {
  return normalizeSetRecord({ ...record, ...details });
}

/** One-line summary used in logs and prompts. */
export function describeSetRecord(record: SetRecord): string {
  const parts = [
    `${record.name} (${record.setId})`,
    record.theme,
    `${record.pieceCount} pieces`,
    record.releaseYear !== undefined ? String(record.releaseYear) : '',
    record.price !== undefined ? `$${record.price.toFixed(2)}` : 'price unknown',
  ].filter(Boolean);
  return parts.join(' · ');
}
