// ── Catalog record ───────────────────────────────────────────────────────────
// SetRecord instances are frozen by normalizeSetRecord(); never mutate one.

export interface SetRecord {
  readonly setId: string;
  readonly name: string;
  readonly theme: string;
  readonly pieceCount: number;
  readonly price?: number;
  readonly releaseYear?: number;
  readonly description?: string;
}

// ── Vocabulary ───────────────────────────────────────────────────────────────

export type TimeModifier = 'oldest' | 'newest' | 'vintage' | 'modern';
export type SizeModifier = 'largest' | 'smallest' | 'medium';
export type PriceModifier = 'expensive' | 'cheap' | 'free';

/** [canonical concept, aliases] pairs. Entry order is match priority. */
export type AliasTable<K extends string = string> = ReadonlyArray<readonly [K, readonly string[]]>;

export interface Vocabulary {
  readonly themes: AliasTable;
  readonly time: AliasTable<TimeModifier>;
  readonly size: AliasTable<SizeModifier>;
  readonly price: AliasTable<PriceModifier>;
}

// ── Query understanding ──────────────────────────────────────────────────────

/** Structured representation of one free-text query. */
export interface QueryIntent {
  /** The unmodified query passed to analyzeQuery(). */
  readonly originalQuery: string;
  readonly theme?: string;
  readonly timeModifier?: TimeModifier;
  readonly sizeModifier?: SizeModifier;
  readonly priceModifier?: PriceModifier;
  /** Four-digit year between 1900 and 2099. */
  readonly year?: number;
  /** Kept as a string so leading zeros survive. */
  readonly setNumber?: string;
  /** First-seen order; duplicates are not removed. */
  readonly keywords: readonly string[];
}

export interface CandidateQueries {
  intent: QueryIntent;
  queries: string[];
}

// ── Search layer ─────────────────────────────────────────────────────────────

/** Anything that can turn one candidate query into records. */
export interface CandidateSource {
  readonly name: string;
  search(query: string): Promise<SetRecord[]>;
}

export interface ProcessOptions {
  /** Maximum number of ranked records to return. Unlimited when absent. */
  limit?: number;
}

// ── Remote catalog providers ─────────────────────────────────────────────────

export interface CatalogProvider {
  readonly name: string;
  searchSets(query: string): Promise<SetRecord[]>;
  fetchSet(setId: string): Promise<SetRecord>;
}

/** Partial record fields contributed by one provider during a merge. */
export type SetDetails = { -readonly [K in Exclude<keyof SetRecord, 'setId'>]?: SetRecord[K] };

// ── Chat layer ───────────────────────────────────────────────────────────────

export interface ChatMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface AssistantResponse {
  sets: SetRecord[];
  answer: string;
}
