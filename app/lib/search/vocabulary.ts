/**
 * Controlled vocabulary for query understanding.
 *
 * Each table is a list of [canonical concept, aliases] pairs matched by
 * plain substring containment on the lower-cased query. Entry order and
 * alias order are match priority: the first concept with any matching alias
 * wins.
 */
import type { AliasTable, PriceModifier, SizeModifier, TimeModifier, Vocabulary } from '../types';

// ── Themes ───────────────────────────────────────────────────────────────────
// Canonical names double as the fuzzy-match targets in analyzer.ts.
const THEMES: AliasTable = [
  ['star wars', ['star wars', 'starwars', 'sw', 'starwar']],
  ['city', ['city', 'lego city', 'town']],
  ['technic', ['technic', 'technical']],
  ['friends', ['friends', 'lego friends']],
  ['ninjago', ['ninjago', 'ninja go', 'ninja']],
  ['architecture', ['architecture', 'architectural']],
  ['creator', ['creator', 'creative']],
  ['duplo', ['duplo', 'duplo blocks']],
  ['bionicle', ['bionicle', 'bionicles']],
  ['marvel', ['marvel', 'superheroes', 'avengers']],
  ['dc', ['dc', 'batman', 'superman']],
  ['harry potter', ['harry potter', 'hp', 'wizarding world']],
  ['minecraft', ['minecraft', 'mine craft']],
  ['jurassic world', ['jurassic world', 'jurassic park', 'dinosaurs']],
  ['speed champions', ['speed champions', 'cars', 'racing']],
  ['ideas', ['ideas', 'lego ideas', 'fan designed']],
  ['expert', ['expert', 'expert level', 'adult']],
  ['classic', ['classic', 'basic', 'traditional']],
];

// ── Modifiers ────────────────────────────────────────────────────────────────
// Only oldest/newest, largest/smallest and expensive/cheap carry ranking
// weight. vintage, modern, medium and free are recognised but never score.
const TIME: AliasTable<TimeModifier> = [
  ['oldest', ['oldest', 'first', 'earliest', 'original']],
  ['newest', ['newest', 'latest', 'recent', 'current']],
  ['vintage', ['vintage', 'retro', 'classic', 'old']],
  ['modern', ['modern', 'new', 'contemporary', 'recent']],
];

const SIZE: AliasTable<SizeModifier> = [
  ['largest', ['largest', 'biggest', 'huge', 'massive']],
  ['smallest', ['smallest', 'tiny', 'mini', 'small']],
  ['medium', ['medium', 'average', 'normal']],
];

const PRICE: AliasTable<PriceModifier> = [
  ['expensive', ['expensive', 'costly', 'premium', 'high price']],
  ['cheap', ['cheap', 'inexpensive', 'affordable', 'low price']],
  ['free', ['free', 'no cost', 'zero price']],
];

function freezeTable<K extends string>(table: AliasTable<K>): AliasTable<K> {
  return Object.freeze(
    table.map(([canonical, aliases]) => Object.freeze([canonical, Object.freeze([...aliases])] as const)),
  );
}

/** Deep-frozen copy of `vocabulary`; callers may keep editing their input. */
export function freezeVocabulary(vocabulary: Vocabulary): Vocabulary {
  return Object.freeze({
    themes: freezeTable(vocabulary.themes),
    time: freezeTable(vocabulary.time),
    size: freezeTable(vocabulary.size),
    price: freezeTable(vocabulary.price),
  });
}

/** Process-wide default tables, built once at module load. */
export const DEFAULT_VOCABULARY: Vocabulary = freezeVocabulary({
  themes: THEMES,
  time: TIME,
  size: SIZE,
  price: PRICE,
});

/**
 * Return the first canonical concept with an alias contained in
 * `lowerQuery`, which must already be lower-cased.
 */
export function matchAlias<K extends string>(table: AliasTable<K>, lowerQuery: string): K | undefined {
  for (const [canonical, aliases] of table) {
    for (const alias of aliases) {
      if (lowerQuery.includes(alias)) return canonical;
    }
  }
  return undefined;
}

/** Canonical concept names in table order. */
export function canonicalNames<K extends string>(table: AliasTable<K>): K[] {
  return table.map(([canonical]) => canonical);
}
