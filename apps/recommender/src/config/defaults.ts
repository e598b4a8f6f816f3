// ═══════════════════════════════════════════════════════════════
// Scentify — Normalization Defaults & Vocabularies
// apps/recommender/src/config/defaults.ts
//
// Every fallback the record normalizer can take lives here, so a
// test can walk each one. External data is messy; a missing or
// unreadable field degrades to the value below, never to an error.
// ═══════════════════════════════════════════════════════════════

import { Gender, ScentType, type OccasionBucket, type Season } from "@scentify/types";

export const NORMALIZER_DEFAULTS = {
  /** Prefix for identifiers of records from the default provider. */
  source: "fragella",
  name: "Unknown",
  brand: "Unknown",
  price: 0,
  gender: Gender.UNISEX,
  scentType: ScentType.UNCLASSIFIED,
  /** Sentinel for a missing or non-http image. */
  imageUrl: "placeholder:perfume",
  size: "50ml",
  /** Bottle size assumed for EDP/EDT names without a declared size. */
  concentrationSize: "100ml",
  seasonScore: 3,
  occasionScore: 3,
  longevity: "moderate",
  sillage: "moderate",
} as const;

/** Name fragments that imply the concentration-based default size. */
export const CONCENTRATION_NAMES: readonly string[] = ["eau de parfum", "eau de toilette"];

/**
 * Accord keyword → scent type. Checked in order after an exact
 * label match fails; the first type with a contained keyword wins.
 */
export const SCENT_TYPE_KEYWORDS: ReadonlyArray<readonly [ScentType, readonly string[]]> = [
  [ScentType.CITRUS, ["citrus", "lemon", "bergamot", "orange", "grapefruit", "lime"]],
  [ScentType.AQUATIC, ["aquatic", "marine", "ozonic", "water"]],
  [ScentType.GREEN, ["green", "herbal", "aromatic", "lavender"]],
  [ScentType.FRESH, ["fresh"]],
  [ScentType.FRUITY, ["fruity", "berry", "apple", "peach", "tropical"]],
  [ScentType.FLORAL, ["floral", "rose", "jasmine", "tuberose", "violet", "iris", "powdery", "musk"]],
  [ScentType.GOURMAND, ["gourmand", "sweet", "vanilla", "caramel", "chocolate", "honey", "cacao"]],
  [ScentType.LEATHER, ["leather", "animalic", "tobacco", "smoky"]],
  [ScentType.ORIENTAL, ["oriental", "amber", "spicy", "balsamic", "incense"]],
  [ScentType.WOODY, ["woody", "wood", "oud", "cedar", "vetiver", "patchouli", "mossy", "earthy"]],
];

/**
 * Occasion folding. Night is tested first so "date night" and
 * friends never land in Day.
 */
export const OCCASION_KEYWORDS: ReadonlyArray<readonly [OccasionBucket, readonly string[]]> = [
  ["Night", ["evening", "night", "date", "romantic", "party", "formal", "special"]],
  ["Day", ["casual", "daily", "day", "office", "sport", "work", "business"]],
];

/** Season name fragments; "autumn" folds into Fall. */
export const SEASON_KEYWORDS: ReadonlyArray<readonly [Season, readonly string[]]> = [
  ["Winter", ["winter"]],
  ["Spring", ["spring"]],
  ["Summer", ["summer"]],
  ["Fall", ["fall", "autumn"]],
];

/** Provider accord strength words → weight. */
export const ACCORD_LEVEL_WEIGHTS: Readonly<Record<string, number>> = {
  dominant: 1,
  prominent: 0.75,
  moderate: 0.5,
  subtle: 0.25,
};

/**
 * Brands and scent families queried to seed an empty catalog.
 */
export const WARM_SEARCH_TERMS: readonly string[] = [
  // Houses
  "Dior", "Chanel", "Gucci", "Versace", "Tom Ford",
  "Prada", "Armani", "Yves Saint Laurent", "Givenchy", "Burberry",
  "Dolce Gabbana", "Calvin Klein", "Hugo Boss", "Valentino", "Hermes",
  // Scent families
  "Rose", "Oud", "Vanilla", "Lavender", "Jasmine",
  "Citrus", "Sandalwood", "Amber", "Musk", "Bergamot",
];
