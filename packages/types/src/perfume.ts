// ═══════════════════════════════════════════════════════════════
// Scentify — Core Perfume Types
// packages/types/src/perfume.ts
// ═══════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────
// CATALOG
// ─────────────────────────────────────────────────────────────

export enum Gender {
  MALE = "Male",
  FEMALE = "Female",
  UNISEX = "Unisex",
}

/**
 * Controlled scent-type vocabulary. A perfume's scent type is derived
 * from its highest-weighted accord.
 */
export enum ScentType {
  FLORAL = "Floral",
  FRUITY = "Fruity",
  WOODY = "Woody",
  FRESH = "Fresh",
  CITRUS = "Citrus",
  ORIENTAL = "Oriental",
  GOURMAND = "Gourmand",
  GREEN = "Green",
  LEATHER = "Leather",
  AQUATIC = "Aquatic",
  /** No accord present, or none recognized. */
  UNCLASSIFIED = "Unclassified",
}

export type Season = "Winter" | "Spring" | "Summer" | "Fall";

export type OccasionBucket = "Day" | "Night";

export const SEASONS: readonly Season[] = ["Winter", "Spring", "Summer", "Fall"];

export const OCCASION_BUCKETS: readonly OccasionBucket[] = ["Day", "Night"];

/** Note pyramid. Order within each tier is preserved from the source. */
export interface NotePyramid {
  top: string[];
  heart: string[];
  base: string[];
}

export type NoteTier = keyof NotePyramid;

export interface MainAccord {
  /** Lower-cased accord label, e.g. "warm spicy". */
  name: string;
  /** Relative strength [0, 1]. Weights need not sum to 1. */
  weight: number;
}

/** Canonical perfume. The catalog store owns the only copy. */
export interface Perfume {
  id: string;
  name: string;
  brand: string;
  /** Non-negative, rounded to cents. */
  price: number;
  gender: Gender;
  scentType: ScentType;
  imageUrl: string;
  /** Declared bottle size, e.g. "50ml". */
  size: string;
  notes: NotePyramid;
  /** Sorted by descending weight. */
  mainAccords: MainAccord[];
  /** Suitability per season, integers 1-5. */
  seasonality: Record<Season, number>;
  /** Suitability per occasion bucket, integers 1-5. */
  occasion: Record<OccasionBucket, number>;
  description: string;
}

// ─────────────────────────────────────────────────────────────
// INTERACTIONS
// ─────────────────────────────────────────────────────────────

export enum ActionKind {
  /** Detail view opened */
  VIEW = "view",
  /** Card clicked from a result list */
  CLICK = "click",
  /** Marked as favorite */
  FAVORITE = "favorite",
  /** Added to the personal inventory */
  ADD_TO_INVENTORY = "add_to_inventory",
}

export const ACTION_KINDS: readonly ActionKind[] = Object.values(ActionKind);

/**
 * Popularity contribution of one event per action kind.
 * Stronger commitment earns a higher weight.
 */
export const ACTION_WEIGHTS: Readonly<Record<ActionKind, number>> = {
  [ActionKind.VIEW]: 1,
  [ActionKind.CLICK]: 2,
  [ActionKind.FAVORITE]: 3,
  [ActionKind.ADD_TO_INVENTORY]: 5,
};

/** Immutable once recorded. */
export interface InteractionEvent {
  itemId: string;
  action: ActionKind;
  /** ISO-8601, never earlier than the previous event in the log. */
  recordedAt: string;
}

// ─────────────────────────────────────────────────────────────
// SCENT PROFILE
// ─────────────────────────────────────────────────────────────

/**
 * Five bipolar axes, each an integer 1-5:
 *   intensity  Subtle (1)   ↔ Strong (5)
 *   warmth     Fresh (1)    ↔ Warm (5)
 *   sweetness  Dry (1)      ↔ Sweet (5)
 *   occasion   Daily (1)    ↔ Evening (5)
 *   character  Feminine (1) ↔ Masculine (5)
 */
export interface ScentProfile {
  intensity: number;
  warmth: number;
  sweetness: number;
  occasion: number;
  character: number;
}

export type ProfileAxis = keyof ScentProfile;

/** Questionnaire order. */
export const PROFILE_AXES: readonly ProfileAxis[] = [
  "intensity",
  "warmth",
  "sweetness",
  "occasion",
  "character",
];

export const AXIS_MIN = 1;
export const AXIS_MAX = 5;
export const AXIS_MIDPOINT = 3;
