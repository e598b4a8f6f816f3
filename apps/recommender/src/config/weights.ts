// ═══════════════════════════════════════════════════════════════
// Scentify — Scoring Tables
// apps/recommender/src/config/weights.ts
//
// Fixed tables behind the profile projection and the similarity
// score. Nothing here is learned; change a number, change the
// ranking, and the tests will tell you which ones moved.
// ═══════════════════════════════════════════════════════════════

import { Gender, type NoteTier, type ProfileAxis } from "@scentify/types";

/** One projection rule: any contained keyword pulls the axis to target. */
export interface AxisRule {
  keywords: readonly string[];
  target: number;
}

/** Axes projected from accords. Occasion and character come from other fields. */
export type AccordAxis = Extract<ProfileAxis, "intensity" | "warmth" | "sweetness">;

/**
 * Accord → axis projection table.
 *
 * For each accord the first rule whose keyword it contains gives
 * that accord's target on the axis. The axis value is the
 * accord-weighted mean of the targets, rounded. An axis no accord
 * speaks to sits at the midpoint.
 */
export const ACCORD_AXIS_RULES: Readonly<Record<AccordAxis, readonly AxisRule[]>> = {
  /** Subtle (1) ↔ Strong (5) */
  intensity: [
    { keywords: ["oud", "leather", "animalic", "tobacco", "smoky", "intense", "amber", "oriental", "incense"], target: 5 },
    { keywords: ["warm spicy", "woody", "balsamic", "patchouli"], target: 4 },
    { keywords: ["floral", "powdery", "musk", "fruity"], target: 2 },
    { keywords: ["fresh", "citrus", "aquatic", "marine", "ozonic", "green", "herbal", "aromatic"], target: 1 },
  ],
  /** Fresh (1) ↔ Warm (5) */
  warmth: [
    { keywords: ["fresh spicy"], target: 2 },
    { keywords: ["oriental", "amber", "warm spicy", "intense", "vanilla", "balsamic", "oud", "incense"], target: 5 },
    { keywords: ["woody", "leather", "tobacco", "gourmand", "sweet", "spicy", "cinnamon"], target: 4 },
    { keywords: ["floral", "green", "aromatic", "powdery", "fruity"], target: 2 },
    { keywords: ["fresh", "citrus", "aquatic", "marine", "ozonic"], target: 1 },
  ],
  /** Dry (1) ↔ Sweet (5) */
  sweetness: [
    { keywords: ["gourmand", "sweet", "vanilla", "caramel", "honey", "chocolate", "cacao"], target: 5 },
    { keywords: ["fruity", "floral", "powdery"], target: 4 },
    { keywords: ["woody", "aromatic", "leather", "smoky", "tobacco"], target: 2 },
    { keywords: ["green", "herbal", "earthy", "dry", "mossy"], target: 1 },
  ],
};

/** Feminine (1) ↔ Masculine (5) */
export const CHARACTER_BY_GENDER: Readonly<Record<Gender, number>> = {
  [Gender.FEMALE]: 1,
  [Gender.UNISEX]: 3,
  [Gender.MALE]: 5,
};

/** Five axes, each differing by at most 4. */
export const MAX_PROFILE_DISTANCE = 20;

// ─────────────────────────────────────────────────────────────
// SIMILARITY
// ─────────────────────────────────────────────────────────────

/** Top notes are smelled first and weigh most. */
export const NOTE_TIER_WEIGHTS: Readonly<Record<NoteTier, number>> = {
  top: 3,
  heart: 2,
  base: 1,
};

export type SimilarityBonusKey =
  | "scentType"
  | "gender"
  | "unisexGender"
  | "contextScentType"
  | "contextBrand";

export const SIMILARITY_BONUS: Readonly<Record<SimilarityBonusKey, number>> = {
  /** Same scent type (Unclassified never matches). */
  scentType: 3,
  /** Same gender. */
  gender: 2,
  /** Exactly one side is Unisex. */
  unisexGender: 1,
  /** Candidate's scent type is among the active search filters. */
  contextScentType: 2,
  /** Candidate's brand is among the active search brands. */
  contextBrand: 1,
};
