// ═══════════════════════════════════════════════════════════════
// Scentify — Recommender Types
// apps/recommender/src/types.ts
//
// Shared types for the recommendation core: search filters,
// ranking modes, scored results and the outbound result shapes
// handed to the UI layer.
// ═══════════════════════════════════════════════════════════════

import type {
  Gender,
  Perfume,
  ScentProfile,
  ScentType,
  ProfileAxis,
} from "@scentify/types";
import type { DataQualityError, LookupError, TransportError } from "./errors";

// ─────────────────────────────────────────────────────────────
// FILTERS & RANKING
// ─────────────────────────────────────────────────────────────

/** Conjunctive search filters. Omitted fields do not constrain. */
export interface SearchFilters {
  /** Case-insensitive substring of name or brand. */
  text?: string;
  genders?: Gender[];
  scentTypes?: ScentType[];
  /** Inclusive. */
  minPrice?: number;
  /** Inclusive. */
  maxPrice?: number;
}

export type PerfumePredicate = (perfume: Perfume) => boolean;

/** Extra similarity context, usually the filters of the last search. */
export interface SimilarityContext {
  brands?: string[];
  scentTypes?: ScentType[];
}

export type RankMode =
  | { kind: "popularity" }
  | { kind: "profile"; profile: ScentProfile }
  | { kind: "similarity"; anchor: Perfume; k: number; context?: SimilarityContext };

export interface RankedPerfume {
  perfume: Perfume;
  /** Mode-specific score; higher ranks first. */
  score: number;
}

export interface ProfileMatch extends RankedPerfume {
  /** Σ|Δ| over the five axes, [0, 20]. */
  distance: number;
  /** The perfume projected onto the questionnaire axes. */
  projection: ScentProfile;
}

export interface SimilarMatch extends RankedPerfume {
  /** Notes the two perfumes share, lower-cased. */
  sharedNotes: string[];
}

/** Questionnaire answers, in axis order or keyed by axis. */
export type QuestionnaireAnswers = readonly number[] | Readonly<Record<ProfileAxis, number>>;

// ─────────────────────────────────────────────────────────────
// OUTBOUND RESULTS
// ─────────────────────────────────────────────────────────────

export type LookupResult<T> =
  | { success: true; value: T }
  | { success: false; error: LookupError };

export interface SearchOptions {
  /** Ranking; defaults to popularity. */
  mode?: RankMode;
  offset?: number;
  limit?: number;
}

/** What happened on the provider side of a search. */
export type ExternalQueryStatus = "issued" | "skipped" | "failed";

export interface SearchResult {
  perfumes: Perfume[];
  /** Size of the filtered set before paging. */
  total: number;
  external: ExternalQueryStatus;
  /** True when the provider failed and results come from the local catalog alone. */
  stale: boolean;
  /** Why the provider was skipped or failed. */
  notice?: string;
}

export interface InventoryChange {
  itemId: string;
  /** False when the call was a no-op (already present / already absent). */
  changed: boolean;
}

export interface IngestReport {
  inserted: number;
  updated: number;
  unchanged: number;
  /** Entries that were not records at all. */
  skipped: number;
  issues: DataQualityError[];
  perfumeIds: string[];
}

export interface WarmReport {
  termsQueried: number;
  catalogSize: number;
  failures: TransportError[];
}

// ─────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────

export interface RecommenderConfig {
  /** Identifier prefix for normalized provider records. */
  sourceName: string;
  /** Max records requested per provider query. */
  searchLimit: number;
  /** Max matches returned by submitQuestionnaire. */
  questionnaireLimit: number;
  /** Default k for similarTo. */
  similarLimit: number;
  /** warmCatalog stops once the catalog holds this many perfumes. */
  warmTarget: number;
}

export const DEFAULT_RECOMMENDER_CONFIG: RecommenderConfig = {
  sourceName: "fragella",
  searchLimit: 20,
  questionnaireLimit: 8,
  similarLimit: 4,
  warmTarget: 300,
};
