// ═══════════════════════════════════════════════════════════════
// Scentify — Ranking Engine
// apps/recommender/src/services/rankingEngine.ts
//
// One entry point for ordering perfumes, whatever the signal:
//   - popularity  (interaction-weighted counts)
//   - profile     (distance to a questionnaire profile)
//   - similarity  (shared notes with an anchor perfume)
//
// Filtering always happens before ranking, so totals and pages
// describe the filtered set.
// ═══════════════════════════════════════════════════════════════

import type { Perfume } from "@scentify/types";
import type { RankMode, RankedPerfume, SearchFilters } from "../types";
import type { CatalogStore } from "./catalogStore";
import { buildFilterPredicates } from "./filters";
import { byPopularity, compareCodeUnits } from "./ordering";
import type { PopularityScorer } from "./popularityScorer";
import type { ProfileEngine } from "./profileEngine";
import type { SimilarityEngine } from "./similarityEngine";

// ─────────────────────────────────────────────────────────────
// SERVICE
// ─────────────────────────────────────────────────────────────

export class RankingEngine {
  private catalog: CatalogStore;
  private popularity: PopularityScorer;
  private profiles: ProfileEngine;
  private similarity: SimilarityEngine;

  constructor(
    catalog: CatalogStore,
    popularity: PopularityScorer,
    profiles: ProfileEngine,
    similarity: SimilarityEngine
  ) {
    this.catalog = catalog;
    this.popularity = popularity;
    this.profiles = profiles;
    this.similarity = similarity;
  }

  /**
   * Order a subset of the catalog.
   *
   * Popularity ranks every perfume in the subset; profile ranking
   * does too, closest first. Similarity returns at most k
   * neighbours of the anchor, and only those with a positive score.
   */
  rank(subset: readonly Perfume[], mode: RankMode = { kind: "popularity" }): RankedPerfume[] {
    const scores = this.popularity.scoreAll();

    switch (mode.kind) {
      case "popularity":
        return subset
          .map((perfume) => ({ perfume, score: scores.get(perfume.id) ?? 0 }))
          .sort(
            (a, b) =>
              byPopularity(scores, a.perfume.id, b.perfume.id) ||
              compareCodeUnits(a.perfume.name, b.perfume.name) ||
              compareCodeUnits(a.perfume.id, b.perfume.id)
          );

      case "profile":
        return this.profiles.match(mode.profile, subset, scores);

      case "similarity":
        return this.similarity.similar(mode.anchor, subset, mode.k, {
          popularity: scores,
          context: mode.context,
        });
    }
  }

  /** Filter the whole catalog, then rank what is left. */
  rankFiltered(filters: SearchFilters = {}, mode?: RankMode): RankedPerfume[] {
    const subset = this.catalog.filter(...buildFilterPredicates(filters));
    return this.rank(subset, mode);
  }
}
