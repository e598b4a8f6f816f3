// ═══════════════════════════════════════════════════════════════
// Scentify — Similarity Engine
// apps/recommender/src/services/similarityEngine.ts
//
// "You might also like": neighbours of one perfume by shared notes,
// weighted by pyramid tier, plus flat bonuses for a matching scent
// type and gender. An optional search context nudges candidates
// toward what the user was just filtering for.
// ═══════════════════════════════════════════════════════════════

import { Gender, ScentType, type NoteTier, type Perfume } from "@scentify/types";
import { NOTE_TIER_WEIGHTS, SIMILARITY_BONUS, type SimilarityBonusKey } from "../config/weights";
import { InvalidInputError } from "../errors";
import type { SimilarMatch, SimilarityContext } from "../types";
import { byPopularity, compareCodeUnits } from "./ordering";

export interface SimilarOptions {
  popularity?: ReadonlyMap<string, number>;
  context?: SimilarityContext;
}

const TIERS: readonly NoteTier[] = ["top", "heart", "base"];

export class SimilarityEngine {
  private tierWeights: Readonly<Record<NoteTier, number>>;
  private bonus: Record<SimilarityBonusKey, number>;

  constructor(
    tierWeights: Readonly<Record<NoteTier, number>> = NOTE_TIER_WEIGHTS,
    bonus: Partial<Record<SimilarityBonusKey, number>> = {}
  ) {
    this.tierWeights = tierWeights;
    this.bonus = { ...SIMILARITY_BONUS, ...bonus };
  }

  /**
   * Up to k perfumes most similar to the anchor, best first. The
   * anchor itself and candidates scoring 0 are never returned.
   *
   * @throws InvalidInputError (InvalidLimit) when k is not a non-negative integer
   */
  similar(
    anchor: Perfume,
    catalog: readonly Perfume[],
    k: number,
    options: SimilarOptions = {}
  ): SimilarMatch[] {
    if (!Number.isInteger(k) || k < 0) {
      throw new InvalidInputError("InvalidLimit", `k must be a non-negative integer, got ${k}`);
    }
    const popularity = options.popularity ?? new Map<string, number>();
    const anchorNotes = this.noteWeights(anchor);

    const matches: SimilarMatch[] = [];
    for (const candidate of catalog) {
      if (candidate.id === anchor.id) continue;

      const candidateNotes = this.noteWeights(candidate);
      const sharedNotes: string[] = [];
      let score = 0;
      for (const [note, weight] of anchorNotes) {
        const other = candidateNotes.get(note);
        if (other === undefined) continue;
        sharedNotes.push(note);
        score += (weight + other) / 2;
      }

      score += this.attributeBonus(anchor, candidate);
      score += this.contextBonus(candidate, options.context);
      if (score > 0) matches.push({ perfume: candidate, score, sharedNotes });
    }

    return matches
      .sort(
        (a, b) =>
          b.score - a.score ||
          byPopularity(popularity, a.perfume.id, b.perfume.id) ||
          compareCodeUnits(a.perfume.id, b.perfume.id)
      )
      .slice(0, k);
  }

  // ─── Internal ───

  /** Lower-cased note → weight of the highest tier it appears in. */
  private noteWeights(perfume: Perfume): Map<string, number> {
    const weights = new Map<string, number>();
    for (const tier of TIERS) {
      for (const note of perfume.notes[tier]) {
        const key = note.trim().toLowerCase();
        if (key === "") continue;
        weights.set(key, Math.max(weights.get(key) ?? 0, this.tierWeights[tier]));
      }
    }
    return weights;
  }

  private attributeBonus(a: Perfume, b: Perfume): number {
    let bonus = 0;
    if (a.scentType === b.scentType && a.scentType !== ScentType.UNCLASSIFIED) {
      bonus += this.bonus.scentType;
    }
    if (a.gender === b.gender) {
      bonus += this.bonus.gender;
    } else if (a.gender === Gender.UNISEX || b.gender === Gender.UNISEX) {
      bonus += this.bonus.unisexGender;
    }
    return bonus;
  }

  private contextBonus(candidate: Perfume, context?: SimilarityContext): number {
    if (!context) return 0;
    let bonus = 0;
    if (context.scentTypes?.includes(candidate.scentType)) {
      bonus += this.bonus.contextScentType;
    }
    const brand = candidate.brand.toLowerCase();
    if (context.brands?.some((b) => b.toLowerCase() === brand)) {
      bonus += this.bonus.contextBrand;
    }
    return bonus;
  }
}
