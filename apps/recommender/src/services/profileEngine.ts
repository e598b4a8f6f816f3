// ═══════════════════════════════════════════════════════════════
// Scentify — Profile Engine
// apps/recommender/src/services/profileEngine.ts
//
// Questionnaire answers and perfumes live in the same five-axis
// space (intensity, warmth, sweetness, occasion, character). Answers
// map onto it directly; perfumes are projected from their accords,
// occasion scores and gender. Matching is L1 distance in that space.
// ═══════════════════════════════════════════════════════════════

import { z } from "zod";
import {
  AXIS_MAX,
  AXIS_MIDPOINT,
  AXIS_MIN,
  PROFILE_AXES,
  ScentType,
  type MainAccord,
  type Perfume,
  type ScentProfile,
} from "@scentify/types";
import {
  ACCORD_AXIS_RULES,
  CHARACTER_BY_GENDER,
  MAX_PROFILE_DISTANCE,
  type AccordAxis,
  type AxisRule,
} from "../config/weights";
import { InvalidInputError } from "../errors";
import type { ProfileMatch, QuestionnaireAnswers } from "../types";
import { byPopularity, compareCodeUnits } from "./ordering";

const answerSchema = z.number().int().min(AXIS_MIN).max(AXIS_MAX);

const ACCORD_AXES: readonly AccordAxis[] = ["intensity", "warmth", "sweetness"];

export class ProfileEngine {
  private rules: Readonly<Record<AccordAxis, readonly AxisRule[]>>;

  constructor(rules: Readonly<Record<AccordAxis, readonly AxisRule[]>> = ACCORD_AXIS_RULES) {
    this.rules = rules;
  }

  /**
   * Validate questionnaire answers and read them as a profile.
   * Arrays are taken in questionnaire order.
   *
   * @throws InvalidInputError (InvalidAnswers | AnswerOutOfRange)
   */
  profileFromAnswers(answers: QuestionnaireAnswers): ScentProfile {
    const values = this.answersInAxisOrder(answers);
    const profile: ScentProfile = { intensity: 0, warmth: 0, sweetness: 0, occasion: 0, character: 0 };

    PROFILE_AXES.forEach((axis, i) => {
      const parsed = answerSchema.safeParse(values[i]);
      if (!parsed.success) {
        throw new InvalidInputError(
          "AnswerOutOfRange",
          `Answer for ${axis} must be an integer ${AXIS_MIN}-${AXIS_MAX}, got ${String(values[i])}`
        );
      }
      profile[axis] = parsed.data;
    });
    return profile;
  }

  /** Place a perfume on the questionnaire axes. */
  projectPerfume(perfume: Perfume): ScentProfile {
    const accords = this.accordsOf(perfume);
    const [intensity, warmth, sweetness] = ACCORD_AXES.map((axis) => this.projectAxis(accords, axis));

    return {
      intensity,
      warmth,
      sweetness,
      occasion: clampAxis(Math.round(AXIS_MIDPOINT + (perfume.occasion.Night - perfume.occasion.Day) / 2)),
      character: CHARACTER_BY_GENDER[perfume.gender],
    };
  }

  /** Σ|Δ| over the five axes, in [0, 20]. */
  profileDistance(a: ScentProfile, b: ScentProfile): number {
    return PROFILE_AXES.reduce((sum, axis) => sum + Math.abs(a[axis] - b[axis]), 0);
  }

  /**
   * Score every perfume against a profile. Closest first; ties go to
   * the more popular perfume, then to the smaller identifier.
   */
  match(
    profile: ScentProfile,
    catalog: readonly Perfume[],
    popularity: ReadonlyMap<string, number> = new Map()
  ): ProfileMatch[] {
    const matches = catalog.map((perfume): ProfileMatch => {
      const projection = this.projectPerfume(perfume);
      const distance = this.profileDistance(profile, projection);
      return { perfume, score: 1 - distance / MAX_PROFILE_DISTANCE, distance, projection };
    });

    return matches.sort(
      (a, b) =>
        a.distance - b.distance ||
        byPopularity(popularity, a.perfume.id, b.perfume.id) ||
        compareCodeUnits(a.perfume.id, b.perfume.id)
    );
  }

  // ─── Internal ───

  private answersInAxisOrder(answers: QuestionnaireAnswers): unknown[] {
    if (isAnswerList(answers)) {
      if (answers.length !== PROFILE_AXES.length) {
        throw new InvalidInputError(
          "InvalidAnswers",
          `Expected ${PROFILE_AXES.length} answers, got ${answers.length}`
        );
      }
      return [...answers];
    }

    const missing = PROFILE_AXES.filter((axis) => !(axis in answers));
    if (missing.length > 0) {
      throw new InvalidInputError("InvalidAnswers", `Missing answers for: ${missing.join(", ")}`);
    }
    return PROFILE_AXES.map((axis) => answers[axis]);
  }

  /** With no accords the scent type stands in as a single accord. */
  private accordsOf(perfume: Perfume): readonly MainAccord[] {
    if (perfume.mainAccords.length > 0) return perfume.mainAccords;
    if (perfume.scentType === ScentType.UNCLASSIFIED) return [];
    return [{ name: perfume.scentType.toLowerCase(), weight: 1 }];
  }

  /** Accord-weighted mean of the matched targets; midpoint without a signal. */
  private projectAxis(accords: readonly MainAccord[], axis: AccordAxis): number {
    let weighted = 0;
    let totalWeight = 0;

    for (const accord of accords) {
      const rule = this.rules[axis].find((r) => r.keywords.some((k) => accord.name.includes(k)));
      if (!rule) continue;
      weighted += rule.target * accord.weight;
      totalWeight += accord.weight;
    }

    return totalWeight > 0 ? clampAxis(Math.round(weighted / totalWeight)) : AXIS_MIDPOINT;
  }
}

function isAnswerList(answers: QuestionnaireAnswers): answers is readonly number[] {
  return Array.isArray(answers);
}

function clampAxis(value: number): number {
  return Math.min(AXIS_MAX, Math.max(AXIS_MIN, value));
}
