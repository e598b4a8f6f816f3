// ═══════════════════════════════════════════════════════════════
// Scentify — Profile Engine Tests
// apps/recommender/tests/profileEngine.test.ts
//
// Tests for:
//   - Answer validation (arity, range, keyed form)
//   - Perfume projection onto the five axes
//   - Distance bounds and match ordering
// ═══════════════════════════════════════════════════════════════

import { describe, it, expect } from "vitest";
import { Gender, ScentType, type ScentProfile } from "@scentify/types";
import { ProfileEngine } from "../src/services/profileEngine";
import { makePerfume, thrownBy } from "./fixtures";

// A: soft citrus-musk for the daytime, unisex → [2, 1, 3, 1, 3]
const A = makePerfume({
  id: "t:a",
  mainAccords: [
    { name: "musky", weight: 1 },
    { name: "citrus", weight: 1 },
  ],
  occasion: { Day: 5, Night: 1 },
  gender: Gender.UNISEX,
});

// B: dark oud for the evening, feminine → [5, 5, 1, 5, 1]
const B = makePerfume({
  id: "t:b",
  mainAccords: [
    { name: "oud", weight: 1 },
    { name: "earthy", weight: 1 },
  ],
  occasion: { Day: 1, Night: 5 },
  gender: Gender.FEMALE,
});

const asVector = (p: ScentProfile) => [p.intensity, p.warmth, p.sweetness, p.occasion, p.character];

describe("ProfileEngine", () => {
  const engine = new ProfileEngine();

  // ─── Answers ───

  it("reads answers in questionnaire order", () => {
    expect(engine.profileFromAnswers([2, 1, 3, 1, 3])).toEqual({
      intensity: 2,
      warmth: 1,
      sweetness: 3,
      occasion: 1,
      character: 3,
    });
  });

  it("accepts answers keyed by axis", () => {
    const profile = engine.profileFromAnswers({ character: 5, occasion: 4, sweetness: 3, warmth: 2, intensity: 1 });
    expect(asVector(profile)).toEqual([1, 2, 3, 4, 5]);
  });

  it("rejects the wrong number of answers", () => {
    expect(thrownBy(() => engine.profileFromAnswers([1, 2, 3]))).toMatchObject({
      reason: "InvalidAnswers",
      message: "Expected 5 answers, got 3",
    });
  });

  it("names the axis of an out-of-range answer", () => {
    expect(thrownBy(() => engine.profileFromAnswers([1, 2, 6, 4, 5]))).toMatchObject({
      reason: "AnswerOutOfRange",
      message: "Answer for sweetness must be an integer 1-5, got 6",
    });
    expect(thrownBy(() => engine.profileFromAnswers([1, 2, 3, 2.5, 5]))).toMatchObject({
      reason: "AnswerOutOfRange",
    });
  });

  // ─── Projection ───

  it("projects accords, occasion and gender", () => {
    expect(asVector(engine.projectPerfume(A))).toEqual([2, 1, 3, 1, 3]);
    expect(asVector(engine.projectPerfume(B))).toEqual([5, 5, 1, 5, 1]);
  });

  it("sits at the midpoint with no accord signal", () => {
    const plain = makePerfume({ id: "t:plain", gender: Gender.MALE });
    expect(asVector(engine.projectPerfume(plain))).toEqual([3, 3, 3, 3, 5]);
  });

  it("lets the scent type stand in for missing accords", () => {
    const gourmand = makePerfume({ id: "t:g", scentType: ScentType.GOURMAND });
    expect(engine.projectPerfume(gourmand)).toMatchObject({ intensity: 3, warmth: 4, sweetness: 5 });
  });

  // ─── Distance & matching ───

  it("keeps distance within [0, 20]", () => {
    const low: ScentProfile = { intensity: 1, warmth: 1, sweetness: 1, occasion: 1, character: 1 };
    const high: ScentProfile = { intensity: 5, warmth: 5, sweetness: 5, occasion: 5, character: 5 };

    expect(engine.profileDistance(low, low)).toBe(0);
    expect(engine.profileDistance(low, high)).toBe(20);
    expect(engine.profileDistance(engine.projectPerfume(A), engine.projectPerfume(B))).toBe(15);
  });

  it("ranks the exact match first", () => {
    const profile = engine.profileFromAnswers([2, 1, 3, 1, 3]);
    const matches = engine.match(profile, [B, A]);

    expect(matches.map((m) => m.perfume.id)).toEqual(["t:a", "t:b"]);
    expect(matches.map((m) => m.distance)).toEqual([0, 15]);
    expect(matches.map((m) => m.score)).toEqual([1, 0.25]);
  });

  it("breaks distance ties by popularity, then identifier", () => {
    const profile = engine.profileFromAnswers([3, 3, 3, 3, 3]);
    const twins = ["t:c", "t:a", "t:b"].map((id) => makePerfume({ id }));

    const byId = engine.match(profile, twins).map((m) => m.perfume.id);
    expect(byId).toEqual(["t:a", "t:b", "t:c"]);

    const byPopularity = engine.match(profile, twins, new Map([["t:c", 4]])).map((m) => m.perfume.id);
    expect(byPopularity).toEqual(["t:c", "t:a", "t:b"]);
  });

  it("is deterministic for any input order", () => {
    const profile = engine.profileFromAnswers([4, 4, 2, 4, 2]);
    const catalog = [A, B, makePerfume({ id: "t:z" }), makePerfume({ id: "t:m", gender: Gender.MALE })];

    const forward = engine.match(profile, catalog).map((m) => m.perfume.id);
    const reversed = engine.match(profile, [...catalog].reverse()).map((m) => m.perfume.id);
    expect(reversed).toEqual(forward);
  });
});
