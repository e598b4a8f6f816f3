// ═══════════════════════════════════════════════════════════════
// Scentify — Record Normalizer Tests
// apps/recommender/tests/recordNormalizer.test.ts
//
// Tests for:
//   - Full record → canonical perfume
//   - Identifier derivation and idempotence
//   - Field fallbacks and reported issues
//   - Accord weighting, scent type, occasion folding, sizes
// ═══════════════════════════════════════════════════════════════

import { describe, it, expect } from "vitest";
import { Gender, ScentType } from "@scentify/types";
import {
  classifyScentType,
  normalizeRecord,
  normalizeRecordWithIssues,
  slugify,
} from "../src/services/recordNormalizer";

const NO_5 = {
  Name: "No 5",
  Brand: "Chanel",
  Price: "$150",
  Gender: "women",
  Notes: { Top: ["Aldehydes"], Middle: ["Jasmine"], Base: ["Sandalwood"] },
  "Main Accords": ["Floral"],
};

describe("normalizeRecord", () => {
  it("maps a complete provider record", () => {
    const { perfume, issues } = normalizeRecordWithIssues(NO_5);

    expect(perfume).toEqual({
      id: "fragella:chanel:no-5",
      name: "No 5",
      brand: "Chanel",
      price: 150,
      gender: Gender.FEMALE,
      scentType: ScentType.FLORAL,
      imageUrl: "placeholder:perfume",
      size: "50ml",
      notes: { top: ["Aldehydes"], heart: ["Jasmine"], base: ["Sandalwood"] },
      mainAccords: [{ name: "floral", weight: 1 }],
      seasonality: { Winter: 3, Spring: 3, Summer: 3, Fall: 3 },
      occasion: { Day: 3, Night: 3 },
      description: "A moderate fragrance with moderate projection.",
    });
    expect(issues).toEqual([]);
  });

  it("is idempotent", () => {
    expect(normalizeRecord(NO_5)).toEqual(normalizeRecord(NO_5));
  });

  it("does not mutate the source record", () => {
    const record = structuredClone(NO_5);
    normalizeRecord(record);
    expect(record).toEqual(NO_5);
  });

  it("reads field names case-insensitively", () => {
    const perfume = normalizeRecord({
      name: "No 5",
      BRAND: "Chanel",
      main_accords: ["floral"],
      notes: { top: ["Aldehydes"] },
    });

    expect(perfume.id).toBe("fragella:chanel:no-5");
    expect(perfume.scentType).toBe(ScentType.FLORAL);
    expect(perfume.notes.top).toEqual(["Aldehydes"]);
  });

  // ─── Identifiers ───

  it("prefers the source identifier", () => {
    expect(normalizeRecord({ id: 42, Name: "X" }).id).toBe("fragella:42");
  });

  it("uses the configured source prefix", () => {
    expect(normalizeRecord(NO_5, { source: "test" }).id).toBe("test:chanel:no-5");
  });

  it("slugs brand and name without diacritics", () => {
    expect(normalizeRecord({ Brand: "Hermès", Name: "Terre d'Hermès" }).id).toBe(
      "fragella:hermes:terre-d-hermes"
    );
    expect(slugify("  !!  ")).toBe("unknown");
  });

  it("keeps letters of every script in identifiers", () => {
    const royalOud = normalizeRecord({ Brand: "Ajmal", Name: "عود ملكي" });
    const nightMusk = normalizeRecord({ Brand: "Ajmal", Name: "مسك الليل" });

    expect(royalOud.id).toBe("fragella:ajmal:عود-ملكي");
    expect(nightMusk.id).toBe("fragella:ajmal:مسك-الليل");
    expect(slugify("No. 5 Eau Première")).toBe("no-5-eau-premiere");
  });

  // ─── Defaults ───

  it("falls back to defaults for an empty record", () => {
    const { perfume, issues } = normalizeRecordWithIssues({});

    expect(perfume.id).toBe("fragella:unknown:unknown");
    expect(perfume.name).toBe("Unknown");
    expect(perfume.brand).toBe("Unknown");
    expect(perfume.price).toBe(0);
    expect(perfume.gender).toBe(Gender.UNISEX);
    expect(perfume.scentType).toBe(ScentType.UNCLASSIFIED);
    expect(perfume.notes).toEqual({ top: [], heart: [], base: [] });
    expect(perfume.mainAccords).toEqual([]);
    expect(issues.map((i) => i.field)).toEqual(["price"]);
  });

  // ─── Price ───

  it.each([
    ["$1,299.50", 1299.5],
    ["€ 89", 89],
    ["USD 1,250", 1250],
    [".5", 0.5],
    [19.999, 20],
    [0, 0],
  ])("parses price %j as %d", (raw, expected) => {
    const { perfume, issues } = normalizeRecordWithIssues({ Name: "P", Price: raw });
    expect(perfume.price).toBe(expected);
    expect(issues).toEqual([]);
  });

  it.each([["call us"], ["-5"], [-5], [Number.NaN], [{ amount: 5 }], ["$150 - $200"], ["1.2.3"]])(
    "reports unreadable price %j",
    (raw) => {
      const { perfume, issues } = normalizeRecordWithIssues({ Name: "P", Price: raw });
      expect(perfume.price).toBe(0);
      expect(issues).toHaveLength(1);
      expect(issues[0].field).toBe("price");
      expect(issues[0].recordName).toBe("P");
    }
  );

  // ─── Gender ───

  it.each([
    ["women", Gender.FEMALE],
    ["for Women", Gender.FEMALE],
    ["Men", Gender.MALE],
    ["male", Gender.MALE],
    ["Unisex", Gender.UNISEX],
    ["for women and men", Gender.UNISEX],
  ])("maps gender %j to %s", (raw, expected) => {
    expect(normalizeRecord({ Gender: raw }).gender).toBe(expected);
  });

  it("reports an unrecognized gender", () => {
    const { perfume, issues } = normalizeRecordWithIssues({ Price: 1, Gender: "everyone" });
    expect(perfume.gender).toBe(Gender.UNISEX);
    expect(issues.map((i) => i.field)).toEqual(["gender"]);
  });

  // ─── Notes ───

  it("drops blank and repeated notes, keeping the first spelling", () => {
    const perfume = normalizeRecord({
      Notes: { Top: [{ name: "Bergamot" }, { name: " " }, "bergamot", "Lemon"], Heart: ["Rose"] },
    });
    expect(perfume.notes).toEqual({ top: ["Bergamot", "Lemon"], heart: ["Rose"], base: [] });
  });

  it("reads flat note fields when there is no notes object", () => {
    const perfume = normalizeRecord({ "Top Notes": "Pink Pepper, Lime", "Base Notes": ["Musk"] });
    expect(perfume.notes).toEqual({ top: ["Pink Pepper", "Lime"], heart: [], base: ["Musk"] });
  });

  // ─── Accords & scent type ───

  it("weights a plain accord list by position", () => {
    const perfume = normalizeRecord({ "Main Accords": ["Woody", "Citrus", "Fresh"] });
    expect(perfume.mainAccords).toEqual([
      { name: "woody", weight: 1 },
      { name: "citrus", weight: 0.6667 },
      { name: "fresh", weight: 0.3333 },
    ]);
    expect(perfume.scentType).toBe(ScentType.WOODY);
  });

  it("sorts weighted accord objects and reads percentages", () => {
    const perfume = normalizeRecord({
      "Main Accords": [
        { name: "Citrus", percentage: 40 },
        { name: "Woody", weight: 0.9 },
      ],
    });
    expect(perfume.mainAccords).toEqual([
      { name: "woody", weight: 0.9 },
      { name: "citrus", weight: 0.4 },
    ]);
  });

  it("lets accord levels override positional weights", () => {
    const perfume = normalizeRecord({
      "Main Accords": ["Citrus", "Woody"],
      "Main Accords Percentage": { Woody: "Dominant", Citrus: "Moderate", Amber: "Subtle" },
    });
    expect(perfume.mainAccords).toEqual([
      { name: "woody", weight: 1 },
      { name: "citrus", weight: 0.5 },
      { name: "amber", weight: 0.25 },
    ]);
    expect(perfume.scentType).toBe(ScentType.WOODY);
  });

  it("classifies by keyword when the top accord is not a vocabulary label", () => {
    const accord = (name: string) => [{ name, weight: 1 }];
    expect(classifyScentType(accord("warm spicy"))).toBe(ScentType.ORIENTAL);
    expect(classifyScentType(accord("fresh spicy"))).toBe(ScentType.FRESH);
    expect(classifyScentType(accord("white floral"))).toBe(ScentType.FLORAL);
    expect(classifyScentType(accord("vanilla"))).toBe(ScentType.GOURMAND);
    expect(classifyScentType(accord("metallic"))).toBe(ScentType.UNCLASSIFIED);
    expect(classifyScentType([])).toBe(ScentType.UNCLASSIFIED);
  });

  // ─── Seasonality & occasion ───

  it("folds occasions into Day and Night by maximum", () => {
    const perfume = normalizeRecord({
      "Occasion Ranking": [
        { name: "Romantic", score: 5 },
        { name: "Party", score: 4 },
      ],
    });
    expect(perfume.occasion).toEqual({ Day: 3, Night: 5 });
  });

  it("accepts an occasion map", () => {
    const perfume = normalizeRecord({ "Occasion Ranking": { Daily: 2, Office: 4, "Date Night": 1 } });
    expect(perfume.occasion).toEqual({ Day: 4, Night: 1 });
  });

  it("rounds and clamps season scores, folding autumn into Fall", () => {
    const perfume = normalizeRecord({
      "Season Ranking": [
        { name: "autumn", score: 4.6 },
        { name: "Winter", score: 9 },
        { name: "Spring", score: 0 },
      ],
    });
    expect(perfume.seasonality).toEqual({ Winter: 5, Spring: 1, Summer: 3, Fall: 5 });
  });

  it("reports an unreadable season score and keeps the default", () => {
    const { perfume, issues } = normalizeRecordWithIssues({
      Price: 1,
      "Season Ranking": [{ name: "Summer", score: "high" }],
    });
    expect(perfume.seasonality.Summer).toBe(3);
    expect(issues.map((i) => i.field)).toEqual(["seasonality"]);
  });

  // ─── Size, image, description ───

  it.each([
    [{ OilType: "Eau de Parfum 100 ML" }, "100ml"],
    [{ Size: "3.4 oz" }, "3.4oz"],
    [{ Name: "Bleu Eau de Toilette" }, "100ml"],
    [{ OilType: "Eau de Parfum" }, "100ml"],
    [{ Name: "Plain" }, "50ml"],
  ])("derives size from %j", (record, expected) => {
    expect(normalizeRecord(record).size).toBe(expected);
  });

  it("keeps http(s) images and replaces anything else", () => {
    expect(normalizeRecord({ "Image URL": "https://img.example.test/a.jpg" }).imageUrl).toBe(
      "https://img.example.test/a.jpg"
    );

    const { perfume, issues } = normalizeRecordWithIssues({ Price: 1, "Image URL": "ftp://x/a.jpg" });
    expect(perfume.imageUrl).toBe("placeholder:perfume");
    expect(issues.map((i) => i.field)).toEqual(["imageUrl"]);
  });

  it("describes longevity and sillage", () => {
    const perfume = normalizeRecord({ Longevity: "Long Lasting", Sillage: "Strong" });
    expect(perfume.description).toBe("A long lasting fragrance with strong projection.");
  });
});
