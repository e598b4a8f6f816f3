// ═══════════════════════════════════════════════════════════════
// Scentify — Record Normalizer
// apps/recommender/src/services/recordNormalizer.ts
//
// Turns one external catalog entry of unknown shape into a
// canonical Perfume. Pure and total: every field degrades to a
// NORMALIZER_DEFAULTS value, and anything worth knowing about the
// degradation is returned as a DataQualityError issue instead of
// being thrown.
// ═══════════════════════════════════════════════════════════════

import {
  AXIS_MAX,
  AXIS_MIN,
  Gender,
  ScentType,
  type MainAccord,
  type NotePyramid,
  type OccasionBucket,
  type Perfume,
  type Season,
} from "@scentify/types";
import type { SourceRecord } from "@scentify/catalog-client";
import {
  ACCORD_LEVEL_WEIGHTS,
  CONCENTRATION_NAMES,
  NORMALIZER_DEFAULTS,
  OCCASION_KEYWORDS,
  SCENT_TYPE_KEYWORDS,
  SEASON_KEYWORDS,
} from "../config/defaults";
import { DataQualityError } from "../errors";

export interface NormalizeOptions {
  /** Identifier prefix; defaults to the default provider's name. */
  source?: string;
}

export interface NormalizedRecord {
  perfume: Perfume;
  issues: DataQualityError[];
}

// ─────────────────────────────────────────────────────────────
// FIELD ALIASES
// ─────────────────────────────────────────────────────────────

/** Keys are compared lower-cased with everything but [a-z0-9] removed. */
const FIELD_ALIASES = {
  id: ["id"],
  name: ["name", "title"],
  brand: ["brand", "house"],
  price: ["price"],
  gender: ["gender"],
  notes: ["notes"],
  accords: ["mainaccords", "accords"],
  accordLevels: ["mainaccordspercentage"],
  seasons: ["seasonranking", "seasonality", "seasons"],
  occasions: ["occasionranking", "occasions", "occasion"],
  size: ["oiltype", "size", "volume"],
  image: ["imageurl", "image"],
  longevity: ["longevity"],
  sillage: ["sillage"],
} as const;

const TIER_ALIASES: Readonly<Record<keyof NotePyramid, readonly string[]>> = {
  top: ["top", "topnotes"],
  heart: ["middle", "heart", "middlenotes", "heartnotes"],
  base: ["base", "basenotes"],
};

// ─────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────

export function normalizeRecord(record: SourceRecord, options: NormalizeOptions = {}): Perfume {
  return normalizeRecordWithIssues(record, options).perfume;
}

export function normalizeRecordWithIssues(
  record: SourceRecord,
  options: NormalizeOptions = {}
): NormalizedRecord {
  const source = options.source ?? NORMALIZER_DEFAULTS.source;
  const fields = new FieldReader(record);
  const issues: DataQualityError[] = [];

  const name = textOf(fields.get(FIELD_ALIASES.name)) ?? NORMALIZER_DEFAULTS.name;
  const brand = textOf(fields.get(FIELD_ALIASES.brand)) ?? NORMALIZER_DEFAULTS.brand;
  const report = (field: string, message: string): void => {
    issues.push(new DataQualityError(field, message, name));
  };

  const mainAccords = parseAccords(
    fields.get(FIELD_ALIASES.accords),
    fields.get(FIELD_ALIASES.accordLevels)
  );
  const concentrationText = [name, textOf(fields.get(FIELD_ALIASES.size)) ?? ""].join(" ");

  const perfume: Perfume = {
    id: buildId(source, textOf(fields.get(FIELD_ALIASES.id)), brand, name),
    name,
    brand,
    price: parsePrice(fields.get(FIELD_ALIASES.price), report),
    gender: parseGender(fields.get(FIELD_ALIASES.gender), report),
    scentType: classifyScentType(mainAccords),
    imageUrl: parseImageUrl(fields.get(FIELD_ALIASES.image), report),
    size: parseSize(fields.getAll(FIELD_ALIASES.size), concentrationText),
    notes: parseNotes(fields),
    mainAccords,
    seasonality: parseSeasonality(fields.get(FIELD_ALIASES.seasons), report),
    occasion: parseOccasion(fields.get(FIELD_ALIASES.occasions), report),
    description: describe(
      textOf(fields.get(FIELD_ALIASES.longevity)) ?? NORMALIZER_DEFAULTS.longevity,
      textOf(fields.get(FIELD_ALIASES.sillage)) ?? NORMALIZER_DEFAULTS.sillage
    ),
  };

  return { perfume, issues };
}

/**
 * Lower-case, strip Latin diacritics, join letter/digit runs with
 * "-". Letters of any script survive, so "عود ملكي" → "عود-ملكي".
 */
export function slugify(value: string): string {
  const runs = value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .match(/[\p{L}\p{N}][\p{L}\p{M}\p{N}]*/gu);
  return runs ? runs.join("-") : "unknown";
}

/**
 * Scent type of the strongest accord: an exact vocabulary label
 * first, then the keyword table in declared order.
 */
export function classifyScentType(accords: readonly MainAccord[]): ScentType {
  const top = accords[0];
  if (!top) return NORMALIZER_DEFAULTS.scentType;

  for (const type of Object.values(ScentType)) {
    if (type !== ScentType.UNCLASSIFIED && type.toLowerCase() === top.name) return type;
  }
  for (const [type, keywords] of SCENT_TYPE_KEYWORDS) {
    if (keywords.some((k) => top.name.includes(k))) return type;
  }
  return NORMALIZER_DEFAULTS.scentType;
}

// ─────────────────────────────────────────────────────────────
// FIELD READER
// ─────────────────────────────────────────────────────────────

class FieldReader {
  private fields = new Map<string, unknown>();

  constructor(record: SourceRecord) {
    for (const [key, value] of Object.entries(record)) {
      const folded = foldKey(key);
      // First spelling wins when two keys fold together.
      if (!this.fields.has(folded)) this.fields.set(folded, value);
    }
  }

  /** First present (non-null) value among the aliases. */
  get(aliases: readonly string[]): unknown {
    for (const alias of aliases) {
      const value = this.fields.get(alias);
      if (value !== undefined && value !== null) return value;
    }
    return undefined;
  }

  /** Every present value among the aliases, in alias order. */
  getAll(aliases: readonly string[]): unknown[] {
    return aliases
      .map((alias) => this.fields.get(alias))
      .filter((value) => value !== undefined && value !== null);
  }
}

function foldKey(key: string): string {
  return key.toLowerCase().replace(/[^a-z0-9]/g, "");
}

// ─────────────────────────────────────────────────────────────
// FIELD PARSERS
// ─────────────────────────────────────────────────────────────

type Reporter = (field: string, message: string) => void;

function buildId(source: string, sourceId: string | undefined, brand: string, name: string): string {
  if (sourceId !== undefined) return `${source}:${sourceId}`;
  return `${source}:${slugify(brand)}:${slugify(name)}`;
}

function parsePrice(raw: unknown, report: Reporter): number {
  if (raw === undefined || (typeof raw === "string" && raw.trim() === "")) {
    report("price", "Price missing");
    return NORMALIZER_DEFAULTS.price;
  }

  let value: number;
  if (typeof raw === "number") {
    value = raw;
  } else if (typeof raw === "string") {
    // Exactly one amount; ranges like "$150 - $200" are unreadable.
    const [amount, ...others] = raw.match(/(?:\d[\d,]*)?\.?\d+/g) ?? [];
    value =
      amount === undefined || others.length > 0 || raw.trim().startsWith("-")
        ? Number.NaN
        : Number(amount.replace(/,/g, ""));
  } else {
    value = Number.NaN;
  }

  if (!Number.isFinite(value) || value < 0) {
    report("price", `Unreadable price: ${JSON.stringify(raw)}`);
    return NORMALIZER_DEFAULTS.price;
  }
  return Math.round(value * 100) / 100;
}

function parseGender(raw: unknown, report: Reporter): Gender {
  const text = textOf(raw);
  if (text === undefined) return NORMALIZER_DEFAULTS.gender;

  const words = new Set(text.toLowerCase().split(/[^a-z]+/));
  if (words.has("unisex")) return Gender.UNISEX;

  const female = ["women", "woman", "female"].some((w) => words.has(w));
  const male = ["men", "man", "male"].some((w) => words.has(w));
  if (female && male) return Gender.UNISEX;
  if (female) return Gender.FEMALE;
  if (male) return Gender.MALE;

  report("gender", `Unrecognized gender "${text}"`);
  return NORMALIZER_DEFAULTS.gender;
}

function parseImageUrl(raw: unknown, report: Reporter): string {
  const text = textOf(raw);
  if (text === undefined) return NORMALIZER_DEFAULTS.imageUrl;
  if (/^https?:\/\//i.test(text)) return text;

  report("imageUrl", `Image is not an http(s) URL: ${text}`);
  return NORMALIZER_DEFAULTS.imageUrl;
}

function parseSize(candidates: readonly unknown[], concentrationText: string): string {
  for (const candidate of candidates) {
    const text = textOf(candidate);
    const match = text?.match(/(\d+(?:\.\d+)?)\s*(ml|oz)\b/i);
    if (match) return `${Number(match[1])}${match[2].toLowerCase()}`;
  }

  const lowered = concentrationText.toLowerCase();
  if (CONCENTRATION_NAMES.some((c) => lowered.includes(c))) {
    return NORMALIZER_DEFAULTS.concentrationSize;
  }
  return NORMALIZER_DEFAULTS.size;
}

function parseNotes(fields: FieldReader): NotePyramid {
  const nested = fields.get(FIELD_ALIASES.notes);
  const tiers = isRecord(nested) ? new FieldReader(nested) : fields;

  return {
    top: parseNoteList(tiers.get(TIER_ALIASES.top)),
    heart: parseNoteList(tiers.get(TIER_ALIASES.heart)),
    base: parseNoteList(tiers.get(TIER_ALIASES.base)),
  };
}

function parseNoteList(raw: unknown): string[] {
  let entries: unknown[];
  if (Array.isArray(raw)) entries = raw;
  else if (typeof raw === "string") entries = raw.split(",");
  else return [];

  const seen = new Set<string>();
  const notes: string[] = [];
  for (const entry of entries) {
    const note = isRecord(entry) ? textOf(entry.name) : textOf(entry);
    if (note === undefined || seen.has(note.toLowerCase())) continue;
    seen.add(note.toLowerCase());
    notes.push(note);
  }
  return notes;
}

/**
 * Accepts a list of labels (weighted by position), a list of
 * `{ name, weight }` objects, or a `{ label: weight }` map. A level
 * map ("Dominant", "Prominent", ...) overrides the weights it names.
 */
function parseAccords(raw: unknown, levels: unknown): MainAccord[] {
  const entries: Array<[string | undefined, unknown]> = [];
  if (Array.isArray(raw)) {
    for (const item of raw) {
      if (isRecord(item)) {
        const reader = new FieldReader(item);
        entries.push([
          textOf(reader.get(["name", "label", "accord"])),
          reader.get(["weight", "score", "percentage", "value"]),
        ]);
      } else {
        entries.push([textOf(item), undefined]);
      }
    }
  } else if (isRecord(raw)) {
    for (const [label, weight] of Object.entries(raw)) entries.push([label, weight]);
  }

  const levelWeights = new Map<string, number>();
  if (isRecord(levels)) {
    for (const [label, level] of Object.entries(levels)) {
      const name = textOf(label)?.toLowerCase();
      const weight = parseAccordWeight(level);
      if (name !== undefined && weight !== undefined) levelWeights.set(name, weight);
    }
  }

  const n = entries.length;
  const byName = new Map<string, number>();
  entries.forEach(([label, weight], i) => {
    const name = label?.toLowerCase();
    if (name === undefined || byName.has(name)) return;
    byName.set(name, levelWeights.get(name) ?? parseAccordWeight(weight) ?? (n - i) / n);
  });
  for (const [name, weight] of levelWeights) {
    if (!byName.has(name)) byName.set(name, weight);
  }

  return [...byName]
    .map(([name, weight]) => ({ name, weight: Math.round(clamp(weight, 0, 1) * 10_000) / 10_000 }))
    .sort((a, b) => b.weight - a.weight);
}

function parseAccordWeight(raw: unknown): number | undefined {
  if (typeof raw === "string") {
    const level = ACCORD_LEVEL_WEIGHTS[raw.trim().toLowerCase()];
    if (level !== undefined) return level;
  }
  const value = numberOf(raw);
  if (value === undefined) return undefined;
  return value > 1 ? value / 100 : value;
}

function parseSeasonality(raw: unknown, report: Reporter): Record<Season, number> {
  const scores = new Map<Season, number>();
  for (const [label, rawScore] of rankingEntries(raw)) {
    const lowered = label.toLowerCase();
    const season = SEASON_KEYWORDS.find(([, keywords]) => keywords.some((k) => lowered.includes(k)))?.[0];
    if (!season) continue;

    const score = axisScoreOf(rawScore);
    if (score === undefined) {
      report("seasonality", `Unreadable score for ${label}: ${JSON.stringify(rawScore)}`);
      continue;
    }
    scores.set(season, Math.max(scores.get(season) ?? AXIS_MIN, score));
  }

  const fallback = NORMALIZER_DEFAULTS.seasonScore;
  return {
    Winter: scores.get("Winter") ?? fallback,
    Spring: scores.get("Spring") ?? fallback,
    Summer: scores.get("Summer") ?? fallback,
    Fall: scores.get("Fall") ?? fallback,
  };
}

/**
 * Folds the provider's occasion vocabulary into Day and Night.
 * Several source occasions landing in one bucket combine by max.
 */
function parseOccasion(raw: unknown, report: Reporter): Record<OccasionBucket, number> {
  const scores = new Map<OccasionBucket, number>();
  for (const [label, rawScore] of rankingEntries(raw)) {
    const lowered = label.toLowerCase();
    const bucket = OCCASION_KEYWORDS.find(([, keywords]) => keywords.some((k) => lowered.includes(k)))?.[0];
    if (!bucket) continue;

    const score = axisScoreOf(rawScore);
    if (score === undefined) {
      report("occasion", `Unreadable score for ${label}: ${JSON.stringify(rawScore)}`);
      continue;
    }
    scores.set(bucket, Math.max(scores.get(bucket) ?? AXIS_MIN, score));
  }

  const fallback = NORMALIZER_DEFAULTS.occasionScore;
  return {
    Day: scores.get("Day") ?? fallback,
    Night: scores.get("Night") ?? fallback,
  };
}

/** `[{ name, score }]` lists and `{ name: score }` maps as label/score pairs. */
function rankingEntries(raw: unknown): Array<[string, unknown]> {
  if (isRecord(raw)) return Object.entries(raw);
  if (!Array.isArray(raw)) return [];

  const entries: Array<[string, unknown]> = [];
  for (const item of raw) {
    if (!isRecord(item)) continue;
    const reader = new FieldReader(item);
    const label = textOf(reader.get(["name", "season", "occasion", "label"]));
    if (label !== undefined) entries.push([label, reader.get(["score", "value", "rank"])]);
  }
  return entries;
}

function axisScoreOf(raw: unknown): number | undefined {
  const value = numberOf(raw);
  return value === undefined ? undefined : clamp(Math.round(value), AXIS_MIN, AXIS_MAX);
}

function describe(longevity: string, sillage: string): string {
  return `A ${longevity.toLowerCase()} fragrance with ${sillage.toLowerCase()} projection.`;
}

// ─────────────────────────────────────────────────────────────
// PRIMITIVES
// ─────────────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Trimmed non-empty text; numbers are accepted as their decimal form. */
function textOf(value: unknown): string | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function numberOf(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value !== "string") return undefined;
  const cleaned = value.trim().replace(/%$/, "");
  if (cleaned === "") return undefined;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
