// ═══════════════════════════════════════════════════════════════
// Scentify — Search Filter Predicates
// apps/recommender/src/services/filters.ts
// ═══════════════════════════════════════════════════════════════

import type { Gender, Perfume, ScentType } from "@scentify/types";
import { InvalidInputError } from "../errors";
import type { PerfumePredicate, SearchFilters } from "../types";

/** Case-insensitive substring of name or brand. Blank text matches everything. */
export function matchesText(text: string): PerfumePredicate {
  const needle = text.trim().toLowerCase();
  if (needle === "") return () => true;
  return (p: Perfume) =>
    p.name.toLowerCase().includes(needle) || p.brand.toLowerCase().includes(needle);
}

export function hasGender(genders: readonly Gender[]): PerfumePredicate {
  const allowed = new Set(genders);
  return (p: Perfume) => allowed.has(p.gender);
}

export function hasScentType(types: readonly ScentType[]): PerfumePredicate {
  const allowed = new Set(types);
  return (p: Perfume) => allowed.has(p.scentType);
}

/** Inclusive on both ends; an omitted end is open. */
export function inPriceRange(min?: number, max?: number): PerfumePredicate {
  return (p: Perfume) =>
    (min === undefined || p.price >= min) && (max === undefined || p.price <= max);
}

/**
 * Validate the filters and turn them into predicates. An empty
 * gender or scent-type list is treated as "no constraint", the same
 * as omitting it.
 *
 * @throws InvalidInputError (InvalidFilter) on negative or inverted prices
 */
export function buildFilterPredicates(filters: SearchFilters = {}): PerfumePredicate[] {
  const { text, genders, scentTypes, minPrice, maxPrice } = filters;

  for (const [label, value] of [["minPrice", minPrice], ["maxPrice", maxPrice]] as const) {
    if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
      throw new InvalidInputError("InvalidFilter", `${label} must be a non-negative number, got ${value}`);
    }
  }
  if (minPrice !== undefined && maxPrice !== undefined && minPrice > maxPrice) {
    throw new InvalidInputError("InvalidFilter", `minPrice (${minPrice}) exceeds maxPrice (${maxPrice})`);
  }

  const predicates: PerfumePredicate[] = [];
  if (text !== undefined && text.trim() !== "") predicates.push(matchesText(text));
  if (genders && genders.length > 0) predicates.push(hasGender(genders));
  if (scentTypes && scentTypes.length > 0) predicates.push(hasScentType(scentTypes));
  if (minPrice !== undefined || maxPrice !== undefined) predicates.push(inPriceRange(minPrice, maxPrice));
  return predicates;
}
