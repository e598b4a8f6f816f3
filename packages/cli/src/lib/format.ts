/**
 * Terminal formatting and option parsing for the Scentify CLI.
 * Pure functions; the commands do the printing.
 */

import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import { Gender, ScentType, type Perfume } from "@scentify/types";
import type { ProfileMatch, SearchResult, SimilarMatch } from "@scentify/recommender";

// ─── Output ───

export function formatPrice(price: number): string {
  return price > 0 ? `$${price.toFixed(2)}` : "n/a";
}

/** One result row, ranked from 1. */
export function formatPerfume(perfume: Perfume, rank: number): string {
  return (
    `  ${chalk.dim(`${String(rank).padStart(2)}.`)} ${chalk.bold(perfume.name)} ${chalk.dim("by")} ${perfume.brand}  ` +
    `${chalk.green(formatPrice(perfume.price))}  ` +
    chalk.dim(`${perfume.scentType} · ${perfume.gender} · ${perfume.id}`)
  );
}

export function formatSearchResult(result: SearchResult, offset = 0): string[] {
  const noun = result.total === 1 ? "perfume" : "perfumes";
  const header = chalk.bold(`  ${result.total} ${noun}`) + chalk.dim(` · online: ${result.external}`);
  const lines = [result.stale ? `${header} ${chalk.yellow("(stale)")}` : header];
  if (result.notice) lines.push(chalk.yellow(`  ${result.notice}`));
  lines.push(chalk.dim("  ─────────────────────────────────────────────────────────────"));

  if (result.perfumes.length === 0) {
    lines.push(chalk.dim("  No matches."));
  }
  result.perfumes.forEach((p, i) => lines.push(formatPerfume(p, offset + i + 1)));
  return lines;
}

export function formatProfileMatch(match: ProfileMatch, rank: number): string[] {
  const percent = Math.round(match.score * 100);
  return [
    formatPerfume(match.perfume, rank),
    chalk.dim(`      distance ${match.distance} · match ${percent}%`),
  ];
}

export function formatSimilarMatch(match: SimilarMatch, rank: number): string[] {
  const shared = match.sharedNotes.length > 0 ? match.sharedNotes.join(", ") : "none";
  return [
    formatPerfume(match.perfume, rank),
    chalk.dim(`      score ${match.score} · shared notes: ${shared}`),
  ];
}

// ─── Option parsers ───

export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

function parseLabels<T extends string>(label: string, allowed: readonly T[]) {
  return (value: string): T[] =>
    parseList(value).map((item) => {
      const match = allowed.find((a) => a.toLowerCase() === item.toLowerCase());
      if (match === undefined) {
        throw new InvalidArgumentError(`Unknown ${label} "${item}" (expected one of: ${allowed.join(", ")}).`);
      }
      return match;
    });
}

export const parseGenders = parseLabels("gender", Object.values(Gender));
export const parseScentTypes = parseLabels("scent type", Object.values(ScentType));

export function parseNonNegativeNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError("Expected a non-negative number.");
  }
  return n;
}

export function parseNonNegativeInteger(value: string): number {
  const n = parseNonNegativeNumber(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError("Expected a whole number.");
  return n;
}

export function parsePositiveInteger(value: string): number {
  const n = parseNonNegativeInteger(value);
  if (n === 0) throw new InvalidArgumentError("Expected a whole number of at least 1.");
  return n;
}

/** "2,1,3,1,3" → [2, 1, 3, 1, 3]; range checks happen in the recommender. */
export function parseAnswers(value: string): number[] {
  return parseList(value).map(Number);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
