// ═══════════════════════════════════════════════════════════════
// Scentify — Catalog Store
// apps/recommender/src/services/catalogStore.ts
//
// In-memory collection of canonical perfumes keyed by identifier.
// Grows with every search that reaches the provider; nothing is
// ever evicted. The whole collection is mirrored to one durable
// document after each change.
// ═══════════════════════════════════════════════════════════════

import { isDeepStrictEqual } from "node:util";
import type { Perfume } from "@scentify/types";
import type { DocumentStore } from "../storage/documentStore";
import { SerialQueue } from "../storage/serialQueue";
import type { PerfumePredicate } from "../types";

// ─────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────

export type UpsertOutcome = "inserted" | "updated" | "unchanged";

export interface UpsertSummary {
  inserted: number;
  updated: number;
  unchanged: number;
}

// ─────────────────────────────────────────────────────────────
// SERVICE
// ─────────────────────────────────────────────────────────────

export class CatalogStore {
  /** Insertion-ordered; the order is also the document order. */
  private perfumes: Map<string, Perfume> = new Map();
  private document: DocumentStore<Perfume[]>;
  private writes = new SerialQueue();

  constructor(document: DocumentStore<Perfume[]>) {
    this.document = document;
  }

  /**
   * Replace the in-memory state with the durable snapshot.
   * Later duplicates of one identifier win.
   */
  async load(): Promise<void> {
    const snapshot = await this.document.load();
    this.perfumes.clear();
    for (const perfume of snapshot) this.perfumes.set(perfume.id, perfume);
    console.log(`[CatalogStore] Loaded ${this.perfumes.size} perfumes from ${this.document.location}.`);
  }

  get size(): number {
    return this.perfumes.size;
  }

  get(id: string): Perfume | undefined {
    return this.perfumes.get(id);
  }

  has(id: string): boolean {
    return this.perfumes.has(id);
  }

  all(): Perfume[] {
    return [...this.perfumes.values()];
  }

  /** Perfumes passing every predicate. No predicates → everything. */
  filter(...predicates: PerfumePredicate[]): Perfume[] {
    return this.all().filter((p) => predicates.every((predicate) => predicate(p)));
  }

  // ─── Mutations ───

  /**
   * Insert or overwrite by identifier. Identical content is a no-op
   * and does not touch the document.
   */
  async upsert(perfume: Perfume): Promise<UpsertOutcome> {
    const summary = await this.upsertMany([perfume]);
    if (summary.inserted > 0) return "inserted";
    return summary.updated > 0 ? "updated" : "unchanged";
  }

  /**
   * Batch upsert with at most one document write. The changes are
   * staged on a copy and become visible only after the write.
   */
  upsertMany(perfumes: readonly Perfume[]): Promise<UpsertSummary> {
    return this.writes.run(async () => {
      const next = new Map(this.perfumes);
      const summary: UpsertSummary = { inserted: 0, updated: 0, unchanged: 0 };
      for (const perfume of perfumes) {
        summary[applyTo(next, perfume)] += 1;
      }
      if (summary.inserted + summary.updated > 0) {
        await this.document.save([...next.values()]);
        this.perfumes = next;
      }
      return summary;
    });
  }
}

function applyTo(perfumes: Map<string, Perfume>, perfume: Perfume): UpsertOutcome {
  const existing = perfumes.get(perfume.id);
  if (existing && isDeepStrictEqual(existing, perfume)) return "unchanged";
  perfumes.set(perfume.id, perfume);
  return existing ? "updated" : "inserted";
}
