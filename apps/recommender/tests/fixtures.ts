// ═══════════════════════════════════════════════════════════════
// Scentify — Shared Test Fixtures
// apps/recommender/tests/fixtures.ts
// ═══════════════════════════════════════════════════════════════

import { Gender, ScentType, type InteractionEvent, type Perfume } from "@scentify/types";
import type { CatalogProvider } from "@scentify/catalog-client";
import { CatalogStore } from "../src/services/catalogStore";
import { InteractionLog, type Clock } from "../src/services/interactionLog";
import { Inventory } from "../src/services/inventory";
import { Recommender } from "../src/services/recommender";
import { MemoryDocumentStore } from "../src/storage/documentStore";
import type { RecommenderConfig } from "../src/types";

export function makePerfume(overrides: Partial<Perfume> & { id: string }): Perfume {
  return {
    name: overrides.id,
    brand: "Test House",
    price: 50,
    gender: Gender.UNISEX,
    scentType: ScentType.UNCLASSIFIED,
    imageUrl: "placeholder:perfume",
    size: "50ml",
    notes: { top: [], heart: [], base: [] },
    mainAccords: [],
    seasonality: { Winter: 3, Spring: 3, Summer: 3, Fall: 3 },
    occasion: { Day: 3, Night: 3 },
    description: "A moderate fragrance with moderate projection.",
    ...overrides,
  };
}

/** A memory store whose saves fail while `failSaves` is set. */
export class FlakyDocumentStore<T> extends MemoryDocumentStore<T> {
  failSaves = false;

  async save(value: T): Promise<void> {
    if (this.failSaves) throw new Error("disk full");
    await super.save(value);
  }
}

/** A clock that advances one second per reading, from a fixed start. */
export function steppingClock(startIso = "2026-01-01T10:00:00.000Z"): Clock {
  let t = Date.parse(startIso);
  return () => {
    const now = new Date(t);
    t += 1000;
    return now;
  };
}

export interface TestRig {
  recommender: Recommender;
  catalogDoc: MemoryDocumentStore<Perfume[]>;
  interactionDoc: MemoryDocumentStore<InteractionEvent[]>;
  inventoryDoc: MemoryDocumentStore<string[]>;
}

export async function createTestRig(options: {
  perfumes?: Perfume[];
  inventory?: string[];
  provider?: CatalogProvider;
  config?: Partial<RecommenderConfig>;
} = {}): Promise<TestRig> {
  const catalogDoc = new MemoryDocumentStore<Perfume[]>(options.perfumes ?? [], "memory:catalog");
  const interactionDoc = new MemoryDocumentStore<InteractionEvent[]>([], "memory:interactions");
  const inventoryDoc = new MemoryDocumentStore<string[]>(options.inventory ?? [], "memory:inventory");

  const recommender = new Recommender(
    {
      catalog: new CatalogStore(catalogDoc),
      interactions: new InteractionLog(interactionDoc, steppingClock()),
      inventory: new Inventory(inventoryDoc),
      provider: options.provider,
    },
    options.config
  );
  await recommender.initialize();
  return { recommender, catalogDoc, interactionDoc, inventoryDoc };
}

/** The error a call throws; fails the test when it returns normally. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected the call to throw");
}
