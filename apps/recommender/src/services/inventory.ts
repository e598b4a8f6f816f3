// ═══════════════════════════════════════════════════════════════
// Scentify — Inventory
// apps/recommender/src/services/inventory.ts
//
// The user's own collection: perfume identifiers in the order they
// were added, no duplicates.
// ═══════════════════════════════════════════════════════════════

import type { DocumentStore } from "../storage/documentStore";
import { SerialQueue } from "../storage/serialQueue";

export class Inventory {
  private items: string[] = [];
  private document: DocumentStore<string[]>;
  private writes = new SerialQueue();

  constructor(document: DocumentStore<string[]>) {
    this.document = document;
  }

  /** Load the durable list, dropping repeated identifiers. */
  async load(): Promise<void> {
    this.items = [...new Set(await this.document.load())];
    console.log(`[Inventory] Loaded ${this.items.length} items from ${this.document.location}.`);
  }

  get size(): number {
    return this.items.length;
  }

  /** False when the id is already present. */
  add(itemId: string): Promise<boolean> {
    return this.writes.run(async () => {
      if (this.items.includes(itemId)) return false;
      await this.commit([...this.items, itemId]);
      return true;
    });
  }

  /** False when the id was not present. */
  remove(itemId: string): Promise<boolean> {
    return this.writes.run(async () => {
      if (!this.items.includes(itemId)) return false;
      await this.commit(this.items.filter((id) => id !== itemId));
      return true;
    });
  }

  has(itemId: string): boolean {
    return this.items.includes(itemId);
  }

  ids(): string[] {
    return [...this.items];
  }

  /** Memory follows the document, never leads it. */
  private async commit(next: string[]): Promise<void> {
    await this.document.save(next);
    this.items = next;
  }
}
