// ═══════════════════════════════════════════════════════════════
// Scentify — Inventory Tests
// apps/recommender/tests/inventory.test.ts
// ═══════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, vi } from "vitest";
import { Inventory } from "../src/services/inventory";
import { MemoryDocumentStore } from "../src/storage/documentStore";
import { FlakyDocumentStore } from "./fixtures";

describe("Inventory", () => {
  let document: MemoryDocumentStore<string[]>;
  let inventory: Inventory;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    document = new MemoryDocumentStore<string[]>(["t:b", "t:a", "t:b"]);
    inventory = new Inventory(document);
    await inventory.load();
  });

  it("drops repeated identifiers on load", () => {
    expect(inventory.ids()).toEqual(["t:b", "t:a"]);
    expect(inventory.size).toBe(2);
  });

  it("adds at the end and persists only real changes", async () => {
    expect(await inventory.add("t:c")).toBe(true);
    expect(await inventory.add("t:a")).toBe(false);

    expect(document.peek()).toEqual(["t:b", "t:a", "t:c"]);
    expect(document.saveCount).toBe(1);
  });

  it("removes present identifiers", async () => {
    expect(await inventory.remove("t:b")).toBe(true);
    expect(await inventory.remove("t:z")).toBe(false);

    expect(inventory.has("t:b")).toBe(false);
    expect(document.peek()).toEqual(["t:a"]);
    expect(document.saveCount).toBe(1);
  });

  it("hands out a copy of the identifiers", () => {
    inventory.ids().push("t:x");
    expect(inventory.has("t:x")).toBe(false);
  });

  it("leaves the list untouched when a save fails", async () => {
    const flaky = new FlakyDocumentStore<string[]>(["t:a"]);
    const flakyInventory = new Inventory(flaky);
    await flakyInventory.load();

    flaky.failSaves = true;
    await expect(flakyInventory.add("t:b")).rejects.toThrow("disk full");
    await expect(flakyInventory.remove("t:a")).rejects.toThrow("disk full");
    expect(flakyInventory.ids()).toEqual(["t:a"]);

    flaky.failSaves = false;
    expect(await flakyInventory.add("t:b")).toBe(true);
    expect(flaky.peek()).toEqual(["t:a", "t:b"]);
  });
});
