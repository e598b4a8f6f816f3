import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import chalk from "chalk";
import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Gender, ScentType, type Perfume } from "@scentify/types";
import { createProgram } from "../src/program";

const chance: Perfume = {
  id: "fragella:chanel:chance",
  name: "Chance",
  brand: "Chanel",
  price: 50,
  gender: Gender.FEMALE,
  scentType: ScentType.FLORAL,
  imageUrl: "placeholder:perfume",
  size: "50ml",
  notes: { top: ["pink pepper"], heart: ["jasmine"], base: ["patchouli"] },
  mainAccords: [{ name: "floral", weight: 1 }],
  seasonality: { Winter: 2, Spring: 5, Summer: 4, Fall: 3 },
  occasion: { Day: 5, Night: 3 },
  description: "A moderate fragrance with moderate projection.",
};

describe("scentify commands", () => {
  let dataDir: string;
  let printed: string[];

  async function run(...args: string[]): Promise<void> {
    await createProgram().parseAsync(["node", "scentify", ...args]);
  }

  beforeEach(async () => {
    chalk.level = 0;
    dataDir = await mkdtemp(join(tmpdir(), "scentify-cli-"));
    await writeFile(join(dataDir, "catalog.json"), JSON.stringify([chance]), "utf8");
    vi.stubEnv("SCENTIFY_DATA_DIR", dataDir);
    vi.stubEnv("FRAGELLA_API_KEY", "");

    printed = [];
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      printed.push(...String(args[0]).split("\n"));
    });
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(async () => {
    process.exitCode = undefined;
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await rm(dataDir, { recursive: true, force: true });
  });

  it("prints local counts from the data directory", async () => {
    await run("stats");

    expect(printed).toContain("  Catalog            1 perfumes");
    expect(printed).toContain("  Inventory          0");
    expect(printed).toContain("  Online source ○ offline");
    expect(process.exitCode).toBeUndefined();
  });

  it("adds a saved perfume to the inventory file", async () => {
    await run("inventory", "add", chance.id);

    expect(printed).toContain(`  ✔  ${chance.id} added`);
    expect(JSON.parse(await readFile(join(dataDir, "inventory.json"), "utf8"))).toEqual([chance.id]);
  });

  it("sets a failing exit code for an unknown perfume and writes nothing", async () => {
    await run("inventory", "add", "fragella:nobody:nothing");

    expect(process.exitCode).toBe(1);
    expect(await readdir(dataDir)).toEqual(["catalog.json"]);
  });
});
