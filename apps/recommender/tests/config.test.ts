// ═══════════════════════════════════════════════════════════════
// Scentify — Configuration Tests
// apps/recommender/tests/config.test.ts
// ═══════════════════════════════════════════════════════════════

import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config";

describe("loadConfig", () => {
  it("fills every setting from defaults", () => {
    expect(loadConfig({})).toEqual({
      dataDir: "data",
      apiKey: "",
      apiBaseUrl: "https://api.fragella.com/api/v1",
      sourceName: "fragella",
      searchLimit: 20,
      questionnaireLimit: 8,
      similarLimit: 4,
      warmTarget: 300,
      timeoutMs: 15_000,
      debug: false,
    });
  });

  it("reads and coerces environment variables", () => {
    const config = loadConfig({
      SCENTIFY_DATA_DIR: "/tmp/scentify",
      FRAGELLA_API_KEY: "test-key",
      SCENTIFY_SEARCH_LIMIT: "10",
      SCENTIFY_WARM_TARGET: "0",
      SCENTIFY_DEBUG: "true",
    });

    expect(config).toMatchObject({
      dataDir: "/tmp/scentify",
      apiKey: "test-key",
      searchLimit: 10,
      warmTarget: 0,
      debug: true,
    });
  });

  it("names each invalid setting", () => {
    expect(() => loadConfig({ SCENTIFY_SEARCH_LIMIT: "50" })).toThrow(
      "[Config] Invalid configuration:\n  searchLimit: Number must be less than or equal to 20"
    );
    expect(() => loadConfig({ SCENTIFY_SOURCE: "Bad Source" })).toThrow(
      "sourceName: must be lower-case letters, digits or dashes"
    );
  });
});
