// ═══════════════════════════════════════════════════════════════
// Scentify — Recommender Configuration
// apps/recommender/src/config.ts
// ═══════════════════════════════════════════════════════════════

import { z } from "zod";

const configSchema = z.object({
  dataDir: z.string().min(1).default("data"),
  apiKey: z.string().optional().default(""),
  apiBaseUrl: z.string().url().default("https://api.fragella.com/api/v1"),
  sourceName: z
    .string()
    .regex(/^[a-z0-9-]+$/, "must be lower-case letters, digits or dashes")
    .default("fragella"),
  searchLimit: z.coerce.number().int().min(1).max(20).default(20),
  questionnaireLimit: z.coerce.number().int().positive().default(8),
  similarLimit: z.coerce.number().int().positive().default(4),
  warmTarget: z.coerce.number().int().min(0).default(300),
  timeoutMs: z.coerce.number().int().positive().default(15_000),
  debug: z
    .string()
    .transform((v) => v === "true")
    .default("false"),
});

export type AppConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = {
    dataDir: env.SCENTIFY_DATA_DIR,
    apiKey: env.FRAGELLA_API_KEY,
    apiBaseUrl: env.FRAGELLA_BASE_URL,
    sourceName: env.SCENTIFY_SOURCE,
    searchLimit: env.SCENTIFY_SEARCH_LIMIT,
    questionnaireLimit: env.SCENTIFY_QUESTIONNAIRE_LIMIT,
    similarLimit: env.SCENTIFY_SIMILAR_LIMIT,
    warmTarget: env.SCENTIFY_WARM_TARGET,
    timeoutMs: env.SCENTIFY_TIMEOUT_MS,
    debug: env.SCENTIFY_DEBUG,
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`[Config] Invalid configuration:\n${errors}`);
  }

  return result.data;
}
