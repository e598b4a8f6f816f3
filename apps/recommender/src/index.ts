// ═══════════════════════════════════════════════════════════════
// Scentify — Recommender Entry Point
// apps/recommender/src/index.ts
//
// Public API surface:
//   import { createRecommenderFromEnv } from "@scentify/recommender";
//   const recommender = await createRecommenderFromEnv();
//   const { perfumes } = await recommender.search("rose");
// ═══════════════════════════════════════════════════════════════

import { join } from "node:path";
import type { InteractionEvent, Perfume } from "@scentify/types";
import { FragranceCatalogClient } from "@scentify/catalog-client";
import { loadConfig, type AppConfig } from "./config";
import { CatalogStore } from "./services/catalogStore";
import { InteractionLog } from "./services/interactionLog";
import { Inventory } from "./services/inventory";
import { Recommender } from "./services/recommender";
import { JsonFileStore } from "./storage/documentStore";
import {
  catalogDocumentSchema,
  interactionDocumentSchema,
  inventoryDocumentSchema,
} from "./storage/schemas";

// ─── Bootstrap ───

/** Document file names inside the data directory. */
export const DOCUMENT_FILES = {
  catalog: "catalog.json",
  interactions: "interactions.json",
  inventory: "inventory.json",
} as const;

/**
 * Wire config → document stores → provider → Recommender and load
 * the saved state. Without an API key the recommender runs offline
 * against the saved catalog.
 */
export async function createRecommenderFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Promise<Recommender> {
  const config = loadConfig(env);
  const recommender = createRecommender(config);
  await recommender.initialize();
  return recommender;
}

export function createRecommender(config: AppConfig): Recommender {
  const catalog = new CatalogStore(
    new JsonFileStore<Perfume[]>(join(config.dataDir, DOCUMENT_FILES.catalog), catalogDocumentSchema, () => [])
  );
  const interactions = new InteractionLog(
    new JsonFileStore<InteractionEvent[]>(
      join(config.dataDir, DOCUMENT_FILES.interactions),
      interactionDocumentSchema,
      () => []
    )
  );
  const inventory = new Inventory(
    new JsonFileStore<string[]>(join(config.dataDir, DOCUMENT_FILES.inventory), inventoryDocumentSchema, () => [])
  );

  const provider = config.apiKey
    ? new FragranceCatalogClient({
        baseUrl: config.apiBaseUrl,
        apiKey: config.apiKey,
        timeoutMs: config.timeoutMs,
        debug: config.debug,
      })
    : undefined;
  if (!provider) {
    console.warn("[Recommender] FRAGELLA_API_KEY not set; running offline.");
  }

  return new Recommender(
    { catalog, interactions, inventory, provider },
    {
      sourceName: config.sourceName,
      searchLimit: config.searchLimit,
      questionnaireLimit: config.questionnaireLimit,
      similarLimit: config.similarLimit,
      warmTarget: config.warmTarget,
    }
  );
}

// ─── Services ───
export { Recommender } from "./services/recommender";
export type {
  RecommenderDeps,
  RecommenderStats,
  QuestionnaireOptions,
} from "./services/recommender";
export { CatalogStore } from "./services/catalogStore";
export type { UpsertOutcome, UpsertSummary } from "./services/catalogStore";
export { InteractionLog, isActionKind } from "./services/interactionLog";
export type { Clock } from "./services/interactionLog";
export { Inventory } from "./services/inventory";
export { PopularityScorer } from "./services/popularityScorer";
export { ProfileEngine } from "./services/profileEngine";
export { SimilarityEngine } from "./services/similarityEngine";
export type { SimilarOptions } from "./services/similarityEngine";
export { RankingEngine } from "./services/rankingEngine";
export {
  normalizeRecord,
  normalizeRecordWithIssues,
  classifyScentType,
  slugify,
} from "./services/recordNormalizer";
export type { NormalizeOptions, NormalizedRecord } from "./services/recordNormalizer";
export {
  buildFilterPredicates,
  matchesText,
  hasGender,
  hasScentType,
  inPriceRange,
} from "./services/filters";

// ─── Storage ───
export { JsonFileStore, MemoryDocumentStore } from "./storage/documentStore";
export type { DocumentStore } from "./storage/documentStore";
export {
  perfumeSchema,
  interactionEventSchema,
  catalogDocumentSchema,
  interactionDocumentSchema,
  inventoryDocumentSchema,
} from "./storage/schemas";

// ─── Config & Errors ───
export { loadConfig } from "./config";
export type { AppConfig } from "./config";
export {
  ErrorKind,
  RecommenderError,
  DataQualityError,
  LookupError,
  InvalidInputError,
  TransportError,
} from "./errors";
export type { InvalidInputReason } from "./errors";
export { NORMALIZER_DEFAULTS, WARM_SEARCH_TERMS } from "./config/defaults";
export {
  ACCORD_AXIS_RULES,
  CHARACTER_BY_GENDER,
  NOTE_TIER_WEIGHTS,
  SIMILARITY_BONUS,
} from "./config/weights";

// ─── Types ───
export { DEFAULT_RECOMMENDER_CONFIG } from "./types";
export type {
  SearchFilters,
  PerfumePredicate,
  SimilarityContext,
  RankMode,
  RankedPerfume,
  ProfileMatch,
  SimilarMatch,
  QuestionnaireAnswers,
  LookupResult,
  SearchOptions,
  ExternalQueryStatus,
  SearchResult,
  InventoryChange,
  IngestReport,
  WarmReport,
  RecommenderConfig,
} from "./types";
