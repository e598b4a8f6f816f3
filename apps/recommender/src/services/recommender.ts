// ═══════════════════════════════════════════════════════════════
// Scentify — Recommender
// apps/recommender/src/services/recommender.ts
//
// The only object the UI layer holds. Orchestrates:
//   1. Search      provider fetch → normalize → upsert → filter → rank → page
//   2. Feedback    interaction events feeding the popularity signal
//   3. Profile     questionnaire answers → closest perfumes
//   4. Similar     neighbours of one perfume
//   5. Inventory   the user's own collection
//
// Every collaborator is injected; no module-level state.
// ═══════════════════════════════════════════════════════════════

import {
  ActionKind,
  type InteractionEvent,
  type Perfume,
} from "@scentify/types";
import { MIN_QUERY_LENGTH, type CatalogProvider } from "@scentify/catalog-client";
import { WARM_SEARCH_TERMS } from "../config/defaults";
import {
  DataQualityError,
  InvalidInputError,
  LookupError,
  TransportError,
} from "../errors";
import {
  DEFAULT_RECOMMENDER_CONFIG,
  type ExternalQueryStatus,
  type IngestReport,
  type InventoryChange,
  type LookupResult,
  type ProfileMatch,
  type QuestionnaireAnswers,
  type RankMode,
  type RecommenderConfig,
  type SearchFilters,
  type SearchOptions,
  type SearchResult,
  type SimilarMatch,
  type SimilarityContext,
  type WarmReport,
} from "../types";
import type { CatalogStore } from "./catalogStore";
import { buildFilterPredicates, matchesText } from "./filters";
import { assertValidInteraction, type InteractionLog } from "./interactionLog";
import type { Inventory } from "./inventory";
import { PopularityScorer } from "./popularityScorer";
import { ProfileEngine } from "./profileEngine";
import { RankingEngine } from "./rankingEngine";
import { isRecord, normalizeRecordWithIssues } from "./recordNormalizer";
import { SimilarityEngine } from "./similarityEngine";

// ─────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────

export interface RecommenderDeps {
  catalog: CatalogStore;
  interactions: InteractionLog;
  inventory: Inventory;
  /** Omit to run offline against the saved catalog only. */
  provider?: CatalogProvider;
  profiles?: ProfileEngine;
  similarity?: SimilarityEngine;
}

export interface QuestionnaireOptions {
  /** Defaults to the configured questionnaire limit. */
  limit?: number;
  /** Restrict candidates before matching. */
  filters?: SearchFilters;
}

export interface RecommenderStats {
  catalogSize: number;
  interactionCount: number;
  inventorySize: number;
  providerConfigured: boolean;
}

interface ExternalOutcome {
  status: ExternalQueryStatus;
  notice?: string;
}

// ─────────────────────────────────────────────────────────────
// SERVICE
// ─────────────────────────────────────────────────────────────

export class Recommender {
  private config: RecommenderConfig;
  private catalog: CatalogStore;
  private interactions: InteractionLog;
  private inventory: Inventory;
  private provider: CatalogProvider | undefined;
  private popularity: PopularityScorer;
  private profiles: ProfileEngine;
  private similarity: SimilarityEngine;
  private ranker: RankingEngine;

  constructor(deps: RecommenderDeps, config?: Partial<RecommenderConfig>) {
    this.config = { ...DEFAULT_RECOMMENDER_CONFIG, ...config };
    this.catalog = deps.catalog;
    this.interactions = deps.interactions;
    this.inventory = deps.inventory;
    this.provider = deps.provider;
    this.popularity = new PopularityScorer(this.interactions);
    this.profiles = deps.profiles ?? new ProfileEngine();
    this.similarity = deps.similarity ?? new SimilarityEngine();
    this.ranker = new RankingEngine(this.catalog, this.popularity, this.profiles, this.similarity);
  }

  /**
   * Load the catalog, interaction log and inventory documents.
   * Call once before anything else.
   */
  async initialize(): Promise<void> {
    await Promise.all([this.catalog.load(), this.interactions.load(), this.inventory.load()]);
    console.log("[Recommender] Initialized.", this.stats());
  }

  // ═══════════════════════════════════════════
  // SEARCH
  // ═══════════════════════════════════════════

  /**
   * Search the catalog, growing it from the provider first when the
   * query is long enough. A provider failure never fails the search;
   * the result is marked stale and served from what is already held.
   *
   * @throws InvalidInputError (InvalidFilter | InvalidLimit)
   */
  async search(
    query: string,
    filters: SearchFilters = {},
    options: SearchOptions = {}
  ): Promise<SearchResult> {
    const predicates = buildFilterPredicates(filters);
    const { offset = 0, limit } = options;
    assertPaging(offset, limit);

    const trimmed = query.trim();
    const external = await this.queryProvider(trimmed);

    const subset = this.catalog.filter(matchesText(trimmed), ...predicates);
    const ranked = this.ranker.rank(subset, options.mode);
    const page = ranked.slice(offset, limit === undefined ? undefined : offset + limit);

    const result: SearchResult = {
      perfumes: page.map((r) => r.perfume),
      total: ranked.length,
      external: external.status,
      stale: external.status === "failed",
    };
    if (external.notice !== undefined) result.notice = external.notice;
    return result;
  }

  /**
   * Normalize raw provider records into the catalog. Entries that
   * are not key/value records are counted and skipped.
   */
  async ingest(records: readonly unknown[]): Promise<IngestReport> {
    const perfumes: Perfume[] = [];
    const issues: DataQualityError[] = [];
    let skipped = 0;

    for (const record of records) {
      if (!isRecord(record)) {
        skipped++;
        continue;
      }
      const normalized = normalizeRecordWithIssues(record, { source: this.config.sourceName });
      perfumes.push(normalized.perfume);
      issues.push(...normalized.issues);
    }

    if (skipped > 0) {
      console.warn(`[Recommender] Skipped ${skipped} catalog entries that are not records.`);
    }
    if (issues.length > 0) {
      console.warn(
        `[Recommender] ${issues.length} data-quality issues while ingesting ${perfumes.length} records:`,
        issues.map((i) => `${i.recordName ?? "?"} ${i.field}: ${i.message}`)
      );
    }

    const summary = await this.catalog.upsertMany(perfumes);
    return {
      ...summary,
      skipped,
      issues,
      perfumeIds: [...new Set(perfumes.map((p) => p.id))],
    };
  }

  /**
   * Seed the catalog by querying popular houses and scent families
   * until it holds `warmTarget` perfumes or the terms run out.
   */
  async warmCatalog(terms: readonly string[] = WARM_SEARCH_TERMS): Promise<WarmReport> {
    const failures: TransportError[] = [];
    let termsQueried = 0;

    const provider = this.provider;
    if (!provider) {
      console.warn("[Recommender] No catalog provider configured; nothing to warm.");
      return { termsQueried, catalogSize: this.catalog.size, failures };
    }

    for (const term of terms) {
      if (this.catalog.size >= this.config.warmTarget) break;
      termsQueried++;
      const result = await this.fetchAndIngest(term, provider);
      if (result instanceof TransportError) failures.push(result);
    }

    console.log(
      `[Recommender] Warmed catalog: ${this.catalog.size} perfumes after ${termsQueried} queries (${failures.length} failed).`
    );
    return { termsQueried, catalogSize: this.catalog.size, failures };
  }

  // ═══════════════════════════════════════════
  // FEEDBACK
  // ═══════════════════════════════════════════

  /**
   * Log an interaction with a perfume the catalog holds.
   *
   * @throws InvalidInputError (InvalidAction | InvalidItemId)
   */
  async recordInteraction(itemId: string, action: string): Promise<LookupResult<InteractionEvent>> {
    assertValidInteraction(itemId, action);
    if (!this.catalog.has(itemId)) return notFound(itemId);

    const event = await this.interactions.record(itemId, action);
    return { success: true, value: event };
  }

  // ═══════════════════════════════════════════
  // PROFILE & SIMILARITY
  // ═══════════════════════════════════════════

  /**
   * Best catalog matches for a questionnaire.
   *
   * @throws InvalidInputError (InvalidAnswers | AnswerOutOfRange | InvalidFilter | InvalidLimit)
   */
  submitQuestionnaire(answers: QuestionnaireAnswers, options: QuestionnaireOptions = {}): ProfileMatch[] {
    const profile = this.profiles.profileFromAnswers(answers);
    const limit = options.limit ?? this.config.questionnaireLimit;
    assertPaging(0, limit);

    const candidates = this.catalog.filter(...buildFilterPredicates(options.filters));
    return this.profiles.match(profile, candidates, this.popularity.scoreAll()).slice(0, limit);
  }

  /**
   * Up to k perfumes similar to one already in the catalog.
   *
   * @throws InvalidInputError (InvalidLimit)
   */
  similarTo(
    itemId: string,
    k: number = this.config.similarLimit,
    context?: SimilarityContext
  ): LookupResult<SimilarMatch[]> {
    const anchor = this.catalog.get(itemId);
    if (!anchor) return notFound(itemId);

    const matches = this.similarity.similar(anchor, this.catalog.all(), k, {
      popularity: this.popularity.scoreAll(),
      context,
    });
    return { success: true, value: matches };
  }

  getPerfume(itemId: string): LookupResult<Perfume> {
    const perfume = this.catalog.get(itemId);
    return perfume ? { success: true, value: perfume } : notFound(itemId);
  }

  /** Rank an arbitrary filtered slice of the catalog. */
  rank(filters: SearchFilters = {}, mode?: RankMode): Perfume[] {
    return this.ranker.rankFiltered(filters, mode).map((r) => r.perfume);
  }

  // ═══════════════════════════════════════════
  // INVENTORY
  // ═══════════════════════════════════════════

  /** First add also counts as an add_to_inventory interaction. */
  async addToInventory(itemId: string): Promise<LookupResult<InventoryChange>> {
    if (!this.catalog.has(itemId)) return notFound(itemId);

    const changed = await this.inventory.add(itemId);
    if (changed) await this.interactions.record(itemId, ActionKind.ADD_TO_INVENTORY);
    return { success: true, value: { itemId, changed } };
  }

  /** Stale identifiers (no longer in the catalog) can still be removed. */
  async removeFromInventory(itemId: string): Promise<LookupResult<InventoryChange>> {
    const changed = await this.inventory.remove(itemId);
    if (!changed && !this.catalog.has(itemId)) return notFound(itemId);
    return { success: true, value: { itemId, changed } };
  }

  /** Inventory perfumes in the order they were added. */
  listInventory(): Perfume[] {
    const perfumes: Perfume[] = [];
    for (const id of this.inventory.ids()) {
      const perfume = this.catalog.get(id);
      if (perfume) perfumes.push(perfume);
      else console.warn(`[Recommender] Inventory references unknown perfume ${id}; skipping.`);
    }
    return perfumes;
  }

  stats(): RecommenderStats {
    return {
      catalogSize: this.catalog.size,
      interactionCount: this.interactions.size,
      inventorySize: this.inventory.size,
      providerConfigured: this.provider !== undefined,
    };
  }

  // ─────────────────────────────────────────────────────────
  // PROVIDER
  // ─────────────────────────────────────────────────────────

  private async queryProvider(query: string): Promise<ExternalOutcome> {
    if (query.length < MIN_QUERY_LENGTH) {
      return query === ""
        ? { status: "skipped" }
        : {
            status: "skipped",
            notice: `Type at least ${MIN_QUERY_LENGTH} characters to search the online catalog.`,
          };
    }
    if (!this.provider) {
      return { status: "skipped", notice: "Online catalog is not configured; showing saved perfumes." };
    }

    const result = await this.fetchAndIngest(query, this.provider);
    if (result instanceof TransportError) {
      return { status: "failed", notice: "Online catalog is unavailable; results may be out of date." };
    }
    return { status: "issued" };
  }

  /** Provider errors come back as a TransportError value; storage errors propagate. */
  private async fetchAndIngest(
    query: string,
    provider: CatalogProvider
  ): Promise<IngestReport | TransportError> {
    let records: unknown[];
    try {
      records = await provider.searchFragrances(query, this.config.searchLimit);
    } catch (err) {
      const error = new TransportError(`Catalog provider request for "${query}" failed`, err);
      console.warn(`[Recommender] ${error.message}; serving the saved catalog.`, err);
      return error;
    }
    return this.ingest(records);
  }
}

// ─────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────

function notFound<T>(itemId: string): LookupResult<T> {
  return { success: false, error: new LookupError(itemId) };
}

function assertPaging(offset: number, limit: number | undefined): void {
  if (!Number.isInteger(offset) || offset < 0) {
    throw new InvalidInputError("InvalidLimit", `offset must be a non-negative integer, got ${offset}`);
  }
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new InvalidInputError("InvalidLimit", `limit must be a positive integer, got ${limit}`);
  }
}
