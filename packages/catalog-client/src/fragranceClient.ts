// ═══════════════════════════════════════════════════════════════
// Scentify — Fragrance Catalog Client
// packages/catalog-client/src/fragranceClient.ts
//
// Query-by-text-or-brand against the external fragrance catalog.
// Returns raw provider records untouched; normalization is the
// consumer's job.
// ═══════════════════════════════════════════════════════════════

import { z } from "zod";
import { CatalogApiError, HttpClient } from "./httpClient";
import {
  type CatalogClientConfig,
  type CatalogProvider,
  MAX_RESULTS_PER_QUERY,
  MIN_QUERY_LENGTH,
} from "./types";

const searchResponseSchema = z.array(z.unknown());

export class FragranceCatalogClient implements CatalogProvider {
  private http: HttpClient;

  constructor(config: CatalogClientConfig) {
    if (!config.apiKey) {
      throw new Error("[CatalogClient] apiKey is required");
    }
    this.http = new HttpClient(config);
  }

  /**
   * Search fragrances by name, brand or scent term.
   *
   * Queries shorter than three characters resolve to an empty list
   * without touching the network.
   *
   * @throws CatalogApiError on a 4xx, on 5xx/429 after retries, or
   *         when the body is not a list of records.
   */
  async searchFragrances(query: string, limit: number = MAX_RESULTS_PER_QUERY): Promise<unknown[]> {
    const trimmed = query.trim();
    if (trimmed.length < MIN_QUERY_LENGTH) {
      return [];
    }

    const body = await this.http.getJson("/fragrances", {
      search: trimmed,
      limit: clampLimit(limit),
    });

    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CatalogApiError(
        "Catalog API returned an unexpected body (expected a list of fragrances)",
        200,
        undefined,
        safeStringify(body)
      );
    }
    return parsed.data;
  }
}

function clampLimit(limit: number): number {
  if (!Number.isFinite(limit)) return MAX_RESULTS_PER_QUERY;
  return Math.max(1, Math.min(MAX_RESULTS_PER_QUERY, Math.floor(limit)));
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? "";
  } catch {
    return String(value);
  }
}
