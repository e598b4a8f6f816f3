// ═══════════════════════════════════════════════════════════════
// Scentify — Catalog Client Types
// packages/catalog-client/src/types.ts
// ═══════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────
// CLIENT CONFIGURATION
// ─────────────────────────────────────────────────────────────

/** Catalog client configuration. */
export interface CatalogClientConfig {
  /** Provider API base URL, e.g. "https://api.fragella.com/api/v1". */
  baseUrl: string;
  /** Provider API key, sent as the x-api-key header. */
  apiKey: string;
  /** Request timeout in milliseconds. Default: 15_000. */
  timeoutMs?: number;
  /** Number of retries on transient failures. Default: 2. */
  retries?: number;
  /** Retry backoff base in ms. Default: 500. */
  retryBackoffMs?: number;
  /** Upper bound on any wait between retries, Retry-After included. Default: 5_000. */
  maxRetryDelayMs?: number;
  /** Enable debug logging. Default: false. */
  debug?: boolean;
}

export const DEFAULT_CLIENT_CONFIG: Required<
  Pick<CatalogClientConfig, "timeoutMs" | "retries" | "retryBackoffMs" | "maxRetryDelayMs" | "debug">
> = {
  timeoutMs: 15_000,
  retries: 2,
  retryBackoffMs: 500,
  maxRetryDelayMs: 5_000,
  debug: false,
};

// ─────────────────────────────────────────────────────────────
// SEARCH
// ─────────────────────────────────────────────────────────────

/** Shortest query the provider accepts. */
export const MIN_QUERY_LENGTH = 3;

/** Provider-side cap on results per request. */
export const MAX_RESULTS_PER_QUERY = 20;

/**
 * One catalog entry as the provider returns it. The shape is not
 * guaranteed; consumers normalize it before use.
 */
export type SourceRecord = Record<string, unknown>;

/** Anything that can answer a text/brand query with raw records. */
export interface CatalogProvider {
  searchFragrances(query: string, limit?: number): Promise<unknown[]>;
}
