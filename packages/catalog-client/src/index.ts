// ═══════════════════════════════════════════════════════════════
// Scentify — Catalog Client Barrel Export
// packages/catalog-client/src/index.ts
//
// Public API surface:
//   import { FragranceCatalogClient } from "@scentify/catalog-client";
// ═══════════════════════════════════════════════════════════════

export { FragranceCatalogClient } from "./fragranceClient";

// ─── HTTP Client (for advanced usage) ───
export { HttpClient, CatalogApiError, retryDelayMs } from "./httpClient";
export type { QueryParams } from "./httpClient";

// ─── Types ───
export {
  DEFAULT_CLIENT_CONFIG,
  MIN_QUERY_LENGTH,
  MAX_RESULTS_PER_QUERY,
} from "./types";
export type { CatalogClientConfig, CatalogProvider, SourceRecord } from "./types";
