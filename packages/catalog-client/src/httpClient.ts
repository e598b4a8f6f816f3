// ═══════════════════════════════════════════════════════════════
// Scentify — Catalog HTTP Client
// packages/catalog-client/src/httpClient.ts
//
// GET-only JSON client for the fragrance catalog provider. Each
// attempt has its own timeout; 429/5xx responses and network
// failures are retried with a bounded wait, 4xx fails at once.
// ═══════════════════════════════════════════════════════════════

import { type CatalogClientConfig, DEFAULT_CLIENT_CONFIG } from "./types";

// ─────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────

export type QueryParams = Record<string, string | number | undefined>;

export class CatalogApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public requestId?: string,
    public responseBody?: string
  ) {
    super(message);
    this.name = "CatalogApiError";
  }
}

type Attempt =
  | { ok: true; body: unknown }
  | { ok: false; error: Error; retryAfter: string | null };

// ─────────────────────────────────────────────────────────────
// CLIENT
// ─────────────────────────────────────────────────────────────

export class HttpClient {
  private baseUrl: string;
  private headers: Record<string, string>;
  private timeoutMs: number;
  private retries: number;
  private retryBackoffMs: number;
  private maxRetryDelayMs: number;
  private debug: boolean;

  constructor(config: CatalogClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.headers = { Accept: "application/json", "x-api-key": config.apiKey };
    this.timeoutMs = config.timeoutMs ?? DEFAULT_CLIENT_CONFIG.timeoutMs;
    this.retries = config.retries ?? DEFAULT_CLIENT_CONFIG.retries;
    this.retryBackoffMs = config.retryBackoffMs ?? DEFAULT_CLIENT_CONFIG.retryBackoffMs;
    this.maxRetryDelayMs = config.maxRetryDelayMs ?? DEFAULT_CLIENT_CONFIG.maxRetryDelayMs;
    this.debug = config.debug ?? DEFAULT_CLIENT_CONFIG.debug;
  }

  /**
   * GET `path` and return the parsed JSON body, untyped.
   *
   * @throws CatalogApiError on a 4xx, or on a 429/5xx once retries run out
   * @throws the last network/timeout error once retries run out
   */
  async getJson(path: string, query: QueryParams = {}): Promise<unknown> {
    const url = this.buildUrl(path, query);

    for (let attempt = 0; ; attempt++) {
      const result = await this.attempt(url, attempt);
      if (result.ok) return result.body;
      if (attempt >= this.retries) throw result.error;

      const waitMs = retryDelayMs(result.retryAfter, attempt, this.retryBackoffMs, this.maxRetryDelayMs);
      this.trace(`Retrying in ${waitMs}ms: ${result.error.message}`);
      await sleep(waitMs);
    }
  }

  // ─── Internal ───

  private async attempt(url: string, attempt: number): Promise<Attempt> {
    this.trace(`GET ${url} (attempt ${attempt + 1})`);

    let response: Response;
    try {
      // A fresh signal per attempt: a timed-out signal stays aborted.
      response = await fetch(url, {
        method: "GET",
        headers: this.headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      return { ok: false, error: toError(err), retryAfter: null };
    }

    if (response.ok) {
      try {
        return { ok: true, body: await response.json() };
      } catch (err) {
        return { ok: false, error: toError(err), retryAfter: null };
      }
    }

    const error = new CatalogApiError(
      `Catalog API error: ${response.status} ${response.statusText}`,
      response.status,
      response.headers.get("x-request-id") ?? undefined,
      await readText(response)
    );
    if (response.status === 429 || response.status >= 500) {
      return { ok: false, error, retryAfter: response.headers.get("retry-after") };
    }
    throw error;
  }

  private buildUrl(path: string, query: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private trace(message: string): void {
    if (this.debug) console.log(`[CatalogClient] ${message}`);
  }
}

// ─────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────

/**
 * Wait before the next attempt. A Retry-After header (delta seconds
 * or HTTP-date) wins over exponential backoff; either way the wait
 * is clamped to [0, maxMs].
 */
export function retryDelayMs(
  retryAfter: string | null,
  attempt: number,
  backoffMs: number,
  maxMs: number,
  now: number = Date.now()
): number {
  let delay = backoffMs * 2 ** attempt;
  const header = retryAfter?.trim();
  if (header) {
    if (/^\d+$/.test(header)) {
      delay = Number(header) * 1000;
    } else {
      const at = Date.parse(header);
      if (!Number.isNaN(at)) delay = at - now;
    }
  }
  return Math.min(Math.max(delay, 0), maxMs);
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

async function readText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return "";
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
