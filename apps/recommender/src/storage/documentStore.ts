// ═══════════════════════════════════════════════════════════════
// Scentify — Document Storage
// apps/recommender/src/storage/documentStore.ts
//
// Each durable collection (catalog snapshot, interaction log,
// inventory) is one JSON document, read once at start and
// rewritten whole on every mutation. Swap the adapter to move the
// documents elsewhere; the JSON shape is the compatibility surface.
// ═══════════════════════════════════════════════════════════════

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { z } from "zod";
import { SerialQueue } from "./serialQueue";

/* ==========================================================
   STORAGE INTERFACE
   ========================================================== */

export interface DocumentStore<T> {
  load(): Promise<T>;
  save(value: T): Promise<void>;
  /** Human-readable location, for logs. */
  readonly location: string;
}

/* ==========================================================
   IN-MEMORY ADAPTER (tests, ephemeral sessions)
   ========================================================== */

export class MemoryDocumentStore<T> implements DocumentStore<T> {
  readonly location: string;
  /** Number of completed saves. */
  saveCount = 0;
  private value: T;

  constructor(initial: T, location = "memory") {
    this.value = structuredClone(initial);
    this.location = location;
  }

  async load(): Promise<T> {
    return structuredClone(this.value);
  }

  async save(value: T): Promise<void> {
    this.value = structuredClone(value);
    this.saveCount++;
  }

  /** Current stored value, without going through load(). */
  peek(): T {
    return structuredClone(this.value);
  }
}

/* ==========================================================
   JSON FILE ADAPTER
   ========================================================== */

export class JsonFileStore<T> implements DocumentStore<T> {
  readonly location: string;
  private schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private empty: () => T;
  /** Writes to one file run one at a time, in call order. */
  private writes = new SerialQueue();

  constructor(
    filePath: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    empty: () => T
  ) {
    this.location = filePath;
    this.schema = schema;
    this.empty = empty;
  }

  /**
   * Read and validate the document. A missing file is an empty
   * collection. Invalid JSON or a schema mismatch moves the file
   * aside to `<file>.corrupt` and reads as empty, so the next save
   * cannot overwrite the only copy. Any other read error (EACCES,
   * EISDIR) is rethrown and the file is left alone.
   */
  async load(): Promise<T> {
    let text: string;
    try {
      text = await readFile(this.location, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return this.empty();
      console.error(`[DocumentStore] Cannot read ${this.location}:`, err);
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      console.warn(`[DocumentStore] ${this.location} is not valid JSON:`, err);
      await this.quarantine();
      return this.empty();
    }

    const parsed = this.schema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .slice(0, 5)
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      console.warn(`[DocumentStore] ${this.location} failed validation: ${issues}`);
      await this.quarantine();
      return this.empty();
    }

    return parsed.data;
  }

  /**
   * Replace the document atomically: write a sibling temp file,
   * then rename it over the target. A crash mid-write leaves the
   * previous version intact.
   */
  save(value: T): Promise<void> {
    const payload = `${JSON.stringify(value, null, 2)}\n`;
    return this.writes.run(() => this.writeAtomic(payload));
  }

  // ─── Internal ───

  private async writeAtomic(payload: string): Promise<void> {
    const tmpPath = `${this.location}.${process.pid}.tmp`;
    await mkdir(dirname(this.location), { recursive: true });
    try {
      await writeFile(tmpPath, payload, "utf8");
      await rename(tmpPath, this.location);
    } catch (err) {
      console.error(`[DocumentStore] Write to ${this.location} failed:`, err);
      await rm(tmpPath, { force: true });
      throw err;
    }
  }

  private async quarantine(): Promise<void> {
    const aside = `${this.location}.corrupt`;
    try {
      await rename(this.location, aside);
      console.warn(`[DocumentStore] Moved unreadable document to ${aside}`);
    } catch (err) {
      console.error(`[DocumentStore] Could not move ${this.location} aside:`, err);
      throw err;
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
