// ═══════════════════════════════════════════════════════════════
// Scentify — Recommender Errors
// apps/recommender/src/errors.ts
//
// Failure taxonomy for the core. Only InvalidInputError is thrown
// at the boundary; the others are returned or reported:
//   DATA_QUALITY → collected as issues, degraded to defaults
//   LOOKUP       → { success: false, error } results
//   TRANSPORT    → caught at ingestion, surfaced as stale data
// ═══════════════════════════════════════════════════════════════

export enum ErrorKind {
  DATA_QUALITY = "DATA_QUALITY",
  LOOKUP = "LOOKUP",
  INVALID_INPUT = "INVALID_INPUT",
  TRANSPORT = "TRANSPORT",
}

export type InvalidInputReason =
  | "InvalidAction"
  | "InvalidItemId"
  | "InvalidAnswers"
  | "AnswerOutOfRange"
  | "InvalidFilter"
  | "InvalidLimit";

export abstract class RecommenderError extends Error {
  abstract readonly kind: ErrorKind;
}

/** A malformed or missing field in an external record. */
export class DataQualityError extends RecommenderError {
  readonly kind = ErrorKind.DATA_QUALITY;

  constructor(
    public field: string,
    message: string,
    public recordName?: string
  ) {
    super(message);
    this.name = "DataQualityError";
  }
}

/** Unknown item identifier, usually a stale reference held by the UI. */
export class LookupError extends RecommenderError {
  readonly kind = ErrorKind.LOOKUP;

  constructor(public itemId: string) {
    super(`Perfume not found: ${itemId}`);
    this.name = "LookupError";
  }
}

export class InvalidInputError extends RecommenderError {
  readonly kind = ErrorKind.INVALID_INPUT;

  constructor(
    public reason: InvalidInputReason,
    message: string
  ) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/** The external catalog provider could not be reached or answered badly. */
export class TransportError extends RecommenderError {
  readonly kind = ErrorKind.TRANSPORT;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "TransportError";
  }
}
