// ── Error Taxonomy ───────────────────────────────────────
// Expression errors never leave the calculator (they become a
// CalculationResult); retrieval and backend errors are caught by the
// chat session and turned into persona replies.

export class ParseError extends Error {
  override name = "ParseError";
}

export class UnsupportedOperationError extends Error {
  override name = "UnsupportedOperationError";
}

export class DivisionByZeroError extends Error {
  override name = "DivisionByZeroError";

  constructor() {
    super("division by zero");
  }
}

/** Embedding or index failure. Callers degrade to "no facts". */
export class RetrievalUnavailableError extends Error {
  override name = "RetrievalUnavailableError";
}

export class BackendAuthError extends Error {
  override name = "BackendAuthError";
}

/** Rate limit or exhausted quota. */
export class BackendQuotaError extends Error {
  override name = "BackendQuotaError";
}

export class BackendOtherError extends Error {
  override name = "BackendOtherError";
}

export type BackendError =
  | BackendAuthError
  | BackendQuotaError
  | BackendOtherError;

/** Best-effort human readable message for any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
