// ── Retry with Exponential Backoff ───────────────────────
// Used for embedding calls only. Chat backend calls are never retried:
// a failed turn is reported once, as an apology.

import { log } from "../logger.js";

export interface RetryOptions {
  /** Max number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in ms (default: 500), doubled on each retry */
  baseDelayMs?: number;
  /** HTTP status codes that trigger a retry */
  retryableStatuses?: number[];
  /** Label for logging (e.g. "Pinecone embed") */
  label?: string;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  baseDelayMs: 500,
  retryableStatuses: [429, 500, 502, 503, 504],
  label: "API call",
};

/**
 * Run `fn`, retrying network errors and retryable HTTP statuses with
 * exponential backoff. Any other error is rethrown at once.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const { maxRetries, baseDelayMs, retryableStatuses, label } = {
    ...DEFAULT_OPTIONS,
    ...opts,
  };

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (!isRetryable(error, retryableStatuses) || attempt === maxRetries) {
        break;
      }

      const delayMs = baseDelayMs * Math.pow(2, attempt);
      log.warn(
        {
          label,
          status: getStatusCode(error),
          delayMs,
          attempt: attempt + 1,
          maxRetries,
        },
        "⚠️ Retrying call",
      );
      await sleep(delayMs);
    }
  }

  throw lastError;
}

// ── Helpers ──────────────────────────────────────────────

export function isRetryable(
  error: unknown,
  retryableStatuses: number[] = DEFAULT_OPTIONS.retryableStatuses,
): boolean {
  // fetch() raises TypeError on network failure
  if (error instanceof TypeError) return true;
  if (error instanceof Error && /ECONNRESET|ETIMEDOUT|EAI_AGAIN/.test(error.message))
    return true;

  const status = getStatusCode(error);
  return status !== undefined && retryableStatuses.includes(status);
}

/** `status` (openai, Pinecone) or `statusCode` (others), when numeric. */
export function getStatusCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
