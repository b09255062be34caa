import {
  BackendAuthError,
  BackendOtherError,
  BackendQuotaError,
  errorMessage,
  type BackendError,
} from "../errors.js";
import { getStatusCode } from "./retry.js";

// ── Backend error classification ─────────────────────────

/**
 * Map anything a backend call throws onto the three failure categories.
 * HTTP 401/403 → auth, 429 → quota; gRPC-style names and "quota" in the
 * message are recognised too. Already-classified errors pass through.
 */
export function classifyBackendError(err: unknown): BackendError {
  if (
    err instanceof BackendAuthError ||
    err instanceof BackendQuotaError ||
    err instanceof BackendOtherError
  ) {
    return err;
  }

  const message = errorMessage(err);
  const status = getStatusCode(err);

  if (status === 401 || status === 403 || /unauthenticated|invalid api key/i.test(message)) {
    return new BackendAuthError(message, { cause: err });
  }
  if (status === 429 || /resource.?exhausted|quota|rate limit/i.test(message)) {
    return new BackendQuotaError(message, { cause: err });
  }
  return new BackendOtherError(message, { cause: err });
}
