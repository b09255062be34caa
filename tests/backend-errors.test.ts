import { describe, it, expect } from "vitest";
import { classifyBackendError } from "../src/llm/errors.js";
import { TimeoutError, withTimeout } from "../src/llm/timeout.js";
import {
  BackendAuthError,
  BackendOtherError,
  BackendQuotaError,
} from "../src/errors.js";
import { httpError } from "./fakes.js";

describe("classifyBackendError", () => {
  it.each([
    [httpError(401, "bad key"), BackendAuthError],
    [httpError(403, "forbidden"), BackendAuthError],
    [new Error("16 UNAUTHENTICATED: request had invalid credentials"), BackendAuthError],
    [httpError(429, "slow down"), BackendQuotaError],
    [new Error("8 RESOURCE_EXHAUSTED: try later"), BackendQuotaError],
    [new Error("You exceeded your current quota"), BackendQuotaError],
    [httpError(500, "internal"), BackendOtherError],
    [new TypeError("fetch failed"), BackendOtherError],
  ])("classifies %s", (err, expected) => {
    expect(classifyBackendError(err)).toBeInstanceOf(expected);
  });

  it("keeps the message and the cause", () => {
    const original = httpError(401, "bad key");
    const classified = classifyBackendError(original);
    expect(classified.message).toBe("bad key");
    expect(classified.cause).toBe(original);
  });

  it("passes classified errors through unchanged", () => {
    const err = new BackendQuotaError("quota");
    expect(classifyBackendError(err)).toBe(err);
  });

  it("handles non-Error values", () => {
    const classified = classifyBackendError("plain string");
    expect(classified).toBeInstanceOf(BackendOtherError);
    expect(classified.message).toBe("plain string");
  });
});

describe("withTimeout", () => {
  it("resolves with the promise's value", async () => {
    await expect(withTimeout(Promise.resolve(42), 1000, "fast call")).resolves.toBe(42);
  });

  it("passes rejections through", async () => {
    await expect(
      withTimeout(Promise.reject(new Error("nope")), 1000, "failing call"),
    ).rejects.toThrow("nope");
  });

  it("rejects with TimeoutError when the promise is too slow", async () => {
    const never = new Promise<number>(() => undefined);
    const result = withTimeout(never, 10, "slow call");
    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow("slow call timed out after 0.01s");
  });
});
