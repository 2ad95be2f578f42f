import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { backoffDelay, callBackend, withRetry, withTimeout } from "@/lib/retry";
import { isRetryableBackendError, toBackendError } from "@/lib/backend-errors";
import {
  BackendTimeoutError,
  BackendUnavailableError,
  ContentFilteredError,
  InvalidRequestError,
  RateLimitedError,
} from "@/lib/errors";

const NO_WAIT = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, label: "test" };

describe("backoffDelay", () => {
  it("doubles from the base and stops at the cap", () => {
    expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(attempt, 500, 4_000))).toEqual([500, 1_000, 2_000, 4_000, 4_000]);
  });
});

describe("toBackendError", () => {
  it("maps a 429 with retry-after onto RateLimitedError", () => {
    const error = toBackendError({ status: 429, message: "slow down", headers: { "retry-after": "3" } }, "embed");
    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({ retryAfterMs: 3_000, message: "embed: slow down" });
  });

  it("recognises provider content filters", () => {
    expect(toBackendError({ status: 400, message: "Blocked by the content management policy" }, "chat")).toBeInstanceOf(
      ContentFilteredError
    );
  });

  it("marks client errors as not worth retrying", () => {
    const auth = toBackendError({ status: 401, message: "bad key" }, "chat");
    expect(auth).toBeInstanceOf(BackendUnavailableError);
    expect(auth).toMatchObject({ retryable: false });
    expect(toBackendError({ code: "ECONNRESET", message: "socket" }, "chat")).toMatchObject({ retryable: true });
  });

  it("passes engine errors through unchanged", () => {
    const original = new InvalidRequestError("bad");
    expect(toBackendError(original, "chat")).toBe(original);
    expect(isRetryableBackendError(original)).toBe(false);
  });
});

describe("withRetry", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("retries transient failures until one succeeds", async () => {
    const attempts: number[] = [];
    const result = await withRetry(async (attempt) => {
      attempts.push(attempt);
      if (attempt < 3) throw new BackendUnavailableError("flaky");
      return "ok";
    }, NO_WAIT);
    expect(result).toBe("ok");
    expect(attempts).toEqual([1, 2, 3]);
  });

  it("stops at the first permanent failure", async () => {
    let calls = 0;
    await expect(
      withRetry(async () => {
        calls += 1;
        throw new ContentFilteredError();
      }, NO_WAIT)
    ).rejects.toBeInstanceOf(ContentFilteredError);
    expect(calls).toBe(1);
  });

  it("gives up after maxAttempts with the last error", async () => {
    let calls = 0;
    await expect(
      withRetry(async () => {
        calls += 1;
        throw new RateLimitedError(`limit ${calls}`);
      }, NO_WAIT)
    ).rejects.toThrow("limit 3");
    expect(calls).toBe(3);
  });
});

describe("withTimeout", () => {
  it("rejects a task that outlives the timeout", async () => {
    await expect(withTimeout(() => new Promise<never>(() => undefined), 5, "slow call")).rejects.toBeInstanceOf(
      BackendTimeoutError
    );
  });

  it("returns a task that finishes in time", async () => {
    await expect(withTimeout(async () => 42, 1_000, "fast call")).resolves.toBe(42);
  });
});

describe("callBackend", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("maps raw SDK errors and retries within the configured attempts", async () => {
    let calls = 0;
    const task = async () => {
      calls += 1;
      throw { status: 429, message: "too many requests" };
    };
    await expect(
      callBackend(task, { timeoutMs: 1_000, maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 }, "embed query")
    ).rejects.toBeInstanceOf(RateLimitedError);
    expect(calls).toBe(2);
  });
});
