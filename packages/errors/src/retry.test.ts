import { describe, it, expect, vi } from "vitest";
import { backoffDelay, isRetryable, withRetry } from "./retry.js";
import { AppError } from "./app-error.js";
import { GenerationError } from "./errors.js";

describe("withRetry", () => {
  it("returns result on success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");

    const result = await withRetry(fn);

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries on failure and returns on eventual success", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("transient")).mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("throws after maxRetries exhausted", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("persistent"));

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1 })).rejects.toThrow(
      "persistent",
    );

    expect(fn).toHaveBeenCalledTimes(3); // 1 initial + 2 retries
  });

  it("does NOT retry 4xx AppErrors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValue(
        new AppError({ message: "Bad request", statusCode: 400, code: "BAD_REQUEST" }),
      );

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toThrow("Bad request");

    expect(fn).toHaveBeenCalledOnce();
  });

  it("does NOT retry aborted calls", async () => {
    const abort = new Error("The operation was aborted");
    abort.name = "AbortError";
    const fn = vi.fn().mockRejectedValue(abort);

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toBe(abort);

    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries 5xx AppErrors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(
        new AppError({ message: "Server error", statusCode: 500, code: "INTERNAL" }),
      )
      .mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("respects retryableErrors filter", async () => {
    const fn = vi
      .fn()
      .mockRejectedValue(new GenerationError("Invalid token", "GENERATION_REJECTED"));

    await expect(
      withRetry(fn, {
        maxRetries: 2,
        baseDelayMs: 1,
        retryableErrors: ["GENERATION_UNAVAILABLE"],
      }),
    ).rejects.toThrow("Invalid token");

    expect(fn).toHaveBeenCalledOnce();
  });

  it("applies retryableErrors to non-AppError codes", async () => {
    const reset = Object.assign(new Error("reset"), { code: "ECONNRESET" });
    const fn = vi.fn().mockRejectedValueOnce(reset).mockResolvedValue("ok");

    const result = await withRetry(fn, {
      baseDelayMs: 1,
      maxDelayMs: 1,
      retryableErrors: ["ECONNRESET"],
    });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("reports each retry through onRetry", async () => {
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValue(new Error("fail"));

    await expect(
      withRetry(fn, { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1, onRetry }),
    ).rejects.toThrow("fail");

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(
      1,
      expect.objectContaining({ attempt: 1, maxRetries: 2 }),
    );
    expect(onRetry).toHaveBeenNthCalledWith(
      2,
      expect.objectContaining({ attempt: 2, maxRetries: 2 }),
    );
  });
});

describe("backoffDelay", () => {
  it("doubles per attempt and halves at the lowest jitter", () => {
    const lowest = () => 0;

    expect([0, 1, 2].map((attempt) => backoffDelay(attempt, 500, 5_000, lowest))).toEqual([
      250, 500, 1_000,
    ]);
  });

  it("caps the exponential growth at maxDelayMs", () => {
    expect(backoffDelay(10, 500, 5_000, () => 0.5)).toBe(3_750);
  });
});

describe("isRetryable", () => {
  it("treats foreign errors as transient without a code filter", () => {
    expect(isRetryable(new TypeError("fetch failed"))).toBe(true);
  });

  it("lets the code filter decide for 5xx errors but never retries a 4xx", () => {
    const rejected = new GenerationError("Unauthorized", "GENERATION_REJECTED");
    const invalid = new AppError({ message: "Bad", statusCode: 422, code: "UNPROCESSABLE" });

    expect(isRetryable(rejected, ["GENERATION_REJECTED"])).toBe(true);
    expect(isRetryable(invalid, ["UNPROCESSABLE"])).toBe(false);
  });
});
