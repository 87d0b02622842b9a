import { describe, it, expect, vi } from "vitest";
import { backoffDelay, withRetry } from "../../utils/retry.js";
import { RateLimitError } from "../../errors.js";
import { createLogger } from "../../logger.js";

function rateLimited(): RateLimitError {
  return new RateLimitError("test", "Too Many Requests");
}

function sleepSpy() {
  return vi.fn((_ms: number) => Promise.resolve());
}

describe("backoffDelay", () => {
  it("doubles from the initial delay", () => {
    expect([0, 1, 2, 3].map((a) => backoffDelay(a, 2000, 60000))).toEqual([
      2000, 4000, 8000, 16000,
    ]);
  });

  it("caps at the max delay", () => {
    expect(backoffDelay(10, 2000, 60000)).toBe(60000);
  });
});

describe("withRetry", () => {
  const base = { maxRetries: 3, initialDelayMs: 2000, maxDelayMs: 60000, retryOn: [RateLimitError] };

  it("returns the result immediately on success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    const sleep = sleepSpy();

    const result = await withRetry(fn, { ...base, sleep });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("backs off 2000 then 4000 ms before succeeding on the third attempt", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(rateLimited())
      .mockRejectedValueOnce(rateLimited())
      .mockResolvedValueOnce("recovered");
    const sleep = sleepSpy();

    const result = await withRetry(fn, { ...base, sleep });

    expect(result).toBe("recovered");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000]);
  });

  it("makes maxRetries + 1 attempts and rethrows the original error", async () => {
    const original = rateLimited();
    const fn = vi.fn().mockRejectedValue(original);
    const sleep = sleepSpy();

    await expect(withRetry(fn, { ...base, sleep })).rejects.toBe(original);

    expect(fn).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000, 8000]);
  });

  it("does not retry an error outside the retry list", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("Validation failed"));
    const sleep = sleepSpy();

    await expect(withRetry(fn, { ...base, sleep })).rejects.toThrow("Validation failed");

    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("with maxRetries 0 makes a single attempt", async () => {
    const fn = vi.fn().mockRejectedValue(rateLimited());
    const sleep = sleepSpy();

    await expect(withRetry(fn, { ...base, maxRetries: 0, sleep })).rejects.toBeInstanceOf(
      RateLimitError,
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("caps every delay at maxDelayMs", async () => {
    const fn = vi.fn().mockRejectedValue(rateLimited());
    const sleep = sleepSpy();

    await expect(
      withRetry(fn, { ...base, maxRetries: 4, initialDelayMs: 2000, maxDelayMs: 5000, sleep }),
    ).rejects.toBeInstanceOf(RateLimitError);

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000, 5000, 5000]);
  });

  it("logs the retried error's name before backing off", async () => {
    const lines: string[] = [];
    const logger = createLogger({ pretty: false, output: (l) => lines.push(l) });
    const fn = vi.fn().mockRejectedValueOnce(rateLimited()).mockResolvedValueOnce("ok");

    await withRetry(fn, { ...base, sleep: sleepSpy(), logger });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: "warn",
      msg: "Retryable error, backing off",
      error: "RateLimitError",
      attempt: 1,
      delayMs: 2000,
    });
  });
});
