import { describe, expect, it, vi } from "vitest";
import { calculateBackoffDelay, RETRY_CONFIG, withRetry } from "./retry";

const noWait = vi.fn(async () => {});

describe("calculateBackoffDelay", () => {
  it("doubles from the base delay", () => {
    const delays = [0, 1, 2].map(attempt => calculateBackoffDelay(attempt, RETRY_CONFIG, () => 0.5));
    expect(delays).toEqual([2000, 4000, 8000]);
  });

  it("caps at the maximum delay", () => {
    expect(calculateBackoffDelay(5, RETRY_CONFIG, () => 0.5)).toBe(30000);
  });

  it("applies jitter in both directions", () => {
    expect(calculateBackoffDelay(0, RETRY_CONFIG, () => 0)).toBe(1400);
    expect(calculateBackoffDelay(0, RETRY_CONFIG, () => 1)).toBe(2600);
  });
});

describe("withRetry", () => {
  it("returns the first success with every earlier error", async () => {
    noWait.mockClear();
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("timeout"))
      .mockRejectedValueOnce(new Error("HTTP 503"))
      .mockResolvedValueOnce("data");

    const outcome = await withRetry("PETR4.SA window", fn, { sleep: noWait });

    expect(outcome).toEqual({ ok: true, value: "data", attempts: 3, errors: ["timeout", "HTTP 503"] });
    expect(noWait).toHaveBeenCalledTimes(2);
  });

  it("stops after maxRetries + 1 attempts", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("down"));

    const outcome = await withRetry("IPCA series", fn, { sleep: noWait });

    expect(fn).toHaveBeenCalledTimes(RETRY_CONFIG.maxRetries + 1);
    expect(outcome).toEqual({ ok: false, attempts: 4, errors: ["down", "down", "down", "down"], aborted: false });
  });

  it("does not start once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn<() => Promise<string>>().mockResolvedValue("data");

    const outcome = await withRetry("cancelled", fn, { sleep: noWait, signal: controller.signal });

    expect(fn).not.toHaveBeenCalled();
    expect(outcome).toEqual({ ok: false, attempts: 0, errors: [], aborted: true });
  });
});
