import { describe, it, expect, vi } from "vitest";

import { ReadinessTimeoutError } from "../../../../src/errors.js";
import { awaitReady } from "../../../../src/services/etl/readiness.js";

/** Clock whose sleep advances time instantly */
function fakeClock() {
  let time = 0;
  return {
    now: () => time,
    sleep: vi.fn(async (ms: number) => {
      time += ms;
    }),
  };
}

describe("services/etl/readiness", () => {
  it("should return after the first successful probe", async () => {
    const clock = fakeClock();
    const probe = vi.fn(async () => undefined);

    const attempts = await awaitReady(probe, { store: "source", ...clock });

    expect(attempts).toBe(1);
    expect(probe).toHaveBeenCalledTimes(1);
    expect(clock.sleep).not.toHaveBeenCalled();
  });

  it("should retry at a fixed interval until the probe succeeds", async () => {
    const clock = fakeClock();
    const probe = vi
      .fn<() => Promise<void>>()
      .mockRejectedValueOnce(new Error("connection refused"))
      .mockRejectedValueOnce(new Error("connection refused"))
      .mockResolvedValue(undefined);

    const attempts = await awaitReady(probe, {
      store: "graph",
      intervalMs: 250,
      ...clock,
    });

    expect(attempts).toBe(3);
    expect(clock.sleep).toHaveBeenCalledTimes(2);
    expect(clock.sleep).toHaveBeenNthCalledWith(1, 250);
    expect(clock.sleep).toHaveBeenNthCalledWith(2, 250);
  });

  it("should fail once the elapsed time exceeds the timeout", async () => {
    const clock = fakeClock();
    const lastError = new Error("connection refused");
    const probe = vi.fn(async () => {
      throw lastError;
    });

    const result = awaitReady(probe, {
      store: "source",
      timeoutMs: 5000,
      intervalMs: 1000,
      ...clock,
    });

    await expect(result).rejects.toThrow(ReadinessTimeoutError);
    await expect(result).rejects.toMatchObject({
      code: "READINESS_TIMEOUT",
      store: "source",
      timeoutMs: 5000,
      attempts: 7,
      cause: lastError,
      message: "source not ready after 5000ms (7 attempts): connection refused",
    });
    // Attempts at t=0..6000; the seventh sees 6000ms elapsed
    expect(probe).toHaveBeenCalledTimes(7);
    expect(clock.sleep).toHaveBeenCalledTimes(6);
  });

  it("should keep polling while the elapsed time equals the timeout", async () => {
    const clock = fakeClock();
    const probe = vi
      .fn<() => Promise<void>>()
      .mockRejectedValueOnce(new Error("down"))
      .mockRejectedValueOnce(new Error("down"))
      .mockResolvedValue(undefined);

    const attempts = await awaitReady(probe, {
      store: "graph",
      timeoutMs: 1000,
      intervalMs: 1000,
      ...clock,
    });

    expect(attempts).toBe(3);
  });
});
