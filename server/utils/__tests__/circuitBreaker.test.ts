import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../logger", () => ({
  default: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import logger from "../../logger";
import { CircuitBreaker } from "../circuitBreaker";

describe("CircuitBreaker", () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    vi.clearAllMocks();
    clock = 1_000;
  });

  it("starts closed and passes results through", async () => {
    const breaker = new CircuitBreaker("cache", { now });
    expect(breaker.getState()).toBe("closed");
    await expect(breaker.execute(async () => "hit", "fallback")).resolves.toBe("hit");
  });

  it("returns the fallback on failure and opens at the threshold", async () => {
    const breaker = new CircuitBreaker("cache", { threshold: 2, now });

    await expect(breaker.execute(() => Promise.reject(new Error("down")), "fallback")).resolves.toBe("fallback");
    expect(breaker.getState()).toBe("closed");

    await breaker.execute(() => Promise.reject(new Error("down")), "fallback");
    expect(breaker.getState()).toBe("open");
    expect(logger.warn).toHaveBeenCalledWith("[CircuitBreaker] cache opened after 2 consecutive failures", {
      error: "down",
    });
  });

  it("counts only consecutive failures", async () => {
    const breaker = new CircuitBreaker("cache", { threshold: 2, now });

    await breaker.execute(() => Promise.reject(new Error("down")), null);
    await breaker.execute(async () => "ok", null);
    await breaker.execute(() => Promise.reject(new Error("down")), null);

    expect(breaker.getState()).toBe("closed");
  });

  it("short-circuits while open", async () => {
    const breaker = new CircuitBreaker("cache", { threshold: 1, resetTimeoutMs: 500, now });
    await breaker.execute(() => Promise.reject(new Error("down")), "fallback");

    const fn = vi.fn(async () => "hit");
    clock += 499;
    await expect(breaker.execute(fn, "fallback")).resolves.toBe("fallback");
    expect(fn).not.toHaveBeenCalled();
  });

  it("closes after a successful half-open probe", async () => {
    const breaker = new CircuitBreaker("cache", { threshold: 1, resetTimeoutMs: 500, now });
    await breaker.execute(() => Promise.reject(new Error("down")), "fallback");

    clock += 500;
    await expect(breaker.execute(async () => "hit", "fallback")).resolves.toBe("hit");
    expect(breaker.getState()).toBe("closed");
    expect(logger.info).toHaveBeenCalledWith("[CircuitBreaker] cache closed after successful probe");
  });

  it("re-opens when the half-open probe fails", async () => {
    const breaker = new CircuitBreaker("cache", { threshold: 3, resetTimeoutMs: 500, now });
    for (let i = 0; i < 3; i++) {
      await breaker.execute(() => Promise.reject(new Error("down")), null);
    }

    clock += 600;
    await breaker.execute(() => Promise.reject(new Error("still down")), null);
    expect(breaker.getState()).toBe("open");

    const fn = vi.fn(async () => "hit");
    clock += 100;
    await breaker.execute(fn, null);
    expect(fn).not.toHaveBeenCalled();
  });
});
