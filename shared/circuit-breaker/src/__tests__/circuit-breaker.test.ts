import { describe, it, expect } from "vitest";
import { CircuitBreaker, CircuitOpenError } from "../circuit-breaker.js";

function breaker(failureThreshold = 2, resetTimeoutMs = 1_000) {
  let now = 0;
  const cb = new CircuitBreaker({ name: "test-db", failureThreshold, resetTimeoutMs, now: () => now });
  return { cb, advance: (ms: number) => (now += ms) };
}

const fail = () => Promise.reject(new Error("boom"));
const succeed = () => Promise.resolve("ok");

describe("CircuitBreaker", () => {
  it("passes results through while closed", async () => {
    const { cb } = breaker();
    await expect(cb.execute(succeed)).resolves.toBe("ok");
    expect(cb.getState()).toBe("closed");
  });

  it("opens after consecutive failures and fails fast", async () => {
    const { cb } = breaker();
    await expect(cb.execute(fail)).rejects.toThrow("boom");
    expect(cb.getState()).toBe("closed");
    await expect(cb.execute(fail)).rejects.toThrow("boom");
    expect(cb.getState()).toBe("open");

    await expect(cb.execute(succeed)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(cb.snapshot()).toEqual({ name: "test-db", state: "open", consecutiveFailures: 2 });
  });

  it("resets the failure count on success", async () => {
    const { cb } = breaker();
    await expect(cb.execute(fail)).rejects.toThrow();
    await cb.execute(succeed);
    await expect(cb.execute(fail)).rejects.toThrow();
    expect(cb.getState()).toBe("closed");
  });

  it("lets a trial call through after the reset timeout", async () => {
    const { cb, advance } = breaker();
    await expect(cb.execute(fail)).rejects.toThrow();
    await expect(cb.execute(fail)).rejects.toThrow();

    advance(1_000);
    expect(cb.getState()).toBe("half-open");
    await expect(cb.execute(succeed)).resolves.toBe("ok");
    expect(cb.getState()).toBe("closed");
  });

  it("reopens when the trial call fails", async () => {
    const { cb, advance } = breaker();
    await expect(cb.execute(fail)).rejects.toThrow();
    await expect(cb.execute(fail)).rejects.toThrow();

    advance(1_000);
    await expect(cb.execute(fail)).rejects.toThrow("boom");
    expect(cb.getState()).toBe("open");
  });

  it("can be reset by hand", async () => {
    const { cb } = breaker(1);
    await expect(cb.execute(fail)).rejects.toThrow();
    cb.reset();
    expect(cb.snapshot()).toEqual({ name: "test-db", state: "closed", consecutiveFailures: 0 });
  });
});
