import { describe, it, expect, beforeAll } from "vitest";
import { RedisCache } from "../cache.js";

describe("RedisCache (in-memory fallback)", () => {
  beforeAll(() => {
    delete process.env.REDIS_URL;
  });

  function cacheAt(start: number) {
    let now = start;
    const cache = new RedisCache<{ rows: number }>("test", 30, () => now);
    return { cache, advance: (ms: number) => (now += ms) };
  }

  it("returns what was stored with its write time", async () => {
    const { cache } = cacheAt(Date.UTC(2026, 0, 1));
    await cache.set("k", { rows: 3 });

    expect(await cache.get("k")).toEqual({ rows: 3 });
    expect(await cache.getWithMeta("k")).toEqual({ value: { rows: 3 }, storedAt: "2026-01-01T00:00:00.000Z" });
  });

  it("misses on unknown keys", async () => {
    const { cache } = cacheAt(0);
    expect(await cache.get("missing")).toBeNull();
  });

  it("expires entries after the TTL", async () => {
    const { cache, advance } = cacheAt(0);
    await cache.set("k", { rows: 1 });
    advance(30_000);
    expect(await cache.get("k")).toEqual({ rows: 1 });
    advance(1);
    expect(await cache.get("k")).toBeNull();
  });

  it("honours a per-entry TTL override", async () => {
    const { cache, advance } = cacheAt(0);
    await cache.set("k", { rows: 1 }, 5);
    advance(5_001);
    expect(await cache.get("k")).toBeNull();
  });

  it("deletes single keys and clears everything", async () => {
    const { cache } = cacheAt(0);
    await cache.set("a", { rows: 1 });
    await cache.set("b", { rows: 2 });

    await cache.del("a");
    expect(await cache.get("a")).toBeNull();
    expect(await cache.get("b")).toEqual({ rows: 2 });

    await cache.clear();
    expect(await cache.get("b")).toBeNull();
  });
});
