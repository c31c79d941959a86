import { getRedisClient, isRedisAvailable, KEY_PREFIX } from "./client.js";
import { logger } from "../../observability/src/logger.js";

/** A cached value together with the moment it was stored. */
export interface CacheHit<T> {
  value: T;
  storedAt: string;
}

interface Envelope<T> {
  value: T;
  storedAt: string;
}

/**
 * JSON cache backed by Redis with an in-memory fallback.
 * When Redis is unavailable, entries live in a local Map with TTL expiry.
 */
export class RedisCache<T> {
  private readonly memCache = new Map<string, { envelope: Envelope<T>; expiresAt: number }>();

  constructor(
    private readonly prefix: string,
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now
  ) {}

  private redisKey(key: string): string {
    return `${this.prefix}:${key}`;
  }

  private describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
  }

  async get(key: string): Promise<T | null> {
    const hit = await this.getWithMeta(key);
    return hit ? hit.value : null;
  }

  /** Like get(), but also reports when the value was written. */
  async getWithMeta(key: string): Promise<CacheHit<T> | null> {
    const redis = getRedisClient();

    if (redis && isRedisAvailable()) {
      try {
        const raw = await redis.get(this.redisKey(key));
        if (raw === null) return null;
        const envelope: Envelope<T> = JSON.parse(raw);
        return { value: envelope.value, storedAt: envelope.storedAt };
      } catch (err) {
        logger.warn(`RedisCache.get failed for ${this.redisKey(key)}: ${this.describe(err)}`);
      }
    }

    const entry = this.memCache.get(key);
    if (!entry) return null;
    if (this.now() > entry.expiresAt) {
      this.memCache.delete(key);
      return null;
    }
    return { value: entry.envelope.value, storedAt: entry.envelope.storedAt };
  }

  async set(key: string, value: T, ttlOverride?: number): Promise<void> {
    const ttl = ttlOverride ?? this.ttlSeconds;
    const envelope: Envelope<T> = { value, storedAt: new Date(this.now()).toISOString() };
    const redis = getRedisClient();

    if (redis && isRedisAvailable()) {
      try {
        await redis.set(this.redisKey(key), JSON.stringify(envelope), "EX", ttl);
        return;
      } catch (err) {
        logger.warn(`RedisCache.set failed for ${this.redisKey(key)}: ${this.describe(err)}`);
      }
    }

    this.memCache.set(key, { envelope, expiresAt: this.now() + ttl * 1000 });
  }

  async del(key: string): Promise<void> {
    const redis = getRedisClient();

    if (redis && isRedisAvailable()) {
      try {
        await redis.del(this.redisKey(key));
      } catch (err) {
        logger.warn(`RedisCache.del failed for ${this.redisKey(key)}: ${this.describe(err)}`);
      }
    }

    this.memCache.delete(key);
  }

  async clear(): Promise<void> {
    const redis = getRedisClient();

    if (redis && isRedisAvailable()) {
      try {
        // SCAN does not apply keyPrefix, DEL does: match with it, delete without it
        const pattern = `${KEY_PREFIX}${this.prefix}:*`;
        let cursor = "0";
        do {
          const [nextCursor, keys] = await redis.scan(cursor, "MATCH", pattern, "COUNT", 100);
          cursor = nextCursor;
          if (keys.length > 0) {
            const pipeline = redis.pipeline();
            for (const k of keys) {
              pipeline.del(k.slice(KEY_PREFIX.length));
            }
            await pipeline.exec();
          }
        } while (cursor !== "0");
      } catch (err) {
        logger.warn(`RedisCache.clear failed for ${this.prefix}: ${this.describe(err)}`);
      }
    }

    this.memCache.clear();
  }
}
