export { RedisCache, type CacheHit } from "./cache.js";
export { getRedisClient, isRedisAvailable, disconnectRedis } from "./client.js";
