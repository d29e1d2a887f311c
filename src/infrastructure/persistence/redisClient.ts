import Redis from "ioredis";
import { componentLogger } from "../logging/logger";

const log = componentLogger("redis");

/**
 * Builds the Redis connection used by the persistence adapters. Returns null
 * when no URL is configured; callers then fall back to in-memory storage.
 */
export function createRedis(url: string): Redis | null {
  if (!url) {
    log.warn("REDIS_URL not set, using in-memory storage (data lost on restart)");
    return null;
  }

  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      if (times > 5) return null;
      return Math.min(times * 200, 2000);
    },
    lazyConnect: false
  });

  redis.on("connect", () => log.info("Redis connected"));
  redis.on("error", (err) => log.error({ err }, "Redis error"));

  return redis;
}

export const redisKeys = {
  conversation: (buyerId: string) => `mr:conversation:${buyerId}`,
  conversationIndex: "mr:conversations",
  buyer: (id: string) => `mr:buyer:${id}`,
  product: (id: string) => `mr:product:${id}`,
  audit: "mr:audit"
};
