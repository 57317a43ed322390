/**
 * Redis Client
 *
 * Shared ioredis connection, used by the leaderboard cache.
 *
 * Returns null when REDIS_URL is not set (logs a warning once); callers
 * fall back to process-local stores.
 */

import Redis from "ioredis";
import { env } from "./config/env";
import logger from "./logger";

let redis: Redis | null = null;
let warnedNoRedisUrl = false;

export function getRedisClient(): Redis | null {
  if (redis) return redis;

  const url = env.REDIS_URL;
  if (!url) {
    if (!warnedNoRedisUrl) {
      logger.warn("[Redis] REDIS_URL not set, using in-memory leaderboard cache");
      warnedNoRedisUrl = true;
    }
    return null;
  }

  try {
    redis = new Redis(url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 10) {
          logger.error("[Redis] Max reconnection attempts reached");
          return null; // stop retrying
        }
        return Math.min(times * 200, 5000);
      },
    });

    redis.on("connect", () => {
      logger.info("[Redis] Connected");
    });

    redis.on("error", (err) => {
      logger.error("[Redis] Connection error", { error: String(err) });
    });

    redis.on("close", () => {
      logger.warn("[Redis] Connection closed");
    });

    return redis;
  } catch (err) {
    logger.error("[Redis] Failed to create client", { error: String(err) });
    return null;
  }
}

/**
 * Graceful shutdown, called from the SIGTERM/SIGINT handlers.
 */
export async function shutdownRedis(): Promise<void> {
  if (redis) {
    await redis.quit();
    redis = null;
    logger.info("[Redis] Disconnected");
  }
}
