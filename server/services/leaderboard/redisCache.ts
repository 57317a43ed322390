/**
 * Redis-backed leaderboard cache.
 *
 * Pages live under `leaderboard:<epoch>:<limit>:<offset>` with a TTL; the
 * epoch itself is a counter at `leaderboard:epoch`. Invalidation is a single
 * INCR, and orphaned pages expire on their own.
 */

import { z } from "zod";
import type { LeaderboardCache, LeaderboardPage } from "./types";

/** The ioredis commands this cache needs. */
export interface LeaderboardRedis {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  incr(key: string): Promise<number>;
}

export const EPOCH_KEY = "leaderboard:epoch";

const pageSchema = z.object({
  entries: z.array(
    z.object({
      position: z.number(),
      playerId: z.string(),
      displayName: z.string(),
      rating: z.number(),
      rank: z.string(),
      wins: z.number(),
      gamesPlayed: z.number(),
      winRate: z.number(),
      currentStreak: z.number(),
    })
  ),
  limit: z.number(),
  offset: z.number(),
});

export function pageKey(epoch: number, limit: number, offset: number): string {
  return `leaderboard:${epoch}:${limit}:${offset}`;
}

export class RedisLeaderboardCache implements LeaderboardCache {
  constructor(private readonly redis: LeaderboardRedis) {}

  async currentEpoch(): Promise<number> {
    const raw = await this.redis.get(EPOCH_KEY);
    const epoch = raw === null ? 0 : Number.parseInt(raw, 10);
    return Number.isFinite(epoch) ? epoch : 0;
  }

  async get(epoch: number, limit: number, offset: number): Promise<LeaderboardPage | null> {
    const raw = await this.redis.get(pageKey(epoch, limit, offset));
    if (raw === null) return null;
    const parsed = pageSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  }

  async set(epoch: number, limit: number, offset: number, page: LeaderboardPage, ttlSeconds: number): Promise<void> {
    await this.redis.setex(pageKey(epoch, limit, offset), ttlSeconds, JSON.stringify(page));
  }

  async invalidate(): Promise<number> {
    return this.redis.incr(EPOCH_KEY);
  }
}
