/**
 * Leaderboard Service
 *
 * Read-through cache over the rating store's standings. The cache is
 * optional: any cache error is logged and the page is served straight from
 * the store, with a circuit breaker keeping a dead cache off the hot path.
 * Every `ratings.updated` event invalidates all cached pages.
 */

import logger from "../../logger";
import {
  LEADERBOARD_DEFAULT_LIMIT,
  LEADERBOARD_MAX_LIMIT,
  LEADERBOARD_TTL_SECONDS,
} from "../../config/constants";
import { CircuitBreaker } from "../../utils/circuitBreaker";
import type { BattleEventBus } from "../battle/eventBus";
import { CacheUnavailableError, toErrorMessage } from "../battle/errors";
import type { RatingStore } from "../rating/ratingStore";
import type { PlayerRatingRecord } from "../rating/types";
import type { LeaderboardCache, LeaderboardEntry, LeaderboardPage } from "./types";

export interface LeaderboardServiceOptions {
  store: Pick<RatingStore, "listLeaderboard">;
  cache: LeaderboardCache;
  bus: BattleEventBus;
  ttlSeconds?: number;
  breaker?: CircuitBreaker;
}

export function winRate(wins: number, gamesPlayed: number): number {
  if (gamesPlayed === 0) return 0;
  return Math.round((wins / gamesPlayed) * 1000) / 10;
}

export function toLeaderboardEntry(record: PlayerRatingRecord, position: number): LeaderboardEntry {
  return {
    position,
    playerId: record.id,
    displayName: record.displayName,
    rating: record.rating,
    rank: record.rank,
    wins: record.wins,
    gamesPlayed: record.gamesPlayed,
    winRate: winRate(record.wins, record.gamesPlayed),
    currentStreak: record.currentStreak,
  };
}

export class LeaderboardService {
  private readonly store: Pick<RatingStore, "listLeaderboard">;
  private readonly cache: LeaderboardCache;
  private readonly bus: BattleEventBus;
  private readonly ttlSeconds: number;
  private readonly breaker: CircuitBreaker;
  private unsubscribe: (() => void) | null = null;

  constructor(options: LeaderboardServiceOptions) {
    this.store = options.store;
    this.cache = options.cache;
    this.bus = options.bus;
    this.ttlSeconds = options.ttlSeconds ?? LEADERBOARD_TTL_SECONDS;
    this.breaker = options.breaker ?? new CircuitBreaker("leaderboardCache");
  }

  attach(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.bus.on("ratings.updated", () => this.invalidate());
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  cacheState() {
    return this.breaker.getState();
  }

  async getLeaderboard(limit: number = LEADERBOARD_DEFAULT_LIMIT, offset = 0): Promise<LeaderboardPage> {
    const pageLimit = Math.min(Math.max(1, Math.floor(limit)), LEADERBOARD_MAX_LIMIT);
    const pageOffset = Math.max(0, Math.floor(offset));

    const epoch = await this.guarded("epoch", () => this.cache.currentEpoch(), null);
    if (epoch !== null) {
      const cached = await this.guarded("read", () => this.cache.get(epoch, pageLimit, pageOffset), null);
      if (cached) return cached;
    }

    const records = await this.store.listLeaderboard(pageLimit, pageOffset);
    const page: LeaderboardPage = {
      entries: records.map((record, i) => toLeaderboardEntry(record, pageOffset + i + 1)),
      limit: pageLimit,
      offset: pageOffset,
    };

    if (epoch !== null) {
      await this.guarded(
        "write",
        () => this.cache.set(epoch, pageLimit, pageOffset, page, this.ttlSeconds),
        undefined
      );
    }
    return page;
  }

  /** Drop every cached page. Never short-circuited by the breaker. */
  async invalidate(): Promise<void> {
    try {
      const epoch = await this.cache.invalidate();
      logger.debug("[Leaderboard] Cache invalidated", { epoch });
    } catch (error) {
      logger.warn("[Leaderboard] Cache invalidation failed", { error: toErrorMessage(error) });
    }
  }

  private guarded<T>(operation: string, fn: () => Promise<T>, fallback: T): Promise<T> {
    return this.breaker.execute(async () => {
      try {
        return await fn();
      } catch (error) {
        const failure = new CacheUnavailableError(`Leaderboard cache ${operation} failed: ${toErrorMessage(error)}`);
        logger.warn("[Leaderboard] Cache unavailable, serving from store", {
          operation,
          code: failure.code,
          error: toErrorMessage(error),
        });
        throw failure;
      }
    }, fallback);
  }
}
