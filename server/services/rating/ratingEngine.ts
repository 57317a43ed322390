/**
 * Rating Engine
 *
 * Settles decided battles into persistent player ratings exactly once.
 * Both players are locked together (ascending id) so a player who finishes
 * two battles at nearly the same time is settled one battle after another.
 * Commits that keep failing are parked and re-driven by an interval
 * scheduler until they land.
 */

import logger from "../../logger";
import {
  ELO_K_FACTOR,
  RATING_COMMIT_ATTEMPTS,
  RATING_COMMIT_BASE_DELAY_MS,
  RATING_FLOOR,
  RATING_PENDING_RETRY_MS,
} from "../../config/constants";
import { KeyedMutex } from "../../utils/keyedMutex";
import type { BattleEventBus } from "../battle/eventBus";
import { toErrorMessage } from "../battle/errors";
import { summarizeSession } from "../battle/resolution";
import type { BattleSession, PlayerGameStats, SessionSummary } from "../battle/types";
import { applyRatingFloor, calculateEloChange } from "./elo";
import { DEFAULT_RANK_BANDS, rankForRating } from "./ranks";
import type { RatingStore } from "./ratingStore";
import type { PlayerRatingRecord, PlayerSettlement, RankBand, RatingSettlement, RatingWrite } from "./types";

export interface RatingRules {
  kFactor: number;
  ratingFloor: number;
  rankBands: readonly RankBand[];
}

export interface RatingEngineOptions {
  store: RatingStore;
  bus: BattleEventBus;
  kFactor?: number;
  ratingFloor?: number;
  rankBands?: readonly RankBand[];
  commitAttempts?: number;
  baseDelayMs?: number;
  pendingRetryMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export type ApplyOutcome =
  | { status: "applied"; settlement: RatingSettlement }
  | { status: "duplicate" }
  | { status: "pending" };

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function nextStreak(streak: number, won: boolean): number {
  return won ? Math.max(streak, 0) + 1 : Math.min(streak, 0) - 1;
}

/** Response-time mean over every correct answer so far. */
function mergeAverage(
  previousAverage: number | null,
  previousCount: number,
  gameAverage: number | null,
  gameCount: number
): number | null {
  if (gameAverage === null || gameCount === 0) return previousAverage;
  if (previousAverage === null || previousCount === 0) return Math.round(gameAverage);
  return Math.round((previousAverage * previousCount + gameAverage * gameCount) / (previousCount + gameCount));
}

function applyGame(
  record: PlayerRatingRecord,
  stats: PlayerGameStats,
  won: boolean,
  eloDelta: number,
  rules: RatingRules,
  settledAt: number
): { next: PlayerRatingRecord; settlement: PlayerSettlement } {
  const rating = applyRatingFloor(record.rating + eloDelta, rules.ratingFloor);
  const rank = rankForRating(rating, rules.rankBands);
  const rankChanged = rank !== record.rank;
  const currentStreak = nextStreak(record.currentStreak, won);
  const roundsPlayed = record.roundsPlayed + stats.roundsPlayed;
  const plantsIdentified = record.plantsIdentified + stats.correctAnswers;

  const next: PlayerRatingRecord = {
    ...record,
    displayName: stats.displayName,
    rating,
    rank,
    gamesPlayed: record.gamesPlayed + 1,
    wins: record.wins + (won ? 1 : 0),
    losses: record.losses + (won ? 0 : 1),
    currentStreak,
    longestStreak: Math.max(record.longestStreak, Math.abs(currentStreak)),
    roundsPlayed,
    plantsIdentified,
    accuracy: roundsPlayed > 0 ? plantsIdentified / roundsPlayed : 0,
    averageResponseTimeMs: mergeAverage(
      record.averageResponseTimeMs,
      record.plantsIdentified,
      stats.averageResponseTimeMs,
      stats.correctAnswers
    ),
    rankHistory: rankChanged
      ? [...record.rankHistory, { rank, rating, achievedAt: settledAt }]
      : record.rankHistory,
    lastGameAt: settledAt,
    version: record.version + 1,
  };

  return {
    next,
    settlement: {
      playerId: record.id,
      previousRating: record.rating,
      rating,
      delta: rating - record.rating,
      previousRank: record.rank,
      rank,
      rankChanged,
      currentStreak,
    },
  };
}

/**
 * Pure settlement of one decided battle. Returns the versioned writes for
 * the store and the settlement to publish.
 */
export function settleSession(
  summary: SessionSummary,
  winner: PlayerRatingRecord,
  loser: PlayerRatingRecord,
  rules: RatingRules,
  settledAt: number
): { writes: RatingWrite[]; settlement: RatingSettlement } {
  const { winnerDelta, loserDelta } = calculateEloChange(winner.rating, loser.rating, rules.kFactor);
  const w = applyGame(winner, summary.winner, true, winnerDelta, rules, settledAt);
  const l = applyGame(loser, summary.loser, false, loserDelta, rules, settledAt);

  return {
    writes: [
      { record: w.next, expectedVersion: winner.version },
      { record: l.next, expectedVersion: loser.version },
    ],
    settlement: {
      sessionId: summary.sessionId,
      winner: w.settlement,
      loser: l.settlement,
      settledAt,
    },
  };
}

export class RatingEngine {
  private readonly store: RatingStore;
  private readonly bus: BattleEventBus;
  private readonly rules: RatingRules;
  private readonly commitAttempts: number;
  private readonly baseDelayMs: number;
  private readonly pendingRetryMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly locks = new KeyedMutex();
  private readonly pending = new Map<string, SessionSummary>();
  private unsubscribers: Array<() => void> = [];
  private retryInterval: NodeJS.Timeout | null = null;
  private isRetrying = false;

  constructor(options: RatingEngineOptions) {
    this.store = options.store;
    this.bus = options.bus;
    this.rules = {
      kFactor: options.kFactor ?? ELO_K_FACTOR,
      ratingFloor: options.ratingFloor ?? RATING_FLOOR,
      rankBands: options.rankBands ?? DEFAULT_RANK_BANDS,
    };
    this.commitAttempts = options.commitAttempts ?? RATING_COMMIT_ATTEMPTS;
    this.baseDelayMs = options.baseDelayMs ?? RATING_COMMIT_BASE_DELAY_MS;
    this.pendingRetryMs = options.pendingRetryMs ?? RATING_PENDING_RETRY_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get rankBands(): readonly RankBand[] {
    return this.rules.rankBands;
  }

  attach(): void {
    if (this.unsubscribers.length > 0) return;
    this.unsubscribers = [
      this.bus.on("session.completed", (session) => this.onSessionEnded(session)),
      this.bus.on("session.abandoned", (session) => this.onSessionEnded(session)),
    ];
  }

  detach(): void {
    for (const off of this.unsubscribers) off();
    this.unsubscribers = [];
  }

  /** Abandoned sessions only settle when they ended in a forfeit. */
  private async onSessionEnded(session: BattleSession): Promise<void> {
    const summary = summarizeSession(session);
    if (!summary) return;
    await this.applySession(summary);
  }

  async applySession(summary: SessionSummary): Promise<ApplyOutcome> {
    const ids = [summary.winner.playerId, summary.loser.playerId];
    return this.locks.runExclusiveMany(ids, () => this.commitWithRetry(summary));
  }

  private async commitWithRetry(summary: SessionSummary): Promise<ApplyOutcome> {
    for (let attempt = 1; attempt <= this.commitAttempts; attempt++) {
      try {
        if (await this.store.hasAppliedSession(summary.sessionId)) {
          this.pending.delete(summary.sessionId);
          return { status: "duplicate" };
        }

        const winner = await this.store.ensurePlayer({
          id: summary.winner.playerId,
          displayName: summary.winner.displayName,
        });
        const loser = await this.store.ensurePlayer({
          id: summary.loser.playerId,
          displayName: summary.loser.displayName,
        });

        const { writes, settlement } = settleSession(summary, winner, loser, this.rules, this.now());
        await this.store.commitSession(summary.sessionId, writes);

        this.pending.delete(summary.sessionId);
        logger.info("[Rating] Session settled", {
          sessionId: summary.sessionId,
          winnerId: settlement.winner.playerId,
          winnerDelta: settlement.winner.delta,
          loserId: settlement.loser.playerId,
          loserDelta: settlement.loser.delta,
        });
        // Listeners (leaderboard invalidation) settle before the caller sees the result.
        await this.bus.publish("ratings.updated", settlement);
        return { status: "applied", settlement };
      } catch (error) {
        logger.warn("[Rating] Commit failed", {
          sessionId: summary.sessionId,
          attempt,
          error: toErrorMessage(error),
        });
        if (attempt < this.commitAttempts) {
          await this.sleep(this.baseDelayMs * 2 ** (attempt - 1));
        }
      }
    }

    this.pending.set(summary.sessionId, summary);
    logger.error("[Rating] Settlement parked for retry", {
      sessionId: summary.sessionId,
      pending: this.pending.size,
    });
    return { status: "pending" };
  }

  pendingCount(): number {
    return this.pending.size;
  }

  /** Re-drive every parked settlement once. */
  async retryPending(): Promise<void> {
    if (this.isRetrying) return;
    this.isRetrying = true;
    try {
      for (const summary of [...this.pending.values()]) {
        await this.applySession(summary);
      }
    } finally {
      this.isRetrying = false;
    }
  }

  start(): void {
    if (this.retryInterval) {
      logger.warn("[Rating] Pending retry scheduler already running");
      return;
    }
    this.retryInterval = setInterval(() => {
      this.retryPending().catch((error: unknown) => {
        logger.error("[Rating] Pending retry failed", { error: toErrorMessage(error) });
      });
    }, this.pendingRetryMs);
    this.retryInterval.unref();
    logger.info("[Rating] Pending retry scheduler started", { intervalMs: this.pendingRetryMs });
  }

  stop(): void {
    if (this.retryInterval) {
      clearInterval(this.retryInterval);
      this.retryInterval = null;
    }
    this.detach();
  }
}
