/**
 * PostgreSQL rating store (drizzle-orm).
 *
 * `commitSession` runs in one transaction: every player row is updated with
 * a `version = expected` guard, new rank-history rows are appended, and the
 * session is recorded in `applied_sessions`. Any stale version rolls the
 * whole transaction back with RatingUpdateConflictError.
 */

import { and, asc, desc, eq, gt } from "drizzle-orm";
import { appliedSessions, players, rankHistory, type PlayerRow, type RankHistoryRow } from "@shared/schema";
import type { Database } from "../../db";
import { DEFAULT_RATING } from "../../config/constants";
import { RatingUpdateConflictError } from "../battle/errors";
import { rankForRating } from "./ranks";
import type { PlayerIdentity, RatingStore } from "./ratingStore";
import type { PlayerRatingRecord, RankBand, RatingWrite } from "./types";

function toRecord(row: PlayerRow, history: RankHistoryRow[]): PlayerRatingRecord {
  return {
    id: row.id,
    displayName: row.displayName,
    rating: row.rating,
    rank: row.rank,
    gamesPlayed: row.gamesPlayed,
    wins: row.wins,
    losses: row.losses,
    currentStreak: row.currentStreak,
    longestStreak: row.longestStreak,
    roundsPlayed: row.roundsPlayed,
    plantsIdentified: row.plantsIdentified,
    accuracy: row.accuracy,
    averageResponseTimeMs: row.averageResponseTimeMs,
    rankHistory: history.map((entry) => ({
      rank: entry.rank,
      rating: entry.rating,
      achievedAt: entry.achievedAt.getTime(),
    })),
    lastGameAt: row.lastGameAt ? row.lastGameAt.getTime() : null,
    version: row.version,
  };
}

export class DrizzleRatingStore implements RatingStore {
  constructor(
    private readonly db: Database,
    private readonly bands?: readonly RankBand[]
  ) {}

  async getPlayer(playerId: string): Promise<PlayerRatingRecord | null> {
    const [row] = await this.db.select().from(players).where(eq(players.id, playerId)).limit(1);
    if (!row) return null;
    const history = await this.db
      .select()
      .from(rankHistory)
      .where(eq(rankHistory.playerId, playerId))
      .orderBy(asc(rankHistory.achievedAt));
    return toRecord(row, history);
  }

  async ensurePlayer(player: PlayerIdentity): Promise<PlayerRatingRecord> {
    await this.db
      .insert(players)
      .values({
        id: player.id,
        displayName: player.displayName,
        rating: DEFAULT_RATING,
        rank: rankForRating(DEFAULT_RATING, this.bands),
      })
      .onConflictDoNothing({ target: players.id });

    const record = await this.getPlayer(player.id);
    if (!record) {
      throw new Error(`Player ${player.id} missing after insert`);
    }
    return record;
  }

  async hasAppliedSession(sessionId: string): Promise<boolean> {
    const rows = await this.db
      .select({ sessionId: appliedSessions.sessionId })
      .from(appliedSessions)
      .where(eq(appliedSessions.sessionId, sessionId))
      .limit(1);
    return rows.length > 0;
  }

  async commitSession(sessionId: string, writes: RatingWrite[]): Promise<void> {
    const [winner, loser] = writes;
    if (!winner || !loser) {
      throw new RatingUpdateConflictError(`Session ${sessionId} needs exactly two rating writes`);
    }

    await this.db.transaction(async (tx) => {
      const claimed = await tx
        .insert(appliedSessions)
        .values({ sessionId, winnerId: winner.record.id, loserId: loser.record.id })
        .onConflictDoNothing({ target: appliedSessions.sessionId })
        .returning({ sessionId: appliedSessions.sessionId });
      if (claimed.length === 0) {
        throw new RatingUpdateConflictError(`Session ${sessionId} was already applied`);
      }

      for (const { record, expectedVersion } of writes) {
        const updated = await tx
          .update(players)
          .set({
            displayName: record.displayName,
            rating: record.rating,
            rank: record.rank,
            gamesPlayed: record.gamesPlayed,
            wins: record.wins,
            losses: record.losses,
            currentStreak: record.currentStreak,
            longestStreak: record.longestStreak,
            roundsPlayed: record.roundsPlayed,
            plantsIdentified: record.plantsIdentified,
            accuracy: record.accuracy,
            averageResponseTimeMs: record.averageResponseTimeMs,
            lastGameAt: record.lastGameAt === null ? null : new Date(record.lastGameAt),
            version: record.version,
            updatedAt: new Date(),
          })
          .where(and(eq(players.id, record.id), eq(players.version, expectedVersion)))
          .returning({ id: players.id });
        if (updated.length === 0) {
          throw new RatingUpdateConflictError(`Player ${record.id} changed since version ${expectedVersion}`);
        }

        const known = await tx
          .select({ id: rankHistory.id })
          .from(rankHistory)
          .where(eq(rankHistory.playerId, record.id));
        const appended = record.rankHistory.slice(known.length);
        if (appended.length > 0) {
          await tx.insert(rankHistory).values(
            appended.map((entry) => ({
              playerId: record.id,
              rank: entry.rank,
              rating: entry.rating,
              achievedAt: new Date(entry.achievedAt),
            }))
          );
        }
      }
    });
  }

  async listLeaderboard(limit: number, offset: number): Promise<PlayerRatingRecord[]> {
    const rows = await this.db
      .select()
      .from(players)
      .where(gt(players.gamesPlayed, 0))
      .orderBy(desc(players.rating), desc(players.wins), asc(players.id))
      .limit(limit)
      .offset(offset);
    return rows.map((row) => toRecord(row, []));
  }
}
