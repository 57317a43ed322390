/**
 * Persistent rating store contract plus the in-memory implementation used
 * for local runs and tests. See drizzleRatingStore.ts for PostgreSQL.
 */

import { DEFAULT_RATING } from "../../config/constants";
import { RatingUpdateConflictError } from "../battle/errors";
import { rankForRating } from "./ranks";
import type { PlayerRatingRecord, RankBand, RatingWrite } from "./types";

export interface PlayerIdentity {
  id: string;
  displayName: string;
}

export interface RatingStore {
  getPlayer(playerId: string): Promise<PlayerRatingRecord | null>;
  /** Fetch the player, creating a default profile on first sight. */
  ensurePlayer(player: PlayerIdentity): Promise<PlayerRatingRecord>;
  hasAppliedSession(sessionId: string): Promise<boolean>;
  /**
   * Write every record and mark the session applied, or change nothing.
   * Throws RatingUpdateConflictError when any expected version is stale.
   */
  commitSession(sessionId: string, writes: RatingWrite[]): Promise<void>;
  /** Players with at least one rated game, ordered by rating desc, wins desc, id asc. */
  listLeaderboard(limit: number, offset: number): Promise<PlayerRatingRecord[]>;
}

export function newPlayerRecord(
  player: PlayerIdentity,
  rating: number = DEFAULT_RATING,
  bands?: readonly RankBand[]
): PlayerRatingRecord {
  return {
    id: player.id,
    displayName: player.displayName,
    rating,
    rank: rankForRating(rating, bands),
    gamesPlayed: 0,
    wins: 0,
    losses: 0,
    currentStreak: 0,
    longestStreak: 0,
    roundsPlayed: 0,
    plantsIdentified: 0,
    accuracy: 0,
    averageResponseTimeMs: null,
    rankHistory: [],
    lastGameAt: null,
    version: 0,
  };
}

export function compareStanding(a: PlayerRatingRecord, b: PlayerRatingRecord): number {
  if (a.rating !== b.rating) return b.rating - a.rating;
  if (a.wins !== b.wins) return b.wins - a.wins;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class InMemoryRatingStore implements RatingStore {
  private readonly players = new Map<string, PlayerRatingRecord>();
  private readonly appliedSessions = new Set<string>();

  constructor(private readonly bands?: readonly RankBand[]) {}

  async getPlayer(playerId: string): Promise<PlayerRatingRecord | null> {
    const record = this.players.get(playerId);
    return record ? structuredClone(record) : null;
  }

  async ensurePlayer(player: PlayerIdentity): Promise<PlayerRatingRecord> {
    let record = this.players.get(player.id);
    if (!record) {
      record = newPlayerRecord(player, DEFAULT_RATING, this.bands);
      this.players.set(player.id, record);
    }
    return structuredClone(record);
  }

  /** Seed or overwrite a profile directly. */
  async put(record: PlayerRatingRecord): Promise<void> {
    this.players.set(record.id, structuredClone(record));
  }

  async hasAppliedSession(sessionId: string): Promise<boolean> {
    return this.appliedSessions.has(sessionId);
  }

  async commitSession(sessionId: string, writes: RatingWrite[]): Promise<void> {
    if (this.appliedSessions.has(sessionId)) {
      throw new RatingUpdateConflictError(`Session ${sessionId} was already applied`);
    }
    for (const { record, expectedVersion } of writes) {
      const current = this.players.get(record.id);
      if ((current?.version ?? 0) !== expectedVersion) {
        throw new RatingUpdateConflictError(
          `Player ${record.id} is at version ${current?.version ?? 0}, expected ${expectedVersion}`
        );
      }
    }
    for (const { record } of writes) {
      this.players.set(record.id, structuredClone(record));
    }
    this.appliedSessions.add(sessionId);
  }

  async listLeaderboard(limit: number, offset: number): Promise<PlayerRatingRecord[]> {
    return [...this.players.values()]
      .filter((record) => record.gamesPlayed > 0)
      .sort(compareStanding)
      .slice(offset, offset + limit)
      .map((record) => structuredClone(record));
  }
}
