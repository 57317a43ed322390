/**
 * Rating engine types
 */

export interface RankHistoryEntry {
  rank: string;
  rating: number;
  achievedAt: number;
}

export interface PlayerRatingRecord {
  id: string;
  displayName: string;
  rating: number;
  rank: string;
  gamesPlayed: number;
  wins: number;
  losses: number;
  /** Positive: win streak, negative: loss streak */
  currentStreak: number;
  longestStreak: number;
  roundsPlayed: number;
  plantsIdentified: number;
  /** plantsIdentified / roundsPlayed, 0 before the first round */
  accuracy: number;
  averageResponseTimeMs: number | null;
  rankHistory: RankHistoryEntry[];
  lastGameAt: number | null;
  /** Optimistic concurrency counter, bumped on every commit */
  version: number;
}

export interface RatingWrite {
  record: PlayerRatingRecord;
  expectedVersion: number;
}

export interface PlayerSettlement {
  playerId: string;
  previousRating: number;
  rating: number;
  delta: number;
  previousRank: string;
  rank: string;
  rankChanged: boolean;
  currentStreak: number;
}

export interface RatingSettlement {
  sessionId: string;
  winner: PlayerSettlement;
  loser: PlayerSettlement;
  settledAt: number;
}

export interface RankBand {
  rank: string;
  minRating: number;
}
