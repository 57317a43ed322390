export interface LeaderboardEntry {
  position: number;
  playerId: string;
  displayName: string;
  rating: number;
  rank: string;
  wins: number;
  gamesPlayed: number;
  /** Percent with one decimal, 0 before the first game */
  winRate: number;
  currentStreak: number;
}

export interface LeaderboardPage {
  entries: LeaderboardEntry[];
  limit: number;
  offset: number;
}

/**
 * Epoch-versioned page cache. Bumping the epoch orphans every stored page,
 * including pages a slow reader writes back after the bump.
 */
export interface LeaderboardCache {
  currentEpoch(): Promise<number>;
  get(epoch: number, limit: number, offset: number): Promise<LeaderboardPage | null>;
  set(epoch: number, limit: number, offset: number, page: LeaderboardPage, ttlSeconds: number): Promise<void>;
  /** Bump the epoch; returns the new one. */
  invalidate(): Promise<number>;
}
