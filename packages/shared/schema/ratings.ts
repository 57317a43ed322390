import { pgTable, serial, integer, real, timestamp, varchar, index } from "drizzle-orm/pg-core";

// Player rating profiles, one row per player, written by the rating engine
export const players = pgTable(
  "players",
  {
    id: varchar("id", { length: 255 }).primaryKey(),
    displayName: varchar("display_name", { length: 100 }).notNull(),
    rating: integer("rating").notNull().default(1000),
    rank: varchar("rank", { length: 50 }).notNull(),
    gamesPlayed: integer("games_played").notNull().default(0),
    wins: integer("wins").notNull().default(0),
    losses: integer("losses").notNull().default(0),
    currentStreak: integer("current_streak").notNull().default(0), // positive = wins, negative = losses
    longestStreak: integer("longest_streak").notNull().default(0),
    roundsPlayed: integer("rounds_played").notNull().default(0),
    plantsIdentified: integer("plants_identified").notNull().default(0),
    accuracy: real("accuracy").notNull().default(0),
    averageResponseTimeMs: integer("average_response_time_ms"),
    lastGameAt: timestamp("last_game_at"),
    version: integer("version").notNull().default(0), // optimistic concurrency
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    standingIdx: index("IDX_players_standing").on(table.rating, table.wins),
  })
);

// Append-only rank achievements
export const rankHistory = pgTable(
  "rank_history",
  {
    id: serial("id").primaryKey(),
    playerId: varchar("player_id", { length: 255 })
      .notNull()
      .references(() => players.id, { onDelete: "cascade" }),
    rank: varchar("rank", { length: 50 }).notNull(),
    rating: integer("rating").notNull(),
    achievedAt: timestamp("achieved_at").notNull(),
  },
  (table) => ({
    playerIdx: index("IDX_rank_history_player").on(table.playerId, table.achievedAt),
  })
);

// Sessions whose outcome is already reflected in ratings (exactly-once guard)
export const appliedSessions = pgTable("applied_sessions", {
  sessionId: varchar("session_id", { length: 255 }).primaryKey(),
  winnerId: varchar("winner_id", { length: 255 }).notNull(),
  loserId: varchar("loser_id", { length: 255 }).notNull(),
  appliedAt: timestamp("applied_at").defaultNow().notNull(),
});

export type PlayerRow = typeof players.$inferSelect;
export type RankHistoryRow = typeof rankHistory.$inferSelect;
