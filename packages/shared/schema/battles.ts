import { z } from "zod";
import { pgTable, timestamp, json, varchar, index, integer } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";

export interface ArchivedAnswer {
  selectedIndex: number;
  receivedAt: number;
}

export interface ArchivedRound {
  index: number;
  plantId: string;
  options: string[];
  correctIndex: number;
  answers: { A?: ArchivedAnswer; B?: ArchivedAnswer };
  startedAt: number;
  deadline: number;
  suddenDeath: boolean;
  winner: "A" | "B" | "none" | null;
}

// Finished battle sessions, written once their retention window ends
export const battleSessions = pgTable(
  "battle_sessions",
  {
    id: varchar("id", { length: 255 }).primaryKey(),
    playerAId: varchar("player_a_id", { length: 255 }).notNull(),
    playerBId: varchar("player_b_id", { length: 255 }).notNull(),
    origin: varchar("origin", { length: 20 }).notNull(), // 'pool' | 'invite'
    state: varchar("state", { length: 20 }).notNull(), // 'completed' | 'abandoned'
    difficulty: varchar("difficulty", { length: 20 }).notNull(),
    scoreA: integer("score_a").notNull().default(0),
    scoreB: integer("score_b").notNull().default(0),
    winnerId: varchar("winner_id", { length: 255 }),
    outcomeReason: varchar("outcome_reason", { length: 20 }),
    abandonReason: varchar("abandon_reason", { length: 40 }),
    rounds: json("rounds").$type<ArchivedRound[]>().notNull().default([]),
    createdAt: timestamp("created_at").notNull(),
    endedAt: timestamp("ended_at"),
  },
  (table) => ({
    playerAIdx: index("IDX_battle_sessions_player_a").on(table.playerAId, table.createdAt),
    playerBIdx: index("IDX_battle_sessions_player_b").on(table.playerBId, table.createdAt),
  })
);

export const insertBattleSessionSchema = createInsertSchema(battleSessions, {
  state: z.enum(["completed", "abandoned"]),
  origin: z.enum(["pool", "invite"]),
  difficulty: z.enum(["easy", "medium", "hard", "expert"]),
});

export type InsertBattleSession = typeof battleSessions.$inferInsert;
export type BattleSessionRow = typeof battleSessions.$inferSelect;
