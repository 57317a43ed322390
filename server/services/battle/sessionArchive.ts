/**
 * PostgreSQL archive for finished sessions (`battle_sessions`).
 *
 * Rows are written once, when the registry evicts a session after its
 * retention window, and validated against the drizzle-zod insert schema.
 */

import { battleSessions, insertBattleSessionSchema, type ArchivedRound, type InsertBattleSession } from "@shared/schema";
import type { Database } from "../../db";
import logger from "../../logger";
import type { SessionArchive } from "./sessionRegistry";
import type { BattleSession, Round } from "./types";

function archiveRound(round: Round): ArchivedRound {
  return {
    index: round.index,
    plantId: round.plant.id,
    options: [...round.options],
    correctIndex: round.correctIndex,
    answers: { ...round.answers },
    startedAt: round.startedAt,
    deadline: round.deadline,
    suddenDeath: round.suddenDeath,
    winner: round.winner,
  };
}

/** Throws a ZodError when the session can't be stored as-is. */
export function toArchiveRow(session: BattleSession): InsertBattleSession | null {
  if (!session.playerB) return null;
  const winner = session.outcome?.winner;
  const row: InsertBattleSession = {
    id: session.id,
    playerAId: session.playerA.id,
    playerBId: session.playerB.id,
    origin: session.origin,
    state: session.state,
    difficulty: session.difficulty,
    scoreA: session.scores.A,
    scoreB: session.scores.B,
    winnerId: winner === "A" ? session.playerA.id : winner === "B" ? session.playerB.id : null,
    outcomeReason: session.outcome?.reason ?? null,
    abandonReason: session.abandonReason,
    rounds: session.rounds.map(archiveRound),
    createdAt: new Date(session.createdAt),
    endedAt: session.endedAt === null ? null : new Date(session.endedAt),
  };
  insertBattleSessionSchema.parse(row);
  return row;
}

export class DrizzleSessionArchive implements SessionArchive {
  constructor(private readonly db: Database) {}

  async save(session: BattleSession): Promise<void> {
    const row = toArchiveRow(session);
    if (!row) return;
    await this.db.insert(battleSessions).values(row).onConflictDoNothing({ target: battleSessions.id });
    logger.debug("[Sessions] Archived session", { sessionId: session.id, state: session.state });
  }
}
