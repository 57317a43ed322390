/**
 * Round and session resolution rules.
 *
 * Pure functions over session snapshots; the registry calls them while
 * holding the session lock.
 */

import type {
  AnswerRecord,
  BattleSession,
  DifficultyBand,
  PlayerGameStats,
  Round,
  RoundWinner,
  Seat,
  SessionOutcome,
  SessionSummary,
} from "./types";

export const SEATS: readonly Seat[] = ["A", "B"];

export function otherSeat(seat: Seat): Seat {
  return seat === "A" ? "B" : "A";
}

function isCorrect(answer: AnswerRecord | undefined, correctIndex: number): answer is AnswerRecord {
  return answer !== undefined && answer.selectedIndex === correctIndex;
}

/**
 * Winner precedence:
 * 1. exactly one correct answer wins,
 * 2. both correct: earliest server receive time wins; identical timestamps go to seat A,
 * 3. neither correct (or unanswered): no winner.
 */
export function decideRoundWinner(round: Pick<Round, "answers" | "correctIndex">): RoundWinner {
  const a = round.answers.A;
  const b = round.answers.B;
  const aCorrect = isCorrect(a, round.correctIndex);
  const bCorrect = isCorrect(b, round.correctIndex);

  if (aCorrect && bCorrect) {
    return b.receivedAt < a.receivedAt ? "B" : "A";
  }
  if (aCorrect) return "A";
  if (bCorrect) return "B";
  return "none";
}

export function seatStats(session: BattleSession, seat: Seat): Omit<PlayerGameStats, "playerId" | "displayName"> {
  let roundsWon = 0;
  let correctAnswers = 0;
  let latencyTotal = 0;

  const resolved = session.rounds.filter((round) => round.winner !== null);
  for (const round of resolved) {
    if (round.winner === seat) roundsWon++;
    const answer = round.answers[seat];
    if (isCorrect(answer, round.correctIndex)) {
      correctAnswers++;
      latencyTotal += Math.max(0, answer.receivedAt - round.startedAt);
    }
  }

  return {
    roundsPlayed: resolved.length,
    roundsWon,
    correctAnswers,
    averageResponseTimeMs: correctAnswers > 0 ? Math.round(latencyTotal / correctAnswers) : null,
  };
}

/**
 * Fallback once the sudden-death cap is reached: more correct answers,
 * then lower mean latency on correct answers, then seat A.
 */
export function tiebreakWinner(session: BattleSession): Seat {
  const a = seatStats(session, "A");
  const b = seatStats(session, "B");
  if (a.correctAnswers !== b.correctAnswers) {
    return a.correctAnswers > b.correctAnswers ? "A" : "B";
  }
  const aLatency = a.averageResponseTimeMs ?? Number.POSITIVE_INFINITY;
  const bLatency = b.averageResponseTimeMs ?? Number.POSITIVE_INFINITY;
  return bLatency < aLatency ? "B" : "A";
}

export type SessionProgress =
  | { kind: "next_round" }
  | { kind: "sudden_death" }
  | { kind: "complete"; outcome: SessionOutcome };

export interface ProgressRules {
  regulationRounds: number;
  maxSuddenDeathRounds: number;
}

/** What happens after the latest round resolved. */
export function decideProgress(session: BattleSession, rules: ProgressRules): SessionProgress {
  const played = session.rounds.length;
  if (played < rules.regulationRounds) return { kind: "next_round" };

  const { A, B } = session.scores;
  if (A !== B) {
    return {
      kind: "complete",
      outcome: {
        winner: A > B ? "A" : "B",
        reason: played > rules.regulationRounds ? "sudden_death" : "points",
      },
    };
  }

  if (played - rules.regulationRounds < rules.maxSuddenDeathRounds) {
    return { kind: "sudden_death" };
  }
  return { kind: "complete", outcome: { winner: tiebreakWinner(session), reason: "tiebreak" } };
}

export function bandForRating(rating: number): DifficultyBand {
  if (rating < 1000) return "easy";
  if (rating < 1400) return "medium";
  if (rating < 1800) return "hard";
  return "expert";
}

/** Bands from the given one down to easy, used when content runs short. */
export function easierBands(band: DifficultyBand): DifficultyBand[] {
  const order: DifficultyBand[] = ["expert", "hard", "medium", "easy"];
  return order.slice(order.indexOf(band));
}

export function seatOf(session: BattleSession, playerId: string): Seat | null {
  if (session.playerA.id === playerId) return "A";
  if (session.playerB?.id === playerId) return "B";
  return null;
}

/** Rating input for a decided session; null when there is no winner to settle. */
export function summarizeSession(session: BattleSession): SessionSummary | null {
  if (!session.outcome || !session.playerB) return null;

  const winnerSeat = session.outcome.winner;
  const loserSeat = otherSeat(winnerSeat);
  const players = { A: session.playerA, B: session.playerB };

  return {
    sessionId: session.id,
    difficulty: session.difficulty,
    reason: session.outcome.reason,
    winner: {
      playerId: players[winnerSeat].id,
      displayName: players[winnerSeat].displayName,
      ...seatStats(session, winnerSeat),
    },
    loser: {
      playerId: players[loserSeat].id,
      displayName: players[loserSeat].displayName,
      ...seatStats(session, loserSeat),
    },
    endedAt: session.endedAt ?? session.updatedAt,
  };
}

/** Returns a description of the first broken invariant, or null. */
export function findInvariantViolation(session: BattleSession): string | null {
  // A waiting session may be abandoned unbound; anything that was played needs both seats.
  const needsOpponent =
    session.state === "matched" ||
    session.state === "in_progress" ||
    session.state === "completed" ||
    session.outcome !== null ||
    session.rounds.length > 0;
  if (needsOpponent && !session.playerB) return "session left waiting without a second player";
  if (session.playerB && session.playerB.id === session.playerA.id) return "session pairs a player with themselves";

  let wins: Record<Seat, number> = { A: 0, B: 0 };
  for (let i = 0; i < session.rounds.length; i++) {
    const round = session.rounds[i];
    if (round.index !== i) return `round at position ${i} carries index ${round.index}`;
    if (round.winner === null && i !== session.rounds.length - 1) {
      return `round ${i} is unresolved but not the latest round`;
    }
    if (round.winner === "A" || round.winner === "B") {
      wins = { ...wins, [round.winner]: wins[round.winner] + 1 };
    }
  }

  if (session.currentRound !== session.rounds.length - 1) {
    return `current round ${session.currentRound} does not match ${session.rounds.length} rounds`;
  }
  if (wins.A !== session.scores.A || wins.B !== session.scores.B) {
    return "scores diverge from round winners";
  }
  if (session.state === "completed" && !session.outcome) {
    return "completed session has no outcome";
  }
  return null;
}
