/**
 * Battle Core Type Definitions
 *
 * Timestamps are epoch milliseconds taken from the server clock.
 */

export type SessionState = "waiting" | "matched" | "in_progress" | "completed" | "abandoned";

/** Seat A is the player who opened the session (first in the pool, or the inviter). */
export type Seat = "A" | "B";

export type RoundWinner = Seat | "none";

export type DifficultyBand = "easy" | "medium" | "hard" | "expert";

export type SessionOrigin = "pool" | "invite";

export type AbandonReason =
  | "matchmaking_timeout"
  | "invite_expired"
  | "player_left"
  | "disconnect_timeout"
  | "content_unavailable"
  | "invariant_violation"
  | "superseded";

export type OutcomeReason = "points" | "sudden_death" | "tiebreak" | "forfeit";

export interface PlayerRef {
  id: string;
  displayName: string;
  rating: number;
}

export interface PlantRecord {
  id: string;
  name: string;
  imageRef: string;
  fact: string;
}

export interface AnswerRecord {
  selectedIndex: number;
  receivedAt: number;
}

export interface Round {
  index: number;
  plant: PlantRecord;
  options: string[];
  correctIndex: number;
  answers: Partial<Record<Seat, AnswerRecord>>;
  startedAt: number;
  deadline: number;
  suddenDeath: boolean;
  winner: RoundWinner | null;
  resolvedAt: number | null;
}

export interface SessionOutcome {
  winner: Seat;
  reason: OutcomeReason;
}

export interface BattleSession {
  id: string;
  state: SessionState;
  origin: SessionOrigin;
  playerA: PlayerRef;
  playerB: PlayerRef | null;
  difficulty: DifficultyBand;
  rounds: Round[];
  currentRound: number;
  scores: Record<Seat, number>;
  suddenDeath: boolean;
  connected: Record<Seat, boolean>;
  outcome: SessionOutcome | null;
  abandonReason: AbandonReason | null;
  createdAt: number;
  updatedAt: number;
  endedAt: number | null;
}

/** Per-player statistics for one finished session. */
export interface PlayerGameStats {
  playerId: string;
  displayName: string;
  roundsPlayed: number;
  roundsWon: number;
  correctAnswers: number;
  /** Mean receive latency over correct answers; null when none were correct */
  averageResponseTimeMs: number | null;
}

/** What the Rating Engine consumes for a decided session. */
export interface SessionSummary {
  sessionId: string;
  difficulty: DifficultyBand;
  reason: OutcomeReason;
  winner: PlayerGameStats;
  loser: PlayerGameStats;
  endedAt: number;
}
