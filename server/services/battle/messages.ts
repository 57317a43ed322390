/**
 * Outbound message contract between the battle core and connected players.
 *
 * The core only knows a `BattleGateway`; the Socket.io layer implements it.
 * Timestamps on the wire are ISO-8601 strings; scores are keyed by player id.
 */

import type { AbandonReason, BattleSession, DifficultyBand, OutcomeReason, SessionState } from "./types";

export interface OpponentView {
  id: string;
  displayName: string;
  rating: number;
}

export interface MatchQueuedPayload {
  queuedAt: string;
  timeoutAt: string;
}

export interface MatchFoundPayload {
  sessionId: string;
  opponent: OpponentView;
  difficulty: DifficultyBand;
  startsAt: string;
}

export interface InviteCreatedPayload {
  code: string;
  expiresAt: string;
}

export interface RoundStartPayload {
  sessionId: string;
  roundIndex: number;
  plantRef: { id: string; imageRef: string };
  options: string[];
  deadline: string;
  suddenDeath: boolean;
}

export interface RoundResultPayload {
  sessionId: string;
  roundIndex: number;
  /** Player id of the round winner, null when nobody scored */
  winner: string | null;
  correctIndex: number;
  plantName: string;
  fact: string;
  scores: Record<string, number>;
}

export interface SessionCompletePayload {
  sessionId: string;
  winner: string;
  finalScores: Record<string, number>;
  reward: number;
  reason: OutcomeReason;
}

export interface SessionCancelledPayload {
  sessionId: string;
  reason: AbandonReason;
}

export interface SessionStatePayload {
  sessionId: string;
  state: SessionState;
  opponent: OpponentView | null;
  roundIndex: number;
  scores: Record<string, number>;
  /** The round still open for answers, if any */
  openRound: RoundStartPayload | null;
  winner: string | null;
}

export interface RatingUpdatePayload {
  sessionId: string;
  rating: number;
  delta: number;
  rank: string;
  rankChanged: boolean;
  currentStreak: number;
}

export interface ErrorPayload {
  code: string;
  message: string;
  retryable: boolean;
}

export interface OutboundMessages {
  matchQueued: MatchQueuedPayload;
  matchFound: MatchFoundPayload;
  inviteCreated: InviteCreatedPayload;
  roundStart: RoundStartPayload;
  roundResult: RoundResultPayload;
  sessionComplete: SessionCompletePayload;
  sessionCancelled: SessionCancelledPayload;
  sessionState: SessionStatePayload;
  ratingUpdate: RatingUpdatePayload;
  error: ErrorPayload;
}

export type OutboundEvent = keyof OutboundMessages;

/** Delivery seam used by the battle core. */
export interface BattleGateway {
  sendTo<K extends OutboundEvent>(playerId: string, event: K, payload: OutboundMessages[K]): void;
  isConnected(playerId: string): boolean;
}

export function scoresByPlayer(session: BattleSession): Record<string, number> {
  const scores: Record<string, number> = { [session.playerA.id]: session.scores.A };
  if (session.playerB) scores[session.playerB.id] = session.scores.B;
  return scores;
}

export function toOpponentView(player: OpponentView): OpponentView {
  return { id: player.id, displayName: player.displayName, rating: player.rating };
}
