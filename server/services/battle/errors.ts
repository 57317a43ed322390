/**
 * Battle error kinds and the Result shape returned by the Session Registry,
 * Matchmaker and Rating Engine.
 */

export type BattleErrorCode =
  | "MATCHMAKING_TIMEOUT"
  | "SESSION_FULL"
  | "SESSION_NOT_FOUND"
  | "SELF_PAIRING"
  | "ALREADY_QUEUED"
  | "ALREADY_IN_SESSION"
  | "INVITE_NOT_FOUND"
  | "INVITE_CODE_UNAVAILABLE"
  | "INVALID_ANSWER"
  | "NOT_PARTICIPANT"
  | "ILLEGAL_TRANSITION"
  | "RATING_UPDATE_CONFLICT"
  | "CONNECTION_LOST"
  | "PLANT_PROVIDER_UNAVAILABLE"
  | "CACHE_UNAVAILABLE"
  | "INVARIANT_VIOLATION";

export class BattleError extends Error {
  constructor(
    readonly code: BattleErrorCode,
    message: string,
    readonly retryable: boolean = false
  ) {
    super(message);
    this.name = "BattleError";
  }
}

export class MatchmakingTimeoutError extends BattleError {
  constructor(message = "No opponent found in time. Try again or send an invite code.") {
    super("MATCHMAKING_TIMEOUT", message, true);
    this.name = "MatchmakingTimeoutError";
  }
}

export class SessionFullError extends BattleError {
  constructor(sessionId: string) {
    super("SESSION_FULL", `Session ${sessionId} is not accepting players`);
    this.name = "SessionFullError";
  }
}

export class SessionNotFoundError extends BattleError {
  constructor(sessionId: string) {
    super("SESSION_NOT_FOUND", `Session ${sessionId} not found`);
    this.name = "SessionNotFoundError";
  }
}

export class SelfPairingError extends BattleError {
  constructor() {
    super("SELF_PAIRING", "A player cannot be paired with themselves");
    this.name = "SelfPairingError";
  }
}

export class AlreadyQueuedError extends BattleError {
  constructor() {
    super("ALREADY_QUEUED", "Player is already waiting for a match");
    this.name = "AlreadyQueuedError";
  }
}

export class AlreadyInSessionError extends BattleError {
  constructor(sessionId: string) {
    super("ALREADY_IN_SESSION", `Player is already in session ${sessionId}`);
    this.name = "AlreadyInSessionError";
  }
}

export class InviteNotFoundError extends BattleError {
  constructor() {
    super("INVITE_NOT_FOUND", "Invite code is unknown, used, or expired");
    this.name = "InviteNotFoundError";
  }
}

export class InviteCodeUnavailableError extends BattleError {
  constructor() {
    super("INVITE_CODE_UNAVAILABLE", "Could not allocate a free invite code", true);
    this.name = "InviteCodeUnavailableError";
  }
}

export class InvalidAnswerError extends BattleError {
  constructor(message: string) {
    super("INVALID_ANSWER", message);
    this.name = "InvalidAnswerError";
  }
}

export class NotParticipantError extends BattleError {
  constructor(sessionId: string) {
    super("NOT_PARTICIPANT", `Player is not part of session ${sessionId}`);
    this.name = "NotParticipantError";
  }
}

export class IllegalTransitionError extends BattleError {
  constructor(from: string, event: string) {
    super("ILLEGAL_TRANSITION", `Event ${event} is not allowed in state ${from}`);
    this.name = "IllegalTransitionError";
  }
}

export class RatingUpdateConflictError extends BattleError {
  constructor(message: string) {
    super("RATING_UPDATE_CONFLICT", message, true);
    this.name = "RatingUpdateConflictError";
  }
}

export class PlantProviderUnavailableError extends BattleError {
  constructor(message: string) {
    super("PLANT_PROVIDER_UNAVAILABLE", message, true);
    this.name = "PlantProviderUnavailableError";
  }
}

export class CacheUnavailableError extends BattleError {
  constructor(message: string) {
    super("CACHE_UNAVAILABLE", message, true);
    this.name = "CacheUnavailableError";
  }
}

export class InvariantViolationError extends BattleError {
  constructor(message: string) {
    super("INVARIANT_VIOLATION", message);
    this.name = "InvariantViolationError";
  }
}

export type Result<T, E extends BattleError = BattleError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E extends BattleError>(error: E): { success: false; error: E } {
  return { success: false, error };
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
