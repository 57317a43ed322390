/**
 * Session Registry
 *
 * Authoritative owner of every battle session. All mutation goes through a
 * per-session FIFO lock and is applied to a draft copy; the draft is only
 * committed if the session invariants still hold. A draft that breaks an
 * invariant force-abandons the session instead (no rating effect).
 *
 * Timers (match wait, warm-up, answer window, reconnect grace, retention)
 * are owned here per session and cleared on every terminal transition.
 */

import { randomUUID } from "node:crypto";
import logger from "../../logger";
import { KeyedMutex } from "../../utils/keyedMutex";
import { SESSION_RETENTION_MS } from "../../config/constants";
import type { BattleEventBus } from "./eventBus";
import {
  IllegalTransitionError,
  InvalidAnswerError,
  InvariantViolationError,
  NotParticipantError,
  SelfPairingError,
  SessionFullError,
  SessionNotFoundError,
  fail,
  ok,
  toErrorMessage,
  type Result,
} from "./errors";
import { bandForRating, decideRoundWinner, findInvariantViolation, seatOf } from "./resolution";
import { isTerminal, transition, type SessionEffect, type SessionEvent } from "./stateMachine";
import type {
  AbandonReason,
  BattleSession,
  PlantRecord,
  PlayerRef,
  Round,
  Seat,
  SessionOrigin,
} from "./types";

/** Where finished sessions go once their retention window ends. */
export interface SessionArchive {
  save(session: BattleSession): Promise<void>;
}

export interface SessionRegistryOptions {
  bus: BattleEventBus;
  retentionMs?: number;
  archive?: SessionArchive | null;
  now?: () => number;
  generateId?: () => string;
}

export interface WaitingSessionOptions {
  origin: SessionOrigin;
  /** Bounded wait before the session is abandoned */
  waitMs: number;
  timeoutReason: Extract<AbandonReason, "matchmaking_timeout" | "invite_expired">;
}

export interface NewRound {
  plant: PlantRecord;
  options: string[];
  correctIndex: number;
  startedAt: number;
  deadline: number;
}

export interface AnswerReceipt {
  seat: Seat;
  /** false when the answer arrived after the deadline and was dropped */
  accepted: boolean;
  bothAnswered: boolean;
}

export interface RoundResolution {
  session: BattleSession;
  round: Round;
  /** true when an earlier call already resolved this round */
  alreadyResolved: boolean;
}

type Mutation<T> = Result<{ value: T; effects: SessionEffect[] }>;

export class SessionRegistry {
  private readonly sessions = new Map<string, BattleSession>();
  private readonly timers = new Map<string, Map<string, NodeJS.Timeout>>();
  private readonly locks = new KeyedMutex();
  private readonly bus: BattleEventBus;
  private readonly retentionMs: number;
  private readonly archive: SessionArchive | null;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(options: SessionRegistryOptions) {
    this.bus = options.bus;
    this.retentionMs = options.retentionMs ?? SESSION_RETENTION_MS;
    this.archive = options.archive ?? null;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  async createWaitingSession(player: PlayerRef, options: WaitingSessionOptions): Promise<BattleSession> {
    const createdAt = this.now();
    const session: BattleSession = {
      id: this.generateId(),
      state: "waiting",
      origin: options.origin,
      playerA: { ...player },
      playerB: null,
      difficulty: bandForRating(player.rating),
      rounds: [],
      currentRound: -1,
      scores: { A: 0, B: 0 },
      suddenDeath: false,
      connected: { A: true, B: true },
      outcome: null,
      abandonReason: null,
      createdAt,
      updatedAt: createdAt,
      endedAt: null,
    };
    this.sessions.set(session.id, session);

    this.schedule(session.id, "match_wait", options.waitMs, async () => {
      const result = await this.transition(session.id, { type: "ABANDON", reason: options.timeoutReason });
      if (!result.success && result.error.code !== "ILLEGAL_TRANSITION") {
        logger.warn("[Sessions] Match wait expiry failed", { sessionId: session.id, error: result.error.message });
      }
    });

    logger.debug("[Sessions] Waiting session created", {
      sessionId: session.id,
      playerId: player.id,
      origin: options.origin,
    });
    return structuredClone(session);
  }

  /** Bind the second player; moves the session to `matched`. */
  bindPlayer(sessionId: string, player: PlayerRef): Promise<Result<BattleSession>> {
    return this.mutate(sessionId, (draft) => {
      if (draft.state !== "waiting" || draft.playerB) {
        return fail(new SessionFullError(sessionId));
      }
      if (draft.playerA.id === player.id) {
        return fail(new SelfPairingError());
      }
      draft.playerB = { ...player };
      draft.difficulty = bandForRating((draft.playerA.rating + player.rating) / 2);
      return this.withEvent(draft, { type: "PLAYER_BOUND" });
    });
  }

  transition(sessionId: string, event: SessionEvent): Promise<Result<BattleSession>> {
    return this.mutate(sessionId, (draft) => this.withEvent(draft, event));
  }

  getSession(sessionId: string): Result<BattleSession> {
    const session = this.sessions.get(sessionId);
    if (!session) return fail(new SessionNotFoundError(sessionId));
    return ok(structuredClone(session));
  }

  /** Non-terminal session the player belongs to; a matched session wins over a waiting one. */
  findActiveSessionFor(playerId: string): BattleSession | null {
    let waiting: BattleSession | null = null;
    for (const session of this.sessions.values()) {
      if (isTerminal(session.state) || seatOf(session, playerId) === null) continue;
      if (session.state !== "waiting") return structuredClone(session);
      waiting = session;
    }
    return waiting ? structuredClone(waiting) : null;
  }

  waitingSessionsFor(playerId: string): BattleSession[] {
    const waiting: BattleSession[] = [];
    for (const session of this.sessions.values()) {
      if (session.state === "waiting" && session.playerA.id === playerId) waiting.push(structuredClone(session));
    }
    return waiting;
  }

  /** Most recently touched session with an opponent, including retained finished ones. */
  findLatestSessionFor(playerId: string): BattleSession | null {
    let latest: BattleSession | null = null;
    for (const session of this.sessions.values()) {
      if (!session.playerB || seatOf(session, playerId) === null) continue;
      if (!latest || session.updatedAt >= latest.updatedAt) latest = session;
    }
    return latest ? structuredClone(latest) : null;
  }

  activeCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (!isTerminal(session.state)) count++;
    }
    return count;
  }

  // ==========================================================================
  // Rounds
  // ==========================================================================

  appendRound(sessionId: string, input: NewRound): Promise<Result<Round>> {
    return this.mutate(sessionId, (draft) => {
      if (draft.state !== "in_progress") {
        return fail(new IllegalTransitionError(draft.state, "APPEND_ROUND"));
      }
      const round: Round = {
        index: draft.rounds.length,
        plant: { ...input.plant },
        options: [...input.options],
        correctIndex: input.correctIndex,
        answers: {},
        startedAt: input.startedAt,
        deadline: input.deadline,
        suddenDeath: draft.suddenDeath,
        winner: null,
        resolvedAt: null,
      };
      draft.rounds.push(round);
      draft.currentRound = round.index;
      return ok({ value: structuredClone(round), effects: [] });
    });
  }

  recordAnswer(
    sessionId: string,
    playerId: string,
    roundIndex: number,
    selectedIndex: number,
    receivedAt: number
  ): Promise<Result<AnswerReceipt>> {
    return this.mutate<AnswerReceipt>(sessionId, (draft) => {
      const seat = seatOf(draft, playerId);
      if (!seat || !draft.playerB) return fail(new NotParticipantError(sessionId));
      if (draft.state !== "in_progress") {
        return fail(new InvalidAnswerError("Session is not accepting answers"));
      }

      const round = draft.rounds[roundIndex];
      if (!round) return fail(new InvalidAnswerError(`Round ${roundIndex} has not started`));
      if (!Number.isInteger(selectedIndex) || selectedIndex < 0 || selectedIndex >= round.options.length) {
        return fail(new InvalidAnswerError(`Answer index ${selectedIndex} is out of range`));
      }
      if (round.answers[seat]) {
        return fail(new InvalidAnswerError("Answer already submitted for this round"));
      }

      const receipt = { seat, bothAnswered: false };
      if (receivedAt > round.deadline || round.winner !== null) {
        return ok({ value: { ...receipt, accepted: false }, effects: [] });
      }

      round.answers[seat] = { selectedIndex, receivedAt };
      const bothAnswered = round.answers.A !== undefined && round.answers.B !== undefined;
      return ok({ value: { ...receipt, accepted: true, bothAnswered }, effects: [] });
    });
  }

  /** Idempotent: resolving an already resolved round reports it without touching it. */
  resolveRound(sessionId: string, roundIndex: number, resolvedAt: number): Promise<Result<RoundResolution>> {
    return this.mutate<RoundResolution>(sessionId, (draft) => {
      const round = draft.rounds[roundIndex];
      if (!round) return fail(new InvariantViolationError(`Round ${roundIndex} does not exist`));

      if (round.winner !== null) {
        return ok({
          value: { session: structuredClone(draft), round: structuredClone(round), alreadyResolved: true },
          effects: [],
        });
      }
      if (draft.state !== "in_progress") {
        return fail(new IllegalTransitionError(draft.state, "RESOLVE_ROUND"));
      }

      round.winner = decideRoundWinner(round);
      round.resolvedAt = resolvedAt;
      if (round.winner !== "none") {
        draft.scores[round.winner] += 1;
      }
      return ok({
        value: { session: structuredClone(draft), round: structuredClone(round), alreadyResolved: false },
        effects: [],
      });
    });
  }

  setConnected(sessionId: string, seat: Seat, connected: boolean): Promise<Result<BattleSession>> {
    return this.mutate(sessionId, (draft) => {
      draft.connected[seat] = connected;
      return ok({ value: structuredClone(draft), effects: [] });
    });
  }

  // ==========================================================================
  // Timers
  // ==========================================================================

  /** (Re)arm a named timer for a session. Replaces a timer of the same name. */
  schedule(sessionId: string, name: string, delayMs: number, task: () => void | Promise<void>): void {
    if (!this.sessions.has(sessionId)) return;
    this.cancelTimer(sessionId, name);

    let named = this.timers.get(sessionId);
    if (!named) {
      named = new Map();
      this.timers.set(sessionId, named);
    }

    const handle = setTimeout(() => {
      this.timers.get(sessionId)?.delete(name);
      Promise.resolve()
        .then(task)
        .catch((error: unknown) => {
          logger.error("[Sessions] Timer task failed", { sessionId, timer: name, error: toErrorMessage(error) });
        });
    }, delayMs);
    named.set(name, handle);
  }

  cancelTimer(sessionId: string, name: string): boolean {
    const named = this.timers.get(sessionId);
    const handle = named?.get(name);
    if (!named || !handle) return false;
    clearTimeout(handle);
    named.delete(name);
    return true;
  }

  hasTimer(sessionId: string, name: string): boolean {
    return this.timers.get(sessionId)?.has(name) ?? false;
  }

  /** Stop every timer; used on server shutdown. */
  shutdown(): void {
    for (const sessionId of [...this.timers.keys()]) {
      this.clearTimers(sessionId);
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private mutate<T>(sessionId: string, fn: (draft: BattleSession) => Mutation<T>): Promise<Result<T>> {
    return this.locks.runExclusive<Result<T>>(sessionId, () => {
      const current = this.sessions.get(sessionId);
      if (!current) return fail(new SessionNotFoundError(sessionId));

      const draft = structuredClone(current);
      draft.updatedAt = this.now();
      const outcome = fn(draft);
      if (!outcome.success) return outcome;

      const violation = findInvariantViolation(draft);
      if (violation) {
        this.forceAbandon(current, violation);
        return fail(new InvariantViolationError(violation));
      }

      this.sessions.set(sessionId, draft);
      this.runEffects(draft, outcome.data.effects);
      return ok(outcome.data.value);
    });
  }

  /** Apply a lifecycle event to a draft. */
  private withEvent(draft: BattleSession, event: SessionEvent): Mutation<BattleSession> {
    const result = transition(draft.state, event);
    if (!result.success) return result;

    draft.state = result.data.next;
    switch (event.type) {
      case "SUDDEN_DEATH":
        draft.suddenDeath = true;
        break;
      case "COMPLETE":
        draft.outcome = event.outcome;
        draft.endedAt = draft.updatedAt;
        break;
      case "ABANDON":
        draft.abandonReason = event.reason;
        draft.outcome = event.forfeitTo && draft.playerB ? { winner: event.forfeitTo, reason: "forfeit" } : null;
        draft.endedAt = draft.updatedAt;
        break;
      default:
        break;
    }
    return ok({ value: structuredClone(draft), effects: result.data.effects });
  }

  private forceAbandon(current: BattleSession, violation: string): void {
    logger.error("[Sessions] Invariant violation, abandoning session", {
      sessionId: current.id,
      state: current.state,
      violation,
    });
    if (isTerminal(current.state)) return;

    const abandoned: BattleSession = {
      ...structuredClone(current),
      state: "abandoned",
      abandonReason: "invariant_violation",
      outcome: null,
      updatedAt: this.now(),
      endedAt: this.now(),
    };
    this.sessions.set(current.id, abandoned);
    this.runEffects(abandoned, [
      { kind: "cancel_timers" },
      { kind: "publish", event: "session.abandoned" },
      { kind: "schedule_retention" },
    ]);
  }

  private runEffects(session: BattleSession, effects: SessionEffect[]): void {
    for (const effect of effects) {
      switch (effect.kind) {
        case "cancel_timers":
          this.clearTimers(session.id);
          break;
        case "publish":
          this.bus.emit(effect.event, structuredClone(session));
          break;
        case "schedule_retention":
          this.schedule(session.id, "retention", this.retentionMs, () => this.evict(session.id));
          break;
      }
    }
  }

  private clearTimers(sessionId: string): void {
    const named = this.timers.get(sessionId);
    if (!named) return;
    for (const handle of named.values()) clearTimeout(handle);
    this.timers.delete(sessionId);
  }

  private async evict(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    this.sessions.delete(sessionId);
    this.clearTimers(sessionId);

    // Pool sessions that never found an opponent are not worth keeping.
    if (!this.archive || !session.playerB) return;
    try {
      await this.archive.save(session);
    } catch (error) {
      logger.error("[Sessions] Failed to archive session", { sessionId, error: toErrorMessage(error) });
    }
  }
}
