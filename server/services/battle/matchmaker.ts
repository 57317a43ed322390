/**
 * Matchmaker
 *
 * Skill-based pool plus direct invite codes. The pool is a single shared
 * resource: enqueue, cancel, sweep and invite acceptance all run inside one
 * critical section so a waiting player can never be paired twice.
 *
 * Rating window: starts at 300 points and widens by 50 every 5 s of waiting,
 * capped at 600. A pair is acceptable when the gap fits the wider of the two
 * players' windows. The 30 s bound is enforced by the waiting session's own
 * timer in the registry; the pool drops the player when that session is
 * abandoned, whatever the reason.
 *
 * A player holds at most one waiting session (a pool ticket or an invite).
 * Once a pairing binds, every other waiting session of both players is
 * abandoned as superseded.
 */

import { customAlphabet } from "nanoid";
import logger from "../../logger";
import { KeyedMutex } from "../../utils/keyedMutex";
import {
  INVITE_CODE_ALPHABET,
  INVITE_CODE_ATTEMPTS,
  INVITE_CODE_LENGTH,
  INVITE_TTL_MS,
  MATCH_INITIAL_RATING_WINDOW,
  MATCH_MAX_RATING_WINDOW,
  MATCH_TIMEOUT_MS,
  MATCH_WINDOW_STEP,
  MATCH_WINDOW_STEP_MS,
} from "../../config/constants";
import type { BattleEventBus } from "./eventBus";
import {
  AlreadyInSessionError,
  AlreadyQueuedError,
  InviteCodeUnavailableError,
  InviteNotFoundError,
  SelfPairingError,
  fail,
  ok,
  type BattleError,
  type Result,
} from "./errors";
import type { SessionRegistry } from "./sessionRegistry";
import type { BattleSession, PlayerRef } from "./types";

export interface MatchmakerConfig {
  initialWindow: number;
  windowStep: number;
  windowStepMs: number;
  maxWindow: number;
  timeoutMs: number;
  inviteTtlMs: number;
}

export const DEFAULT_MATCHMAKER_CONFIG: MatchmakerConfig = {
  initialWindow: MATCH_INITIAL_RATING_WINDOW,
  windowStep: MATCH_WINDOW_STEP,
  windowStepMs: MATCH_WINDOW_STEP_MS,
  maxWindow: MATCH_MAX_RATING_WINDOW,
  timeoutMs: MATCH_TIMEOUT_MS,
  inviteTtlMs: INVITE_TTL_MS,
};

export interface PoolEntry {
  player: PlayerRef;
  sessionId: string;
  enqueuedAt: number;
}

export interface Invite {
  code: string;
  host: PlayerRef;
  sessionId: string;
  expiresAt: number;
}

export type EnqueueOutcome =
  | { status: "queued"; sessionId: string; queuedAt: number; timeoutAt: number }
  | { status: "matched"; session: BattleSession };

export interface MatchmakerDeps {
  registry: SessionRegistry;
  bus: BattleEventBus;
  config?: Partial<MatchmakerConfig>;
  now?: () => number;
  generateCode?: () => string;
}

const POOL_LOCK = "pool";

export class Matchmaker {
  /** Sorted by rating ascending, then by enqueue time. */
  private pool: PoolEntry[] = [];
  private readonly invites = new Map<string, Invite>();
  private readonly lock = new KeyedMutex();
  private readonly registry: SessionRegistry;
  private readonly bus: BattleEventBus;
  private readonly config: MatchmakerConfig;
  private readonly now: () => number;
  private readonly generateCode: () => string;
  private sweepTimer: NodeJS.Timeout | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(deps: MatchmakerDeps) {
    this.registry = deps.registry;
    this.bus = deps.bus;
    this.config = { ...DEFAULT_MATCHMAKER_CONFIG, ...deps.config };
    this.now = deps.now ?? Date.now;
    this.generateCode = deps.generateCode ?? customAlphabet(INVITE_CODE_ALPHABET, INVITE_CODE_LENGTH);
  }

  attach(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.bus.on("session.abandoned", (session) => this.onSessionAbandoned(session));
  }

  /** Current acceptable rating gap for an entry. */
  windowFor(entry: Pick<PoolEntry, "enqueuedAt">, at: number = this.now()): number {
    const steps = Math.floor(Math.max(0, at - entry.enqueuedAt) / this.config.windowStepMs);
    return Math.min(this.config.initialWindow + steps * this.config.windowStep, this.config.maxWindow);
  }

  // ==========================================================================
  // Pool
  // ==========================================================================

  enqueue(player: PlayerRef): Promise<Result<EnqueueOutcome>> {
    return this.lock.runExclusive<Result<EnqueueOutcome>>(POOL_LOCK, async () => {
      if (this.isQueued(player.id)) return fail(new AlreadyQueuedError());
      const blocked = this.admissionError(player.id);
      if (blocked) return fail(blocked);

      const now = this.now();
      const newcomer = { enqueuedAt: now };
      const tried = new Set<string>();

      for (;;) {
        const candidate = this.closest(player, newcomer, now, tried);
        if (!candidate) break;
        tried.add(candidate.sessionId);

        const bound = await this.registry.bindPlayer(candidate.sessionId, player);
        if (bound.success) {
          this.removeEntry(candidate.sessionId);
          await this.supersedeWaiting([candidate.player.id, player.id], candidate.sessionId);
          logger.info("[Matchmaking] Paired from pool", {
            sessionId: candidate.sessionId,
            playerA: candidate.player.id,
            playerB: player.id,
            ratingGap: Math.abs(candidate.player.rating - player.rating),
          });
          return ok<EnqueueOutcome>({ status: "matched", session: bound.data });
        }
        // Session expired or was taken between scan and bind.
        this.removeEntry(candidate.sessionId);
      }

      const session = await this.registry.createWaitingSession(player, {
        origin: "pool",
        waitMs: this.config.timeoutMs,
        timeoutReason: "matchmaking_timeout",
      });
      this.insertEntry({ player: { ...player }, sessionId: session.id, enqueuedAt: now });
      this.ensureSweep();

      logger.info("[Matchmaking] Player queued", { playerId: player.id, rating: player.rating });
      return ok<EnqueueOutcome>({
        status: "queued",
        sessionId: session.id,
        queuedAt: now,
        timeoutAt: now + this.config.timeoutMs,
      });
    });
  }

  /** Leave the pool. Returns false when the player was not queued. */
  cancel(playerId: string): Promise<boolean> {
    return this.lock.runExclusive(POOL_LOCK, async () => {
      const entry = this.pool.find((e) => e.player.id === playerId);
      if (!entry) return false;
      this.removeEntry(entry.sessionId);
      if (this.pool.length === 0) this.stopSweep();
      await this.registry.transition(entry.sessionId, { type: "ABANDON", reason: "player_left" });
      return true;
    });
  }

  /**
   * Re-run pairing across everyone still waiting; windows have widened since
   * they were enqueued. Longest waiters pick first.
   */
  sweep(): Promise<number> {
    return this.lock.runExclusive(POOL_LOCK, async () => {
      const now = this.now();
      let paired = 0;
      const byWait = [...this.pool].sort((a, b) => a.enqueuedAt - b.enqueuedAt);

      for (const entry of byWait) {
        if (!this.hasEntry(entry.sessionId)) continue;
        const tried = new Set<string>([entry.sessionId]);

        for (;;) {
          const partner = this.closest(entry.player, entry, now, tried);
          if (!partner) break;
          tried.add(partner.sessionId);

          const [host, guest] = partner.enqueuedAt < entry.enqueuedAt ? [partner, entry] : [entry, partner];
          const bound = await this.registry.bindPlayer(host.sessionId, guest.player);
          if (!bound.success) {
            this.removeEntry(host.sessionId);
            if (host === entry) break;
            continue;
          }

          this.removeEntry(host.sessionId);
          await this.supersedeWaiting([host.player.id, guest.player.id], host.sessionId);
          paired++;
          logger.info("[Matchmaking] Paired on sweep", {
            sessionId: host.sessionId,
            playerA: host.player.id,
            playerB: guest.player.id,
          });
          break;
        }
      }

      if (this.pool.length === 0) this.stopSweep();
      return paired;
    });
  }

  isQueued(playerId: string): boolean {
    return this.pool.some((entry) => entry.player.id === playerId);
  }

  poolSize(): number {
    return this.pool.length;
  }

  // ==========================================================================
  // Invites
  // ==========================================================================

  createInvite(host: PlayerRef): Promise<Result<Invite>> {
    return this.lock.runExclusive<Result<Invite>>(POOL_LOCK, async () => {
      const blocked = this.admissionError(host.id);
      if (blocked) return fail(blocked);

      const code = this.allocateCode();
      if (!code) {
        logger.warn("[Matchmaking] Invite code space exhausted", { playerId: host.id });
        return fail(new InviteCodeUnavailableError());
      }

      const session = await this.registry.createWaitingSession(host, {
        origin: "invite",
        waitMs: this.config.inviteTtlMs,
        timeoutReason: "invite_expired",
      });
      const invite: Invite = {
        code,
        host: { ...host },
        sessionId: session.id,
        expiresAt: this.now() + this.config.inviteTtlMs,
      };
      this.invites.set(code, invite);

      logger.info("[Matchmaking] Invite created", { playerId: host.id, sessionId: session.id });
      return ok({ ...invite });
    });
  }

  /** Pair with the invite's host immediately, regardless of rating gap. */
  acceptInvite(code: string, guest: PlayerRef): Promise<Result<BattleSession>> {
    return this.lock.runExclusive<Result<BattleSession>>(POOL_LOCK, async () => {
      const normalized = code.trim().toUpperCase();
      const invite = this.invites.get(normalized);
      if (!invite || invite.expiresAt <= this.now()) {
        if (invite) this.invites.delete(normalized);
        return fail(new InviteNotFoundError());
      }
      if (invite.host.id === guest.id) return fail(new SelfPairingError());

      const active = this.registry.findActiveSessionFor(guest.id);
      if (active && active.state !== "waiting") return fail(new AlreadyInSessionError(active.id));

      const hostActive = this.registry.findActiveSessionFor(invite.host.id);
      if (!hostActive || hostActive.id !== invite.sessionId) {
        this.invites.delete(normalized);
        return fail(new InviteNotFoundError());
      }

      const bound = await this.registry.bindPlayer(invite.sessionId, guest);
      this.invites.delete(normalized);
      if (!bound.success) {
        return bound.error.code === "SESSION_FULL" || bound.error.code === "SESSION_NOT_FOUND"
          ? fail(new InviteNotFoundError())
          : bound;
      }

      await this.supersedeWaiting([invite.host.id, guest.id], invite.sessionId);

      logger.info("[Matchmaking] Invite accepted", {
        sessionId: invite.sessionId,
        host: invite.host.id,
        guest: guest.id,
      });
      return ok(bound.data);
    });
  }

  shutdown(): void {
    this.stopSweep();
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /** Why a player may not open another waiting session, if anything. */
  private admissionError(playerId: string): BattleError | null {
    const active = this.registry.findActiveSessionFor(playerId);
    if (!active) return null;
    return active.state === "waiting" ? new AlreadyQueuedError() : new AlreadyInSessionError(active.id);
  }

  private allocateCode(): string | null {
    for (let attempt = 0; attempt < INVITE_CODE_ATTEMPTS; attempt++) {
      const code = this.generateCode();
      if (!this.invites.has(code)) return code;
    }
    return null;
  }

  /** Abandon the players' waiting sessions other than `keep`. Caller holds the pool lock. */
  private async supersedeWaiting(playerIds: string[], keep: string): Promise<void> {
    for (const playerId of playerIds) {
      for (const session of this.registry.waitingSessionsFor(playerId)) {
        if (session.id === keep) continue;
        this.removeEntry(session.id);
        this.dropInvites(session.id);
        await this.registry.transition(session.id, { type: "ABANDON", reason: "superseded" });
      }
    }
    if (this.pool.length === 0) this.stopSweep();
  }

  private dropInvites(sessionId: string): void {
    for (const [code, invite] of this.invites) {
      if (invite.sessionId === sessionId) this.invites.delete(code);
    }
  }

  /** Closest-rated acceptable partner; equal gaps go to the longest waiter. */
  private closest(
    player: PlayerRef,
    self: Pick<PoolEntry, "enqueuedAt">,
    now: number,
    exclude: ReadonlySet<string>
  ): PoolEntry | null {
    const ownWindow = this.windowFor(self, now);
    let best: PoolEntry | null = null;
    let bestGap = Number.POSITIVE_INFINITY;

    for (const entry of this.pool) {
      if (exclude.has(entry.sessionId) || entry.player.id === player.id) continue;
      const gap = Math.abs(entry.player.rating - player.rating);
      if (gap > Math.max(ownWindow, this.windowFor(entry, now))) continue;
      if (gap < bestGap || (gap === bestGap && best !== null && entry.enqueuedAt < best.enqueuedAt)) {
        best = entry;
        bestGap = gap;
      }
    }
    return best;
  }

  private insertEntry(entry: PoolEntry): void {
    const at = this.pool.findIndex(
      (e) => e.player.rating > entry.player.rating ||
        (e.player.rating === entry.player.rating && e.enqueuedAt > entry.enqueuedAt)
    );
    if (at === -1) this.pool.push(entry);
    else this.pool.splice(at, 0, entry);
  }

  private hasEntry(sessionId: string): boolean {
    return this.pool.some((e) => e.sessionId === sessionId);
  }

  private removeEntry(sessionId: string): void {
    this.pool = this.pool.filter((e) => e.sessionId !== sessionId);
  }

  private async onSessionAbandoned(session: BattleSession): Promise<void> {
    if (session.origin === "invite") {
      this.dropInvites(session.id);
      return;
    }

    await this.lock.runExclusive(POOL_LOCK, () => {
      if (!this.hasEntry(session.id)) return;
      this.removeEntry(session.id);
      if (this.pool.length === 0) this.stopSweep();
      logger.info("[Matchmaking] Player left the pool", {
        playerId: session.playerA.id,
        reason: session.abandonReason,
      });
    });
  }

  private ensureSweep(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        logger.error("[Matchmaking] Sweep failed", { error });
      });
    }, this.config.windowStepMs);
  }

  private stopSweep(): void {
    if (!this.sweepTimer) return;
    clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }
}
