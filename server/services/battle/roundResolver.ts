/**
 * Round Resolver
 *
 * Drives a matched session through warm-up, regulation rounds and sudden
 * death, then delivers results and rewards. It never touches session state
 * directly: every change goes through the Session Registry, whose per-session
 * lock serializes answers, timer expiry and disconnects.
 *
 * Timer names are per round (`answer_window:<index>`) so a late-firing timer
 * can never cancel or resolve the next round.
 */

import logger from "../../logger";
import {
  ANSWER_WINDOW_MS,
  MAX_SUDDEN_DEATH_ROUNDS,
  PLANT_FETCH_ATTEMPTS,
  PLANT_FETCH_BASE_DELAY_MS,
  RECONNECT_GRACE_MS,
  REGULATION_ROUNDS,
  WARMUP_MS,
} from "../../config/constants";
import type { BattleEventBus } from "./eventBus";
import { NotParticipantError, fail, toErrorMessage, type Result } from "./errors";
import {
  scoresByPlayer,
  toOpponentView,
  type BattleGateway,
  type RoundStartPayload,
  type SessionStatePayload,
} from "./messages";
import { selectRoundContent, type PlantProvider } from "./plantSelection";
import { decideProgress, otherSeat, seatOf, seatStats, SEATS } from "./resolution";
import { calculateGameReward, type RewardSink } from "./rewards";
import type { AnswerReceipt, SessionRegistry } from "./sessionRegistry";
import { isTerminal } from "./stateMachine";
import type { BattleSession, DifficultyBand, Round, Seat } from "./types";

export interface ResolverConfig {
  warmupMs: number;
  answerWindowMs: Record<DifficultyBand, number>;
  regulationRounds: number;
  maxSuddenDeathRounds: number;
  reconnectGraceMs: number;
  plantFetchAttempts: number;
  plantFetchBaseDelayMs: number;
}

export const DEFAULT_RESOLVER_CONFIG: ResolverConfig = {
  warmupMs: WARMUP_MS,
  answerWindowMs: ANSWER_WINDOW_MS,
  regulationRounds: REGULATION_ROUNDS,
  maxSuddenDeathRounds: MAX_SUDDEN_DEATH_ROUNDS,
  reconnectGraceMs: RECONNECT_GRACE_MS,
  plantFetchAttempts: PLANT_FETCH_ATTEMPTS,
  plantFetchBaseDelayMs: PLANT_FETCH_BASE_DELAY_MS,
};

export interface RoundResolverDeps {
  registry: SessionRegistry;
  gateway: BattleGateway;
  plants: PlantProvider;
  bus: BattleEventBus;
  rewards: RewardSink;
  config?: Partial<ResolverConfig>;
  random?: () => number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const answerTimer = (roundIndex: number) => `answer_window:${roundIndex}`;
const graceTimer = (seat: Seat) => `grace:${seat}`;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RoundResolver {
  private readonly registry: SessionRegistry;
  private readonly gateway: BattleGateway;
  private readonly plants: PlantProvider;
  private readonly bus: BattleEventBus;
  private readonly rewards: RewardSink;
  private readonly config: ResolverConfig;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private unsubscribers: Array<() => void> = [];

  constructor(deps: RoundResolverDeps) {
    this.registry = deps.registry;
    this.gateway = deps.gateway;
    this.plants = deps.plants;
    this.bus = deps.bus;
    this.rewards = deps.rewards;
    this.config = { ...DEFAULT_RESOLVER_CONFIG, ...deps.config };
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  attach(): void {
    if (this.unsubscribers.length > 0) return;
    this.unsubscribers = [
      this.bus.on("session.matched", (session) => this.onMatched(session)),
      this.bus.on("session.completed", (session) => this.deliverResult(session)),
      this.bus.on("session.abandoned", (session) => this.onAbandoned(session)),
    ];
  }

  detach(): void {
    for (const off of this.unsubscribers) off();
    this.unsubscribers = [];
  }

  // ==========================================================================
  // Round flow
  // ==========================================================================

  private onMatched(session: BattleSession): void {
    const { playerA, playerB } = session;
    if (!playerB) return;

    const startsAt = new Date(this.now() + this.config.warmupMs).toISOString();
    const common = { sessionId: session.id, difficulty: session.difficulty, startsAt };
    this.gateway.sendTo(playerA.id, "matchFound", { ...common, opponent: toOpponentView(playerB) });
    this.gateway.sendTo(playerB.id, "matchFound", { ...common, opponent: toOpponentView(playerA) });

    this.registry.schedule(session.id, "warmup", this.config.warmupMs, () => this.begin(session.id));
    logger.info("[Battle] Session matched", {
      sessionId: session.id,
      playerA: playerA.id,
      playerB: playerB.id,
      difficulty: session.difficulty,
    });
  }

  /** Leave warm-up and play the first round. */
  async begin(sessionId: string): Promise<void> {
    const started = await this.registry.transition(sessionId, { type: "START" });
    if (!started.success) {
      logger.debug("[Battle] Session could not start", { sessionId, error: started.error.message });
      return;
    }
    await this.startNextRound(sessionId);
  }

  private async startNextRound(sessionId: string): Promise<void> {
    const snapshot = this.registry.getSession(sessionId);
    if (!snapshot.success || snapshot.data.state !== "in_progress") return;
    const session = snapshot.data;

    const usedPlantIds = new Set(session.rounds.map((round) => round.plant.id));
    const content = await selectRoundContent(this.plants, session.difficulty, usedPlantIds, {
      attempts: this.config.plantFetchAttempts,
      baseDelayMs: this.config.plantFetchBaseDelayMs,
      random: this.random,
      sleep: this.sleep,
    });
    if (!content.success) {
      logger.error("[Battle] Plant content unavailable, cancelling session", {
        sessionId,
        error: content.error.message,
      });
      await this.registry.transition(sessionId, { type: "ABANDON", reason: "content_unavailable" });
      return;
    }

    const windowMs = this.config.answerWindowMs[session.difficulty];
    const startedAt = this.now();
    const appended = await this.registry.appendRound(sessionId, {
      plant: content.data.plant,
      options: content.data.options,
      correctIndex: content.data.correctIndex,
      startedAt,
      deadline: startedAt + windowMs,
    });
    if (!appended.success) {
      logger.debug("[Battle] Round not started", { sessionId, error: appended.error.message });
      return;
    }

    const round = appended.data;
    const payload = toRoundStart(sessionId, round);
    this.broadcast(session, (playerId) => this.gateway.sendTo(playerId, "roundStart", payload));
    this.registry.schedule(sessionId, answerTimer(round.index), windowMs, () =>
      this.resolve(sessionId, round.index)
    );
  }

  /**
   * Record an answer stamped with the server receive time. Resolves the round
   * immediately once both players have answered.
   */
  async submitAnswer(
    playerId: string,
    sessionId: string,
    roundIndex: number,
    selectedIndex: number
  ): Promise<Result<AnswerReceipt>> {
    const receipt = await this.registry.recordAnswer(sessionId, playerId, roundIndex, selectedIndex, this.now());
    if (receipt.success && receipt.data.bothAnswered) {
      await this.resolve(sessionId, roundIndex);
    }
    return receipt;
  }

  /** Resolve a round; safe to call more than once for the same round. */
  async resolve(sessionId: string, roundIndex: number): Promise<void> {
    this.registry.cancelTimer(sessionId, answerTimer(roundIndex));

    const resolution = await this.registry.resolveRound(sessionId, roundIndex, this.now());
    if (!resolution.success) {
      logger.debug("[Battle] Round resolution skipped", { sessionId, roundIndex, error: resolution.error.message });
      return;
    }
    if (resolution.data.alreadyResolved) return;

    const { session, round } = resolution.data;
    const winnerId = round.winner === "A" ? session.playerA.id : round.winner === "B" ? session.playerB?.id : null;
    const payload = {
      sessionId,
      roundIndex,
      winner: winnerId ?? null,
      correctIndex: round.correctIndex,
      plantName: round.plant.name,
      fact: round.plant.fact,
      scores: scoresByPlayer(session),
    };
    this.broadcast(session, (playerId) => this.gateway.sendTo(playerId, "roundResult", payload));

    await this.advance(session);
  }

  private async advance(session: BattleSession): Promise<void> {
    const progress = decideProgress(session, this.config);
    switch (progress.kind) {
      case "next_round":
        await this.startNextRound(session.id);
        return;

      case "sudden_death": {
        const extended = await this.registry.transition(session.id, { type: "SUDDEN_DEATH" });
        if (!extended.success) return;
        logger.info("[Battle] Sudden death round", {
          sessionId: session.id,
          round: session.rounds.length,
        });
        await this.startNextRound(session.id);
        return;
      }

      case "complete": {
        const completed = await this.registry.transition(session.id, {
          type: "COMPLETE",
          outcome: progress.outcome,
        });
        if (!completed.success) {
          logger.debug("[Battle] Completion skipped", { sessionId: session.id, error: completed.error.message });
        }
        return;
      }
    }
  }

  // ==========================================================================
  // Results
  // ==========================================================================

  private async deliverResult(session: BattleSession): Promise<void> {
    const { outcome, playerB } = session;
    if (!outcome || !playerB) return;

    const players = { A: session.playerA, B: playerB };
    const winnerId = players[outcome.winner].id;
    const finalScores = scoresByPlayer(session);

    for (const seat of SEATS) {
      const stats = seatStats(session, seat);
      const won = outcome.winner === seat;
      const reward = calculateGameReward({
        won,
        difficulty: session.difficulty,
        roundsWon: stats.roundsWon,
        roundsPlayed: stats.roundsPlayed,
        forfeit: outcome.reason === "forfeit",
      });

      this.gateway.sendTo(players[seat].id, "sessionComplete", {
        sessionId: session.id,
        winner: winnerId,
        finalScores,
        reward,
        reason: outcome.reason,
      });

      if (reward > 0) {
        try {
          await this.rewards.emitReward({
            sessionId: session.id,
            playerId: players[seat].id,
            amount: reward,
            reason: won ? "battle_win" : "battle_loss",
          });
        } catch (error) {
          logger.error("[Battle] Reward emission failed", {
            sessionId: session.id,
            playerId: players[seat].id,
            error: toErrorMessage(error),
          });
        }
      }
    }

    logger.info("[Battle] Session finished", {
      sessionId: session.id,
      winner: winnerId,
      reason: outcome.reason,
      scores: finalScores,
    });
  }

  private async onAbandoned(session: BattleSession): Promise<void> {
    if (session.outcome) {
      await this.deliverResult(session);
      return;
    }

    const reason = session.abandonReason ?? "player_left";
    switch (reason) {
      case "superseded":
        return;
      case "matchmaking_timeout":
        this.gateway.sendTo(session.playerA.id, "error", {
          code: "MATCHMAKING_TIMEOUT",
          message: "No opponent found in time. Try again or send an invite code.",
          retryable: true,
        });
        return;
      default:
        this.broadcast(session, (playerId) =>
          this.gateway.sendTo(playerId, "sessionCancelled", { sessionId: session.id, reason })
        );
        logger.info("[Battle] Session cancelled", { sessionId: session.id, reason });
    }
  }

  // ==========================================================================
  // Connection loss
  // ==========================================================================

  /** Start the reconnect grace timer for a player's running session. */
  async handleDisconnect(playerId: string): Promise<void> {
    const session = this.registry.findActiveSessionFor(playerId);
    if (!session || session.state === "waiting") return;
    const seat = seatOf(session, playerId);
    if (!seat) return;

    const marked = await this.registry.setConnected(session.id, seat, false);
    if (!marked.success) return;

    this.registry.schedule(session.id, graceTimer(seat), this.config.reconnectGraceMs, () =>
      this.expireGrace(session.id, seat)
    );
    logger.info("[Battle] Player disconnected, grace period started", {
      sessionId: session.id,
      playerId,
      graceMs: this.config.reconnectGraceMs,
    });
  }

  /** Resume a player's session in place and re-send its state. */
  async handleReconnect(playerId: string): Promise<BattleSession | null> {
    let session = this.registry.findLatestSessionFor(playerId);
    if (!session) return null;
    const seat = seatOf(session, playerId);
    if (!seat) return null;

    if (!isTerminal(session.state) && !session.connected[seat]) {
      this.registry.cancelTimer(session.id, graceTimer(seat));
      const marked = await this.registry.setConnected(session.id, seat, true);
      if (marked.success) session = marked.data;
      logger.info("[Battle] Player reconnected", { sessionId: session.id, playerId });
    }

    this.gateway.sendTo(playerId, "sessionState", sessionStateFor(session, seat));
    return session;
  }

  private async expireGrace(sessionId: string, seat: Seat): Promise<void> {
    const snapshot = this.registry.getSession(sessionId);
    if (!snapshot.success) return;
    const session = snapshot.data;
    if (isTerminal(session.state) || session.connected[seat]) return;

    const remaining = otherSeat(seat);
    const forfeitTo = session.connected[remaining] ? remaining : undefined;
    await this.registry.transition(sessionId, { type: "ABANDON", reason: "disconnect_timeout", forfeitTo });
  }

  /** Voluntary exit: forfeits a running session, cancels a waiting one. */
  async leaveSession(playerId: string, sessionId: string): Promise<Result<BattleSession>> {
    const snapshot = this.registry.getSession(sessionId);
    if (!snapshot.success) return snapshot;
    const seat = seatOf(snapshot.data, playerId);
    if (!seat) return fail(new NotParticipantError(sessionId));

    const forfeitTo = snapshot.data.state === "waiting" ? undefined : otherSeat(seat);
    return this.registry.transition(sessionId, { type: "ABANDON", reason: "player_left", forfeitTo });
  }

  private broadcast(session: BattleSession, send: (playerId: string) => void): void {
    send(session.playerA.id);
    if (session.playerB) send(session.playerB.id);
  }
}

export function toRoundStart(sessionId: string, round: Round): RoundStartPayload {
  return {
    sessionId,
    roundIndex: round.index,
    plantRef: { id: round.plant.id, imageRef: round.plant.imageRef },
    options: [...round.options],
    deadline: new Date(round.deadline).toISOString(),
    suddenDeath: round.suddenDeath,
  };
}

export function sessionStateFor(session: BattleSession, seat: Seat): SessionStatePayload {
  const opponent = seat === "A" ? session.playerB : session.playerA;
  const latest = session.rounds[session.rounds.length - 1];
  const players = { A: session.playerA, B: session.playerB };
  return {
    sessionId: session.id,
    state: session.state,
    opponent: opponent ? toOpponentView(opponent) : null,
    roundIndex: session.currentRound,
    scores: scoresByPlayer(session),
    openRound:
      latest && latest.winner === null && !isTerminal(session.state) ? toRoundStart(session.id, latest) : null,
    winner: session.outcome ? (players[session.outcome.winner]?.id ?? null) : null,
  };
}
