/**
 * Battle Event Handlers
 *
 * Thin translation layer between Socket.io events and the battle core:
 * rate-limit, validate, call the Matchmaker or Round Resolver, and map any
 * failure to an `error{code, message, retryable}` event on the calling socket.
 */

import logger from "../../logger";
import type { BattleEventBus } from "../../services/battle/eventBus";
import type { BattleError } from "../../services/battle/errors";
import type { Matchmaker } from "../../services/battle/matchmaker";
import type { ErrorPayload, OutboundEvent, OutboundMessages } from "../../services/battle/messages";
import type { RoundResolver } from "../../services/battle/roundResolver";
import type { PlayerRef } from "../../services/battle/types";
import type { RatingStore } from "../../services/rating/ratingStore";
import { playerRoom, type SocketGateway } from "../gateway";
import type { SocketRateLimiter } from "../socketRateLimit";
import type { BattleSocket } from "../types";
import { acceptInviteSchema, leaveSessionSchema, submitAnswerSchema, validateEvent } from "../validation";

export interface BattleHandlerDeps {
  matchmaker: Matchmaker;
  resolver: RoundResolver;
  gateway: SocketGateway;
  ratings: Pick<RatingStore, "ensurePlayer">;
  limiter: SocketRateLimiter;
}

export function toErrorPayload(error: BattleError): ErrorPayload {
  return { code: error.code, message: error.message, retryable: error.retryable };
}

/** The socket-facing slice a set of handlers needs. */
export interface HandlerContext {
  socketId: string;
  playerId: string;
  displayName: string;
  emit<K extends OutboundEvent>(event: K, payload: OutboundMessages[K]): void;
}

export interface BattleHandlers {
  enqueueMatch(): Promise<void>;
  cancelMatch(): Promise<void>;
  createInvite(): Promise<void>;
  acceptInvite(payload: unknown): Promise<void>;
  submitAnswer(payload: unknown): Promise<void>;
  leaveSession(payload: unknown): Promise<void>;
  disconnect(reason: string): Promise<void>;
}

/**
 * Build the per-socket handlers. Every handler settles on its own: failures
 * become `error` events, never rejections.
 */
export function createBattleHandlers(ctx: HandlerContext, deps: BattleHandlerDeps): BattleHandlers {
  const { matchmaker, resolver, gateway, ratings, limiter } = deps;
  const { socketId, playerId, displayName } = ctx;
  const emitError = (payload: ErrorPayload) => ctx.emit("error", payload);

  const profile = async (): Promise<PlayerRef> => {
    const record = await ratings.ensurePlayer({ id: playerId, displayName });
    return { id: playerId, displayName, rating: record.rating };
  };

  /**
   * Wrap a handler with rate limiting and a last-resort error boundary.
   */
  const guarded =
    (event: string, handler: (payload: unknown) => Promise<void>) =>
    async (payload?: unknown): Promise<void> => {
      if (!limiter.check(socketId, event)) {
        emitError({ code: "RATE_LIMITED", message: "Too many requests, slow down", retryable: true });
        return;
      }
      try {
        await handler(payload);
      } catch (error) {
        logger.error("[Battle] Socket handler failed", { event, playerId, error });
        emitError({ code: "INTERNAL_ERROR", message: "Something went wrong", retryable: true });
      }
    };

  return {
    enqueueMatch: guarded("enqueueMatch", async () => {
      const result = await matchmaker.enqueue(await profile());
      if (!result.success) {
        emitError(toErrorPayload(result.error));
        return;
      }
      if (result.data.status === "queued") {
        ctx.emit("matchQueued", {
          queuedAt: new Date(result.data.queuedAt).toISOString(),
          timeoutAt: new Date(result.data.timeoutAt).toISOString(),
        });
      }
    }),

    cancelMatch: guarded("cancelMatch", async () => {
      await matchmaker.cancel(playerId);
    }),

    createInvite: guarded("createInvite", async () => {
      const result = await matchmaker.createInvite(await profile());
      if (!result.success) {
        emitError(toErrorPayload(result.error));
        return;
      }
      ctx.emit("inviteCreated", {
        code: result.data.code,
        expiresAt: new Date(result.data.expiresAt).toISOString(),
      });
    }),

    acceptInvite: guarded("acceptInvite", async (payload) => {
      const input = validateEvent(acceptInviteSchema, payload);
      if (!input.success) {
        emitError({ code: "VALIDATION_ERROR", message: input.error, retryable: false });
        return;
      }
      const result = await matchmaker.acceptInvite(input.data.code, await profile());
      if (!result.success) emitError(toErrorPayload(result.error));
    }),

    submitAnswer: guarded("submitAnswer", async (payload) => {
      const input = validateEvent(submitAnswerSchema, payload);
      if (!input.success) {
        emitError({ code: "VALIDATION_ERROR", message: input.error, retryable: false });
        return;
      }
      const { sessionId, roundIndex, selectedIndex } = input.data;
      const result = await resolver.submitAnswer(playerId, sessionId, roundIndex, selectedIndex);
      if (!result.success) emitError(toErrorPayload(result.error));
    }),

    leaveSession: guarded("leaveSession", async (payload) => {
      const input = validateEvent(leaveSessionSchema, payload);
      if (!input.success) {
        emitError({ code: "VALIDATION_ERROR", message: input.error, retryable: false });
        return;
      }
      const result = await resolver.leaveSession(playerId, input.data.sessionId);
      if (!result.success) emitError(toErrorPayload(result.error));
    }),

    async disconnect(reason: string): Promise<void> {
      limiter.cleanup(socketId);
      if (!gateway.disconnect(playerId)) return;

      logger.info("[Battle] Player offline", { playerId, reason });
      try {
        await Promise.all([matchmaker.cancel(playerId), resolver.handleDisconnect(playerId)]);
      } catch (error) {
        logger.error("[Battle] Disconnect cleanup failed", { playerId, error });
      }
    },
  };
}

/**
 * Register battle event handlers on an authenticated socket.
 */
export async function registerBattleHandlers(socket: BattleSocket, deps: BattleHandlerDeps): Promise<void> {
  const { playerId, displayName } = socket.data;
  deps.gateway.connect(playerId);

  const handlers = createBattleHandlers(
    {
      socketId: socket.id,
      playerId,
      displayName,
      emit: (event, payload) => {
        const name: string = event;
        socket.emit(name, payload);
      },
    },
    deps
  );

  socket.on("enqueueMatch", handlers.enqueueMatch);
  socket.on("cancelMatch", handlers.cancelMatch);
  socket.on("createInvite", handlers.createInvite);
  socket.on("acceptInvite", handlers.acceptInvite);
  socket.on("submitAnswer", handlers.submitAnswer);
  socket.on("leaveSession", handlers.leaveSession);
  socket.on("disconnect", handlers.disconnect);

  await socket.join(playerRoom(playerId));
  await deps.resolver.handleReconnect(playerId);
}

/**
 * Forward settled ratings to both players. Returns the unsubscribe function.
 */
export function registerRatingNotifications(bus: BattleEventBus, gateway: SocketGateway): () => void {
  return bus.on("ratings.updated", (settlement) => {
    for (const player of [settlement.winner, settlement.loser]) {
      gateway.sendTo(player.playerId, "ratingUpdate", {
        sessionId: settlement.sessionId,
        rating: player.rating,
        delta: player.delta,
        rank: player.rank,
        rankChanged: player.rankChanged,
        currentStreak: player.currentStreak,
      });
    }
  });
}
