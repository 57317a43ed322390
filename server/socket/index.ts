/**
 * Socket.io server setup.
 *
 * The server is created before the HTTP server exists so the gateway (and
 * with it the battle services) can be built first; `attach` binds it later.
 */

import { Server } from "socket.io";
import { SOCKET_MAX_HTTP_BUFFER_SIZE, SOCKET_PING_INTERVAL_MS, SOCKET_PING_TIMEOUT_MS } from "../config/constants";
import { getAllowedOrigins } from "../config/server";
import type { IdentityProvider } from "../auth/identity";
import logger from "../logger";
import type { BattleServices } from "../services";
import { createSocketAuthMiddleware } from "./auth";
import type { SocketGateway } from "./gateway";
import { registerBattleHandlers, registerRatingNotifications } from "./handlers/battle";
import { BATTLE_EVENT_LIMITS, CONNECTION_LIMIT, SocketRateLimiter } from "./socketRateLimit";
import type { BattleServer } from "./types";

const PRUNE_INTERVAL_MS = 60_000;

export function createSocketServer(): BattleServer {
  return new Server({
    cors: {
      origin: getAllowedOrigins(),
      credentials: true,
    },
    pingTimeout: SOCKET_PING_TIMEOUT_MS,
    pingInterval: SOCKET_PING_INTERVAL_MS,
    maxHttpBufferSize: SOCKET_MAX_HTTP_BUFFER_SIZE,
  });
}

export interface SocketBindings {
  services: BattleServices;
  gateway: SocketGateway;
  identity: IdentityProvider;
}

/**
 * Wire authentication, battle handlers and rating notifications.
 * Returns a function that undoes the process-level hooks.
 */
export function bindSocketServer(io: BattleServer, { services, gateway, identity }: SocketBindings): () => void {
  const limiter = new SocketRateLimiter({ ...BATTLE_EVENT_LIMITS, ...CONNECTION_LIMIT });
  const pruneTimer = setInterval(() => limiter.prune(), PRUNE_INTERVAL_MS);
  pruneTimer.unref();

  io.use(createSocketAuthMiddleware(identity, limiter));

  io.on("connection", (socket) => {
    registerBattleHandlers(socket, {
      matchmaker: services.matchmaker,
      resolver: services.resolver,
      gateway,
      ratings: services.ratingStore,
      limiter,
    }).catch((error: unknown) => {
      logger.error("[Socket] Failed to register handlers", { playerId: socket.data.playerId, error });
      socket.disconnect(true);
    });
  });

  const unsubscribe = registerRatingNotifications(services.bus, gateway);
  logger.info("[Socket] Battle handlers bound");

  return () => {
    clearInterval(pruneTimer);
    unsubscribe();
  };
}

export async function shutdownSocketServer(io: BattleServer): Promise<void> {
  io.disconnectSockets(true);
  await io.close();
  logger.info("[Socket] Server closed");
}
