/**
 * Socket.io Authentication Middleware
 *
 * Resolves the handshake token to a player identity and rate-limits
 * connection attempts per client address.
 *
 * @example Client usage:
 * ```ts
 * const socket = io({
 *   auth: {
 *     token: await user.getIdToken()
 *   }
 * });
 * ```
 */

import type { IdentityProvider } from "../auth/identity";
import logger from "../logger";
import type { SocketRateLimiter } from "./socketRateLimit";
import type { SocketData } from "./types";

// ExtendedError type for socket.io middleware
type ExtendedError = Error & { data?: unknown };

/** The handshake fields the middleware reads and the data slot it fills. */
export interface HandshakeSocket {
  handshake: { address: string; auth: Record<string, unknown> };
  data: Partial<SocketData>;
}

export function createSocketAuthMiddleware(identity: IdentityProvider, limiter: SocketRateLimiter) {
  async function authenticate(socket: HandshakeSocket): Promise<ExtendedError | undefined> {
    const startTime = Date.now();
    const ip = socket.handshake.address;

    if (!limiter.check(ip, "connection")) {
      logger.warn("[Socket] Rate limit exceeded", { ip });
      return new Error("rate_limit_exceeded");
    }

    const token = socket.handshake.auth.token;
    if (!token || typeof token !== "string") {
      logger.warn("[Socket] Missing auth token", { ip });
      return new Error("authentication_required");
    }

    let player;
    try {
      player = await identity.verify(token);
    } catch (error) {
      logger.warn("[Socket] Invalid token", {
        ip,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      return new Error("invalid_token");
    }

    socket.data.playerId = player.playerId;
    socket.data.displayName = player.displayName;
    socket.data.connectedAt = new Date();

    logger.info("[Socket] Authenticated connection", {
      playerId: player.playerId,
      ip,
      durationMs: Date.now() - startTime,
    });
    return undefined;
  }

  return (socket: HandshakeSocket, next: (err?: ExtendedError) => void): void => {
    authenticate(socket).then(
      (error) => next(error),
      (error: unknown) => {
        logger.error("[Socket] Auth middleware error", {
          ip: socket.handshake.address,
          error: error instanceof Error ? error.message : "Unknown error",
        });
        next(new Error("authentication_failed"));
      }
    );
  };
}
