/**
 * WebSocket Types
 *
 * Inbound payloads arrive as `unknown` and are validated with zod before
 * they reach the battle core (see validation.ts). Outbound events are typed
 * by `OutboundMessages` and sent through the gateway.
 */

import type { Server, Socket } from "socket.io";

// ============================================================================
// Client → Server Events
// ============================================================================

export interface ClientToServerEvents {
  enqueueMatch: () => void;
  cancelMatch: () => void;
  createInvite: () => void;
  acceptInvite: (payload: unknown) => void;
  submitAnswer: (payload: unknown) => void;
  leaveSession: (payload: unknown) => void;
}

// ============================================================================
// Server → Client Events
// ============================================================================

/**
 * Wire-level map. Payload types are enforced one layer up by
 * `BattleGateway.sendTo`, which is keyed by `OutboundMessages`.
 */
export interface WireEvents {
  [event: string]: (payload: unknown) => void;
}

// ============================================================================
// Inter-Server Events (for horizontal scaling with a Redis adapter)
// ============================================================================

export interface InterServerEvents {
  ping: () => void;
}

// ============================================================================
// Socket Data (attached to each socket by the auth middleware)
// ============================================================================

export interface SocketData {
  playerId: string;
  displayName: string;
  connectedAt: Date;
}

export type BattleServer = Server<ClientToServerEvents, WireEvents, InterServerEvents, SocketData>;
export type BattleSocket = Socket<ClientToServerEvents, WireEvents, InterServerEvents, SocketData>;
