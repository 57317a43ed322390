/**
 * Socket.io implementation of the battle core's delivery seam.
 *
 * Every socket joins its player's room, so a message reaches all of a
 * player's tabs and devices. Connection counting lets the handlers tell a
 * player's first socket and last socket apart from the ones in between.
 */

import type { BattleGateway, OutboundEvent, OutboundMessages } from "../services/battle/messages";

/** The slice of a Socket.io server the gateway emits through. */
export interface RoomEmitter {
  to(room: string): { emit(event: string, payload: unknown): unknown };
}

export function playerRoom(playerId: string): string {
  return `player:${playerId}`;
}

export class SocketGateway implements BattleGateway {
  private readonly connections = new Map<string, number>();

  constructor(private readonly io: RoomEmitter) {}

  sendTo<K extends OutboundEvent>(playerId: string, event: K, payload: OutboundMessages[K]): void {
    const name: string = event;
    this.io.to(playerRoom(playerId)).emit(name, payload);
  }

  isConnected(playerId: string): boolean {
    return (this.connections.get(playerId) ?? 0) > 0;
  }

  /** Returns true for the player's first open socket. */
  connect(playerId: string): boolean {
    const count = (this.connections.get(playerId) ?? 0) + 1;
    this.connections.set(playerId, count);
    return count === 1;
  }

  /** Returns true when the player's last socket closes. */
  disconnect(playerId: string): boolean {
    const count = (this.connections.get(playerId) ?? 0) - 1;
    if (count > 0) {
      this.connections.set(playerId, count);
      return false;
    }
    this.connections.delete(playerId);
    return true;
  }

  connectedPlayers(): number {
    return this.connections.size;
  }
}
