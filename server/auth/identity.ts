/**
 * Player identity for socket connections.
 *
 * The battle core only needs a stable player id and a display name; how a
 * token maps to them is up to the provider.
 */

import type { Auth } from "firebase-admin/auth";

export interface PlayerIdentity {
  playerId: string;
  displayName: string;
}

export interface IdentityProvider {
  /** Resolve a bearer token, or throw when it is invalid. */
  verify(token: string): Promise<PlayerIdentity>;
}

export function fallbackDisplayName(playerId: string): string {
  return `Player ${playerId.slice(0, 6)}`;
}

/** Firebase ID tokens, checked for revocation. */
export class FirebaseIdentityProvider implements IdentityProvider {
  constructor(private readonly auth: Pick<Auth, "verifyIdToken">) {}

  async verify(token: string): Promise<PlayerIdentity> {
    const decoded = await this.auth.verifyIdToken(token, true);
    const name: unknown = decoded.name;
    const displayName = typeof name === "string" && name.trim().length > 0 ? name.trim().slice(0, 100) : null;
    return {
      playerId: decoded.uid,
      displayName: displayName ?? fallbackDisplayName(decoded.uid),
    };
  }
}
