/**
 * Battle tunables resolved from the environment, with constants.ts
 * supplying everything operators don't override.
 */

import { env, type Env } from "./env";
import type { MatchmakerConfig } from "../services/battle/matchmaker";
import type { ResolverConfig } from "../services/battle/roundResolver";

export interface BattleConfig {
  matchmaker: Partial<MatchmakerConfig>;
  resolver: Partial<ResolverConfig>;
  kFactor: number;
  leaderboardTtlSeconds: number;
}

export function buildBattleConfig(source: Env = env): BattleConfig {
  return {
    matchmaker: { timeoutMs: source.MATCH_TIMEOUT_MS },
    resolver: {
      reconnectGraceMs: source.RECONNECT_GRACE_MS,
      maxSuddenDeathRounds: source.MAX_SUDDEN_DEATH_ROUNDS,
    },
    kFactor: source.ELO_K_FACTOR,
    leaderboardTtlSeconds: source.LEADERBOARD_TTL_SECONDS,
  };
}
