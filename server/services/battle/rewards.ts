/**
 * Reward emission at session end.
 *
 * The core only computes an integer currency delta per player and hands it
 * to a RewardSink; balances live with the economy service.
 */

import logger from "../../logger";
import type { DifficultyBand } from "./types";

export const REWARD_BASE = { win: 50, loss: 10 } as const;

export const DIFFICULTY_MULTIPLIER: Record<DifficultyBand, number> = {
  easy: 1.0,
  medium: 1.2,
  hard: 1.5,
  expert: 1.8,
};

export const PERFECT_GAME_MULTIPLIER = 2;

export interface RewardInput {
  won: boolean;
  difficulty: DifficultyBand;
  roundsWon: number;
  roundsPlayed: number;
  forfeit?: boolean;
}

/**
 * base × difficulty × (2 for a perfect game) × (0.5 + share of rounds won).
 * Forfeits pay the winner the difficulty-scaled base and the leaver nothing.
 */
export function calculateGameReward(input: RewardInput): number {
  const multiplier = DIFFICULTY_MULTIPLIER[input.difficulty];
  if (input.forfeit) {
    return input.won ? Math.round(REWARD_BASE.win * multiplier) : 0;
  }

  const base = input.won ? REWARD_BASE.win : REWARD_BASE.loss;
  const share = input.roundsPlayed > 0 ? input.roundsWon / input.roundsPlayed : 0;
  const perfect = input.won && input.roundsPlayed > 0 && input.roundsWon === input.roundsPlayed;

  return Math.round(base * multiplier * (perfect ? PERFECT_GAME_MULTIPLIER : 1) * (0.5 + share));
}

export interface RewardGrant {
  sessionId: string;
  playerId: string;
  amount: number;
  reason: "battle_win" | "battle_loss";
}

export interface RewardSink {
  emitReward(grant: RewardGrant): Promise<void>;
}

/** Default sink: records grants in the log for the economy pipeline to pick up. */
export class LoggingRewardSink implements RewardSink {
  async emitReward(grant: RewardGrant): Promise<void> {
    logger.info("[Rewards] Reward emitted", { ...grant });
  }
}
