/**
 * ELO rating math.
 */

/** Expected score of `self` against `opponent`, in (0, 1). */
export function expectedScore(self: number, opponent: number): number {
  return 1 / (1 + 10 ** ((opponent - self) / 400));
}

/**
 * Rating change for a decided game. The loser's delta is the exact negation
 * of the winner's, so a pair of updates sums to zero before any floor applies.
 */
export function calculateEloChange(
  winnerRating: number,
  loserRating: number,
  kFactor = 32
): { winnerDelta: number; loserDelta: number } {
  const winnerDelta = Math.round(kFactor * (1 - expectedScore(winnerRating, loserRating)));
  return { winnerDelta, loserDelta: -winnerDelta };
}

export function applyRatingFloor(rating: number, floor: number): number {
  return Math.max(floor, rating);
}
