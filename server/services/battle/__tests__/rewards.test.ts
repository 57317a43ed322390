import { describe, it, expect } from "vitest";
import { calculateGameReward } from "../rewards";

describe("calculateGameReward", () => {
  it("doubles a perfect win", () => {
    expect(calculateGameReward({ won: true, difficulty: "hard", roundsWon: 5, roundsPlayed: 5 })).toBe(225);
  });

  it("scales a close loss by the share of rounds won", () => {
    expect(calculateGameReward({ won: false, difficulty: "medium", roundsWon: 2, roundsPlayed: 5 })).toBe(11);
  });

  it("pays the forfeit winner the difficulty-scaled base", () => {
    expect(
      calculateGameReward({ won: true, difficulty: "expert", roundsWon: 0, roundsPlayed: 1, forfeit: true })
    ).toBe(90);
  });

  it("pays the player who forfeited nothing", () => {
    expect(
      calculateGameReward({ won: false, difficulty: "easy", roundsWon: 2, roundsPlayed: 3, forfeit: true })
    ).toBe(0);
  });

  it("pays half the loss base when no rounds were played", () => {
    expect(calculateGameReward({ won: false, difficulty: "easy", roundsWon: 0, roundsPlayed: 0 })).toBe(5);
  });
});
