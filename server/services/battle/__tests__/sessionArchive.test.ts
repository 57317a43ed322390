import { describe, it, expect, vi } from "vitest";
import { toArchiveRow } from "../sessionArchive";
import { buildRound, buildSession } from "../../../__tests__/helpers/battle";

vi.mock("../../../logger");

describe("toArchiveRow", () => {
  it("skips sessions that never found an opponent", () => {
    const session = buildSession({ state: "abandoned", playerB: null, abandonReason: "matchmaking_timeout" });
    expect(toArchiveRow(session)).toBeNull();
  });

  it("maps a completed session to a battle_sessions row", () => {
    const round = buildRound(0, {
      answers: { A: { selectedIndex: 0, receivedAt: 1_200 } },
      winner: "A",
      resolvedAt: 20_000,
    });
    const session = buildSession({
      state: "completed",
      rounds: [round],
      scores: { A: 3, B: 1 },
      outcome: { winner: "A", reason: "points" },
      createdAt: 1_000,
      endedAt: 90_000,
    });

    const row = toArchiveRow(session);

    expect(row).toMatchObject({
      id: "session-1",
      playerAId: "alice",
      playerBId: "bob",
      origin: "pool",
      state: "completed",
      difficulty: "medium",
      scoreA: 3,
      scoreB: 1,
      winnerId: "alice",
      outcomeReason: "points",
      abandonReason: null,
      createdAt: new Date(1_000),
      endedAt: new Date(90_000),
    });
    expect(row?.rounds).toEqual([
      {
        index: 0,
        plantId: "plant-0",
        options: ["Fern", "Moss", "Ivy", "Oak"],
        correctIndex: 0,
        answers: { A: { selectedIndex: 0, receivedAt: 1_200 } },
        startedAt: 0,
        deadline: 20_000,
        suddenDeath: false,
        winner: "A",
      },
    ]);
  });

  it("records the seat B player as winner of a forfeit", () => {
    const session = buildSession({
      state: "abandoned",
      abandonReason: "player_left",
      outcome: { winner: "B", reason: "forfeit" },
      endedAt: 5_000,
    });

    expect(toArchiveRow(session)).toMatchObject({ winnerId: "bob", outcomeReason: "forfeit", abandonReason: "player_left" });
  });

  it("refuses sessions that are still running", () => {
    expect(() => toArchiveRow(buildSession({ state: "in_progress" }))).toThrow();
  });
});
