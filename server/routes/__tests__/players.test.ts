import { describe, it, expect, vi } from "vitest";
import type { PlayerRatingRecord } from "../../services/rating/types";
import { createPlayersRouter } from "../players";
import { invoke, type RouteTable } from "./routeHarness";
import { ratingRecord } from "../../__tests__/helpers/battle";

const { tables } = vi.hoisted(() => ({ tables: new Array<RouteTable>() }));

vi.mock("express", async () => {
  const { mockRouterFactory } = await import("./routeHarness");
  return { Router: mockRouterFactory(tables) };
});
vi.mock("../../logger");

function routerWith(getPlayer: (playerId: string) => Promise<PlayerRatingRecord | null>) {
  createPlayersRouter({ getPlayer });
  return tables[tables.length - 1];
}

describe("GET /api/players/:playerId", () => {
  it("returns the public profile with ISO timestamps", async () => {
    const record = ratingRecord("alice", {
      rating: 1206,
      rank: "Green Thumb",
      gamesPlayed: 3,
      wins: 2,
      losses: 1,
      currentStreak: 2,
      longestStreak: 2,
      roundsPlayed: 15,
      plantsIdentified: 9,
      accuracy: 0.6,
      averageResponseTimeMs: 2_400,
      lastGameAt: 5_000,
      rankHistory: [{ rank: "Green Thumb", rating: 1206, achievedAt: 5_000 }],
      version: 3,
    });
    const getPlayer = vi.fn(async (_id: string) => record);

    const res = await invoke(routerWith(getPlayer), "GET /:playerId", { params: { playerId: "alice" } });

    expect(getPlayer).toHaveBeenCalledWith("alice");
    expect(res.body).toEqual({
      id: "alice",
      displayName: "Player alice",
      rating: 1206,
      rank: "Green Thumb",
      gamesPlayed: 3,
      wins: 2,
      losses: 1,
      currentStreak: 2,
      longestStreak: 2,
      roundsPlayed: 15,
      plantsIdentified: 9,
      accuracy: 0.6,
      averageResponseTimeMs: 2_400,
      lastGameAt: "1970-01-01T00:00:05.000Z",
      rankHistory: [{ rank: "Green Thumb", rating: 1206, achievedAt: "1970-01-01T00:00:05.000Z" }],
    });
  });

  it("answers 404 for unknown players", async () => {
    const res = await invoke(routerWith(async () => null), "GET /:playerId", { params: { playerId: "ghost" } });

    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({ error: "PLAYER_NOT_FOUND", message: "Player not found." });
  });

  it("rejects malformed player ids", async () => {
    const getPlayer = vi.fn(async (_id: string) => null);

    const res = await invoke(routerWith(getPlayer), "GET /:playerId", { params: { playerId: "bad id!" } });

    expect(res.statusCode).toBe(400);
    expect(getPlayer).not.toHaveBeenCalled();
  });
});
