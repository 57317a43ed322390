import { describe, it, expect, vi } from "vitest";
import { DatabaseUnavailableError } from "../../db";
import type { LeaderboardPage } from "../../services/leaderboard/types";
import { createLeaderboardRouter } from "../leaderboard";
import { invoke, type RouteTable } from "./routeHarness";

const { tables } = vi.hoisted(() => ({ tables: new Array<RouteTable>() }));

vi.mock("express", async () => {
  const { mockRouterFactory } = await import("./routeHarness");
  return { Router: mockRouterFactory(tables) };
});
vi.mock("../../logger");

const page: LeaderboardPage = { entries: [], limit: 5, offset: 10 };

function routerWith(getLeaderboard: (limit: number, offset: number) => Promise<LeaderboardPage>) {
  createLeaderboardRouter({ getLeaderboard });
  return tables[tables.length - 1];
}

describe("GET /api/leaderboard", () => {
  it("passes the parsed page window to the service", async () => {
    const getLeaderboard = vi.fn(async (_limit: number, _offset: number) => page);

    const res = await invoke(routerWith(getLeaderboard), "GET /", { query: { limit: "5", offset: "10" } });

    expect(getLeaderboard).toHaveBeenCalledWith(5, 10);
    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual(page);
  });

  it("defaults to the first twenty entries", async () => {
    const getLeaderboard = vi.fn(async (_limit: number, _offset: number) => page);

    await invoke(routerWith(getLeaderboard), "GET /");

    expect(getLeaderboard).toHaveBeenCalledWith(20, 0);
  });

  it.each<Record<string, string>>([{ limit: "0" }, { limit: "101" }, { offset: "-1" }, { limit: "ten" }])(
    "rejects %o",
    async (query) => {
      const getLeaderboard = vi.fn(async (_limit: number, _offset: number) => page);

      const res = await invoke(routerWith(getLeaderboard), "GET /", { query });

      expect(res.statusCode).toBe(400);
      expect(res.body).toMatchObject({ error: "VALIDATION_ERROR", message: "Request validation failed." });
      expect(getLeaderboard).not.toHaveBeenCalled();
    }
  );

  it("reports an unavailable database as 503", async () => {
    const res = await invoke(
      routerWith(async () => {
        throw new DatabaseUnavailableError();
      }),
      "GET /"
    );

    expect(res.statusCode).toBe(503);
    expect(res.body).toEqual({
      error: "DATABASE_UNAVAILABLE",
      message: "Database unavailable. Please try again shortly.",
    });
  });

  it("hides unexpected failures behind a 500", async () => {
    const res = await invoke(
      routerWith(async () => {
        throw new Error("boom");
      }),
      "GET /"
    );

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: "INTERNAL_ERROR", message: "An unexpected error occurred." });
  });
});
