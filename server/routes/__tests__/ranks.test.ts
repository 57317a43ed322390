import { describe, it, expect, vi } from "vitest";
import { DEFAULT_RANK_BANDS } from "../../services/rating/ranks";
import { createRanksRouter } from "../ranks";
import { invoke, type RouteTable } from "./routeHarness";

const { tables } = vi.hoisted(() => ({ tables: new Array<RouteTable>() }));

vi.mock("express", async () => {
  const { mockRouterFactory } = await import("./routeHarness");
  return { Router: mockRouterFactory(tables) };
});

describe("GET /api/ranks", () => {
  it("lists the rank table from lowest to highest", async () => {
    createRanksRouter(DEFAULT_RANK_BANDS);

    const res = await invoke(tables[0], "GET /");

    expect(res.body).toEqual({
      ranks: [
        { rank: "New Gardener", minRating: null, maxRating: 800 },
        { rank: "Seedling", minRating: 800, maxRating: 1000 },
        { rank: "Sprout", minRating: 1000, maxRating: 1200 },
        { rank: "Green Thumb", minRating: 1200, maxRating: 1400 },
        { rank: "Plant Enthusiast", minRating: 1400, maxRating: 1600 },
        { rank: "Gardener", minRating: 1600, maxRating: 1800 },
        { rank: "Botanist", minRating: 1800, maxRating: 2000 },
        { rank: "Plant Scientist", minRating: 2000, maxRating: 2200 },
        { rank: "Flora Expert", minRating: 2200, maxRating: 2400 },
        { rank: "Botanical Master", minRating: 2400, maxRating: null },
      ],
    });
  });

  it("serves configured bands", async () => {
    createRanksRouter([
      { rank: "Bronze", minRating: 0 },
      { rank: "Gold", minRating: 1500 },
    ]);

    const res = await invoke(tables[tables.length - 1], "GET /");

    expect(res.body).toEqual({
      ranks: [
        { rank: "Bronze", minRating: 0, maxRating: 1500 },
        { rank: "Gold", minRating: 1500, maxRating: null },
      ],
    });
  });
});
