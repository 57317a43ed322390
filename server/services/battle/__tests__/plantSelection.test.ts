import { describe, it, expect, vi } from "vitest";
import { selectRoundContent, shuffle, type PlantProvider, type SelectionOptions } from "../plantSelection";
import type { DifficultyBand, PlantRecord } from "../types";
import { plant } from "../../../__tests__/helpers/battle";

vi.mock("../../../logger");

function selection(overrides: Partial<SelectionOptions> = {}): SelectionOptions {
  return {
    attempts: 3,
    baseDelayMs: 100,
    random: () => 0,
    sleep: vi.fn(async () => undefined),
    ...overrides,
  };
}

function providerFor(byBand: Partial<Record<DifficultyBand, PlantRecord[] | Error>>) {
  const fetchCandidatePlants = vi.fn(async (band: DifficultyBand) => {
    const entry = byBand[band];
    if (entry instanceof Error) throw entry;
    return entry ?? [];
  });
  const provider: PlantProvider = { fetchCandidatePlants };
  return { provider, fetchCandidatePlants };
}

describe("shuffle", () => {
  it("applies a Fisher-Yates pass driven by the random source", () => {
    expect(shuffle([1, 2, 3], () => 0)).toEqual([2, 3, 1]);
  });

  it("leaves the input untouched", () => {
    const input = [1, 2, 3];
    shuffle(input, () => 0);
    expect(input).toEqual([1, 2, 3]);
  });
});

describe("selectRoundContent", () => {
  const medium = [
    plant("p0", "A"),
    plant("p1", "B"),
    plant("p2", "C"),
    plant("p3", "D"),
    plant("p4", "E"),
  ];

  it("draws an unused plant and three distinct distractors", async () => {
    const { provider } = providerFor({ medium });

    const result = await selectRoundContent(provider, "medium", new Set(["p0"]), selection());

    expect(result).toEqual({
      success: true,
      data: { plant: medium[1], options: ["C", "D", "E", "B"], correctIndex: 3, band: "medium" },
    });
  });

  it("pulls in easier bands when the requested band is short", async () => {
    const { provider, fetchCandidatePlants } = providerFor({
      hard: [plant("h1", "Hemlock"), plant("h2", "Hellebore")],
      medium,
    });

    const result = await selectRoundContent(provider, "hard", new Set(), selection());

    expect(result.success && result.data.plant.id).toBe("h1");
    expect(result.success && result.data.band).toBe("hard");
    expect(fetchCandidatePlants.mock.calls.map(([band]) => band)).toEqual(["hard", "medium"]);
  });

  it("retries a failing band with exponential backoff before falling back", async () => {
    const sleep = vi.fn(async () => undefined);
    const { provider, fetchCandidatePlants } = providerFor({ hard: new Error("timeout"), medium });

    const result = await selectRoundContent(provider, "hard", new Set(), selection({ sleep }));

    expect(result.success && result.data.band).toBe("medium");
    expect(fetchCandidatePlants).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it("fails retryably when every band errors", async () => {
    const { provider } = providerFor({
      easy: new Error("down"),
      medium: new Error("down"),
      hard: new Error("down"),
      expert: new Error("down"),
    });

    const result = await selectRoundContent(provider, "expert", new Set(), selection({ attempts: 1 }));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("PLANT_PROVIDER_UNAVAILABLE");
      expect(result.error.retryable).toBe(true);
      expect(result.error.message).toBe("Plant provider failed for 4 band(s) and returned no unused plants");
    }
  });

  it("fails when every plant has already been used", async () => {
    const { provider } = providerFor({ easy: [plant("e1", "Aster")] });

    const result = await selectRoundContent(provider, "easy", new Set(["e1"]), selection());

    expect(!result.success && result.error.message).toBe("No unused plants available for this session");
  });

  it("fails when there are too few distinct names for four options", async () => {
    const { provider } = providerFor({
      easy: [plant("e1", "Aster"), plant("e2", "Aster"), plant("e3", "Basil")],
    });

    const result = await selectRoundContent(provider, "easy", new Set(), selection());

    expect(!result.success && result.error.message).toBe("Not enough distinct plants to build answer options");
  });
});
