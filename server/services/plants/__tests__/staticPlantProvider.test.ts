import { describe, it, expect, vi } from "vitest";
import { StaticPlantProvider, loadPlantCatalogue } from "../staticPlantProvider";

vi.mock("../../../logger");

describe("StaticPlantProvider", () => {
  const catalogue = {
    plants: [
      { id: "fern", name: "Fern", band: "easy" as const, imageRef: "plants/fern.jpg", fact: "Ferns spread by spores." },
      { id: "moss", name: "Moss", band: "easy" as const, imageRef: "plants/moss.jpg", fact: "Moss has no roots." },
      { id: "yew", name: "Yew", band: "hard" as const, imageRef: "plants/yew.jpg", fact: "Yews live for centuries." },
    ],
  };

  it("serves the plants of the requested band without the band field", async () => {
    const provider = new StaticPlantProvider(catalogue);

    await expect(provider.fetchCandidatePlants("hard")).resolves.toEqual([
      { id: "yew", name: "Yew", imageRef: "plants/yew.jpg", fact: "Yews live for centuries." },
    ]);
    await expect(provider.fetchCandidatePlants("easy")).resolves.toHaveLength(2);
    await expect(provider.fetchCandidatePlants("expert")).resolves.toEqual([]);
  });

  it("hands out copies of its band lists", async () => {
    const provider = new StaticPlantProvider(catalogue);

    const first = await provider.fetchCandidatePlants("easy");
    first.pop();

    await expect(provider.fetchCandidatePlants("easy")).resolves.toHaveLength(2);
  });

  it("ships a bundled catalogue with enough plants for a full session in every band", async () => {
    const provider = new StaticPlantProvider(loadPlantCatalogue());

    for (const band of ["easy", "medium", "hard", "expert"] as const) {
      const plants = await provider.fetchCandidatePlants(band);
      expect(plants.length).toBeGreaterThanOrEqual(10);
      expect(new Set(plants.map((p) => p.name)).size).toBe(plants.length);
    }
  });
});
