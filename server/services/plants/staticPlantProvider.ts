/**
 * Plant provider backed by a bundled JSON catalogue (data/plants.json).
 * Used for local runs and as the default until a content service is wired in.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import logger from "../../logger";
import type { PlantProvider } from "../battle/plantSelection";
import type { DifficultyBand, PlantRecord } from "../battle/types";

const catalogueSchema = z.object({
  plants: z
    .array(
      z.object({
        id: z.string().min(1),
        name: z.string().min(1),
        band: z.enum(["easy", "medium", "hard", "expert"]),
        imageRef: z.string().min(1),
        fact: z.string().min(1),
      })
    )
    .min(1),
});

export type PlantCatalogue = z.infer<typeof catalogueSchema>;

const DEFAULT_CATALOGUE_URL = new URL("../../../data/plants.json", import.meta.url);

export function loadPlantCatalogue(source: URL | string = DEFAULT_CATALOGUE_URL): PlantCatalogue {
  const raw: unknown = JSON.parse(readFileSync(source, "utf8"));
  return catalogueSchema.parse(raw);
}

export class StaticPlantProvider implements PlantProvider {
  private readonly byBand = new Map<DifficultyBand, PlantRecord[]>();

  constructor(catalogue: PlantCatalogue = loadPlantCatalogue()) {
    for (const { band, ...plant } of catalogue.plants) {
      const list = this.byBand.get(band) ?? [];
      list.push(plant);
      this.byBand.set(band, list);
    }
    logger.info("[Plants] Static catalogue loaded", { plants: catalogue.plants.length });
  }

  async fetchCandidatePlants(band: DifficultyBand): Promise<PlantRecord[]> {
    return [...(this.byBand.get(band) ?? [])];
  }
}
