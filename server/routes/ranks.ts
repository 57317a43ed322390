import { Router } from "express";
import { rankRequirements } from "../services/rating/ranks";
import type { RankBand } from "../services/rating/types";

export function createRanksRouter(bands: readonly RankBand[]) {
  const router = Router();
  const table = rankRequirements(bands);

  // GET /api/ranks (static for the life of the process)
  router.get("/", (_req, res) => {
    res.json({ ranks: table });
  });

  return router;
}
