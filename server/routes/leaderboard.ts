import { Router } from "express";
import { z } from "zod";
import { LEADERBOARD_DEFAULT_LIMIT, LEADERBOARD_MAX_LIMIT } from "../config/constants";
import type { LeaderboardService } from "../services/leaderboard/leaderboardService";
import { DatabaseUnavailableError } from "../db";
import logger from "../logger";
import { Errors } from "../utils/apiError";

export const leaderboardQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(LEADERBOARD_MAX_LIMIT).default(LEADERBOARD_DEFAULT_LIMIT),
  offset: z.coerce.number().int().min(0).default(0),
});

export function createLeaderboardRouter(leaderboard: Pick<LeaderboardService, "getLeaderboard">) {
  const router = Router();

  // GET /api/leaderboard?limit&offset
  router.get("/", async (req, res) => {
    const parsed = leaderboardQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return Errors.validation(res, parsed.error.flatten());
    }

    try {
      const page = await leaderboard.getLeaderboard(parsed.data.limit, parsed.data.offset);
      return res.json(page);
    } catch (error) {
      if (error instanceof DatabaseUnavailableError) return Errors.dbUnavailable(res);
      logger.error("[Leaderboard] Failed to load leaderboard", { error, ...parsed.data });
      return Errors.internal(res);
    }
  });

  return router;
}
