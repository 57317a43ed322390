import { Router } from "express";
import { z } from "zod";
import type { RatingStore } from "../services/rating/ratingStore";
import type { PlayerRatingRecord } from "../services/rating/types";
import { DatabaseUnavailableError } from "../db";
import logger from "../logger";
import { Errors } from "../utils/apiError";

const playerIdSchema = z.string().regex(/^[a-zA-Z0-9_-]{1,128}$/);

export function createPlayersRouter(store: Pick<RatingStore, "getPlayer">) {
  const router = Router();

  // GET /api/players/:playerId
  router.get("/:playerId", async (req, res) => {
    const playerId = playerIdSchema.safeParse(req.params.playerId);
    if (!playerId.success) {
      return Errors.validation(res, playerId.error.flatten());
    }

    let player: PlayerRatingRecord | null;
    try {
      player = await store.getPlayer(playerId.data);
    } catch (error) {
      if (error instanceof DatabaseUnavailableError) return Errors.dbUnavailable(res);
      logger.error("[Players] Failed to load player", { error, playerId: playerId.data });
      return Errors.internal(res);
    }
    if (!player) {
      return Errors.notFound(res, "PLAYER_NOT_FOUND", "Player not found.");
    }

    return res.json({
      id: player.id,
      displayName: player.displayName,
      rating: player.rating,
      rank: player.rank,
      gamesPlayed: player.gamesPlayed,
      wins: player.wins,
      losses: player.losses,
      currentStreak: player.currentStreak,
      longestStreak: player.longestStreak,
      roundsPlayed: player.roundsPlayed,
      plantsIdentified: player.plantsIdentified,
      accuracy: player.accuracy,
      averageResponseTimeMs: player.averageResponseTimeMs,
      lastGameAt: player.lastGameAt === null ? null : new Date(player.lastGameAt).toISOString(),
      rankHistory: player.rankHistory.map((entry) => ({
        rank: entry.rank,
        rating: entry.rating,
        achievedAt: new Date(entry.achievedAt).toISOString(),
      })),
    });
  });

  return router;
}
