import type { Express } from "express";
import type { BattleServices } from "./services";
import { createHealthRouter, type HealthSources } from "./routes/health";
import { createLeaderboardRouter } from "./routes/leaderboard";
import { createPlayersRouter } from "./routes/players";
import { createRanksRouter } from "./routes/ranks";

export function registerRoutes(app: Express, services: BattleServices, health?: Partial<HealthSources>): void {
  app.use("/api/leaderboard", createLeaderboardRouter(services.leaderboard));
  app.use("/api/players", createPlayersRouter(services.ratingStore));
  app.use("/api/ranks", createRanksRouter(services.ratings.rankBands));
  app.use(
    "/api/health",
    createHealthRouter({
      activeSessions: () => services.registry.activeCount(),
      queuedPlayers: () => services.matchmaker.poolSize(),
      leaderboardCache: () => services.leaderboard.cacheState(),
      ...health,
    })
  );
}
