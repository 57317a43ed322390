import http from "node:http";
import { createApp } from "./app";
import { admin, initFirebaseAdmin } from "./admin";
import { FirebaseIdentityProvider } from "./auth/identity";
import { env } from "./config/env";
import { SERVER_PORT } from "./config/server";
import { getDb, isDatabaseAvailable, shutdownDatabase } from "./db";
import logger from "./logger";
import { getRedisClient, shutdownRedis } from "./redis";
import { createBattleServices } from "./services";
import { DrizzleSessionArchive } from "./services/battle/sessionArchive";
import { MemoryLeaderboardCache } from "./services/leaderboard/memoryCache";
import { RedisLeaderboardCache } from "./services/leaderboard/redisCache";
import { DrizzleRatingStore } from "./services/rating/drizzleRatingStore";
import { InMemoryRatingStore } from "./services/rating/ratingStore";
import { SocketGateway } from "./socket/gateway";
import { bindSocketServer, createSocketServer, shutdownSocketServer } from "./socket/index";

const persistent = isDatabaseAvailable();
if (!persistent) {
  logger.warn("[Server] DATABASE_URL not set, ratings are kept in memory");
}

const redis = getRedisClient();

initFirebaseAdmin();

const io = createSocketServer();
const gateway = new SocketGateway(io);

const services = createBattleServices({
  gateway,
  ratingStore: persistent ? new DrizzleRatingStore(getDb()) : new InMemoryRatingStore(),
  leaderboardCache: redis ? new RedisLeaderboardCache(redis) : new MemoryLeaderboardCache(),
  archive: persistent ? new DrizzleSessionArchive(getDb()) : null,
});
services.start();

const unbindSockets = bindSocketServer(io, {
  services,
  gateway,
  identity: new FirebaseIdentityProvider(admin.auth()),
});

const app = createApp(services);
const server = http.createServer(app);
io.attach(server);

server.listen(SERVER_PORT, "0.0.0.0", () => {
  logger.info(`Plant battle server running on port ${SERVER_PORT}`, { mode: env.NODE_ENV });
});

// Graceful shutdown
let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`[Server] ${signal} received, shutting down gracefully...`);

  unbindSockets();
  await shutdownSocketServer(io);
  services.shutdown();
  await shutdownRedis();
  await shutdownDatabase();
  server.close(() => {
    logger.info("[Server] HTTP server closed");
    process.exit(0);
  });
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.fatal("[Server] Shutdown failed", { error });
      process.exit(1);
    });
  });
}
