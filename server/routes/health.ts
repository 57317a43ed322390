import { Router } from "express";
import { sql } from "drizzle-orm";
import { getDb, isDatabaseAvailable } from "../db";
import { getRedisClient } from "../redis";
import type { CircuitState } from "../utils/circuitBreaker";

export interface ComponentHealth {
  status: "up" | "down" | "unconfigured";
  latencyMs?: number;
  detail?: string;
}

export interface HealthSources {
  activeSessions(): number;
  queuedPlayers(): number;
  leaderboardCache(): CircuitState;
  checkDatabase?(): Promise<ComponentHealth>;
  checkRedis?(): Promise<ComponentHealth>;
}

export async function checkDatabase(): Promise<ComponentHealth> {
  if (!isDatabaseAvailable()) {
    return { status: "unconfigured" };
  }
  const start = Date.now();
  try {
    await getDb().execute(sql`SELECT 1`);
    return { status: "up", latencyMs: Date.now() - start };
  } catch (err) {
    return { status: "down", latencyMs: Date.now() - start, detail: String(err) };
  }
}

export async function checkRedis(): Promise<ComponentHealth> {
  const client = getRedisClient();
  if (!client) {
    return { status: "unconfigured" };
  }
  const start = Date.now();
  try {
    await client.ping();
    return { status: "up", latencyMs: Date.now() - start };
  } catch (err) {
    return { status: "down", latencyMs: Date.now() - start, detail: String(err) };
  }
}

export function createHealthRouter(sources: HealthSources, startedAt: number = Date.now()) {
  const router = Router();
  const probeDatabase = sources.checkDatabase ?? checkDatabase;
  const probeRedis = sources.checkRedis ?? checkRedis;

  // Liveness: always 200 while the process runs
  router.get("/", (_req, res) => {
    res.json({
      status: "ok",
      uptime: Math.round((Date.now() - startedAt) / 1000),
      timestamp: new Date().toISOString(),
      activeSessions: sources.activeSessions(),
      queuedPlayers: sources.queuedPlayers(),
    });
  });

  // Readiness: a configured database that is down makes the instance unready.
  // Redis only degrades the leaderboard.
  router.get("/ready", async (_req, res) => {
    const [database, redis] = await Promise.all([probeDatabase(), probeRedis()]);
    const status =
      database.status === "down"
        ? "unhealthy"
        : redis.status === "down" || sources.leaderboardCache() !== "closed"
          ? "degraded"
          : "healthy";

    res.status(status === "unhealthy" ? 503 : 200).json({
      status,
      timestamp: new Date().toISOString(),
      checks: { database, redis, leaderboardCache: sources.leaderboardCache() },
    });
  });

  return router;
}
