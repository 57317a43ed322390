import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.string().default("3001"),

  // Storage: both optional. Without DATABASE_URL ratings live in memory,
  // without REDIS_URL the leaderboard cache is process-local.
  DATABASE_URL: z.string().min(1).optional(),
  REDIS_URL: z
    .string()
    .regex(/^rediss?:\/\//, "REDIS_URL must start with redis:// or rediss://")
    .optional(),

  // Database pool tuning
  DB_POOL_MAX: z.coerce.number().int().positive().default(20),
  DB_POOL_IDLE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30000),
  DB_POOL_CONNECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // Firebase Admin (identity provider for socket connections)
  FIREBASE_ADMIN_KEY: z.string().optional(),
  FIREBASE_PROJECT_ID: z.string().optional(),
  FIREBASE_CLIENT_EMAIL: z.string().optional(),
  FIREBASE_PRIVATE_KEY: z.string().optional(),

  // CORS allowed origins (comma-separated)
  ALLOWED_ORIGINS: z.string().optional(),

  LOG_LEVEL: z.enum(["silent", "fatal", "error", "warn", "info", "debug"]).default("info"),

  // Battle tuning
  ELO_K_FACTOR: z.coerce.number().positive().max(100).default(32),
  MATCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  RECONNECT_GRACE_MS: z.coerce.number().int().positive().default(30_000),
  MAX_SUDDEN_DEATH_ROUNDS: z.coerce.number().int().min(1).max(50).default(5),
  LEADERBOARD_TTL_SECONDS: z.coerce.number().int().positive().default(300),
});

export type Env = z.infer<typeof envSchema>;

/** Parse an environment map, throwing one readable error for every bad variable. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("\n");
      throw new Error(`Environment validation failed:\n${issues}`);
    }
    throw error;
  }
}

function validateEnv(): Env {
  // Unit tests never touch real infrastructure; parse an empty environment
  // so every tunable takes its default.
  const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
  return parseEnv(isTest ? { NODE_ENV: "test" } : process.env);
}

export const env = validateEnv();
