/**
 * Application Constants
 *
 * Named constants for the battle core, grouped by feature area.
 * Values that operators tune per deployment are also exposed through
 * env.ts; the numbers here are the defaults and fixed protocol limits.
 */

import type { DifficultyBand } from "../services/battle/types";

// ============================================================================
// Socket.io Configuration
// ============================================================================

/** Time (ms) to wait for a pong before considering the connection dead */
export const SOCKET_PING_TIMEOUT_MS = 20_000;

/** Interval (ms) between ping packets sent to clients */
export const SOCKET_PING_INTERVAL_MS = 25_000;

/** Maximum size (bytes) of a single inbound socket message (16 KB) */
export const SOCKET_MAX_HTTP_BUFFER_SIZE = 16_384;

// ============================================================================
// Matchmaking
// ============================================================================

/** Rating difference accepted the moment a player enters the pool */
export const MATCH_INITIAL_RATING_WINDOW = 300;

/** Window growth per widening step */
export const MATCH_WINDOW_STEP = 50;

/** Wait (ms) per widening step; also the pool sweep interval */
export const MATCH_WINDOW_STEP_MS = 5_000;

/** Hard cap on the rating window */
export const MATCH_MAX_RATING_WINDOW = 600;

/** Bounded wait (ms) before a pool player gets MATCHMAKING_TIMEOUT */
export const MATCH_TIMEOUT_MS = 30_000;

/** Invite code lifetime (ms) */
export const INVITE_TTL_MS = 5 * 60 * 1000;

/** Invite code length; alphabet excludes look-alike characters */
export const INVITE_CODE_LENGTH = 6;
export const INVITE_CODE_ALPHABET = "ABCDEFGHJKLMNPQRSTUVWXYZ23456789";

/** Fresh codes drawn before invite creation gives up on collisions */
export const INVITE_CODE_ATTEMPTS = 10;

// ============================================================================
// Rounds
// ============================================================================

/** Regulation rounds per battle (best of five) */
export const REGULATION_ROUNDS = 5;

/** Answer options per round */
export const OPTIONS_PER_ROUND = 4;

/** Sudden-death rounds played before the statistical tiebreak decides */
export const MAX_SUDDEN_DEATH_ROUNDS = 5;

/** Pre-round warm-up after a pairing (ms) */
export const WARMUP_MS = 3_000;

/** Answer window per difficulty band (ms) */
export const ANSWER_WINDOW_MS: Record<DifficultyBand, number> = {
  easy: 30_000,
  medium: 20_000,
  hard: 15_000,
  expert: 10_000,
};

/** Attempts against the plant provider per band before narrowing */
export const PLANT_FETCH_ATTEMPTS = 3;

/** First backoff delay (ms) between plant provider attempts; doubles each retry */
export const PLANT_FETCH_BASE_DELAY_MS = 250;

// ============================================================================
// Session lifecycle
// ============================================================================

/** Grace period (ms) for a disconnected player before the match is forfeited */
export const RECONNECT_GRACE_MS = 30_000;

/** How long (ms) a finished session stays addressable for reconnects */
export const SESSION_RETENTION_MS = 2 * 60 * 1000;

// ============================================================================
// Ratings
// ============================================================================

export const DEFAULT_RATING = 1000;
export const RATING_FLOOR = 100;
export const ELO_K_FACTOR = 32;

/** Commit attempts before a session is parked in the pending queue */
export const RATING_COMMIT_ATTEMPTS = 4;
export const RATING_COMMIT_BASE_DELAY_MS = 50;

/** Interval (ms) at which parked rating updates are retried */
export const RATING_PENDING_RETRY_MS = 15_000;

// ============================================================================
// Leaderboard
// ============================================================================

export const LEADERBOARD_TTL_SECONDS = 300;
export const LEADERBOARD_DEFAULT_LIMIT = 20;
export const LEADERBOARD_MAX_LIMIT = 100;
