import type { Response } from "express";

/**
 * Error bodies for the leaderboard, player and rank endpoints:
 *
 *  { "error": "PLAYER_NOT_FOUND", "message": "Player not found.", "details": { ... } }
 *
 * `error` is UPPER_SNAKE_CASE; `details` only appears when there is something in it.
 */
export interface ApiErrorBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

export function sendError(
  res: Response,
  status: number,
  error: string,
  message: string,
  details?: Record<string, unknown>
): Response {
  const body: ApiErrorBody = { error, message };
  if (details && Object.keys(details).length > 0) body.details = details;
  return res.status(status).json(body);
}

export const Errors = {
  /** 400 with the flattened zod issues of a bad query or path param */
  validation: (res: Response, issues: unknown, message = "Request validation failed.") =>
    sendError(res, 400, "VALIDATION_ERROR", message, { issues }),

  /** 403; used for origins outside the CORS allow-list */
  forbidden: (res: Response, error = "FORBIDDEN", message = "Insufficient permissions.") =>
    sendError(res, 403, error, message),

  notFound: (res: Response, error = "NOT_FOUND", message = "Resource not found.") =>
    sendError(res, 404, error, message),

  internal: (res: Response) => sendError(res, 500, "INTERNAL_ERROR", "An unexpected error occurred."),

  /** 503 while the rating store's database is unreachable */
  dbUnavailable: (res: Response) =>
    sendError(res, 503, "DATABASE_UNAVAILABLE", "Database unavailable. Please try again shortly."),
} as const;
