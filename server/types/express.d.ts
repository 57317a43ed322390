import type { Logger } from "../logger";

declare global {
  namespace Express {
    interface Request {
      /** Unique request trace ID (from X-Request-ID header or generated) */
      requestId: string;
      /** Child logger with requestId pre-bound */
      log: Logger;
    }
  }
}

export {};
