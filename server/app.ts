/**
 * Express Application Factory
 *
 * Creates the Express app with security middleware and the battle API.
 * server/index.ts attaches it to the HTTP server that Socket.io shares.
 */
import express, { type NextFunction, type Request, type Response } from "express";
import compression from "compression";
import helmet from "helmet";
import cors from "cors";
import logger from "./logger";
import { DatabaseUnavailableError } from "./db";
import { requestTracing } from "./middleware/requestTracing";
import { BODY_PARSE_LIMIT, getAllowedOrigins } from "./config/server";
import { registerRoutes } from "./routes";
import type { HealthSources } from "./routes/health";
import type { BattleServices } from "./services";
import { Errors } from "./utils/apiError";

export function createApp(services: BattleServices, health?: Partial<HealthSources>): express.Express {
  const app = express();

  // Trust the first proxy hop so req.ip reflects the real client address.
  app.set("trust proxy", 1);

  // Request tracing: generate/propagate request ID before anything else
  app.use(requestTracing);

  app.use(helmet());

  // CORS configuration
  const corsOptions = {
    origin: function (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) {
      // Allow requests with no origin (mobile apps, server-to-server) or matching allowed domains
      if (!origin || getAllowedOrigins().includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error("Not allowed by CORS"));
      }
    },
    credentials: true,
  };
  app.use(cors(corsOptions));

  app.use(compression());

  app.use(express.json({ limit: BODY_PARSE_LIMIT }));

  registerRoutes(app, services, health);

  app.use("/api", (_req, res) => {
    Errors.notFound(res);
  });

  // Global error handler (Express needs all four parameters)
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof DatabaseUnavailableError) {
      Errors.dbUnavailable(res);
      return;
    }
    if (err instanceof Error && err.message === "Not allowed by CORS") {
      Errors.forbidden(res, "CORS_REJECTED", "Origin not allowed.");
      return;
    }
    logger.error("[Server] Unhandled request error", {
      requestId: req.requestId,
      error: err instanceof Error ? err.message : String(err),
    });
    Errors.internal(res);
  });

  return app;
}
