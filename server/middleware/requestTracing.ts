import type { Request, Response, NextFunction } from "express";
import { randomUUID } from "node:crypto";
import { createChildLogger } from "../logger";

const REQUEST_ID_HEADER = "X-Request-ID";

/**
 * Generates a request ID at the edge and propagates it through the request
 * lifecycle. An X-Request-ID set upstream is preserved.
 *
 * Attaches `req.requestId` and `req.log` (a child logger with the id bound)
 * and echoes the id in the response header.
 */
export function requestTracing(req: Request, res: Response, next: NextFunction) {
  const incoming = req.headers[REQUEST_ID_HEADER.toLowerCase()];
  const requestId = typeof incoming === "string" && incoming.trim() ? incoming.trim().slice(0, 128) : randomUUID();

  req.requestId = requestId;
  req.log = createChildLogger({ requestId });
  res.setHeader(REQUEST_ID_HEADER, requestId);

  const start = Date.now();
  res.on("finish", () => {
    req.log.debug("request completed", {
      method: req.method,
      url: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - start,
    });
  });

  next();
}
