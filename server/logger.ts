/**
 * Structured Logger
 *
 * Console-backed logger with two output modes:
 * - production: one JSON object per line (log aggregation friendly)
 * - everything else: `[timestamp] [LEVEL] message {fields}`
 *
 * Level threshold comes from LOG_LEVEL. Tests default to silent so suites
 * stay readable; set LOG_LEVEL explicitly to see output under vitest.
 */

import os from "node:os";

export type LogLevelName = "debug" | "info" | "warn" | "error" | "fatal";
type ThresholdName = LogLevelName | "silent";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  fatal(message: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

const LEVELS: Record<ThresholdName, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 100,
};

const SENSITIVE_KEY = /pass(word)?|token|secret|email|authorization|cookie|private_?key/i;
const REDACTED = "***";

function isThresholdName(value: string | undefined): value is ThresholdName {
  return value !== undefined && value in LEVELS;
}

function resolveThreshold(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (isThresholdName(configured)) return LEVELS[configured];
  const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
  return isTest ? LEVELS.silent : LEVELS.info;
}

function redact(value: unknown, depth = 0): unknown {
  if (depth > 5 || value === null || typeof value !== "object") return value;
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (Array.isArray(value)) return value.map((item) => redact(item, depth + 1));
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    out[key] = SENSITIVE_KEY.test(key) ? REDACTED : redact(inner, depth + 1);
  }
  return out;
}

function writerFor(level: LogLevelName): (line: string) => void {
  switch (level) {
    case "debug":
      return (line) => console.debug(line);
    case "info":
      return (line) => console.info(line);
    case "warn":
      return (line) => console.warn(line);
    default:
      return (line) => console.error(line);
  }
}

class ConsoleLogger implements Logger {
  private readonly threshold = resolveThreshold();
  private readonly json = process.env.NODE_ENV === "production";

  constructor(private readonly bindings: LogFields = {}) {}

  debug(message: string, fields?: LogFields): void {
    this.write("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write("error", message, fields);
  }

  fatal(message: string, fields?: LogFields): void {
    this.write("fatal", message, fields);
  }

  child(bindings: LogFields): Logger {
    return new ConsoleLogger({ ...this.bindings, ...bindings });
  }

  private write(level: LogLevelName, message: string, fields?: LogFields): void {
    if (LEVELS[level] < this.threshold) return;

    const merged = redact({ ...this.bindings, ...fields });
    const extra: LogFields = merged !== null && typeof merged === "object" ? { ...merged } : {};
    const timestamp = new Date().toISOString();

    if (this.json) {
      writerFor(level)(
        JSON.stringify({
          ...extra,
          level: LEVELS[level],
          levelName: level,
          message,
          timestamp,
          hostname: os.hostname(),
          pid: process.pid,
        })
      );
      return;
    }

    const suffix = Object.keys(extra).length > 0 ? ` ${JSON.stringify(extra)}` : "";
    writerFor(level)(`[${timestamp}] [${level.toUpperCase()}] ${message}${suffix}`);
  }
}

const logger: Logger = new ConsoleLogger();

export function createChildLogger(bindings: LogFields): Logger {
  return logger.child(bindings);
}

export default logger;
