import { randomUUID } from "node:crypto";
import type { NextFunction, Request, Response } from "express";

export type LogLevel = "debug" | "info" | "warn" | "error";

type LogContext = Record<string, unknown>;

export type RequestWithId = Request & { requestId?: string };

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

let minimumLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info";

export function setLogLevel(level: LogLevel) {
  minimumLevel = level;
}

const basePayload = (level: LogLevel, message: string, context: LogContext) => ({
  level,
  message,
  time: new Date().toISOString(),
  ...context
});

export function log(level: LogLevel, message: string, context: LogContext = {}) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
    return;
  }
  const line = JSON.stringify(basePayload(level, message, context));
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function logError(message: string, error: unknown, context: LogContext = {}) {
  if (error instanceof Error) {
    log("error", message, {
      ...context,
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack
      }
    });
    return;
  }
  log("error", message, { ...context, error });
}

export function requestLogger(req: RequestWithId, res: Response, next: NextFunction) {
  const requestId = req.header("x-request-id") ?? randomUUID();
  req.requestId = requestId;
  res.setHeader("x-request-id", requestId);

  const start = Date.now();
  res.on("finish", () => {
    log("info", "request.end", {
      requestId,
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - start
    });
  });

  next();
}
