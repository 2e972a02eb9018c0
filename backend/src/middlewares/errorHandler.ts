import { type NextFunction, type Request, type Response } from "express";
import { ZodError } from "zod";
import { env } from "../config/env";
import { HttpError } from "../utils/httpError";
import { createLogger } from "../utils/logger";
import { ConfigError, isIngestionError } from "../services/grading/errors";

const log = createLogger(env.LOG_LEVEL, "http");

export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new HttpError(404, "Route not found"));
}

/** Maps thrown errors to `{ error }` JSON; anything unrecognised is a logged 500. */
export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (error instanceof HttpError) {
    res.status(error.statusCode).json({ error: error.message });
    return;
  }

  if (error instanceof ZodError) {
    res.status(400).json({ error: error.issues.map((i) => i.message).join(", ") });
    return;
  }

  // A bad grading option or an unreadable uploaded document is the caller's fault.
  if (error instanceof ConfigError || isIngestionError(error)) {
    res.status(400).json({ error: error.message });
    return;
  }

  log.error(`${req.method} ${req.originalUrl} failed`, error);
  res.status(500).json({ error: "Internal server error" });
}
