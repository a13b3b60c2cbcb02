/**
 * Error Handler Middleware
 * Centralized error handling for Express application.
 */

import { Request, Response, NextFunction } from "express";
import { AppError, NotFoundError } from "../utils/errors.js";
import { NODE_ENV } from "../config/env.js";

interface ErrorBody {
  detail: string;
  stack?: string;
}

/**
 * body-parser and http-errors attach an HTTP status to what they throw.
 */
function httpStatusOf(error: Error): number | undefined {
  if (error instanceof AppError) return error.statusCode;
  if ("status" in error && typeof error.status === "number" && error.status >= 400 && error.status < 600) {
    return error.status;
  }
  return undefined;
}

/**
 * Catch-all for requests no route or static mount answered.
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError("Resource", `${req.method} ${req.path}`));
}

/**
 * Global error handler middleware.
 * Catches all errors and returns `{ detail }` with the mapped status.
 * MUST be registered last in middleware chain.
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  // Express only treats 4-argument middleware as an error handler.
  _next: NextFunction
): void {
  const statusCode = httpStatusOf(error) ?? 500;
  const hidden = statusCode >= 500 && !(error instanceof AppError);
  const detail = hidden ? "Internal server error" : error.message || "Internal server error";

  const log = statusCode >= 500 ? console.error : console.warn;
  log(`[Error] ${statusCode} - ${error.message}`, {
    error: error.name,
    stack: statusCode >= 500 ? error.stack : undefined,
    path: req.path,
    method: req.method,
  });

  const body: ErrorBody = { detail };

  // Stack only in development, and never for errors whose message is hidden
  if (NODE_ENV === "development" && !hidden) {
    body.stack = error.stack;
  }

  res.status(statusCode).json(body);
}
