/**
 * Custom Application Errors
 * Domain-specific error classes for better error handling.
 */

import { truncateDetail } from "./errorMessages.js";

/**
 * Base application error class.
 * All domain errors should extend this.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Resource not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} '${identifier}' not found`
      : `${resource} not found`;
    super(message, 404);
  }
}

/**
 * yt-dlp exited with an error. Carries the raw message for logs.
 */
export class ExtractionFailedError extends AppError {
  constructor(
    public readonly originalMessage: string,
    message: string = `yt-dlp error: ${truncateDetail(originalMessage)}`,
    statusCode: number = 500
  ) {
    super(message, statusCode);
  }
}

/**
 * The source site wants a signed-in session (bot check).
 * Fixed by configuring a cookie source, so the message says how.
 */
export class AuthRequiredError extends ExtractionFailedError {
  constructor(originalMessage: string) {
    super(
      originalMessage,
      "The source site is asking for sign-in to confirm you're not a bot. " +
        "Set COOKIES_FROM_BROWSER or COOKIES_FILE in .env and restart the server.",
      401
    );
  }
}

/**
 * yt-dlp reported success but no file is on disk.
 */
export class OutputMissingError extends AppError {
  constructor(filePath?: string) {
    super(
      filePath
        ? `Download succeeded but file was not found: ${filePath}`
        : "Download succeeded but file path was not found.",
      500
    );
  }
}

/**
 * Object storage upload failed and no local copy is left to serve.
 */
export class UploadFailedError extends AppError {
  constructor(cause: unknown) {
    super(`Storage upload failed: ${truncateDetail(describeCause(cause))}`, 500);
  }
}

/**
 * Write-and-sign probe against object storage failed.
 */
export class StorageHealthcheckError extends AppError {
  constructor(cause: unknown) {
    super(`Storage healthcheck failed: ${truncateDetail(describeCause(cause))}`, 500);
  }
}

/**
 * Invalid environment at startup. Never reaches an HTTP response.
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, false);
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
