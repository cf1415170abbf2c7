/**
 * Error Handler
 *
 * Centralized error handling. Errors are logged internally and never
 * rethrown into the host application.
 *
 * @module errors/errorHandler
 */

import type { Logger } from "../utils/logger";
import { HttpError, NetworkError, SystemError, ValidationError } from "./errorTypes";

export type ErrorCategory = "network" | "http" | "validation" | "system" | "unknown";

/**
 * Global logger instance (optional, set by SDK initialization)
 */
let globalLogger: Logger | undefined;

/**
 * Set the global logger for error handling
 *
 * @param logger - Logger instance from SDK
 */
export function setErrorLogger(logger: Logger | undefined): void {
  globalLogger = logger;
}

/**
 * Handle an error safely
 *
 * Logs the category and message only; stack traces stay out of the logs.
 *
 * @param error - Error to handle
 * @param context - Context where error occurred (e.g., "TrackingClient.flush")
 */
export function handleError(error: unknown, context: string): void {
  const errorType = categorizeError(error);
  const message = error instanceof Error ? error.message : String(error);

  globalLogger?.logError(`Error in ${context}`, {
    errorType,
    message,
  });
}

/**
 * Categorize error type for logging and retry decisions
 */
export function categorizeError(error: unknown): ErrorCategory {
  if (error instanceof HttpError) {
    return "http";
  }
  if (error instanceof NetworkError) {
    return "network";
  }
  if (error instanceof ValidationError) {
    return "validation";
  }
  if (error instanceof SystemError) {
    return "system";
  }
  if (error instanceof Error) {
    const name = error.name.toLowerCase();
    const message = error.message.toLowerCase();
    if (name.includes("abort") || name.includes("timeout") || message.includes("fetch") || message.includes("network")) {
      return "network";
    }
  }
  return "unknown";
}

/**
 * Check if error is retryable
 *
 * Network errors, 5xx, 408 and 429 are retryable. Other 4xx, validation and
 * system errors are not. Unknown errors are retried.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof HttpError) {
    if (error.status === 408 || error.status === 429) {
      return true;
    }
    return error.status >= 500 && error.status < 600;
  }

  const category = categorizeError(error);
  if (category === "validation" || category === "system") {
    return false;
  }
  return true;
}
