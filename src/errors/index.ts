/**
 * Errors Module
 *
 * @module errors
 */

export * from "./errorTypes";
export * from "./errorCodes";
export { handleError, isRetryableError, categorizeError, setErrorLogger } from "./errorHandler";
export type { ErrorCategory } from "./errorHandler";
