/**
 * Error Codes
 *
 * Standardized error code constants for consistent error handling.
 *
 * @module errors/errorCodes
 */

/**
 * Validation error codes
 */
export const VALIDATION_ERROR_CODES = {
  INVALID_APP_KEY: "INVALID_APP_KEY",
  INVALID_ENDPOINT: "INVALID_ENDPOINT",
} as const;

/**
 * Network error codes
 */
export const NETWORK_ERROR_CODES = {
  TIMEOUT: "TIMEOUT",
  NETWORK_ERROR: "NETWORK_ERROR",
} as const;

/**
 * System error codes
 */
export const SYSTEM_ERROR_CODES = {
  TASK_DROPPED: "TASK_DROPPED",
  CLIENT_DESTROYED: "CLIENT_DESTROYED",
  DISPATCH_FAILED: "DISPATCH_FAILED",
} as const;

export type ValidationErrorCode = (typeof VALIDATION_ERROR_CODES)[keyof typeof VALIDATION_ERROR_CODES];
export type NetworkErrorCode = (typeof NETWORK_ERROR_CODES)[keyof typeof NETWORK_ERROR_CODES];
export type SystemErrorCode = (typeof SYSTEM_ERROR_CODES)[keyof typeof SYSTEM_ERROR_CODES];
