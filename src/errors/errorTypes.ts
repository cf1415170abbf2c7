/**
 * Error Types
 *
 * Structured error classes for different error categories.
 *
 * @module errors/errorTypes
 */

import type { NetworkErrorCode, SystemErrorCode, ValidationErrorCode } from "./errorCodes";

/**
 * Validation error (bad configuration passed by the host app)
 */
export class ValidationError extends Error {
  code: ValidationErrorCode;
  field?: string;

  constructor(message: string, code: ValidationErrorCode, field?: string) {
    super(message);
    this.name = "ValidationError";
    this.code = code;
    this.field = field;
  }
}

/**
 * Network error (timeouts, DNS failures, offline)
 */
export class NetworkError extends Error {
  code: NetworkErrorCode;

  constructor(message: string, code: NetworkErrorCode = "NETWORK_ERROR") {
    super(message);
    this.name = "NetworkError";
    this.code = code;
  }
}

/**
 * HTTP error for 4xx/5xx responses
 */
export class HttpError extends Error {
  status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

/**
 * System error (task lifecycle inside the SDK)
 */
export class SystemError extends Error {
  code: SystemErrorCode;

  constructor(message: string, code: SystemErrorCode) {
    super(message);
    this.name = "SystemError";
    this.code = code;
  }
}
