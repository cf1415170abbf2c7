/**
 * Input Validation
 *
 * Validates configuration passed to `init` before any module is created.
 *
 * @module security/inputValidation
 */

import { isNonEmptyString } from "../utils/validation";

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  error?: string;
  field?: string;
}

const LOCAL_HOSTNAMES = ["localhost", "127.0.0.1", "[::1]"];

/**
 * Validate that a backend URL uses HTTPS
 *
 * Plain HTTP is accepted for localhost so the SDK can talk to a local
 * development backend.
 */
export function validateHttpsUrl(url: string): ValidationResult {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { valid: false, error: `is not a valid URL: ${url}` };
  }

  if (parsed.protocol === "https:") {
    return { valid: true };
  }

  if (parsed.protocol === "http:" && LOCAL_HOSTNAMES.includes(parsed.hostname)) {
    return { valid: true };
  }

  return { valid: false, error: `must use HTTPS: ${url}` };
}

/**
 * Validate the application key
 */
export function validateAppKey(appKey: unknown): ValidationResult {
  if (!isNonEmptyString(appKey) || appKey.trim().length === 0) {
    return { valid: false, error: "appKey is required and must be a non-empty string", field: "appKey" };
  }
  if (/\s/.test(appKey)) {
    return { valid: false, error: "appKey must not contain whitespace", field: "appKey" };
  }
  return { valid: true };
}
