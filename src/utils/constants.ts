/**
 * Constants
 *
 * Shared constants used across the SDK.
 *
 * @module utils/constants
 */

export const SDK_VERSION = "0.1.0";

/**
 * Default configuration values
 */
export const DEFAULTS = {
  // Endpoints
  API_BASE: "https://api.tether.dev",

  // Timeouts
  TRANSPORT_TIMEOUT_MS: 10000,

  // Intervals
  MAX_FLUSH_INTERVAL_MS: 5000,

  // Sizes
  MAX_BUFFER_SIZE: 1000,
  EVENT_BATCH_SIZE: 20,

  // Retries
  MAX_RETRIES: 2,
  RETRY_DELAY_MS: 1000,
  MAX_RETRY_DELAY_MS: 8000,
} as const;

/**
 * Reserved event names
 */
export const EVENT_NAMES = {
  VIEW: "view",
  IDENTIFY: "identify",
} as const;

/**
 * Storage keys
 */
export const STORAGE_KEYS = {
  VISITOR_ID: "tether_visitor_id",
} as const;
