/**
 * Tether SDK
 *
 * Main entry point for the Tether SDK.
 * Provides the public API surface for host applications.
 *
 * @module index
 */

import {
  init,
  destroy,
  flush,
  getVisitorId,
  renewVisitorId,
  setOverlayController,
  isTaskForCurrentView,
  isSdkInitialized,
} from "./core/entryPoint";

// Re-export types
export * from "./types";

// Tracking API
export { Tracker } from "./core/tracker";
export type { TrackerOptions } from "./core/tracker";
export { TrackingTask } from "./core/trackingTask";
export type { TrackingTaskState } from "./core/trackingTask";
export { buildNamed, buildIdentify, buildView, validateEvent } from "./core/event";
export type { EventValidationResult } from "./core/event";

// Errors surfaced through TrackingTask.error
export { HttpError, NetworkError, SystemError, ValidationError } from "./errors";

// Re-export React hooks (optional - requires React peer dependency)
export { useViewTracking } from "./hooks";
export type { UseViewTrackingOptions } from "./hooks";

// Public API
export const Tether = {
  init,
  destroy,
  flush,
  getVisitorId,
  renewVisitorId,
  setOverlayController,
  isTaskForCurrentView,
  isInitialized: isSdkInitialized,
};
