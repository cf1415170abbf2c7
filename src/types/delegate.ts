/**
 * Delegate Types
 *
 * @module types/delegate
 */

import type { TrackingTask } from "../core/trackingTask";
import type { EventValues } from "./events";

export interface InterceptInfo {
  eventName: string;
  visitorId: string;
}

/**
 * Observer of tracking task delivery
 *
 * Every method is optional. The delegate is held weakly: keep your own
 * reference for as long as it should receive callbacks.
 */
export interface TrackerDelegate {
  /** Rewrite the values sent for an event */
  intercept?(values: EventValues, info: InterceptInfo): EventValues;
  trackingTaskDidSend?(task: TrackingTask): void;
  trackingTaskDidFail?(task: TrackingTask, error: Error): void;
}
