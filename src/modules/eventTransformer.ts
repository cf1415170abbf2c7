/**
 * Event Transformer Module
 *
 * Transforms a TrackingTask into the backend wire format.
 *
 * Responsibilities:
 * - Map task fields to snake_case wire fields
 * - Fold view name and title into the values of view events
 * - Apply the delegate's `intercept` hook
 * - Encode values to plain JSON (Date -> epoch seconds, non-finite numbers -> null)
 *
 * @module modules/eventTransformer
 */

import type { TrackingTask } from "../core/trackingTask";
import type { InterceptInfo } from "../types/delegate";
import type { EventValue, EventValues } from "../types/events";
import type { Logger } from "../utils/logger";
import { safeTry } from "../utils/safe";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Backend event format
 */
export interface WireEvent {
  event_id: string;
  event_name: string;
  visitor_id: string;
  values: Record<string, JsonValue>;
  scene_id: string | null;
  transition_id: number | null;
  client_ts_ms: number;
  timestamp: string; // ISO string
  sdk_version: string;
}

/**
 * Transformation options
 */
export interface TransformOptions {
  sdkVersion: string;
  intercept?: (values: EventValues, info: InterceptInfo) => EventValues;
  logger?: Logger;
}

/**
 * Encode a single value to JSON
 */
export function encodeValue(value: EventValue): JsonValue {
  if (value instanceof Date) {
    return Math.floor(value.getTime() / 1000);
  }
  if (Array.isArray(value)) {
    return value.map(encodeValue);
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (value !== null && typeof value === "object") {
    return encodeValues(value);
  }
  return value;
}

/**
 * Encode a values map to JSON
 */
export function encodeValues(values: Readonly<EventValues>): Record<string, JsonValue> {
  const encoded: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(values)) {
    encoded[key] = encodeValue(value);
  }
  return encoded;
}

function collectValues(task: TrackingTask): EventValues {
  const { event } = task;
  if (event.kind === "view") {
    return {
      ...event.values,
      view_name: event.viewName,
      title: event.title,
    };
  }
  return { ...event.values };
}

/**
 * Transform a tracking task to backend format
 */
export function transformTaskToWireFormat(task: TrackingTask, options: TransformOptions): WireEvent {
  const { sdkVersion, intercept, logger } = options;
  const eventName = task.event.name.rawValue;

  let values = collectValues(task);
  if (intercept) {
    const info: InterceptInfo = { eventName, visitorId: task.visitorId };
    const source = values;
    values = safeTry(() => intercept(source, info), logger, "TrackerDelegate.intercept") ?? source;
  }

  return {
    event_id: task.id,
    event_name: eventName,
    visitor_id: task.visitorId,
    values: encodeValues(values),
    scene_id: task.sceneId,
    transition_id: task.transitionId,
    client_ts_ms: task.createdAt,
    timestamp: new Date(task.createdAt).toISOString(),
    sdk_version: sdkVersion,
  };
}
