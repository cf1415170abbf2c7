/**
 * Event Builders
 *
 * Collapse the three tracking call shapes into the `TrackingEvent` model.
 * Events are frozen on construction; the values are deep-copied first so the
 * caller can keep mutating their own objects, nested ones included.
 *
 * No input is rejected here. `validateEvent` reports problems so the tracker
 * can log them, and the event is sent regardless.
 *
 * @module core/event
 */

import {
  EventName,
  type EventValue,
  type EventValues,
  type IdentifyEvent,
  type NamedEvent,
  type TrackingEvent,
  type ViewEvent,
} from "../types/events";
import { EVENT_NAMES } from "../utils/constants";
import { isPlainObject } from "../utils/validation";

const EVENT_NAME_PATTERN = /^[a-z0-9_]+$/;
const RESERVED_EVENT_NAMES: readonly string[] = [EVENT_NAMES.VIEW, EVENT_NAMES.IDENTIFY];

function copyValue(value: EventValue): EventValue {
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (Array.isArray(value)) {
    const items = value.map(copyValue);
    Object.freeze(items);
    return items;
  }
  if (value !== null && typeof value === "object") {
    return freezeValues(value);
  }
  return value;
}

// Deep copy; nested objects and arrays are frozen, dates are copied
function freezeValues(values: Readonly<EventValues>): EventValues {
  const copy: EventValues = {};
  for (const [key, value] of Object.entries(values)) {
    copy[key] = copyValue(value);
  }
  Object.freeze(copy);
  return copy;
}

/**
 * Build a named (custom) event
 */
export function buildNamed(name: string | EventName, values: EventValues = {}): NamedEvent {
  const event: NamedEvent = {
    kind: "named",
    name: typeof name === "string" ? new EventName(name) : name,
    values: freezeValues(values),
  };
  return Object.freeze(event);
}

/**
 * Build an identify event
 */
export function buildIdentify(values: EventValues = {}): IdentifyEvent {
  const event: IdentifyEvent = {
    kind: "identify",
    name: EventName.identify,
    values: freezeValues(values),
  };
  return Object.freeze(event);
}

/**
 * Build a view event. `title` defaults to `viewName`.
 */
export function buildView(viewName: string, title?: string | null, values: EventValues = {}): ViewEvent {
  const event: ViewEvent = {
    kind: "view",
    name: EventName.view,
    viewName,
    title: title ?? viewName,
    values: freezeValues(values),
  };
  return Object.freeze(event);
}

/**
 * Result of validating an event
 */
export interface EventValidationResult {
  valid: boolean;
  warnings: string[];
}

function collectKeyWarnings(values: Readonly<Record<string, unknown>>, path: string, warnings: string[]): void {
  for (const [key, value] of Object.entries(values)) {
    const keyPath = path ? `${path}.${key}` : key;
    if (key.startsWith("_")) {
      warnings.push(`value key "${keyPath}" starts with "_", which is reserved`);
    }
    if (key.includes(".") || key.includes("$")) {
      warnings.push(`value key "${keyPath}" contains "." or "$"`);
    }
    if (isPlainObject(value)) {
      collectKeyWarnings(value, keyPath, warnings);
    }
  }
}

/**
 * Check an event for names and keys the backend will not accept as-is
 */
export function validateEvent(event: TrackingEvent): EventValidationResult {
  const warnings: string[] = [];
  const name = event.name.rawValue;

  if (event.kind === "named") {
    if (!name) {
      warnings.push("event name is empty");
    } else {
      if (!EVENT_NAME_PATTERN.test(name)) {
        warnings.push(`event name "${name}" should only contain lowercase letters, digits and "_"`);
      }
      if (name.startsWith("_")) {
        warnings.push(`event name "${name}" starts with "_", which is reserved`);
      }
      if (RESERVED_EVENT_NAMES.includes(name)) {
        warnings.push(`event name "${name}" is reserved; use the dedicated method instead`);
      }
    }
  }

  if (event.kind === "view" && !event.viewName) {
    warnings.push("view name is empty");
  }

  collectKeyWarnings(event.values, "", warnings);

  return { valid: warnings.length === 0, warnings };
}
