/**
 * Event Types
 *
 * Type definitions for the tracking event model.
 *
 * @module types/events
 */

import { EVENT_NAMES } from "../utils/constants";

/**
 * A value that can be attached to an event
 */
export type EventValue =
  | string
  | number
  | boolean
  | null
  | Date
  | EventValue[]
  | { [key: string]: EventValue };

/**
 * Custom values attached to an event
 */
export type EventValues = Record<string, EventValue>;

/**
 * Event name wrapper
 *
 * Keeps event names distinct from arbitrary strings at the type level.
 */
export class EventName {
  static readonly view = new EventName(EVENT_NAMES.VIEW);
  static readonly identify = new EventName(EVENT_NAMES.IDENTIFY);

  readonly rawValue: string;

  constructor(rawValue: string) {
    this.rawValue = rawValue;
  }

  toString(): string {
    return this.rawValue;
  }
}

export type EventKind = "named" | "identify" | "view";

export interface NamedEvent {
  readonly kind: "named";
  readonly name: EventName;
  readonly values: Readonly<EventValues>;
}

export interface IdentifyEvent {
  readonly kind: "identify";
  readonly name: EventName;
  readonly values: Readonly<EventValues>;
}

export interface ViewEvent {
  readonly kind: "view";
  readonly name: EventName;
  readonly viewName: string;
  readonly title: string;
  readonly values: Readonly<EventValues>;
}

/**
 * Tracking event (tagged on `kind`)
 */
export type TrackingEvent = NamedEvent | IdentifyEvent | ViewEvent;
