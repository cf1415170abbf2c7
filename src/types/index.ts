/**
 * Types Module
 *
 * Central export point for all public type definitions.
 *
 * @module types
 */

export { EventName } from "./events";
export type {
  EventValue,
  EventValues,
  EventKind,
  NamedEvent,
  IdentifyEvent,
  ViewEvent,
  TrackingEvent,
} from "./events";
export type { SceneView, ViewTransition } from "./scene";
export type { OverlayController } from "./overlay";
export type { TrackerDelegate, InterceptInfo } from "./delegate";
export type { InitOptions } from "./config";
