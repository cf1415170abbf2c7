/**
 * Tracker
 *
 * Sends events. One method per kind of event:
 *
 * - `track`: a custom event with any name
 * - `identify`: information about the user (ID, name, email, ...)
 * - `view`: a screen being displayed
 *
 * A view event is also how the SDK learns that the screen changed. When it
 * fires, an in-app message already on screen is dismissed, and the transition
 * is recorded for scene-scoped display restrictions.
 *
 * Every call returns a `TrackingTask` synchronously. Delivery happens later in
 * the tracking client; before `init`, the task is created but not sent.
 *
 * In multi-window hosts, construct the tracker with the `view` the event
 * belongs to so overlays are routed to the right scene.
 *
 * @module core/tracker
 */

import type { TrackerDelegate } from "../types/delegate";
import type { EventValues, TrackingEvent } from "../types/events";
import type { SceneView } from "../types/scene";
import { SystemError } from "../errors/errorTypes";
import { resolveSceneId } from "../utils/sceneId";
import { tagLogger } from "../utils/logger";
import { safeTry } from "../utils/safe";
import { writeDelegateSlot } from "./delegateSlot";
import { getLogger, getSceneHistory, getTrackingClient, getVisitorId } from "./entryPoint";
import { buildIdentify, buildNamed, buildView, validateEvent } from "./event";
import { settleTask, TrackingTask } from "./trackingTask";
import { signalViewTransition } from "./viewTransition";

export interface TrackerOptions {
  /** UI object of the scene the events belong to (held weakly) */
  view?: SceneView | null;
  visitorId?: string;
}

export class Tracker {
  readonly visitorId: string;
  readonly sceneId: string | null;
  private readonly sceneRef: WeakRef<SceneView> | null;

  /**
   * @param visitorId - Defaults to the current visitor ID
   */
  constructor(visitorId?: string);
  constructor(options: TrackerOptions);
  constructor(visitorIdOrOptions?: string | TrackerOptions) {
    if (typeof visitorIdOrOptions === "string") {
      this.visitorId = visitorIdOrOptions;
      this.sceneRef = null;
      this.sceneId = null;
      return;
    }

    const view = visitorIdOrOptions?.view ?? null;
    this.visitorId = visitorIdOrOptions?.visitorId ?? getVisitorId();
    this.sceneRef = view ? new WeakRef(view) : null;
    this.sceneId = resolveSceneId(view);
  }

  /** The tracker's scene, while it is still alive */
  get scene(): SceneView | undefined {
    return this.sceneRef?.deref();
  }

  /**
   * Set the delegate notified of delivery (held weakly; pass null to clear)
   */
  static setDelegate(delegate: TrackerDelegate | null): void {
    writeDelegateSlot(delegate);
    const client = getTrackingClient();
    if (client) {
      client.delegate = delegate ?? undefined;
    }
  }

  static track(event: TrackingEvent): TrackingTask;
  static track(name: string, values?: EventValues): TrackingTask;
  static track(nameOrEvent: string | TrackingEvent, values: EventValues = {}): TrackingTask {
    const tracker = new Tracker();
    return typeof nameOrEvent === "string" ? tracker.track(nameOrEvent, values) : tracker.track(nameOrEvent);
  }

  static identify(values: EventValues): TrackingTask {
    return new Tracker().identify(values);
  }

  static view(viewName: string, title?: string | null, values: EventValues = {}): TrackingTask {
    return new Tracker().view(viewName, title, values);
  }

  /**
   * Send an event
   *
   * @param name - Event name
   * @param values - Custom values attached to the event
   */
  track(name: string, values?: EventValues): TrackingTask;
  track(event: TrackingEvent): TrackingTask;
  track(nameOrEvent: string | TrackingEvent, values: EventValues = {}): TrackingTask {
    const event = typeof nameOrEvent === "string" ? buildNamed(nameOrEvent, values) : nameOrEvent;
    return this.dispatch(event);
  }

  /**
   * Send an identify event
   */
  identify(values: EventValues): TrackingTask {
    return this.dispatch(buildIdentify(values));
  }

  /**
   * Send a view event
   *
   * @param viewName - Screen name
   * @param title - Screen title, defaults to `viewName`
   */
  view(viewName: string, title?: string | null, values: EventValues = {}): TrackingTask {
    return this.dispatch(buildView(viewName, title, values));
  }

  private dispatch(event: TrackingEvent): TrackingTask {
    const logger = tagLogger(getLogger(), "TRACK");

    const validation = validateEvent(event);
    if (!validation.valid) {
      logger.logWarn("Event will be sent as-is", {
        eventName: event.name.rawValue,
        warnings: validation.warnings,
      });
    }

    const transitionId =
      event.kind === "view"
        ? signalViewTransition(event, this.sceneId, this.visitorId).id
        : getSceneHistory().getCurrent(this.sceneId)?.id ?? null;

    const task = new TrackingTask({
      event,
      visitorId: this.visitorId,
      scene: this.scene,
      sceneId: this.sceneId,
      transitionId,
    });

    const client = getTrackingClient();
    if (!client) {
      logger.logDebug("SDK not initialized, task not dispatched", { taskId: task.id });
      return task;
    }

    const dispatched = safeTry(
      () => {
        client.track(task);
        return true;
      },
      logger,
      "TrackingClient.track"
    );
    if (!dispatched) {
      settleTask(task, { ok: false, error: new SystemError("Failed to hand task to tracking client", "DISPATCH_FAILED") });
    }

    return task;
  }
}
