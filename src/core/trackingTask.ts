/**
 * TrackingTask
 *
 * Handle returned by every tracking call. Binds one event to the visitor ID
 * and scene it was tracked with, and reports delivery progress.
 *
 * The tracker creates the task; only the tracking client moves it forward,
 * through `markTaskSending` and `settleTask`. Neither is part of the public
 * package surface.
 *
 * @module core/trackingTask
 */

import type { TrackingEvent } from "../types/events";
import type { SceneView } from "../types/scene";
import { generateUUID } from "../utils/uuid";

export type TrackingTaskState = "pending" | "sending" | "succeeded" | "failed";

export type TaskOutcome =
  | { ok: true }
  | { ok: false; error: Error };

export interface TrackingTaskInit {
  event: TrackingEvent;
  visitorId: string;
  scene?: SceneView | null;
  sceneId?: string | null;
  transitionId?: number | null;
}

interface TaskControl {
  state: TrackingTaskState;
  error: Error | undefined;
  resolve: (isSuccessful: boolean) => void;
}

const controls = new WeakMap<TrackingTask, TaskControl>();

export class TrackingTask {
  readonly id: string;
  readonly event: TrackingEvent;
  readonly visitorId: string;
  readonly createdAt: number;
  readonly sceneId: string | null;
  /** Latest view transition of the task's scene when the task was created */
  readonly transitionId: number | null;
  /** Resolves true when delivered, false when delivery failed. Never rejects. */
  readonly completion: Promise<boolean>;

  private readonly sceneRef: WeakRef<SceneView> | null;

  constructor(init: TrackingTaskInit) {
    this.id = generateUUID();
    this.event = init.event;
    this.visitorId = init.visitorId;
    this.createdAt = Date.now();
    this.sceneId = init.sceneId ?? null;
    this.transitionId = init.transitionId ?? null;
    this.sceneRef = init.scene ? new WeakRef(init.scene) : null;

    let resolve: (isSuccessful: boolean) => void = () => {};
    this.completion = new Promise<boolean>((res) => {
      resolve = res;
    });
    controls.set(this, { state: "pending", error: undefined, resolve });
  }

  get state(): TrackingTaskState {
    return controls.get(this)?.state ?? "pending";
  }

  get isSettled(): boolean {
    const state = this.state;
    return state === "succeeded" || state === "failed";
  }

  get error(): Error | undefined {
    return controls.get(this)?.error;
  }

  /** The scene the task was tracked in, while it is still alive */
  get scene(): SceneView | undefined {
    return this.sceneRef?.deref();
  }

  /**
   * Register a completion callback
   *
   * @returns Function that detaches the callback
   */
  onComplete(handler: (isSuccessful: boolean) => void): () => void {
    let active = true;
    void this.completion.then((isSuccessful) => {
      if (active) {
        handler(isSuccessful);
      }
    });
    return () => {
      active = false;
    };
  }
}

/**
 * Move a pending task to `sending`
 */
export function markTaskSending(task: TrackingTask): void {
  const control = controls.get(task);
  if (control && control.state === "pending") {
    control.state = "sending";
  }
}

/**
 * Settle a task. Only the first call has an effect.
 *
 * @returns Whether this call settled the task
 */
export function settleTask(task: TrackingTask, outcome: TaskOutcome): boolean {
  const control = controls.get(task);
  if (!control || control.state === "succeeded" || control.state === "failed") {
    return false;
  }
  if (outcome.ok) {
    control.state = "succeeded";
  } else {
    control.state = "failed";
    control.error = outcome.error;
  }
  control.resolve(outcome.ok);
  return true;
}
