/**
 * SceneHistory Module
 *
 * Records the latest view transition of every scene.
 *
 * Responsibilities:
 * - Assign monotonically increasing transition IDs
 * - Answer "which view is current in this scene"
 * - Tell whether a task was tracked for the view that is still current,
 *   so responses for a screen the user already left can be dropped
 *
 * Note: This module decides nothing about overlay suppression. It only
 * keeps the record the suppression rules read.
 *
 * @module modules/sceneHistory
 */

import type { ViewTransition } from "../types/scene";

export interface RecordTransitionInput {
  sceneId: string | null;
  viewName: string;
  title: string;
  visitorId: string;
}

/**
 * SceneHistory interface
 */
/**
 * What `isCurrent` needs to know about a task
 */
export interface TransitionStamp {
  sceneId: string | null;
  transitionId: number | null;
  /** Creation time (epoch ms), used for tasks without a transition */
  createdAt?: number;
}

export interface SceneHistory {
  record(input: RecordTransitionInput): ViewTransition;
  getCurrent(sceneId: string | null): ViewTransition | null;
  isCurrent(task: TransitionStamp): boolean;
  reset(): void;
}

const DEFAULT_SCENE_KEY = "__default__";

function keyOf(sceneId: string | null): string {
  return sceneId ?? DEFAULT_SCENE_KEY;
}

/**
 * Create a new SceneHistory instance
 */
export function createSceneHistory(): SceneHistory {
  let nextTransitionId = 1;
  const latest = new Map<string, ViewTransition>();
  // Anything stamped before the last reset is stale
  let resetFloor = 1;
  let resetAt = Number.NEGATIVE_INFINITY;

  function record(input: RecordTransitionInput): ViewTransition {
    const transition: ViewTransition = {
      id: nextTransitionId++,
      sceneId: input.sceneId,
      viewName: input.viewName,
      title: input.title,
      visitorId: input.visitorId,
      at: Date.now(),
    };
    latest.set(keyOf(input.sceneId), transition);
    return transition;
  }

  function getCurrent(sceneId: string | null): ViewTransition | null {
    return latest.get(keyOf(sceneId)) ?? null;
  }

  function isCurrent(task: TransitionStamp): boolean {
    if (task.transitionId !== null && task.transitionId < resetFloor) {
      return false;
    }
    if (task.transitionId === null && task.createdAt !== undefined && task.createdAt < resetAt) {
      return false;
    }
    const current = getCurrent(task.sceneId);
    if (!current) {
      return true;
    }
    return task.transitionId === current.id;
  }

  function reset(): void {
    latest.clear();
    resetFloor = nextTransitionId;
    resetAt = Date.now();
  }

  return {
    record,
    getCurrent,
    isCurrent,
    reset,
  };
}
