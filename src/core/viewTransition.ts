/**
 * View Transition Signal
 *
 * A view event is also the signal that the screen changed. Before the task
 * leaves the tracker: dismiss the overlay shown in that scene, record the
 * transition, then let the overlay controller see the record. A response for
 * the previous view arriving later can then be recognised as stale.
 *
 * @module core/viewTransition
 */

import type { ViewEvent } from "../types/events";
import type { ViewTransition } from "../types/scene";
import { tagLogger } from "../utils/logger";
import { safeTry } from "../utils/safe";
import { getLogger, getOverlayController, getSceneHistory } from "./entryPoint";

export function signalViewTransition(event: ViewEvent, sceneId: string | null, visitorId: string): ViewTransition {
  const logger = tagLogger(getLogger(), "VIEW");
  const overlay = getOverlayController();

  if (overlay) {
    const presenting = safeTry(() => overlay.isPresenting(sceneId), logger, "OverlayController.isPresenting");
    if (presenting) {
      logger.logDebug("Dismissing overlay", { sceneId, viewName: event.viewName });
      safeTry(() => overlay.dismiss(sceneId), logger, "OverlayController.dismiss");
    }
  }

  const transition = getSceneHistory().record({
    sceneId,
    viewName: event.viewName,
    title: event.title,
    visitorId,
  });

  if (overlay?.didTransition) {
    safeTry(() => overlay.didTransition?.(transition), logger, "OverlayController.didTransition");
  }

  return transition;
}
