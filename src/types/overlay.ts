/**
 * Overlay Types
 *
 * Boundary of the in-app message renderer, as seen by the tracker.
 *
 * @module types/overlay
 */

import type { ViewTransition } from "./scene";

/**
 * Overlay controller registered by the host app (or an overlay package)
 */
export interface OverlayController {
  /** Whether an overlay is currently displayed in the given scene */
  isPresenting(sceneId: string | null): boolean;
  /** Dismiss the overlay displayed in the given scene */
  dismiss(sceneId: string | null): void;
  /**
   * Called after a view transition has been recorded, so scene-scoped
   * suppression rules can take it into account.
   */
  didTransition?(transition: ViewTransition): void;
}
