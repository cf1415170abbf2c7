/**
 * Scene Types
 *
 * @module types/scene
 */

/**
 * Any UI object identifying an on-screen scene (a window, a root element,
 * a split-view pane). Held weakly; the SDK never keeps it alive.
 */
export type SceneView = object;

/**
 * A recorded screen transition
 */
export interface ViewTransition {
  /** Monotonic across the process */
  id: number;
  /** Scene the transition happened in (null = default scene) */
  sceneId: string | null;
  viewName: string;
  title: string;
  visitorId: string;
  at: number;
}
