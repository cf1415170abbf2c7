/**
 * Scene ID Utility
 *
 * Assigns stable string identifiers to scene objects without holding them.
 *
 * @module utils/sceneId
 */

import type { SceneView } from "../types/scene";

const sceneIds = new WeakMap<SceneView, string>();
let nextSceneNumber = 1;

/**
 * Resolve the identifier of a scene object (null = default scene)
 */
export function resolveSceneId(scene: SceneView | null | undefined): string | null {
  if (!scene) {
    return null;
  }
  let id = sceneIds.get(scene);
  if (!id) {
    id = `scene_${nextSceneNumber++}`;
    sceneIds.set(scene, id);
  }
  return id;
}
