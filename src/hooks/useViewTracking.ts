/**
 * useViewTracking Hook
 *
 * React hook that sends a view event when a screen component mounts and
 * whenever its view name or title changes.
 *
 * @module hooks/useViewTracking
 */

import { useEffect, useRef } from "react";
import { Tracker } from "../core/tracker";
import type { EventValues } from "../types/events";
import type { SceneView } from "../types/scene";

export interface UseViewTrackingOptions {
  /** Defaults to the view name */
  title?: string;
  /** Custom values; a new object identity alone does not re-send the event */
  values?: EventValues;
  /** UI object of the scene the screen is rendered in */
  view?: SceneView | null;
}

/**
 * @example
 * ```tsx
 * function ProductDetail({ sku }: Props) {
 *   useViewTracking("product_detail", { title: "Product", values: { sku } });
 *   return <Layout>...</Layout>;
 * }
 * ```
 */
export function useViewTracking(viewName: string, options: UseViewTrackingOptions = {}): void {
  const { title, view } = options;

  // Latest values without making them an effect dependency
  const valuesRef = useRef<EventValues | undefined>(options.values);
  valuesRef.current = options.values;

  useEffect(() => {
    new Tracker({ view }).view(viewName, title, valuesRef.current ?? {});
  }, [viewName, title, view]);
}
