/**
 * Hooks Module
 *
 * React hooks for simplified SDK integration.
 *
 * @module hooks
 */

export { useViewTracking } from "./useViewTracking";
export type { UseViewTrackingOptions } from "./useViewTracking";
