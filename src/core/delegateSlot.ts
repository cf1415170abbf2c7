/**
 * Delegate Slot
 *
 * Process-wide, weakly held TrackerDelegate. Written only through
 * `Tracker.setDelegate`; read by `init` when it creates the tracking client,
 * so a delegate set before `init` still reaches the client.
 *
 * @module core/delegateSlot
 */

import type { TrackerDelegate } from "../types/delegate";

let slot: WeakRef<TrackerDelegate> | null = null;

export function writeDelegateSlot(delegate: TrackerDelegate | null | undefined): void {
  slot = delegate ? new WeakRef(delegate) : null;
}

export function readDelegateSlot(): TrackerDelegate | undefined {
  return slot?.deref();
}
