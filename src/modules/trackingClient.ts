/**
 * TrackingClient Module
 *
 * Receives tracking tasks from the Tracker, buffers them, and periodically
 * flushes them to the backend via Transport. Owns the completion state of
 * every task it receives.
 *
 * Responsibilities:
 * - Accept tasks without blocking the caller
 * - Buffer tasks for batch sending (bounded)
 * - Flush on batch size, on interval, or on demand
 * - Settle each task as succeeded or failed
 * - Notify the TrackerDelegate of delivery lifecycle
 *
 * @module modules/trackingClient
 */

import { markTaskSending, settleTask, type TrackingTask } from "../core/trackingTask";
import { handleError } from "../errors/errorHandler";
import { SystemError } from "../errors/errorTypes";
import type { TrackerDelegate } from "../types/delegate";
import { DEFAULTS, SDK_VERSION } from "../utils/constants";
import type { Logger } from "../utils/logger";
import { safeTry } from "../utils/safe";
import { transformTaskToWireFormat, type WireEvent } from "./eventTransformer";
import type { SendMode, Transport } from "./transport";

/**
 * TrackingClient configuration
 */
export interface TrackingClientConfig {
  maxFlushIntervalMs: number;
  maxBufferSize: number;
  eventBatchSize: number;
}

/**
 * TrackingClient options
 */
export interface TrackingClientOptions {
  transport: Transport;
  logger?: Logger;
  delegate?: TrackerDelegate | null;
  config?: Partial<TrackingClientConfig>;
}

/**
 * TrackingClient interface
 */
export interface TrackingClient {
  /** Held weakly */
  delegate: TrackerDelegate | undefined;
  track(task: TrackingTask): void;
  flush(force?: boolean, mode?: SendMode): Promise<void>;
  startPeriodicFlush(): void;
  destroy(): void;
}

/**
 * Create a new TrackingClient instance
 *
 * @param options - Configuration options
 * @returns TrackingClient instance
 */
export function createTrackingClient(options: TrackingClientOptions): TrackingClient {
  // ──────────────────────────────────────────────────────────────────────
  // EXTRACT OPTIONS
  // ──────────────────────────────────────────────────────────────────────
  const { transport, logger, config = {} } = options;

  const batchSize = config.eventBatchSize ?? DEFAULTS.EVENT_BATCH_SIZE;
  const maxFlushIntervalMs = config.maxFlushIntervalMs ?? DEFAULTS.MAX_FLUSH_INTERVAL_MS;
  const maxBufferSize = config.maxBufferSize ?? DEFAULTS.MAX_BUFFER_SIZE;

  // ──────────────────────────────────────────────────────────────────────
  // PRIVATE STATE (closure scope)
  // ──────────────────────────────────────────────────────────────────────
  let buffer: TrackingTask[] = [];
  let lastFlushTimestamp = Date.now();
  let flushTimer: ReturnType<typeof setInterval> | null = null;
  let isFlushing = false;
  let isDestroyed = false;
  let delegateRef: WeakRef<TrackerDelegate> | null = options.delegate ? new WeakRef(options.delegate) : null;

  function currentDelegate(): TrackerDelegate | undefined {
    return delegateRef?.deref();
  }

  // ──────────────────────────────────────────────────────────────────────
  // INTERNAL: task settlement
  // ──────────────────────────────────────────────────────────────────────
  function succeed(task: TrackingTask): void {
    if (!settleTask(task, { ok: true })) {
      return;
    }
    const delegate = currentDelegate();
    if (delegate?.trackingTaskDidSend) {
      safeTry(() => delegate.trackingTaskDidSend?.(task), logger, "TrackerDelegate.trackingTaskDidSend");
    }
  }

  function fail(task: TrackingTask, error: Error): void {
    if (!settleTask(task, { ok: false, error })) {
      return;
    }
    const delegate = currentDelegate();
    if (delegate?.trackingTaskDidFail) {
      safeTry(() => delegate.trackingTaskDidFail?.(task, error), logger, "TrackerDelegate.trackingTaskDidFail");
    }
  }

  function encode(task: TrackingTask): WireEvent | null {
    const delegate = currentDelegate();
    const intercept = delegate?.intercept?.bind(delegate);
    return (
      safeTry(
        () => transformTaskToWireFormat(task, { sdkVersion: SDK_VERSION, intercept, logger }),
        logger,
        "TrackingClient.encode"
      ) ?? null
    );
  }

  // ──────────────────────────────────────────────────────────────────────
  // PUBLIC API: track()
  // ──────────────────────────────────────────────────────────────────────
  function track(task: TrackingTask): void {
    if (isDestroyed) {
      logger?.logWarn("TrackingClient: destroyed, dropping task", { taskId: task.id });
      fail(task, new SystemError("Tracking client destroyed", "CLIENT_DESTROYED"));
      return;
    }

    buffer.push(task);
    logger?.logDebug("TrackingClient: task queued", {
      taskId: task.id,
      eventName: task.event.name.rawValue,
      bufferLength: buffer.length,
    });

    // Bound the buffer: drop the oldest tasks
    while (buffer.length > maxBufferSize) {
      const dropped = buffer.shift();
      if (dropped) {
        logger?.logWarn("TrackingClient: buffer overflow, dropping oldest task", { taskId: dropped.id });
        fail(dropped, new SystemError("Dropped due to buffer overflow", "TASK_DROPPED"));
      }
    }

    if (buffer.length >= batchSize) {
      flush(true).catch((error: unknown) => handleError(error, "TrackingClient.flush"));
    }
  }

  // ──────────────────────────────────────────────────────────────────────
  // PUBLIC API: flush()
  // ──────────────────────────────────────────────────────────────────────
  async function flush(force = false, mode: SendMode = "normal"): Promise<void> {
    // Allow flush when destroyed only if forced (for final flush on destroy)
    if (isDestroyed && !force) {
      return;
    }

    if (isFlushing) {
      logger?.logDebug("TrackingClient: flush already in progress, skipping");
      return;
    }

    if (buffer.length === 0) {
      return;
    }

    if (!force && Date.now() - lastFlushTimestamp < maxFlushIntervalMs && buffer.length < batchSize) {
      return;
    }

    isFlushing = true;
    const tasks = buffer.slice(0, batchSize);
    buffer = buffer.slice(tasks.length);
    lastFlushTimestamp = Date.now();

    const sending: TrackingTask[] = [];
    const events: WireEvent[] = [];
    for (const task of tasks) {
      const wireEvent = encode(task);
      if (!wireEvent) {
        fail(task, new SystemError("Failed to encode task", "DISPATCH_FAILED"));
        continue;
      }
      markTaskSending(task);
      sending.push(task);
      events.push(wireEvent);
    }

    try {
      await transport.sendBatch(events, mode);
      sending.forEach(succeed);
      logger?.logDebug("TrackingClient: flush successful", { eventCount: events.length });
    } catch (error) {
      handleError(error, "TrackingClient.flush");
      const cause = error instanceof Error ? error : new Error(String(error));
      sending.forEach((task) => fail(task, cause));
    } finally {
      isFlushing = false;
    }

    // destroy() may have run while the batch was in flight
    if (isDestroyed && buffer.length > 0) {
      await flush(true, "beacon");
      return;
    }

    // More tasks may have arrived while the batch was in flight
    if (buffer.length >= batchSize || (force && buffer.length > 0)) {
      await flush(force, mode);
    }
  }

  // ──────────────────────────────────────────────────────────────────────
  // PUBLIC API: startPeriodicFlush()
  // ──────────────────────────────────────────────────────────────────────
  function startPeriodicFlush(): void {
    if (flushTimer !== null || isDestroyed) {
      return;
    }

    logger?.logDebug("TrackingClient: starting periodic flush", { intervalMs: maxFlushIntervalMs });

    flushTimer = setInterval(() => {
      if (buffer.length > 0) {
        flush(false).catch((error: unknown) => handleError(error, "TrackingClient.periodicFlush"));
      }
    }, maxFlushIntervalMs);
  }

  // ──────────────────────────────────────────────────────────────────────
  // PUBLIC API: destroy()
  // ──────────────────────────────────────────────────────────────────────
  function destroy(): void {
    logger?.logDebug("TrackingClient: destroying");
    isDestroyed = true;

    if (flushTimer !== null) {
      clearInterval(flushTimer);
      flushTimer = null;
    }

    if (buffer.length > 0) {
      flush(true, "beacon").catch((error: unknown) => handleError(error, "TrackingClient.finalFlush"));
    }
  }

  return {
    get delegate(): TrackerDelegate | undefined {
      return currentDelegate();
    },
    set delegate(delegate: TrackerDelegate | undefined) {
      delegateRef = delegate ? new WeakRef(delegate) : null;
    },
    track,
    flush,
    startPeriodicFlush,
    destroy,
  };
}
