/**
 * EntryPoint Module
 *
 * The host-application layer of the Tether SDK. Owns the process-wide state
 * the Tracker reads: the visitor ID, the active tracking client, the overlay
 * controller and the scene history.
 *
 * Responsibilities:
 * - Validate configuration and create the Transport and TrackingClient
 * - Hand the delegate slot's current value to a newly created client
 * - Manage the visitor ID
 * - Manage SDK lifecycle (init, destroy)
 *
 * Every function here fails open: configuration problems are logged and
 * leave the SDK un-initialised, tracking calls then become local no-ops.
 *
 * @module core/entryPoint
 */

import { createLogger, type Logger } from "../utils/logger";
import { safeTry, safeTryAsync } from "../utils/safe";
import { DEFAULTS } from "../utils/constants";
import { getOrCreateVisitorId, persistNewVisitorId } from "../utils/visitorId";
import { createTransport } from "../modules/transport";
import { createTrackingClient, type TrackingClient } from "../modules/trackingClient";
import { createSceneHistory, type SceneHistory } from "../modules/sceneHistory";
import { handleError, setErrorLogger } from "../errors/errorHandler";
import { ValidationError } from "../errors/errorTypes";
import { validateAppKey, validateHttpsUrl } from "../security/inputValidation";
import { readDelegateSlot } from "./delegateSlot";
import type { TrackingTask } from "./trackingTask";
import type { InitOptions } from "../types/config";
import type { OverlayController } from "../types/overlay";

// Global singleton state (closure scope, not exposed)
let isInitialized = false;
let logger: Logger = createLogger();
let visitorId: string | null = null;
let trackingClient: TrackingClient | null = null;
let overlayController: OverlayController | null = null;
const sceneHistory: SceneHistory = createSceneHistory();

function resolveIngestEndpoint(options: InitOptions): string {
  if (options.ingestEndpoint) {
    return options.ingestEndpoint;
  }
  const apiBase = options.apiBase ?? DEFAULTS.API_BASE;
  return `${apiBase.replace(/\/+$/, "")}/ingest`;
}

/**
 * Initialize the Tether SDK
 *
 * @param appKey - Application key
 * @param options - Configuration options
 */
export function init(appKey: string, options: InitOptions = {}): void {
  // GUARD: Prevent double-initialization
  if (isInitialized) {
    logger.logDebug("Tether.init() called again; ignoring.");
    return;
  }

  // INITIALIZE: Logger (must be first for error handling)
  logger = createLogger({ debug: options.debug === true });
  setErrorLogger(logger);

  // VALIDATION: appKey is required
  const keyValidation = validateAppKey(appKey);
  if (!keyValidation.valid) {
    handleError(
      new ValidationError(keyValidation.error ?? "invalid appKey", "INVALID_APP_KEY", keyValidation.field),
      "Tether.init"
    );
    return;
  }

  // VALIDATION: backend must be reached over HTTPS (localhost exception)
  const ingestEndpoint = resolveIngestEndpoint(options);
  const urlValidation = validateHttpsUrl(ingestEndpoint);
  if (!urlValidation.valid) {
    handleError(
      new ValidationError(`Ingest endpoint ${urlValidation.error ?? "is invalid"}`, "INVALID_ENDPOINT", "ingestEndpoint"),
      "Tether.init"
    );
    return;
  }
  logger.logDebug("Resolved ingest endpoint", { ingestEndpoint });

  const loggerRef = logger;
  const client = safeTry(
    () => {
      const transport = createTransport({
        endpointUrl: ingestEndpoint,
        appKey,
        fetchFn: options.fetchFn,
        beaconFn: options.beaconFn,
        maxRetries: options.maxRetries,
        retryDelayMs: options.retryDelayMs,
        timeoutMs: options.timeoutMs,
        logger: loggerRef,
      });
      return createTrackingClient({
        transport,
        logger: loggerRef,
        // A delegate set before init reaches the client here
        delegate: readDelegateSlot(),
        config: {
          maxFlushIntervalMs: options.flushIntervalMs,
          eventBatchSize: options.batchSize,
          maxBufferSize: options.maxBufferSize,
        },
      });
    },
    loggerRef,
    "TrackingClient creation"
  );

  if (!client) {
    return;
  }

  client.startPeriodicFlush();
  trackingClient = client;
  isInitialized = true;
  loggerRef.logDebug("Tether SDK initialization complete", { visitorId: getVisitorId() });
}

/**
 * Whether `init` completed successfully
 */
export function isSdkInitialized(): boolean {
  return isInitialized;
}

/**
 * Current visitor ID. Available before `init`.
 */
export function getVisitorId(): string {
  if (visitorId === null) {
    visitorId = getOrCreateVisitorId();
  }
  return visitorId;
}

/**
 * Replace the visitor ID
 *
 * Trackers and tasks created earlier keep the ID they were created with.
 *
 * @returns The new visitor ID
 */
export function renewVisitorId(): string {
  const previous = visitorId;
  visitorId = persistNewVisitorId();
  logger.logDebug("Visitor ID renewed", { previous, current: visitorId });
  return visitorId;
}

/**
 * Active tracking client, or null before `init` / after `destroy`
 */
export function getTrackingClient(): TrackingClient | null {
  return trackingClient;
}

export function setOverlayController(controller: OverlayController | null): void {
  overlayController = controller;
}

export function getOverlayController(): OverlayController | null {
  return overlayController;
}

export function getSceneHistory(): SceneHistory {
  return sceneHistory;
}

export function getLogger(): Logger {
  return logger;
}

/**
 * Whether the task was tracked for the view that is still current in its scene
 *
 * Overlay renderers use this to drop responses for a screen the user left.
 */
export function isTaskForCurrentView(task: TrackingTask): boolean {
  return sceneHistory.isCurrent(task);
}

/**
 * Send every buffered task now
 */
export async function flush(): Promise<void> {
  const client = trackingClient;
  if (!client) {
    return;
  }
  await safeTryAsync(() => client.flush(true), logger, "Tether.flush");
}

/**
 * Destroy the SDK instance and clean up resources
 *
 * The visitor ID and the delegate slot survive; a later `init` reuses them.
 */
export function destroy(): void {
  safeTry(
    () => {
      logger.logDebug("Tether.destroy() called");
      trackingClient?.destroy();
    },
    logger,
    "Tether.destroy"
  );
  trackingClient = null;
  overlayController = null;
  sceneHistory.reset();
  isInitialized = false;
}
