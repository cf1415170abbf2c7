/**
 * Transport Module
 *
 * Handles HTTP transport of event batches.
 *
 * Responsibilities:
 * - Send event batches to the ingest endpoint (with retries)
 * - Use sendBeacon for page unload scenarios
 * - Handle timeouts and network errors
 * - Classify errors as retryable vs non-retryable
 *
 * Note: This module does NOT build events or decide what gets sent.
 * It is a plain HTTP transport layer.
 *
 * @module modules/transport
 */

import { HttpError, NetworkError } from "../errors/errorTypes";
import { isRetryableError } from "../errors/errorHandler";
import type { Logger } from "../utils/logger";
import { DEFAULTS, SDK_VERSION } from "../utils/constants";
import type { WireEvent } from "./eventTransformer";

export type SendMode = "normal" | "beacon";

/**
 * Transport options
 */
export interface TransportOptions {
  endpointUrl: string;
  appKey: string;
  fetchFn?: typeof fetch;
  beaconFn?: (url: string, data: Blob) => boolean;
  maxRetries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Transport interface
 */
export interface Transport {
  sendBatch(events: WireEvent[], mode?: SendMode): Promise<void>;
}

/**
 * Create a new Transport instance
 *
 * @param options - Configuration options
 * @returns Transport instance
 */
export function createTransport(options: TransportOptions): Transport {
  // ──────────────────────────────────────────────────────────────────────
  // EXTRACT OPTIONS
  // ──────────────────────────────────────────────────────────────────────
  const {
    endpointUrl,
    appKey,
    fetchFn = globalFetch,
    beaconFn = globalSendBeacon,
    maxRetries = DEFAULTS.MAX_RETRIES,
    retryDelayMs = DEFAULTS.RETRY_DELAY_MS,
    timeoutMs = DEFAULTS.TRANSPORT_TIMEOUT_MS,
    logger,
  } = options;

  // ──────────────────────────────────────────────────────────────────────
  // VALIDATE CONFIGURATION
  // ──────────────────────────────────────────────────────────────────────
  if (!endpointUrl) {
    throw new Error("Transport: endpointUrl is required");
  }

  if (!appKey) {
    throw new Error("Transport: appKey is required");
  }

  // ──────────────────────────────────────────────────────────────────────
  // UTILITIES
  // ──────────────────────────────────────────────────────────────────────
  function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  function generateBatchId(): string {
    return `batch_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }

  function buildBody(events: WireEvent[], batchId: string): string {
    return JSON.stringify({
      batch_id: batchId,
      events,
      timestamp: Date.now(),
    });
  }

  // ──────────────────────────────────────────────────────────────────────
  // INTERNAL: performFetchRequest()
  // ──────────────────────────────────────────────────────────────────────
  async function performFetchRequest(events: WireEvent[], batchId: string): Promise<void> {
    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), timeoutMs);

    try {
      const response = await fetchFn(endpointUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-Tether-App-Key": appKey,
          "X-Tether-SDK-Version": SDK_VERSION,
        },
        body: buildBody(events, batchId),
        signal: abortController.signal,
      });

      if (!response.ok) {
        throw new HttpError(response.status, `HTTP ${response.status}: ${response.statusText}`);
      }

      logger?.logDebug("Transport: batch accepted", { batchId, status: response.status });
    } catch (error) {
      if (error instanceof HttpError || error instanceof NetworkError) {
        throw error;
      }
      if (error instanceof Error && error.name === "AbortError") {
        throw new NetworkError(`Request timeout after ${timeoutMs}ms`, "TIMEOUT");
      }
      // Network error (DNS, offline, etc.)
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(message);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  // ──────────────────────────────────────────────────────────────────────
  // INTERNAL: sendWithFetch()
  // ──────────────────────────────────────────────────────────────────────
  async function sendWithFetch(events: WireEvent[], batchId: string): Promise<void> {
    let attempt = 0;
    let lastError: Error | null = null;

    while (attempt <= maxRetries) {
      attempt++;

      try {
        logger?.logDebug(`Transport: fetch attempt ${attempt}/${maxRetries + 1}`, { batchId });
        await performFetchRequest(events, batchId);
        return;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        logger?.logWarn(`Transport: fetch attempt ${attempt} failed`, {
          batchId,
          message: lastError.message,
        });

        if (!isRetryableError(lastError)) {
          throw lastError;
        }

        if (attempt <= maxRetries) {
          // Exponential backoff, capped
          const delayMs = Math.min(retryDelayMs * Math.pow(2, attempt - 1), DEFAULTS.MAX_RETRY_DELAY_MS);
          logger?.logDebug(`Transport: retrying in ${delayMs}ms`, { batchId });
          await sleep(delayMs);
        }
      }
    }

    throw lastError ?? new NetworkError(`Failed after ${maxRetries + 1} attempts`);
  }

  // ──────────────────────────────────────────────────────────────────────
  // INTERNAL: sendWithBeacon()
  // ──────────────────────────────────────────────────────────────────────
  async function sendWithBeacon(events: WireEvent[], batchId: string): Promise<void> {
    const blob = new Blob([buildBody(events, batchId)], { type: "application/json" });

    // sendBeacon cannot carry headers, so the key travels in the query string
    const url = new URL(endpointUrl);
    url.searchParams.set("app_key", appKey);

    const queued = beaconFn(url.toString(), blob);
    if (!queued) {
      logger?.logWarn("Transport: sendBeacon unavailable or rejected, falling back to fetch", { batchId });
      await performFetchRequest(events, batchId);
      return;
    }

    logger?.logDebug("Transport: sendBeacon queued", { batchId });
  }

  // ──────────────────────────────────────────────────────────────────────
  // PUBLIC API: sendBatch()
  // ──────────────────────────────────────────────────────────────────────
  async function sendBatch(events: WireEvent[], mode: SendMode = "normal"): Promise<void> {
    if (events.length === 0) {
      logger?.logDebug("Transport: empty batch, skipping send");
      return;
    }

    const batchId = generateBatchId();
    logger?.logDebug("Transport: sending batch", { batchId, eventCount: events.length, mode });

    if (mode === "beacon") {
      await sendWithBeacon(events, batchId);
    } else {
      await sendWithFetch(events, batchId);
    }
  }

  return {
    sendBatch,
  };
}

function globalFetch(...args: Parameters<typeof fetch>): Promise<Response> {
  if (typeof fetch === "undefined") {
    return Promise.reject(new NetworkError("fetch is not available in this environment"));
  }
  return fetch(...args);
}

function globalSendBeacon(url: string, data: Blob): boolean {
  if (typeof navigator !== "undefined" && typeof navigator.sendBeacon === "function") {
    return navigator.sendBeacon(url, data);
  }
  return false;
}
