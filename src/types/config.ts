/**
 * Config Types
 *
 * @module types/config
 */

/**
 * Options accepted by `Tether.init`
 */
export interface InitOptions {
  /** Enable debug logging */
  debug?: boolean;
  /** Base URL of the backend; the ingest endpoint is `${apiBase}/ingest` */
  apiBase?: string;
  /** Explicit ingest endpoint (takes precedence over apiBase) */
  ingestEndpoint?: string;

  // Delivery
  flushIntervalMs?: number;
  batchSize?: number;
  maxBufferSize?: number;

  // Transport
  maxRetries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
  beaconFn?: (url: string, data: Blob) => boolean;
}
