/**
 * Visitor ID Utility
 *
 * Creates and persists the visitor identifier used to stamp tracking tasks.
 * Falls back to an in-memory identifier when localStorage is unavailable
 * (SSR, privacy mode, quota exceeded).
 *
 * @module utils/visitorId
 */

import { STORAGE_KEYS } from "./constants";
import { generateUUID } from "./uuid";

function getStorage(): Storage | null {
  try {
    if (typeof localStorage !== "undefined") {
      return localStorage;
    }
  } catch {
    // Accessing localStorage can throw when storage is disabled
  }
  return null;
}

/**
 * Read the persisted visitor ID, or create and persist a new one
 */
export function getOrCreateVisitorId(): string {
  const storage = getStorage();
  if (storage) {
    try {
      const stored = storage.getItem(STORAGE_KEYS.VISITOR_ID);
      if (stored) {
        return stored;
      }
    } catch {
      // Fall through to a fresh identifier
    }
  }
  return persistNewVisitorId();
}

/**
 * Create a new visitor ID and persist it, replacing any stored one
 */
export function persistNewVisitorId(): string {
  const visitorId = generateUUID();
  const storage = getStorage();
  if (storage) {
    try {
      storage.setItem(STORAGE_KEYS.VISITOR_ID, visitorId);
    } catch {
      // Memory-only visitor ID for this process
    }
  }
  return visitorId;
}
