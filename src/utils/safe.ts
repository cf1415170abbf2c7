/**
 * Safe Wrappers
 *
 * Wrap calls into host or collaborator code so a failure there never
 * propagates back into the caller of a tracking operation.
 *
 * @module utils/safe
 */

import type { Logger } from "./logger";

/**
 * Safely execute a synchronous function, catching and logging errors
 *
 * @param fn - Function to execute
 * @param logger - Logger instance
 * @param context - Context for error logging
 * @returns The function's result, or undefined if it threw
 */
export function safeTry<T>(
  fn: () => T,
  logger?: Logger,
  context?: string
): T | undefined {
  try {
    return fn();
  } catch (error: unknown) {
    if (logger && context) {
      logger.logError(`Error in ${context}:`, error);
    }
    return undefined;
  }
}

/**
 * Safely execute an async function
 *
 * @param fn - Async function to execute
 * @param logger - Logger instance
 * @param context - Context for error logging
 * @returns Promise that resolves to result or undefined
 */
export async function safeTryAsync<T>(
  fn: () => Promise<T>,
  logger?: Logger,
  context?: string
): Promise<T | undefined> {
  try {
    return await fn();
  } catch (error: unknown) {
    if (logger && context) {
      logger.logError(`Error in ${context}:`, error);
    }
    return undefined;
  }
}
