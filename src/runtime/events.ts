// Global listeners for readiness lifecycle events

import type { LoadEvent, LoadEventHandler } from "../types/events";

const handlers = new Set<LoadEventHandler>();

/**
 * Subscribe to lifecycle events of every readiness check.
 *
 * @returns Unsubscribe function
 *
 * @example
 * ```typescript
 * const off = onLoadEvent((event) => {
 *   if (event.type === LoadEventTypes.LOAD_CHECK_END && !event.passed) {
 *     console.log(`${event.host} not loaded: ${event.loadError}`);
 *   }
 * });
 * ```
 */
export function onLoadEvent(handler: LoadEventHandler): () => void {
  handlers.add(handler);
  return () => {
    handlers.delete(handler);
  };
}

/**
 * Whether anyone is listening. Lets the evaluator skip building events.
 */
export function hasLoadEventHandlers(): boolean {
  return handlers.size > 0;
}

/**
 * Remove every handler. Primarily useful for testing.
 */
export function clearLoadEventHandlers(): void {
  handlers.clear();
}

/**
 * Dispatch an event to every handler.
 * A throwing handler is logged and does not affect the check.
 */
export function emitLoadEvent(event: LoadEvent): void {
  for (const handler of handlers) {
    try {
      handler(event);
    } catch (error) {
      console.error(
        `Load event handler error for ${event.type}:`,
        error instanceof Error ? error.message : error,
      );
    }
  }
}
