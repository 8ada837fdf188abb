/**
 * Event Handler Utilities
 *
 * Helpers for combining and composing handlers for readiness lifecycle events.
 */

import {
  LoadEventTypes,
  type LoadEvent,
  type LoadEventHandler,
  type LoadEventType,
} from "../types/events";

/**
 * Combine multiple event handlers into a single handler.
 *
 * @example
 * ```typescript
 * onLoadEvent(
 *   combineHandlers(
 *     createConsoleHandler({ failuresOnly: true }),
 *     (event) => timeline.push(event),
 *   ),
 * );
 * ```
 */
export function combineHandlers(
  ...handlers: LoadEventHandler[]
): LoadEventHandler {
  const validHandlers = handlers.filter(
    (h): h is LoadEventHandler => typeof h === "function",
  );

  if (validHandlers.length === 0) {
    return () => {};
  }

  if (validHandlers.length === 1) {
    return validHandlers[0]!;
  }

  return (event: LoadEvent) => {
    for (const handler of validHandlers) {
      try {
        handler(event);
      } catch (error) {
        // One handler failing shouldn't starve the others
        console.error(
          `Load event handler error for ${event.type}:`,
          error instanceof Error ? error.message : error,
        );
      }
    }
  };
}

/**
 * Create a handler that only receives the given event types.
 */
export function filterEvents(
  types: LoadEventType[],
  handler: LoadEventHandler,
): LoadEventHandler {
  const typeSet = new Set<LoadEventType>(types);
  return (event: LoadEvent) => {
    if (typeSet.has(event.type)) {
      handler(event);
    }
  };
}

export interface ConsoleHandlerOptions {
  /**
   * Only log checks that did not pass
   */
  failuresOnly?: boolean;

  /**
   * Line sink, defaults to console.log
   */
  log?: (line: string) => void;
}

/**
 * Create a handler that logs one line per finished readiness check.
 *
 * Output looks like:
 * `[loadable] CheckoutPage not loaded after 2 validation(s) in 4ms: Expected /cart to match /checkout/ but it did not.`
 */
export function createConsoleHandler(
  options: ConsoleHandlerOptions = {},
): LoadEventHandler {
  const { failuresOnly = false, log = (line: string) => console.log(line) } =
    options;

  return (event: LoadEvent) => {
    if (event.type !== LoadEventTypes.LOAD_CHECK_END) return;
    if (failuresOnly && event.passed) return;

    if (event.cached) {
      log(`[loadable] ${event.host} loaded (cached)`);
      return;
    }

    const summary = `${event.validationsRun} validation(s) in ${event.durationMs}ms`;
    if (event.passed) {
      log(`[loadable] ${event.host} loaded after ${summary}`);
    } else {
      const reason = event.loadError ? `: ${event.loadError}` : "";
      log(`[loadable] ${event.host} not loaded after ${summary}${reason}`);
    }
  };
}
