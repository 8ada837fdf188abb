// Lifecycle event types emitted while checking readiness

export const LoadEventTypes = {
  LOAD_CHECK_START: "LOAD_CHECK_START",
  VALIDATION_END: "VALIDATION_END",
  LOAD_CHECK_END: "LOAD_CHECK_END",
} as const;

export type LoadEventType =
  (typeof LoadEventTypes)[keyof typeof LoadEventTypes];

interface LoadEventBase {
  type: LoadEventType;

  /**
   * Class name of the instance being checked
   */
  host: string;

  timestamp: number;
}

export interface LoadCheckStartEvent extends LoadEventBase {
  type: typeof LoadEventTypes.LOAD_CHECK_START;

  /**
   * True when a cached `loaded` flag answers the check
   */
  cached: boolean;
}

export interface ValidationEndEvent extends LoadEventBase {
  type: typeof LoadEventTypes.VALIDATION_END;
  index: number;
  name: string;
  passed: boolean;
  message?: string;
  durationMs: number;
}

export interface LoadCheckEndEvent extends LoadEventBase {
  type: typeof LoadEventTypes.LOAD_CHECK_END;
  passed: boolean;
  cached: boolean;
  loadError?: string;

  /**
   * Validations executed before the check finished (short-circuit aware)
   */
  validationsRun: number;

  durationMs: number;
}

export type LoadEvent =
  | LoadCheckStartEvent
  | ValidationEndEvent
  | LoadCheckEndEvent;

export type LoadEventHandler = (event: LoadEvent) => void;
