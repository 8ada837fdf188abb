// Type exports

export type {
  LoadValidationOutcome,
  LoadValidationTuple,
  LoadValidationResult,
  LoadValidation,
  LoadableClass,
  LoadValidationOptions,
  RegisteredValidation,
  NormalizedOutcome,
  LoadableConfig,
} from "./loadable";

export { LoadEventTypes } from "./events";
export type {
  LoadEventType,
  LoadCheckStartEvent,
  ValidationEndEvent,
  LoadCheckEndEvent,
  LoadEvent,
  LoadEventHandler,
} from "./events";
