// loadable-pages - readiness checks for page objects
// Main entry point
//
// Declare load validations on a Page or Section subclass, then act on an
// instance only once it is loaded:
//   ProductPage.loadValidation((page) => [page.hasPrice(), "No price shown"]);
//   new ProductPage(driver).whenLoaded((page) => page.addToCart());

// Roots
export { Loadable, loadValidationRegistry } from "./runtime/loadable";
export { Page, displayedValidation, describeUrlMatcher } from "./page";
export { Section } from "./section";

// Registry
export { LoadValidationRegistry } from "./runtime/registry";
export type { LoadValidationRegistryOptions } from "./runtime/registry";

// Results
export {
  passed,
  failed,
  normalizeValidationResult,
} from "./utils/outcome";

// Configuration
export {
  configure,
  getConfig,
  resetConfig,
  enableDefaultLoadValidations,
  disableDefaultLoadValidations,
  DEFAULT_CONFIG,
} from "./runtime/config";

// Events
export {
  onLoadEvent,
  clearLoadEventHandlers,
  hasLoadEventHandlers,
} from "./runtime/events";
export {
  combineHandlers,
  filterEvents,
  createConsoleHandler,
} from "./runtime/event-handlers";
export type { ConsoleHandlerOptions } from "./runtime/event-handlers";

// Errors
export {
  LoadableError,
  NotLoadedError,
  LoadableErrorCodes,
  DEFAULT_NOT_LOADED_MESSAGE,
  isLoadableError,
  isNotLoadedError,
} from "./utils/errors";
export type { LoadableErrorCode, LoadableErrorContext } from "./utils/errors";

// Schemas
export {
  LoadValidationOutcomeSchema,
  LoadValidationResultSchema,
  LoadableConfigSchema,
} from "./zod/loadable";

// Types
export * from "./types";
