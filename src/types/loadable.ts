// Load validation types

/**
 * Tagged outcome of a load validation.
 * Build these with `passed()` and `failed(message)`.
 */
export type LoadValidationOutcome =
  | { status: "passed" }
  | {
      status: "failed";
      /**
       * Diagnostic surfaced as `loadError` and as the NotLoadedError message
       */
      message?: string;
    };

/**
 * Tuple form: `[passed]` or `[passed, messageIfFailed]`
 */
export type LoadValidationTuple =
  | readonly [passed: boolean]
  | readonly [passed: boolean, message: string | null | undefined];

/**
 * Anything a load validation may return.
 * The message of a passing validation is discarded.
 */
export type LoadValidationResult =
  | boolean
  | LoadValidationTuple
  | LoadValidationOutcome;

/**
 * A readiness check bound to a host at evaluation time.
 * The host is passed both as `this` and as the first argument.
 */
export type LoadValidation<T> = (this: T, host: T) => LoadValidationResult;

/**
 * Constructor of a loadable type, abstract or not.
 */
export type LoadableClass<T extends object = object> = abstract new (
  ...args: never[]
) => T;

/**
 * Options accepted when registering a load validation
 */
export interface LoadValidationOptions {
  /**
   * Display name used in events and errors.
   * Defaults to the function name.
   */
  name?: string;

  /**
   * Suppress development warnings for this registration
   */
  silent?: boolean;
}

/**
 * A load validation as stored by the registry
 */
export interface RegisteredValidation<TBase> {
  name: string;

  /**
   * Name of the type that registered the validation
   */
  owner: string;

  check: (host: TBase) => LoadValidationResult;
}

/**
 * Normalized validation result
 */
export interface NormalizedOutcome {
  passed: boolean;
  message: string | undefined;
}

/**
 * Global configuration
 */
export interface LoadableConfig {
  /**
   * Seed root types (such as Page) with their default load validation.
   * Read when a root type's validations are first materialized.
   */
  defaultLoadValidations: boolean;

  /**
   * Warn when a validation is registered on a type whose
   * validations were already read
   */
  warnOnLateRegistration: boolean;
}
