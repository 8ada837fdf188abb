// Error types for readiness checks

/**
 * Error codes for loadable errors
 */
export const LoadableErrorCodes = {
  INVALID_ARGUMENT: "INVALID_ARGUMENT",
  NOT_LOADED: "NOT_LOADED",
  INVALID_VALIDATION_RESULT: "INVALID_VALIDATION_RESULT",
} as const;

export type LoadableErrorCode =
  (typeof LoadableErrorCodes)[keyof typeof LoadableErrorCodes];

/**
 * Message used when a failing validation supplied no diagnostic
 */
export const DEFAULT_NOT_LOADED_MESSAGE = "Load validations did not pass";

/**
 * Context information for loadable errors
 */
export interface LoadableErrorContext {
  /**
   * Error code for programmatic handling
   */
  code: LoadableErrorCode;

  /**
   * Class name of the host involved
   */
  host?: string;

  /**
   * Name of the load validation involved
   */
  validation?: string;

  /**
   * Diagnostic reported by the failing validation
   */
  loadError?: string;

  /**
   * Additional context data
   */
  metadata?: Record<string, unknown>;
}

/**
 * Base error for registry and evaluator failures
 */
export class LoadableError extends Error {
  /**
   * Error code for programmatic handling
   */
  readonly code: LoadableErrorCode;

  readonly context: LoadableErrorContext;

  /**
   * Timestamp when error occurred
   */
  readonly timestamp: number;

  constructor(message: string, context: LoadableErrorContext) {
    super(message);
    this.name = "LoadableError";
    this.code = context.code;
    this.context = context;
    this.timestamp = Date.now();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, LoadableError.prototype);
  }

  /**
   * Create a descriptive string with context
   */
  toDetailedString(): string {
    const parts = [this.message];

    if (this.context.host !== undefined) {
      parts.push(`Host: ${this.context.host}`);
    }
    if (this.context.validation !== undefined) {
      parts.push(`Validation: ${this.context.validation}`);
    }

    return parts.join(" | ");
  }

  /**
   * Serialize error for logging/transport
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      host: this.context.host,
      validation: this.context.validation,
      loadError: this.context.loadError,
      metadata: this.context.metadata,
    };
  }
}

/**
 * Raised by `whenLoaded()` when the host is not ready.
 * Carries the diagnostic of the first failing validation, if it gave one.
 */
export class NotLoadedError extends LoadableError {
  readonly loadError: string | undefined;

  constructor(
    loadError: string | undefined,
    context: Omit<LoadableErrorContext, "code" | "loadError"> = {},
  ) {
    super(loadError ?? DEFAULT_NOT_LOADED_MESSAGE, {
      ...context,
      code: LoadableErrorCodes.NOT_LOADED,
      loadError,
    });
    this.name = "NotLoadedError";
    this.loadError = loadError;

    Object.setPrototypeOf(this, NotLoadedError.prototype);
  }
}

/**
 * Type guard for LoadableError
 */
export function isLoadableError(error: unknown): error is LoadableError {
  return error instanceof LoadableError;
}

/**
 * Type guard for NotLoadedError
 */
export function isNotLoadedError(error: unknown): error is NotLoadedError {
  return error instanceof NotLoadedError;
}
