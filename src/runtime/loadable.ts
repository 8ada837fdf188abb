// Readiness evaluation for loadable objects

import type {
  LoadableClass,
  LoadValidation,
  LoadValidationOptions,
} from "../types/loadable";
import { LoadEventTypes } from "../types/events";
import {
  LoadableError,
  LoadableErrorCodes,
  NotLoadedError,
} from "../utils/errors";
import { normalizeValidationResult } from "../utils/outcome";
import { getConfig } from "./config";
import { emitLoadEvent, hasLoadEventHandlers } from "./events";
import { LoadValidationRegistry } from "./registry";

/**
 * Base class for objects that must be ready before they are acted on.
 *
 * Subclasses declare load validations with `loadValidation()`. They run in
 * order (inherited first) when `isLoaded()` is called and stop at the first
 * failure, whose message becomes `loadError`.
 *
 * @example
 * ```typescript
 * class SearchPage extends Page {
 *   // ...
 * }
 * SearchPage.loadValidation((page) => [
 *   page.resultCount() > 0,
 *   "Search returned no results",
 * ]);
 *
 * new SearchPage(driver).whenLoaded((page) => page.openFirstResult());
 * ```
 */
export abstract class Loadable {
  /**
   * Cached readiness. Only set while inside `whenLoaded()`, so nested
   * checks skip re-running validations.
   */
  loaded: boolean | undefined = undefined;

  /**
   * Diagnostic from the most recent failing check
   */
  loadError: string | undefined = undefined;

  /**
   * Append a load validation to this class.
   * Subclasses inherit it and run it before their own.
   */
  static loadValidation<T extends Loadable>(
    this: LoadableClass<T>,
    rule: LoadValidation<T>,
    options?: LoadValidationOptions,
  ): void {
    loadValidationRegistry.register(this, rule, options);
  }

  /**
   * Names of the validations that run for this class, in order
   */
  static loadValidations(this: LoadableClass<Loadable>): string[] {
    return loadValidationRegistry.effectiveRules(this).map((v) => v.name);
  }

  /**
   * Check if the object is loaded.
   *
   * On failure the message of the failing validation, if any, is available
   * via `loadError`. Does not update `loaded`.
   */
  isLoaded(): boolean {
    this.loadError = undefined;

    const host = this.constructor.name;
    const observed = hasLoadEventHandlers();
    const startTime = Date.now();

    if (observed) {
      emitLoadEvent({
        type: LoadEventTypes.LOAD_CHECK_START,
        host,
        cached: this.loaded === true,
        timestamp: startTime,
      });
    }

    if (this.loaded === true) {
      if (observed) {
        emitLoadEvent({
          type: LoadEventTypes.LOAD_CHECK_END,
          host,
          passed: true,
          cached: true,
          validationsRun: 0,
          durationMs: Date.now() - startTime,
          timestamp: Date.now(),
        });
      }
      return true;
    }

    let allPassed = true;
    let validationsRun = 0;

    const validations = loadValidationRegistry.effectiveRules(this.constructor);

    for (const validation of validations) {
      const validationStart = Date.now();
      const outcome = normalizeValidationResult(validation.check(this), {
        host,
        validation: validation.name,
      });

      if (observed) {
        emitLoadEvent({
          type: LoadEventTypes.VALIDATION_END,
          host,
          index: validationsRun,
          name: validation.name,
          passed: outcome.passed,
          message: outcome.passed ? undefined : outcome.message,
          durationMs: Date.now() - validationStart,
          timestamp: Date.now(),
        });
      }
      validationsRun++;

      if (!outcome.passed) {
        if (outcome.message !== undefined) {
          this.loadError = outcome.message;
        }
        allPassed = false;
        break;
      }
    }

    if (observed) {
      emitLoadEvent({
        type: LoadEventTypes.LOAD_CHECK_END,
        host,
        passed: allPassed,
        cached: false,
        loadError: this.loadError,
        validationsRun,
        durationMs: Date.now() - startTime,
        timestamp: Date.now(),
      });
    }

    return allPassed;
  }

  /**
   * Run `action` once the object is loaded and return its result.
   *
   * Readiness is cached in `loaded` for the duration of the call and the
   * previous value is restored on every exit path, so calls can nest.
   *
   * @throws LoadableError (INVALID_ARGUMENT) if no action is given
   * @throws NotLoadedError if a load validation fails; `action` does not run
   */
  whenLoaded<R>(action: (loadable: this) => R): R {
    // Nested calls must hand back the outer call's value
    const previouslyLoaded = this.loaded;

    try {
      if (typeof action !== "function") {
        throw new LoadableError("A callback was expected, but none received", {
          code: LoadableErrorCodes.INVALID_ARGUMENT,
          host: this.constructor.name,
        });
      }

      this.loaded = this.isLoaded();

      if (!this.loaded) {
        throw new NotLoadedError(this.loadError, {
          host: this.constructor.name,
        });
      }

      return action(this);
    } finally {
      this.loaded = previouslyLoaded;
    }
  }
}

/**
 * Registry shared by every Loadable subclass
 */
export const loadValidationRegistry = new LoadValidationRegistry<Loadable>(
  Loadable,
  {
    defaultsEnabled: () => getConfig().defaultLoadValidations,
    warnOnLateRegistration: () => getConfig().warnOnLateRegistration,
  },
);
