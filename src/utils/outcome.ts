// Helpers for building and normalizing load validation results

import type {
  LoadValidationOutcome,
  NormalizedOutcome,
} from "../types/loadable";
import { LoadValidationResultSchema } from "../zod/loadable";
import { LoadableError, LoadableErrorCodes } from "./errors";

/**
 * Outcome of a validation that passed
 */
export function passed(): LoadValidationOutcome {
  return { status: "passed" };
}

/**
 * Outcome of a validation that failed, with an optional diagnostic
 */
export function failed(message?: string): LoadValidationOutcome {
  return message === undefined
    ? { status: "failed" }
    : { status: "failed", message };
}

/**
 * Normalize a validation result to `{ passed, message }`.
 *
 * @throws LoadableError (INVALID_VALIDATION_RESULT) for unsupported shapes
 */
export function normalizeValidationResult(
  result: unknown,
  context: { host?: string; validation?: string } = {},
): NormalizedOutcome {
  const parsed = LoadValidationResultSchema.safeParse(result);

  if (!parsed.success) {
    const subject = context.validation
      ? `Load validation "${context.validation}"`
      : "Load validation";
    throw new LoadableError(
      `${subject} returned an unsupported result: ${describeValue(result)}. ` +
        "Return a boolean, [passed, message] or passed()/failed(message).",
      {
        code: LoadableErrorCodes.INVALID_VALIDATION_RESULT,
        host: context.host,
        validation: context.validation,
      },
    );
  }

  return parsed.data;
}

function describeValue(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value === "function") return "function";
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}
