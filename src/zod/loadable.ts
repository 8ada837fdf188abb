// Zod schemas for load validation results and configuration

import { z } from "zod";
import type {
  LoadableConfig,
  LoadValidationOutcome,
  NormalizedOutcome,
} from "../types/loadable";

/**
 * Tagged outcome schema
 */
export const LoadValidationOutcomeSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("passed") }),
  z.object({ status: z.literal("failed"), message: z.string().optional() }),
]) satisfies z.ZodType<LoadValidationOutcome>;

/**
 * Accepts every supported result shape and normalizes it
 * to `{ passed, message }`. Passing results never carry a message.
 */
export const LoadValidationResultSchema = z.union([
  z.boolean().transform(
    (passed): NormalizedOutcome => ({ passed, message: undefined }),
  ),
  z
    .tuple([z.boolean()])
    .transform(([passed]): NormalizedOutcome => ({ passed, message: undefined })),
  z
    .tuple([z.boolean(), z.string().nullish()])
    .transform(
      ([passed, message]): NormalizedOutcome => ({
        passed,
        message: passed ? undefined : (message ?? undefined),
      }),
    ),
  LoadValidationOutcomeSchema.transform(
    (outcome): NormalizedOutcome =>
      outcome.status === "passed"
        ? { passed: true, message: undefined }
        : { passed: false, message: outcome.message },
  ),
]);

/**
 * Configuration schema
 */
export const LoadableConfigSchema = z.object({
  defaultLoadValidations: z.boolean(),
  warnOnLateRegistration: z.boolean(),
}) satisfies z.ZodType<LoadableConfig>;
