// Global configuration for readiness checks

import type { LoadableConfig } from "../types/loadable";
import { LoadableConfigSchema } from "../zod/loadable";
import { LoadableError, LoadableErrorCodes } from "../utils/errors";

export const DEFAULT_CONFIG: Readonly<LoadableConfig> = {
  defaultLoadValidations: true,
  warnOnLateRegistration: true,
};

let _config: LoadableConfig = { ...DEFAULT_CONFIG };

/**
 * Update the global configuration.
 * Unknown keys and non-boolean values are rejected.
 *
 * @example
 * ```typescript
 * import { configure } from "loadable-pages";
 * configure({ defaultLoadValidations: false });
 * ```
 */
export function configure(options: Partial<LoadableConfig>): LoadableConfig {
  const parsed = LoadableConfigSchema.partial().strict().safeParse(options);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new LoadableError(`Invalid configuration - ${issues}`, {
      code: LoadableErrorCodes.INVALID_ARGUMENT,
    });
  }

  _config = {
    defaultLoadValidations:
      parsed.data.defaultLoadValidations ?? _config.defaultLoadValidations,
    warnOnLateRegistration:
      parsed.data.warnOnLateRegistration ?? _config.warnOnLateRegistration,
  };

  return getConfig();
}

/**
 * Current configuration (a copy)
 */
export function getConfig(): LoadableConfig {
  return { ..._config };
}

/**
 * Restore the defaults. Primarily useful for testing.
 */
export function resetConfig(): void {
  _config = { ...DEFAULT_CONFIG };
}

/**
 * Seed root types with their default load validation.
 * Only affects roots whose validations have not been read yet.
 */
export function enableDefaultLoadValidations(): void {
  configure({ defaultLoadValidations: true });
}

/**
 * Stop seeding root types with their default load validation.
 * Call this before the first page class is checked or extended.
 */
export function disableDefaultLoadValidations(): void {
  configure({ defaultLoadValidations: false });
}
