// CHANGE: Introduce typed errors for fatal and per-project failures.
// WHY: The CLI maps configuration and listing failures to distinct exit codes.

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  CONFIGURATION: 2
} as const;

/**
 * Required input missing or invalid. Raised before any network call.
 */
export class ConfigurationError extends Error {
  readonly exitCode = EXIT_CODES.CONFIGURATION;

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Listing failed on some page. No partial project list survives it.
 */
export class FetchError extends Error {
  readonly exitCode = EXIT_CODES.FAILURE;

  constructor(
    message: string,
    readonly status?: number,
    readonly body?: string
  ) {
    super(message);
    this.name = "FetchError";
  }
}

/**
 * Update of one project failed. Recorded as a failed outcome, never fatal.
 */
export class UpdateError extends Error {
  constructor(
    message: string,
    readonly projectId: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "UpdateError";
  }
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigurationError || error instanceof FetchError) {
    return error.exitCode;
  }
  return EXIT_CODES.FAILURE;
}
