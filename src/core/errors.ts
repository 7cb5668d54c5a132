export const EXIT_OK = 0;
/** The user can fix this, usually by reinstalling a package. */
export const EXIT_USER_ERROR = 1;
/** Broken catalog data or a caller bug. */
export const EXIT_INTERNAL_ERROR = 2;

export type ConfigurationErrorCode =
  | 'missing-env-section'
  | 'unknown-package'
  | 'invalid-catalog'
  | 'invalid-distribution'
  | 'invalid-profile'
  | 'unsupported-platform';

/**
 * Internal invariant violation. Never reported as a user error and never
 * caught below the top-level CLI handler.
 */
export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode;

  constructor(code: ConfigurationErrorCode, message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.code = code;
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function safeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
