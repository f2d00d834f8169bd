/**
 * Configuration errors are fatal and raised before any row is processed.
 *
 * @module config/errors
 */

export class ConfigurationError extends Error {
  constructor(
    message: string,
    /** Offending settings, e.g. ['GEOCODER_TIMEOUT_MS'] */
    public readonly settings: readonly string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
