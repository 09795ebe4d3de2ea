/**
 * Configuration could not be read or did not validate. Returned inside
 * neverthrow `err()` values; the formatting core itself never fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
