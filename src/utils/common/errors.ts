/**
 * @notice Raised when the word list or the hashed-codes cache cannot be read
 */
export class InputUnavailableError extends Error {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`Input unavailable: ${path}`, options);
    this.name = 'InputUnavailableError';
    this.path = path;
  }
}

/**
 * @notice Raised before a search starts when its configuration is unusable
 */
export class InvalidConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Invalid configuration: ${message}`, options);
    this.name = 'InvalidConfigurationError';
  }
}
