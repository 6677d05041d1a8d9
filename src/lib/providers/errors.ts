/**
 * Provider errors
 */

/**
 * A provider search that could not be completed
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/**
 * Raised by providers that do not index the requested kind of media
 */
export class UnsupportedSearchError extends ProviderError {
  constructor(provider: string, kind: 'movies' | 'series') {
    super(`${provider} does not support ${kind}`, provider);
    this.name = 'UnsupportedSearchError';
  }
}
