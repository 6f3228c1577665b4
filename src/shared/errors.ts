/**
 * Base class for every error raised by this client
 */
export class GmgnError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GmgnError';
  }
}

/**
 * Request failed (non-recoverable status, or retries exhausted)
 */
export class ApiError extends GmgnError {
  constructor(
    public readonly statusCode: number,
    public readonly detail: string
  ) {
    super(`API Error ${statusCode}: ${detail}`);
    this.name = 'ApiError';
  }
}

/**
 * Response payload is structurally unusable
 */
export class ParsingError extends GmgnError {
  constructor(message: string) {
    super(message);
    this.name = 'ParsingError';
  }
}

export class ConfigError extends GmgnError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Rugcheck reports exist for Solana mints only
 */
export class UnsupportedChainError extends GmgnError {
  constructor(public readonly chain: string) {
    super(`Rugcheck does not support chain "${chain}" (only "sol")`);
    this.name = 'UnsupportedChainError';
  }
}

/**
 * Block page, rate limit, timeout or reset. Retried with a fresh session.
 */
export class TransientTransportError extends GmgnError {
  constructor(
    public readonly statusCode: number,
    public readonly detail: string
  ) {
    super(`Transient failure ${statusCode}: ${detail}`);
    this.name = 'TransientTransportError';
  }
}
