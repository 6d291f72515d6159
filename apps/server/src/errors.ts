/**
 * Raised when the persisted cache file cannot be read or written.
 * This is the only error that stops the server.
 */
export class CacheFileError extends Error {
  readonly code = 'CACHE_FILE_ERROR';

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CacheFileError';
  }
}

export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class UpstreamError extends Error {
  readonly code = 'UPSTREAM_ERROR';

  constructor(
    message: string,
    readonly upstream: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'UpstreamError';
  }
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
