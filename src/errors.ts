/**
 * Where an {@link ArchiveApiError} came from:
 * - `transport`: the request never produced an HTTP response (DNS, refused connection, timeout)
 * - `http_status`: the archive answered with a non-2xx status
 * - `decode`: a 2xx body that is not JSON or does not have the expected shape
 */
export type ApiErrorOrigin = 'transport' | 'http_status' | 'decode';

/** Caller-supplied tool arguments were rejected before any request was made. */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ArchiveApiError extends Error {
  constructor(
    message: string,
    public readonly origin: ApiErrorOrigin,
    public readonly status?: number,
    public readonly code?: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ArchiveApiError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? { name: error.cause.name, message: error.cause.message } : undefined;
    return cause ? { name: error.name, message: error.message, cause } : { name: error.name, message: error.message };
  }

  return error;
}
