/**
 * Error envelope returned by the API on non-2xx responses
 */
export interface ErrorEnvelope {
  status_code: number;
  error: string;
  message: string;
}

/**
 * Base error class for Ledgerline client errors
 */
export class LedgerlineError extends Error {
  override name = 'LedgerlineError';
  public override readonly cause?: unknown;

  override toString(): string {
    return `${this.name}: ${this.message}`;
  }

  constructor(message: string, cause?: unknown) {
    super(message);
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * The HTTP request itself failed (DNS, connection refused, timeout)
 */
export class TransportError extends LedgerlineError {
  override name = 'TransportError';

  constructor(
    public readonly url: string,
    cause: unknown
  ) {
    super(`transport error:\n  url: ${url}\n  reason: ${describeCause(cause)}`, cause);
  }
}

/**
 * A 2xx body that is not JSON, or not the expected shape. `text` is the body as received.
 */
export class DecodeError extends LedgerlineError {
  override name = 'DecodeError';

  constructor(
    public readonly url: string,
    public readonly text: string,
    cause: unknown
  ) {
    super(
      `json error:\n  url: ${url}\n  reason: ${describeCause(cause)}\n  text: '${text}'`,
      cause
    );
  }
}

/**
 * Non-2xx response, with the server's envelope or one synthesised from the body
 */
export class ApiError extends LedgerlineError {
  override name = 'ApiError';

  constructor(
    public readonly url: string,
    public readonly response: ErrorEnvelope
  ) {
    super(
      `response error:\n  url: ${url}\n  status code: ${response.status_code}\n  error: ${response.error}\n  message: ${response.message}`
    );
  }

  get statusCode(): number {
    return this.response.status_code;
  }
}

/**
 * A local file could not be read
 */
export class LocalIoError extends LedgerlineError {
  override name = 'LocalIoError';

  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(`io error:\n  path: ${path}\n  reason: ${describeCause(cause)}`, cause);
  }
}

/**
 * Settings are missing or invalid
 */
export class ConfigError extends LedgerlineError {
  override name = 'ConfigError';

  constructor(
    reason: string,
    public readonly path?: string,
    cause?: unknown
  ) {
    super(path ? `config error:\n  path: ${path}\n  reason: ${reason}` : `config error: ${reason}`, cause);
  }
}

/**
 * `advance()` was called on a Lister while its previous page was still being fetched
 */
export class ConcurrentAdvanceError extends LedgerlineError {
  override name = 'ConcurrentAdvanceError';

  constructor(page: number) {
    super(`Lister is already fetching page ${page}; await the previous advance() first`);
  }
}

/**
 * Errors a dispatcher call can reject with
 */
export type RequestError = TransportError | DecodeError | ApiError;

export function isRequestError(error: unknown): error is RequestError {
  return (
    error instanceof TransportError || error instanceof DecodeError || error instanceof ApiError
  );
}
