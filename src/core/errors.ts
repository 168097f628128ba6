export type ApiErrorOptions = {
  retryable?: boolean;
  cause?: unknown;
};

/** Base class for every failure a synthesis stream raises to its consumer. */
export class ApiError extends Error {
  readonly retryable: boolean;

  constructor(message: string, opts: ApiErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'ApiError';
    this.retryable = opts.retryable ?? true;
  }
}

/** Transport failure: DNS, reset, aborted request, malformed stream. */
export class ApiConnectionError extends ApiError {
  constructor(message = 'Connection error.', opts: ApiErrorOptions = {}) {
    super(message, opts);
    this.name = 'ApiConnectionError';
  }
}

export class ApiTimeoutError extends ApiConnectionError {
  constructor(message = 'Request timed out.', opts: ApiErrorOptions = {}) {
    super(message, opts);
    this.name = 'ApiTimeoutError';
  }
}

export type ApiStatusErrorOptions = ApiErrorOptions & {
  statusCode: number;
  requestId?: string | null;
  body?: unknown;
};

/**
 * Non-2xx response from the synthesis server. The body is kept as the server
 * sent it (parsed JSON where it parsed) so callers can inspect it.
 */
export class ApiStatusError extends ApiError {
  readonly statusCode: number;
  readonly requestId: string | null;
  readonly body: unknown;

  constructor(message: string, opts: ApiStatusErrorOptions) {
    super(message, { retryable: opts.retryable ?? isRetryableStatus(opts.statusCode), cause: opts.cause });
    this.name = 'ApiStatusError';
    this.statusCode = opts.statusCode;
    this.requestId = opts.requestId ?? null;
    this.body = opts.body ?? null;
  }
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
