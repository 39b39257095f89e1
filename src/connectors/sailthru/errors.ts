/**
 * Error taxonomy for the Sailthru API.
 *
 * Every HTTP failure is mapped to one class by status code (and, for a few
 * cases, the API's own error code). Messages follow
 * `HTTP-error-code: <status>, Error: <code>, Message: <text>`.
 */

export interface SailthruErrorOptions {
  status?: number;
  errorCode?: number | null;
  cause?: unknown;
}

export class SailthruError extends Error {
  readonly status: number | null;
  readonly errorCode: number | null;
  readonly retryable: boolean = false;

  constructor(message: string, opts: SailthruErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.status = opts.status ?? null;
    this.errorCode = opts.errorCode ?? null;
  }
}

// ─── 4xx: fatal ───

export class SailthruClientError extends SailthruError {}
export class SailthruBadRequestError extends SailthruClientError {}
export class SailthruUnauthorizedError extends SailthruClientError {}
export class SailthruForbiddenError extends SailthruClientError {}
export class SailthruNotFoundError extends SailthruClientError {}
export class SailthruMethodNotSupportedError extends SailthruClientError {}
export class SailthruConflictError extends SailthruClientError {}

// ─── Retryable ───

export class SailthruRateLimitError extends SailthruError {
  override readonly retryable = true;
  /** Wait dictated by the rate-limit header, when one was sent. */
  readonly retryAfterMs: number | null;

  constructor(
    message: string,
    opts: SailthruErrorOptions & { retryAfterMs?: number | null } = {},
  ) {
    super(message, opts);
    this.retryAfterMs = opts.retryAfterMs ?? null;
  }
}

export class SailthruServerError extends SailthruError {
  override readonly retryable = true;
}
export class SailthruInternalServerError extends SailthruServerError {}

/** 400 with API code 99: statistics are still being computed. */
export class SailthruStatsNotReadyError extends SailthruError {
  override readonly retryable = true;
}

export class RequestTimeoutError extends SailthruError {
  override readonly retryable = true;

  constructor(url: string, timeoutMs: number, cause?: unknown) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`, { cause });
  }
}

export class TransportError extends SailthruError {
  override readonly retryable = true;

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Request to ${url} failed: ${reason}`, { cause });
  }
}

// ─── Export jobs ───

export class ExportJobTimeoutError extends SailthruError {
  readonly jobId: string;

  constructor(jobId: string, timeoutSeconds: number, lastStatus: string | null) {
    super(
      `Export job ${jobId} did not complete within ${timeoutSeconds}s (last status: ${lastStatus ?? "unknown"})`,
    );
    this.jobId = jobId;
  }
}

export class ExportJobFailedError extends SailthruError {
  readonly jobId: string;

  constructor(jobId: string, reason: string) {
    super(`Export job ${jobId} failed: ${reason}`);
    this.jobId = jobId;
  }
}

export class ExportDownloadError extends SailthruError {}

// ─── Classification ───

/** API error code that marks statistics-not-ready (400) or export-skip (403). */
export const ERROR_CODE_99 = 99;

export type ErrorClass = new (message: string, opts?: SailthruErrorOptions) => SailthruError;

interface StatusMapping {
  error: ErrorClass;
  message: string;
}

const STATUS_MAPPING: Record<number, StatusMapping> = {
  400: {
    error: SailthruBadRequestError,
    message: "The request is missing or has a bad parameter.",
  },
  401: {
    error: SailthruUnauthorizedError,
    message: "Invalid authorization credentials.",
  },
  403: {
    error: SailthruForbiddenError,
    message: "User does not have permission to access the resource.",
  },
  404: {
    error: SailthruNotFoundError,
    message: "The resource you have specified cannot be found.",
  },
  405: {
    error: SailthruMethodNotSupportedError,
    message: "The provided HTTP method is not supported by the URL.",
  },
  409: {
    error: SailthruConflictError,
    message:
      "The request could not be completed due to a conflict with the current state of the server.",
  },
  429: {
    error: SailthruRateLimitError,
    message: "API rate limit exceeded, please retry after some time.",
  },
  500: {
    error: SailthruInternalServerError,
    message: "An error has occurred at Sailthru's end.",
  },
};

export function errorClassFor(
  status: number,
  errorCode: number | null,
): ErrorClass {
  if (status > 500) return SailthruServerError;
  if (status === 400 && errorCode === ERROR_CODE_99) {
    return SailthruStatsNotReadyError;
  }
  const mapped = STATUS_MAPPING[status];
  if (mapped) return mapped.error;
  return status >= 400 && status < 500 ? SailthruClientError : SailthruError;
}

export function describeError(
  status: number,
  errorCode: number | null,
  apiMessage: string | null,
): string {
  const text = apiMessage ?? STATUS_MAPPING[status]?.message ?? "Unknown Error";
  return `HTTP-error-code: ${status}, Error: ${errorCode ?? "null"}, Message: ${text}`;
}

/** Whether a 403 body is the "may not export a non-terminal resource" case. */
export function isExportSkip(status: number, errorCode: number | null): boolean {
  return status === 403 && errorCode === ERROR_CODE_99;
}
