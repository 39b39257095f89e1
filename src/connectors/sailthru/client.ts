/**
 * Signed HTTP client for the Sailthru API.
 *
 * Every call carries `api_key`, `format=json`, the JSON-encoded parameters
 * and an MD5 signature over them. Failures are classified into the error
 * taxonomy in ./errors.ts and retried in two layers: rate limits (429) wait
 * for the server-dictated time, transient failures back off exponentially.
 */

import {
  createRateLimiter,
  resetWaitMs,
  sleep as defaultSleep,
  withRetry,
} from "../core/index.js";
import type { ApiObject, Logger, RateLimiter, SleepFn } from "../core/index.js";
import { DEFAULT_REQUEST_TIMEOUT, resolveRequestTimeout } from "./config.js";
import {
  describeError,
  errorClassFor,
  isExportSkip,
  RequestTimeoutError,
  SailthruClientError,
  SailthruError,
  SailthruRateLimitError,
  SailthruServerError,
  SailthruStatsNotReadyError,
  TransportError,
} from "./errors.js";
import { getSignatureHash } from "./signature.js";

export const BASE_URL = "https://api.sailthru.com";

/** Total attempts per retry layer. */
export const MAX_ATTEMPTS = 3;

const BASE_BACKOFF_MS = 2_000;
const MAX_BACKOFF_MS = 60_000;
const DEFAULT_RATE_LIMIT_WAIT_MS = 60_000;

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";
export type FetchLike = typeof fetch;
export type RequestParams = Record<string, unknown>;

export interface SailthruClientOptions {
  apiKey: string;
  apiSecret: string;
  userAgent: string;
  /** Seconds; absent, empty and zero values mean the default. */
  requestTimeout?: unknown;
  logger: Logger;
  rateLimiter?: RateLimiter;
}

export interface SailthruClientDependencies {
  fetchImpl?: FetchLike;
  sleep?: SleepFn;
  now?: () => number;
  random?: () => number;
}

export interface RequestOptions {
  /**
   * Return the body of a 403 with API code 99 ("may not export a resource
   * still in progress") instead of raising. Only export-job submission sets
   * this.
   */
  allowExportSkip?: boolean;
}

function isApiObject(value: unknown): value is ApiObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTimeout(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.name === "TimeoutError" || err.name === "AbortError")
  );
}

/** Failures retried with exponential backoff. */
export function isTransientFailure(err: unknown): boolean {
  return (
    err instanceof SailthruServerError ||
    err instanceof SailthruStatsNotReadyError ||
    err instanceof RequestTimeoutError ||
    err instanceof TransportError
  );
}

function apiErrorCode(body: ApiObject | null): number | null {
  const code = body?.error;
  if (typeof code === "number") return code;
  if (typeof code === "string" && code.trim() !== "") {
    const parsed = Number(code);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

function headerRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key.toLowerCase()] = value;
  });
  return record;
}

export class SailthruClient {
  readonly baseUrl = BASE_URL;
  /** Seconds. */
  readonly requestTimeout: number;

  private readonly apiKey: string;
  private readonly apiSecret: string;
  private readonly userAgent: string;
  private readonly logger: Logger;
  private readonly rateLimiter: RateLimiter;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly random: () => number;

  constructor(
    opts: SailthruClientOptions,
    deps: SailthruClientDependencies = {},
  ) {
    this.apiKey = opts.apiKey;
    this.apiSecret = opts.apiSecret;
    this.userAgent = opts.userAgent;
    this.logger = opts.logger;
    this.requestTimeout =
      opts.requestTimeout === undefined
        ? DEFAULT_REQUEST_TIMEOUT
        : resolveRequestTimeout(opts.requestTimeout);
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
    this.random = deps.random ?? Math.random;
    this.rateLimiter =
      opts.rateLimiter ?? createRateLimiter({ sleep: this.sleep, now: this.now });
  }

  // ─── Endpoints ───

  /** Verifies credentials with a cheap settings read. */
  async checkPlatformAccess(): Promise<void> {
    await this.get("/settings");
  }

  getLists(params: RequestParams = {}): Promise<ApiObject> {
    return this.get("/list", params);
  }

  getAdTargeterPlans(params: RequestParams = {}): Promise<ApiObject> {
    return this.get("/ad/plan", params);
  }

  /** The endpoint cannot list every blast; it needs a status or a blast id. */
  getBlasts(params: RequestParams): Promise<ApiObject> {
    if (!params.status && !params.blast_id) {
      return Promise.reject(
        new SailthruClientError(
          'Endpoint requires either "blast_id" or "status" parameter',
        ),
      );
    }
    return this.get("/blast", params);
  }

  getBlastRepeats(params: RequestParams = {}): Promise<ApiObject> {
    return this.get("/blast_repeat", params);
  }

  getUser(params: RequestParams): Promise<ApiObject> {
    if (!params.id) {
      return Promise.reject(
        new SailthruClientError('Required "id" parameter missing'),
      );
    }
    return this.get("/user", params);
  }

  getJob(params: RequestParams): Promise<ApiObject> {
    if (!params.job_id) {
      return Promise.reject(
        new SailthruClientError('Required "job_id" parameter missing'),
      );
    }
    return this.get("/job", params);
  }

  createJob(params: RequestParams): Promise<ApiObject> {
    if (!params.job) {
      return Promise.reject(
        new SailthruClientError('Required "job" type parameter missing'),
      );
    }
    return this.post("/job", params, { allowExportSkip: true });
  }

  // ─── Request plumbing ───

  get(
    endpoint: string,
    params: RequestParams = {},
    opts: RequestOptions = {},
  ): Promise<ApiObject> {
    return this.request(endpoint, params, "GET", opts);
  }

  post(
    endpoint: string,
    params: RequestParams = {},
    opts: RequestOptions = {},
  ): Promise<ApiObject> {
    return this.request(endpoint, params, "POST", opts);
  }

  /** `GET` sends the payload as query parameters, other verbs as a form body. */
  request(
    endpoint: string,
    params: RequestParams,
    method: HttpMethod,
    opts: RequestOptions = {},
  ): Promise<ApiObject> {
    const url = `${this.baseUrl}${endpoint}`;
    const payload = this.preparePayload(params);

    const withTransientRetry = () =>
      withRetry(() => this.send(url, payload, method, opts), {
        maxRetries: MAX_ATTEMPTS - 1,
        baseDelayMs: BASE_BACKOFF_MS,
        maxDelayMs: MAX_BACKOFF_MS,
        retryOn: isTransientFailure,
        sleep: this.sleep,
        random: this.random,
        onRetry: (err, attempt, delayMs) => {
          const reason = err instanceof Error ? err.message : String(err);
          this.logger.warn(
            `Retrying ${method} ${endpoint} in ${Math.round(delayMs)}ms (attempt ${attempt + 1}/${MAX_ATTEMPTS}): ${reason}`,
          );
        },
      });

    return withRetry(withTransientRetry, {
      maxRetries: MAX_ATTEMPTS - 1,
      retryOn: (err) => err instanceof SailthruRateLimitError,
      delayFor: (err) =>
        err instanceof SailthruRateLimitError && err.retryAfterMs !== null
          ? err.retryAfterMs
          : DEFAULT_RATE_LIMIT_WAIT_MS,
      sleep: this.sleep,
      onRetry: (_err, _attempt, delayMs) => {
        this.logger.info(
          `API rate limit exceeded -- sleeping for ${delayMs / 1000} seconds`,
        );
        this.rateLimiter.backoff(delayMs);
      },
    });
  }

  preparePayload(params: RequestParams): Record<string, string> {
    const payload: Record<string, string> = {
      api_key: this.apiKey,
      format: "json",
      json: JSON.stringify(params),
    };
    payload.sig = getSignatureHash(payload, this.apiSecret);
    return payload;
  }

  private async send(
    url: string,
    payload: Record<string, string>,
    method: HttpMethod,
    opts: RequestOptions,
  ): Promise<ApiObject> {
    await this.rateLimiter.acquire();

    const timeoutMs = this.requestTimeout * 1000;
    const query = new URLSearchParams(payload);
    const target = method === "GET" ? `${url}?${query.toString()}` : url;
    const init: RequestInit = {
      method,
      headers: { "User-Agent": this.userAgent, Accept: "application/json" },
      signal: AbortSignal.timeout(timeoutMs),
      ...(method === "GET" ? {} : { body: query }),
    };

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(target, init);
      text = await response.text();
    } catch (err) {
      if (isTimeout(err)) throw new RequestTimeoutError(url, timeoutMs, err);
      throw new TransportError(url, err);
    }

    this.rateLimiter.updateFromHeaders(headerRecord(response.headers));
    const body = parseBody(text);

    if (response.ok) {
      if (!body) {
        throw new SailthruError(`Unexpected non-JSON response from ${url}`, {
          status: response.status,
        });
      }
      return body;
    }

    return this.handleError(response, body, opts);
  }

  private handleError(
    response: Response,
    body: ApiObject | null,
    opts: RequestOptions,
  ): ApiObject {
    const status = response.status;
    const errorCode = apiErrorCode(body);
    const apiMessage =
      typeof body?.errormsg === "string" ? body.errormsg : null;
    const message = describeError(status, errorCode, apiMessage);

    if (opts.allowExportSkip && isExportSkip(status, errorCode) && body) {
      this.logger.warn(message, { response: body });
      return body;
    }

    if (status === 429) {
      throw new SailthruRateLimitError(message, {
        status,
        errorCode,
        retryAfterMs: resetWaitMs(
          response.headers.get("x-rate-limit-reset"),
          this.now(),
        ),
      });
    }

    const ErrorClass = errorClassFor(status, errorCode);
    throw new ErrorClass(message, { status, errorCode });
  }
}

function parseBody(text: string): ApiObject | null {
  if (text.trim() === "") return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return isApiObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
