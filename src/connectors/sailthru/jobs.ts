/**
 * Bulk export jobs: submit, poll until the export file is ready, then
 * stream its CSV rows.
 */

import { Readable } from "node:stream";
import { CsvError, parse } from "csv-parse";
import { sleep as defaultSleep } from "../core/index.js";
import type { ApiObject, Logger, SleepFn } from "../core/index.js";
import type { FetchLike, RequestParams, SailthruClient } from "./client.js";
import {
  ERROR_CODE_99,
  ExportDownloadError,
  ExportJobFailedError,
  ExportJobTimeoutError,
  SailthruClientError,
  SailthruError,
  TransportError,
} from "./errors.js";

/** Seconds a job may stay unfinished before polling gives up. */
export const DEFAULT_JOB_TIMEOUT_SECONDS = 600;

const POLL_INTERVAL_MS = 1_000;
const DEFAULT_CHUNK_SIZE = 1024;

export type CsvRow = Record<string, string>;

export type JobApi = Pick<SailthruClient, "createJob" | "getJob">;

export interface ExportJobManagerOptions {
  client: JobApi;
  logger: Logger;
  pollIntervalMs?: number;
}

export interface ExportJobDependencies {
  fetchImpl?: FetchLike;
  sleep?: SleepFn;
  now?: () => number;
}

export interface StreamCsvOptions {
  /** Merged into every row, overriding same-named columns. */
  extraFields?: Record<string, string>;
  /** Bytes buffered from the download between parser reads. */
  chunkSize?: number;
}

function isPlainObject(value: unknown): value is ApiObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCsvRow(value: unknown): value is CsvRow {
  return (
    isPlainObject(value) &&
    Object.values(value).every((cell) => typeof cell === "string")
  );
}

/**
 * Job id from a submission response, or null when the API declined to
 * export a resource still in progress. Any other error payload throws.
 */
export function submittedJobId(response: ApiObject): string | null {
  if (response.error !== undefined && response.error !== null) {
    const code = Number(response.error);
    if (code === ERROR_CODE_99) return null;
    const message =
      typeof response.errormsg === "string" ? response.errormsg : "Unknown Error";
    throw new SailthruClientError(
      `Export job submission refused: Error: ${String(response.error)}, Message: ${message}`,
      { errorCode: Number.isNaN(code) ? null : code },
    );
  }
  const jobId = response.job_id;
  if (typeof jobId === "string" && jobId !== "") return jobId;
  if (typeof jobId === "number") return String(jobId);
  throw new SailthruClientError(
    `Export job submission returned no job_id: ${JSON.stringify(response)}`,
  );
}

export class ExportJobManager {
  private readonly client: JobApi;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: SleepFn;
  private readonly now: () => number;

  constructor(opts: ExportJobManagerOptions, deps: ExportJobDependencies = {}) {
    this.client = opts.client;
    this.logger = opts.logger;
    this.pollIntervalMs = opts.pollIntervalMs ?? POLL_INTERVAL_MS;
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
  }

  /** Raw submission response; see {@link submittedJobId}. */
  submit(params: RequestParams): Promise<ApiObject> {
    this.logger.info(`Starting background job for ${String(params.job)}`, {
      params,
    });
    return this.client.createJob({ ...params });
  }

  /** Polls once per interval until the job completes; returns its export URL. */
  async awaitCompletion(
    jobId: string,
    timeoutSeconds: number = DEFAULT_JOB_TIMEOUT_SECONDS,
  ): Promise<string> {
    const startedAt = this.now();
    let lastStatus: string | null = null;

    for (;;) {
      const job = await this.client.getJob({ job_id: jobId });
      lastStatus = typeof job.status === "string" ? job.status : null;

      if (lastStatus === "completed") {
        const url = job.export_url;
        if (typeof url !== "string" || url === "") {
          throw new ExportJobFailedError(jobId, "completed without export_url");
        }
        this.logger.info(`Export job ${jobId} completed`);
        return url;
      }
      if (lastStatus === "error" || lastStatus === "failed") {
        const reason =
          typeof job.errormsg === "string" ? job.errormsg : `status ${lastStatus}`;
        throw new ExportJobFailedError(jobId, reason);
      }

      const elapsedSeconds = (this.now() - startedAt) / 1000;
      if (elapsedSeconds > timeoutSeconds) {
        throw new ExportJobTimeoutError(jobId, timeoutSeconds, lastStatus);
      }
      this.logger.debug(`Export job ${jobId} is ${lastStatus ?? "pending"}`, {
        elapsedSeconds,
      });
      await this.sleep(this.pollIntervalMs);
    }
  }

  /**
   * Downloads an export file and yields one object per data row, keyed by
   * the header row. Rows are parsed as bytes arrive; the download is
   * released when iteration stops early.
   */
  async *streamCsv(
    url: string,
    opts: StreamCsvOptions = {},
  ): AsyncGenerator<CsvRow> {
    let response: Response;
    try {
      response = await this.fetchImpl(url);
    } catch (err) {
      throw new TransportError(url, err);
    }
    if (!response.ok || !response.body) {
      throw new ExportDownloadError(
        `Export download from ${url} failed with HTTP ${response.status}`,
        { status: response.status },
      );
    }

    const source = Readable.fromWeb(response.body, {
      highWaterMark: opts.chunkSize ?? DEFAULT_CHUNK_SIZE,
    });
    const parser = source.pipe(
      parse({
        columns: true,
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
      }),
    );
    // pipe() leaves source errors with the source; the parser must end too
    source.on("error", (err) => parser.destroy(err));

    try {
      for await (const row of parser) {
        if (!isCsvRow(row)) {
          throw new ExportDownloadError(`Malformed CSV row in export ${url}`);
        }
        yield opts.extraFields ? { ...row, ...opts.extraFields } : row;
      }
    } catch (err) {
      if (err instanceof SailthruError) throw err;
      if (err instanceof CsvError) {
        throw new ExportDownloadError(
          `Malformed CSV in export ${url}: ${err.message}`,
          { cause: err },
        );
      }
      throw new TransportError(url, err);
    } finally {
      parser.destroy();
      source.destroy();
    }
  }
}
