// Wiring
export { createServices, discover, runSync, SCHEMAS_DIR } from "./tap.js";
export type { RunSyncOptions, TapDependencies, TapServices } from "./tap.js";
// HTTP client
export { BASE_URL, isTransientFailure, MAX_ATTEMPTS, SailthruClient } from "./client.js";
export type {
  FetchLike,
  HttpMethod,
  RequestOptions,
  RequestParams,
  SailthruClientDependencies,
  SailthruClientOptions,
} from "./client.js";
// Config
export {
  ConfigError,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_USER_AGENT,
  loadTapConfig,
  parseTapConfig,
  readStructuredFile,
  resolveRequestTimeout,
} from "./config.js";
export type { TapConfig } from "./config.js";
// Errors
export {
  describeError,
  ERROR_CODE_99,
  errorClassFor,
  ExportDownloadError,
  ExportJobFailedError,
  ExportJobTimeoutError,
  isExportSkip,
  RequestTimeoutError,
  SailthruBadRequestError,
  SailthruClientError,
  SailthruConflictError,
  SailthruError,
  SailthruForbiddenError,
  SailthruInternalServerError,
  SailthruMethodNotSupportedError,
  SailthruNotFoundError,
  SailthruRateLimitError,
  SailthruServerError,
  SailthruStatsNotReadyError,
  SailthruUnauthorizedError,
  TransportError,
} from "./errors.js";
// Export jobs
export {
  DEFAULT_JOB_TIMEOUT_SECONDS,
  ExportJobManager,
  submittedJobId,
} from "./jobs.js";
export type { CsvRow, ExportJobManagerOptions, StreamCsvOptions } from "./jobs.js";
// Signing
export { extractParams, getSignatureHash, getSignatureString } from "./signature.js";
// Streams
export {
  adTargeterPlans,
  BLAST_STATUSES,
  blastQuery,
  blastRepeats,
  blasts,
  blastSaveList,
  createSailthruRegistry,
  jobDate,
  lists,
  purchaseLog,
  users,
} from "./streams.js";
export type { ExportJobs, SailthruApi, SailthruServices } from "./streams.js";
// Record normalisation
export {
  flattenUserResponse,
  normalizeRecord,
  rfc2822ToIso,
  snakeCaseKeys,
  toSnakeCase,
} from "./transform.js";
