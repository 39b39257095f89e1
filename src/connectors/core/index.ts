// Catalog
export {
  buildCatalog,
  buildMetadata,
  CatalogError,
  isStreamSelected,
  loadSchema,
  parseCatalog,
  rootMetadata,
  selectAll,
} from "./catalog.js";
// Sync engine
export { SyncEngine } from "./engine.js";
export type { SyncEngineConfig } from "./engine.js";
// Replication controllers
export { syncFullTable } from "./full-table-sync.js";
export type { ControllerDeps, StreamOutcome } from "./full-table-sync.js";
export { ReplicationKeyError, syncIncremental } from "./incremental-sync.js";
export type { IncrementalDeps } from "./incremental-sync.js";
// Logger
export { ConsoleLogger, createLogger, isLogLevel } from "./logger.js";
export type { LogSink } from "./logger.js";
// Message output
export { createMessageWriter, StreamMessageWriter } from "./output.js";
export type { LineSink } from "./output.js";
// Rate limiter
export { createRateLimiter, HeaderRateLimiter, resetWaitMs } from "./rate-limiter.js";
// Stream registry
export { StreamRegistry } from "./registry.js";
// Retry helper
export { backoffDelay, sleep, withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";
// State management
export { normalizeState, StateManager } from "./state.js";
// Timestamps
export {
  formatTimestamp,
  maxMicros,
  ONE_MICROSECOND,
  parseTimestamp,
  TimestampError,
  toDate,
} from "./timestamps.js";
export type { Micros } from "./timestamps.js";
// Schema transform
export { SchemaTransformer, TransformError } from "./transform.js";
export type {
  ApiObject,
  Bookmarks,
  Catalog,
  CatalogEntry,
  FullTableStream,
  IncrementalStream,
  JsonSchema,
  JsonValue,
  Logger,
  LogLevel,
  Message,
  MessageWriter,
  MetadataEntry,
  PersistedState,
  RateLimiter,
  RawRecord,
  ReplicationMode,
  SleepFn,
  Stream,
  StreamContext,
  StreamDefinition,
  SyncError,
  SyncResult,
  Transformer,
} from "./types.js";
