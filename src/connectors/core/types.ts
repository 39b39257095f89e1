/** Core type definitions for the tap's sync machinery. */

// ─── Records & JSON ───

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** A record as produced by a stream, before schema coercion. */
export type RawRecord = Record<string, unknown>;

/** A decoded API response body. */
export type ApiObject = Record<string, unknown>;

// ─── Streams ───

export type ReplicationMode = "FULL_TABLE" | "INCREMENTAL";

interface StreamDefinitionBase {
  readonly id: string;
  readonly keyProperties: readonly string[];
  /** Id of the stream whose child keys feed this one. */
  readonly parent?: string;
}

export interface FullTableDefinition extends StreamDefinitionBase {
  readonly replicationMode: "FULL_TABLE";
}

export interface IncrementalDefinition extends StreamDefinitionBase {
  readonly replicationMode: "INCREMENTAL";
  readonly replicationKey: string;
  /**
   * Records sharing the bookmark's exact timestamp are emitted again on the
   * next run instead of being skipped.
   */
  readonly batched?: boolean;
}

export type StreamDefinition = FullTableDefinition | IncrementalDefinition;

export interface FullTableStream<S> extends FullTableDefinition {
  getRecords(ctx: StreamContext<S>): AsyncIterable<RawRecord>;
  /** Identifiers handed to child streams (blast ids, list names, ...). */
  getChildKeys?(ctx: StreamContext<S>): AsyncIterable<string>;
}

export interface IncrementalStream<S> extends IncrementalDefinition {
  /**
   * Records at or after `since`, possibly an unsorted superset: the
   * incremental controller does the final filtering.
   */
  getRecords(ctx: StreamContext<S>, since: Date): AsyncIterable<RawRecord>;
  getChildKeys?(ctx: StreamContext<S>): AsyncIterable<string>;
}

export type Stream<S> = FullTableStream<S> | IncrementalStream<S>;

/** Per-call capabilities handed to a stream by the engine. */
export interface StreamContext<S> {
  readonly streamId: string;
  readonly services: S;
  readonly logger: Logger;
  /** Run-scoped memoisation, keyed by stream id plus effective parameters. */
  memo(key: string, produce: () => Promise<ApiObject>): Promise<ApiObject>;
  /** Child keys of this stream's declared parent. */
  parentKeys(): AsyncIterable<string>;
  now(): Date;
}

// ─── Catalog ───

export type Breadcrumb = readonly string[];

export interface MetadataEntry {
  breadcrumb: Breadcrumb;
  metadata: Record<string, unknown>;
}

export interface JsonSchema {
  type?: string | string[];
  format?: string;
  properties?: Record<string, JsonSchema>;
  items?: JsonSchema;
  additionalProperties?: boolean | JsonSchema;
  [keyword: string]: unknown;
}

export interface CatalogEntry {
  stream: string;
  tap_stream_id: string;
  schema: JsonSchema;
  key_properties: string[];
  replication_method: ReplicationMode;
  replication_key: string | null;
  metadata: MetadataEntry[];
}

export interface Catalog {
  streams: CatalogEntry[];
}

// ─── Transform ───

export interface Transformer {
  transform(
    record: RawRecord,
    schema: JsonSchema,
    metadata: readonly MetadataEntry[],
  ): Record<string, JsonValue>;
}

// ─── State ───

export type Bookmarks = Record<string, Record<string, string>>;

export interface PersistedState {
  bookmarks: Bookmarks;
  currently_syncing: string | null;
}

// ─── Messages ───

export interface SchemaMessage {
  type: "SCHEMA";
  stream: string;
  schema: JsonSchema;
  key_properties: string[];
  bookmark_properties?: string[];
}

export interface RecordMessage {
  type: "RECORD";
  stream: string;
  record: Record<string, JsonValue>;
}

export interface StateMessage {
  type: "STATE";
  value: PersistedState;
}

export type Message = SchemaMessage | RecordMessage | StateMessage;

export interface MessageWriter {
  writeSchema(
    stream: string,
    schema: JsonSchema,
    keyProperties: readonly string[],
    bookmarkProperties?: readonly string[],
  ): void;
  writeRecord(stream: string, record: Record<string, JsonValue>): void;
  writeState(value: PersistedState): void;
}

// ─── Sync Result ───

export interface SyncResult {
  stream: string;
  mode: ReplicationMode;
  recordsEmitted: number;
  bookmark: string | null;
  durationMs: number;
  error?: SyncError;
}

export interface SyncError {
  message: string;
  name: string;
  retryable: boolean;
}

// ─── Rate Limiter ───

export interface RateLimiter {
  acquire(): Promise<void>;
  backoff(retryAfterMs: number): void;
  updateFromHeaders(headers: Record<string, string>): void;
}

// ─── Logger ───

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  child(component: string): Logger;
}

// ─── Timing ───

export type SleepFn = (ms: number) => Promise<void>;
