import type { ControllerDeps, StreamOutcome } from "./full-table-sync.js";
import {
  formatTimestamp,
  maxMicros,
  ONE_MICROSECOND,
  parseTimestamp,
  TimestampError,
  toDate,
} from "./timestamps.js";
import type { IncrementalStream } from "./types.js";

export class ReplicationKeyError extends Error {
  constructor(stream: string, key: string, value: unknown) {
    super(
      `Record in "${stream}" has no usable replication key "${key}": ${JSON.stringify(value) ?? "undefined"}`,
    );
    this.name = "ReplicationKeyError";
  }
}

export interface IncrementalDeps<S> extends ControllerDeps<S> {
  /** Low watermark when the stream has no bookmark yet. */
  startDate: string;
}

/**
 * Watermark-driven sync for one stream.
 *
 * Input order is not assumed: every record is compared against the fixed
 * low watermark, and the high watermark advances on every record seen,
 * emitted or not. A stored bookmark is advanced by one microsecond before
 * comparing so the last records of the previous run are not emitted twice,
 * unless the stream is batched.
 */
export async function syncIncremental<S>(
  stream: IncrementalStream<S>,
  deps: IncrementalDeps<S>,
): Promise<StreamOutcome> {
  const key = stream.replicationKey;
  const prior = deps.state.getBookmark(stream.id, key);
  const priorMicros = parseTimestamp(prior ?? deps.startDate);
  const floor =
    prior !== undefined && !stream.batched
      ? priorMicros + ONE_MICROSECOND
      : priorMicros;

  deps.ctx.logger.info(`Replicating from ${formatTimestamp(floor)}`, {
    replicationKey: key,
    bookmark: prior ?? null,
  });

  let highWatermark = priorMicros;
  let recordsEmitted = 0;

  for await (const record of stream.getRecords(deps.ctx, toDate(floor))) {
    const value = record[key];
    let recordMicros: bigint;
    try {
      recordMicros = parseTimestamp(value);
    } catch (err) {
      if (err instanceof TimestampError) {
        throw new ReplicationKeyError(stream.id, key, value);
      }
      throw err;
    }

    if (recordMicros >= floor) {
      const transformed = deps.transformer.transform(
        record,
        deps.entry.schema,
        deps.entry.metadata,
      );
      deps.writer.writeRecord(stream.id, transformed);
      recordsEmitted++;
    }

    highWatermark = maxMicros(highWatermark, recordMicros);
  }

  const bookmark = formatTimestamp(highWatermark);
  deps.state.setBookmark(stream.id, key, bookmark);
  await deps.checkpoint();

  return { recordsEmitted, bookmark };
}
