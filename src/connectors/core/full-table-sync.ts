import type { StateManager } from "./state.js";
import type {
  CatalogEntry,
  FullTableStream,
  MessageWriter,
  StreamContext,
  Transformer,
} from "./types.js";

export interface ControllerDeps<S> {
  ctx: StreamContext<S>;
  entry: CatalogEntry;
  writer: MessageWriter;
  transformer: Transformer;
  state: StateManager;
  /** Persists state and reports it downstream. */
  checkpoint(): Promise<void>;
}

export interface StreamOutcome {
  recordsEmitted: number;
  bookmark: string | null;
}

/**
 * Emits every record of the snapshot in source order. Full-table streams
 * keep no bookmark, but state is still checkpointed once at the end.
 */
export async function syncFullTable<S>(
  stream: FullTableStream<S>,
  deps: ControllerDeps<S>,
): Promise<StreamOutcome> {
  let recordsEmitted = 0;

  for await (const record of stream.getRecords(deps.ctx)) {
    const transformed = deps.transformer.transform(
      record,
      deps.entry.schema,
      deps.entry.metadata,
    );
    deps.writer.writeRecord(stream.id, transformed);
    recordsEmitted++;
  }

  await deps.checkpoint();
  return { recordsEmitted, bookmark: null };
}
