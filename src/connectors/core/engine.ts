import { isStreamSelected } from "./catalog.js";
import { type ControllerDeps, syncFullTable } from "./full-table-sync.js";
import { syncIncremental } from "./incremental-sync.js";
import type { StreamRegistry } from "./registry.js";
import type { StateManager } from "./state.js";
import { SchemaTransformer } from "./transform.js";
import type {
  ApiObject,
  Catalog,
  CatalogEntry,
  Logger,
  MessageWriter,
  Stream,
  StreamContext,
  SyncError,
  SyncResult,
  Transformer,
} from "./types.js";

export interface SyncEngineConfig<S> {
  registry: StreamRegistry<S>;
  services: S;
  catalog: Catalog;
  state: StateManager;
  writer: MessageWriter;
  startDate: string;
  logger: Logger;
  transformer?: Transformer;
  now?: () => Date;
}

function toSyncError(err: unknown): SyncError {
  if (err instanceof Error) {
    const retryable =
      "retryable" in err && typeof err.retryable === "boolean"
        ? err.retryable
        : false;
    return { name: err.name, message: err.message, retryable };
  }
  return { name: "Error", message: String(err), retryable: false };
}

export class SyncEngine<S> {
  private readonly config: SyncEngineConfig<S>;
  private readonly transformer: Transformer;
  private readonly now: () => Date;
  private readonly memoCache = new Map<string, Promise<ApiObject>>();

  constructor(config: SyncEngineConfig<S>) {
    this.config = config;
    this.transformer = config.transformer ?? new SchemaTransformer();
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Syncs selected streams in registry order. The first failed stream ends
   * the run; its result carries the error.
   */
  async syncAll(): Promise<SyncResult[]> {
    const results: SyncResult[] = [];
    const selected = this.selectedStreams();
    this.config.logger.info(`Syncing ${selected.length} selected streams`, {
      streams: selected.map(([stream]) => stream.id),
    });

    for (const [stream, entry] of selected) {
      const result = await this.runStream(stream, entry);
      results.push(result);
      if (result.error) {
        this.config.logger.error(
          `Stopping run after "${stream.id}" failed: ${result.error.message}`,
        );
        break;
      }
    }

    this.config.state.setCurrentlySyncing(null);
    await this.checkpoint();
    return results;
  }

  private selectedStreams(): Array<[Stream<S>, CatalogEntry]> {
    const selected: Array<[Stream<S>, CatalogEntry]> = [];
    for (const stream of this.config.registry.list()) {
      const entry = this.catalogEntry(stream.id);
      if (entry && isStreamSelected(entry)) selected.push([stream, entry]);
    }
    return selected;
  }

  private catalogEntry(streamId: string): CatalogEntry | undefined {
    return this.config.catalog.streams.find(
      (entry) => entry.tap_stream_id === streamId,
    );
  }

  private async checkpoint(): Promise<void> {
    await this.config.state.checkpoint();
    this.config.writer.writeState(this.config.state.getRawState());
  }

  private async runStream(
    stream: Stream<S>,
    entry: CatalogEntry,
  ): Promise<SyncResult> {
    const logger = this.config.logger.child(stream.id);
    const startTime = Date.now();
    const { state, writer } = this.config;

    state.setCurrentlySyncing(stream.id);
    writer.writeSchema(
      stream.id,
      entry.schema,
      stream.keyProperties,
      stream.replicationMode === "INCREMENTAL" ? [stream.replicationKey] : [],
    );

    const deps: ControllerDeps<S> = {
      ctx: this.createContext(stream, logger),
      entry,
      writer,
      transformer: this.transformer,
      state,
      checkpoint: () => this.checkpoint(),
    };

    logger.info(`Starting ${stream.replicationMode} sync`);
    try {
      const outcome =
        stream.replicationMode === "INCREMENTAL"
          ? await syncIncremental(stream, {
              ...deps,
              startDate: this.config.startDate,
            })
          : await syncFullTable(stream, deps);
      const durationMs = Date.now() - startTime;
      logger.info(`Sync complete: ${outcome.recordsEmitted} records`, {
        durationMs,
        bookmark: outcome.bookmark,
      });
      return {
        stream: stream.id,
        mode: stream.replicationMode,
        recordsEmitted: outcome.recordsEmitted,
        bookmark: outcome.bookmark,
        durationMs,
      };
    } catch (err) {
      const error = toSyncError(err);
      logger.error(`Sync failed: ${error.message}`, { error: error.name });
      return {
        stream: stream.id,
        mode: stream.replicationMode,
        recordsEmitted: 0,
        bookmark: null,
        durationMs: Date.now() - startTime,
        error,
      };
    }
  }

  private createContext(stream: Stream<S>, logger: Logger): StreamContext<S> {
    return {
      streamId: stream.id,
      services: this.config.services,
      logger,
      memo: (key, produce) => {
        const cached = this.memoCache.get(key);
        if (cached) return cached;
        const pending = produce();
        this.memoCache.set(key, pending);
        return pending;
      },
      parentKeys: () => this.parentKeys(stream, logger),
      now: this.now,
    };
  }

  private async *parentKeys(
    stream: Stream<S>,
    logger: Logger,
  ): AsyncGenerator<string> {
    if (stream.parent === undefined) {
      throw new Error(`Stream "${stream.id}" has no parent`);
    }
    const parent = this.config.registry.get(stream.parent);
    if (!parent.getChildKeys) {
      throw new Error(
        `Stream "${parent.id}" cannot feed child stream "${stream.id}"`,
      );
    }
    yield* parent.getChildKeys(
      this.createContext(parent, logger.child(`parent:${parent.id}`)),
    );
  }
}
