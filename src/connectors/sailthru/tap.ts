import { fileURLToPath } from "node:url";
import {
  buildCatalog,
  createMessageWriter,
  createRateLimiter,
  selectAll,
  StateManager,
  SyncEngine,
} from "../core/index.js";
import type {
  Catalog,
  Logger,
  MessageWriter,
  SleepFn,
  SyncResult,
} from "../core/index.js";
import { type FetchLike, SailthruClient } from "./client.js";
import type { TapConfig } from "./config.js";
import { ExportJobManager } from "./jobs.js";
import { createSailthruRegistry, type SailthruServices } from "./streams.js";

/** `schemas/` at the package root, from both `src/` and `dist/`. */
export const SCHEMAS_DIR = fileURLToPath(
  new URL("../../../schemas/", import.meta.url),
);

export interface TapDependencies {
  fetchImpl?: FetchLike;
  sleep?: SleepFn;
  now?: () => number;
}

export interface TapServices extends SailthruServices {
  client: SailthruClient;
  jobs: ExportJobManager;
}

/** One client and rate limiter shared by every stream of a run. */
export function createServices(
  config: TapConfig,
  logger: Logger,
  deps: TapDependencies = {},
): TapServices {
  const rateLimiter = createRateLimiter({ sleep: deps.sleep, now: deps.now });
  const client = new SailthruClient(
    {
      apiKey: config.apiKey,
      apiSecret: config.apiSecret,
      userAgent: config.userAgent,
      requestTimeout: config.requestTimeout,
      logger: logger.child("client"),
      rateLimiter,
    },
    deps,
  );
  const jobs = new ExportJobManager(
    { client, logger: logger.child("jobs") },
    deps,
  );
  return { client, jobs };
}

/** Verifies credentials, then builds the catalog of every stream. */
export async function discover(
  services: Pick<TapServices, "client">,
  logger: Logger,
  schemasDir: string = SCHEMAS_DIR,
): Promise<Catalog> {
  await services.client.checkPlatformAccess();
  logger.info("Credentials verified; building catalog");
  return buildCatalog(createSailthruRegistry().definitions(), schemasDir);
}

export interface RunSyncOptions {
  config: TapConfig;
  services: SailthruServices;
  logger: Logger;
  /** Without a catalog, every stream and field is selected. */
  catalog?: Catalog;
  statePath?: string | null;
  /** Initial state; read from `statePath` when absent. */
  state?: unknown;
  writer?: MessageWriter;
  schemasDir?: string;
  now?: () => Date;
}

export async function runSync(opts: RunSyncOptions): Promise<SyncResult[]> {
  const registry = createSailthruRegistry();
  const catalog =
    opts.catalog ??
    selectAll(buildCatalog(registry.definitions(), opts.schemasDir ?? SCHEMAS_DIR));

  const engine = new SyncEngine<SailthruServices>({
    registry,
    services: opts.services,
    catalog,
    state: new StateManager(opts.statePath ?? null, opts.state),
    writer: opts.writer ?? createMessageWriter(),
    startDate: opts.config.startDate,
    logger: opts.logger,
    now: opts.now,
  });
  return engine.syncAll();
}
