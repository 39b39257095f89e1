/**
 * Sailthru streams, in registry order.
 *
 * Each stream turns API responses or export files into raw records; the
 * replication controllers do the filtering, coercion and emitting. Parent
 * streams also hand identifiers to their children through `getChildKeys`.
 */

import { StreamRegistry } from "../core/index.js";
import type {
  ApiObject,
  FullTableStream,
  IncrementalStream,
  StreamContext,
} from "../core/index.js";
import type { RequestParams, SailthruClient } from "./client.js";
import { SailthruClientError } from "./errors.js";
import { type CsvRow, type ExportJobManager, submittedJobId } from "./jobs.js";
import { flattenUserResponse, normalizeRecord } from "./transform.js";

export type SailthruApi = Pick<
  SailthruClient,
  "getAdTargeterPlans" | "getBlasts" | "getBlastRepeats" | "getLists" | "getUser"
>;

export type ExportJobs = Pick<
  ExportJobManager,
  "submit" | "awaitCompletion" | "streamCsv"
>;

export interface SailthruServices {
  client: SailthruApi;
  jobs: ExportJobs;
}

type Ctx = StreamContext<SailthruServices>;

export const BLAST_STATUSES = [
  "sent",
  "sending",
  "unscheduled",
  "scheduled",
] as const;

function isPlainObject(value: unknown): value is ApiObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** The named collection of a response; missing or empty is an error. */
function requireCollection(
  response: ApiObject,
  field: string,
  ctx: Ctx,
): ApiObject[] {
  const items = response[field];
  if (!Array.isArray(items) || items.length === 0) {
    ctx.logger.error(`response is empty for ${field}`);
    throw new SailthruClientError(`Response for "${ctx.streamId}" has no ${field}`);
  }
  return items.filter(isPlainObject);
}

/** The named collection of a response, or nothing. */
function collection(response: ApiObject, field: string): ApiObject[] {
  const items = response[field];
  return Array.isArray(items) ? items.filter(isPlainObject) : [];
}

function idString(value: unknown): string | null {
  if (typeof value === "string" && value !== "") return value;
  if (typeof value === "number") return String(value);
  return null;
}

/**
 * Submits one export job and streams its rows. A submission refused with
 * code 99 yields nothing.
 */
async function* exportRows(
  ctx: Ctx,
  params: RequestParams,
  extraFields?: Record<string, string>,
): AsyncGenerator<CsvRow> {
  const { jobs } = ctx.services;
  const jobId = submittedJobId(await jobs.submit(params));
  if (jobId === null) {
    ctx.logger.info(`Skipping ${String(params.job)} export`, { params });
    return;
  }
  const exportUrl = await jobs.awaitCompletion(jobId);
  yield* jobs.streamCsv(exportUrl, { extraFields });
}

function blastsByStatus(ctx: Ctx, status: string): Promise<ApiObject> {
  return ctx.memo(`blasts:${JSON.stringify({ status })}`, () =>
    ctx.services.client.getBlasts({ status }),
  );
}

function allLists(ctx: Ctx): Promise<ApiObject> {
  return ctx.memo("lists:{}", () => ctx.services.client.getLists());
}

// ─── Streams ───

export const adTargeterPlans: FullTableStream<SailthruServices> = {
  id: "ad_targeter_plans",
  replicationMode: "FULL_TABLE",
  keyProperties: ["plan_id"],

  async *getRecords(ctx) {
    const response = await ctx.services.client.getAdTargeterPlans();
    for (const plan of requireCollection(response, "ad_plans", ctx)) {
      yield normalizeRecord(plan);
    }
  },
};

const BLAST_DATE_KEYS = ["start_time", "modify_time", "schedule_time"];

/**
 * The API cannot list every blast, only those in one status, so each
 * status is queried in turn.
 */
export const blasts: IncrementalStream<SailthruServices> = {
  id: "blasts",
  replicationMode: "INCREMENTAL",
  replicationKey: "modify_time",
  keyProperties: ["blast_id"],

  async *getRecords(ctx) {
    for (const status of BLAST_STATUSES) {
      const response = await blastsByStatus(ctx, status);
      for (const blast of collection(response, "blasts")) {
        yield normalizeRecord({ ...blast, status }, BLAST_DATE_KEYS);
      }
    }
  },

  async *getChildKeys(ctx) {
    for (const status of BLAST_STATUSES) {
      const response = await blastsByStatus(ctx, status);
      for (const blast of collection(response, "blasts")) {
        const blastId = idString(blast.blast_id);
        if (blastId !== null) yield blastId;
      }
    }
  },
};

export const blastQuery: FullTableStream<SailthruServices> = {
  id: "blast_query",
  replicationMode: "FULL_TABLE",
  keyProperties: ["profile_id", "blast_id"],
  parent: "blasts",

  async *getRecords(ctx) {
    for await (const blastId of ctx.parentKeys()) {
      const params = { job: "blast_query", blast_id: blastId };
      const rows = exportRows(ctx, params, { blast_id: blastId });
      for await (const row of rows) {
        yield normalizeRecord(row, [
          "send_time",
          "open_time",
          "click_time",
          "purchase_time",
          "first_ten_clicks_time",
        ]);
      }
    }
  },
};

export const blastRepeats: IncrementalStream<SailthruServices> = {
  id: "blast_repeats",
  replicationMode: "INCREMENTAL",
  replicationKey: "modify_time",
  keyProperties: ["repeat_id"],

  async *getRecords(ctx) {
    const response = await ctx.services.client.getBlastRepeats();
    for (const repeat of requireCollection(response, "repeats", ctx)) {
      yield normalizeRecord(repeat, [
        "create_time",
        "modify_time",
        "start_date",
        "end_date",
        "error_time",
      ]);
    }
  },
};

export const lists: FullTableStream<SailthruServices> = {
  id: "lists",
  replicationMode: "FULL_TABLE",
  keyProperties: ["list_id"],

  async *getRecords(ctx) {
    const response = await allLists(ctx);
    for (const list of requireCollection(response, "lists", ctx)) {
      yield normalizeRecord(list, ["create_time"]);
    }
  },

  async *getChildKeys(ctx) {
    const response = await allLists(ctx);
    for (const list of requireCollection(response, "lists", ctx)) {
      if (typeof list.name === "string") yield list.name;
    }
  },
};

async function* listExportRows(ctx: Ctx): AsyncGenerator<CsvRow> {
  for await (const listName of ctx.parentKeys()) {
    yield* exportRows(ctx, { job: "export_list_data", list: listName });
  }
}

export const blastSaveList: FullTableStream<SailthruServices> = {
  id: "blast_save_list",
  replicationMode: "FULL_TABLE",
  keyProperties: ["profile_id"],
  parent: "lists",

  async *getRecords(ctx) {
    for await (const row of listExportRows(ctx)) {
      yield normalizeRecord(row, [
        "profile_created_date",
        "optout_time",
        "first_purchase_time",
        "last_purchase_time",
      ]);
    }
  },

  async *getChildKeys(ctx) {
    for await (const row of listExportRows(ctx)) {
      const profileId = row["Profile Id"];
      if (!profileId) {
        ctx.logger.warn("no Profile Id for record");
        continue;
      }
      yield profileId;
    }
  },
};

export const users: FullTableStream<SailthruServices> = {
  id: "users",
  replicationMode: "FULL_TABLE",
  keyProperties: ["profile_id"],
  parent: "blast_save_list",

  async *getRecords(ctx) {
    for await (const profileId of ctx.parentKeys()) {
      const response = await ctx.services.client.getUser({
        id: profileId,
        key: "sid",
      });
      yield flattenUserResponse(response);
    }
  },
};

const DAY_MS = 86_400_000;

function utcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/** `YYYYMMDD` of a UTC day. */
export function jobDate(dayMs: number): string {
  return new Date(dayMs).toISOString().slice(0, 10).replaceAll("-", "");
}

/** One export job per calendar day, from the watermark's day through today. */
export const purchaseLog: IncrementalStream<SailthruServices> = {
  id: "purchase_log",
  replicationMode: "INCREMENTAL",
  replicationKey: "date",
  batched: true,
  keyProperties: ["date", "email_hash", "extid", "message_id", "price", "channel"],

  async *getRecords(ctx, since) {
    const today = utcDay(ctx.now());
    for (let day = utcDay(since); day <= today; day += DAY_MS) {
      const date = jobDate(day);
      const params = {
        job: "export_purchase_log",
        start_date: date,
        end_date: date,
      };
      for await (const row of exportRows(ctx, params)) {
        yield normalizeRecord(row, ["date"]);
      }
    }
  },
};

export function createSailthruRegistry(): StreamRegistry<SailthruServices> {
  return new StreamRegistry<SailthruServices>([
    adTargeterPlans,
    blasts,
    blastQuery,
    blastRepeats,
    lists,
    blastSaveList,
    users,
    purchaseLog,
  ]);
}
