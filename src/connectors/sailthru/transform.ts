import { formatTimestamp, parseTimestamp } from "../core/index.js";
import type { ApiObject, RawRecord } from "../core/index.js";

function isPlainObject(value: unknown): value is ApiObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** RFC 2822 (or ISO-8601) date string to ISO-8601 UTC. */
export function rfc2822ToIso(value: string): string {
  return formatTimestamp(parseTimestamp(value));
}

/** `"Profile Id"` → `"profile_id"`. */
export function toSnakeCase(key: string): string {
  return key.split(" ").join("_").toLowerCase();
}

export function snakeCaseKeys(record: RawRecord): RawRecord {
  const out: RawRecord = {};
  for (const [key, value] of Object.entries(record)) {
    out[toSnakeCase(key)] = value;
  }
  return out;
}

/**
 * Snake-cases keys, then rewrites the listed date fields to ISO-8601.
 * Empty date values are left as they are.
 */
export function normalizeRecord(
  record: RawRecord,
  dateKeys: readonly string[] = [],
): RawRecord {
  const out = snakeCaseKeys(record);
  for (const key of dateKeys) {
    const value = out[key];
    if (typeof value === "string" && value !== "") {
      out[key] = rfc2822ToIso(value);
    }
  }
  return out;
}

/** Reduces a `/user` response to the fields the `users` stream emits. */
export function flattenUserResponse(response: ApiObject): RawRecord {
  const keys = isPlainObject(response.keys) ? response.keys : {};
  const lists = isPlainObject(response.lists) ? Object.keys(response.lists) : [];
  return {
    profile_id: keys.sid ?? null,
    cookie: keys.cookie ?? null,
    email: keys.email ?? null,
    vars: response.vars ?? null,
    lists,
    engagement: response.engagement ?? null,
    optout_email: response.optout_email ?? null,
  };
}
