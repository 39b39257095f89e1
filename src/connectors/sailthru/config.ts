import * as fs from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { parseTimestamp } from "../core/timestamps.js";

/** Seconds; used when `request_timeout` is absent, empty or zero. */
export const DEFAULT_REQUEST_TIMEOUT = 300;

export const DEFAULT_USER_AGENT = "sailthru-tap/0.1.0";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface TapConfig {
  startDate: string;
  apiKey: string;
  apiSecret: string;
  userAgent: string;
  /** Seconds. */
  requestTimeout: number;
}

const ENV_KEYS = {
  start_date: "SAILTHRU_START_DATE",
  api_key: "SAILTHRU_API_KEY",
  api_secret: "SAILTHRU_API_SECRET",
  user_agent: "SAILTHRU_USER_AGENT",
  request_timeout: "SAILTHRU_REQUEST_TIMEOUT",
} as const;

const rawConfigShape = z.object({
  start_date: z
    .string({ required_error: "is required" })
    .min(1, "is required")
    .refine((value) => {
      try {
        parseTimestamp(value);
        return true;
      } catch {
        return false;
      }
    }, "must be an ISO-8601 timestamp"),
  api_key: z.string({ required_error: "is required" }).min(1, "is required"),
  api_secret: z.string({ required_error: "is required" }).min(1, "is required"),
  user_agent: z.string().optional(),
  request_timeout: z.union([z.number(), z.string()]).nullish(),
});

/**
 * Absent, empty and zero values fall back to the default; any other
 * numeric value, or numeric string, is used as given.
 */
export function resolveRequestTimeout(value: unknown): number {
  if (value === undefined || value === null || value === "") {
    return DEFAULT_REQUEST_TIMEOUT;
  }
  const seconds =
    typeof value === "number"
      ? value
      : typeof value === "string"
        ? Number(value.trim())
        : Number.NaN;
  if (Number.isNaN(seconds) || seconds < 0) {
    throw new ConfigError(
      `request_timeout must be a non-negative number, got ${JSON.stringify(value)}`,
    );
  }
  return seconds === 0 ? DEFAULT_REQUEST_TIMEOUT : seconds;
}

/** Validates a decoded config object, filling unset keys from `env`. */
export function parseTapConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): TapConfig {
  const fromFile =
    typeof raw === "object" && raw !== null && !Array.isArray(raw)
      ? { ...raw }
      : {};
  const merged: Record<string, unknown> = fromFile;
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const envValue = env[envName];
    if (merged[key] === undefined && envValue !== undefined) {
      merged[key] = envValue;
    }
  }

  const parsed = rawConfigShape.safeParse(merged);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")} ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config: ${problems}`);
  }

  const config = parsed.data;
  return {
    startDate: config.start_date,
    apiKey: config.api_key,
    apiSecret: config.api_secret,
    userAgent: config.user_agent || DEFAULT_USER_AGENT,
    requestTimeout: resolveRequestTimeout(config.request_timeout),
  };
}

/** Reads a JSON or YAML file; JSON parses as YAML. */
export function readStructuredFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read ${filePath}: ${reason}`);
  }
  try {
    return parseYaml(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot parse ${filePath}: ${reason}`);
  }
}

export function loadTapConfig(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
): TapConfig {
  return parseTapConfig(readStructuredFile(filePath), env);
}
