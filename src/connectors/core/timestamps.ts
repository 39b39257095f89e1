/**
 * Microsecond-precision UTC timestamps.
 *
 * `Date` stops at milliseconds, but bookmarks are advanced by one
 * microsecond, so watermarks are carried as bigint microseconds since the
 * epoch.
 */

export type Micros = bigint;

export const ONE_MICROSECOND: Micros = 1n;

export class TimestampError extends Error {
  constructor(value: unknown) {
    super(`Unparseable timestamp: ${JSON.stringify(value)}`);
    this.name = "TimestampError";
  }
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const RFC2822_PATTERN =
  /^(?:[a-z]{3},\s*)?(\d{1,2})\s+([a-z]{3})\s+(\d{2}|\d{4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*([+-]\d{4}|[a-z]{1,3}))?$/i;

const MONTHS = [
  "jan", "feb", "mar", "apr", "may", "jun",
  "jul", "aug", "sep", "oct", "nov", "dec",
];

/** Offsets in minutes of the zone names RFC 2822 allows. */
const NAMED_ZONES: Record<string, number> = {
  UT: 0,
  GMT: 0,
  Z: 0,
  EST: -300,
  EDT: -240,
  CST: -360,
  CDT: -300,
  MST: -420,
  MDT: -360,
  PST: -480,
  PDT: -420,
};

function zoneOffsetMinutes(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number.parseInt(digits.slice(0, 2), 10);
  const minutes = digits.length > 2 ? Number.parseInt(digits.slice(2), 10) : 0;
  return sign * (hours * 60 + minutes);
}

interface DateFields {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

/** Epoch milliseconds of UTC wall-clock fields; out-of-range fields throw. */
function utcMillis(value: unknown, f: DateFields): number {
  const daysInMonth = new Date(Date.UTC(f.year, f.month, 0)).getUTCDate();
  if (
    f.month < 1 ||
    f.month > 12 ||
    f.day < 1 ||
    f.day > daysInMonth ||
    f.hour > 23 ||
    f.minute > 59 ||
    f.second > 59
  ) {
    throw new TimestampError(value);
  }
  return Date.UTC(f.year, f.month - 1, f.day, f.hour, f.minute, f.second);
}

function parseIso(value: string, match: RegExpExecArray): Micros {
  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  const baseMs = utcMillis(value, {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour ?? 0),
    minute: Number(minute ?? 0),
    second: Number(second ?? 0),
  });
  const subSecond = BigInt(`${fraction ?? ""}000000`.slice(0, 6));
  const offset = BigInt(zoneOffsetMinutes(zone)) * 60_000_000n;
  return BigInt(baseMs) * 1000n + subSecond - offset;
}

function parseRfc2822(value: string, match: RegExpExecArray): Micros {
  const [, day, monthName, year, hour, minute, second, zone] = match;
  const month = MONTHS.indexOf((monthName ?? "").toLowerCase()) + 1;
  // Two-digit years: 00-49 are 20xx, 50-99 are 19xx
  const fullYear =
    year?.length === 2 ? Number(year) + (Number(year) < 50 ? 2000 : 1900) : Number(year);

  let offsetMinutes = 0;
  if (zone !== undefined) {
    if (/^[+-]/.test(zone)) {
      offsetMinutes = zoneOffsetMinutes(zone);
    } else {
      const named = zone.toUpperCase();
      if (!Object.hasOwn(NAMED_ZONES, named)) throw new TimestampError(value);
      offsetMinutes = NAMED_ZONES[named] ?? 0;
    }
  }

  const baseMs = utcMillis(value, {
    year: fullYear,
    month,
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second ?? 0),
  });
  return (BigInt(baseMs) - BigInt(offsetMinutes) * 60_000n) * 1000n;
}

/**
 * Parse ISO-8601 or RFC 2822. Values without a zone are UTC.
 */
export function parseTimestamp(value: unknown): Micros {
  if (value instanceof Date) {
    const ms = value.getTime();
    if (Number.isNaN(ms)) throw new TimestampError(value);
    return BigInt(ms) * 1000n;
  }
  if (typeof value !== "string" || value.trim() === "") {
    throw new TimestampError(value);
  }

  const text = value.trim();
  const iso = ISO_PATTERN.exec(text);
  if (iso) return parseIso(value, iso);
  const rfc = RFC2822_PATTERN.exec(text);
  if (rfc) return parseRfc2822(value, rfc);
  throw new TimestampError(value);
}

function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b;
  return a % b !== 0n && a < 0n ? q - 1n : q;
}

/**
 * ISO-8601 with a `Z` designator; the fraction is written only when
 * non-zero, at microsecond precision.
 */
export function formatTimestamp(micros: Micros): string {
  const seconds = floorDiv(micros, 1_000_000n);
  const fraction = micros - seconds * 1_000_000n;
  const base = new Date(Number(seconds) * 1000).toISOString().slice(0, 19);
  if (fraction === 0n) return `${base}Z`;
  return `${base}.${fraction.toString().padStart(6, "0")}Z`;
}

export function toDate(micros: Micros): Date {
  return new Date(Number(floorDiv(micros, 1000n)));
}

export function maxMicros(a: Micros, b: Micros): Micros {
  return a > b ? a : b;
}
