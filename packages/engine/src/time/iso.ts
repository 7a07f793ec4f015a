/**
 * ISO-8601 timestamp parsing.
 *
 * Accepts calendar dates with an optional time part, fractional seconds and
 * either a trailing "Z" or a numeric offset. Timestamps without an offset
 * are interpreted as UTC.
 */

import { OdflowError } from "../errors.js";

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/;

function parseOffsetMinutes(offset: string | undefined): number | null {
  if (!offset || offset === "Z") return 0;
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

/**
 * Parse an ISO-8601 timestamp to epoch milliseconds.
 * Returns null when the string is not a valid timestamp.
 */
export function tryParseIsoTimestamp(value: string): number | null {
  const match = ISO_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, y, mo, d, h, mi, s, frac, offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h ?? "0");
  const minute = Number(mi ?? "0");
  const second = Number(s ?? "0");
  const millis = frac ? Number(frac.slice(0, 3).padEnd(3, "0")) : 0;

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const offsetMinutes = parseOffsetMinutes(offset);
  if (offsetMinutes === null) return null;

  // setUTCFullYear keeps years below 100 from being read as 19xx
  const date = new Date(Date.UTC(2000, month - 1, day, hour, minute, second, millis));
  date.setUTCFullYear(year);
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return date.getTime() - offsetMinutes * 60_000;
}

/** Parse a timestamp or fail with InvalidTimeRange */
export function parseIsoTimestamp(value: string, label = "timestamp"): number {
  const epoch = tryParseIsoTimestamp(value);
  if (epoch === null) {
    throw new OdflowError("InvalidTimeRange", `invalid ${label} time: "${value}"`);
  }
  return epoch;
}

/** A validated half-open window [start, end) */
export interface TimeRange {
  start: string;
  end: string;
  startEpochMs: number;
  endEpochMs: number;
}

/**
 * Validate both bounds of a half-open window before any store access.
 * The original strings are kept; the store compares them as stored text.
 */
export function validateTimeRange(start: string, end: string): TimeRange {
  const startEpochMs = parseIsoTimestamp(start, "start");
  const endEpochMs = parseIsoTimestamp(end, "end");
  if (endEpochMs < startEpochMs) {
    throw new OdflowError(
      "InvalidTimeRange",
      `end (${end}) is before start (${start})`,
    );
  }
  return { start, end, startEpochMs, endEpochMs };
}
