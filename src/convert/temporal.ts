import { TemporalConversionError } from "../utils/errors.js";

export type TemporalType = "DATE" | "TIME" | "TIMESTAMP";

// ECMAScript Date range, in ms either side of the epoch.
const MAX_EPOCH_MS = 8.64e15;

const NUMERIC = /^-?\d+(\.\d+)?$/;
const DATE_TIME = /^(-?\d{4,6})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?Z?)?$/;
const TIME_ONLY = /^(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?$/;

/** Returns the temporal kind named by a Drill metadata string, ignoring any precision suffix. */
export function temporalTypeOf(metadata: string | null | undefined): TemporalType | null {
  if (!metadata) {
    return null;
  }
  const base = metadata.toUpperCase().replace(/\(.*$/, "").trim();
  return base === "DATE" || base === "TIME" || base === "TIMESTAMP" ? base : null;
}

export function isTemporalType(metadata: string | null | undefined): boolean {
  return temporalTypeOf(metadata) !== null;
}

function fraction(digits: string | undefined): number {
  return digits ? Number(digits.padEnd(3, "0").slice(0, 3)) : 0;
}

// Date.UTC maps years 0-99 onto 1900-1999, so fields are set one by one.
function utcDate(year: number, month: number, day: number, hours = 0, minutes = 0, seconds = 0, ms = 0): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hours, minutes, seconds, ms);
  return date;
}

function fromEpochMs(column: string, value: unknown, ms: number): Date {
  if (!Number.isFinite(ms) || Math.abs(ms) > MAX_EPOCH_MS) {
    throw new TemporalConversionError(column, value, "outside the representable date range");
  }
  return new Date(ms);
}

function fromText(column: string, kind: TemporalType, text: string): Date {
  if (NUMERIC.test(text)) {
    return fromEpochMs(column, text, Number(text));
  }

  const dateTime = DATE_TIME.exec(text);
  if (dateTime) {
    const [, year, month, day, hours, minutes, seconds, millis] = dateTime;
    const date = utcDate(
      Number(year),
      Number(month),
      Number(day),
      Number(hours ?? 0),
      Number(minutes ?? 0),
      Number(seconds ?? 0),
      fraction(millis),
    );
    if (Number.isNaN(date.getTime()) || date.getUTCMonth() !== Number(month) - 1 || date.getUTCDate() !== Number(day)) {
      throw new TemporalConversionError(column, text, "not a calendar date");
    }
    return date;
  }

  const time = kind === "TIME" ? TIME_ONLY.exec(text) : null;
  if (time) {
    const [, hours, minutes, seconds, millis] = time;
    return utcDate(1970, 1, 1, Number(hours), Number(minutes), Number(seconds ?? 0), fraction(millis));
  }

  throw new TemporalConversionError(column, text, `unrecognised ${kind} format`);
}

/**
 * Converts one wire value of a DATE, TIME or TIMESTAMP column to a UTC `Date`.
 *
 * Numbers (and numeric strings) are epoch milliseconds; TIME values are
 * milliseconds since midnight and land on 1970-01-01. Empty values map to null.
 * Sentinel high dates such as 9999-12-31 are well inside the supported range.
 */
export function convertTemporalValue(column: string, kind: TemporalType, value: unknown): Date | null {
  if (value === null || value === undefined || value === "") {
    return null;
  }
  if (typeof value === "number") {
    return fromEpochMs(column, value, value);
  }
  if (typeof value === "string") {
    return fromText(column, kind, value.trim());
  }
  throw new TemporalConversionError(column, value, `expected a number or string, got ${typeof value}`);
}
