/**
 * domain/calendar.ts
 * Proleptic Gregorian date keys ("YYYY-MM-DD") and day stepping.
 *
 * Arithmetic goes through Date at noon UTC so no time zone shift can move a day.
 */

import type { DateKey } from "./core.js";
import { isDateKey } from "./core.js";
import { AxisRangeError } from "./errors.js";
import { assert } from "./validation.js";

/** Last date a four-digit key can hold; there is no next day. */
export const MAX_DATE_KEY: string = "9999-12-31";

const MS_PER_DAY = 86_400_000;

function utcNoon(y: number, m: number, d: number): Date {
  const dt = new Date(Date.UTC(2000, 0, 1, 12, 0, 0)); // noon UTC for stability
  dt.setUTCFullYear(y, m - 1, d); // Date.UTC maps years 0-99 to 1900-1999
  return dt;
}

export function parseDateKey(date: DateKey): { y: number; m: number; d: number } {
  const [ys, ms, ds] = date.split("-");
  return { y: Number(ys), m: Number(ms), d: Number(ds) };
}

export function formatDateKey(y: number, m: number, d: number): DateKey {
  return dateKey(
    `${String(y).padStart(4, "0")}-${String(m).padStart(2, "0")}-${String(d).padStart(2, "0")}`
  );
}

/** Validates shape and calendar range of an ISO date string. */
export function dateKey(value: string): DateKey {
  assert(isDateKey(value), `Not an ISO date: ${value}`, { value });
  const { y, m, d } = parseDateKey(value);
  const dt = utcNoon(y, m, d);
  assert(
    dt.getUTCFullYear() === y && dt.getUTCMonth() === m - 1 && dt.getUTCDate() === d,
    `Invalid calendar date: ${value}`,
    { value }
  );
  return value;
}

/** Throws AxisRangeError at MAX_DATE_KEY. */
export function nextDay(date: DateKey): DateKey {
  if (date === MAX_DATE_KEY) throw new AxisRangeError("date", date);
  const { y, m, d } = parseDateKey(date);
  const dt = utcNoon(y, m, d);
  dt.setUTCDate(dt.getUTCDate() + 1);
  return formatDateKey(dt.getUTCFullYear(), dt.getUTCMonth() + 1, dt.getUTCDate());
}

/** Days since 1970-01-01 (negative before). */
export function epochDay(date: DateKey): number {
  const { y, m, d } = parseDateKey(date);
  return Math.floor(utcNoon(y, m, d).getTime() / MS_PER_DAY);
}

/** Date keys of years 0000–9999 sort lexicographically in calendar order. */
export function compareDateKeys(a: DateKey, b: DateKey): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
