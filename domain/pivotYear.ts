/**
 * Pivot years — turning a year-of-century into an absolute year.
 *
 * A pivot year P selects a 100-year window. Year-of-century values at or
 * above P mod 100 belong to the century before P's, smaller ones to P's own.
 * Pivot 2027: 26 → 2026, 27 → 1927, 99 → 1999, 00 → 2000.
 */

import { assert } from "./validation.js";

/** Sentinel pivot year: print and parse the absolute year without windowing. */
export const UNWINDOWED_PIVOT_YEAR = 100;

/** Offset added to the current year when a chronology supplies its default pivot. */
export const DEFAULT_PIVOT_OFFSET = 20;

export function checkPivotYear(pivotYear: number): number {
  assert(
    pivotYear >= UNWINDOWED_PIVOT_YEAR,
    `Pivot year must not be smaller than 100: ${pivotYear}`,
    { pivotYear }
  );
  return pivotYear;
}

export function toYear(yearOfCentury: number, pivotYear: number): number {
  checkPivotYear(pivotYear);
  const centuryBase = Math.trunc(pivotYear / 100) * 100;
  const century = yearOfCentury >= pivotYear % 100 ? centuryBase - 100 : centuryBase;
  return century + yearOfCentury;
}

/** Default pivot year of the ISO chronology: the current UTC year plus 20. */
export function defaultPivotYear(now: Date = new Date()): number {
  return now.getUTCFullYear() + DEFAULT_PIVOT_OFFSET;
}
