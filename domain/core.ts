/**
 * Core — structural primitives only.
 * Framework-independent.
 */

export type Brand<T, B extends string> = T & { readonly __brand: B };

/** Point in time (UTC epoch milliseconds). */
export type Timestamp = Brand<number, "TimestampMs">;

/** Calendar date as ISO string "YYYY-MM-DD". */
export type DateKey = Brand<string, "DateKey">;

// --- Constructors (no validation) ---

export const asTimestamp = (ms: number) => ms as Timestamp;

const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** Narrowing check for date keys. Shape only; month/day ranges are not checked. */
export function isDateKey(value: string): value is DateKey {
  return DATE_KEY_PATTERN.test(value);
}
