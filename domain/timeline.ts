/**
 * Timelines — total order plus discrete stepping over a point type.
 */

import { compareDateKeys, epochDay, nextDay } from "./calendar.js";
import { asTimestamp, type DateKey, type Timestamp } from "./core.js";
import { hashNumber, hashString } from "./utils.js";

export interface TimeLine<T> {
  readonly name: string;
  isBefore(a: T, b: T): boolean;
  isAfter(a: T, b: T): boolean;
  isSimultaneous(a: T, b: T): boolean;
  /** Smallest point after t. */
  stepForward(t: T): T;
  hash(t: T): number;
  /** Default textual representation of a point. */
  format(t: T): string;
  /** Steps from a to b in constant time, where the point type allows it. */
  distance?(a: T, b: T): number;
}

export interface TimeLineDefinition<T> {
  readonly name: string;
  /** Negative, zero or positive like Array.prototype.sort comparators. */
  compare(a: T, b: T): number;
  stepForward(t: T): T;
  hash(t: T): number;
  format?(t: T): string;
  distance?(a: T, b: T): number;
}

/** Builds a timeline from a comparator. */
export function defineTimeLine<T>(definition: TimeLineDefinition<T>): TimeLine<T> {
  const { name, compare, stepForward, hash } = definition;
  const format = definition.format ?? ((t: T) => String(t));
  return Object.freeze({
    name,
    isBefore: (a: T, b: T) => compare(a, b) < 0,
    isAfter: (a: T, b: T) => compare(a, b) > 0,
    isSimultaneous: (a: T, b: T) => compare(a, b) === 0,
    stepForward,
    hash,
    format,
    distance: definition.distance,
  });
}

/** Calendar dates 0000-01-01 through 9999-12-31, one day per step. */
export const DATE_AXIS: TimeLine<DateKey> = defineTimeLine<DateKey>({
  name: "date",
  compare: compareDateKeys,
  stepForward: nextDay,
  hash: hashString,
  format: (date) => date,
  distance: (a, b) => epochDay(b) - epochDay(a),
});

/** UTC instants, one millisecond per step. Rendered as ISO-8601 with a Z suffix. */
export const MOMENT_AXIS: TimeLine<Timestamp> = defineTimeLine<Timestamp>({
  name: "moment",
  compare: (a, b) => a - b,
  stepForward: (t) => asTimestamp(t + 1),
  hash: hashNumber,
  format: (t) => new Date(t).toISOString(),
  distance: (a, b) => b - a,
});

/**
 * Integer points stepping by one. Every call creates a distinct timeline:
 * intervals compare equal only over the very same instance.
 */
export function counterAxis(name: string): TimeLine<number> {
  return defineTimeLine<number>({
    name,
    compare: (a, b) => a - b,
    stepForward: (t) => t + 1,
    hash: hashNumber,
    distance: (a, b) => b - a,
  });
}
