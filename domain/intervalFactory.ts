/**
 * Interval factories — one per timeline.
 *
 * on(timeline) looks up the standard end edge registered for the built-in
 * axes (closed for dates, open for moments) and falls back to open.
 */

import { closedAt, infinite, openAt, type Boundary, type Edge } from "./boundary.js";
import type { DateKey, Timestamp } from "./core.js";
import { ChronoInterval } from "./interval.js";
import { DATE_AXIS, MOMENT_AXIS, type TimeLine } from "./timeline.js";

export interface IntervalFactory<T> {
  readonly timeline: TimeLine<T>;
  /** End edge of the conventional form; the start is conventionally closed. */
  readonly standardEnd: Edge;
  create(start: Boundary<T>, end: Boundary<T>): ChronoInterval<T>;
  /** Half-open [start, end). */
  between(start: T, end: T): ChronoInterval<T>;
  /** Closed [start, end]. */
  closed(start: T, end: T): ChronoInterval<T>;
  /** [start, +∞) */
  since(start: T): ChronoInterval<T>;
  /** (-∞, end) or (-∞, end], per the standard end edge. */
  until(end: T): ChronoInterval<T>;
  /** (-∞, +∞) */
  always(): ChronoInterval<T>;
}

class TimeLineIntervalFactory<T> implements IntervalFactory<T> {
  constructor(
    readonly timeline: TimeLine<T>,
    readonly standardEnd: Edge
  ) {}

  create(start: Boundary<T>, end: Boundary<T>): ChronoInterval<T> {
    return new ChronoInterval(start, end, this);
  }

  between(start: T, end: T): ChronoInterval<T> {
    return this.create(closedAt(start), openAt(end));
  }

  closed(start: T, end: T): ChronoInterval<T> {
    return this.create(closedAt(start), closedAt(end));
  }

  since(start: T): ChronoInterval<T> {
    return this.create(closedAt(start), infinite());
  }

  until(end: T): ChronoInterval<T> {
    const boundary = this.standardEnd === "CLOSED" ? closedAt(end) : openAt(end);
    return this.create(infinite(), boundary);
  }

  always(): ChronoInterval<T> {
    return this.create(infinite(), infinite());
  }
}

const STANDARD_END_EDGES: ReadonlyMap<object, Edge> = new Map<object, Edge>([
  [DATE_AXIS, "CLOSED"],
  [MOMENT_AXIS, "OPEN"],
]);

export function on<T>(timeline: TimeLine<T>): IntervalFactory<T> {
  return new TimeLineIntervalFactory(timeline, STANDARD_END_EDGES.get(timeline) ?? "OPEN");
}

export const DATE_INTERVALS: IntervalFactory<DateKey> = on(DATE_AXIS);
export const MOMENT_INTERVALS: IntervalFactory<Timestamp> = on(MOMENT_AXIS);
