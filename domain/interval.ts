/**
 * Intervals on a discrete timeline.
 *
 * Instances are immutable and validated on construction:
 * - the start is never after the end (infinite sides are extremal)
 * - an open start and an open end never sit on the same point
 *
 * Build them through an IntervalFactory (see intervalFactory.ts).
 */

import {
  boundaryEquals,
  boundaryHash,
  isOpen,
  type Boundary,
} from "./boundary.js";
import { InfiniteDurationError, IntervalBoundaryError } from "./errors.js";
import type { IntervalFactory } from "./intervalFactory.js";
import type { TimeLine } from "./timeline.js";
import { combineHashes } from "./utils.js";
import { neverReached } from "./validation.js";

/** When the textual form carries its bracket marks. */
export type BracketPolicy = "SHOW_ALWAYS" | "SHOW_NEVER" | "SHOW_WHEN_NON_STANDARD";

export type PointPrinter<T> = (value: T) => string;

const NEGATIVE_INFINITY = "-∞";
const POSITIVE_INFINITY = "+∞";

export class ChronoInterval<T> {
  readonly start: Boundary<T>;
  readonly end: Boundary<T>;
  private readonly factory: IntervalFactory<T>;

  constructor(start: Boundary<T>, end: Boundary<T>, factory: IntervalFactory<T>) {
    const timeline = factory.timeline;
    if (start.kind === "finite" && end.kind === "finite") {
      const from = timeline.format(start.value);
      const to = timeline.format(end.value);
      if (timeline.isAfter(start.value, end.value)) {
        throw new IntervalBoundaryError("START_AFTER_END", from, to);
      }
      if (
        start.edge === "OPEN" &&
        end.edge === "OPEN" &&
        timeline.isSimultaneous(start.value, end.value)
      ) {
        throw new IntervalBoundaryError("OPEN_BOUNDARIES_COINCIDE", from, to);
      }
    }
    this.start = start;
    this.end = end;
    this.factory = factory;
  }

  get timeline(): TimeLine<T> {
    return this.factory.timeline;
  }

  withStart(boundary: Boundary<T>): ChronoInterval<T> {
    return this.factory.create(boundary, this.end);
  }

  withEnd(boundary: Boundary<T>): ChronoInterval<T> {
    return this.factory.create(this.start, boundary);
  }

  /** Moves the start to value, keeping its edge (an infinite start becomes closed). */
  withStartPoint(value: T): ChronoInterval<T> {
    const edge = this.start.kind === "finite" ? this.start.edge : "CLOSED";
    return this.withStart({ kind: "finite", edge, value });
  }

  /** Moves the end to value, keeping its edge (an infinite end takes the factory's standard edge). */
  withEndPoint(value: T): ChronoInterval<T> {
    const edge = this.end.kind === "finite" ? this.end.edge : this.factory.standardEnd;
    return this.withEnd({ kind: "finite", edge, value });
  }

  isFinite(): boolean {
    return this.start.kind === "finite" && this.end.kind === "finite";
  }

  /** Only a zero-length half-open interval is empty; [t, t] holds one point. */
  isEmpty(): boolean {
    const { start, end } = this;
    return (
      start.kind === "finite" &&
      end.kind === "finite" &&
      this.timeline.isSimultaneous(start.value, end.value) &&
      start.edge !== end.edge
    );
  }

  contains(point: T | null | undefined): boolean {
    if (point === null || point === undefined) return false;
    const { start, end, timeline } = this;

    let startCondition: boolean;
    if (start.kind === "infinite") {
      startCondition = true;
    } else if (start.edge === "OPEN") {
      startCondition = timeline.isBefore(start.value, point);
    } else {
      startCondition = !timeline.isAfter(start.value, point);
    }
    if (!startCondition) return false;

    if (end.kind === "infinite") return true;
    if (end.edge === "OPEN") return timeline.isAfter(end.value, point);
    return !timeline.isBefore(end.value, point);
  }

  /**
   * Equivalent closed-open interval [t1, t2), the base of duration arithmetic.
   * Throws InfiniteDurationError for infinite intervals.
   */
  canonicalBase(): ChronoInterval<T> {
    const { start, end, timeline } = this;
    if (start.kind === "infinite" || end.kind === "infinite") {
      throw new InfiniteDurationError(this.toString());
    }
    if (start.edge === "CLOSED" && end.edge === "OPEN") return this;

    const t1 = start.edge === "OPEN" ? timeline.stepForward(start.value) : start.value;
    const t2 = end.edge === "CLOSED" ? timeline.stepForward(end.value) : end.value;
    return this.factory.between(t1, t2);
  }

  /**
   * Number of timeline steps covered: the duration in the timeline's unit.
   * Walks step by step only on timelines without a distance function.
   */
  stepCount(): number {
    const { start, end } = this.canonicalBase();
    const { timeline } = this;
    if (start.kind === "infinite" || end.kind === "infinite") {
      throw new InfiniteDurationError(this.toString());
    }
    if (timeline.distance !== undefined) {
      return timeline.distance(start.value, end.value);
    }
    let cursor = start.value;
    const stop = end.value;
    let steps = 0;
    while (timeline.isBefore(cursor, stop)) {
      cursor = timeline.stepForward(cursor);
      steps++;
    }
    return steps;
  }

  /** Same boundaries on the same timeline. */
  equals(other: ChronoInterval<T>): boolean {
    if (other === this) return true;
    return (
      other.timeline === this.timeline &&
      boundaryEquals(this.start, other.start, this.timeline) &&
      boundaryEquals(this.end, other.end, this.timeline)
    );
  }

  hashCode(): number {
    return combineHashes(
      boundaryHash(this.start, this.timeline),
      boundaryHash(this.end, this.timeline)
    );
  }

  /** Whether the policy wants bracket marks around this interval. */
  showsBrackets(policy: BracketPolicy): boolean {
    switch (policy) {
      case "SHOW_ALWAYS":
        return true;
      case "SHOW_NEVER":
        return false;
      case "SHOW_WHEN_NON_STANDARD":
        return (
          isOpen(this.start) ||
          (this.end.kind === "finite" && this.end.edge !== this.factory.standardEnd)
        );
      default:
        return neverReached(policy, "Unknown bracket policy");
    }
  }

  /**
   * Without arguments: "[start/end)" with the timeline's own representation
   * and brackets always shown. With a printer the policy defaults to
   * SHOW_WHEN_NON_STANDARD.
   */
  toString(printer?: PointPrinter<T>, policy?: BracketPolicy): string {
    const print = printer ?? ((value: T) => this.timeline.format(value));
    const brackets = this.showsBrackets(
      policy ?? (printer === undefined ? "SHOW_ALWAYS" : "SHOW_WHEN_NON_STANDARD")
    );
    const startText = this.start.kind === "infinite" ? NEGATIVE_INFINITY : print(this.start.value);
    const endText = this.end.kind === "infinite" ? POSITIVE_INFINITY : print(this.end.value);

    if (!brackets) return `${startText}/${endText}`;
    return `${isOpen(this.start) ? "(" : "["}${startText}/${endText}${isOpen(this.end) ? ")" : "]"}`;
  }
}
