/**
 * Error model — configuration and operation errors.
 * Parse failures are not errors; they travel through the ParseLog.
 */

/** Optional metadata attached to chrono errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Base for all thrown errors. Preserves prototype chain for instanceof. */
export class ChronoError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown on misuse: wrong element, bad pivot year, unusable attribute. */
export class ConfigurationError extends ChronoError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

export type BoundaryConflict = "START_AFTER_END" | "OPEN_BOUNDARIES_COINCIDE";

/** Thrown when an interval is built from boundaries that cannot enclose a span. */
export class IntervalBoundaryError extends ConfigurationError {
  readonly conflict: BoundaryConflict;
  /** Rendered start point. */
  readonly start: string;
  /** Rendered end point. */
  readonly end: string;

  constructor(conflict: BoundaryConflict, start: string, end: string) {
    super(
      conflict === "START_AFTER_END"
        ? `Start after end: ${start}/${end}`
        : `Open start equal to open end: ${start}`
    );
    this.conflict = conflict;
    this.start = start;
    this.end = end;
  }
}

/** Thrown when a duration is asked of an interval with an infinite side. */
export class InfiniteDurationError extends ChronoError {
  /** The interval in its bracketed textual form. */
  readonly interval: string;

  constructor(interval: string) {
    super(`An infinite interval has no finite duration: ${interval}`);
    this.interval = interval;
  }
}

/** Thrown when stepping would leave the representable range of a timeline. */
export class AxisRangeError extends ChronoError {
  readonly axis: string;
  /** Last representable point the step started from. */
  readonly point: string;

  constructor(axis: string, point: string) {
    super(`No point after ${point} on the ${axis} axis`);
    this.axis = axis;
    this.point = point;
  }
}
