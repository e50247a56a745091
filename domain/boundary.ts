/**
 * Interval boundaries.
 *
 * An infinite boundary has no point; whether it stands for the infinite past
 * or the infinite future follows from its role (start or end).
 */

import type { TimeLine } from "./timeline.js";

export type Edge = "OPEN" | "CLOSED";

export interface InfiniteBoundary {
  readonly kind: "infinite";
}

export interface FiniteBoundary<T> {
  readonly kind: "finite";
  readonly edge: Edge;
  readonly value: T;
}

export type Boundary<T> = InfiniteBoundary | FiniteBoundary<T>;

const INFINITE: InfiniteBoundary = { kind: "infinite" };

export function infinite(): InfiniteBoundary {
  return INFINITE;
}

export function openAt<T>(value: T): FiniteBoundary<T> {
  return { kind: "finite", edge: "OPEN", value };
}

export function closedAt<T>(value: T): FiniteBoundary<T> {
  return { kind: "finite", edge: "CLOSED", value };
}

export function isInfinite<T>(boundary: Boundary<T>): boundary is InfiniteBoundary {
  return boundary.kind === "infinite";
}

/** Infinite boundaries count as open. */
export function isOpen<T>(boundary: Boundary<T>): boolean {
  return boundary.kind === "infinite" || boundary.edge === "OPEN";
}

export function isClosed<T>(boundary: Boundary<T>): boolean {
  return boundary.kind === "finite" && boundary.edge === "CLOSED";
}

/** Compares two boundaries of the same role. */
export function boundaryEquals<T>(a: Boundary<T>, b: Boundary<T>, timeline: TimeLine<T>): boolean {
  if (a.kind === "infinite" || b.kind === "infinite") {
    return a.kind === b.kind;
  }
  return a.edge === b.edge && timeline.isSimultaneous(a.value, b.value);
}

export function boundaryHash<T>(boundary: Boundary<T>, timeline: TimeLine<T>): number {
  if (boundary.kind === "infinite") return 0;
  return (Math.imul(31, timeline.hash(boundary.value)) + (boundary.edge === "OPEN" ? 1 : 2)) | 0;
}
