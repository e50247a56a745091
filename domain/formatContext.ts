/**
 * Format context — the sinks and sources a format step reads from and writes to.
 * All of them are owned by the caller; format steps never retain them.
 */

import type { ChronoElement } from "./element.js";

/** Returned by ChronoDisplay.getInt when the element has no value. */
export const NO_INT_VALUE = -2147483648;

// --- Output ---

/** Append-only character sink. */
export interface Appendable {
  append(text: string): void;
}

/** Sink that can also report how many characters it holds. */
export interface CharSequenceSink extends Appendable {
  readonly length: number;
}

export function hasLength(buffer: Appendable): buffer is CharSequenceSink {
  return "length" in buffer && typeof buffer.length === "number";
}

/** Growable string buffer. */
export class TextBuffer implements CharSequenceSink {
  private chunks: string[] = [];
  private size = 0;

  append(text: string): void {
    this.chunks.push(text);
    this.size += text.length;
  }

  get length(): number {
    return this.size;
  }

  toString(): string {
    return this.chunks.join("");
  }
}

/** Half-open range [startIndex, endIndex) of printed characters belonging to one element. */
export class ElementPosition {
  constructor(
    readonly element: ChronoElement<unknown>,
    readonly startIndex: number,
    readonly endIndex: number
  ) {}

  toString(): string {
    return `ElementPosition[element=${this.element.name},start-index=${this.startIndex},end-index=${this.endIndex}]`;
  }
}

/** Receives printed-field positions. A Set<ElementPosition> satisfies it. */
export interface PositionSink {
  add(position: ElementPosition): unknown;
}

// --- Values ---

/** Read access to element values of the thing being printed. */
export interface ChronoDisplay {
  getInt(element: ChronoElement<number>): number;
}

/** Write access for parsed element values. */
export interface ParsedEntity {
  put(element: ChronoElement<number>, value: number): void;
}

/** Simple element → value map usable both as print source and parse result. */
export class ParsedValues implements ChronoDisplay, ParsedEntity {
  private readonly values = new Map<ChronoElement<number>, number>();

  static of(entries: ReadonlyArray<readonly [ChronoElement<number>, number]>): ParsedValues {
    const result = new ParsedValues();
    for (const [element, value] of entries) result.put(element, value);
    return result;
  }

  put(element: ChronoElement<number>, value: number): void {
    this.values.set(element, value);
  }

  contains(element: ChronoElement<number>): boolean {
    return this.values.has(element);
  }

  getInt(element: ChronoElement<number>): number {
    return this.values.get(element) ?? NO_INT_VALUE;
  }

  get size(): number {
    return this.values.size;
  }
}
