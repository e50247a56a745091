/**
 * Format processor — one field step of a composite formatter.
 * The composite formatter itself lives outside this package.
 */

import type { AttributeQuery } from "./attributes.js";
import type { ChronoElement } from "./element.js";
import type { Appendable, ChronoDisplay, ParsedEntity, PositionSink } from "./formatContext.js";
import type { ParseLog } from "./parseLog.js";

export interface SpecializeOptions {
  /** Digits of a contiguous run left for the adjacent numeric field. */
  readonly reserved?: number;
  /** Pivot year used when the attributes carry none. */
  readonly defaultPivotYear?: number;
}

export interface FormatProcessor<V> {
  readonly element: ChronoElement<V>;

  /** Writes the field and returns the number of characters written. */
  print(
    display: ChronoDisplay,
    buffer: Appendable,
    attributes: AttributeQuery,
    positions?: PositionSink,
    quickPath?: boolean
  ): number;

  /** Consumes the field at log.position; failures go to the log, never thrown. */
  parse(
    text: string,
    log: ParseLog,
    attributes: AttributeQuery,
    result: ParsedEntity,
    quickPath?: boolean
  ): void;

  withElement(element: ChronoElement<V>): FormatProcessor<V>;

  isNumerical(): boolean;

  /** Snapshot with attributes resolved once, for quickPath calls. */
  specialize(attributes: AttributeQuery, options?: SpecializeOptions): FormatProcessor<V>;
}
