/**
 * Two-digit-year codec.
 *
 * Prints a year as its year-of-century (two digits at least) and parses a
 * digit run back into an absolute year using a pivot year. Runs of more than
 * two digits are read as absolute years. Parse failures are reported through
 * the ParseLog; only misconfiguration throws.
 */

import { isStrict, type AttributeQuery, type Leniency } from "./attributes.js";
import { elementHash, type ChronoElement } from "./element.js";
import {
  ElementPosition,
  NO_INT_VALUE,
  hasLength,
  type Appendable,
  type ChronoDisplay,
  type ParsedEntity,
  type PositionSink,
} from "./formatContext.js";
import type { FormatProcessor, SpecializeOptions } from "./formatProcessor.js";
import type { ParseLog } from "./parseLog.js";
import { UNWINDOWED_PIVOT_YEAR, checkPivotYear, toYear } from "./pivotYear.js";
import { floorMod } from "./utils.js";
import { assert } from "./validation.js";

const ASCII_ZERO = "0";
const STRICT_MAX_DIGITS = 2;
const LENIENT_MAX_DIGITS = 9;
const MIN_DIGITS = 2;

/** Scalars a quick-path snapshot resolves once. */
export interface QuickPathSettings {
  readonly reserved: number;
  readonly zeroDigit: string;
  readonly leniency: Leniency;
  readonly protectedLength: number;
  readonly pivotYear: number;
}

const DEFAULT_SETTINGS: QuickPathSettings = {
  reserved: 0,
  zeroDigit: ASCII_ZERO,
  leniency: "SMART",
  protectedLength: 0,
  pivotYear: UNWINDOWED_PIVOT_YEAR,
};

export class PivotYearCodec implements FormatProcessor<number> {
  readonly element: ChronoElement<number>;
  readonly protectedFromRebinding: boolean;
  private readonly settings: QuickPathSettings;

  constructor(
    element: ChronoElement<number>,
    protectedFromRebinding = false,
    settings: QuickPathSettings = DEFAULT_SETTINGS
  ) {
    assert(element.name.startsWith("YEAR"), `Year element required: ${element.name}`, {
      element: element.name,
    });
    this.element = element;
    this.protectedFromRebinding = protectedFromRebinding;
    this.settings = settings;
  }

  get reservedDigits(): number {
    return this.settings.reserved;
  }

  print(
    display: ChronoDisplay,
    buffer: Appendable,
    attributes: AttributeQuery,
    positions?: PositionSink,
    quickPath = false
  ): number {
    const year = display.getInt(this.element);

    assert(year !== NO_INT_VALUE, `Format context has no year: ${this.element.name}`);
    assert(year >= 0, `Negative year cannot be printed as two-digit-year: ${year}`, { year });

    const windowed = this.resolvePivotYear(attributes, quickPath) !== UNWINDOWED_PIVOT_YEAR;
    const yy = windowed ? floorMod(year, 100) : year;
    const zeroDigit = this.resolveZeroDigit(attributes, quickPath);

    let digits = String(yy);
    if (windowed && yy < 10) digits = ASCII_ZERO + digits;
    if (zeroDigit !== ASCII_ZERO) digits = shiftDigits(digits, zeroDigit);

    const start = hasLength(buffer) ? buffer.length : -1;
    buffer.append(digits);

    if (start !== -1 && positions !== undefined) {
      positions.add(new ElementPosition(this.element, start, start + digits.length));
    }
    return digits.length;
  }

  parse(
    text: string,
    log: ParseLog,
    attributes: AttributeQuery,
    result: ParsedEntity,
    quickPath = false
  ): void {
    const start = log.position;
    const protectedChars = quickPath
      ? this.settings.protectedLength
      : attributes.get("protectedCharacters", 0);
    const len = protectedChars > 0 ? text.length - protectedChars : text.length;

    if (start >= len) {
      log.setError(start, `Missing digits for: ${this.element.name}`);
      log.setWarning();
      return;
    }

    const leniency = quickPath ? this.settings.leniency : attributes.get("leniency", "SMART");
    const zero = this.resolveZeroDigit(attributes, quickPath).charCodeAt(0);
    let effectiveMax = isStrict(leniency) ? STRICT_MAX_DIGITS : LENIENT_MAX_DIGITS;

    if (this.settings.reserved > 0 && protectedChars <= 0) {
      const runLength = digitRunLength(text, start, len, zero);
      effectiveMax = Math.min(effectiveMax, runLength - this.settings.reserved);
    }

    const maxPos = Math.min(len, start + effectiveMax);
    let value = 0;
    let pos = start;

    while (pos < maxPos) {
      const digit = text.charCodeAt(pos) - zero;
      if (digit < 0 || digit > 9) {
        if (pos === start) {
          log.setError(start, "Digit expected.");
          return;
        }
        break;
      }
      value = value * 10 + digit;
      pos++;
    }

    if (pos < start + MIN_DIGITS) {
      log.setError(start, `Not enough digits found for: ${this.element.name}`);
      return;
    }

    const year = pos === start + MIN_DIGITS
      ? toYear(value, this.resolvePivotYear(attributes, quickPath))
      : value;

    result.put(this.element, year);
    log.setPosition(pos);
  }

  withElement(element: ChronoElement<number>): FormatProcessor<number> {
    if (this.protectedFromRebinding || this.element === element) {
      return this;
    }
    return new PivotYearCodec(element, false);
  }

  isNumerical(): boolean {
    return true;
  }

  specialize(attributes: AttributeQuery, options: SpecializeOptions = {}): PivotYearCodec {
    return new PivotYearCodec(this.element, this.protectedFromRebinding, {
      reserved: options.reserved ?? 0,
      zeroDigit: attributes.get("zeroDigit", ASCII_ZERO),
      leniency: attributes.get("leniency", "SMART"),
      protectedLength: attributes.get("protectedCharacters", 0),
      pivotYear: attributes.get("pivotYear", options.defaultPivotYear ?? this.settings.pivotYear),
    });
  }

  /** Equal iff bound to the same element; the remaining configuration is ignored. */
  equals(other: unknown): boolean {
    return other === this || (other instanceof PivotYearCodec && other.element === this.element);
  }

  /** Consistent with equals: depends on the bound element only. */
  hashCode(): number {
    return elementHash(this.element);
  }

  toString(): string {
    return `PivotYearCodec[element=${this.element.name}]`;
  }

  private resolvePivotYear(attributes: AttributeQuery, quickPath: boolean): number {
    const pivotYear = quickPath
      ? this.settings.pivotYear
      : attributes.get("pivotYear", this.settings.pivotYear);
    return checkPivotYear(pivotYear);
  }

  private resolveZeroDigit(attributes: AttributeQuery, quickPath: boolean): string {
    return quickPath ? this.settings.zeroDigit : attributes.get("zeroDigit", ASCII_ZERO);
  }
}

/** Length of the digit run in [from, limit). Read-only. */
function digitRunLength(text: string, from: number, limit: number, zero: number): number {
  let count = 0;
  for (let i = from; i < limit; i++) {
    const digit = text.charCodeAt(i) - zero;
    if (digit < 0 || digit > 9) break;
    count++;
  }
  return count;
}

/** Moves ASCII digits into the digit system whose zero is zeroDigit. */
function shiftDigits(digits: string, zeroDigit: string): string {
  const diff = zeroDigit.charCodeAt(0) - ASCII_ZERO.charCodeAt(0);
  let shifted = "";
  for (let i = 0; i < digits.length; i++) {
    shifted += String.fromCharCode(digits.charCodeAt(i) + diff);
  }
  return shifted;
}
