/**
 * Format attributes — typed key/value lookup with caller-supplied defaults.
 */

import { assert } from "./validation.js";

/** How strictly numeric input must match the expected width. */
export type Leniency = "STRICT" | "SMART" | "LAX";

export const LENIENCY_MODES: ReadonlyArray<Leniency> = ["STRICT", "SMART", "LAX"];

export function isLeniency(value: string): value is Leniency {
  return LENIENCY_MODES.some((mode) => mode === value);
}

export function isStrict(leniency: Leniency): boolean {
  return leniency === "STRICT";
}

export interface FormatAttributeValues {
  /** Character representing digit zero in the active digit system. */
  readonly zeroDigit: string;
  readonly leniency: Leniency;
  /** Trailing input characters reserved for fields parsed later. */
  readonly protectedCharacters: number;
  /** Reference year for two-digit years; 100 means "do not window". */
  readonly pivotYear: number;
}

export type AttributeKey = keyof FormatAttributeValues;

export interface AttributeQuery {
  contains(key: AttributeKey): boolean;
  get<K extends AttributeKey>(key: K, defaultValue: FormatAttributeValues[K]): FormatAttributeValues[K];
}

class AttributeSet implements AttributeQuery {
  constructor(private readonly values: Partial<FormatAttributeValues>) {}

  contains(key: AttributeKey): boolean {
    return this.values[key] !== undefined;
  }

  get<K extends AttributeKey>(key: K, defaultValue: FormatAttributeValues[K]): FormatAttributeValues[K] {
    const value = this.values[key];
    return value === undefined ? defaultValue : value;
  }
}

/**
 * Builds an immutable attribute set.
 * Pivot years below 100 are accepted here; the codec rejects them when it resolves one.
 */
export function createAttributes(values: Partial<FormatAttributeValues> = {}): AttributeQuery {
  const { zeroDigit, protectedCharacters, pivotYear } = values;
  if (zeroDigit !== undefined) {
    assert(zeroDigit.length === 1, "Zero digit must be a single character", { zeroDigit });
  }
  if (protectedCharacters !== undefined) {
    assert(
      Number.isInteger(protectedCharacters) && protectedCharacters >= 0,
      "Protected characters must be a non-negative integer",
      { protectedCharacters }
    );
  }
  if (pivotYear !== undefined) {
    assert(Number.isInteger(pivotYear), "Pivot year must be an integer", { pivotYear });
  }
  return new AttributeSet({ ...values });
}

/** Attribute set without any entries; every lookup yields its default. */
export const EMPTY_ATTRIBUTES: AttributeQuery = createAttributes();
