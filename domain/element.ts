/**
 * Chronological elements — stable field identities.
 *
 * An element is compared by reference. The name is what formatters and
 * codecs inspect: every year-like element has a name starting with "YEAR".
 */

import { hashString } from "./utils.js";

export interface ChronoElement<V> {
  readonly name: string;
  /** Phantom marker for the value type. Never set at runtime. */
  readonly __value?: V;
}

/** Defines a new element. Two calls with the same name yield distinct elements. */
export function defineElement<V>(name: string): ChronoElement<V> {
  return Object.freeze({ name });
}

export function elementHash(element: ChronoElement<unknown>): number {
  return hashString(element.name);
}

// --- Built-in elements ---

export const YEAR: ChronoElement<number> = defineElement<number>("YEAR");
export const YEAR_OF_ERA: ChronoElement<number> = defineElement<number>("YEAR_OF_ERA");
export const MONTH_OF_YEAR: ChronoElement<number> = defineElement<number>("MONTH_OF_YEAR");
export const DAY_OF_MONTH: ChronoElement<number> = defineElement<number>("DAY_OF_MONTH");
