/**
 * Runtime configuration — attribute defaults from the environment.
 * Keeps process.env out of domain/.
 */

import {
  createAttributes,
  isLeniency,
  type AttributeQuery,
  type FormatAttributeValues,
} from "../domain/attributes.js";
import { ConfigurationError } from "../domain/errors.js";

export type Env = Readonly<Record<string, string | undefined>>;

const ENV_PREFIX = "CHRONO_";

const KNOWN_VARIABLES = new Set([
  "CHRONO_PIVOT_YEAR",
  "CHRONO_LENIENCY",
  "CHRONO_ZERO_DIGIT",
  "CHRONO_PROTECTED_CHARACTERS",
]);

function parseInteger(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === "" || !Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer`, { name, value: raw });
  }
  return value;
}

/**
 * Reads CHRONO_PIVOT_YEAR, CHRONO_LENIENCY, CHRONO_ZERO_DIGIT and
 * CHRONO_PROTECTED_CHARACTERS. Unset variables leave the attribute absent.
 */
export function loadFormatAttributes(env: Env = process.env): AttributeQuery {
  for (const name of Object.keys(env)) {
    if (name.startsWith(ENV_PREFIX) && !KNOWN_VARIABLES.has(name)) {
      console.warn(`Ignoring unknown format setting ${name}`);
    }
  }

  const values: {
    -readonly [K in keyof FormatAttributeValues]?: FormatAttributeValues[K];
  } = {};

  const pivotYear = env.CHRONO_PIVOT_YEAR;
  if (pivotYear !== undefined) {
    values.pivotYear = parseInteger("CHRONO_PIVOT_YEAR", pivotYear);
  }

  const leniency = env.CHRONO_LENIENCY;
  if (leniency !== undefined) {
    const mode = leniency.trim().toUpperCase();
    if (!isLeniency(mode)) {
      throw new ConfigurationError("CHRONO_LENIENCY must be STRICT, SMART or LAX", {
        value: leniency,
      });
    }
    values.leniency = mode;
  }

  const zeroDigit = env.CHRONO_ZERO_DIGIT;
  if (zeroDigit !== undefined) {
    values.zeroDigit = zeroDigit;
  }

  const protectedCharacters = env.CHRONO_PROTECTED_CHARACTERS;
  if (protectedCharacters !== undefined) {
    values.protectedCharacters = parseInteger("CHRONO_PROTECTED_CHARACTERS", protectedCharacters);
  }

  return createAttributes(values);
}
