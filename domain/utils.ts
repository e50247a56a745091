/**
 * Utilities — pure numeric and hashing helpers.
 * Framework-independent.
 */

/** Modulo whose result has the sign of the divisor (always in [0, divisor) for divisor > 0). */
export function floorMod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

/** 32-bit string hash (31-multiplier polynomial). */
export function hashString(value: string): number {
  let h = 0;
  for (let i = 0; i < value.length; i++) {
    h = (Math.imul(h, 31) + value.charCodeAt(i)) | 0;
  }
  return h;
}

/** 32-bit hash of a finite number. Integers hash to themselves. */
export function hashNumber(value: number): number {
  if (Number.isSafeInteger(value)) {
    // fold high bits in so large epoch values still spread
    return (value ^ Math.floor(value / 0x100000000)) | 0;
  }
  return hashString(String(value));
}

/** Asymmetric combination of two hashes; swapping the arguments changes the result. */
export function combineHashes(first: number, second: number): number {
  return (Math.imul(17, first) + Math.imul(37, second)) | 0;
}
