/**
 * Validation — assertions.
 * Framework-independent.
 */

import { ConfigurationError, type ErrorMetadata } from "./errors.js";

/** Throws ConfigurationError if condition is falsy. TypeScript narrows after a successful call. */
export function assert(
  condition: unknown,
  message: string,
  metadata?: ErrorMetadata
): asserts condition {
  if (!condition) {
    throw new ConfigurationError(message, metadata);
  }
}

/** Call in unreachable branches (e.g. exhaustive switch). Always throws. */
export function neverReached(value: never, message = "Unreachable"): never {
  throw new Error(`${message}: ${String(value)}`);
}
