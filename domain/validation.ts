/**
 * Domain validation — payload patterns and exhaustiveness checks.
 * Framework-independent.
 */

import type { IsoTimestamp, Uuid } from "./core.js";

const UUID_PATTERN = /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;

const ISO_TIMESTAMP_PATTERN =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d{1,6})?(?:Z|[+-]\d{2}:\d{2})$/;

/** Human-readable pattern names, reported in parse errors. */
export const UUID_EXPECTATION = "UUID (8-4-4-4-12 hex digits)";
export const TIMESTAMP_EXPECTATION = "ISO-8601 timestamp (YYYY-MM-DDTHH:MM:SS[.ffffff] with Z or ±HH:MM)";

export function isUuid(value: string): value is Uuid {
  return UUID_PATTERN.test(value);
}

export function isIsoTimestamp(value: string): value is IsoTimestamp {
  return ISO_TIMESTAMP_PATTERN.test(value);
}

/** Call in unreachable branches (e.g. exhaustive switch). Always throws. */
export function neverReached(value: never, message = "Unreachable"): never {
  throw new Error(`${message}: ${JSON.stringify(value)}`);
}
