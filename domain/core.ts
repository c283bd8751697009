/**
 * Domain core — structural primitives only.
 * Framework-independent. No parsing logic.
 */

// --- Branded scalars (safer than plain strings) ---

export type Brand<T, B extends string> = T & { readonly __brand: B };

/** Canonical 8-4-4-4-12 hex UUID. */
export type Uuid = Brand<string, "Uuid">;

/** ISO-8601 instant: date, `T`, time, optional fraction, `Z` or `±HH:MM`. */
export type IsoTimestamp = Brand<string, "IsoTimestamp">;

/** 1-based line number in snapshot source text. */
export type LineNumber = Brand<number, "LineNumber">;

// --- Constructors (no validation; see validation.ts) ---

export const asUuid = (value: string) => value as Uuid;
export const asIsoTimestamp = (value: string) => value as IsoTimestamp;
export const asLineNumber = (n: number) => n as LineNumber;
