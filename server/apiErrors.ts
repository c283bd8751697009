/**
 * API error model — standard payload shape.
 * Maps domain/parse errors to HTTP codes.
 */

import {
  DomainError,
  MalformedHeaderError,
  UnterminatedAnnotationsError,
  ValidationError,
} from "../domain/errors.js";

export type ErrorCode =
  | "INVALID_INPUT"
  | "MALFORMED_HEADER"
  | "UNTERMINATED_ANNOTATIONS"
  | "PAYLOAD_TOO_LARGE"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

export interface ApiErrorPayload {
  readonly error: {
    readonly code: ErrorCode;
    readonly message: string;
    readonly details?: Record<string, unknown>;
  };
}

export function apiError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ApiErrorPayload {
  return { error: { code, message, ...(details != null && { details }) } };
}

/** Request body exceeded the configured limit. */
export class PayloadTooLargeError extends DomainError {
  constructor(limitBytes: number) {
    super(`Request body exceeds ${limitBytes} bytes`, { limitBytes });
  }
}

/** HTTP status + payload for a known error; null for anything unexpected. */
export function toApiError(err: unknown): { status: number; payload: ApiErrorPayload } | null {
  if (err instanceof MalformedHeaderError) {
    return { status: 422, payload: apiError("MALFORMED_HEADER", err.message, err.metadata) };
  }
  if (err instanceof UnterminatedAnnotationsError) {
    return { status: 422, payload: apiError("UNTERMINATED_ANNOTATIONS", err.message, err.metadata) };
  }
  if (err instanceof ValidationError) {
    return { status: 400, payload: apiError("INVALID_INPUT", err.message, err.metadata) };
  }
  if (err instanceof PayloadTooLargeError) {
    return { status: 413, payload: apiError("PAYLOAD_TOO_LARGE", err.message, err.metadata) };
  }
  return null;
}
