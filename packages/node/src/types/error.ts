/**
 * Tally error codes and the JSON error envelope.
 *
 * Every error response is
 * { error: { code, message, details? } }
 * where `code` is either an HTTP-layer code or the `code` of the
 * domain error that was thrown.
 */

import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { PersistenceErrorCode } from "@tally/event-store";
import type { ValidationErrorCode } from "@tally/ledger";
import type { ReconcileErrorCode } from "@tally/reconciler";

// ─── Codes ───────────────────────────────────────────────────────────────

/** Raised by the HTTP layer itself, never by the engine. */
export type ApiErrorCode = "VALIDATION_ERROR" | "NOT_FOUND" | "INTERNAL_ERROR";

/** Codes carried by ValidationError, ReconcileError and PersistenceError. */
export type DomainErrorCode = ValidationErrorCode | ReconcileErrorCode | PersistenceErrorCode;

/**
 * Domain codes the caller can act on. A corrupt history and a failing
 * disk are the server's problem and stay out of this set.
 */
export type ClientErrorCode = Exclude<
  ValidationErrorCode | ReconcileErrorCode,
  "MALFORMED_RECORD"
>;

/**
 * Response status per client error code. Keyed by the full union, so a
 * new ValidationErrorCode or ReconcileErrorCode must be given a status here.
 */
export const CLIENT_ERROR_STATUS: Readonly<Record<ClientErrorCode, ContentfulStatusCode>> = {
  // Rejected input
  SPLIT_SUM_MISMATCH: 400,
  NON_POSITIVE_SHARE: 400,
  NON_POSITIVE_AMOUNT: 400,
  DUPLICATE_IDENTITY: 400,
  EMPTY_PARTICIPANTS: 400,
  PAYER_NOT_PARTICIPANT: 400,
  INVALID_AMOUNT: 400,
  INVALID_TIMESTAMP: 400,
  INVALID_IDENTITY: 400,
  INVALID_OPTION: 400,

  // Conflicts with existing history
  DUPLICATE_RECORD_ID: 409,
  REPLAY_DIVERGED: 409,

  // Missing references
  UNKNOWN_GROUP: 404,
};

export function isClientErrorCode(code: string): code is ClientErrorCode {
  return Object.hasOwn(CLIENT_ERROR_STATUS, code);
}

// ─── Envelope ────────────────────────────────────────────────────────────

export interface ErrorDetail {
  /** An ApiErrorCode or DomainErrorCode; unknown codes from foreign errors pass through. */
  readonly code: string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  if (details === undefined) {
    return { error: { code, message } };
  }
  return { error: { code, message, details } };
}
