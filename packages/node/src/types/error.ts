/**
 * Error envelope: the body of every failed request.
 *
 *   { "error": { "code": "INSUFFICIENT_BALANCE", "message": "...", "details": { ... } } }
 *
 * Ledger and rail failures surface under their own code. The codes below
 * cover what the HTTP layer rejects before the ledger is reached.
 */

import type { LedgerErrorCode, LedgerErrorDetails, ValueTransferFailure } from "@wcam/ledger";

export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "INTERNAL_ERROR";

export type ErrorCode = ApiErrorCode | LedgerErrorCode | ValueTransferFailure;

/** One failed field of a request body, query or path parameter. */
export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/** Ledger context (amounts as decimal strings), or the failed fields. */
export type ErrorDetails = LedgerErrorDetails | { readonly issues: readonly ValidationIssue[] };

export interface ErrorDetail {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: ErrorDetails;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(code: ErrorCode, message: string, details?: ErrorDetails): ErrorEnvelope {
  return { error: details === undefined ? { code, message } : { code, message, details } };
}
