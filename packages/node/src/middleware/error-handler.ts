/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps ledger and rail errors to HTTP status codes by their code.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { LedgerError, ValueTransferError } from "@wcam/ledger";
import type { LedgerErrorCode, LedgerErrorDetails, ValueTransferFailure } from "@wcam/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import type { ApiErrorCode, ErrorCode } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 500 | 502;

const STATUS_MAP: Record<LedgerErrorCode | ValueTransferFailure, ErrorStatus> = {
  // Malformed input
  INVALID_AMOUNT: 400,
  INVALID_ADDRESS: 400,
  INVALID_RECIPIENT: 400,
  INVALID_SENDER: 400,
  INVALID_SPENDER: 400,
  INVALID_APPROVER: 400,
  INVALID_SIGNATURE: 400,

  // Authorization conflicts
  SIGNER_MISMATCH: 409,
  EXPIRED_AUTHORIZATION: 409,

  // Refused by ledger rules
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_ALLOWANCE: 422,
  SELF_TRANSFER_FORBIDDEN: 422,
  ARITHMETIC_OVERFLOW: 422,
  INSUFFICIENT_FUNDS: 422,

  // Native asset could not be delivered
  RELEASE_FAILED: 502,
  REJECTED: 502,

  ARITHMETIC_UNDERFLOW: 500,
};

const HTTP_CODES: Partial<Record<number, ApiErrorCode>> = {
  400: "VALIDATION_ERROR",
  401: "UNAUTHORIZED",
  403: "FORBIDDEN",
  404: "NOT_FOUND",
};

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  if (err instanceof LedgerError) {
    return respond(c, STATUS_MAP[err.code], err.code, err.message, err.details);
  }

  if (err instanceof ValueTransferError) {
    return respond(c, STATUS_MAP[err.reason], err.reason, err.message);
  }

  if (err instanceof HTTPException) {
    const code = HTTP_CODES[err.status] ?? "INTERNAL_ERROR";
    return c.json(createErrorEnvelope(code, err.message), err.status);
  }

  return respond(c, 500, "INTERNAL_ERROR", err.message);
}

function respond(
  c: Context<AppEnv>,
  status: ErrorStatus,
  code: ErrorCode,
  message: string,
  details?: LedgerErrorDetails,
): Response {
  // Don't leak internal details
  const safeMessage = status === 500 ? "Internal server error" : message;
  const envelope = createErrorEnvelope(
    code,
    safeMessage,
    details !== undefined && status !== 500 ? { ...details } : undefined,
  );
  return c.json(envelope, status);
}
