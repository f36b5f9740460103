/**
 * Caller identity middleware.
 *
 * Supports two strategies:
 * 1. API key via X-Api-Key header → the account bound to that key
 * 2. Unsecured mode (dev, tests): X-Caller header names the account
 *
 * On success, sets `c.set("caller", identity)`.
 * On failure, returns 401 (or 400 for a malformed X-Caller).
 */

import type { Context, MiddlewareHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { getAddress, isAddress, type Address } from "viem";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller";

// =============================================================================
// Secured Mode
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Require a known X-Api-Key on every request.
 * Returns 401 if it is missing or unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Invalid API key"),
        401,
      );
    }

    c.set("caller", { type: "api-key", account: record.account });
    return next();
  };
}

// =============================================================================
// Unsecured Mode
// =============================================================================

/**
 * Take the caller from X-Caller when present. Requests without it can
 * still read; operations that need a caller reject them.
 */
export function callerHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header(CALLER_HEADER);
    if (header !== undefined) {
      if (!isAddress(header, { strict: false })) {
        return c.json(
          createErrorEnvelope("VALIDATION_ERROR", `${CALLER_HEADER} must be a 20-byte hex address`),
          400,
        );
      }
      c.set("caller", { type: "header", account: getAddress(header) });
    }
    return next();
  };
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * The acting account for an operation.
 *
 * @throws HTTPException 401 when the request carries no caller
 */
export function callerAccount(c: Context<AppEnv>): Address {
  const caller = c.get("caller");
  if (caller === undefined) {
    throw new HTTPException(401, { message: "Caller identity required" });
  }
  return caller.account;
}
