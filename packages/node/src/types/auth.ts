/**
 * Caller identity types.
 *
 * Every mutating request acts on behalf of exactly one account:
 * 1. Secured mode: the account bound to the X-Api-Key header
 * 2. Unsecured mode (dev, tests): the account named by the X-Caller header
 */

import type { Address } from "viem";

// =============================================================================
// Caller
// =============================================================================

/**
 * Resolved caller, set by the auth middleware.
 */
export interface CallerIdentity {
  readonly type: "api-key" | "header";
  readonly account: Address;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly account: Address;
}
