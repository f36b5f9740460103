/**
 * @wcam/types — Shared domain types for the wrapped-asset ledger.
 *
 * Used by the ledger engine and the HTTP service:
 * - Token notifications (Transfer, Approval, Deposit, Withdrawal)
 * - Permit messages and EIP-712 domains
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - Amounts are bigint base units
 * - No runtime logic beyond type guards
 */

// Token types
export type {
  TransferEvent,
  ApprovalEvent,
  DepositEvent,
  WithdrawalEvent,
  TokenEvent,
  TokenEventType,
  JournalEntry,
  TokenMetadata,
} from "./token.js";

// Permit types
export type {
  PermitMessage,
  PermitDomain,
  SignedPermit,
} from "./permit.js";

// Runtime type guards
export {
  isTokenEventType,
  isTokenEvent,
  isPermitMessage,
} from "./guards.js";
