/**
 * @wcam/ledger — Internal types for the ledger engine.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 * - A failed operation leaves no partial state behind
 */

import type { Address, Hex } from "viem";
import type { JournalEntry, TokenEvent } from "@wcam/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "INVALID_RECIPIENT"
  | "INVALID_SENDER"
  | "INVALID_SPENDER"
  | "INVALID_APPROVER"
  | "SELF_TRANSFER_FORBIDDEN"
  | "EXPIRED_AUTHORIZATION"
  | "INVALID_SIGNATURE"
  | "SIGNER_MISMATCH"
  | "RELEASE_FAILED"
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "ARITHMETIC_OVERFLOW"
  | "ARITHMETIC_UNDERFLOW";

/** Values attached to an error for callers that need more than the code. */
export type LedgerErrorDetails = Readonly<Record<string, string>>;

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details: LedgerErrorDetails | undefined;

  constructor(
    code: LedgerErrorCode,
    message: string,
    details?: LedgerErrorDetails,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "LedgerError";
    this.code = code;
    this.details = details;
  }
}

// ─── Collaborators ───────────────────────────────────────────────────────

/** Current time in unix seconds. */
export type Clock = () => bigint;

/**
 * Recovers the signing address from a 32-byte digest and a signature.
 * Returns null when no recovery is possible (malformed signature).
 */
export type SignatureRecovery = (digest: Hex, signature: Hex) => Address | null;

/** Receives every notification recorded by a store. */
export type EventSink = (event: TokenEvent) => void;

// ─── Results ─────────────────────────────────────────────────────────────

/**
 * Result of a committed caller-facing operation.
 * Lists the journal entries the operation produced. Re-entrant calls
 * made while an outer operation is in flight return an empty list:
 * their events commit with the outer operation.
 */
export interface OperationReceipt {
  readonly events: readonly JournalEntry[];
}

/**
 * Snapshot of the 1:1 backing invariant.
 */
export interface BackingReport {
  readonly totalSupply: bigint;
  /** Sum over every account balance */
  readonly balanceSum: bigint;
  /** Escrowed amount according to the ledger's own accounting */
  readonly custody: bigint;
  /** Native asset actually held by the ledger account on the rail */
  readonly held: bigint;
  /** totalSupply == balanceSum == custody == held */
  readonly backed: boolean;
}

/**
 * EIP-5267 style description of the permit domain.
 */
export interface Eip712DomainInfo {
  /** Bitmap of the fields in use: name, version, chainId, verifyingContract */
  readonly fields: Hex;
  readonly name: string;
  readonly version: string;
  readonly chainId: number;
  readonly verifyingContract: Address;
}
