/**
 * Token Types
 *
 * Notifications emitted by the ledger for external observers.
 * Every balance change is a Transfer; minting comes from the null
 * account and burning goes to it.
 *
 * Rules:
 * - Amounts are bigint base units (no floating point)
 * - Addresses are checksummed
 * - Events are immutable once recorded
 */

import type { Address } from "viem";

/**
 * Units moved between two accounts.
 * `from` is the null account for a mint, `to` is the null account for a burn.
 */
export interface TransferEvent {
  readonly type: "Transfer";
  readonly from: Address;
  readonly to: Address;
  readonly value: bigint;
}

/**
 * An allowance was set or consumed. `value` is the allowance remaining.
 */
export interface ApprovalEvent {
  readonly type: "Approval";
  readonly owner: Address;
  readonly spender: Address;
  readonly value: bigint;
}

/**
 * The native asset was escrowed and units were minted to `account`.
 */
export interface DepositEvent {
  readonly type: "Deposit";
  readonly account: Address;
  readonly amount: bigint;
}

/**
 * Units owned by `account` were burned for release of the native asset.
 */
export interface WithdrawalEvent {
  readonly type: "Withdrawal";
  readonly account: Address;
  readonly amount: bigint;
}

export type TokenEvent =
  | TransferEvent
  | ApprovalEvent
  | DepositEvent
  | WithdrawalEvent;

export type TokenEventType = TokenEvent["type"];

/**
 * A committed event with its position in the ledger's journal.
 */
export interface JournalEntry {
  /** 1-based, strictly increasing */
  readonly sequence: number;
  readonly event: TokenEvent;
}

/**
 * Static description of a wrapped token.
 */
export interface TokenMetadata {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  /** The ledger's own account identity */
  readonly address: Address;
  readonly chainId: number;
}
