/**
 * Permit Types
 *
 * Off-chain signed allowance changes (EIP-2612 shape).
 */

import type { Address, Hex } from "viem";

/**
 * The struct an owner signs. `nonce` must equal the owner's current
 * nonce when the permit is submitted.
 */
export interface PermitMessage {
  readonly owner: Address;
  readonly spender: Address;
  readonly value: bigint;
  readonly nonce: bigint;
  /** Unix seconds; the permit is valid up to and including this second */
  readonly deadline: bigint;
}

/**
 * EIP-712 domain separating one ledger instance from every other
 * ledger and network.
 */
export interface PermitDomain {
  readonly name: string;
  readonly version: string;
  readonly chainId: number;
  readonly verifyingContract: Address;
}

/**
 * A permit as submitted by any relayer. The nonce is not part of the
 * request: the verifier binds the owner's current nonce itself.
 */
export interface SignedPermit {
  readonly owner: Address;
  readonly spender: Address;
  readonly value: bigint;
  readonly deadline: bigint;
  /** 65-byte r || s || v signature, hex encoded */
  readonly signature: Hex;
}
