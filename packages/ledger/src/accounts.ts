/**
 * @wcam/ledger — Account identities.
 *
 * Accounts are EVM addresses. Every address entering the engine is
 * validated and checksummed here so that map keys and comparisons are
 * canonical everywhere else.
 */

import { getAddress, isAddress, zeroAddress, type Address } from "viem";
import { LedgerError } from "./types.js";

/** The null identity: source of mints, destination of burns. */
export const NULL_ACCOUNT: Address = zeroAddress;

/**
 * Validate and checksum an address.
 * Throws LedgerError("INVALID_ADDRESS") if it is not 20 bytes of hex.
 */
export function toAccount(value: string, label = "address"): Address {
  if (typeof value !== "string" || !isAddress(value, { strict: false })) {
    throw new LedgerError("INVALID_ADDRESS", `Invalid ${label}: "${String(value)}"`);
  }
  return getAddress(value);
}

export function isNullAccount(account: Address): boolean {
  return account === NULL_ACCOUNT;
}
