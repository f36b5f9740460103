/**
 * Shared fixtures for @wcam/ledger tests.
 */

import { privateKeyToAccount } from "viem/accounts";
import type { Address } from "viem";
import { InMemoryValueRail } from "../src/value-rail.js";
import { WrappedToken } from "../src/wrapped-token.js";
import type { WrappedTokenOptions } from "../src/wrapped-token.js";
import { LedgerError } from "../src/types.js";
import type { LedgerErrorCode } from "../src/types.js";

// ─── Accounts ────────────────────────────────────────────────────────────

export const LEDGER: Address = "0x5000000000000000000000000000000000000005";
export const ALICE: Address = "0x1111111111111111111111111111111111111111";
export const BOB: Address = "0x2222222222222222222222222222222222222222";
export const CAROL: Address = "0x3333333333333333333333333333333333333333";
export const ZERO: Address = "0x0000000000000000000000000000000000000000";

/** Placeholder signing keys, never used outside tests. */
export const OWNER_KEY = `0x${"11".repeat(32)}` as const;
export const OTHER_KEY = `0x${"22".repeat(32)}` as const;
export const owner = privateKeyToAccount(OWNER_KEY);
export const other = privateKeyToAccount(OTHER_KEY);

// ─── Amounts & Time ──────────────────────────────────────────────────────

/** One whole unit at 18 decimals. */
export const ONE = 10n ** 18n;

/** Native funds every named account starts with. */
export const STARTING_FUNDS = 100n * ONE;

export const NOW = 1_700_000_000n;

export const CHAIN_ID = 500;

// ─── Factory ─────────────────────────────────────────────────────────────

export interface TokenFixture {
  readonly token: WrappedToken;
  readonly rail: InMemoryValueRail;
  /** Set the clock the token reads, in unix seconds. */
  setNow(seconds: bigint): void;
}

export function createToken(
  overrides?: Partial<Omit<WrappedTokenOptions, "rail" | "clock">>,
): TokenFixture {
  const rail = new InMemoryValueRail();
  for (const account of [ALICE, BOB, CAROL, owner.address, other.address]) {
    rail.credit(account, STARTING_FUNDS);
  }

  let now = NOW;
  const token = new WrappedToken({
    name: "Wrapped CAM",
    symbol: "WCAM",
    decimals: 18,
    address: LEDGER,
    chainId: CHAIN_ID,
    ...overrides,
    rail,
    clock: () => now,
  });

  return {
    token,
    rail,
    setNow: (seconds) => {
      now = seconds;
    },
  };
}

// ─── Assertions ──────────────────────────────────────────────────────────

/**
 * Run `fn`, which must throw a LedgerError with `code`, and return it.
 */
export function expectLedgerError(fn: () => unknown, code: LedgerErrorCode): LedgerError {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  if (!(caught instanceof LedgerError)) {
    throw new Error(`Expected LedgerError ${code}, got ${String(caught)}`);
  }
  if (caught.code !== code) {
    throw new Error(`Expected LedgerError ${code}, got ${caught.code}: ${caught.message}`);
  }
  return caught;
}
