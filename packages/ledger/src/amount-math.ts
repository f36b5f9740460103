/**
 * @wcam/ledger — Unsigned 256-bit amount arithmetic.
 *
 * All amounts are bigint base units. Decimal strings are only used at
 * the edges (display, user input) and are converted via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts live in [0, 2^256 - 1]
 * - Overflow and underflow trap, they never wrap
 */

import { maxUint256 } from "viem";
import { LedgerError } from "./types.js";

/** Largest representable amount. */
export const MAX_UINT256: bigint = maxUint256;

/**
 * Allowance value that is never decremented by spending.
 * Must stay exactly MAX_UINT256.
 */
export const UNLIMITED_ALLOWANCE: bigint = maxUint256;

// ─── Validation ──────────────────────────────────────────────────────────

/**
 * Assert that a value is a representable amount and return it.
 */
export function assertAmount(value: bigint, label = "amount"): bigint {
  if (typeof value !== "bigint" || value < 0n || value > MAX_UINT256) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Invalid ${label}: ${String(value)} is outside the unsigned 256-bit range`,
    );
  }
  return value;
}

// ─── Checked Arithmetic ──────────────────────────────────────────────────

export function checkedAdd(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (sum > MAX_UINT256) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `Addition overflows 256 bits: ${a.toString()} + ${b.toString()}`,
    );
  }
  return sum;
}

export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new LedgerError(
      "ARITHMETIC_UNDERFLOW",
      `Subtraction underflows zero: ${a.toString()} - ${b.toString()}`,
    );
  }
  return a - b;
}

// ─── Decimal Conversion ──────────────────────────────────────────────────

/**
 * Parse a non-negative decimal string into base units.
 *
 * "1.5" with decimals=18 → 1500000000000000000n
 * "100" with decimals=6 → 100000000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const parts = trimmed.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the token allows ${String(decimals)}`,
    );
  }

  return assertAmount(BigInt(intPart + fracPart.padEnd(decimals, "0")));
}

/**
 * Convert base units back to a decimal string with exactly `decimals`
 * fractional digits.
 *
 * 1500000000000000000n with decimals=18 → "1.500000000000000000"
 * 0n with decimals=2 → "0.00"
 */
export function formatAmount(value: bigint, decimals: number): string {
  assertAmount(value);
  if (decimals === 0) {
    return value.toString();
  }

  const str = value.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  return `${intPart}.${fracPart}`;
}
