/**
 * Runtime type guard tests for @wcam/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import { isTokenEventType, isTokenEvent, isPermitMessage } from "../src/guards.js";

const ALICE = "0x1111111111111111111111111111111111111111";
const BOB = "0x2222222222222222222222222222222222222222";
const ZERO = "0x0000000000000000000000000000000000000000";

// =============================================================================
// Event guards
// =============================================================================

describe("isTokenEventType", () => {
  it("accepts every known event type", () => {
    for (const type of ["Transfer", "Approval", "Deposit", "Withdrawal"]) {
      expect(isTokenEventType(type)).toBe(true);
    }
  });

  it("rejects unknown or differently cased names", () => {
    expect(isTokenEventType("transfer")).toBe(false);
    expect(isTokenEventType("Mint")).toBe(false);
    expect(isTokenEventType(1)).toBe(false);
    expect(isTokenEventType(undefined)).toBe(false);
  });
});

describe("isTokenEvent", () => {
  it("accepts a mint-shaped Transfer", () => {
    expect(isTokenEvent({ type: "Transfer", from: ZERO, to: ALICE, value: 0n })).toBe(true);
  });

  it("accepts Approval, Deposit and Withdrawal", () => {
    expect(isTokenEvent({ type: "Approval", owner: ALICE, spender: BOB, value: 5n })).toBe(true);
    expect(isTokenEvent({ type: "Deposit", account: ALICE, amount: 5n })).toBe(true);
    expect(isTokenEvent({ type: "Withdrawal", account: BOB, amount: 1n })).toBe(true);
  });

  it("rejects string amounts", () => {
    expect(isTokenEvent({ type: "Transfer", from: ALICE, to: BOB, value: "5" })).toBe(false);
  });

  it("rejects negative amounts", () => {
    expect(isTokenEvent({ type: "Deposit", account: ALICE, amount: -1n })).toBe(false);
  });

  it("rejects malformed addresses", () => {
    expect(isTokenEvent({ type: "Transfer", from: "0x12", to: BOB, value: 1n })).toBe(false);
    expect(isTokenEvent({ type: "Deposit", account: "alice", amount: 1n })).toBe(false);
  });

  it("rejects fields belonging to another event type", () => {
    expect(isTokenEvent({ type: "Deposit", from: ALICE, to: BOB, value: 1n })).toBe(false);
  });

  it("rejects null, primitives and unknown types", () => {
    expect(isTokenEvent(null)).toBe(false);
    expect(isTokenEvent("Transfer")).toBe(false);
    expect(isTokenEvent({ type: "Mint", account: ALICE, amount: 1n })).toBe(false);
  });
});

// =============================================================================
// Permit guards
// =============================================================================

describe("isPermitMessage", () => {
  const valid = {
    owner: ALICE,
    spender: BOB,
    value: 10n,
    nonce: 0n,
    deadline: 1_700_000_000n,
  };

  it("accepts a well-formed message", () => {
    expect(isPermitMessage(valid)).toBe(true);
  });

  it("rejects a missing nonce", () => {
    const { nonce: _nonce, ...rest } = valid;
    expect(isPermitMessage(rest)).toBe(false);
  });

  it("rejects a numeric deadline", () => {
    expect(isPermitMessage({ ...valid, deadline: 1_700_000_000 })).toBe(false);
  });

  it("rejects a malformed spender", () => {
    expect(isPermitMessage({ ...valid, spender: "0xnothex" })).toBe(false);
  });
});
