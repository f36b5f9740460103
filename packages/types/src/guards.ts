/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger domain types at system boundaries
 * (query parameters, deserialized data, subscriber payloads).
 */

import type { Address } from "viem";
import type { TokenEvent, TokenEventType } from "./token.js";
import type { PermitMessage } from "./permit.js";

const EVENT_TYPES = new Set<string>(["Transfer", "Approval", "Deposit", "Withdrawal"]);
const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

function isAddressString(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

function isUint(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n;
}

export function isTokenEventType(value: unknown): value is TokenEventType {
  return typeof value === "string" && EVENT_TYPES.has(value);
}

export function isTokenEvent(value: unknown): value is TokenEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  switch (v.type) {
    case "Transfer":
      return isAddressString(v.from) && isAddressString(v.to) && isUint(v.value);
    case "Approval":
      return isAddressString(v.owner) && isAddressString(v.spender) && isUint(v.value);
    case "Deposit":
    case "Withdrawal":
      return isAddressString(v.account) && isUint(v.amount);
    default:
      return false;
  }
}

export function isPermitMessage(value: unknown): value is PermitMessage {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAddressString(v.owner) &&
    isAddressString(v.spender) &&
    isUint(v.value) &&
    isUint(v.nonce) &&
    isUint(v.deadline)
  );
}
