/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Amounts travel as decimal strings of base units and are parsed to
 * bigint here; responses turn every bigint back into a string.
 */

import { getAddress, isAddress, isHex, maxUint256, type Address, type Hex } from "viem";
import { z } from "zod";
import type { JournalEntry, TokenEventType } from "@wcam/types";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Unsigned 256-bit integer as a decimal string, e.g. "1000000000000000000". */
export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative integer in base units")
  .transform((v) => BigInt(v))
  .refine((v) => v <= maxUint256, "Amount exceeds 2^256 - 1");

export const AddressSchema = z
  .string()
  .refine((v) => isAddress(v, { strict: false }), "Expected a 20-byte hex address")
  .transform((v): Address => getAddress(v));

export const HexSchema = z
  .string()
  .refine((v): v is Hex => isHex(v, { strict: true }), "Expected 0x-prefixed hex");

// =============================================================================
// Operation DTOs
// =============================================================================

export const DepositSchema = z.object({
  amount: AmountSchema,
  recipient: AddressSchema.optional(),
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const WithdrawSchema = z.object({
  amount: AmountSchema,
  recipient: AddressSchema.optional(),
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const WithdrawFromSchema = z.object({
  owner: AddressSchema,
  recipient: AddressSchema,
  amount: AmountSchema,
});

export type WithdrawFromDto = z.infer<typeof WithdrawFromSchema>;

export const TransferSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const TransferFromSchema = z.object({
  from: AddressSchema,
  to: AddressSchema,
  amount: AmountSchema,
});

export type TransferFromDto = z.infer<typeof TransferFromSchema>;

export const ApproveSchema = z.object({
  spender: AddressSchema,
  amount: AmountSchema,
});

export type ApproveDto = z.infer<typeof ApproveSchema>;

export const PermitSchema = z.object({
  owner: AddressSchema,
  spender: AddressSchema,
  value: AmountSchema,
  deadline: AmountSchema,
  signature: HexSchema,
});

export type PermitDto = z.infer<typeof PermitSchema>;

// =============================================================================
// Query DTOs
// =============================================================================

const EVENT_TYPES = ["Transfer", "Approval", "Deposit", "Withdrawal"] as const satisfies readonly TokenEventType[];

export const ListEventsQuerySchema = z.object({
  from: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  type: z.enum(EVENT_TYPES).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Response DTOs
// =============================================================================

export type EventDto =
  | { readonly sequence: number; readonly type: "Transfer"; readonly from: Address; readonly to: Address; readonly value: string }
  | { readonly sequence: number; readonly type: "Approval"; readonly owner: Address; readonly spender: Address; readonly value: string }
  | { readonly sequence: number; readonly type: "Deposit" | "Withdrawal"; readonly account: Address; readonly amount: string };

export function toEventDto(entry: JournalEntry): EventDto {
  const { sequence, event } = entry;
  switch (event.type) {
    case "Transfer":
      return { sequence, type: event.type, from: event.from, to: event.to, value: event.value.toString() };
    case "Approval":
      return { sequence, type: event.type, owner: event.owner, spender: event.spender, value: event.value.toString() };
    case "Deposit":
    case "Withdrawal":
      return { sequence, type: event.type, account: event.account, amount: event.amount.toString() };
  }
}

export interface ReceiptDto {
  readonly events: readonly EventDto[];
}

export function toReceiptDto(events: readonly JournalEntry[]): ReceiptDto {
  return { events: events.map(toEventDto) };
}
