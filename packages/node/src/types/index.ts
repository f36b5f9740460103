/**
 * Type barrel — re-exports all public types from @wcam/node.
 */

// DTOs
export {
  AmountSchema,
  AddressSchema,
  HexSchema,
  DepositSchema,
  WithdrawSchema,
  WithdrawFromSchema,
  TransferSchema,
  TransferFromSchema,
  ApproveSchema,
  PermitSchema,
  ListEventsQuerySchema,
  toEventDto,
  toReceiptDto,
} from "./dto.js";
export type {
  DepositDto,
  WithdrawDto,
  WithdrawFromDto,
  TransferDto,
  TransferFromDto,
  ApproveDto,
  PermitDto,
  ListEventsQuery,
  EventDto,
  ReceiptDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorCode, ErrorDetail, ErrorDetails, ErrorEnvelope, ValidationIssue } from "./error.js";

// Auth
export type { CallerIdentity, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
