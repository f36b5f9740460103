/**
 * @wcam/ledger — Escrow-backed wrapped-asset ledger engine.
 *
 * Accepts deposits of a native asset, mints units 1:1 against them,
 * redeems units for the same asset, and moves units by direct transfer,
 * allowance, or EIP-2612 style signed permit.
 *
 * Invariants:
 * - totalSupply equals the sum of all balances
 * - totalSupply equals the escrowed asset (1:1 backing)
 * - No balance or allowance is ever negative
 * - Nothing is ever sent to the ledger's own account
 * - A permit is accepted at most once
 *
 * Design rules:
 * - All arithmetic is bigint, trapped at 256 bits
 * - Fail-closed: invalid operations throw LedgerError
 * - Failed operations leave no partial state
 * - Each store has exactly one writer
 */

// Facade
export { WrappedToken } from "./wrapped-token.js";
export type { WrappedTokenOptions, PermitRequest } from "./wrapped-token.js";

// Components
export { BalanceLedger } from "./balances.js";
export type { TransferPort } from "./balances.js";
export { AllowanceTable } from "./allowances.js";
export type { AllowanceCapability } from "./allowances.js";
export { PermitAuthority, PERMIT_TYPES } from "./permit.js";
export { TransferGuard } from "./transfer-guard.js";
export { AssetEscrow } from "./escrow.js";
export { DepositWithdraw } from "./deposit-withdraw.js";
export type { DepositWithdrawDeps } from "./deposit-withdraw.js";
export { EventJournal } from "./journal.js";
export type { JournalListener, ListenerErrorHandler, Subscription } from "./journal.js";
export { Transactor } from "./transactor.js";
export type { Checkpointable, Rollback } from "./transactor.js";

// Native asset rail
export { InMemoryValueRail, ValueTransferError } from "./value-rail.js";
export type { ValueRail, ValueTransferFailure, ReceiveHandler } from "./value-rail.js";

// Signatures
export { recoverSigner } from "./signature.js";

// Accounts & amounts
export { NULL_ACCOUNT, toAccount, isNullAccount } from "./accounts.js";
export {
  MAX_UINT256,
  UNLIMITED_ALLOWANCE,
  assertAmount,
  checkedAdd,
  checkedSub,
  parseAmount,
  formatAmount,
} from "./amount-math.js";

// Types
export type {
  LedgerErrorCode,
  LedgerErrorDetails,
  Clock,
  SignatureRecovery,
  EventSink,
  OperationReceipt,
  BackingReport,
  Eip712DomainInfo,
} from "./types.js";

export { LedgerError } from "./types.js";
