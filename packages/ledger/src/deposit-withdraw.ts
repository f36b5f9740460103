/**
 * @wcam/ledger — Deposit and withdrawal orchestration.
 *
 * Drives the escrow and the balance ledger together:
 * - deposit: escrow, then mint
 * - withdraw: burn, then release
 *
 * Burn always precedes release. A recipient that re-enters the ledger
 * while being paid already sees the reduced balance, and a refused
 * release surfaces as RELEASE_FAILED so the enclosing transaction
 * rolls the burn back.
 */

import type { Address } from "viem";
import { isNullAccount } from "./accounts.js";
import type { AllowanceTable } from "./allowances.js";
import type { BalanceLedger } from "./balances.js";
import type { AssetEscrow } from "./escrow.js";
import type { TransferGuard } from "./transfer-guard.js";
import type { EventSink } from "./types.js";
import { LedgerError } from "./types.js";

export interface DepositWithdrawDeps {
  readonly ledger: BalanceLedger;
  readonly allowances: AllowanceTable;
  readonly escrow: AssetEscrow;
  readonly guard: TransferGuard;
  readonly emit: EventSink;
}

export class DepositWithdraw {
  constructor(private readonly _deps: DepositWithdrawDeps) {}

  deposit(caller: Address, amount: bigint): void {
    this.depositTo(caller, caller, amount);
  }

  depositTo(caller: Address, recipient: Address, amount: bigint): void {
    const { ledger, escrow, emit } = this._deps;
    this._assertDestination(recipient);

    escrow.receive(caller, amount);
    ledger.mint(recipient, amount);
    emit({ type: "Deposit", account: recipient, amount });
  }

  withdraw(caller: Address, amount: bigint): void {
    this.withdrawTo(caller, caller, amount);
  }

  withdrawTo(caller: Address, recipient: Address, amount: bigint): void {
    this._assertDestination(recipient);
    this._burnAndRelease(caller, recipient, amount);
  }

  /**
   * Redeem `owner`'s units on their behalf, paying `recipient`.
   * Consumes `caller`'s allowance on `owner` first.
   */
  withdrawFrom(caller: Address, owner: Address, recipient: Address, amount: bigint): void {
    this._assertDestination(recipient);
    this._deps.allowances.spend(owner, caller, amount);
    this._burnAndRelease(owner, recipient, amount);
  }

  private _burnAndRelease(owner: Address, recipient: Address, amount: bigint): void {
    const { ledger, escrow, emit } = this._deps;
    ledger.burn(owner, amount);
    emit({ type: "Withdrawal", account: owner, amount });
    escrow.release(recipient, amount);
  }

  private _assertDestination(recipient: Address): void {
    this._deps.guard.check(recipient);
    if (isNullAccount(recipient)) {
      throw new LedgerError("INVALID_RECIPIENT", "Recipient cannot be the null account", { account: recipient });
    }
  }
}
