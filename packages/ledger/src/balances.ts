/**
 * @wcam/ledger — Balance ledger.
 *
 * Sole owner of account balances and total supply.
 *
 * Invariants:
 * - Sum of all balances equals total supply after every mutation
 * - No balance is ever negative, even between the two halves of a transfer
 * - Zero balances are not stored (absent and zero are the same)
 */

import type { Address } from "viem";
import { isNullAccount, NULL_ACCOUNT } from "./accounts.js";
import { checkedAdd, checkedSub } from "./amount-math.js";
import type { Checkpointable, Rollback } from "./transactor.js";
import type { EventSink } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Moves units between two accounts. Implemented by the raw ledger and
 * by policies that decorate it.
 */
export interface TransferPort {
  transfer(from: Address, to: Address, amount: bigint): void;
}

export class BalanceLedger implements TransferPort, Checkpointable {
  private _balances = new Map<Address, bigint>();
  private _totalSupply = 0n;

  constructor(private readonly _emit: EventSink) {}

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(account: Address): bigint {
    return this._balances.get(account) ?? 0n;
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  /** Every account with a non-zero balance. */
  holders(): readonly (readonly [Address, bigint])[] {
    return [...this._balances.entries()];
  }

  sumOfBalances(): bigint {
    let sum = 0n;
    for (const balance of this._balances.values()) {
      sum += balance;
    }
    return sum;
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Create `amount` units for `to`. A zero mint is legal and still
   * records a Transfer from the null account.
   */
  mint(to: Address, amount: bigint): void {
    if (isNullAccount(to)) {
      throw new LedgerError("INVALID_RECIPIENT", "Cannot mint to the null account", { account: to });
    }

    const supply = checkedAdd(this._totalSupply, amount);
    const balance = checkedAdd(this.balanceOf(to), amount);

    this._totalSupply = supply;
    this._set(to, balance);
    this._emit({ type: "Transfer", from: NULL_ACCOUNT, to, value: amount });
  }

  /**
   * Destroy `amount` units held by `from`.
   */
  burn(from: Address, amount: bigint): void {
    if (isNullAccount(from)) {
      throw new LedgerError("INVALID_SENDER", "Cannot burn from the null account", { account: from });
    }

    const balance = this._requireBalance(from, amount);

    this._set(from, balance - amount);
    this._totalSupply = checkedSub(this._totalSupply, amount);
    this._emit({ type: "Transfer", from, to: NULL_ACCOUNT, value: amount });
  }

  /**
   * Raw transfer. No policy beyond balance and null-account checks;
   * caller-facing entry points go through TransferGuard.
   */
  transfer(from: Address, to: Address, amount: bigint): void {
    if (isNullAccount(from)) {
      throw new LedgerError("INVALID_SENDER", "Cannot transfer from the null account", { account: from });
    }
    if (isNullAccount(to)) {
      throw new LedgerError("INVALID_RECIPIENT", "Cannot transfer to the null account", { account: to });
    }

    const fromBalance = this._requireBalance(from, amount);

    // Both sides are computed before either is written.
    const debited = fromBalance - amount;
    const credited = from === to ? fromBalance : checkedAdd(this.balanceOf(to), amount);

    this._set(from, debited);
    this._set(to, credited);
    this._emit({ type: "Transfer", from, to, value: amount });
  }

  checkpoint(): Rollback {
    const balances = new Map(this._balances);
    const totalSupply = this._totalSupply;
    return () => {
      this._balances = balances;
      this._totalSupply = totalSupply;
    };
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _requireBalance(account: Address, amount: bigint): bigint {
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Insufficient balance for ${account}: has ${balance.toString()}, needs ${amount.toString()}`,
        { account, balance: balance.toString(), needed: amount.toString() },
      );
    }
    return balance;
  }

  private _set(account: Address, balance: bigint): void {
    if (balance === 0n) {
      this._balances.delete(account);
    } else {
      this._balances.set(account, balance);
    }
  }
}
