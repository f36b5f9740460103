/**
 * @wcam/ledger — Allowance table.
 *
 * Sole owner of (owner, spender) spending limits.
 *
 * Rules:
 * - approve overwrites, it never adds
 * - spend decrements by exactly the amount spent, never below zero
 * - UNLIMITED_ALLOWANCE is never decremented
 */

import type { Address } from "viem";
import { isNullAccount } from "./accounts.js";
import { UNLIMITED_ALLOWANCE } from "./amount-math.js";
import type { Checkpointable, Rollback } from "./transactor.js";
import type { EventSink } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * The one capability shared by the direct approve path (gated by caller
 * identity) and the permit path (gated by signature).
 */
export interface AllowanceCapability {
  approve(owner: Address, spender: Address, amount: bigint): void;
}

export class AllowanceTable implements AllowanceCapability, Checkpointable {
  private _allowances = new Map<Address, Map<Address, bigint>>();

  constructor(private readonly _emit: EventSink) {}

  allowance(owner: Address, spender: Address): bigint {
    return this._allowances.get(owner)?.get(spender) ?? 0n;
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    if (isNullAccount(owner)) {
      throw new LedgerError("INVALID_APPROVER", "The null account cannot approve a spender", { owner });
    }
    if (isNullAccount(spender)) {
      throw new LedgerError("INVALID_SPENDER", "Cannot approve the null account as spender", { spender });
    }

    this._set(owner, spender, amount);
    this._emit({ type: "Approval", owner, spender, value: amount });
  }

  /**
   * Consume `amount` of the allowance `owner` granted to `spender`.
   */
  spend(owner: Address, spender: Address, amount: bigint): void {
    const current = this.allowance(owner, spender);
    if (current === UNLIMITED_ALLOWANCE) {
      return;
    }

    if (current < amount) {
      throw new LedgerError(
        "INSUFFICIENT_ALLOWANCE",
        `Insufficient allowance for ${spender} on ${owner}: has ${current.toString()}, needs ${amount.toString()}`,
        { owner, spender, allowance: current.toString(), needed: amount.toString() },
      );
    }

    const remaining = current - amount;
    this._set(owner, spender, remaining);
    this._emit({ type: "Approval", owner, spender, value: remaining });
  }

  checkpoint(): Rollback {
    const copy = new Map<Address, Map<Address, bigint>>();
    for (const [owner, spenders] of this._allowances) {
      copy.set(owner, new Map(spenders));
    }
    return () => {
      this._allowances = copy;
    };
  }

  private _set(owner: Address, spender: Address, amount: bigint): void {
    let spenders = this._allowances.get(owner);
    if (amount === 0n) {
      spenders?.delete(spender);
      if (spenders?.size === 0) {
        this._allowances.delete(owner);
      }
      return;
    }

    if (spenders === undefined) {
      spenders = new Map();
      this._allowances.set(owner, spenders);
    }
    spenders.set(spender, amount);
  }
}
