/**
 * @wcam/ledger — Asset escrow.
 *
 * Custody of the native asset backing every minted unit. Owns nothing
 * but a custody counter; the asset itself moves on the ValueRail, whose
 * checkpoint is taken and restored together with the counter.
 */

import type { Address } from "viem";
import { checkedAdd, checkedSub } from "./amount-math.js";
import type { Checkpointable, Rollback } from "./transactor.js";
import { LedgerError } from "./types.js";
import type { ValueRail } from "./value-rail.js";

export class AssetEscrow implements Checkpointable {
  private _custody = 0n;

  constructor(
    private readonly _rail: ValueRail,
    private readonly _account: Address,
  ) {}

  /** Amount received minus amount released. */
  get custody(): bigint {
    return this._custody;
  }

  /** What the ledger account actually holds on the rail. */
  get held(): bigint {
    return this._rail.balanceOf(this._account);
  }

  /**
   * Take `amount` of the native asset from `from` into custody.
   * Rail failures propagate unchanged.
   */
  receive(from: Address, amount: bigint): void {
    this._rail.send(from, this._account, amount);
    this._custody = checkedAdd(this._custody, amount);
  }

  /**
   * Pay `amount` out of custody to `to`. Custody is reduced before the
   * payment leaves, so a recipient re-entering the ledger sees the
   * reduced figure.
   *
   * @throws LedgerError RELEASE_FAILED if the rail refuses the payment
   */
  release(to: Address, amount: bigint): void {
    this._custody = checkedSub(this._custody, amount);
    try {
      this._rail.send(this._account, to, amount);
    } catch (err) {
      throw new LedgerError(
        "RELEASE_FAILED",
        `Release of ${amount.toString()} to ${to} failed: ${err instanceof Error ? err.message : String(err)}`,
        { to, amount: amount.toString() },
        { cause: err },
      );
    }
  }

  checkpoint(): Rollback {
    const custody = this._custody;
    const rail = this._rail.checkpoint();
    return () => {
      rail();
      this._custody = custody;
    };
  }
}
