/**
 * @wcam/ledger — Self-custody guard.
 *
 * Units held by the ledger's own account would be backed by escrow that
 * no account can ever redeem. The guard makes that state unreachable:
 * any destination equal to the ledger's identity is rejected before the
 * wrapped port is touched.
 */

import type { Address } from "viem";
import type { TransferPort } from "./balances.js";
import { LedgerError } from "./types.js";

export class TransferGuard implements TransferPort {
  constructor(
    private readonly _inner: TransferPort,
    private readonly _ledgerAccount: Address,
  ) {}

  /**
   * Throws SELF_TRANSFER_FORBIDDEN when `to` is the ledger itself.
   */
  check(to: Address): void {
    if (to === this._ledgerAccount) {
      throw new LedgerError(
        "SELF_TRANSFER_FORBIDDEN",
        `Units cannot be sent to the ledger's own account ${to}`,
        { to },
      );
    }
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    this.check(to);
    this._inner.transfer(from, to, amount);
  }
}
