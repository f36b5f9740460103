/**
 * @wcam/ledger — Native asset rail.
 *
 * The ledger consumes the external "send value, fail loudly if rejected"
 * primitive through the ValueRail interface. InMemoryValueRail is the
 * in-process implementation used by the HTTP service and the tests.
 *
 * Receive handlers model recipients that run code when paid: a handler
 * that throws rejects the payment, and every balance change made during
 * that send (including nested sends) is undone.
 *
 * A rail takes part in ledger transactions: a checkpoint taken before
 * an operation undoes every send the operation made, if it fails.
 */

import type { Address } from "viem";
import type { Checkpointable, Rollback } from "./transactor.js";

export interface ValueRail extends Checkpointable {
  balanceOf(account: Address): bigint;
  /**
   * Move `amount` from `from` to `to`.
   * @throws ValueTransferError when the sender is short or the recipient rejects
   */
  send(from: Address, to: Address, amount: bigint): void;
}

export type ValueTransferFailure = "INSUFFICIENT_FUNDS" | "REJECTED";

export class ValueTransferError extends Error {
  public readonly reason: ValueTransferFailure;

  constructor(reason: ValueTransferFailure, message: string, options?: { readonly cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ValueTransferError";
    this.reason = reason;
  }
}

/** Runs when `to` is paid. Throw to reject the payment. */
export type ReceiveHandler = (from: Address, amount: bigint) => void;

export class InMemoryValueRail implements ValueRail {
  private _balances = new Map<Address, bigint>();
  private readonly _handlers = new Map<Address, ReceiveHandler>();

  balanceOf(account: Address): bigint {
    return this._balances.get(account) ?? 0n;
  }

  /** Fund an account from outside the rail (genesis balances, tests). */
  credit(account: Address, amount: bigint): void {
    this._balances.set(account, this.balanceOf(account) + amount);
  }

  onReceive(account: Address, handler: ReceiveHandler): void {
    this._handlers.set(account, handler);
  }

  removeHandler(account: Address): void {
    this._handlers.delete(account);
  }

  checkpoint(): Rollback {
    const balances = new Map(this._balances);
    return () => {
      this._balances = balances;
    };
  }

  send(from: Address, to: Address, amount: bigint): void {
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new ValueTransferError(
        "INSUFFICIENT_FUNDS",
        `${from} holds ${available.toString()}, cannot send ${amount.toString()}`,
      );
    }

    const before = new Map(this._balances);
    this._balances.set(from, available - amount);
    this._balances.set(to, this.balanceOf(to) + amount);

    const handler = this._handlers.get(to);
    if (handler === undefined) {
      return;
    }

    try {
      handler(from, amount);
    } catch (err) {
      this._balances = before;
      throw new ValueTransferError("REJECTED", `${to} rejected a payment of ${amount.toString()}`, {
        cause: err,
      });
    }
  }
}
