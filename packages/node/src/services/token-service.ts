/**
 * TokenService — Composition root for the ledger engine.
 *
 * Route handlers delegate to this service; they never touch the engine
 * directly. One service owns one WrappedToken and the in-memory rail
 * that carries the native asset.
 */

import type { Logger } from "pino";
import type { Address, Hex } from "viem";
import {
  InMemoryValueRail,
  LedgerError,
  ValueTransferError,
  WrappedToken,
} from "@wcam/ledger";
import type { BackingReport, OperationReceipt, PermitRequest } from "@wcam/ledger";
import type { JournalEntry, TokenEventType, TokenMetadata } from "@wcam/types";

// =============================================================================
// Configuration
// =============================================================================

export interface TokenServiceConfig {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly version: string;
  readonly chainId: number;
  readonly ledgerAddress: Address;
  /** Native balances credited to the rail at startup */
  readonly genesis?: readonly { readonly account: Address; readonly amount: bigint }[] | undefined;
  /** Unix seconds. Default: wall clock */
  readonly clock?: (() => bigint) | undefined;
}

// =============================================================================
// Views
// =============================================================================

export interface TokenInfo extends TokenMetadata {
  readonly totalSupply: bigint;
  readonly custody: bigint;
  readonly domainSeparator: Hex;
}

export interface AccountInfo {
  readonly address: Address;
  readonly balance: bigint;
  readonly nonce: bigint;
  readonly nativeBalance: bigint;
}

export interface EventQuery {
  readonly from: number;
  readonly limit: number;
  readonly type?: TokenEventType | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class TokenService {
  readonly token: WrappedToken;
  readonly rail: InMemoryValueRail;

  private readonly _log: Logger;

  constructor(config: TokenServiceConfig, logger: Logger) {
    this.rail = new InMemoryValueRail();
    for (const { account, amount } of config.genesis ?? []) {
      if (account.toLowerCase() === config.ledgerAddress.toLowerCase()) {
        throw new Error(`RAIL_GENESIS cannot fund the ledger account ${account}`);
      }
      this.rail.credit(account, amount);
    }

    this.token = new WrappedToken({
      name: config.name,
      symbol: config.symbol,
      decimals: config.decimals,
      address: config.ledgerAddress,
      chainId: config.chainId,
      version: config.version,
      rail: this.rail,
      clock: config.clock,
      onListenerError: (err, entry) => {
        this._log.error({ err, sequence: entry.sequence }, "Journal subscriber failed");
      },
    });

    this._log = logger.child({ ledger: this.token.address });
  }

  // ─── Queries ───────────────────────────────────────────────────────

  info(): TokenInfo {
    return {
      ...this.token.metadata,
      totalSupply: this.token.totalSupply,
      custody: this.token.custody,
      domainSeparator: this.token.domainSeparator(),
    };
  }

  account(address: Address): AccountInfo {
    return {
      address,
      balance: this.token.balanceOf(address),
      nonce: this.token.nonces(address),
      nativeBalance: this.rail.balanceOf(address),
    };
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.token.allowance(owner, spender);
  }

  events(query: EventQuery): readonly JournalEntry[] {
    const entries = this.token.events(query.from);
    const matching = query.type === undefined
      ? entries
      : entries.filter((e) => e.event.type === query.type);
    return matching.slice(0, query.limit);
  }

  backing(): BackingReport {
    return this.token.verifyBacking();
  }

  isReady(): boolean {
    return this.backing().backed;
  }

  // ─── Deposit & Withdraw ────────────────────────────────────────────

  deposit(caller: Address, amount: bigint, recipient?: Address): OperationReceipt {
    return this._run("deposit", caller, () =>
      recipient === undefined
        ? this.token.deposit(caller, amount)
        : this.token.depositTo(caller, recipient, amount),
    );
  }

  withdraw(caller: Address, amount: bigint, recipient?: Address): OperationReceipt {
    return this._run("withdraw", caller, () =>
      recipient === undefined
        ? this.token.withdraw(caller, amount)
        : this.token.withdrawTo(caller, recipient, amount),
    );
  }

  withdrawFrom(caller: Address, owner: Address, recipient: Address, amount: bigint): OperationReceipt {
    return this._run("withdrawFrom", caller, () =>
      this.token.withdrawFrom(caller, owner, recipient, amount),
    );
  }

  // ─── Transfers & Allowances ────────────────────────────────────────

  transfer(caller: Address, to: Address, amount: bigint): OperationReceipt {
    return this._run("transfer", caller, () => this.token.transfer(caller, to, amount));
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): OperationReceipt {
    return this._run("transferFrom", caller, () =>
      this.token.transferFrom(caller, from, to, amount),
    );
  }

  approve(caller: Address, spender: Address, amount: bigint): OperationReceipt {
    return this._run("approve", caller, () => this.token.approve(caller, spender, amount));
  }

  permit(submitter: Address | undefined, request: PermitRequest): OperationReceipt {
    return this._run("permit", submitter, () => this.token.permit(request));
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private _run(
    operation: string,
    caller: Address | undefined,
    fn: () => OperationReceipt,
  ): OperationReceipt {
    try {
      const receipt = fn();
      this._log.info(
        { operation, caller, events: receipt.events.length },
        `${operation} committed`,
      );
      return receipt;
    } catch (err) {
      if (err instanceof LedgerError) {
        this._log.warn({ operation, caller, code: err.code }, `${operation} rejected: ${err.message}`);
      } else if (err instanceof ValueTransferError) {
        this._log.warn({ operation, caller, code: err.reason }, `${operation} rejected: ${err.message}`);
      }
      throw err;
    }
  }
}
