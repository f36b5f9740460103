/**
 * @wcam/ledger — WrappedToken.
 *
 * One ledger instance: a native asset escrowed 1:1 against fungible
 * units that can be transferred, approved, permitted and redeemed.
 *
 * API surface:
 * - deposit() / depositTo() / receive() — escrow and mint
 * - withdraw() / withdrawTo() / withdrawFrom() — burn and release
 * - transfer() / transferFrom() — move units (never to the ledger itself)
 * - approve() / permit() — set allowances by call or by signature
 * - balanceOf(), allowance(), totalSupply, nonces(), custody — queries
 * - events() / subscribe() — committed notifications
 * - verifyBacking() — the conservation invariant, checked on demand
 *
 * Every mutating call is applied atomically: it either commits in full
 * and returns a receipt, or throws a LedgerError and changes nothing.
 */

import type { Address, Hex } from "viem";
import type { JournalEntry, SignedPermit, TokenMetadata } from "@wcam/types";
import { toAccount } from "./accounts.js";
import { AllowanceTable } from "./allowances.js";
import { assertAmount } from "./amount-math.js";
import { BalanceLedger } from "./balances.js";
import { DepositWithdraw } from "./deposit-withdraw.js";
import { AssetEscrow } from "./escrow.js";
import { EventJournal } from "./journal.js";
import type { JournalListener, ListenerErrorHandler, Subscription } from "./journal.js";
import { PermitAuthority } from "./permit.js";
import { TransferGuard } from "./transfer-guard.js";
import { Transactor } from "./transactor.js";
import type {
  BackingReport,
  Clock,
  Eip712DomainInfo,
  OperationReceipt,
  SignatureRecovery,
} from "./types.js";
import type { ValueRail } from "./value-rail.js";

export interface WrappedTokenOptions {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  /** The ledger's own account identity */
  readonly address: string;
  readonly chainId: number;
  /** EIP-712 domain version. Default: "1" */
  readonly version?: string | undefined;
  /** Carries the native asset being escrowed */
  readonly rail: ValueRail;
  /** Unix seconds. Default: wall clock */
  readonly clock?: Clock | undefined;
  /** Default: secp256k1 recovery */
  readonly recoverSigner?: SignatureRecovery | undefined;
  /** Errors thrown by subscribers. Default: rethrown on a later microtask */
  readonly onListenerError?: ListenerErrorHandler | undefined;
}

/** A signed permit as submitted by a relayer, before validation. */
export interface PermitRequest {
  readonly owner: string;
  readonly spender: string;
  readonly value: bigint;
  readonly deadline: bigint;
  readonly signature: Hex;
}

const wallClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));

export class WrappedToken {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly address: Address;
  readonly chainId: number;

  private readonly _journal: EventJournal;
  private readonly _balances: BalanceLedger;
  private readonly _allowances: AllowanceTable;
  private readonly _permits: PermitAuthority;
  private readonly _escrow: AssetEscrow;
  private readonly _guard: TransferGuard;
  private readonly _vault: DepositWithdraw;
  private readonly _tx: Transactor;

  constructor(options: WrappedTokenOptions) {
    this.name = options.name;
    this.symbol = options.symbol;
    this.decimals = options.decimals;
    this.address = toAccount(options.address, "ledger address");
    this.chainId = options.chainId;
    this._journal = new EventJournal(options.onListenerError);

    const emit = this._journal.record.bind(this._journal);

    this._balances = new BalanceLedger(emit);
    this._allowances = new AllowanceTable(emit);
    this._permits = new PermitAuthority(
      {
        name: options.name,
        version: options.version ?? "1",
        chainId: options.chainId,
        verifyingContract: this.address,
      },
      this._allowances,
      options.clock ?? wallClock,
      options.recoverSigner,
    );
    this._escrow = new AssetEscrow(options.rail, this.address);
    this._guard = new TransferGuard(this._balances, this.address);
    this._vault = new DepositWithdraw({
      ledger: this._balances,
      allowances: this._allowances,
      escrow: this._escrow,
      guard: this._guard,
      emit,
    });

    this._tx = new Transactor(
      [this._balances, this._allowances, this._permits, this._escrow, this._journal],
      () => {
        this._journal.commit();
      },
    );
  }

  // ─── Metadata & Queries ──────────────────────────────────────────────

  get metadata(): TokenMetadata {
    return {
      name: this.name,
      symbol: this.symbol,
      decimals: this.decimals,
      address: this.address,
      chainId: this.chainId,
    };
  }

  get totalSupply(): bigint {
    return this._balances.totalSupply;
  }

  /** Native asset escrowed according to the ledger's accounting. */
  get custody(): bigint {
    return this._escrow.custody;
  }

  balanceOf(account: string): bigint {
    return this._balances.balanceOf(toAccount(account, "account"));
  }

  allowance(owner: string, spender: string): bigint {
    return this._allowances.allowance(toAccount(owner, "owner"), toAccount(spender, "spender"));
  }

  nonces(owner: string): bigint {
    return this._permits.nonces(toAccount(owner, "owner"));
  }

  domainSeparator(): Hex {
    return this._permits.domainSeparator();
  }

  eip712Domain(): Eip712DomainInfo {
    return this._permits.eip712Domain();
  }

  /** Digest an owner must sign for a permit at a given nonce. */
  permitDigest(owner: string, spender: string, value: bigint, nonce: bigint, deadline: bigint): Hex {
    return this._permits.digest({
      owner: toAccount(owner, "owner"),
      spender: toAccount(spender, "spender"),
      value: assertAmount(value, "value"),
      nonce: assertAmount(nonce, "nonce"),
      deadline: assertAmount(deadline, "deadline"),
    });
  }

  // ─── Deposit & Withdraw ──────────────────────────────────────────────

  deposit(caller: string, amount: bigint): OperationReceipt {
    const from = toAccount(caller, "caller");
    const value = assertAmount(amount);
    return this._execute(() => this._vault.deposit(from, value));
  }

  depositTo(caller: string, recipient: string, amount: bigint): OperationReceipt {
    const from = toAccount(caller, "caller");
    const to = toAccount(recipient, "recipient");
    const value = assertAmount(amount);
    return this._execute(() => this._vault.depositTo(from, to, value));
  }

  /**
   * The native asset arrived with no operation selected.
   * Same as deposit() for the received amount.
   */
  receive(caller: string, amount: bigint): OperationReceipt {
    return this.deposit(caller, amount);
  }

  withdraw(caller: string, amount: bigint): OperationReceipt {
    const from = toAccount(caller, "caller");
    const value = assertAmount(amount);
    return this._execute(() => this._vault.withdraw(from, value));
  }

  withdrawTo(caller: string, recipient: string, amount: bigint): OperationReceipt {
    const from = toAccount(caller, "caller");
    const to = toAccount(recipient, "recipient");
    const value = assertAmount(amount);
    return this._execute(() => this._vault.withdrawTo(from, to, value));
  }

  withdrawFrom(caller: string, owner: string, recipient: string, amount: bigint): OperationReceipt {
    const spender = toAccount(caller, "caller");
    const from = toAccount(owner, "owner");
    const to = toAccount(recipient, "recipient");
    const value = assertAmount(amount);
    return this._execute(() => this._vault.withdrawFrom(spender, from, to, value));
  }

  // ─── Transfers & Allowances ──────────────────────────────────────────

  transfer(caller: string, to: string, amount: bigint): OperationReceipt {
    const from = toAccount(caller, "caller");
    const dest = toAccount(to, "recipient");
    const value = assertAmount(amount);
    return this._execute(() => this._guard.transfer(from, dest, value));
  }

  transferFrom(caller: string, from: string, to: string, amount: bigint): OperationReceipt {
    const spender = toAccount(caller, "caller");
    const owner = toAccount(from, "owner");
    const dest = toAccount(to, "recipient");
    const value = assertAmount(amount);
    return this._execute(() => {
      this._guard.check(dest);
      this._allowances.spend(owner, spender, value);
      this._guard.transfer(owner, dest, value);
    });
  }

  approve(caller: string, spender: string, amount: bigint): OperationReceipt {
    const owner = toAccount(caller, "caller");
    const approved = toAccount(spender, "spender");
    const value = assertAmount(amount);
    return this._execute(() => this._allowances.approve(owner, approved, value));
  }

  /**
   * Apply a signed allowance change. Anyone may submit it.
   */
  permit(permit: PermitRequest): OperationReceipt {
    const request: SignedPermit = {
      owner: toAccount(permit.owner, "owner"),
      spender: toAccount(permit.spender, "spender"),
      value: assertAmount(permit.value, "value"),
      deadline: assertAmount(permit.deadline, "deadline"),
      signature: permit.signature,
    };
    return this._execute(() => this._permits.verify(request));
  }

  // ─── Events ──────────────────────────────────────────────────────────

  events(fromSequence = 1, maxCount?: number): readonly JournalEntry[] {
    return this._journal.read(fromSequence, maxCount);
  }

  subscribe(listener: JournalListener): Subscription {
    return this._journal.subscribe(listener);
  }

  // ─── Invariants ──────────────────────────────────────────────────────

  verifyBacking(): BackingReport {
    const totalSupply = this._balances.totalSupply;
    const balanceSum = this._balances.sumOfBalances();
    const custody = this._escrow.custody;
    const held = this._escrow.held;
    return {
      totalSupply,
      balanceSum,
      custody,
      held,
      backed: totalSupply === balanceSum && totalSupply === custody && held === custody,
    };
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _execute(operation: () => void): OperationReceipt {
    const nested = this._tx.active;
    const head = this._journal.head;
    this._tx.run(operation);
    return { events: nested ? [] : this._journal.read(head + 1) };
  }
}
