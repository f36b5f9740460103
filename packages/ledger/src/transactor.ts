/**
 * @wcam/ledger — All-or-nothing execution across stores.
 *
 * Each store hands out a rollback closure on checkpoint. An operation
 * either returns and keeps every mutation, or throws and every store
 * is put back exactly as it was.
 *
 * Operations may nest (a receive handler on the rail can call back into
 * the ledger while a release is in flight). A nested operation that
 * throws rolls back only its own mutations; commit listeners fire once,
 * when the outermost operation returns.
 */

/** Restores a store to the state captured at checkpoint time. */
export type Rollback = () => void;

export interface Checkpointable {
  checkpoint(): Rollback;
}

export class Transactor {
  private _depth = 0;

  constructor(
    private readonly _participants: readonly Checkpointable[],
    private readonly _onCommit: () => void,
  ) {}

  /** Whether an operation is currently executing. */
  get active(): boolean {
    return this._depth > 0;
  }

  run<T>(operation: () => T): T {
    const rollbacks = this._participants.map((p) => p.checkpoint());
    this._depth++;

    let result: T;
    try {
      result = operation();
    } catch (err) {
      this._depth--;
      for (let i = rollbacks.length - 1; i >= 0; i--) {
        rollbacks[i]!();
      }
      throw err;
    }

    this._depth--;
    if (this._depth === 0) {
      this._onCommit();
    }
    return result;
  }
}
