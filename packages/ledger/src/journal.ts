/**
 * @wcam/ledger — Event journal.
 *
 * Buffers notifications while an operation is in flight and appends
 * them, sequence-numbered, when the operation commits. A rolled back
 * operation leaves no trace in the journal.
 *
 * Properties:
 * - Sequence numbers start at 1 and never skip
 * - Committed entries are never modified
 * - Subscribers are dispatched synchronously after commit
 * - A throwing subscriber never fails the committed operation; its error
 *   goes to the journal's error handler and delivery continues
 */

import type { JournalEntry, TokenEvent } from "@wcam/types";
import type { Checkpointable, Rollback } from "./transactor.js";

export type JournalListener = (entry: JournalEntry) => void;

/** Receives an error thrown by a subscriber, with the entry it was handling. */
export type ListenerErrorHandler = (error: unknown, entry: JournalEntry) => void;

/** Rethrows outside the committing call stack. */
const rethrowLater: ListenerErrorHandler = (error) => {
  queueMicrotask(() => {
    throw error;
  });
};

export interface Subscription {
  unsubscribe(): void;
}

export class EventJournal implements Checkpointable {
  private readonly _entries: JournalEntry[] = [];
  private readonly _pending: TokenEvent[] = [];
  private readonly _listeners = new Set<JournalListener>();

  constructor(private readonly _onListenerError: ListenerErrorHandler = rethrowLater) {}

  /** Record an event for the operation in flight. */
  record(event: TokenEvent): void {
    this._pending.push(event);
  }

  checkpoint(): Rollback {
    const length = this._pending.length;
    return () => {
      this._pending.length = length;
    };
  }

  /**
   * Append every pending event and notify subscribers.
   * Returns the entries appended.
   */
  commit(): readonly JournalEntry[] {
    const appended: JournalEntry[] = [];
    for (const event of this._pending) {
      const entry: JournalEntry = { sequence: this._entries.length + 1, event };
      this._entries.push(entry);
      appended.push(entry);
    }
    this._pending.length = 0;

    for (const listener of this._listeners) {
      for (const entry of appended) {
        try {
          listener(entry);
        } catch (err) {
          this._onListenerError(err, entry);
        }
      }
    }
    return appended;
  }

  /** Sequence number of the last committed entry (0 when empty). */
  get head(): number {
    return this._entries.length;
  }

  /**
   * Read committed entries starting at `fromSequence` (inclusive).
   */
  read(fromSequence = 1, maxCount?: number): readonly JournalEntry[] {
    const start = Math.max(fromSequence, 1) - 1;
    const end = maxCount !== undefined ? start + Math.max(maxCount, 0) : undefined;
    return this._entries.slice(start, end);
  }

  subscribe(listener: JournalListener): Subscription {
    this._listeners.add(listener);
    return {
      unsubscribe: () => {
        this._listeners.delete(listener);
      },
    };
  }
}
