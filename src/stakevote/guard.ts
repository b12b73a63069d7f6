/**
 * Execution guard for state-mutating operations
 *
 * Operations are queued and run one at a time against the shared store.
 * The operation in flight is tracked in async-local context, so a call that
 * comes back into the engine from inside it (a ledger callback, say) is
 * rejected immediately instead of waiting behind the operation it came from.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ErrorCodes, StakeVoteError } from './types.js';

interface GuardFrame {
  operation: string;
}

export class ExecutionGuard {
  private context = new AsyncLocalStorage<GuardFrame>();
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run an operation exclusively
   */
  run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const active = this.context.getStore();
    if (active) {
      return Promise.reject(
        new GuardError(
          `Reentrant call to ${operation} while ${active.operation} is in progress`
        )
      );
    }

    this.pending++;
    const result = this.tail.then(() => this.context.run({ operation }, fn));
    // The queue only tracks completion; the outcome belongs to the caller
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  /**
   * Name of the operation in flight in the current async context, if any
   */
  get current(): string | null {
    return this.context.getStore()?.operation ?? null;
  }

  get queueSize(): number {
    return this.pending;
  }

  private settle(): void {
    this.pending--;
  }
}

export class GuardError extends StakeVoteError {
  constructor(message: string) {
    super(message, ErrorCodes.REENTRANT_CALL, 409);
    this.name = 'GuardError';
  }
}
