import { FailureReason, Result } from '../types';
import { fail, ok } from '../utils';

/**
 * One lock per router. A call made while the lock is held, e.g. from a
 * token transfer hook, fails with Locked instead of re-entering.
 */
export class ReentrancyGuard {
  private locked = false;

  get isLocked(): boolean {
    return this.locked;
  }

  run<T>(fn: () => Result<T>): Result<T> {
    if (this.locked) return fail(FailureReason.Locked);
    this.locked = true;
    try {
      return fn();
    } finally {
      this.locked = false;
    }
  }
}

export class DeadlineGuard {
  constructor(private readonly clock: { now(): number }) {}

  // Seconds on the ledger clock; the deadline itself is still valid
  check(deadline: number): Result<void> {
    const now = this.clock.now();
    return now > deadline
      ? fail(FailureReason.Expired, `now ${now} > deadline ${deadline}`)
      : ok(undefined);
  }
}
