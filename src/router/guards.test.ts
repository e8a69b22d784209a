import { FailureReason } from '../types';
import { ok } from '../utils';
import { DeadlineGuard, ReentrancyGuard } from './guards';

describe('ReentrancyGuard', () => {
  it('runs the body and releases the lock', () => {
    const guard = new ReentrancyGuard();
    expect(guard.run(() => ok(7))).toEqual({ ok: true, value: 7 });
    expect(guard.isLocked).toBe(false);
  });

  it('rejects a nested call with Locked', () => {
    const guard = new ReentrancyGuard();
    const result = guard.run(() => {
      expect(guard.isLocked).toBe(true);
      return ok(guard.run(() => ok('inner')));
    });
    expect(result).toEqual({
      ok: true,
      value: { ok: false, reason: FailureReason.Locked },
    });
  });

  it('releases the lock when the body throws', () => {
    const guard = new ReentrancyGuard();
    expect(() =>
      guard.run(() => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(guard.isLocked).toBe(false);
    expect(guard.run(() => ok(1)).ok).toBe(true);
  });
});

describe('DeadlineGuard', () => {
  const guard = new DeadlineGuard({ now: () => 100 });

  it('accepts a deadline equal to the clock', () => {
    expect(guard.check(100)).toEqual({ ok: true, value: undefined });
    expect(guard.check(101).ok).toBe(true);
  });

  it('expires once the clock passes the deadline', () => {
    expect(guard.check(99)).toEqual({
      ok: false,
      reason: FailureReason.Expired,
      detail: 'now 100 > deadline 99',
    });
  });
});
