import { MAX_UINT256 } from '../constants';
import { getLogger } from '../logger';
import { FailureReason } from '../types';
import { fail, ok } from '../utils';
import { Ledger, TransferEvent } from './ledger';

const TOKEN = '0x1000000000000000000000000000000000000000';
const ALICE = '0x00000000000000000000000000000000000a11ce';
const BOB = '0x000000000000000000000000000000000000b0b0';

describe('Ledger', () => {
  const setup = () => new Ledger(1, 100, getLogger('test'));

  it('moves balances and fires transfer hooks', () => {
    const ledger = setup();
    const events: TransferEvent[] = [];
    ledger.onTransfer(TOKEN, e => events.push(e));
    ledger.mint(TOKEN, ALICE, 50n);

    expect(ledger.transfer(TOKEN, ALICE, BOB, 20n)).toEqual(ok(undefined));
    expect(ledger.balanceOf(TOKEN, ALICE)).toBe(30n);
    expect(ledger.balanceOf(TOKEN, BOB)).toBe(20n);
    expect(ledger.totalSupply(TOKEN)).toBe(50n);
    expect(events).toEqual([
      { token: TOKEN, from: ALICE, to: BOB, amount: 20n },
    ]);
  });

  it('fails a transfer beyond the balance', () => {
    const ledger = setup();
    ledger.mint(TOKEN, ALICE, 5n);
    expect(ledger.transfer(TOKEN, ALICE, BOB, 6n)).toMatchObject({
      ok: false,
      reason: FailureReason.InsufficientBalance,
    });
  });

  it('throws on negative amounts', () => {
    const ledger = setup();
    expect(() => ledger.mint(TOKEN, ALICE, -1n)).toThrow('Negative amount -1');
  });

  it('consumes finite allowances only', () => {
    const ledger = setup();
    ledger.mint(TOKEN, ALICE, 100n);
    ledger.approve(TOKEN, ALICE, BOB, 30n);

    expect(ledger.transferFrom(TOKEN, BOB, ALICE, BOB, 20n).ok).toBe(true);
    expect(ledger.allowance(TOKEN, ALICE, BOB)).toBe(10n);
    expect(ledger.transferFrom(TOKEN, BOB, ALICE, BOB, 11n)).toMatchObject({
      ok: false,
      reason: FailureReason.InsufficientAllowance,
    });

    ledger.approve(TOKEN, ALICE, BOB, MAX_UINT256);
    expect(ledger.transferFrom(TOKEN, BOB, ALICE, BOB, 50n).ok).toBe(true);
    expect(ledger.allowance(TOKEN, ALICE, BOB)).toBe(MAX_UINT256);
  });

  it('moves native value', () => {
    const ledger = setup();
    ledger.creditNative(ALICE, 10n);
    expect(ledger.sendNative(ALICE, BOB, 4n).ok).toBe(true);
    expect(ledger.nativeBalanceOf(ALICE)).toBe(6n);
    expect(ledger.nativeBalanceOf(BOB)).toBe(4n);
    expect(ledger.sendNative(ALICE, BOB, 7n)).toMatchObject({
      ok: false,
      reason: FailureReason.InsufficientBalance,
    });
  });

  describe('transact', () => {
    it('commits a successful body', () => {
      const ledger = setup();
      ledger.mint(TOKEN, ALICE, 10n);
      const result = ledger.transact(() => {
        const sent = ledger.transfer(TOKEN, ALICE, BOB, 4n);
        if (!sent.ok) return sent;
        return ok(ledger.balanceOf(TOKEN, BOB));
      });
      expect(result).toEqual({ ok: true, value: 4n });
      expect(ledger.balanceOf(TOKEN, BOB)).toBe(4n);
    });

    it('rolls back a failed body', () => {
      const ledger = setup();
      ledger.mint(TOKEN, ALICE, 10n);
      const result = ledger.transact(() => {
        ledger.transfer(TOKEN, ALICE, BOB, 4n);
        ledger.creditNative(BOB, 1n);
        return fail(FailureReason.Expired);
      });
      expect(result).toEqual({ ok: false, reason: FailureReason.Expired });
      expect(ledger.balanceOf(TOKEN, ALICE)).toBe(10n);
      expect(ledger.nativeBalanceOf(BOB)).toBe(0n);
    });

    it('rolls back and rethrows when the body throws', () => {
      const ledger = setup();
      ledger.mint(TOKEN, ALICE, 10n);
      expect(() =>
        ledger.transact(() => {
          ledger.transfer(TOKEN, ALICE, BOB, 4n);
          throw new Error('boom');
        }),
      ).toThrow('boom');
      expect(ledger.balanceOf(TOKEN, BOB)).toBe(0n);
      expect(ledger.transactionDepth).toBe(0);
    });

    it('restores only the inner snapshot of a nested failure', () => {
      const ledger = setup();
      ledger.mint(TOKEN, ALICE, 10n);
      const result = ledger.transact(() => {
        ledger.transfer(TOKEN, ALICE, BOB, 1n);
        const inner = ledger.transact(() => {
          ledger.transfer(TOKEN, ALICE, BOB, 2n);
          return fail(FailureReason.Locked);
        });
        expect(inner.ok).toBe(false);
        return ok(undefined);
      });
      expect(result.ok).toBe(true);
      expect(ledger.balanceOf(TOKEN, BOB)).toBe(1n);
    });
  });

  it('keeps its own clock', () => {
    const ledger = setup();
    ledger.advanceTime(20);
    expect(ledger.now()).toBe(120);
    ledger.setTime(5);
    expect(ledger.now()).toBe(5);
  });

  it('stops calling a removed hook', () => {
    const ledger = setup();
    const hook = jest.fn();
    const unsubscribe = ledger.onTransfer(TOKEN, hook);
    ledger.mint(TOKEN, ALICE, 2n);
    ledger.transfer(TOKEN, ALICE, BOB, 1n);
    unsubscribe();
    ledger.transfer(TOKEN, ALICE, BOB, 1n);
    expect(hook).toHaveBeenCalledTimes(1);
  });
});
