import { Address, Result } from '../types';
import { ok } from '../utils';
import { NativeAssetAdapter, TokenLedger } from './types';

/**
 * Native-value plumbing for the router at `holder`. Every native entry
 * point must leave the holder with zero native and zero wrapped balance.
 */
export class NativeAssetBridge {
  constructor(
    protected ledger: TokenLedger,
    protected adapter: NativeAssetAdapter,
    protected holder: Address,
  ) {}

  receive(from: Address, value: bigint): Result<void> {
    return this.ledger.sendNative(from, this.holder, value);
  }

  wrap(amount: bigint): Result<void> {
    return this.adapter.deposit(this.holder, amount);
  }

  // Wraps `amount` and forwards the wrapped tokens to `to`
  wrapTo(to: Address, amount: bigint): Result<void> {
    const wrapped = this.wrap(amount);
    if (!wrapped.ok) return wrapped;
    return this.ledger.transfer(this.adapter.address, this.holder, to, amount);
  }

  unwrap(amount: bigint): Result<void> {
    return this.adapter.withdraw(this.holder, amount);
  }

  pay(to: Address, amount: bigint): Result<void> {
    return this.ledger.sendNative(this.holder, to, amount);
  }

  refund(to: Address, received: bigint, used: bigint): Result<void> {
    return received > used ? this.pay(to, received - used) : ok(undefined);
  }
}
