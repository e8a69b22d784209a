import { NativeAssetAdapter } from '../router/types';
import { Address, Result } from '../types';
import { normalizeAddress, ok } from '../utils';
import { Ledger } from './ledger';

// Wraps native value 1:1 into a fungible token held on the ledger
export class LedgerWrappedNative implements NativeAssetAdapter {
  readonly address: Address;

  constructor(address: Address, protected ledger: Ledger) {
    this.address = normalizeAddress(address);
  }

  deposit(from: Address, amount: bigint): Result<void> {
    const sent = this.ledger.sendNative(from, this.address, amount);
    if (!sent.ok) return sent;
    this.ledger.mint(this.address, from, amount);
    return ok(undefined);
  }

  withdraw(from: Address, amount: bigint): Result<void> {
    const burned = this.ledger.burn(this.address, from, amount);
    if (!burned.ok) return burned;
    return this.ledger.sendNative(this.address, from, amount);
  }
}
