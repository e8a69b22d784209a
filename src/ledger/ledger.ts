import _ from 'lodash';
import { DeepReadonly } from 'ts-essentials';
import { MAX_UINT256 } from '../constants';
import { Address, FailureReason, Logger, Result } from '../types';
import { fail, normalizeAddress, ok } from '../utils';
import { PoolState, TokenLedger } from '../router/types';

// Share supply lives with the LP token balances, not in the pair record
export type PairRecord = Omit<PoolState, 'totalSupply'> & {
  nonces: Record<Address, bigint>;
};

export type LedgerState = {
  timestamp: number;
  native: Record<Address, bigint>;
  // token -> holder -> balance
  balances: Record<Address, Record<Address, bigint>>;
  // token -> owner -> spender -> allowance
  allowances: Record<Address, Record<Address, Record<Address, bigint>>>;
  totalSupplies: Record<Address, bigint>;
  pairs: Record<Address, PairRecord>;
  // `${token0}_${token1}` -> pair address
  pairIndex: Record<string, Address>;
};

export type TransferEvent = {
  token: Address;
  from: Address;
  to: Address;
  amount: bigint;
};

export type TransferHook = (event: TransferEvent) => void;

/**
 * In-memory host ledger. Holds every balance the router and the pools touch
 * and gives each invocation all-or-nothing semantics: `transact` snapshots
 * the state and restores it when the body fails or throws.
 */
export class Ledger implements TokenLedger {
  protected state: LedgerState;
  private readonly hooks = new Map<Address, TransferHook[]>();
  private depth = 0;

  constructor(
    readonly chainId: number,
    timestamp: number,
    protected logger: Logger,
  ) {
    this.state = {
      timestamp,
      native: {},
      balances: {},
      allowances: {},
      totalSupplies: {},
      pairs: {},
      pairIndex: {},
    };
  }

  now(): number {
    return this.state.timestamp;
  }

  setTime(timestamp: number): void {
    this.state.timestamp = timestamp;
  }

  advanceTime(seconds: number): void {
    this.state.timestamp += seconds;
  }

  get transactionDepth(): number {
    return this.depth;
  }

  transact<T>(body: () => Result<T>): Result<T> {
    const snapshot = _.cloneDeep(this.state);
    this.depth++;
    try {
      const result = body();
      if (!result.ok) {
        this.logger.debug(
          `Rolling back transaction at depth ${this.depth}: ${result.reason}`,
        );
        this.state = snapshot;
      }
      return result;
    } catch (e) {
      this.state = snapshot;
      throw e;
    } finally {
      this.depth--;
    }
  }

  onTransfer(token: Address, hook: TransferHook): () => void {
    const key = normalizeAddress(token);
    const hooks = this.hooks.get(key) ?? [];
    hooks.push(hook);
    this.hooks.set(key, hooks);
    return () => {
      this.hooks.set(
        key,
        (this.hooks.get(key) ?? []).filter(h => h !== hook),
      );
    };
  }

  balanceOf(token: Address, holder: Address): bigint {
    return (
      this.state.balances[normalizeAddress(token)]?.[
        normalizeAddress(holder)
      ] ?? 0n
    );
  }

  totalSupply(token: Address): bigint {
    return this.state.totalSupplies[normalizeAddress(token)] ?? 0n;
  }

  nativeBalanceOf(holder: Address): bigint {
    return this.state.native[normalizeAddress(holder)] ?? 0n;
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    return (
      this.state.allowances[normalizeAddress(token)]?.[
        normalizeAddress(owner)
      ]?.[normalizeAddress(spender)] ?? 0n
    );
  }

  mint(token: Address, to: Address, amount: bigint): void {
    this.assertAmount(amount);
    const key = normalizeAddress(token);
    this.setBalance(key, to, this.balanceOf(key, to) + amount);
    this.state.totalSupplies[key] = this.totalSupply(key) + amount;
  }

  burn(token: Address, from: Address, amount: bigint): Result<void> {
    this.assertAmount(amount);
    const key = normalizeAddress(token);
    const balance = this.balanceOf(key, from);
    if (balance < amount) {
      return fail(FailureReason.InsufficientBalance, `${from} burning ${key}`);
    }
    this.setBalance(key, from, balance - amount);
    this.state.totalSupplies[key] = this.totalSupply(key) - amount;
    return ok(undefined);
  }

  transfer(
    token: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): Result<void> {
    this.assertAmount(amount);
    const key = normalizeAddress(token);
    const balance = this.balanceOf(key, from);
    if (balance < amount) {
      return fail(
        FailureReason.InsufficientBalance,
        `${from} holds ${balance} of ${key}, needs ${amount}`,
      );
    }

    this.setBalance(key, from, balance - amount);
    this.setBalance(key, to, this.balanceOf(key, to) + amount);

    const event: TransferEvent = {
      token: key,
      from: normalizeAddress(from),
      to: normalizeAddress(to),
      amount,
    };
    for (const hook of this.hooks.get(key) ?? []) {
      hook(event);
    }
    return ok(undefined);
  }

  approve(token: Address, owner: Address, spender: Address, amount: bigint) {
    this.assertAmount(amount);
    const [key, ownerKey] = [normalizeAddress(token), normalizeAddress(owner)];
    const byOwner = (this.state.allowances[key] ??= {});
    const bySpender = (byOwner[ownerKey] ??= {});
    bySpender[normalizeAddress(spender)] = amount;
  }

  transferFrom(
    token: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): Result<void> {
    const allowance = this.allowance(token, from, spender);
    if (allowance < amount) {
      return fail(
        FailureReason.InsufficientAllowance,
        `${spender} may move ${allowance} of ${token} for ${from}`,
      );
    }
    // an unlimited approval is never consumed
    if (allowance !== MAX_UINT256) {
      this.approve(token, from, spender, allowance - amount);
    }
    return this.transfer(token, from, to, amount);
  }

  creditNative(holder: Address, amount: bigint): void {
    this.assertAmount(amount);
    const key = normalizeAddress(holder);
    this.state.native[key] = this.nativeBalanceOf(key) + amount;
  }

  sendNative(from: Address, to: Address, amount: bigint): Result<void> {
    this.assertAmount(amount);
    const balance = this.nativeBalanceOf(from);
    if (balance < amount) {
      return fail(
        FailureReason.InsufficientBalance,
        `${from} holds ${balance} native, needs ${amount}`,
      );
    }
    this.state.native[normalizeAddress(from)] = balance - amount;
    this.creditNative(to, amount);
    return ok(undefined);
  }

  getPair(address: Address): DeepReadonly<PairRecord> | undefined {
    return this.state.pairs[normalizeAddress(address)];
  }

  updatePair(address: Address, patch: Partial<PairRecord>): void {
    const key = normalizeAddress(address);
    const pair = this.state.pairs[key];
    if (!pair) {
      throw new Error(`Unknown pair ${address}`);
    }
    this.state.pairs[key] = { ...pair, ...patch };
  }

  insertPair(address: Address, record: PairRecord): void {
    const key = normalizeAddress(address);
    this.state.pairs[key] = record;
    this.state.pairIndex[`${record.token0}_${record.token1}`] = key;
  }

  findPair(pairKey: string): Address | undefined {
    return this.state.pairIndex[pairKey];
  }

  get pairCount(): number {
    return Object.keys(this.state.pairs).length;
  }

  private setBalance(token: Address, holder: Address, amount: bigint) {
    const byHolder = (this.state.balances[token] ??= {});
    byHolder[normalizeAddress(holder)] = amount;
  }

  private assertAmount(amount: bigint) {
    if (amount < 0n) {
      throw new Error(`Negative amount ${amount}`);
    }
  }
}
