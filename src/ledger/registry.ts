import {
  getCreate2Address,
  keccak256,
  solidityPack,
  toUtf8Bytes,
} from 'ethers/lib/utils';
import { PricingMode, TradeState } from '../constants';
import { InvariantModel } from '../router/math/invariant-model';
import { Registry } from '../router/types';
import { Address, FailureReason, Logger, Result } from '../types';
import {
  fail,
  getPairKey,
  isNullAddress,
  isSameAddress,
  normalizeAddress,
  ok,
  sortTokens,
} from '../utils';
import { Ledger } from './ledger';
import { LedgerPool } from './pool';

export const POOL_INIT_CODE_HASH = keccak256(toUtf8Bytes('xybk-router/pool'));

export type RegistryOptions = {
  defaultSwapFee: bigint;
  lpTokenName: string;
};

export class LedgerRegistry implements Registry {
  readonly address: Address;
  private readonly pools = new Map<Address, LedgerPool>();

  constructor(
    address: Address,
    protected ledger: Ledger,
    protected invariant: InvariantModel,
    protected options: RegistryOptions,
    protected logger: Logger,
  ) {
    this.address = normalizeAddress(address);
  }

  // CREATE2 address of the pair, whether or not it exists yet
  pairFor(tokenA: Address, tokenB: Address): Address {
    const [token0, token1] = sortTokens(tokenA, tokenB);
    return getCreate2Address(
      this.address,
      keccak256(solidityPack(['address', 'address'], [token0, token1])),
      POOL_INIT_CODE_HASH,
    ).toLowerCase();
  }

  getPool(tokenA: Address, tokenB: Address): LedgerPool | null {
    if (isSameAddress(tokenA, tokenB)) return null;
    const address = this.ledger.findPair(getPairKey(tokenA, tokenB));
    return address ? this.poolAt(address) : null;
  }

  createPool(tokenA: Address, tokenB: Address): Result<LedgerPool> {
    if (isSameAddress(tokenA, tokenB)) {
      return fail(FailureReason.IdenticalAddresses);
    }
    const [token0, token1] = sortTokens(tokenA, tokenB);
    if (isNullAddress(token0)) {
      return fail(FailureReason.ZeroAddress);
    }
    if (this.ledger.findPair(getPairKey(token0, token1))) {
      return fail(FailureReason.PairExists, `${token0}/${token1}`);
    }

    const address = this.pairFor(token0, token1);
    this.ledger.insertPair(address, {
      token0,
      token1,
      reserve0: 0n,
      reserve1: 0n,
      mode: PricingMode.XYK,
      boost0: 1n,
      boost1: 1n,
      fee: this.options.defaultSwapFee,
      tradeState: TradeState.SELL_ALL,
      nonces: {},
    });
    this.logger.info(`Created pool ${address} for ${token0}/${token1}`);
    return ok(this.poolAt(address));
  }

  get poolCount(): number {
    return this.ledger.pairCount;
  }

  poolAt(address: Address): LedgerPool {
    const key = normalizeAddress(address);
    if (!this.ledger.getPair(key)) {
      throw new Error(`No pool at ${address}`);
    }
    let pool = this.pools.get(key);
    if (!pool) {
      pool = new LedgerPool(
        key,
        this.ledger,
        this.invariant,
        this.options.lpTokenName,
        this.logger,
      );
      this.pools.set(key, pool);
    }
    return pool;
  }
}
