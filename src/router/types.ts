import { DeepReadonly } from 'ts-essentials';
import { PricingMode, TradeState } from '../constants';
import { Address, Result, Signature } from '../types';

export type AmountVector = bigint[];

export type PoolState = {
  token0: Address;
  token1: Address;
  reserve0: bigint;
  reserve1: bigint;
  totalSupply: bigint;
  mode: PricingMode;
  boost0: bigint;
  boost1: bigint;
  fee: bigint;
  tradeState: TradeState;
};

// Pool state seen from one trade direction
export type HopPricing = {
  reserveIn: bigint;
  reserveOut: bigint;
  isToken0In: boolean;
  mode: PricingMode;
  boostIn: bigint;
  boostOut: bigint;
  fee: bigint;
  tradeState: TradeState;
};

export type BurnedAmounts = {
  amount0: bigint;
  amount1: bigint;
};

/**
 * Reserve-holding pair. Enforces its own invariant: any swap whose output
 * is not covered by the input already delivered is rejected.
 */
export interface Pool {
  readonly address: Address;
  getState(): DeepReadonly<PoolState>;
  swap(amount0Out: bigint, amount1Out: bigint, to: Address): Result<void>;
  mint(to: Address): Result<bigint>;
  burn(to: Address): Result<BurnedAmounts>;
  permit(
    owner: Address,
    spender: Address,
    value: bigint,
    deadline: number,
    signature: Signature,
  ): Result<void>;
}

export interface Registry {
  readonly address: Address;
  getPool(tokenA: Address, tokenB: Address): Pool | null;
  createPool(tokenA: Address, tokenB: Address): Result<Pool>;
}

export interface NativeAssetAdapter {
  readonly address: Address;
  // Takes `amount` of native value from `from` and credits wrapped tokens
  deposit(from: Address, amount: bigint): Result<void>;
  // Burns wrapped tokens of `from` and returns the native value
  withdraw(from: Address, amount: bigint): Result<void>;
}

export interface TokenLedger {
  now(): number;
  transact<T>(body: () => Result<T>): Result<T>;
  balanceOf(token: Address, holder: Address): bigint;
  nativeBalanceOf(holder: Address): bigint;
  transfer(
    token: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): Result<void>;
  transferFrom(
    token: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): Result<void>;
  sendNative(from: Address, to: Address, amount: bigint): Result<void>;
}

export type AddLiquidityResult = {
  amountA: bigint;
  amountB: bigint;
  liquidity: bigint;
};

export type AddLiquidityNativeResult = {
  amountToken: bigint;
  amountNative: bigint;
  liquidity: bigint;
};

export type RemoveLiquidityResult = {
  amountA: bigint;
  amountB: bigint;
};

export type RemoveLiquidityNativeResult = {
  amountToken: bigint;
  amountNative: bigint;
};

export type PermitParams = {
  approveMax: boolean;
  signature: Signature;
};
