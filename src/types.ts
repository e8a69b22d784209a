import { Logger as Log4jsLogger } from 'log4js';

export type Address = string;

export type Logger = Log4jsLogger;

export enum FailureReason {
  Expired = 'EXPIRED',
  Locked = 'LOCKED',
  InvalidPath = 'INVALID_PATH',
  TradeNotAllowed = 'TRADE_NOT_ALLOWED',
  InsufficientOutputAmount = 'INSUFFICIENT_OUTPUT_AMOUNT',
  ExcessiveInputAmount = 'EXCESSIVE_INPUT_AMOUNT',
  InsufficientInputAmount = 'INSUFFICIENT_INPUT_AMOUNT',
  InsufficientLiquidity = 'INSUFFICIENT_LIQUIDITY',
  InsufficientAAmount = 'INSUFFICIENT_A_AMOUNT',
  InsufficientBAmount = 'INSUFFICIENT_B_AMOUNT',
  InsufficientAmount = 'INSUFFICIENT_AMOUNT',
  InvalidSignature = 'INVALID_SIGNATURE',
  // collaborator-side rejections
  IdenticalAddresses = 'IDENTICAL_ADDRESSES',
  ZeroAddress = 'ZERO_ADDRESS',
  PairExists = 'PAIR_EXISTS',
  InsufficientBalance = 'INSUFFICIENT_BALANCE',
  InsufficientAllowance = 'INSUFFICIENT_ALLOWANCE',
  InvariantViolated = 'K',
  InsufficientLiquidityMinted = 'INSUFFICIENT_LIQUIDITY_MINTED',
  InsufficientLiquidityBurned = 'INSUFFICIENT_LIQUIDITY_BURNED',
  Overflow = 'OVERFLOW',
}

export type Success<T> = { ok: true; value: T };
export type Failure = { ok: false; reason: FailureReason; detail?: string };
export type Result<T> = Success<T> | Failure;

// Transaction context of a state-mutating call: sender and attached native value
export type TxContext = {
  from: Address;
  value?: bigint;
};

export type Signature = {
  v: number;
  r: string;
  s: string;
};
