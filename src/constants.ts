export const NULL_ADDRESS = '0x0000000000000000000000000000000000000000';

export const MAX_UINT256 = 2n ** 256n - 1n;

// Fees are expressed in basis points of FEE_DENOMINATOR
export const FEE_DENOMINATOR = 10_000n;
export const DEFAULT_SWAP_FEE = 30n;

// Shares locked forever on the first mint of a pool
export const MINIMUM_LIQUIDITY = 1000n;

export enum SwapSide {
  SELL = 'SELL',
  BUY = 'BUY',
}

export enum PricingMode {
  XYK = 'xyk',
  XYBK = 'xybk',
}

export enum TradeState {
  SELL_ALL = 0,
  SELL_TOKEN_0 = 1,
  SELL_TOKEN_1 = 2,
  SELL_NONE = 3,
}
