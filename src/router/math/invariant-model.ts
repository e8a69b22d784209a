import { DeepReadonly } from 'ts-essentials';
import { PricingMode, TradeState } from '../../constants';
import { Address, FailureReason, Result } from '../../types';
import { fail, isSameAddress, ok } from '../../utils';
import { HopPricing, PoolState } from '../types';
import { getAmountInXyk, getAmountOutXyk, quoteXyk } from './xyk';
import { BoostedCurve, XYBK_CURVE, XybkHop } from './xybk';

export function isTradeAllowed(
  tradeState: TradeState,
  isToken0In: boolean,
): boolean {
  switch (tradeState) {
    case TradeState.SELL_ALL:
      return true;
    case TradeState.SELL_TOKEN_0:
      return isToken0In;
    case TradeState.SELL_TOKEN_1:
      return !isToken0In;
    case TradeState.SELL_NONE:
      return false;
  }
}

/**
 * Orients a pool snapshot along a trade direction. `tokenIn` must be one of
 * the pool's tokens.
 */
export function orientPool(
  state: DeepReadonly<PoolState>,
  tokenIn: Address,
): HopPricing {
  const isToken0In = isSameAddress(tokenIn, state.token0);
  if (!isToken0In && !isSameAddress(tokenIn, state.token1)) {
    throw new Error(
      `Token ${tokenIn} is not in pool ${state.token0}/${state.token1}`,
    );
  }

  return {
    reserveIn: isToken0In ? state.reserve0 : state.reserve1,
    reserveOut: isToken0In ? state.reserve1 : state.reserve0,
    boostIn: isToken0In ? state.boost0 : state.boost1,
    boostOut: isToken0In ? state.boost1 : state.boost0,
    isToken0In,
    mode: state.mode,
    fee: state.fee,
    tradeState: state.tradeState,
  };
}

/**
 * Pure pricing for one hop. The plain curve is fixed; the boosted curve is
 * injected so alternative closed forms can be swapped in and verified on
 * their own.
 */
export class InvariantModel {
  constructor(readonly boostedCurve: BoostedCurve = XYBK_CURVE) {}

  quote(amountA: bigint, reserveA: bigint, reserveB: bigint): Result<bigint> {
    if (amountA <= 0n) return fail(FailureReason.InsufficientAmount);
    if (reserveA <= 0n || reserveB <= 0n) {
      return fail(FailureReason.InsufficientLiquidity);
    }
    return ok(quoteXyk(amountA, reserveA, reserveB));
  }

  getAmountOut(amountIn: bigint, hop: DeepReadonly<HopPricing>): Result<bigint> {
    if (amountIn <= 0n) return fail(FailureReason.InsufficientInputAmount);
    if (!isTradeAllowed(hop.tradeState, hop.isToken0In)) {
      return fail(FailureReason.TradeNotAllowed);
    }

    const { reserveIn, reserveOut, fee } = hop;
    if (hop.mode === PricingMode.XYBK) {
      if (reserveOut <= 0n) return fail(FailureReason.InsufficientLiquidity);
      return ok(this.boostedCurve.getAmountOut(amountIn, this.toXybkHop(hop)));
    }

    if (reserveIn <= 0n || reserveOut <= 0n) {
      return fail(FailureReason.InsufficientLiquidity);
    }
    return ok(getAmountOutXyk(amountIn, reserveIn, reserveOut, fee));
  }

  getAmountIn(amountOut: bigint, hop: DeepReadonly<HopPricing>): Result<bigint> {
    if (amountOut <= 0n) return fail(FailureReason.InsufficientOutputAmount);
    if (!isTradeAllowed(hop.tradeState, hop.isToken0In)) {
      return fail(FailureReason.TradeNotAllowed);
    }

    const { reserveIn, reserveOut, fee } = hop;
    if (hop.mode === PricingMode.XYBK) {
      if (amountOut > reserveOut) {
        return fail(FailureReason.InsufficientLiquidity);
      }
      const amountIn = this.boostedCurve.getAmountIn(
        amountOut,
        this.toXybkHop(hop),
      );
      return amountIn === null
        ? fail(FailureReason.InsufficientLiquidity)
        : ok(amountIn);
    }

    if (reserveIn <= 0n || amountOut >= reserveOut) {
      return fail(FailureReason.InsufficientLiquidity);
    }
    return ok(getAmountInXyk(amountOut, reserveIn, reserveOut, fee));
  }

  private toXybkHop(hop: DeepReadonly<HopPricing>): XybkHop {
    return {
      reserveIn: hop.reserveIn,
      reserveOut: hop.reserveOut,
      boostIn: hop.boostIn,
      boostOut: hop.boostOut,
      fee: hop.fee,
      isToken0In: hop.isToken0In,
    };
  }
}
