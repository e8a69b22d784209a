import { FEE_DENOMINATOR } from '../../constants';

// Constant product with the fee taken from the input. Output rounds down.
export function getAmountOutXyk(
  amountIn: bigint,
  reserveIn: bigint,
  reserveOut: bigint,
  fee: bigint,
): bigint {
  const amountInWithFee = amountIn * (FEE_DENOMINATOR - fee);
  const numerator = amountInWithFee * reserveOut;
  const denominator = reserveIn * FEE_DENOMINATOR + amountInWithFee;
  return numerator / denominator;
}

// Input rounds up; callers ensure amountOut < reserveOut.
export function getAmountInXyk(
  amountOut: bigint,
  reserveIn: bigint,
  reserveOut: bigint,
  fee: bigint,
): bigint {
  const numerator = reserveIn * amountOut * FEE_DENOMINATOR;
  const denominator = (reserveOut - amountOut) * (FEE_DENOMINATOR - fee);
  return numerator / denominator + 1n;
}

// Proportional conversion at the current reserve ratio, rounded down.
export function quoteXyk(
  amountA: bigint,
  reserveA: bigint,
  reserveB: bigint,
): bigint {
  return (amountA * reserveB) / reserveA;
}
