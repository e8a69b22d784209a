import { FEE_DENOMINATOR } from '../../constants';
import { sqrt } from '../../utils';

/*
 * Boosted ("xybk") curve.
 *
 * The pool keeps (x + (b - 1)s)(y + (b - 1)s) = b²s², where s is the balance
 * at which both sides are equal and b is the boost of the larger side. Both
 * directions are priced as constant product on the virtual reserves
 * `reserve + (b - 1)s`, picking the boost of whichever side is larger once
 * the trade is done. A trade crossing the midpoint (s, s) with unequal boosts
 * is priced in two legs. With b = 1 on both sides this is the plain curve.
 */

export type XybkHop = {
  reserveIn: bigint;
  reserveOut: bigint;
  boostIn: bigint;
  boostOut: bigint;
  fee: bigint;
  isToken0In: boolean;
};

export interface BoostedCurve {
  readonly name: string;
  getAmountOut(amountIn: bigint, hop: XybkHop): bigint;
  // Returns null when the requested output cannot be produced at any input
  getAmountIn(amountOut: bigint, hop: XybkHop): bigint | null;
}

/**
 * Solves (2b' + 1)s² - b'(x + y)s - xy = 0 for s, with b' the boost of the
 * larger balance minus one. Balances must be given in token0/token1 order so
 * that ties resolve the same way for both trade directions.
 */
export function computeSqrtK(
  boost0: bigint,
  boost1: bigint,
  balance0: bigint,
  balance1: bigint,
): bigint {
  const boost = balance0 > balance1 ? boost0 - 1n : boost1 - 1n;
  const denom = boost * 2n + 1n;
  const term = (boost * (balance0 + balance1)) / (denom * 2n);
  return sqrt(term * term + (balance0 * balance1) / denom) + term;
}

function sqrtKOf(hop: XybkHop): bigint {
  const { reserveIn, reserveOut, boostIn, boostOut, isToken0In } = hop;
  return isToken0In
    ? computeSqrtK(boostIn, boostOut, reserveIn, reserveOut)
    : computeSqrtK(boostOut, boostIn, reserveOut, reserveIn);
}

export function getAmountOutXybk(amountIn: bigint, hop: XybkHop): bigint {
  const { boostIn, boostOut, fee } = hop;
  const sqrtK = sqrtKOf(hop);

  let reserveIn = hop.reserveIn;
  let reserveOut = hop.reserveOut;
  let amountInPostFee = amountIn * (FEE_DENOMINATOR - fee);
  let amountOut = 0n;
  let artiLiqTerm: bigint;

  if (amountInPostFee + reserveIn * FEE_DENOMINATOR >= sqrtK * FEE_DENOMINATOR) {
    // input side ends up larger
    artiLiqTerm = sqrtK * (boostIn - 1n);
    if (reserveIn < sqrtK && boostIn !== boostOut) {
      amountOut = reserveOut - sqrtK;
      amountInPostFee -= (sqrtK - reserveIn) * FEE_DENOMINATOR;
      reserveIn = sqrtK;
      reserveOut = sqrtK;
    }
  } else {
    artiLiqTerm = sqrtK * (boostOut - 1n);
  }

  const numerator = amountInPostFee * (reserveOut + artiLiqTerm);
  const denominator =
    (reserveIn + artiLiqTerm) * FEE_DENOMINATOR + amountInPostFee;
  const lastLegOut = numerator / denominator;

  return amountOut + (lastLegOut > reserveOut ? reserveOut : lastLegOut);
}

export function getAmountInXybk(
  amountOut: bigint,
  hop: XybkHop,
): bigint | null {
  const { boostIn, boostOut, fee } = hop;
  const sqrtK = sqrtKOf(hop);

  let reserveIn = hop.reserveIn;
  let reserveOut = hop.reserveOut;
  let remainingOut = amountOut;
  let firstLegIn = 0n;
  let artiLiqTerm: bigint;

  if (reserveIn < sqrtK && reserveOut - amountOut >= sqrtK) {
    // output side stays larger
    artiLiqTerm = sqrtK * (boostOut - 1n);
  } else {
    artiLiqTerm = sqrtK * (boostIn - 1n);
    if (reserveIn < sqrtK && reserveOut > sqrtK && boostIn !== boostOut) {
      firstLegIn = sqrtK - reserveIn;
      remainingOut -= reserveOut - sqrtK;
      reserveIn = sqrtK;
      reserveOut = sqrtK;
    }
  }

  const lastLegDenominator = reserveOut + artiLiqTerm - remainingOut;
  if (lastLegDenominator <= 0n) return null;

  // Rounded up like the plain curve: floor of the exact input, plus one
  const numerator =
    firstLegIn * FEE_DENOMINATOR * lastLegDenominator +
    (reserveIn + artiLiqTerm) * remainingOut * FEE_DENOMINATOR;
  const denominator = lastLegDenominator * (FEE_DENOMINATOR - fee);
  return numerator / denominator + 1n;
}

export const XYBK_CURVE: BoostedCurve = {
  name: 'xybk',
  getAmountOut: getAmountOutXybk,
  getAmountIn: getAmountInXybk,
};
