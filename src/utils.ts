import { Address, Failure, FailureReason, Success } from './types';
import { NULL_ADDRESS } from './constants';
import { BI_POWS } from './bigint-constants';

export const ok = <T>(value: T): Success<T> => ({ ok: true, value });

export const fail = (reason: FailureReason, detail?: string): Failure =>
  detail === undefined ? { ok: false, reason } : { ok: false, reason, detail };

export function normalizeAddress(address: Address): Address {
  return address.toLowerCase();
}

export function isSameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function isNullAddress(address: Address): boolean {
  return address.toLowerCase() === NULL_ADDRESS;
}

/**
 * Orders a pair the same way pools store it: lexicographically on the
 * lower-cased address. Identical tokens cannot form a pair.
 */
export function sortTokens(tokenA: Address, tokenB: Address): [Address, Address] {
  const [a, b] = [normalizeAddress(tokenA), normalizeAddress(tokenB)];
  if (a === b) {
    throw new Error(`Cannot sort identical tokens ${tokenA}`);
  }
  return a < b ? [a, b] : [b, a];
}

export function getPairKey(tokenA: Address, tokenB: Address): string {
  return sortTokens(tokenA, tokenB).join('_');
}

/** Floor of the square root (Babylonian method). */
export function sqrt(value: bigint): bigint {
  if (value < 0n) {
    throw new Error('Square root of negative number');
  }
  if (value < 2n) return value;

  let z = value;
  let x = value / 2n + 1n;
  while (x < z) {
    z = x;
    x = (value / x + x) / 2n;
  }
  return z;
}

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function expandTo18Decimals(n: number | bigint): bigint {
  return BigInt(n) * BI_POWS[18];
}
