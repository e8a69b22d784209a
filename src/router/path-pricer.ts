import { SwapSide } from '../constants';
import { Address, FailureReason, Result } from '../types';
import { fail, normalizeAddress, ok } from '../utils';
import { InvariantModel, orientPool } from './math/invariant-model';
import { AmountVector, Registry } from './types';

export function validatePath(path: readonly Address[]): Result<void> {
  if (path.length < 2) {
    return fail(FailureReason.InvalidPath, `path of length ${path.length}`);
  }
  const seen = new Set<Address>();
  for (let i = 0; i < path.length; i++) {
    const token = normalizeAddress(path[i]);
    if (seen.has(token)) {
      return fail(FailureReason.InvalidPath, `repeated token ${token} at ${i}`);
    }
    seen.add(token);
  }
  return ok(undefined);
}

/**
 * Walks a path of pools and produces the amount flowing through each hop.
 * Either the whole vector is produced or the first failing hop's reason is
 * returned.
 */
export class PathPricer {
  constructor(
    protected registry: Registry,
    protected invariant: InvariantModel,
  ) {}

  quote(
    side: SwapSide,
    path: readonly Address[],
    amount: bigint,
  ): Result<AmountVector> {
    return side === SwapSide.SELL
      ? this.quoteExactIn(path, amount)
      : this.quoteExactOut(path, amount);
  }

  quoteExactIn(
    path: readonly Address[],
    amountIn: bigint,
  ): Result<AmountVector> {
    const valid = validatePath(path);
    if (!valid.ok) return valid;

    const amounts: AmountVector = [amountIn];
    for (let i = 0; i < path.length - 1; i++) {
      const pool = this.registry.getPool(path[i], path[i + 1]);
      if (!pool) {
        return fail(
          FailureReason.InsufficientLiquidity,
          `no pool for ${path[i]}/${path[i + 1]}`,
        );
      }
      const out = this.invariant.getAmountOut(
        amounts[i],
        orientPool(pool.getState(), path[i]),
      );
      if (!out.ok) return out;
      amounts.push(out.value);
    }
    return ok(amounts);
  }

  quoteExactOut(
    path: readonly Address[],
    amountOut: bigint,
  ): Result<AmountVector> {
    const valid = validatePath(path);
    if (!valid.ok) return valid;

    const amounts: AmountVector = new Array<bigint>(path.length).fill(0n);
    amounts[path.length - 1] = amountOut;
    for (let i = path.length - 1; i > 0; i--) {
      const pool = this.registry.getPool(path[i - 1], path[i]);
      if (!pool) {
        return fail(
          FailureReason.InsufficientLiquidity,
          `no pool for ${path[i - 1]}/${path[i]}`,
        );
      }
      const amountIn = this.invariant.getAmountIn(
        amounts[i],
        orientPool(pool.getState(), path[i - 1]),
      );
      if (!amountIn.ok) return amountIn;
      amounts[i - 1] = amountIn.value;
    }
    return ok(amounts);
  }
}
