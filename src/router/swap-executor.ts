import { Address, FailureReason, Result } from '../types';
import { fail, isSameAddress, ok } from '../utils';
import { AmountVector, Registry } from './types';

/**
 * Moves a priced amount vector through its pools. Each pool sends its output
 * straight to the next pool, so the router never holds an intermediate
 * balance. `amounts[0]` of `path[0]` must already sit in the first pool.
 */
export class SwapExecutor {
  constructor(protected registry: Registry) {}

  execute(
    amounts: AmountVector,
    path: readonly Address[],
    to: Address,
  ): Result<void> {
    if (amounts.length !== path.length) {
      throw new Error(
        `Amount vector of length ${amounts.length} for path of ${path.length}`,
      );
    }

    for (let i = 0; i < path.length - 1; i++) {
      const [input, output] = [path[i], path[i + 1]];
      const pool = this.registry.getPool(input, output);
      if (!pool) {
        return fail(
          FailureReason.InsufficientLiquidity,
          `no pool for ${input}/${output}`,
        );
      }

      const amountOut = amounts[i + 1];
      const isToken0Out = isSameAddress(output, pool.getState().token0);
      const [amount0Out, amount1Out] = isToken0Out
        ? [amountOut, 0n]
        : [0n, amountOut];

      const recipient =
        i < path.length - 2 ? this.nextPool(path, i + 1) : ok(to);
      if (!recipient.ok) return recipient;

      const swapped = pool.swap(amount0Out, amount1Out, recipient.value);
      if (!swapped.ok) return swapped;
    }
    return ok(undefined);
  }

  private nextPool(path: readonly Address[], hop: number): Result<Address> {
    const pool = this.registry.getPool(path[hop], path[hop + 1]);
    return pool
      ? ok(pool.address)
      : fail(
          FailureReason.InsufficientLiquidity,
          `no pool for ${path[hop]}/${path[hop + 1]}`,
        );
  }
}
