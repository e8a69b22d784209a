import { Address, FailureReason, Logger, Result } from '../types';
import { fail, isSameAddress, ok } from '../utils';
import { InvariantModel } from './math/invariant-model';
import {
  AddLiquidityResult,
  Pool,
  Registry,
  RemoveLiquidityResult,
  TokenLedger,
} from './types';

export type DepositAmounts = {
  pool: Pool;
  amountA: bigint;
  amountB: bigint;
};

/**
 * Proportional deposits and withdrawals. `spender` is the router address:
 * tokens are pulled from payers under its allowance, or moved directly
 * when the router itself pays.
 */
export class LiquidityManager {
  constructor(
    protected registry: Registry,
    protected ledger: TokenLedger,
    protected invariant: InvariantModel,
    protected spender: Address,
    protected logger: Logger,
  ) {}

  computeDeposit(
    tokenA: Address,
    tokenB: Address,
    amountADesired: bigint,
    amountBDesired: bigint,
    amountAMin: bigint,
    amountBMin: bigint,
  ): Result<DepositAmounts> {
    let pool = this.registry.getPool(tokenA, tokenB);
    if (!pool) {
      const created = this.registry.createPool(tokenA, tokenB);
      if (!created.ok) return created;
      pool = created.value;
    }

    const state = pool.getState();
    const [reserveA, reserveB] = isSameAddress(tokenA, state.token0)
      ? [state.reserve0, state.reserve1]
      : [state.reserve1, state.reserve0];

    if (reserveA === 0n && reserveB === 0n) {
      return ok({ pool, amountA: amountADesired, amountB: amountBDesired });
    }

    // One side drained: only the other side can be deposited
    if (reserveA === 0n || reserveB === 0n) {
      const amountA = reserveA === 0n ? 0n : amountADesired;
      const amountB = reserveB === 0n ? 0n : amountBDesired;
      if (amountA < amountAMin) return fail(FailureReason.InsufficientAAmount);
      if (amountB < amountBMin) return fail(FailureReason.InsufficientBAmount);
      return ok({ pool, amountA, amountB });
    }

    const amountBOptimal = this.invariant.quote(
      amountADesired,
      reserveA,
      reserveB,
    );
    if (!amountBOptimal.ok) return amountBOptimal;
    if (amountBOptimal.value <= amountBDesired) {
      if (amountBOptimal.value < amountBMin) {
        return fail(
          FailureReason.InsufficientBAmount,
          `${amountBOptimal.value} < ${amountBMin}`,
        );
      }
      return ok({
        pool,
        amountA: amountADesired,
        amountB: amountBOptimal.value,
      });
    }

    const amountAOptimal = this.invariant.quote(
      amountBDesired,
      reserveB,
      reserveA,
    );
    if (!amountAOptimal.ok) return amountAOptimal;
    if (amountAOptimal.value > amountADesired) {
      throw new Error(
        `Optimal ${amountAOptimal.value} exceeds desired ${amountADesired}`,
      );
    }
    if (amountAOptimal.value < amountAMin) {
      return fail(
        FailureReason.InsufficientAAmount,
        `${amountAOptimal.value} < ${amountAMin}`,
      );
    }
    return ok({
      pool,
      amountA: amountAOptimal.value,
      amountB: amountBDesired,
    });
  }

  addLiquidity(
    tokenA: Address,
    tokenB: Address,
    amountADesired: bigint,
    amountBDesired: bigint,
    amountAMin: bigint,
    amountBMin: bigint,
    payer: Address,
    to: Address,
  ): Result<AddLiquidityResult> {
    const deposit = this.computeDeposit(
      tokenA,
      tokenB,
      amountADesired,
      amountBDesired,
      amountAMin,
      amountBMin,
    );
    if (!deposit.ok) return deposit;
    return this.provide(tokenA, tokenB, deposit.value, payer, payer, to);
  }

  // Pulls a computed deposit into the pool and mints the shares to `to`
  provide(
    tokenA: Address,
    tokenB: Address,
    deposit: DepositAmounts,
    payerA: Address,
    payerB: Address,
    to: Address,
  ): Result<AddLiquidityResult> {
    const { pool, amountA, amountB } = deposit;
    const pulledA = this.pull(tokenA, payerA, pool.address, amountA);
    if (!pulledA.ok) return pulledA;
    const pulledB = this.pull(tokenB, payerB, pool.address, amountB);
    if (!pulledB.ok) return pulledB;

    const liquidity = pool.mint(to);
    if (!liquidity.ok) return liquidity;

    this.logger.debug(
      `Deposited ${amountA}/${amountB} into ${pool.address} for ${liquidity.value} shares`,
    );
    return ok({ amountA, amountB, liquidity: liquidity.value });
  }

  removeLiquidity(
    tokenA: Address,
    tokenB: Address,
    liquidity: bigint,
    amountAMin: bigint,
    amountBMin: bigint,
    owner: Address,
    to: Address,
  ): Result<RemoveLiquidityResult> {
    const pool = this.registry.getPool(tokenA, tokenB);
    if (!pool) {
      return fail(
        FailureReason.InsufficientLiquidity,
        `no pool for ${tokenA}/${tokenB}`,
      );
    }

    const pulled = this.pull(pool.address, owner, pool.address, liquidity);
    if (!pulled.ok) return pulled;

    const burned = pool.burn(to);
    if (!burned.ok) return burned;

    const { amount0, amount1 } = burned.value;
    const [amountA, amountB] = isSameAddress(tokenA, pool.getState().token0)
      ? [amount0, amount1]
      : [amount1, amount0];
    if (amountA < amountAMin) {
      return fail(
        FailureReason.InsufficientAAmount,
        `${amountA} < ${amountAMin}`,
      );
    }
    if (amountB < amountBMin) {
      return fail(
        FailureReason.InsufficientBAmount,
        `${amountB} < ${amountBMin}`,
      );
    }
    return ok({ amountA, amountB });
  }

  pull(
    token: Address,
    payer: Address,
    to: Address,
    amount: bigint,
  ): Result<void> {
    return isSameAddress(payer, this.spender)
      ? this.ledger.transfer(token, payer, to, amount)
      : this.ledger.transferFrom(token, this.spender, payer, to, amount);
  }
}
