import { DeepReadonly } from 'ts-essentials';
import { MAX_UINT256, SwapSide } from '../constants';
import { Address, FailureReason, Logger, Result, TxContext } from '../types';
import { fail, isSameAddress, normalizeAddress, ok } from '../utils';
import { DeadlineGuard, ReentrancyGuard } from './guards';
import { LiquidityManager } from './liquidity-manager';
import { InvariantModel } from './math/invariant-model';
import { NativeAssetBridge } from './native-asset-bridge';
import { PathPricer, validatePath } from './path-pricer';
import { SwapExecutor } from './swap-executor';
import {
  AddLiquidityNativeResult,
  AddLiquidityResult,
  AmountVector,
  HopPricing,
  NativeAssetAdapter,
  PermitParams,
  Registry,
  RemoveLiquidityNativeResult,
  RemoveLiquidityResult,
  TokenLedger,
} from './types';

export type RouterOptions = {
  address: Address;
  registry: Registry;
  ledger: TokenLedger;
  wrappedNative: NativeAssetAdapter;
  logger: Logger;
  invariant?: InvariantModel;
};

/**
 * Entry points for liquidity provision and multi-hop swaps. Every mutating
 * call checks its deadline, takes the reentrancy lock and runs inside one
 * ledger transaction, so a failure leaves no effect behind.
 */
export class Router {
  readonly address: Address;
  readonly registry: Registry;
  readonly wrappedNative: NativeAssetAdapter;
  readonly invariant: InvariantModel;

  protected ledger: TokenLedger;
  protected logger: Logger;
  protected pricer: PathPricer;
  protected executor: SwapExecutor;
  protected liquidity: LiquidityManager;
  protected bridge: NativeAssetBridge;

  private readonly reentrancyGuard = new ReentrancyGuard();
  private readonly deadlineGuard: DeadlineGuard;

  constructor(options: RouterOptions) {
    this.address = normalizeAddress(options.address);
    this.registry = options.registry;
    this.wrappedNative = options.wrappedNative;
    this.ledger = options.ledger;
    this.logger = options.logger;
    this.invariant = options.invariant ?? new InvariantModel();

    this.deadlineGuard = new DeadlineGuard(this.ledger);
    this.pricer = new PathPricer(this.registry, this.invariant);
    this.executor = new SwapExecutor(this.registry);
    this.liquidity = new LiquidityManager(
      this.registry,
      this.ledger,
      this.invariant,
      this.address,
      this.logger,
    );
    this.bridge = new NativeAssetBridge(
      this.ledger,
      this.wrappedNative,
      this.address,
    );
  }

  /* Liquidity */

  addLiquidity(
    tokenA: Address,
    tokenB: Address,
    amountADesired: bigint,
    amountBDesired: bigint,
    amountAMin: bigint,
    amountBMin: bigint,
    to: Address,
    deadline: number,
    tx: TxContext,
  ): Result<AddLiquidityResult> {
    return this.guarded('addLiquidity', deadline, () =>
      this.liquidity.addLiquidity(
        tokenA,
        tokenB,
        amountADesired,
        amountBDesired,
        amountAMin,
        amountBMin,
        tx.from,
        to,
      ),
    );
  }

  addLiquidityNative(
    token: Address,
    amountTokenDesired: bigint,
    amountTokenMin: bigint,
    amountNativeMin: bigint,
    to: Address,
    deadline: number,
    tx: TxContext,
  ): Result<AddLiquidityNativeResult> {
    const value = tx.value ?? 0n;
    const weth = this.wrappedNative.address;

    return this.guarded('addLiquidityNative', deadline, () => {
      const received = this.bridge.receive(tx.from, value);
      if (!received.ok) return received;

      const deposit = this.liquidity.computeDeposit(
        token,
        weth,
        amountTokenDesired,
        value,
        amountTokenMin,
        amountNativeMin,
      );
      if (!deposit.ok) return deposit;

      const { amountA: amountToken, amountB: amountNative } = deposit.value;
      const wrapped = this.bridge.wrap(amountNative);
      if (!wrapped.ok) return wrapped;

      const provided = this.liquidity.provide(
        token,
        weth,
        deposit.value,
        tx.from,
        this.address,
        to,
      );
      if (!provided.ok) return provided;

      const refunded = this.bridge.refund(tx.from, value, amountNative);
      if (!refunded.ok) return refunded;
      return ok({
        amountToken,
        amountNative,
        liquidity: provided.value.liquidity,
      });
    });
  }

  removeLiquidity(
    tokenA: Address,
    tokenB: Address,
    liquidity: bigint,
    amountAMin: bigint,
    amountBMin: bigint,
    to: Address,
    deadline: number,
    tx: TxContext,
  ): Result<RemoveLiquidityResult> {
    return this.guarded('removeLiquidity', deadline, () =>
      this.liquidity.removeLiquidity(
        tokenA,
        tokenB,
        liquidity,
        amountAMin,
        amountBMin,
        tx.from,
        to,
      ),
    );
  }

  removeLiquidityNative(
    token: Address,
    liquidity: bigint,
    amountTokenMin: bigint,
    amountNativeMin: bigint,
    to: Address,
    deadline: number,
    tx: TxContext,
  ): Result<RemoveLiquidityNativeResult> {
    return this.guarded('removeLiquidityNative', deadline, () =>
      this.removeNative(
        token,
        liquidity,
        amountTokenMin,
        amountNativeMin,
        to,
        tx.from,
      ),
    );
  }

  removeLiquidityWithPermit(
    tokenA: Address,
    tokenB: Address,
    liquidity: bigint,
    amountAMin: bigint,
    amountBMin: bigint,
    to: Address,
    deadline: number,
    permit: PermitParams,
    tx: TxContext,
  ): Result<RemoveLiquidityResult> {
    return this.guarded('removeLiquidityWithPermit', deadline, () => {
      const permitted = this.applyPermit(
        tokenA,
        tokenB,
        liquidity,
        deadline,
        permit,
        tx.from,
      );
      if (!permitted.ok) return permitted;
      return this.liquidity.removeLiquidity(
        tokenA,
        tokenB,
        liquidity,
        amountAMin,
        amountBMin,
        tx.from,
        to,
      );
    });
  }

  removeLiquidityNativeWithPermit(
    token: Address,
    liquidity: bigint,
    amountTokenMin: bigint,
    amountNativeMin: bigint,
    to: Address,
    deadline: number,
    permit: PermitParams,
    tx: TxContext,
  ): Result<RemoveLiquidityNativeResult> {
    return this.guarded('removeLiquidityNativeWithPermit', deadline, () => {
      const permitted = this.applyPermit(
        token,
        this.wrappedNative.address,
        liquidity,
        deadline,
        permit,
        tx.from,
      );
      if (!permitted.ok) return permitted;
      return this.removeNative(
        token,
        liquidity,
        amountTokenMin,
        amountNativeMin,
        to,
        tx.from,
      );
    });
  }

  /* Swaps */

  swapExactTokensForTokens(
    amountIn: bigint,
    amountOutMin: bigint,
    path: readonly Address[],
    to: Address,
    deadline: number,
    tx: TxContext,
  ): Result<AmountVector> {
    return this.guarded('swapExactTokensForTokens', deadline, () => {
      const amounts = this.pricer.quoteExactIn(path, amountIn);
      if (!amounts.ok) return amounts;
      const bounded = this.checkMinOut(amounts.value, amountOutMin);
      if (!bounded.ok) return bounded;
      return this.swapFrom(tx.from, amounts.value, path, to);
    });
  }

  swapTokensForExactTokens(
    amountOut: bigint,
    amountInMax: bigint,
    path: readonly Address[],
    to: Address,
    deadline: number,
    tx: TxContext,
  ): Result<AmountVector> {
    return this.guarded('swapTokensForExactTokens', deadline, () => {
      const amounts = this.pricer.quoteExactOut(path, amountOut);
      if (!amounts.ok) return amounts;
      const bounded = this.checkMaxIn(amounts.value, amountInMax);
      if (!bounded.ok) return bounded;
      return this.swapFrom(tx.from, amounts.value, path, to);
    });
  }

  swapExactNativeForTokens(
    amountOutMin: bigint,
    path: readonly Address[],
    to: Address,
    deadline: number,
    tx: TxContext,
  ): Result<AmountVector> {
    const value = tx.value ?? 0n;
    return this.guarded('swapExactNativeForTokens', deadline, () => {
      const valid = this.checkNativeEnd(path, 'first');
      if (!valid.ok) return valid;
      const amounts = this.pricer.quoteExactIn(path, value);
      if (!amounts.ok) return amounts;
      const bounded = this.checkMinOut(amounts.value, amountOutMin);
      if (!bounded.ok) return bounded;

      const received = this.bridge.receive(tx.from, value);
      if (!received.ok) return received;
      return this.swapWrapped(amounts.value, path, to);
    });
  }

  swapTokensForExactNative(
    amountOut: bigint,
    amountInMax: bigint,
    path: readonly Address[],
    to: Address,
    deadline: number,
    tx: TxContext,
  ): Result<AmountVector> {
    return this.guarded('swapTokensForExactNative', deadline, () => {
      const valid = this.checkNativeEnd(path, 'last');
      if (!valid.ok) return valid;
      const amounts = this.pricer.quoteExactOut(path, amountOut);
      if (!amounts.ok) return amounts;
      const bounded = this.checkMaxIn(amounts.value, amountInMax);
      if (!bounded.ok) return bounded;
      return this.swapToNative(tx.from, amounts.value, path, to);
    });
  }

  swapExactTokensForNative(
    amountIn: bigint,
    amountOutMin: bigint,
    path: readonly Address[],
    to: Address,
    deadline: number,
    tx: TxContext,
  ): Result<AmountVector> {
    return this.guarded('swapExactTokensForNative', deadline, () => {
      const valid = this.checkNativeEnd(path, 'last');
      if (!valid.ok) return valid;
      const amounts = this.pricer.quoteExactIn(path, amountIn);
      if (!amounts.ok) return amounts;
      const bounded = this.checkMinOut(amounts.value, amountOutMin);
      if (!bounded.ok) return bounded;
      return this.swapToNative(tx.from, amounts.value, path, to);
    });
  }

  swapNativeForExactTokens(
    amountOut: bigint,
    path: readonly Address[],
    to: Address,
    deadline: number,
    tx: TxContext,
  ): Result<AmountVector> {
    const value = tx.value ?? 0n;
    return this.guarded('swapNativeForExactTokens', deadline, () => {
      const valid = this.checkNativeEnd(path, 'first');
      if (!valid.ok) return valid;
      const amounts = this.pricer.quoteExactOut(path, amountOut);
      if (!amounts.ok) return amounts;
      const bounded = this.checkMaxIn(amounts.value, value);
      if (!bounded.ok) return bounded;

      const received = this.bridge.receive(tx.from, value);
      if (!received.ok) return received;
      const swapped = this.swapWrapped(amounts.value, path, to);
      if (!swapped.ok) return swapped;

      const refunded = this.bridge.refund(tx.from, value, amounts.value[0]);
      if (!refunded.ok) return refunded;
      return swapped;
    });
  }

  /* Read-only */

  quote(amountA: bigint, reserveA: bigint, reserveB: bigint): Result<bigint> {
    return this.invariant.quote(amountA, reserveA, reserveB);
  }

  getAmountOut(
    amountIn: bigint,
    hop: DeepReadonly<HopPricing>,
  ): Result<bigint> {
    return this.invariant.getAmountOut(amountIn, hop);
  }

  getAmountIn(
    amountOut: bigint,
    hop: DeepReadonly<HopPricing>,
  ): Result<bigint> {
    return this.invariant.getAmountIn(amountOut, hop);
  }

  getAmountsOut(
    amountIn: bigint,
    path: readonly Address[],
  ): Result<AmountVector> {
    return this.pricer.quote(SwapSide.SELL, path, amountIn);
  }

  getAmountsIn(
    amountOut: bigint,
    path: readonly Address[],
  ): Result<AmountVector> {
    return this.pricer.quote(SwapSide.BUY, path, amountOut);
  }

  /* Internals */

  private guarded<T>(
    operation: string,
    deadline: number,
    body: () => Result<T>,
  ): Result<T> {
    const live = this.deadlineGuard.check(deadline);
    const result = live.ok
      ? this.reentrancyGuard.run(() => this.ledger.transact(body))
      : live;

    if (!result.ok) {
      this.logger.debug(
        `${operation} failed: ${result.reason}${
          result.detail ? ` (${result.detail})` : ''
        }`,
      );
    }
    return result;
  }

  private removeNative(
    token: Address,
    liquidity: bigint,
    amountTokenMin: bigint,
    amountNativeMin: bigint,
    to: Address,
    owner: Address,
  ): Result<RemoveLiquidityNativeResult> {
    const removed = this.liquidity.removeLiquidity(
      token,
      this.wrappedNative.address,
      liquidity,
      amountTokenMin,
      amountNativeMin,
      owner,
      this.address,
    );
    if (!removed.ok) return removed;

    const { amountA: amountToken, amountB: amountNative } = removed.value;
    const sent = this.ledger.transfer(token, this.address, to, amountToken);
    if (!sent.ok) return sent;
    const unwrapped = this.bridge.unwrap(amountNative);
    if (!unwrapped.ok) return unwrapped;
    const paid = this.bridge.pay(to, amountNative);
    if (!paid.ok) return paid;
    return ok({ amountToken, amountNative });
  }

  private applyPermit(
    tokenA: Address,
    tokenB: Address,
    liquidity: bigint,
    deadline: number,
    permit: PermitParams,
    owner: Address,
  ): Result<void> {
    const pool = this.registry.getPool(tokenA, tokenB);
    if (!pool) {
      return fail(
        FailureReason.InsufficientLiquidity,
        `no pool for ${tokenA}/${tokenB}`,
      );
    }
    const value = permit.approveMax ? MAX_UINT256 : liquidity;
    return pool.permit(owner, this.address, value, deadline, permit.signature);
  }

  private checkMinOut(
    amounts: AmountVector,
    amountOutMin: bigint,
  ): Result<void> {
    const amountOut = amounts[amounts.length - 1];
    return amountOut < amountOutMin
      ? fail(
          FailureReason.InsufficientOutputAmount,
          `${amountOut} < ${amountOutMin}`,
        )
      : ok(undefined);
  }

  private checkMaxIn(amounts: AmountVector, amountInMax: bigint): Result<void> {
    return amounts[0] > amountInMax
      ? fail(
          FailureReason.ExcessiveInputAmount,
          `${amounts[0]} > ${amountInMax}`,
        )
      : ok(undefined);
  }

  private checkNativeEnd(
    path: readonly Address[],
    end: 'first' | 'last',
  ): Result<void> {
    const valid = validatePath(path);
    if (!valid.ok) return valid;
    const token = end === 'first' ? path[0] : path[path.length - 1];
    return isSameAddress(token, this.wrappedNative.address)
      ? ok(undefined)
      : fail(
          FailureReason.InvalidPath,
          `${end} token ${token} is not the wrapped native asset`,
        );
  }

  private firstPool(path: readonly Address[]): Result<Address> {
    const pool = this.registry.getPool(path[0], path[1]);
    return pool
      ? ok(pool.address)
      : fail(
          FailureReason.InsufficientLiquidity,
          `no pool for ${path[0]}/${path[1]}`,
        );
  }

  // Pulls the input from `payer` into the first pool and runs the path
  private swapFrom(
    payer: Address,
    amounts: AmountVector,
    path: readonly Address[],
    to: Address,
  ): Result<AmountVector> {
    const pool = this.firstPool(path);
    if (!pool.ok) return pool;
    const pulled = this.liquidity.pull(path[0], payer, pool.value, amounts[0]);
    if (!pulled.ok) return pulled;

    const executed = this.executor.execute(amounts, path, to);
    if (!executed.ok) return executed;
    return ok(amounts);
  }

  // Wraps the native input the router holds and runs the path
  private swapWrapped(
    amounts: AmountVector,
    path: readonly Address[],
    to: Address,
  ): Result<AmountVector> {
    const pool = this.firstPool(path);
    if (!pool.ok) return pool;
    const wrapped = this.bridge.wrapTo(pool.value, amounts[0]);
    if (!wrapped.ok) return wrapped;

    const executed = this.executor.execute(amounts, path, to);
    if (!executed.ok) return executed;
    return ok(amounts);
  }

  // Runs the path into the router, then unwraps and pays out natively
  private swapToNative(
    payer: Address,
    amounts: AmountVector,
    path: readonly Address[],
    to: Address,
  ): Result<AmountVector> {
    const swapped = this.swapFrom(payer, amounts, path, this.address);
    if (!swapped.ok) return swapped;

    const amountOut = amounts[amounts.length - 1];
    const unwrapped = this.bridge.unwrap(amountOut);
    if (!unwrapped.ok) return unwrapped;
    const paid = this.bridge.pay(to, amountOut);
    if (!paid.ok) return paid;
    return ok(amounts);
  }
}
