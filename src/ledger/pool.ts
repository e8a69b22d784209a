import { DeepReadonly } from 'ts-essentials';
import { BI_MAX_UINT112 } from '../bigint-constants';
import {
  FEE_DENOMINATOR,
  MINIMUM_LIQUIDITY,
  NULL_ADDRESS,
  PricingMode,
  TradeState,
} from '../constants';
import { InvariantModel, orientPool } from '../router/math/invariant-model';
import { BurnedAmounts, Pool, PoolState } from '../router/types';
import { Address, FailureReason, Logger, Result, Signature } from '../types';
import { fail, min, normalizeAddress, ok, sqrt } from '../utils';
import { Ledger, PairRecord } from './ledger';
import {
  buildPermitMessage,
  getPermitDomain,
  recoverPermitSigner,
} from './permit';

/**
 * Pair contract over the host ledger. Its own address doubles as the LP
 * token address. Every swap is re-priced with the same InvariantModel the
 * router quotes with, from the input the pool actually received.
 */
export class LedgerPool implements Pool {
  readonly address: Address;

  constructor(
    address: Address,
    protected ledger: Ledger,
    protected invariant: InvariantModel,
    readonly lpTokenName: string,
    protected logger: Logger,
  ) {
    this.address = normalizeAddress(address);
  }

  getState(): DeepReadonly<PoolState> {
    const { nonces, ...record } = this.record();
    return { ...record, totalSupply: this.ledger.totalSupply(this.address) };
  }

  nonces(owner: Address): bigint {
    return this.record().nonces[normalizeAddress(owner)] ?? 0n;
  }

  swap(amount0Out: bigint, amount1Out: bigint, to: Address): Result<void> {
    if (amount0Out <= 0n && amount1Out <= 0n) {
      return fail(FailureReason.InsufficientOutputAmount);
    }
    if (amount0Out > 0n && amount1Out > 0n) {
      return fail(FailureReason.InvariantViolated, 'two-sided output');
    }

    const state = this.getState();
    const isToken0In = amount1Out > 0n;
    const [tokenIn, tokenOut] = isToken0In
      ? [state.token0, state.token1]
      : [state.token1, state.token0];
    const amountOut = isToken0In ? amount1Out : amount0Out;
    const reserveIn = isToken0In ? state.reserve0 : state.reserve1;
    const reserveOut = isToken0In ? state.reserve1 : state.reserve0;

    if (amountOut > reserveOut) {
      return fail(FailureReason.InsufficientLiquidity);
    }

    // optimistic transfer: the output leaves before the input is checked
    const sent = this.ledger.transfer(tokenOut, this.address, to, amountOut);
    if (!sent.ok) return sent;

    const balanceIn = this.ledger.balanceOf(tokenIn, this.address);
    const amountIn = balanceIn > reserveIn ? balanceIn - reserveIn : 0n;
    if (amountIn === 0n) {
      return fail(FailureReason.InsufficientInputAmount);
    }

    const maxOut = this.invariant.getAmountOut(
      amountIn,
      orientPool(state, tokenIn),
    );
    if (!maxOut.ok) return maxOut;
    if (amountOut > maxOut.value) {
      return fail(
        FailureReason.InvariantViolated,
        `${amountIn} in covers ${maxOut.value} out, ${amountOut} requested`,
      );
    }

    return this.update();
  }

  mint(to: Address): Result<bigint> {
    const state = this.getState();
    const balance0 = this.ledger.balanceOf(state.token0, this.address);
    const balance1 = this.ledger.balanceOf(state.token1, this.address);
    const amount0 = balance0 - state.reserve0;
    const amount1 = balance1 - state.reserve1;
    const { totalSupply } = state;

    let liquidity: bigint;
    if (totalSupply === 0n) {
      const root = sqrt(amount0 * amount1);
      if (root <= MINIMUM_LIQUIDITY) {
        return fail(FailureReason.InsufficientLiquidityMinted);
      }
      liquidity = root - MINIMUM_LIQUIDITY;
      this.ledger.mint(this.address, NULL_ADDRESS, MINIMUM_LIQUIDITY);
    } else {
      liquidity = this.proportionalShares(state, amount0, amount1);
    }

    if (liquidity <= 0n) {
      return fail(FailureReason.InsufficientLiquidityMinted);
    }
    this.ledger.mint(this.address, to, liquidity);

    const updated = this.update();
    if (!updated.ok) return updated;
    this.logger.debug(`Mint ${liquidity} shares of ${this.address} to ${to}`);
    return ok(liquidity);
  }

  burn(to: Address): Result<BurnedAmounts> {
    const state = this.getState();
    const balance0 = this.ledger.balanceOf(state.token0, this.address);
    const balance1 = this.ledger.balanceOf(state.token1, this.address);
    const liquidity = this.ledger.balanceOf(this.address, this.address);
    const { totalSupply } = state;

    if (totalSupply === 0n) {
      return fail(FailureReason.InsufficientLiquidityBurned);
    }
    const amount0 = (liquidity * balance0) / totalSupply;
    const amount1 = (liquidity * balance1) / totalSupply;
    if (amount0 === 0n && amount1 === 0n) {
      return fail(FailureReason.InsufficientLiquidityBurned);
    }

    const burned = this.ledger.burn(this.address, this.address, liquidity);
    if (!burned.ok) return burned;
    const sent0 = this.ledger.transfer(state.token0, this.address, to, amount0);
    if (!sent0.ok) return sent0;
    const sent1 = this.ledger.transfer(state.token1, this.address, to, amount1);
    if (!sent1.ok) return sent1;

    const updated = this.update();
    if (!updated.ok) return updated;
    return ok({ amount0, amount1 });
  }

  permit(
    owner: Address,
    spender: Address,
    value: bigint,
    deadline: number,
    signature: Signature,
  ): Result<void> {
    if (deadline < this.ledger.now()) {
      return fail(FailureReason.Expired, 'permit deadline passed');
    }

    const nonce = this.nonces(owner);
    const signer = recoverPermitSigner(
      getPermitDomain(this.lpTokenName, this.ledger.chainId, this.address),
      buildPermitMessage(
        normalizeAddress(owner),
        normalizeAddress(spender),
        value,
        nonce,
        deadline,
      ),
      signature,
    );
    if (!signer.ok) return signer;
    if (signer.value !== normalizeAddress(owner)) {
      return fail(
        FailureReason.InvalidSignature,
        `signed by ${signer.value}, not ${owner}`,
      );
    }

    this.ledger.updatePair(this.address, {
      nonces: {
        ...this.record().nonces,
        [normalizeAddress(owner)]: nonce + 1n,
      },
    });
    this.ledger.approve(this.address, owner, spender, value);
    return ok(undefined);
  }

  makeXybk(boost0: bigint, boost1: bigint): void {
    if (boost0 < 1n || boost1 < 1n) {
      throw new Error(`Boosts must be at least 1, got ${boost0}/${boost1}`);
    }
    this.ledger.updatePair(this.address, {
      mode: PricingMode.XYBK,
      boost0,
      boost1,
    });
  }

  makeXyk(): void {
    const { reserve0, reserve1 } = this.record();
    // the plain curve cannot price against an empty side
    if (reserve0 === 0n || reserve1 === 0n) {
      throw new Error(`Pool ${this.address} has an empty reserve`);
    }
    this.ledger.updatePair(this.address, {
      mode: PricingMode.XYK,
      boost0: 1n,
      boost1: 1n,
    });
  }

  updateTradeState(tradeState: TradeState): void {
    this.ledger.updatePair(this.address, { tradeState });
  }

  setFee(fee: bigint): void {
    if (fee < 0n || fee >= FEE_DENOMINATOR) {
      throw new Error(`Fee ${fee} out of range`);
    }
    this.ledger.updatePair(this.address, { fee });
  }

  // Forces reserves to match balances
  sync(): Result<void> {
    return this.update();
  }

  private proportionalShares(
    state: DeepReadonly<PoolState>,
    amount0: bigint,
    amount1: bigint,
  ): bigint {
    const { reserve0, reserve1, totalSupply } = state;
    if (reserve0 === 0n && reserve1 === 0n) return 0n;
    if (reserve0 === 0n) return (amount1 * totalSupply) / reserve1;
    if (reserve1 === 0n) return (amount0 * totalSupply) / reserve0;
    return min(
      (amount0 * totalSupply) / reserve0,
      (amount1 * totalSupply) / reserve1,
    );
  }

  private update(): Result<void> {
    const { token0, token1 } = this.record();
    const reserve0 = this.ledger.balanceOf(token0, this.address);
    const reserve1 = this.ledger.balanceOf(token1, this.address);
    if (reserve0 > BI_MAX_UINT112 || reserve1 > BI_MAX_UINT112) {
      return fail(FailureReason.Overflow);
    }
    this.ledger.updatePair(this.address, { reserve0, reserve1 });
    this.logger.trace(`Sync ${this.address} ${reserve0} ${reserve1}`);
    return ok(undefined);
  }

  private record(): DeepReadonly<PairRecord> {
    const record = this.ledger.getPair(this.address);
    if (!record) {
      throw new Error(`Unknown pair ${this.address}`);
    }
    return record;
  }
}
