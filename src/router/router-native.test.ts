import { splitSignature } from 'ethers/lib/utils';
import {
  ALICE,
  ALICE_WALLET,
  BOB,
  DEADLINE,
  e18,
  fund,
  setupEnvironment,
  TOKEN_A,
  TOKEN_B,
} from '../../tests/utils';
import { MAX_UINT256, MINIMUM_LIQUIDITY } from '../constants';
import {
  buildPermitMessage,
  getPermitDomain,
  PERMIT_TYPES,
} from '../ledger/permit';
import { FailureReason } from '../types';

describe('Router native entry points', () => {
  const setup = () => {
    const env = setupEnvironment();
    const { router, ledger } = env;
    const weth = env.wrappedNative.address;

    fund(env, TOKEN_A, ALICE, e18(1000));
    ledger.creditNative(ALICE, e18(100));
    const seeded = router.addLiquidityNative(
      TOKEN_A,
      e18(100),
      0n,
      0n,
      ALICE,
      DEADLINE,
      { from: ALICE, value: e18(10) },
    );
    if (!seeded.ok) throw new Error(seeded.reason);

    fund(env, TOKEN_A, BOB, e18(10));
    ledger.creditNative(BOB, e18(10));

    const pool = env.registry.getPool(TOKEN_A, weth);
    if (!pool) throw new Error('native pool missing');
    return { env, router, ledger, weth, pool, seeded: seeded.value };
  };

  const expectRouterEmpty = (env: ReturnType<typeof setup>) => {
    expect(env.ledger.nativeBalanceOf(env.router.address)).toBe(0n);
    expect(env.ledger.balanceOf(env.weth, env.router.address)).toBe(0n);
  };

  it('seeds a pool from native value', () => {
    const env = setup();
    expect(env.seeded).toEqual({
      amountToken: e18(100),
      amountNative: e18(10),
      liquidity: 31622776601683793319n - MINIMUM_LIQUIDITY,
    });
    // the wrapped token sorts first
    expect(env.pool.getState()).toMatchObject({
      token0: env.weth,
      reserve0: e18(10),
      reserve1: e18(100),
    });
    expect(env.ledger.nativeBalanceOf(ALICE)).toBe(e18(90));
    expect(env.ledger.nativeBalanceOf(env.weth)).toBe(e18(10));
    expectRouterEmpty(env);
  });

  it('refunds native value a later deposit does not use', () => {
    const env = setup();

    expect(
      env.router.addLiquidityNative(
        TOKEN_A,
        e18(10),
        0n,
        0n,
        BOB,
        DEADLINE,
        { from: BOB, value: e18(5) },
      ),
    ).toMatchObject({
      ok: true,
      value: { amountToken: e18(10), amountNative: e18(1) },
    });
    expect(env.ledger.nativeBalanceOf(BOB)).toBe(e18(9));
    expectRouterEmpty(env);
  });

  it('swaps exact native for tokens', () => {
    const env = setup();

    expect(
      env.router.swapExactNativeForTokens(
        0n,
        [env.weth, TOKEN_A],
        BOB,
        DEADLINE,
        { from: BOB, value: e18(1) },
      ),
    ).toEqual({ ok: true, value: [e18(1), 9066108938801491315n] });
    expect(env.ledger.balanceOf(TOKEN_A, BOB)).toBe(
      e18(10) + 9066108938801491315n,
    );
    expect(env.ledger.nativeBalanceOf(BOB)).toBe(e18(9));
    expectRouterEmpty(env);
  });

  it('refunds the dust of a native exact-output swap', () => {
    const env = setup();

    expect(
      env.router.swapNativeForExactTokens(
        e18(1),
        [env.weth, TOKEN_A],
        BOB,
        DEADLINE,
        { from: BOB, value: e18(1) },
      ),
    ).toEqual({ ok: true, value: [101314043139519569n, e18(1)] });
    expect(env.ledger.nativeBalanceOf(BOB)).toBe(
      e18(10) - 101314043139519569n,
    );
    expectRouterEmpty(env);
  });

  it('fails when the attached value cannot cover the input', () => {
    const env = setup();

    expect(
      env.router.swapNativeForExactTokens(
        e18(1),
        [env.weth, TOKEN_A],
        BOB,
        DEADLINE,
        { from: BOB, value: 101314043139519568n },
      ),
    ).toEqual({
      ok: false,
      reason: FailureReason.ExcessiveInputAmount,
      detail: '101314043139519569 > 101314043139519568',
    });
    expect(env.ledger.nativeBalanceOf(BOB)).toBe(e18(10));
  });

  it('swaps exact tokens for native', () => {
    const env = setup();

    expect(
      env.router.swapExactTokensForNative(
        e18(1),
        0n,
        [TOKEN_A, env.weth],
        BOB,
        DEADLINE,
        { from: BOB },
      ),
    ).toEqual({ ok: true, value: [e18(1), 98715803439706129n] });
    expect(env.ledger.nativeBalanceOf(BOB)).toBe(
      e18(10) + 98715803439706129n,
    );
    expectRouterEmpty(env);
  });

  it('swaps tokens for exact native', () => {
    const env = setup();

    expect(
      env.router.swapTokensForExactNative(
        e18(1) / 10n,
        e18(2),
        [TOKEN_A, env.weth],
        BOB,
        DEADLINE,
        { from: BOB },
      ),
    ).toEqual({ ok: true, value: [1013140431395195689n, e18(1) / 10n] });
    expect(env.ledger.balanceOf(TOKEN_A, BOB)).toBe(
      e18(10) - 1013140431395195689n,
    );
    expect(env.ledger.nativeBalanceOf(BOB)).toBe(e18(10) + e18(1) / 10n);
    expectRouterEmpty(env);
  });

  it('requires the wrapped native token at the native end of the path', () => {
    const env = setup();

    expect(
      env.router.swapExactNativeForTokens(
        0n,
        [TOKEN_A, TOKEN_B],
        BOB,
        DEADLINE,
        { from: BOB, value: e18(1) },
      ),
    ).toMatchObject({ ok: false, reason: FailureReason.InvalidPath });
    expect(
      env.router.swapExactTokensForNative(
        e18(1),
        0n,
        [env.weth, TOKEN_A],
        BOB,
        DEADLINE,
        { from: BOB },
      ),
    ).toMatchObject({ ok: false, reason: FailureReason.InvalidPath });
    expect(env.ledger.nativeBalanceOf(BOB)).toBe(e18(10));
  });

  it('removes liquidity to native value', () => {
    const env = setup();
    const { ledger, pool, router } = env;
    ledger.approve(pool.address, ALICE, router.address, MAX_UINT256);

    expect(
      env.router.removeLiquidityNative(
        TOKEN_A,
        e18(1),
        0n,
        0n,
        BOB,
        DEADLINE,
        { from: ALICE },
      ),
    ).toEqual({
      ok: true,
      value: {
        amountToken: 3162277660168379332n,
        amountNative: 316227766016837933n,
      },
    });
    expect(env.ledger.balanceOf(TOKEN_A, BOB)).toBe(
      e18(10) + 3162277660168379332n,
    );
    expect(env.ledger.nativeBalanceOf(BOB)).toBe(
      e18(10) + 316227766016837933n,
    );
    expectRouterEmpty(env);
  });

  it('fails the whole removal below the native minimum', () => {
    const env = setup();
    const { ledger, pool, router } = env;
    ledger.approve(pool.address, ALICE, router.address, MAX_UINT256);

    expect(
      env.router.removeLiquidityNative(
        TOKEN_A,
        e18(1),
        0n,
        316227766016837934n,
        BOB,
        DEADLINE,
        { from: ALICE },
      ),
    ).toMatchObject({ ok: false, reason: FailureReason.InsufficientBAmount });
    expect(env.ledger.balanceOf(TOKEN_A, BOB)).toBe(e18(10));
    expect(env.ledger.balanceOf(env.pool.address, ALICE)).toBe(
      env.seeded.liquidity,
    );
  });

  it('removes to native value with a signed approval', async () => {
    const env = setup();
    const { ledger, pool, router } = env;
    const signature = splitSignature(
      await ALICE_WALLET._signTypedData(
        getPermitDomain('Xybk LP', 1, pool.address),
        PERMIT_TYPES,
        buildPermitMessage(ALICE, router.address, e18(1), 0n, DEADLINE),
      ),
    );

    expect(
      router.removeLiquidityNativeWithPermit(
        TOKEN_A,
        e18(1),
        0n,
        0n,
        BOB,
        DEADLINE,
        { approveMax: false, signature },
        { from: ALICE },
      ),
    ).toEqual({
      ok: true,
      value: {
        amountToken: 3162277660168379332n,
        amountNative: 316227766016837933n,
      },
    });
    expect(ledger.allowance(pool.address, ALICE, router.address)).toBe(0n);
    expectRouterEmpty(env);
  });
});
