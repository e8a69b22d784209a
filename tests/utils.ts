import { Wallet } from 'ethers';
import { generateConfig, RouterConfig } from '../src/config';
import { MAX_UINT256 } from '../src/constants';
import {
  createRouterEnvironment,
  RouterEnvironment,
} from '../src/environment';
import { Address } from '../src/types';
import { expandTo18Decimals } from '../src/utils';

export const START_TIME = 1_000_000;
export const DEADLINE = 2_000_000;

export const TOKEN_A = '0x1000000000000000000000000000000000000000';
export const TOKEN_B = '0x2000000000000000000000000000000000000000';
export const TOKEN_C = '0x3000000000000000000000000000000000000000';

// Placeholder keys, never funded anywhere but the in-memory ledger
export const ALICE_WALLET = new Wallet('0x' + '11'.repeat(32));
export const MALLORY_WALLET = new Wallet('0x' + '22'.repeat(32));
export const ALICE = ALICE_WALLET.address.toLowerCase();
export const BOB = '0x000000000000000000000000000000000000b0b0';

export const e18 = expandTo18Decimals;

export function testConfig(overrides: Partial<RouterConfig> = {}): RouterConfig {
  return generateConfig({}, { logLevel: 'off', ...overrides });
}

export function setupEnvironment(
  overrides: Partial<RouterConfig> = {},
): RouterEnvironment {
  return createRouterEnvironment(testConfig(overrides), START_TIME);
}

// Mints `amount` of `token` to `holder` and approves the router for all of it
export function fund(
  env: RouterEnvironment,
  token: Address,
  holder: Address,
  amount: bigint,
): void {
  env.ledger.mint(token, holder, amount);
  env.ledger.approve(token, holder, env.router.address, MAX_UINT256);
}

// Funds ALICE and deposits both amounts as the first liquidity of the pair
export function seedPool(
  env: RouterEnvironment,
  tokenA: Address,
  tokenB: Address,
  amountA: bigint,
  amountB: bigint,
) {
  fund(env, tokenA, ALICE, amountA);
  fund(env, tokenB, ALICE, amountB);
  const added = env.router.addLiquidity(
    tokenA,
    tokenB,
    amountA,
    amountB,
    0n,
    0n,
    ALICE,
    DEADLINE,
    { from: ALICE },
  );
  if (!added.ok) {
    throw new Error(`Seeding ${tokenA}/${tokenB} failed: ${added.reason}`);
  }
  const pool = env.registry.getPool(tokenA, tokenB);
  if (!pool) {
    throw new Error(`Pool ${tokenA}/${tokenB} missing after seeding`);
  }
  return pool;
}
