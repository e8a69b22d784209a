import fs from 'fs';
import dotenv from 'dotenv';
import { getAddress } from 'ethers/lib/utils';
import { DEFAULT_SWAP_FEE, FEE_DENOMINATOR } from './constants';
import { Address } from './types';

export type RouterConfig = {
  chainId: number;
  logLevel: string;
  defaultSwapFee: bigint;
  lpTokenName: string;
  routerAddress: Address;
  registryAddress: Address;
  wrappedNativeAddress: Address;
};

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'off'];

// Deterministic placeholder deployment addresses for the in-memory ledger
const DEFAULT_ADDRESSES = {
  routerAddress: '0x00000000000000000000000000000000000000a1',
  registryAddress: '0x00000000000000000000000000000000000000f1',
  wrappedNativeAddress: '0x00000000000000000000000000000000000000e1',
};

export const baseConfig: RouterConfig = {
  chainId: 1,
  logLevel: 'info',
  defaultSwapFee: DEFAULT_SWAP_FEE,
  lpTokenName: 'Xybk LP',
  ...DEFAULT_ADDRESSES,
};

function parseAddress(name: string, value: string): Address {
  try {
    return getAddress(value).toLowerCase();
  } catch (e) {
    throw new Error(`${name} is not a valid address: ${value}`);
  }
}

function parseChainId(value: string): number {
  const chainId = Number(value);
  if (!Number.isInteger(chainId) || chainId <= 0) {
    throw new Error(`CHAIN_ID must be a positive integer, got ${value}`);
  }
  return chainId;
}

function parseSwapFee(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new Error(`DEFAULT_SWAP_FEE must be an integer, got ${value}`);
  }
  const fee = BigInt(value);
  if (fee >= FEE_DENOMINATOR) {
    throw new Error(
      `DEFAULT_SWAP_FEE must be below ${FEE_DENOMINATOR}, got ${value}`,
    );
  }
  return fee;
}

function parseLogLevel(value: string): string {
  const level = value.toLowerCase();
  if (!LOG_LEVELS.includes(level)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

export function generateConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<RouterConfig> = {},
): RouterConfig {
  const config: RouterConfig = {
    chainId: env.CHAIN_ID ? parseChainId(env.CHAIN_ID) : baseConfig.chainId,
    logLevel: env.LOG_LEVEL
      ? parseLogLevel(env.LOG_LEVEL)
      : baseConfig.logLevel,
    defaultSwapFee: env.DEFAULT_SWAP_FEE
      ? parseSwapFee(env.DEFAULT_SWAP_FEE)
      : baseConfig.defaultSwapFee,
    lpTokenName: env.LP_TOKEN_NAME || baseConfig.lpTokenName,
    routerAddress: env.ROUTER_ADDRESS
      ? parseAddress('ROUTER_ADDRESS', env.ROUTER_ADDRESS)
      : baseConfig.routerAddress,
    registryAddress: env.REGISTRY_ADDRESS
      ? parseAddress('REGISTRY_ADDRESS', env.REGISTRY_ADDRESS)
      : baseConfig.registryAddress,
    wrappedNativeAddress: env.WRAPPED_NATIVE_ADDRESS
      ? parseAddress('WRAPPED_NATIVE_ADDRESS', env.WRAPPED_NATIVE_ADDRESS)
      : baseConfig.wrappedNativeAddress,
  };

  return { ...config, ...overrides };
}

// Layers a .env file (the working directory's by default) under the process
// environment; variables already set in the process win
export function loadConfig(
  overrides: Partial<RouterConfig> = {},
  path?: string,
): RouterConfig {
  const file = path ?? '.env';
  if (path === undefined && !fs.existsSync(file)) {
    return generateConfig(process.env, overrides);
  }
  const parsed = dotenv.parse(fs.readFileSync(file));
  return generateConfig({ ...parsed, ...process.env }, overrides);
}
