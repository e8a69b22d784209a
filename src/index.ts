export * from './constants';
export * from './types';
export * from './config';
export * from './logger';
export * from './environment';
export * from './router/types';
export * from './router/router';
export * from './router/path-pricer';
export * from './router/swap-executor';
export * from './router/liquidity-manager';
export * from './router/guards';
export * from './router/native-asset-bridge';
export * from './router/math/invariant-model';
export * from './router/math/xyk';
export * from './router/math/xybk';
export * from './ledger/ledger';
export * from './ledger/pool';
export * from './ledger/registry';
export * from './ledger/wrapped-native';
export * from './ledger/permit';
