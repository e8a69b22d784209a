import { RouterConfig } from './config';
import { Ledger } from './ledger/ledger';
import { LedgerRegistry } from './ledger/registry';
import { LedgerWrappedNative } from './ledger/wrapped-native';
import { configureLogging, getLogger } from './logger';
import { InvariantModel } from './router/math/invariant-model';
import { Router } from './router/router';

export type RouterEnvironment = {
  config: RouterConfig;
  ledger: Ledger;
  registry: LedgerRegistry;
  wrappedNative: LedgerWrappedNative;
  router: Router;
};

/**
 * Wires a router to a fresh in-memory ledger with the registry and the
 * wrapped native token deployed at the configured addresses.
 */
export function createRouterEnvironment(
  config: RouterConfig,
  timestamp = 0,
  invariant = new InvariantModel(),
): RouterEnvironment {
  configureLogging(config.logLevel);

  const ledger = new Ledger(config.chainId, timestamp, getLogger('Ledger'));
  const registry = new LedgerRegistry(
    config.registryAddress,
    ledger,
    invariant,
    {
      defaultSwapFee: config.defaultSwapFee,
      lpTokenName: config.lpTokenName,
    },
    getLogger('Registry'),
  );
  const wrappedNative = new LedgerWrappedNative(
    config.wrappedNativeAddress,
    ledger,
  );
  const router = new Router({
    address: config.routerAddress,
    registry,
    ledger,
    wrappedNative,
    invariant,
    logger: getLogger('Router'),
  });

  return { config, ledger, registry, wrappedNative, router };
}
