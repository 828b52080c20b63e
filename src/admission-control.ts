/**
 * Admission Control - Wiring
 *
 * Builds a ready-to-use controller from loaded configuration: picks the
 * counter store, connects Redis when needed and keeps the rule index in
 * step with the config file.
 */

import type { RequestHandler } from 'express';

import type { ConfigLoader, LoadedConfig } from './config/loader.js';
import { toBanPolicy } from './config/loader.js';
import { AdmissionController } from './rate-limiter/admission.js';
import { createAdmissionMiddleware, type AdmissionMiddlewareOptions } from './rate-limiter/middleware.js';
import { MemoryCounterStore } from './rate-limiter/store/memory-store.js';
import { RedisCounterStore } from './rate-limiter/store/redis-store.js';
import type { CounterStore } from './rate-limiter/store/types.js';
import type { Clock } from './rate-limiter/types.js';
import { createRedisClient, type RedisClientWrapper } from './storage/redis.js';
import { logLifecycle } from './utils/logger.js';

// =============================================================================
// Types
// =============================================================================

export interface AdmissionControlOptions {
  /** Use this store instead of the one the configuration names */
  store?: CounterStore;
  /** Use this Redis client instead of opening a new connection */
  redis?: RedisClientWrapper;
  clock?: Clock;
}

export interface AdmissionControl {
  controller: AdmissionController;
  store: CounterStore;
  /** Express middleware with `trustProxy` taken from configuration */
  middleware: (options?: Omit<AdmissionMiddlewareOptions, 'controller'>) => RequestHandler;
  /** Swap the controller's rules whenever the loader reloads */
  follow: (loader: ConfigLoader) => void;
  /** Release connections opened here */
  close: () => Promise<void>;
}

// =============================================================================
// Factory Function
// =============================================================================

export async function createAdmissionControl(
  loaded: LoadedConfig,
  options: AdmissionControlOptions = {}
): Promise<AdmissionControl> {
  const { config, ruleIndex } = loaded;
  let ownedRedis: RedisClientWrapper | null = null;
  let store: CounterStore;

  if (options.store !== undefined) {
    store = options.store;
  } else if (config.store === 'memory') {
    store = new MemoryCounterStore(options.clock);
  } else {
    let redis = options.redis;
    if (redis === undefined) {
      redis = createRedisClient({ config: config.redis, keyPrefix: config.keyPrefix });
      await redis.connect();
      ownedRedis = redis;
    }
    store = new RedisCounterStore(redis, { timeoutMs: config.storeTimeoutMs });
  }

  const controller = new AdmissionController({
    ruleIndex,
    store,
    policy: toBanPolicy(config),
    settings: {
      enableBans: config.enableBans,
      siteBan: config.siteBan,
      failureMode: config.failureMode,
    },
    clock: options.clock,
  });

  logLifecycle('ready', 'Admission control ready', {
    store: options.store !== undefined ? 'custom' : config.store,
    rules: ruleIndex.size,
  });

  return {
    controller,
    store,
    middleware: (middlewareOptions = {}) =>
      createAdmissionMiddleware({ trustProxy: config.trustProxy, ...middlewareOptions, controller }),
    follow: (loader) => {
      loader.onConfigChange((next) => controller.reload(next.ruleIndex));
    },
    close: async () => {
      if (ownedRedis !== null) {
        await ownedRedis.disconnect();
        ownedRedis = null;
      }
    },
  };
}

export default createAdmissionControl;
