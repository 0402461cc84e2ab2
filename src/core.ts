/**
 * Core bootstrap
 *
 * Wires the backing store, cache, rate limiter, retry executor, job queues
 * and provider router from one immutable configuration.
 */

import { loadConfig, logConfig, type CoreConfig } from './config/index.js';
import { PROVIDER_TIERS_LIST, type TierConfig } from './config/tiers.js';
import { CacheStore } from './db/cache.js';
import { JobQueue, type JobQueueOptions, type JobSchema } from './db/queue.js';
import { connectStore, storeHealth, type KeyValueStore, type StoreHealth } from './db/store.js';
import { ConfigurationError } from './infra/errors.js';
import { RateLimiter } from './infra/rate-limiter.js';
import { RetryExecutor } from './infra/retry-executor.js';
import type { ProviderAdapter } from './providers/adapter.js';
import { createProviderAdapters } from './providers/index.js';
import { ProviderRouter } from './providers/router.js';
import { ExternalCallGuard } from './services/external-calls.js';

export interface Core {
  config: Readonly<CoreConfig>;
  store: KeyValueStore;
  cache: CacheStore;
  limiter: RateLimiter;
  retry: RetryExecutor;
  /** null when no provider credential is configured */
  router: ProviderRouter | null;
  guard: ExternalCallGuard;
  /** A job queue on the shared store, under the configured queue prefix */
  queue<T>(name: string, schema: JobSchema<T>, options?: Omit<JobQueueOptions, 'prefix'>): JobQueue<T>;
  health(): Promise<StoreHealth>;
  close(): Promise<void>;
}

export interface CreateCoreOptions {
  config?: Readonly<CoreConfig>;
  /** Use this store instead of connecting one from config */
  store?: KeyValueStore;
  /** Use these adapters instead of building them from credentials */
  adapters?: ProviderAdapter[];
}

/**
 * Drop tier entries whose provider has no adapter
 *
 * @throws ConfigurationError if a tier is left with no provider
 */
export function restrictTiers(tiers: Readonly<TierConfig>, available: ReadonlySet<string>): TierConfig {
  const restricted: TierConfig = { fast: [], balanced: [], deep: [] };

  for (const tier of PROVIDER_TIERS_LIST) {
    restricted[tier] = tiers[tier].filter(target => available.has(target.provider));
    const dropped = tiers[tier].length - restricted[tier].length;
    if (dropped > 0) {
      console.warn(`[Core] Tier ${tier}: skipping ${dropped} provider(s) without credentials`);
    }
    if (restricted[tier].length === 0) {
      throw new ConfigurationError(`Tier "${tier}" has no provider with configured credentials`);
    }
  }

  return restricted;
}

/**
 * Build the core from configuration (loaded from the environment by default)
 */
export async function createCore(options: CreateCoreOptions = {}): Promise<Core> {
  const config = options.config ?? loadConfig();
  logConfig(config);

  const store = options.store ?? (await connectStore(config.redisUrl));
  const cache = new CacheStore(store, { prefix: config.cacheKeyPrefix, ttls: config.cacheTtls });
  const limiter = new RateLimiter(store, config.rateLimits, { prefix: config.rateLimitKeyPrefix });
  const retry = new RetryExecutor();

  const adapters = options.adapters ?? createProviderAdapters(config);
  let router: ProviderRouter | null = null;
  if (adapters.length > 0) {
    router = new ProviderRouter({
      adapters,
      tiers: restrictTiers(config.tiers, new Set(adapters.map(a => a.id))),
      limiter,
      executor: retry,
      retry: config.providerRetry,
    });
  } else {
    console.warn('[Core] No provider credentials configured; completions unavailable');
  }

  return {
    config,
    store,
    cache,
    limiter,
    retry,
    router,
    guard: new ExternalCallGuard(cache, limiter, retry),
    queue: <T>(name: string, schema: JobSchema<T>, queueOptions: Omit<JobQueueOptions, 'prefix'> = {}) =>
      new JobQueue(store, name, schema, { ...queueOptions, prefix: config.queueKeyPrefix }),
    health: () => storeHealth(store),
    close: () => store.close(),
  };
}
