/**
 * Resilience Core
 *
 * Shared plumbing for services that call quota-limited external APIs and
 * LLM providers:
 *
 *   CACHE → RATE LIMITER → RETRY EXECUTOR → PROVIDER ROUTER
 *
 * @example
 * ```typescript
 * const core = await createCore();
 * const reply = await core.router?.complete(
 *   { messages: [{ role: 'user', content: 'Plan my week' }] },
 *   'balanced'
 * );
 * await core.close();
 * ```
 */

export { createCore, restrictTiers, type Core, type CreateCoreOptions } from './core.js';

export * from './infra/index.js';
export * from './providers/index.js';

export {
  loadConfig,
  logConfig,
  parseConfigFile,
  DEFAULT_PROVIDER_RETRY,
  CacheNamespaces,
  DEFAULT_CACHE_TTLS,
  DEFAULT_RATE_LIMITS,
  DEFAULT_TIERS,
  FALLBACK_CACHE_TTL_MS,
  PROVIDER_TIERS_LIST,
  QueueNames,
  TIER_ALIASES,
  getTierChain,
  isProviderTier,
  providerResource,
  resolveTier,
  type BucketConfig,
  type ConfigFile,
  type CoreConfig,
  type ProviderRetrySettings,
  type ProviderTier,
  type TierConfig,
  type TierName,
  type TierTarget,
} from './config/index.js';

export {
  CacheStore,
  cacheKeyFromArgs,
  type CacheEntry,
  type CacheSchema,
  type CacheStoreOptions,
  type ComputeFn,
  type GetOrComputeOptions,
} from './db/cache.js';

export {
  JobQueue,
  jobPayloadSchema,
  type ClaimedJob,
  type FailedJob,
  type Job,
  type JobQueueOptions,
  type JobSchema,
  type PopOptions,
} from './db/queue.js';

export {
  MemoryStore,
  RedisStore,
  connectRedisStore,
  connectStore,
  escapeGlob,
  globToRegExp,
  storeHealth,
  type KeyValueStore,
  type RedisClient,
  type StoreHealth,
} from './db/store.js';

export {
  estimateMessageTokens,
  estimateRequestTokens,
  estimateTokens,
  estimateToolTokens,
} from './context/tokenizer.js';

export { ExternalCallGuard, type GuardedCallOptions } from './services/external-calls.js';
