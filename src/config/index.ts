/**
 * Core Configuration
 *
 * Loaded once at startup from the environment plus an optional JSON file
 * (CORE_CONFIG_PATH), validated, then frozen for the process lifetime.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError, toError } from '../infra/errors.js';
import {
  DEFAULT_CACHE_TTLS,
  DEFAULT_RATE_LIMITS,
  type BucketConfig,
} from './limits.js';
import { DEFAULT_TIERS, PROVIDER_TIERS_LIST, type TierConfig } from './tiers.js';

export interface ProviderRetrySettings {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: number;
}

export interface CoreConfig {
  /** null = in-memory store */
  redisUrl: string | null;
  cacheKeyPrefix: string;
  rateLimitKeyPrefix: string;
  queueKeyPrefix: string;
  /** Opaque provider credentials, null when not configured */
  credentials: {
    anthropic: string | null;
    openai: string | null;
  };
  rateLimits: Record<string, BucketConfig>;
  /** Per-namespace cache TTL in milliseconds */
  cacheTtls: Record<string, number>;
  tiers: TierConfig;
  providerRetry: ProviderRetrySettings;
}

/**
 * Default retry policy for a single provider attempt
 */
export const DEFAULT_PROVIDER_RETRY: ProviderRetrySettings = {
  maxAttempts: 2,
  baseDelayMs: 500,
  maxDelayMs: 4000,
  jitter: 0.2,
};

const bucketSchema = z.object({
  capacity: z.number().int().positive(),
  refillPerSecond: z.number().positive(),
});

const tierChainSchema = z
  .array(z.object({ provider: z.string().min(1), model: z.string().min(1) }))
  .min(1);

const configFileSchema = z
  .object({
    rateLimits: z.record(bucketSchema).optional(),
    cacheTtls: z.record(z.number().positive()).optional(),
    tiers: z
      .object({
        fast: tierChainSchema,
        balanced: tierChainSchema,
        deep: tierChainSchema,
      })
      .partial()
      .optional(),
    providerRetry: z
      .object({
        maxAttempts: z.number().int().min(1),
        baseDelayMs: z.number().nonnegative(),
        maxDelayMs: z.number().nonnegative(),
        jitter: z.number().min(0).max(1),
      })
      .partial()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Validate the contents of a config file
 *
 * @throws ConfigurationError listing every invalid path
 */
export function parseConfigFile(raw: unknown): ConfigFile {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid core config: ${issues}`);
  }
  return result.data;
}

function readConfigFile(path: string): ConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${path}: ${toError(error).message}`);
  }
  return parseConfigFile(raw);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function nonEmpty(value: string | undefined): string | null {
  return value && value.trim() ? value.trim() : null;
}

/**
 * Build the core configuration from the environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<CoreConfig> {
  const configPath = nonEmpty(env.CORE_CONFIG_PATH);
  const file: ConfigFile = configPath ? readConfigFile(configPath) : {};

  const config: CoreConfig = {
    redisUrl: nonEmpty(env.REDIS_URL),
    cacheKeyPrefix: nonEmpty(env.CACHE_KEY_PREFIX) ?? 'cache',
    rateLimitKeyPrefix: nonEmpty(env.RATE_LIMIT_KEY_PREFIX) ?? 'ratelimit',
    queueKeyPrefix: nonEmpty(env.QUEUE_KEY_PREFIX) ?? 'queue',
    credentials: {
      anthropic: nonEmpty(env.ANTHROPIC_API_KEY),
      openai: nonEmpty(env.OPENAI_API_KEY),
    },
    rateLimits: { ...DEFAULT_RATE_LIMITS, ...file.rateLimits },
    cacheTtls: { ...DEFAULT_CACHE_TTLS, ...file.cacheTtls },
    tiers: {
      fast: file.tiers?.fast ?? DEFAULT_TIERS.fast,
      balanced: file.tiers?.balanced ?? DEFAULT_TIERS.balanced,
      deep: file.tiers?.deep ?? DEFAULT_TIERS.deep,
    },
    providerRetry: { ...DEFAULT_PROVIDER_RETRY, ...file.providerRetry },
  };

  if (config.providerRetry.maxDelayMs < config.providerRetry.baseDelayMs) {
    throw new ConfigurationError('providerRetry.maxDelayMs must be >= baseDelayMs');
  }

  // Deep copy so freezing never touches the shared default objects
  return deepFreeze(structuredClone(config));
}

/**
 * Print a one-time summary of the effective configuration (no secrets)
 */
export function logConfig(config: Readonly<CoreConfig>): void {
  const status = (value: string | null) => (value ? 'configured' : 'not set');
  const chains = PROVIDER_TIERS_LIST
    .map(tier => `${tier}=${config.tiers[tier].map(t => t.provider).join('>')}`)
    .join(' ');

  console.log('[Config] Store:', config.redisUrl ? 'redis' : 'memory');
  console.log(`[Config] Anthropic: ${status(config.credentials.anthropic)}, OpenAI: ${status(config.credentials.openai)}`);
  console.log(`[Config] Tiers: ${chains}`);
  console.log(`[Config] Rate-limited resources: ${Object.keys(config.rateLimits).join(', ')}`);
}

export {
  DEFAULT_TIERS,
  PROVIDER_TIERS_LIST,
  TIER_ALIASES,
  getTierChain,
  isProviderTier,
  providerResource,
  resolveTier,
  type ProviderTier,
  type TierConfig,
  type TierName,
  type TierTarget,
} from './tiers.js';

export {
  CacheNamespaces,
  DEFAULT_CACHE_TTLS,
  DEFAULT_RATE_LIMITS,
  FALLBACK_CACHE_TTL_MS,
  QueueNames,
  type BucketConfig,
} from './limits.js';
