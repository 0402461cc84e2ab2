/**
 * Provider tier configuration
 *
 * Each tier lists (provider, model) pairs in failover order, primary first.
 */

import { ConfigurationError } from '../infra/errors.js';

export const PROVIDER_TIERS_LIST = ['fast', 'balanced', 'deep'] as const;

export type ProviderTier = (typeof PROVIDER_TIERS_LIST)[number];

export interface TierTarget {
  provider: string;
  model: string;
}

export type TierConfig = Record<ProviderTier, TierTarget[]>;

/**
 * Default tier chains
 *
 * fast     → simple lookups, quick replies
 * balanced → general conversation
 * deep     → complex analysis and reasoning
 */
export const DEFAULT_TIERS: TierConfig = {
  fast: [
    { provider: 'anthropic', model: 'claude-3-5-haiku-20241022' },
    { provider: 'openai', model: 'gpt-4o-mini' },
  ],
  balanced: [
    { provider: 'anthropic', model: 'claude-sonnet-4-20250514' },
    { provider: 'openai', model: 'gpt-4o' },
  ],
  deep: [
    { provider: 'anthropic', model: 'claude-opus-4-5-20251101' },
    { provider: 'openai', model: 'gpt-4o' },
  ],
};

/**
 * Alternative names accepted wherever a tier is chosen by name
 */
export const TIER_ALIASES = {
  auto: 'balanced',
} as const satisfies Record<string, ProviderTier>;

export type TierName = ProviderTier | keyof typeof TIER_ALIASES;

export function isProviderTier(value: string): value is ProviderTier {
  return PROVIDER_TIERS_LIST.some(tier => tier === value);
}

/**
 * Resolve a tier name or alias ('auto' → 'balanced')
 *
 * @throws ConfigurationError for an unknown name
 */
export function resolveTier(value: string): ProviderTier {
  if (isProviderTier(value)) return value;

  const alias = Object.entries(TIER_ALIASES).find(([name]) => name === value);
  if (alias) return alias[1];

  throw new ConfigurationError(`Unknown provider tier "${value}"`);
}

/**
 * Get all targets for a tier in order (primary first, then fallbacks)
 */
export function getTierChain(tier: ProviderTier, tiers: TierConfig = DEFAULT_TIERS): TierTarget[] {
  return [...tiers[tier]];
}

/**
 * Rate-limiter resource name guarding a provider's quota
 */
export function providerResource(provider: string): string {
  return `provider:${provider}`;
}
