/**
 * Provider Router with Automatic Failover
 *
 * Routes a completion to the providers of a tier strictly in configured
 * order, one at a time:
 *
 *   Start → Attempt(i) → Success
 *                      → failure → Attempt(i+1) … → ProvidersExhausted
 *                      → bad request → Failed (thrown as-is)
 *
 * Every attempt first takes a rate-limit token for the provider's quota and
 * runs under the RetryExecutor, which absorbs single transient errors before
 * the router moves on.
 */

import { estimateRequestTokens } from '../context/tokenizer.js';
import { DEFAULT_PROVIDER_RETRY, type ProviderRetrySettings } from '../config/index.js';
import {
  providerResource,
  resolveTier,
  type TierConfig,
  type TierName,
  type TierTarget,
} from '../config/tiers.js';
import { throwIfAborted } from '../infra/abort.js';
import {
  CancelledError,
  ConfigurationError,
  PermanentRequestError,
  ProvidersExhaustedError,
  TransientIOError,
  toError,
  type ProviderFailure,
} from '../infra/errors.js';
import type { RateLimiter } from '../infra/rate-limiter.js';
import {
  RetryExecutor,
  createRetryPolicy,
  transientErrorsOnly,
  type RetryPolicy,
} from '../infra/retry-executor.js';
import { classifyProviderError, type ProviderAdapter } from './adapter.js';
import type { CompletionRequest, CompletionResponse, NormalizedCompletion } from './types.js';

export interface ProviderRouterOptions {
  adapters: ProviderAdapter[];
  tiers: Readonly<TierConfig>;
  limiter: RateLimiter;
  executor?: RetryExecutor;
  /** Retry settings applied to every provider attempt */
  retry?: Partial<ProviderRetrySettings>;
  /** Per-provider overrides of `retry` */
  providerRetry?: Record<string, Partial<ProviderRetrySettings>>;
}

export interface CompleteOptions {
  signal?: AbortSignal;
}

/**
 * Failures that end the request instead of moving to the next provider:
 * the request itself is malformed, so no provider could serve it.
 */
function isTerminal(error: Error): boolean {
  return error instanceof PermanentRequestError && error.kind === 'invalid_request';
}

/**
 * Routes completions across providers with ordered failover
 *
 * @example
 * ```typescript
 * const router = new ProviderRouter({ adapters, tiers: config.tiers, limiter });
 * const reply = await router.complete(
 *   { messages: [{ role: 'user', content: 'Summarize last night’s sleep' }] },
 *   'fast'
 * );
 * console.log(reply.provider, reply.text);
 * ```
 */
export class ProviderRouter {
  private adapters: Map<string, ProviderAdapter>;
  private tiers: Readonly<TierConfig>;
  private limiter: RateLimiter;
  private executor: RetryExecutor;
  private policies: Map<string, RetryPolicy> = new Map();

  constructor(options: ProviderRouterOptions) {
    this.adapters = new Map(options.adapters.map(adapter => [adapter.id, adapter]));
    this.tiers = options.tiers;
    this.limiter = options.limiter;
    this.executor = options.executor ?? new RetryExecutor();

    for (const [tier, chain] of Object.entries(this.tiers)) {
      if (chain.length === 0) {
        throw new ConfigurationError(`Tier "${tier}" has no providers`);
      }
      for (const target of chain) {
        if (!this.adapters.has(target.provider)) {
          throw new ConfigurationError(
            `Tier "${tier}" references provider "${target.provider}" with no configured adapter`
          );
        }
        if (!this.limiter.hasResource(providerResource(target.provider))) {
          throw new ConfigurationError(
            `Tier "${tier}" references provider "${target.provider}" with no rate limit ` +
            `(expected resource "${providerResource(target.provider)}")`
          );
        }
      }
    }

    for (const id of this.adapters.keys()) {
      const settings = {
        ...DEFAULT_PROVIDER_RETRY,
        ...options.retry,
        ...options.providerRetry?.[id],
      };
      this.policies.set(id, createRetryPolicy({ ...settings, retryable: transientErrorsOnly }));
    }
  }

  /**
   * Deterministic, provider-independent prompt size estimate for pre-flight
   * budgeting. An approximation only; providers bill by their own tokenizers.
   */
  estimateTokens(request: CompletionRequest): number {
    return estimateRequestTokens(request);
  }

  /**
   * Get the ordered (provider, model) chain for a tier
   */
  getChain(tier: TierName): TierTarget[] {
    return [...this.tiers[resolveTier(tier)]];
  }

  /**
   * Complete a request using the tier's providers in order
   *
   * @throws ProvidersExhaustedError when every provider failed, with per-provider history
   * @throws PermanentRequestError when the request itself is invalid
   * @throws CancelledError when the signal fires
   */
  async complete(
    request: CompletionRequest,
    tierName: TierName,
    options: CompleteOptions = {}
  ): Promise<CompletionResponse> {
    const { signal } = options;
    const tier = resolveTier(tierName);
    const chain = this.tiers[tier];

    const failures: ProviderFailure[] = [];

    for (const target of chain) {
      throwIfAborted(signal);
      const adapter = this.adapters.get(target.provider);
      if (!adapter) {
        throw new ConfigurationError(`No adapter for provider "${target.provider}"`);
      }

      try {
        console.log(`  [ProviderRouter] Trying ${target.provider}/${target.model} (${tier})...`);
        const completion = await this.attempt(adapter, target, request, signal);
        console.log(`  [ProviderRouter] Success with ${target.provider}/${target.model}`);

        return { ...completion, provider: target.provider, failures };
      } catch (error) {
        const err = toError(error);

        if (err instanceof CancelledError) throw err;
        if (isTerminal(err)) {
          console.error(`  [ProviderRouter] Request rejected by ${target.provider}: ${err.message}`);
          throw err;
        }

        failures.push({
          provider: target.provider,
          model: target.model,
          reason: err.name,
          message: err.message,
          error: err,
        });
        console.warn(
          `  [ProviderRouter] ${target.provider}/${target.model} failed (${err.name}): ${err.message}`
        );
      }
    }

    console.error(`  [ProviderRouter] All ${failures.length} provider(s) for tier ${tier} failed`);
    throw new ProvidersExhaustedError(tier, failures);
  }

  /**
   * One provider attempt: translate, take a token, call with retries, translate back
   */
  private async attempt<TRequest, TResponse>(
    adapter: ProviderAdapter<TRequest, TResponse>,
    target: TierTarget,
    request: CompletionRequest,
    signal?: AbortSignal
  ): Promise<NormalizedCompletion> {
    // Build first: an inexpressible request must not spend quota
    const nativeRequest = adapter.buildRequest(request, target.model);

    const resource = providerResource(target.provider);
    const granted = await this.limiter.tryAcquire(resource);
    if (!granted) {
      console.warn(`  [ProviderRouter] ${resource} rate limit budget exhausted`);
      throw new TransientIOError(`Rate limit budget exhausted for ${resource}`);
    }

    const policy = this.policies.get(adapter.id) ?? createRetryPolicy({ retryable: transientErrorsOnly });

    return this.executor.execute(
      async ({ signal: attemptSignal }) => {
        let response: TResponse;
        try {
          response = await adapter.send(nativeRequest, attemptSignal);
        } catch (error) {
          throw classifyProviderError(adapter.id, error, attemptSignal);
        }
        return adapter.parseResponse(response);
      },
      policy,
      { signal, label: `${target.provider}/${target.model}` }
    );
  }
}
