import {
  LLMProvider,
  LLMProviderName,
  LLMCompletionRequest,
  LLMCompletionResponse,
  ModelRouterConfig,
  ModelRoutingContext,
  TextCompletion,
} from './types';
import { ProviderError, errorMessage } from '../errors';
import { logger } from '../observability/logger';
import { llmRequestDuration, llmProviderFailovers, llmTokenUsage } from '../observability/metrics';

const CIRCUIT_BREAKER_THRESHOLD = 5;
const CIRCUIT_BREAKER_RESET_MS = 60_000;

interface CircuitBreakerState {
  failures: number;
  openUntil: number;
}

/**
 * Picks the provider chain for each completion and fails over along it.
 *
 * Strategies:
 * - **config**: primary → secondary → tertiary
 * - **intent**: the route category's mapped provider goes first
 * - **ab_test**: stable hash of the userId decides whether primary or secondary leads
 *
 * A provider that fails CIRCUIT_BREAKER_THRESHOLD times in a row is skipped
 * for CIRCUIT_BREAKER_RESET_MS. When every provider fails the request fails
 * with ProviderError.
 */
export class ModelRouter implements TextCompletion {
  private circuitBreakers = new Map<LLMProviderName, CircuitBreakerState>();
  private log = logger.child({ component: 'model-router' });

  constructor(
    private readonly config: ModelRouterConfig,
    private readonly providers: Map<LLMProviderName, LLMProvider>,
  ) {
    if (!providers.has(config.primaryProvider)) {
      throw new Error(
        `Primary provider "${config.primaryProvider}" not available. ` +
        `Configured providers: ${Array.from(providers.keys()).join(', ') || 'none'}`,
      );
    }

    this.log.info({
      primary: config.primaryProvider,
      secondary: config.secondaryProvider,
      tertiary: config.tertiaryProvider,
      strategy: config.strategy,
      availableProviders: Array.from(providers.keys()),
    }, 'Model router initialized');
  }

  async complete(request: LLMCompletionRequest, context: ModelRoutingContext): Promise<LLMCompletionResponse> {
    const providerOrder = this.resolveProviderOrder(context);
    let lastError: unknown;
    let lastFailed: LLMProviderName | undefined;

    for (const providerName of providerOrder) {
      const provider = this.providers.get(providerName);
      if (!provider) continue;

      if (request.signal?.aborted) {
        throw new ProviderError('Completion cancelled', request.signal.reason);
      }

      const cb = this.circuitBreakers.get(providerName);
      if (cb && Date.now() < cb.openUntil) {
        this.log.debug({ provider: providerName }, 'Circuit breaker open, skipping');
        continue;
      }

      const timer = llmRequestDuration.startTimer({ provider: providerName, model: provider.model });
      try {
        const response = await provider.complete(request);
        timer({ status: 'success' });
        this.resetCircuitBreaker(providerName);

        llmTokenUsage.inc(
          { provider: providerName, model: response.model, token_type: 'prompt' },
          response.usage.promptTokens,
        );
        llmTokenUsage.inc(
          { provider: providerName, model: response.model, token_type: 'completion' },
          response.usage.completionTokens,
        );

        if (lastFailed) {
          llmProviderFailovers.inc({ from_provider: lastFailed, to_provider: providerName, reason: 'error' });
          this.log.info({ from: lastFailed, to: providerName, requestId: context.requestId }, 'Failover to next provider succeeded');
        }
        return response;
      } catch (err) {
        // Cancellation is not a provider failure
        if (request.signal?.aborted) {
          throw new ProviderError('Completion cancelled', request.signal.reason);
        }
        timer({ status: 'error' });
        this.recordFailure(providerName);
        lastError = err;
        lastFailed = providerName;
        this.log.warn(
          { provider: providerName, err: errorMessage(err), requestId: context.requestId },
          'Provider failed, trying next',
        );
      }
    }

    throw new ProviderError(
      `All LLM providers failed. Last error: ${lastError === undefined ? 'no provider available' : errorMessage(lastError)}`,
      lastError,
    );
  }

  async healthCheck(): Promise<Record<string, { status: 'ok' | 'error'; latencyMs: number }>> {
    const results: Record<string, { status: 'ok' | 'error'; latencyMs: number }> = {};
    for (const [name, provider] of this.providers) {
      const start = Date.now();
      let healthy = false;
      try {
        healthy = await provider.healthCheck();
      } catch (err) {
        this.log.warn({ provider: name, err: errorMessage(err) }, 'Provider health check threw');
      }
      results[name] = { status: healthy ? 'ok' : 'error', latencyMs: Date.now() - start };
    }
    return results;
  }

  /** True when every provider's circuit is open */
  isFullyOpen(): boolean {
    const now = Date.now();
    for (const [name] of this.providers) {
      const cb = this.circuitBreakers.get(name);
      if (!cb || now >= cb.openUntil) return false;
    }
    return true;
  }

  resolveProviderOrder(context: ModelRoutingContext): LLMProviderName[] {
    const order: LLMProviderName[] = [];
    const { primaryProvider, secondaryProvider, tertiaryProvider } = this.config;

    switch (this.config.strategy) {
      case 'intent': {
        const preferred = context.category ? this.config.intentRouting?.[context.category] : undefined;
        if (preferred && this.providers.has(preferred)) order.push(preferred);
        break;
      }
      case 'ab_test': {
        const bucket = this.simpleHash(context.userId) % 100;
        if (bucket >= this.config.abTestSplit && secondaryProvider) order.push(secondaryProvider);
        break;
      }
      case 'config':
      default:
        break;
    }

    for (const name of [primaryProvider, secondaryProvider, tertiaryProvider]) {
      if (name && !order.includes(name)) order.push(name);
    }
    return order;
  }

  private recordFailure(provider: LLMProviderName): void {
    const cb = this.circuitBreakers.get(provider) ?? { failures: 0, openUntil: 0 };
    cb.failures++;
    if (cb.failures >= CIRCUIT_BREAKER_THRESHOLD) {
      cb.openUntil = Date.now() + CIRCUIT_BREAKER_RESET_MS;
      this.log.error(
        { provider, failures: cb.failures, resetMs: CIRCUIT_BREAKER_RESET_MS },
        'Circuit breaker opened for provider',
      );
    }
    this.circuitBreakers.set(provider, cb);
  }

  private resetCircuitBreaker(provider: LLMProviderName): void {
    this.circuitBreakers.delete(provider);
  }

  private simpleHash(str: string): number {
    let hash = 0;
    for (let i = 0; i < str.length; i++) {
      hash = ((hash << 5) - hash) + str.charCodeAt(i);
      hash |= 0;
    }
    return Math.abs(hash);
  }
}
