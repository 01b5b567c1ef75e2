import {
  LLMProvider,
  LLMProviderName,
  LLMProviderConfig,
  LLM_PROVIDER_NAMES,
  ModelRouterConfig,
  isProviderName,
  isRoutingStrategy,
} from './types';
import { RouteCategory } from '../routing/types';
import { OpenAIProvider } from './providers/openai-provider';
import { AnthropicProvider } from './providers/anthropic-provider';
import { GeminiProvider } from './providers/gemini-provider';
import { logger } from '../observability/logger';

export function createProvider(name: LLMProviderName, config: LLMProviderConfig): LLMProvider {
  switch (name) {
    case 'openai':
      return new OpenAIProvider(config);
    case 'anthropic':
      return new AnthropicProvider(config);
    case 'gemini':
      return new GeminiProvider(config);
  }
}

/**
 * Build every provider whose API key is set.
 * Throws when none is configured: the service cannot answer without one.
 */
export function buildProviders(
  envConfig: Record<LLMProviderName, LLMProviderConfig>,
): Map<LLMProviderName, LLMProvider> {
  const providers = new Map<LLMProviderName, LLMProvider>();
  const log = logger.child({ component: 'provider-factory' });

  for (const name of LLM_PROVIDER_NAMES) {
    const config = envConfig[name];
    if (!config.apiKey) continue;
    providers.set(name, createProvider(name, config));
    log.info({ provider: name, model: config.model }, 'LLM provider initialized');
  }

  if (providers.size === 0) {
    throw new Error(
      'No LLM providers configured. Set at least one of: OPENAI_API_KEY, ANTHROPIC_API_KEY, GEMINI_API_KEY',
    );
  }

  log.info({ providers: Array.from(providers.keys()) }, `${providers.size} LLM provider(s) initialized`);
  return providers;
}

interface LLMRoutingEnv {
  primaryProvider: string;
  secondaryProvider: string;
  tertiaryProvider: string;
  routingStrategy: string;
  abTestSplit: number;
  intentRouting: string;
}

function parseIntentRouting(raw: string): Partial<Record<RouteCategory, LLMProviderName>> {
  const routing: Partial<Record<RouteCategory, LLMProviderName>> = {};
  for (const pair of raw.split(',')) {
    const [category, provider] = pair.split(':').map((s) => s.trim());
    if (!category || !provider || !isProviderName(provider)) continue;
    if (category === 'Greeting' || category === 'DomainQuery' || category === 'Unknown') {
      routing[category] = provider;
    }
  }
  return routing;
}

/** Validate the LLM_* routing variables into a ModelRouterConfig */
export function modelRouterConfigFromEnv(llm: LLMRoutingEnv): ModelRouterConfig {
  if (!isProviderName(llm.primaryProvider)) {
    throw new Error(`Unknown LLM_PRIMARY_PROVIDER "${llm.primaryProvider}"`);
  }
  const fallback = (name: string): LLMProviderName | undefined => (isProviderName(name) ? name : undefined);

  return {
    primaryProvider: llm.primaryProvider,
    secondaryProvider: fallback(llm.secondaryProvider),
    tertiaryProvider: fallback(llm.tertiaryProvider),
    strategy: isRoutingStrategy(llm.routingStrategy) ? llm.routingStrategy : 'config',
    abTestSplit: Math.min(100, Math.max(0, llm.abTestSplit)),
    intentRouting: parseIntentRouting(llm.intentRouting),
  };
}
