import { ModelRouter } from '../../src/llm/model-router';
import {
  LLMCompletionRequest,
  LLMCompletionResponse,
  LLMProvider,
  LLMProviderName,
  ModelRouterConfig,
} from '../../src/llm/types';
import { ProviderError } from '../../src/errors';

type CompleteMock = jest.Mock<Promise<LLMCompletionResponse>, [LLMCompletionRequest]>;

function response(provider: LLMProviderName, content = 'ok'): LLMCompletionResponse {
  return {
    content,
    model: `${provider}-model`,
    provider,
    usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    latencyMs: 1,
  };
}

function fakeProvider(name: LLMProviderName): LLMProvider & { complete: CompleteMock } {
  const complete: CompleteMock = jest.fn();
  complete.mockResolvedValue(response(name));
  return { name, model: `${name}-model`, complete, healthCheck: jest.fn().mockResolvedValue(true) };
}

describe('ModelRouter', () => {
  const baseConfig: ModelRouterConfig = {
    primaryProvider: 'openai',
    secondaryProvider: 'anthropic',
    tertiaryProvider: 'gemini',
    strategy: 'config',
    abTestSplit: 50,
  };
  const ctx = { userId: 'u1', channel: 'api', requestId: 'req-1' };
  const request: LLMCompletionRequest = { messages: [{ role: 'user', content: 'Olá' }] };

  let openai: ReturnType<typeof fakeProvider>;
  let anthropic: ReturnType<typeof fakeProvider>;
  let gemini: ReturnType<typeof fakeProvider>;
  let providers: Map<LLMProviderName, LLMProvider>;

  beforeEach(() => {
    openai = fakeProvider('openai');
    anthropic = fakeProvider('anthropic');
    gemini = fakeProvider('gemini');
    providers = new Map<LLMProviderName, LLMProvider>([
      ['openai', openai],
      ['anthropic', anthropic],
      ['gemini', gemini],
    ]);
  });

  it('should refuse a config whose primary provider is missing', () => {
    providers.delete('openai');
    expect(() => new ModelRouter(baseConfig, providers)).toThrow('Primary provider "openai" not available');
  });

  it('should answer from the primary provider', async () => {
    const router = new ModelRouter(baseConfig, providers);
    const result = await router.complete(request, ctx);

    expect(result.provider).toBe('openai');
    expect(anthropic.complete).not.toHaveBeenCalled();
  });

  it('should fail over to the next provider', async () => {
    openai.complete.mockRejectedValue(new Error('rate limited'));
    const router = new ModelRouter(baseConfig, providers);

    const result = await router.complete(request, ctx);

    expect(result.provider).toBe('anthropic');
    expect(openai.complete).toHaveBeenCalledTimes(1);
    expect(anthropic.complete).toHaveBeenCalledWith(request);
  });

  it('should raise ProviderError when every provider fails', async () => {
    openai.complete.mockRejectedValue(new Error('rate limited'));
    anthropic.complete.mockRejectedValue(new Error('overloaded'));
    gemini.complete.mockRejectedValue(new Error('gemini down'));
    const router = new ModelRouter(baseConfig, providers);

    const promise = router.complete(request, ctx);
    await expect(promise).rejects.toBeInstanceOf(ProviderError);
    await expect(promise).rejects.toThrow('All LLM providers failed. Last error: gemini down');
  });

  it('should not call providers once the request is cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const router = new ModelRouter(baseConfig, providers);

    await expect(router.complete({ ...request, signal: controller.signal }, ctx)).rejects.toThrow('Completion cancelled');
    expect(openai.complete).not.toHaveBeenCalled();
  });

  it('should skip a provider whose circuit breaker is open', async () => {
    openai.complete.mockRejectedValue(new Error('down'));
    const router = new ModelRouter(baseConfig, providers);

    for (let i = 0; i < 5; i++) {
      await router.complete(request, ctx);
    }
    expect(openai.complete).toHaveBeenCalledTimes(5);

    const result = await router.complete(request, ctx);
    expect(result.provider).toBe('anthropic');
    expect(openai.complete).toHaveBeenCalledTimes(5);
    expect(router.isFullyOpen()).toBe(false);
  });

  it('should not count cancelled calls against the provider', async () => {
    openai.complete.mockImplementation((req) => new Promise<LLMCompletionResponse>((_, reject) => {
      req.signal?.addEventListener('abort', () => reject(new Error('Request was aborted.')), { once: true });
    }));
    const router = new ModelRouter(baseConfig, providers);

    for (let i = 0; i < 6; i++) {
      const controller = new AbortController();
      const pending = router.complete({ ...request, signal: controller.signal }, ctx);
      controller.abort();
      await expect(pending).rejects.toThrow('Completion cancelled');
    }
    expect(anthropic.complete).not.toHaveBeenCalled();
    expect(router.isFullyOpen()).toBe(false);

    openai.complete.mockResolvedValue(response('openai'));
    const result = await router.complete(request, ctx);
    expect(result.provider).toBe('openai');
  });

  describe('resolveProviderOrder', () => {
    it('should follow the configured chain', () => {
      const router = new ModelRouter(baseConfig, providers);
      expect(router.resolveProviderOrder(ctx)).toEqual(['openai', 'anthropic', 'gemini']);
    });

    it('should put the category provider first under the intent strategy', () => {
      const router = new ModelRouter(
        { ...baseConfig, strategy: 'intent', intentRouting: { Greeting: 'gemini' } },
        providers,
      );
      expect(router.resolveProviderOrder({ ...ctx, category: 'Greeting' })).toEqual(['gemini', 'openai', 'anthropic']);
      expect(router.resolveProviderOrder({ ...ctx, category: 'DomainQuery' })).toEqual(['openai', 'anthropic', 'gemini']);
    });

    it('should split users between primary and secondary under ab_test', () => {
      const allSecondary = new ModelRouter({ ...baseConfig, strategy: 'ab_test', abTestSplit: 0 }, providers);
      const allPrimary = new ModelRouter({ ...baseConfig, strategy: 'ab_test', abTestSplit: 100 }, providers);

      expect(allSecondary.resolveProviderOrder(ctx)).toEqual(['anthropic', 'openai', 'gemini']);
      expect(allPrimary.resolveProviderOrder(ctx)).toEqual(['openai', 'anthropic', 'gemini']);
    });

    it('should give a user the same order every time', () => {
      const router = new ModelRouter({ ...baseConfig, strategy: 'ab_test' }, providers);
      expect(router.resolveProviderOrder({ ...ctx, userId: 'stable-user' }))
        .toEqual(router.resolveProviderOrder({ ...ctx, userId: 'stable-user' }));
    });
  });

  it('should report provider health', async () => {
    gemini.healthCheck = jest.fn().mockRejectedValue(new Error('no key'));
    const router = new ModelRouter(baseConfig, providers);

    const health = await router.healthCheck();

    expect(health.openai.status).toBe('ok');
    expect(health.gemini.status).toBe('error');
  });
});
