import { buildProviders, modelRouterConfigFromEnv } from '../../src/llm/provider-factory';
import { toClaudeMessages } from '../../src/llm/providers/anthropic-provider';
import { toGeminiContents } from '../../src/llm/providers/gemini-provider';
import { LLMMessage, LLMProviderConfig } from '../../src/llm/types';

describe('modelRouterConfigFromEnv', () => {
  const llm = {
    primaryProvider: 'openai',
    secondaryProvider: 'anthropic',
    tertiaryProvider: '',
    routingStrategy: 'intent',
    abTestSplit: 80,
    intentRouting: 'DomainQuery:anthropic, Greeting:gemini, Bogus:openai, Unknown:llama',
  };

  it('should parse routing variables', () => {
    expect(modelRouterConfigFromEnv(llm)).toEqual({
      primaryProvider: 'openai',
      secondaryProvider: 'anthropic',
      tertiaryProvider: undefined,
      strategy: 'intent',
      abTestSplit: 80,
      intentRouting: { DomainQuery: 'anthropic', Greeting: 'gemini' },
    });
  });

  it('should clamp the split and default an unknown strategy', () => {
    const config = modelRouterConfigFromEnv({ ...llm, routingStrategy: 'round_robin', abTestSplit: 150, intentRouting: '' });
    expect(config.strategy).toBe('config');
    expect(config.abTestSplit).toBe(100);
    expect(config.intentRouting).toEqual({});
  });

  it('should reject an unknown primary provider', () => {
    expect(() => modelRouterConfigFromEnv({ ...llm, primaryProvider: 'llama' }))
      .toThrow('Unknown LLM_PRIMARY_PROVIDER "llama"');
  });
});

describe('buildProviders', () => {
  const noKey: LLMProviderConfig = { apiKey: '', model: 'm', maxTokens: 10, temperature: 0, timeoutMs: 1000 };

  it('should refuse to start without any API key', () => {
    expect(() => buildProviders({ openai: noKey, anthropic: noKey, gemini: noKey }))
      .toThrow('No LLM providers configured');
  });
});

describe('provider message conversion', () => {
  const messages: LLMMessage[] = [
    { role: 'system', content: 'rules' },
    { role: 'system', content: 'Record-system data:\ncrm.contact: lead_score=72' },
    { role: 'assistant', content: 'Oi!' },
    { role: 'user', content: 'first' },
    { role: 'user', content: 'second' },
  ];

  it('should merge turns for Claude and open with a user turn', () => {
    expect(toClaudeMessages(messages)).toEqual([
      { role: 'user', content: '(conversation start)' },
      { role: 'assistant', content: 'Oi!' },
      { role: 'user', content: 'first\n\nsecond' },
    ]);
  });

  it('should map assistant turns to model for Gemini', () => {
    expect(toGeminiContents(messages)).toEqual([
      { role: 'user', parts: [{ text: '(conversation start)' }] },
      { role: 'model', parts: [{ text: 'Oi!' }] },
      { role: 'user', parts: [{ text: 'first' }, { text: 'second' }] },
    ]);
  });
});
