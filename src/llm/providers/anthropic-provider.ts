import Anthropic from '@anthropic-ai/sdk';
import { LLMProvider, LLMProviderConfig, LLMCompletionRequest, LLMCompletionResponse, LLMMessage } from '../types';
import { logger } from '../../observability/logger';

type ClaudeMessage = { role: 'user' | 'assistant'; content: string };

/**
 * Anthropic Messages API adapter.
 *
 * System prompts go in the separate `system` parameter, and the remaining
 * turns must alternate user/assistant starting with user, so consecutive
 * same-role turns are merged.
 */
export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic' as const;
  readonly model: string;
  private client: Anthropic;
  private log = logger.child({ component: 'anthropic-provider' });

  constructor(private readonly config: LLMProviderConfig) {
    this.model = config.model;
    this.client = new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
    });
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();

    const system = request.messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const messages = toClaudeMessages(request.messages);

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        temperature: request.temperature ?? this.config.temperature,
        system: system || undefined,
        messages,
      },
      { signal: request.signal },
    );

    const textBlock = response.content.find((block) => block.type === 'text');
    if (!textBlock || textBlock.type !== 'text') {
      throw new Error('Anthropic returned no text content');
    }

    const inputTokens = response.usage?.input_tokens ?? 0;
    const outputTokens = response.usage?.output_tokens ?? 0;
    return {
      content: textBlock.text,
      model: response.model ?? this.model,
      provider: 'anthropic',
      usage: {
        promptTokens: inputTokens,
        completionTokens: outputTokens,
        totalTokens: inputTokens + outputTokens,
      },
      latencyMs: Date.now() - start,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'ping' }],
      });
      return response.content.length > 0;
    } catch (err) {
      this.log.warn({ err }, 'Anthropic health check failed');
      return false;
    }
  }
}

export function toClaudeMessages(messages: readonly LLMMessage[]): ClaudeMessage[] {
  const merged: ClaudeMessage[] = [];
  for (const msg of messages) {
    if (msg.role === 'system') continue;
    const role = msg.role === 'assistant' ? 'assistant' : 'user';
    const prev = merged[merged.length - 1];
    if (prev && prev.role === role) {
      prev.content += '\n\n' + msg.content;
    } else {
      merged.push({ role, content: msg.content });
    }
  }

  if (merged.length > 0 && merged[0].role !== 'user') {
    merged.unshift({ role: 'user', content: '(conversation start)' });
  }
  return merged;
}
