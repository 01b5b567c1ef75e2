import { GoogleGenerativeAI, Content } from '@google/generative-ai';
import { LLMProvider, LLMProviderConfig, LLMCompletionRequest, LLMCompletionResponse, LLMMessage } from '../types';
import { logger } from '../../observability/logger';

/**
 * Google Gemini adapter.
 * System prompts become `systemInstruction`; 'assistant' turns map to the 'model' role.
 */
export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini' as const;
  readonly model: string;
  private genAI: GoogleGenerativeAI;
  private log = logger.child({ component: 'gemini-provider' });

  constructor(private readonly config: LLMProviderConfig) {
    this.model = config.model;
    this.genAI = new GoogleGenerativeAI(config.apiKey);
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();

    const systemInstruction = request.messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    const model = this.genAI.getGenerativeModel(
      {
        model: this.model,
        systemInstruction: systemInstruction || undefined,
        generationConfig: {
          temperature: request.temperature ?? this.config.temperature,
          maxOutputTokens: request.maxTokens ?? this.config.maxTokens,
        },
      },
      { timeout: this.config.timeoutMs },
    );

    const result = await model.generateContent(
      { contents: toGeminiContents(request.messages) },
      { signal: request.signal },
    );
    const response = result.response;
    const content = response.text();
    if (!content) {
      throw new Error('Gemini returned empty response');
    }

    const usage = response.usageMetadata;
    return {
      content,
      model: this.model,
      provider: 'gemini',
      usage: {
        promptTokens: usage?.promptTokenCount ?? 0,
        completionTokens: usage?.candidatesTokenCount ?? 0,
        totalTokens: usage?.totalTokenCount ?? 0,
      },
      latencyMs: Date.now() - start,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const model = this.genAI.getGenerativeModel({ model: this.model });
      const result = await model.generateContent('ping');
      return Boolean(result.response.text());
    } catch (err) {
      this.log.warn({ err }, 'Gemini health check failed');
      return false;
    }
  }
}

/** Gemini wants user/model turns with text parts, starting with user */
export function toGeminiContents(messages: readonly LLMMessage[]): Content[] {
  const contents: Content[] = [];
  for (const msg of messages) {
    if (msg.role === 'system') continue;
    const role = msg.role === 'assistant' ? 'model' : 'user';
    const prev = contents[contents.length - 1];
    if (prev && prev.role === role) {
      prev.parts.push({ text: msg.content });
    } else {
      contents.push({ role, parts: [{ text: msg.content }] });
    }
  }

  if (contents.length > 0 && contents[0].role !== 'user') {
    contents.unshift({ role: 'user', parts: [{ text: '(conversation start)' }] });
  }
  return contents;
}
