import { RouteCategory } from '../routing/types';

export type LLMProviderName = 'openai' | 'anthropic' | 'gemini';

export const LLM_PROVIDER_NAMES: readonly LLMProviderName[] = ['openai', 'anthropic', 'gemini'];

/**
 * config: fixed priority chain
 * intent: route category picks the first provider
 * ab_test: stable per-user split between primary and secondary
 */
export type RoutingStrategy = 'config' | 'intent' | 'ab_test';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMProviderConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface LLMCompletionRequest {
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Cancels the in-flight provider call */
  signal?: AbortSignal;
}

export interface LLMTokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMCompletionResponse {
  content: string;
  /** Model identifier reported by the provider */
  model: string;
  provider: LLMProviderName;
  usage: LLMTokenUsage;
  latencyMs: number;
}

export interface LLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;
  healthCheck(): Promise<boolean>;
}

export interface ModelRouterConfig {
  primaryProvider: LLMProviderName;
  secondaryProvider?: LLMProviderName;
  tertiaryProvider?: LLMProviderName;
  strategy: RoutingStrategy;
  /** Percentage of users sent to the primary first under ab_test (0–100) */
  abTestSplit: number;
  /** Route category → preferred provider under the intent strategy */
  intentRouting?: Partial<Record<RouteCategory, LLMProviderName>>;
}

export interface ModelRoutingContext {
  userId: string;
  category?: RouteCategory;
  channel: string;
  requestId?: string;
}

/** The text-completion capability the response layer depends on */
export interface TextCompletion {
  complete(request: LLMCompletionRequest, context: ModelRoutingContext): Promise<LLMCompletionResponse>;
}

export function isProviderName(value: string): value is LLMProviderName {
  return LLM_PROVIDER_NAMES.some((name) => name === value);
}

export function isRoutingStrategy(value: string): value is RoutingStrategy {
  return value === 'config' || value === 'intent' || value === 'ab_test';
}
