import { Channel } from '../config/types';
import { ContextPackage } from '../context/types';
import { DomainQueryResult } from '../domain/types';
import { LLMProviderName } from '../llm/types';
import { RouteCategory } from '../routing/types';

/** Handler that produced a response */
export type AgentName = 'greeting_agent' | 'crm_marketing_agent';

export interface PromptBundle {
  /** Shared persona and rules */
  system: string;
  /** Instructions for greetings and unclassified messages */
  greeting: string;
  /** Instructions for answering from record-system facts */
  domainQuery: string;
}

export interface SynthesisRequest {
  agent: AgentName;
  category: RouteCategory;
  context: ContextPackage;
  channel: Channel;
  requestId: string;
  /** Present for DomainQuery turns */
  domain?: DomainQueryResult;
  signal?: AbortSignal;
}

export interface SynthesizedResponse {
  text: string;
  provider: LLMProviderName;
  model: string;
  /** Some or all record-system lookups failed */
  degraded: boolean;
}
