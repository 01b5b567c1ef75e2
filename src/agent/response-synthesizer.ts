import { PromptManager } from './prompt-manager';
import { SynthesisRequest, SynthesizedResponse } from './types';
import { renderFact } from '../domain/facts';
import { DomainQueryResult } from '../domain/types';
import { LLMMessage, TextCompletion } from '../llm/types';

/** Appended to answers when no record system could be reached */
export const DEGRADED_DISCLAIMER =
  'Note: CRM and marketing data are temporarily unavailable, so this answer does not include them.';

function factsMessage(domain: DomainQueryResult): string {
  const lines = domain.facts.map(renderFact);
  if (domain.status === 'partial') {
    lines.push('Some record systems could not be reached; tell the user which data is missing.');
  } else if (domain.status === 'degraded_no_data') {
    lines.push('No record system could be reached. Apologise briefly and do not guess any values.');
  }
  return `Record-system data:\n${lines.join('\n')}`;
}

/**
 * Turns a ContextPackage (and, for domain queries, the coordinator's facts)
 * into a prompt and asks the text-completion capability for the answer.
 */
export class ResponseSynthesizer {
  constructor(
    private readonly completion: TextCompletion,
    private readonly prompts: PromptManager,
  ) {}

  buildMessages(request: SynthesisRequest): LLMMessage[] {
    const bundle = this.prompts.get();
    const instructions = request.agent === 'greeting_agent' ? bundle.greeting : bundle.domainQuery;
    const messages: LLMMessage[] = [{ role: 'system', content: `${bundle.system}\n\n${instructions}` }];

    if (request.domain) {
      messages.push({ role: 'system', content: factsMessage(request.domain) });
    }

    // Providers expect turns oldest first whatever order the package carries
    const { entries, order } = request.context;
    const chronological = order === 'recent_first' ? [...entries].reverse() : entries;
    for (const entry of chronological) {
      messages.push({ role: entry.role, content: entry.content });
    }

    messages.push({ role: 'user', content: request.context.message });
    return messages;
  }

  async synthesize(request: SynthesisRequest): Promise<SynthesizedResponse> {
    const response = await this.completion.complete(
      { messages: this.buildMessages(request), signal: request.signal },
      {
        userId: request.context.userId,
        category: request.category,
        channel: request.channel,
        requestId: request.requestId,
      },
    );

    const status = request.domain?.status ?? 'ok';
    const text = status === 'degraded_no_data'
      ? `${response.content.trim()}\n\n${DEGRADED_DISCLAIMER}`
      : response.content.trim();

    return {
      text,
      provider: response.provider,
      model: response.model,
      degraded: status !== 'ok',
    };
  }
}
