import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEGRADED_DISCLAIMER, ResponseSynthesizer } from '../../src/agent/response-synthesizer';
import { PromptManager } from '../../src/agent/prompt-manager';
import { SynthesisRequest } from '../../src/agent/types';
import { ContextPackage } from '../../src/context/types';
import { errorFact, foundFact } from '../../src/domain/facts';
import { DomainQueryResult } from '../../src/domain/types';
import { createEntry } from '../../src/memory/conversation-memory';
import { LLMCompletionRequest, LLMCompletionResponse, ModelRoutingContext, TextCompletion } from '../../src/llm/types';

type CompleteMock = jest.Mock<Promise<LLMCompletionResponse>, [LLMCompletionRequest, ModelRoutingContext]>;

function contextPackage(overrides: Partial<ContextPackage> = {}): ContextPackage {
  return {
    userId: 'u1',
    message: 'Olá',
    entries: [createEntry('user', 'first question', {}, 1), createEntry('assistant', 'first answer', {}, 2)],
    facts: [],
    order: 'chronological',
    metadata: { budgetChars: 6000, usedChars: 0, droppedEntries: 0, truncated: false, overBudget: false },
    ...overrides,
  };
}

describe('ResponseSynthesizer', () => {
  let promptsDir: string;
  let complete: CompleteMock;
  let synthesizer: ResponseSynthesizer;

  beforeAll(() => {
    promptsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'prompts-'));
    fs.writeFileSync(path.join(promptsDir, 'system.md'), 'SYSTEM\n');
    fs.writeFileSync(path.join(promptsDir, 'greeting.md'), 'GREET');
    fs.writeFileSync(path.join(promptsDir, 'domain-query.md'), 'DOMAIN');
  });

  afterAll(() => {
    fs.rmSync(promptsDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    complete = jest.fn();
    complete.mockResolvedValue({
      content: '  Oi! Como posso ajudar?  ',
      model: 'test-model',
      provider: 'openai',
      usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
      latencyMs: 1,
    });
    const completion: TextCompletion = { complete };
    synthesizer = new ResponseSynthesizer(completion, new PromptManager(promptsDir));
  });

  const greetingRequest = (context = contextPackage()): SynthesisRequest => ({
    agent: 'greeting_agent',
    category: 'Greeting',
    context,
    channel: 'api',
    requestId: 'req-1',
  });

  const domainRequest = (domain: DomainQueryResult): SynthesisRequest => ({
    agent: 'crm_marketing_agent',
    category: 'DomainQuery',
    context: contextPackage({ message: 'score da ana@example.com', entries: [], facts: domain.facts }),
    channel: 'api',
    requestId: 'req-2',
    domain,
  });

  it('should build system, history and user turns in order', () => {
    expect(synthesizer.buildMessages(greetingRequest())).toEqual([
      { role: 'system', content: 'SYSTEM\n\nGREET' },
      { role: 'user', content: 'first question' },
      { role: 'assistant', content: 'first answer' },
      { role: 'user', content: 'Olá' },
    ]);
  });

  it('should replay recent_first history oldest first', () => {
    const ctx = contextPackage({
      order: 'recent_first',
      entries: [createEntry('assistant', 'first answer', {}, 2), createEntry('user', 'first question', {}, 1)],
    });
    const messages = synthesizer.buildMessages(greetingRequest(ctx));
    expect(messages.map((m) => m.content)).toEqual(['SYSTEM\n\nGREET', 'first question', 'first answer', 'Olá']);
  });

  it('should trim the answer and pass routing context', async () => {
    const result = await synthesizer.synthesize(greetingRequest());

    expect(result).toEqual({ text: 'Oi! Como posso ajudar?', provider: 'openai', model: 'test-model', degraded: false });
    expect(complete).toHaveBeenCalledWith(
      expect.objectContaining({ signal: undefined }),
      { userId: 'u1', category: 'Greeting', channel: 'api', requestId: 'req-1' },
    );
  });

  it('should add record-system facts for domain queries', async () => {
    const domain: DomainQueryResult = {
      status: 'ok',
      facts: [foundFact('crm', { email: 'ana@example.com', lead_score: 72 }, 0)],
      targets: ['crm'],
      query: { email: 'ana@example.com', text: 'score da ana@example.com' },
    };

    const messages = synthesizer.buildMessages(domainRequest(domain));

    expect(messages).toEqual([
      { role: 'system', content: 'SYSTEM\n\nDOMAIN' },
      { role: 'system', content: 'Record-system data:\ncrm.contact: email=ana@example.com; lead_score=72' },
      { role: 'user', content: 'score da ana@example.com' },
    ]);
  });

  it('should flag partial answers as degraded without a disclaimer', async () => {
    const domain: DomainQueryResult = {
      status: 'partial',
      facts: [foundFact('crm', { lead_score: 72 }, 0), errorFact('marketing', 'down', 0)],
      targets: ['crm', 'marketing'],
      query: { text: 'x' },
    };

    const result = await synthesizer.synthesize(domainRequest(domain));

    expect(result.degraded).toBe(true);
    expect(result.text).toBe('Oi! Como posso ajudar?');
    expect(synthesizer.buildMessages(domainRequest(domain))[1].content).toBe(
      'Record-system data:\ncrm.contact: lead_score=72\nmarketing.contact: unavailable (down)\n' +
        'Some record systems could not be reached; tell the user which data is missing.',
    );
  });

  it('should append the disclaimer when no record system answered', async () => {
    const domain: DomainQueryResult = {
      status: 'degraded_no_data',
      facts: [errorFact('crm', 'crm: timed out after 5000ms', 0)],
      targets: ['crm'],
      query: { text: 'x' },
    };

    const result = await synthesizer.synthesize(domainRequest(domain));

    expect(result.degraded).toBe(true);
    expect(result.text).toBe(`Oi! Como posso ajudar?\n\n${DEGRADED_DISCLAIMER}`);
  });

  it('should fall back to built-in prompts when files are missing', () => {
    const prompts = new PromptManager(path.join(promptsDir, 'nope'));
    expect(prompts.get().greeting).toContain('Greet the user');
  });
});
