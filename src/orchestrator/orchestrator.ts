import { ContextAssembler } from '../context/context-assembler';
import { ContextPackage } from '../context/types';
import { DomainQueryCoordinator } from '../domain/domain-query-coordinator';
import { DomainQueryResult } from '../domain/types';
import { ResponseSynthesizer } from '../agent/response-synthesizer';
import { AgentName } from '../agent/types';
import { Channel } from '../config/types';
import { ProviderError, RequestAbortedError } from '../errors';
import { assertUserId, createEntry } from '../memory/conversation-memory';
import {
  ConversationEntry,
  ConversationExport,
  ConversationStore,
  ConversationSummary,
  EntryMetadataValue,
  ExportOptions,
  MemoryStatus,
} from '../memory/types';
import { IntentRouter } from '../routing/intent-router';
import { RoutingDecision } from '../routing/types';
import { childLogger } from '../observability/logger';
import { messagesProcessed } from '../observability/metrics';
import { createTraceContext, endSpan, spanDurations, startSpan } from '../observability/trace';

/** Returned instead of an answer when no text-completion provider could respond */
export const GENERIC_APOLOGY = 'Sorry, I cannot answer right now. Please try again in a moment.';

export interface ProcessRequest {
  message: string;
  userId: unknown;
  /** Defaults to the service-wide memory switch */
  enableMemory?: boolean;
  /** Free-form caller context; scalar values are kept on the stored user entry */
  context?: Record<string, unknown>;
  channel?: Channel;
  requestId?: string;
}

export interface ProcessOptions {
  signal?: AbortSignal;
}

export interface ProcessResult {
  status: 'success' | 'error';
  userId: string;
  requestId: string;
  conversationId: string;
  agentResponse: string;
  agentUsed: AgentName;
  decision: RoutingDecision;
  degraded: boolean;
  memoryEnabled: boolean;
  /** User + assistant entries were written to memory */
  committed: boolean;
}

export interface OrchestratorDeps {
  store: ConversationStore;
  assembler: ContextAssembler;
  router: IntentRouter;
  coordinator: DomainQueryCoordinator;
  synthesizer: ResponseSynthesizer;
}

export interface OrchestratorOptions {
  memoryEnabled: boolean;
  requestTimeoutMs: number;
}

/** Mutable per-request state shared with the abort race */
interface RequestScope {
  signal: AbortSignal;
  committing: boolean;
}

function abortReason(signal: AbortSignal): RequestAbortedError {
  return signal.reason instanceof RequestAbortedError ? signal.reason : new RequestAbortedError('cancelled');
}

function throwIfAborted(scope: RequestScope): void {
  if (scope.signal.aborted) throw abortReason(scope.signal);
}

function scalarContext(context: Record<string, unknown> | undefined): Record<string, EntryMetadataValue> {
  const out: Record<string, EntryMetadataValue> = {};
  for (const [key, value] of Object.entries(context ?? {})) {
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Top-level message pipeline:
 * prepare context → classify → (greeting | domain query → re-prepare with facts)
 * → synthesize → commit user + assistant entries.
 *
 * The commit is the only write and happens last. A request cancelled or timed
 * out before it commits nothing; so does a provider failure, which answers
 * with GENERIC_APOLOGY instead.
 */
export class Orchestrator {
  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
  ) {}

  async process(request: ProcessRequest, options: ProcessOptions = {}): Promise<ProcessResult> {
    const userId = request.userId;
    assertUserId(userId);
    const receivedAt = Date.now();

    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new RequestAbortedError('timeout')),
      this.options.requestTimeoutMs,
    );
    const parent = options.signal;
    const onParentAbort = (): void => controller.abort(new RequestAbortedError('cancelled'));
    if (parent?.aborted) onParentAbort();
    else parent?.addEventListener('abort', onParentAbort, { once: true });

    const scope: RequestScope = { signal: controller.signal, committing: false };
    const aborted = new Promise<never>((_, reject) => {
      const onAbort = (): void => {
        if (!scope.committing) reject(abortReason(controller.signal));
      };
      if (controller.signal.aborted) onAbort();
      else controller.signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      return await Promise.race([this.run(userId, request, scope, receivedAt), aborted]);
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  }

  private async run(
    userId: string,
    request: ProcessRequest,
    scope: RequestScope,
    receivedAt: number,
  ): Promise<ProcessResult> {
    const channel: Channel = request.channel ?? 'api';
    const memoryEnabled = request.enableMemory ?? this.options.memoryEnabled;
    const trace = createTraceContext({ requestId: request.requestId, userId, channel });
    const log = childLogger(trace.requestId, { component: 'orchestrator', userId, channel });
    const message = request.message;
    const historyCount = memoryEnabled ? undefined : 0;

    const spanContext = startSpan(trace, 'context.prepare');
    let context: ContextPackage = await this.deps.assembler.prepare(userId, message, { historyCount });
    endSpan(spanContext, 'ok', { entries: context.entries.length, truncated: context.metadata.truncated });

    const spanRoute = startSpan(trace, 'router.classify');
    const outcome = this.deps.router.classify(message, trace.requestId);
    let decision: RoutingDecision;
    if (outcome.state === 'Classified') {
      decision = outcome.decision;
      endSpan(spanRoute, 'ok', { category: decision.category });
    } else {
      log.warn({ reason: outcome.reason }, 'Router failed; treating message as Unknown');
      decision = { category: 'Unknown', confidence: 0, rationale: outcome.reason, signals: [], domains: [] };
      endSpan(spanRoute, 'error');
    }
    throwIfAborted(scope);

    let agent: AgentName = 'greeting_agent';
    let domain: DomainQueryResult | undefined;
    if (decision.category === 'DomainQuery') {
      agent = 'crm_marketing_agent';
      const spanDomain = startSpan(trace, 'domain.query');
      domain = await this.deps.coordinator.query(decision, message, {
        requestId: trace.requestId,
        signal: scope.signal,
      });
      endSpan(spanDomain, domain.status === 'ok' ? 'ok' : 'error', { status: domain.status });
      throwIfAborted(scope);

      context = await this.deps.assembler.prepare(userId, message, { facts: domain.facts, historyCount });
    }

    const spanSynth = startSpan(trace, 'response.synthesize');
    let text: string;
    let degraded: boolean;
    try {
      const response = await this.deps.synthesizer.synthesize({
        agent,
        category: decision.category,
        context,
        channel,
        requestId: trace.requestId,
        domain,
        signal: scope.signal,
      });
      text = response.text;
      degraded = response.degraded;
      endSpan(spanSynth, 'ok', { provider: response.provider, model: response.model });
    } catch (err) {
      endSpan(spanSynth, 'error');
      throwIfAborted(scope);
      if (!(err instanceof ProviderError)) throw err;

      log.error({ err }, 'Text completion failed; returning apology without commit');
      messagesProcessed.inc({ channel, agent, status: 'provider_error' });
      return {
        status: 'error',
        userId,
        requestId: trace.requestId,
        conversationId: trace.requestId,
        agentResponse: GENERIC_APOLOGY,
        agentUsed: agent,
        decision,
        degraded: domain ? domain.status !== 'ok' : false,
        memoryEnabled,
        committed: false,
      };
    }

    throwIfAborted(scope);
    if (memoryEnabled) {
      scope.committing = true;
      await this.deps.store.appendAll(userId, [
        createEntry('user', message, { ...scalarContext(request.context), channel }, receivedAt),
        createEntry('assistant', text, { agent, category: decision.category, degraded, channel }),
      ]);
    }

    messagesProcessed.inc({ channel, agent, status: degraded ? 'degraded' : 'success' });
    log.info(
      {
        category: decision.category,
        confidence: decision.confidence,
        agent,
        degraded,
        committed: memoryEnabled,
        spans: spanDurations(trace),
      },
      'Message processed',
    );

    return {
      status: 'success',
      userId,
      requestId: trace.requestId,
      conversationId: trace.requestId,
      agentResponse: text,
      agentUsed: agent,
      decision,
      degraded,
      memoryEnabled,
      committed: memoryEnabled,
    };
  }

  // ───── Memory views for the admin surface ─────

  snapshot(userId: string, count: number): Promise<ConversationEntry[]> {
    return this.deps.store.snapshot(userId, count);
  }

  clear(userId: string): Promise<void> {
    return this.deps.store.clear(userId);
  }

  export(userId: string, options?: ExportOptions): Promise<ConversationExport> {
    return this.deps.store.export(userId, options);
  }

  summary(userId: string): Promise<ConversationSummary> {
    return this.deps.store.summary(userId);
  }

  status(): MemoryStatus {
    return this.deps.store.status();
  }
}
