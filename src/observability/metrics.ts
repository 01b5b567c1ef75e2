import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();

// ───── HTTP ─────
export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

// ───── Orchestration ─────
export const messagesProcessed = new Counter({
  name: 'messages_processed_total',
  help: 'Messages processed end to end',
  labelNames: ['channel', 'agent', 'status'] as const,
  registers: [registry],
});

export const routingDecisions = new Counter({
  name: 'routing_decisions_total',
  help: 'Intent router outcomes',
  labelNames: ['category'] as const,
  registers: [registry],
});

export const contextTruncations = new Counter({
  name: 'context_truncations_total',
  help: 'Context packages that dropped history to fit the budget',
  registers: [registry],
});

export const memoryEvictions = new Counter({
  name: 'memory_evictions_total',
  help: 'Conversation entries evicted beyond the memory window',
  registers: [registry],
});

// ───── Connectors ─────
export const connectorCalls = new Counter({
  name: 'connector_calls_total',
  help: 'Record-system lookups by outcome',
  labelNames: ['source', 'outcome'] as const,
  registers: [registry],
});

export const connectorRetries = new Counter({
  name: 'connector_retries_total',
  help: 'Record-system lookups retried after a failure',
  labelNames: ['source'] as const,
  registers: [registry],
});

export const coordinatorOutcomes = new Counter({
  name: 'domain_query_outcomes_total',
  help: 'Aggregated domain-query results',
  labelNames: ['status'] as const,
  registers: [registry],
});

// ───── LLM ─────
export const llmRequestDuration = new Histogram({
  name: 'llm_request_duration_seconds',
  help: 'Text-completion latency per provider',
  labelNames: ['provider', 'model', 'status'] as const,
  buckets: [0.25, 0.5, 1, 2, 4, 8, 16, 32],
  registers: [registry],
});

export const llmProviderFailovers = new Counter({
  name: 'llm_provider_failovers_total',
  help: 'Requests served by a fallback provider',
  labelNames: ['from_provider', 'to_provider', 'reason'] as const,
  registers: [registry],
});

export const llmTokenUsage = new Counter({
  name: 'llm_token_usage_total',
  help: 'Tokens consumed per provider',
  labelNames: ['provider', 'model', 'token_type'] as const,
  registers: [registry],
});

/** Process-level metrics (CPU, heap, event loop); enabled by the server entry point only */
export function enableDefaultMetrics(): void {
  collectDefaultMetrics({ register: registry });
}

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
