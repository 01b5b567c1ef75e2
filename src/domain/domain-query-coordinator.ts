import { ConnectorError, errorMessage } from '../errors';
import { CONNECTOR_SOURCES, ConnectorQuery, ConnectorSet, ConnectorSource, LookupResult, RecordConnector } from '../connectors/types';
import { childLogger } from '../observability/logger';
import { connectorCalls, connectorRetries, coordinatorOutcomes } from '../observability/metrics';
import { extractContactHints } from '../routing/text';
import { RoutingDecision } from '../routing/types';
import { errorFact, foundFact, notFoundFact } from './facts';
import { CoordinatorOptions, CoordinatorStatus, DomainQueryResult, ExternalFact } from './types';

type AttemptOutcome =
  | { ok: true; result: LookupResult }
  | { ok: false; message: string };

export interface QueryOptions {
  requestId?: string;
  signal?: AbortSignal;
}

/**
 * Fans a DomainQuery out to the record systems it references and turns each
 * answer into an ExternalFact.
 *
 * Lookups run concurrently. Each attempt gets its own timeout; failures are
 * retried up to `maxRetries` times with a fixed backoff. A missing record is a
 * completed lookup and is never retried. A connector that keeps failing
 * yields an error-flagged fact instead of an exception.
 */
export class DomainQueryCoordinator {
  constructor(
    private readonly connectors: ConnectorSet,
    private readonly options: CoordinatorOptions,
  ) {}

  /** Record systems to consult; a bare contact reference goes to the CRM */
  resolveTargets(decision: RoutingDecision): ConnectorSource[] {
    const targets = CONNECTOR_SOURCES.filter((source) => decision.domains.includes(source));
    return targets.length > 0 ? targets : ['crm'];
  }

  buildQuery(message: string): ConnectorQuery {
    return { ...extractContactHints(message), text: message };
  }

  async query(decision: RoutingDecision, message: string, options: QueryOptions = {}): Promise<DomainQueryResult> {
    const log = childLogger(options.requestId ?? 'unscoped', { component: 'domain-query' });
    const targets = this.resolveTargets(decision);
    const query = this.buildQuery(message);

    const facts = await Promise.all(
      targets.map((source) => this.lookupWithRetry(this.connectors[source], query, log, options.signal)),
    );

    const failed = facts.filter((f) => f.error).length;
    const status: CoordinatorStatus = failed === 0 ? 'ok' : failed === facts.length ? 'degraded_no_data' : 'partial';
    coordinatorOutcomes.inc({ status });
    log.info({ targets, status, failed, hasEmail: Boolean(query.email), hasPhone: Boolean(query.phone) }, 'Domain query completed');

    return { status, facts, targets, query };
  }

  private async lookupWithRetry(
    connector: RecordConnector,
    query: ConnectorQuery,
    log: ReturnType<typeof childLogger>,
    signal?: AbortSignal,
  ): Promise<ExternalFact> {
    const { source } = connector;
    const attempts = this.options.maxRetries + 1;
    let lastError = 'lookup failed';

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (attempt > 1) {
        connectorRetries.inc({ source });
        log.info({ source, attempt, backoffMs: this.options.retryBackoffMs }, 'Retrying connector lookup');
        await this.delay(this.options.retryBackoffMs);
      }
      if (signal?.aborted) return errorFact(source, 'request cancelled');

      const outcome = await this.tryLookup(connector, query, signal);
      if (outcome.ok) {
        connectorCalls.inc({ source, outcome: outcome.result.status });
        return outcome.result.status === 'found'
          ? foundFact(source, outcome.result.record)
          : notFoundFact(source, outcome.result.reason);
      }

      lastError = outcome.message;
      connectorCalls.inc({ source, outcome: 'error' });
      log.warn({ source, backend: connector.backend, attempt, error: outcome.message }, 'Connector lookup failed');
    }

    return errorFact(source, lastError);
  }

  /** One attempt, aborted on timeout or when the parent request is cancelled */
  private async tryLookup(
    connector: RecordConnector,
    query: ConnectorQuery,
    parent?: AbortSignal,
  ): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    parent?.addEventListener('abort', onAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ConnectorError(connector.source, `timed out after ${this.options.timeoutMs}ms`));
      }, this.options.timeoutMs);
    });

    try {
      const result = await Promise.race([connector.lookup(query, controller.signal), timeout]);
      return { ok: true, result };
    } catch (err) {
      return { ok: false, message: errorMessage(err) };
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
