import { FastifyInstance } from 'fastify';
import { ConnectorSet, CONNECTOR_SOURCES } from '../connectors/types';
import { getMetrics, getContentType } from '../observability/metrics';
import { errorMessage } from '../errors';
import { logger } from '../observability/logger';

export interface HealthDeps {
  connectors: ConnectorSet;
  /** Provider health, e.g. ModelRouter.healthCheck */
  llmHealth?: () => Promise<Record<string, { status: 'ok' | 'error'; latencyMs: number }>>;
  enableMetrics: boolean;
}

type Check = { status: 'ok' | 'error' | 'skipped'; backend?: string; latencyMs?: number };

export function registerHealthRoutes(app: FastifyInstance, deps: HealthDeps): void {
  /** Liveness: 200 while the process runs */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /**
   * Readiness: record-system connectors and LLM providers.
   * Connector failures only degrade answers, so they are reported but do not fail readiness.
   */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, Check> = {};

    await Promise.all(CONNECTOR_SOURCES.map(async (source) => {
      const connector = deps.connectors[source];
      const start = Date.now();
      const healthy = await connector.healthCheck();
      checks[`connector_${source}`] = {
        status: healthy ? 'ok' : 'error',
        backend: connector.backend,
        latencyMs: Date.now() - start,
      };
    }));

    let llmReady = true;
    if (deps.llmHealth) {
      try {
        const providerChecks = await deps.llmHealth();
        for (const [name, check] of Object.entries(providerChecks)) {
          checks[`llm_${name}`] = check;
        }
        llmReady = Object.values(providerChecks).some((c) => c.status === 'ok');
      } catch (err) {
        logger.warn({ err: errorMessage(err) }, 'LLM health check failed');
        checks.llm = { status: 'error' };
        llmReady = false;
      }
    } else {
      checks.llm = { status: 'skipped' };
    }

    return reply.status(llmReady ? 200 : 503).send({
      status: llmReady ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  if (deps.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
