import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { v4 as uuidv4 } from 'uuid';
import { env } from './config/env';
import { ConnectorError, isAppError } from './errors';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { createConversationStore } from './memory/conversation-memory';
import { ConversationStore } from './memory/types';
import { ContextAssembler } from './context/context-assembler';
import { IntentRouter } from './routing/intent-router';
import { loadRoutingConfig } from './routing/routing-config';
import { RoutingConfig } from './routing/types';
import { buildConnectors } from './connectors/connector-factory';
import { ConnectorSet } from './connectors/types';
import { DomainQueryCoordinator } from './domain/domain-query-coordinator';
import { CoordinatorOptions } from './domain/types';
import { buildProviders, modelRouterConfigFromEnv } from './llm/provider-factory';
import { ModelRouter } from './llm/model-router';
import { TextCompletion } from './llm/types';
import { PromptManager } from './agent/prompt-manager';
import { ResponseSynthesizer } from './agent/response-synthesizer';
import { Orchestrator } from './orchestrator/orchestrator';
import { registerMessageRoutes } from './channels/message-routes';
import { registerAdminRoutes } from './admin/admin-routes';
import { HealthDeps, registerHealthRoutes } from './health/health-routes';

/** Collaborators tests (or embedders) can swap; anything omitted comes from env */
export interface AppOverrides {
  completion?: TextCompletion;
  connectors?: ConnectorSet;
  store?: ConversationStore;
  routingConfig?: RoutingConfig;
  coordinator?: Partial<CoordinatorOptions>;
  adminApiKey?: string;
  memoryEnabled?: boolean;
  requestTimeoutMs?: number;
  enableMetrics?: boolean;
}

export interface AppContext {
  app: FastifyInstance;
  orchestrator: Orchestrator;
  store: ConversationStore;
  connectors: ConnectorSet;
}

export async function buildApp(overrides: AppOverrides = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
    genReqId: () => uuidv4(),
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'DELETE'],
  });

  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  app.setErrorHandler((err, req, reply) => {
    if (isAppError(err)) {
      const statusCode = err instanceof ConnectorError && err.httpStatus === 404 ? 404 : err.statusCode;
      return reply.status(statusCode).send({ error: err.code, message: err.message });
    }
    if (err.validation) {
      return reply.status(400).send({ error: 'VALIDATION_ERROR', message: err.message });
    }
    if (err instanceof RangeError) {
      return reply.status(400).send({ error: 'VALIDATION_ERROR', message: err.message });
    }
    logger.error({ err, requestId: req.id, url: req.url }, 'Unhandled request error');
    return reply.status(500).send({ error: 'INTERNAL_ERROR', message: 'Internal server error' });
  });

  // ───── Memory ─────
  const memoryEnabled = overrides.memoryEnabled ?? env.memory.enabled;
  const store = overrides.store ?? createConversationStore(env.memory.window, memoryEnabled);
  const assembler = new ContextAssembler(store, {
    budgetChars: env.context.budgetChars,
    historyCount: env.context.historyCount,
  });

  // ───── Routing ─────
  const router = new IntentRouter(overrides.routingConfig ?? loadRoutingConfig(env.routing.configPath));

  // ───── Record systems ─────
  const connectors = overrides.connectors ?? buildConnectors(env);
  const coordinator = new DomainQueryCoordinator(connectors, {
    ...env.connectors,
    ...overrides.coordinator,
  });

  // ───── Text completion ─────
  let completion: TextCompletion;
  let llmHealth: HealthDeps['llmHealth'];
  if (overrides.completion) {
    completion = overrides.completion;
  } else {
    const modelRouter = new ModelRouter(modelRouterConfigFromEnv(env.llm), buildProviders(env));
    completion = modelRouter;
    llmHealth = () => modelRouter.healthCheck();
  }
  const synthesizer = new ResponseSynthesizer(completion, new PromptManager());

  const orchestrator = new Orchestrator(
    { store, assembler, router, coordinator, synthesizer },
    {
      memoryEnabled,
      requestTimeoutMs: overrides.requestTimeoutMs ?? env.orchestrator.requestTimeoutMs,
    },
  );

  // ───── Routes ─────
  registerMessageRoutes(app, orchestrator);
  registerAdminRoutes(app, {
    orchestrator,
    connectors,
    adminApiKey: overrides.adminApiKey ?? env.security.adminApiKey,
  });
  registerHealthRoutes(app, {
    connectors,
    llmHealth,
    enableMetrics: overrides.enableMetrics ?? env.observability.enableMetrics,
  });

  if (!env.security.adminApiKey && overrides.adminApiKey === undefined) {
    logger.warn('ADMIN_API_KEY not set; admin routes will reject every request');
  }

  return { app, orchestrator, store, connectors };
}
