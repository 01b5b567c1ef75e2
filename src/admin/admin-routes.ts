import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ConnectorSet } from '../connectors/types';
import { Orchestrator } from '../orchestrator/orchestrator';
import { logger } from '../observability/logger';

export interface AdminDeps {
  orchestrator: Orchestrator;
  connectors: ConnectorSet;
  /** Empty disables every admin route */
  adminApiKey: string;
}

interface UserParams {
  userId: string;
}

const userParamsSchema = {
  type: 'object',
  required: ['userId'],
  properties: { userId: { type: 'string' } },
} as const;

function makeVerifyAdminKey(adminApiKey: string) {
  return (req: FastifyRequest, reply: FastifyReply): boolean => {
    const key = req.headers['x-admin-api-key'];
    if (!adminApiKey || typeof key !== 'string' || key !== adminApiKey) {
      reply.status(403).send({ error: 'Forbidden' });
      return false;
    }
    return true;
  };
}

/**
 * Admin surface over conversation memory and the record systems.
 * Every route requires the `x-admin-api-key` header.
 */
export function registerAdminRoutes(app: FastifyInstance, deps: AdminDeps): void {
  const { orchestrator, connectors } = deps;
  const verifyAdminKey = makeVerifyAdminKey(deps.adminApiKey);
  const log = logger.child({ component: 'admin' });

  // ───── Conversation memory ─────

  app.get('/admin/memory/status', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;
    return reply.send({ status: 'ok', memory: orchestrator.status() });
  });

  app.get<{ Params: UserParams }>(
    '/admin/memory/:userId/summary',
    { schema: { params: userParamsSchema } },
    async (req, reply) => {
      if (!verifyAdminKey(req, reply)) return;
      const summary = await orchestrator.summary(req.params.userId);
      return reply.send({ status: 'ok', summary });
    },
  );

  app.get<{ Params: UserParams; Querystring: { count?: number } }>(
    '/admin/memory/:userId/history',
    {
      schema: {
        params: userParamsSchema,
        querystring: {
          type: 'object',
          properties: { count: { type: 'integer', minimum: 0, maximum: 1000 } },
        },
      },
    },
    async (req, reply) => {
      if (!verifyAdminKey(req, reply)) return;
      const count = req.query.count ?? 10;
      const entries = await orchestrator.snapshot(req.params.userId, count);
      return reply.send({ status: 'ok', userId: req.params.userId, count: entries.length, entries });
    },
  );

  app.get<{ Params: UserParams; Querystring: { allowEmpty?: boolean } }>(
    '/admin/memory/:userId/export',
    {
      schema: {
        params: userParamsSchema,
        querystring: { type: 'object', properties: { allowEmpty: { type: 'boolean' } } },
      },
    },
    async (req, reply) => {
      if (!verifyAdminKey(req, reply)) return;
      const exported = await orchestrator.export(req.params.userId, { allowEmpty: req.query.allowEmpty ?? false });
      return reply.send(exported);
    },
  );

  app.delete<{ Params: UserParams }>(
    '/admin/memory/:userId',
    { schema: { params: userParamsSchema } },
    async (req, reply) => {
      if (!verifyAdminKey(req, reply)) return;
      await orchestrator.clear(req.params.userId);
      log.info({ userId: req.params.userId }, 'Conversation memory cleared');
      return reply.send({ status: 'ok', userId: req.params.userId, cleared: true });
    },
  );

  // ───── Record systems ─────

  app.get('/admin/crm/contacts', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;
    const contacts = await connectors.crm.listContacts(AbortSignal.timeout(30_000));
    return reply.send({ status: 'ok', backend: connectors.crm.backend, count: contacts.length, contacts });
  });

  app.post<{ Body: { email: string; score: number } }>(
    '/admin/crm/lead-score',
    {
      schema: {
        body: {
          type: 'object',
          required: ['email', 'score'],
          properties: {
            email: { type: 'string', minLength: 3 },
            score: { type: 'integer', minimum: 0, maximum: 100 },
          },
        },
      },
    },
    async (req, reply) => {
      if (!verifyAdminKey(req, reply)) return;
      const { email, score } = req.body;
      const record = await connectors.crm.updateLeadScore(email, score, AbortSignal.timeout(10_000));
      log.info({ email, score, backend: connectors.crm.backend }, 'Lead score updated via admin');
      return reply.send({ status: 'ok', record });
    },
  );

  app.post<{ Body: { email: string; tag: string } }>(
    '/admin/marketing/tags',
    {
      schema: {
        body: {
          type: 'object',
          required: ['email', 'tag'],
          properties: {
            email: { type: 'string', minLength: 3 },
            tag: { type: 'string', minLength: 1, maxLength: 100 },
          },
        },
      },
    },
    async (req, reply) => {
      if (!verifyAdminKey(req, reply)) return;
      const { email, tag } = req.body;
      const result = await connectors.marketing.addTag(email, tag, AbortSignal.timeout(10_000));
      log.info({ email, tag, backend: connectors.marketing.backend }, 'Tag added via admin');
      return reply.send({ status: 'ok', result });
    },
  );
}
