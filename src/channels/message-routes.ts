import { FastifyInstance } from 'fastify';
import { toChannel } from '../config/types';
import { Orchestrator } from '../orchestrator/orchestrator';

interface ProcessMessageBody {
  message: string;
  userId: string;
  enableMemory?: boolean;
  context?: Record<string, unknown>;
  channel?: string;
}

const processMessageSchema = {
  body: {
    type: 'object',
    required: ['message', 'userId'],
    properties: {
      message: { type: 'string', minLength: 1 },
      userId: { type: 'string' },
      enableMemory: { type: 'boolean' },
      context: { type: 'object', additionalProperties: true },
      channel: { type: 'string' },
    },
  },
} as const;

/**
 * POST /process_message
 *
 * Synchronous entry point used by workflow automations: runs the full
 * pipeline and returns the assistant's answer in the response body.
 * Domain errors (blank userId, timeout) reach the app error handler.
 */
export function registerMessageRoutes(app: FastifyInstance, orchestrator: Orchestrator): void {
  app.post<{ Body: ProcessMessageBody }>('/process_message', { schema: processMessageSchema }, async (req, reply) => {
    const body = req.body;

    // Abort the pipeline if the caller goes away before we answer
    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) controller.abort();
    });

    const result = await orchestrator.process(
      {
        message: body.message,
        userId: body.userId,
        enableMemory: body.enableMemory,
        context: body.context,
        channel: toChannel(body.channel ?? body.context?.channel),
        requestId: req.id,
      },
      { signal: controller.signal },
    );

    return reply.send({
      status: result.status,
      userId: result.userId,
      inputMessage: body.message,
      agentResponse: result.agentResponse,
      agentUsed: result.agentUsed,
      category: result.decision.category,
      degraded: result.degraded,
      memoryEnabled: result.memoryEnabled,
      conversationId: result.conversationId,
    });
  });
}
