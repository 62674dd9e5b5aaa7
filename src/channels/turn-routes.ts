import { FastifyInstance } from 'fastify';
import { Orchestrator } from '../orchestrator/orchestrator';
import { InvalidTurnError } from '../orchestrator/types';
import { DedupStore } from '../security/dedup-store';
import { CHANNELS, Channel } from '../config/types';
import { logger } from '../observability/logger';
import { duplicateMessages } from '../observability/metrics';

interface TurnBody {
  text: string;
  channel: Channel;
  sessionId?: string;
  contactEmail?: string;
  contactName?: string;
  messageId?: string;
}

interface ConfirmationBody {
  approve: boolean;
  actor?: string;
}

const TURN_BODY_SCHEMA = {
  type: 'object',
  properties: {
    text: { type: 'string' },
    channel: { type: 'string', enum: [...CHANNELS] },
    sessionId: { type: 'string', minLength: 1, maxLength: 128 },
    contactEmail: { type: 'string', maxLength: 254 },
    contactName: { type: 'string', maxLength: 120 },
    messageId: { type: 'string', minLength: 1, maxLength: 256 },
  },
  required: ['text', 'channel'],
  additionalProperties: false,
} as const;

const CONFIRMATION_BODY_SCHEMA = {
  type: 'object',
  properties: {
    approve: { type: 'boolean' },
    actor: { type: 'string', minLength: 1, maxLength: 128 },
  },
  required: ['approve'],
  additionalProperties: false,
} as const;

/**
 * Turn intake and confirmation resolution.
 *
 * POST /turns                              → TurnOutcome
 * POST /confirmations/:callId              → ConfirmationAck
 * GET  /sessions/:sessionId/confirmations  → pending confirmations
 */
export function registerTurnRoutes(app: FastifyInstance, orchestrator: Orchestrator, dedup: DedupStore): void {
  const log = logger.child({ component: 'turn-routes' });

  app.post<{ Body: TurnBody }>('/turns', { schema: { body: TURN_BODY_SCHEMA } }, async (req, reply) => {
    const body = req.body;

    if (body.messageId && !(await dedup.isNew(body.messageId))) {
      duplicateMessages.inc();
      log.info({ messageId: body.messageId }, 'Duplicate message ignored');
      return reply.send({ status: 'duplicate' });
    }

    // A client that disconnects before the gate starts cancels the turn
    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableEnded) controller.abort();
    });

    try {
      const outcome = await orchestrator.processTurn(
        {
          text: body.text,
          channel: body.channel,
          messageId: body.messageId,
          session: {
            sessionId: body.sessionId,
            contactEmail: body.contactEmail,
            contactName: body.contactName,
          },
        },
        { signal: controller.signal },
      );
      return reply.send(outcome);
    } catch (err) {
      if (err instanceof InvalidTurnError) {
        // only accepted turns hold their message id
        if (body.messageId) await dedup.forget(body.messageId);
        return reply.status(400).send({ error: 'invalid_message', reason: err.reason, message: err.message });
      }
      throw err;
    }
  });

  app.post<{ Params: { callId: string }; Body: ConfirmationBody }>(
    '/confirmations/:callId',
    { schema: { body: CONFIRMATION_BODY_SCHEMA } },
    async (req, reply) => {
      const ack = await orchestrator.resolveConfirmation(req.params.callId, req.body.approve, {
        actor: req.body.actor,
      });
      if (ack.reason === 'unknown_call') {
        return reply.status(404).send(ack);
      }
      return reply.send(ack);
    },
  );

  app.get<{ Params: { sessionId: string } }>('/sessions/:sessionId/confirmations', async (req, reply) => {
    const pending = await orchestrator.pendingConfirmations(req.params.sessionId);
    return reply.send({ sessionId: req.params.sessionId, pending });
  });
}
