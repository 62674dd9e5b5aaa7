import { FastifyInstance } from 'fastify';
import { v4 as uuid } from 'uuid';
import { CATEGORIES, Category } from '../config/types';
import { CORRECTION_TYPES, CorrectionRecord, CorrectionStore, CorrectionType } from '../learning/types';
import { logger } from '../observability/logger';

interface CorrectionBody {
  category: Category;
  aiResponse: string;
  humanEdit: string;
  correctionType?: CorrectionType;
  issue?: string;
  sessionId?: string;
  turnId?: string;
}

const CORRECTION_BODY_SCHEMA = {
  type: 'object',
  properties: {
    category: { type: 'string', enum: [...CATEGORIES] },
    aiResponse: { type: 'string', minLength: 1, maxLength: 8000 },
    humanEdit: { type: 'string', minLength: 1, maxLength: 8000 },
    correctionType: { type: 'string', enum: [...CORRECTION_TYPES] },
    issue: { type: 'string', maxLength: 500 },
    sessionId: { type: 'string', minLength: 1, maxLength: 128 },
    turnId: { type: 'string', minLength: 1, maxLength: 128 },
  },
  required: ['category', 'aiResponse', 'humanEdit'],
  additionalProperties: false,
} as const;

/**
 * POST /corrections → 201 { id }
 *
 * Records an agent's edit of a drafted reply for few-shot injection.
 */
export function registerCorrectionRoutes(app: FastifyInstance, store: CorrectionStore): void {
  const log = logger.child({ component: 'correction-routes' });

  app.post<{ Body: CorrectionBody }>('/corrections', { schema: { body: CORRECTION_BODY_SCHEMA } }, async (req, reply) => {
    const body = req.body;
    if (body.aiResponse.trim() === body.humanEdit.trim()) {
      return reply.status(400).send({ error: 'unchanged_reply' });
    }

    const record: CorrectionRecord = {
      id: uuid(),
      category: body.category,
      sessionId: body.sessionId,
      turnId: body.turnId,
      aiResponse: body.aiResponse,
      humanEdit: body.humanEdit,
      correctionType: body.correctionType ?? 'completeness',
      issue: body.issue,
      createdAt: Date.now(),
    };
    await store.save(record);

    log.info({ category: record.category, correctionType: record.correctionType }, 'Correction recorded');
    return reply.status(201).send({ id: record.id });
  });
}
