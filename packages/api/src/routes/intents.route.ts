import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { IntentPipeline, Intent } from '@requisition/intent';
import { actorFromToken, authenticateIfEnabled } from '../auth/index.js';
import { sendFailure } from '../http-errors.js';

const intentBodySchema = z.object({
  type: z.string({ required_error: 'Intent type is required' }).min(1, 'Intent type is required'),
  actor: z
    .object({
      type: z.enum(['human', 'system']).default('human'),
      id: z.string().min(1),
      name: z.string().optional(),
    })
    .optional(),
  data: z.record(z.unknown(), { required_error: 'Data object is required', invalid_type_error: 'Data object is required' }),
  correlation_id: z.string().optional(),
});

const CREATING_INTENTS = new Set(['procurement.request.submit', 'procurement.proforma.import']);

export function registerIntentRoutes(app: FastifyInstance, pipeline: IntentPipeline): void {
  app.post(
    '/intents',
    {
      preHandler: async (request, reply) => {
        await authenticateIfEnabled(app, request, reply);
      },
    },
    async (request, reply) => {
      const parsed = intentBodySchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation Error',
          code: 'VALIDATION_ERROR',
          message: parsed.error.issues[0].message,
        });
      }
      const body = parsed.data;

      // With auth configured the actor always comes from the token.
      const actor = actorFromToken(request) ?? body.actor;
      if (!actor) {
        return reply.status(400).send({
          error: 'Validation Error',
          code: 'VALIDATION_ERROR',
          message: 'Actor with type and id is required',
        });
      }

      const intent: Intent = {
        intent_type: body.type,
        actor,
        data: body.data,
        correlation_id: body.correlation_id ?? request.id,
      };

      const result = await pipeline.execute(intent);
      if (!result.success) {
        return sendFailure(reply, result);
      }

      return reply.status(CREATING_INTENTS.has(intent.intent_type) ? 201 : 200).send({
        intent_id: result.intent_id,
        result: result.result,
      });
    },
  );
}
