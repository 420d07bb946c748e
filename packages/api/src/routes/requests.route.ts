import type { FastifyInstance } from 'fastify';
import type { ProcurementService } from '@requisition/core';
import { authPreHandler, requestActorId } from '../auth/index.js';
import { sendError } from '../http-errors.js';

export function registerRequestRoutes(app: FastifyInstance, service: ProcurementService): void {
  const preHandler = authPreHandler(app);

  // The viewer's queue: own requests for staff, the pending level for approvers.
  app.get('/requests', { preHandler }, async (request, reply) => {
    const result = await service.listRequests(requestActorId(request));
    if (!result.ok) return sendError(reply, result.error);
    return reply.send(result.value);
  });

  app.get<{ Params: { id: string } }>('/requests/:id', { preHandler }, async (request, reply) => {
    const result = await service.viewRequest(request.params.id, requestActorId(request));
    if (!result.ok) return sendError(reply, result.error);
    return reply.send(result.value);
  });
}
