import type { FastifyInstance } from 'fastify';
import type { ProcurementService } from '@requisition/core';
import { authPreHandler, requestActorId } from '../auth/index.js';
import { sendError } from '../http-errors.js';

export function registerFinanceRoutes(app: FastifyInstance, service: ProcurementService): void {
  const preHandler = authPreHandler(app);

  app.get('/finance/requests', { preHandler }, async (request, reply) => {
    const result = await service.listRequestsForFinance(requestActorId(request));
    if (!result.ok) return sendError(reply, result.error);
    return reply.send(result.value);
  });

  app.get<{ Params: { id: string } }>('/finance/requests/:id', { preHandler }, async (request, reply) => {
    const result = await service.getRequestForFinance(request.params.id, requestActorId(request));
    if (!result.ok) return sendError(reply, result.error);
    return reply.send(result.value);
  });
}
