import type { FastifyInstance } from 'fastify';
import type { ProcurementService } from '@requisition/core';
import { authPreHandler, requestActorId } from '../auth/index.js';
import { sendError } from '../http-errors.js';

interface ReceiptBody {
  lines?: unknown;
}

export function registerPurchaseOrderRoutes(app: FastifyInstance, service: ProcurementService): void {
  const preHandler = authPreHandler(app);

  app.get<{ Params: { id: string } }>('/purchase-orders/:id', { preHandler }, async (request, reply) => {
    const result = await service.getPurchaseOrder(request.params.id, requestActorId(request));
    if (!result.ok) return sendError(reply, result.error);
    return reply.send(result.value);
  });

  // Read-only comparison; neither the order nor the request changes.
  app.post<{ Params: { id: string }; Body: ReceiptBody }>(
    '/purchase-orders/:id/receipt-validations',
    { preHandler },
    async (request, reply) => {
      const access = await service.getPurchaseOrder(request.params.id, requestActorId(request));
      if (!access.ok) return sendError(reply, access.error);

      const result = await service.validateReceipt(request.params.id, request.body?.lines);
      if (!result.ok) return sendError(reply, result.error);
      return reply.send(result.value);
    },
  );
}
