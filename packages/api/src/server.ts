import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { generateId, isProcurementError } from '@requisition/core';
import type { ProcurementService } from '@requisition/core';
import type { IntentPipeline } from '@requisition/intent';
import { jwtAuthPlugin } from './auth/index.js';
import { sendError } from './http-errors.js';
import { registerIntentRoutes } from './routes/intents.route.js';
import { registerRequestRoutes } from './routes/requests.route.js';
import { registerFinanceRoutes } from './routes/finance.route.js';
import { registerPurchaseOrderRoutes } from './routes/purchase-orders.route.js';
import { registerHealthRoutes } from './routes/health.route.js';
import type { HealthCheck } from './routes/health.route.js';
import './auth/types.js';

export interface ServerDeps {
  service: ProcurementService;
  intentPipeline: IntentPipeline;
  jwtSecret?: string;
  checkDatabase?: HealthCheck;
  logLevel?: string;
}

export function createServer(deps: ServerDeps): FastifyInstance {
  const app = Fastify({
    logger: { name: 'requisition-api', level: deps.logLevel ?? 'info' },
    genReqId: () => generateId(),
  });

  app.register(jwtAuthPlugin, { jwtSecret: deps.jwtSecret });

  // Add correlation ID to every request
  app.addHook('onRequest', async (request) => {
    const header = request.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header !== '' ? header : generateId();
    request.headers['x-correlation-id'] = correlationId;
    request.log = request.log.child({ correlation_id: correlationId });
  });

  registerIntentRoutes(app, deps.intentPipeline);
  registerRequestRoutes(app, deps.service);
  registerFinanceRoutes(app, deps.service);
  registerPurchaseOrderRoutes(app, deps.service);
  registerHealthRoutes(app, deps.checkDatabase);

  app.setErrorHandler((error, request, reply) => {
    if (isProcurementError(error)) {
      return sendError(reply, error);
    }

    // @fastify/jwt and body parsing errors carry their own status
    if (error.statusCode === 401) {
      return reply.status(401).send({
        error: 'Unauthorized',
        code: 'AUTHENTICATION_FAILED',
        message: error.message,
      });
    }
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: 'Bad Request',
        code: 'VALIDATION_ERROR',
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'unhandled error');
    return reply.status(500).send({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
    });
  });

  return app;
}
