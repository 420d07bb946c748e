import type { FastifyInstance } from 'fastify';
import { createLogger } from '@requisition/core';

export type HealthCheck = () => Promise<void>;

export function registerHealthRoutes(app: FastifyInstance, checkDatabase?: HealthCheck): void {
  const logger = createLogger('health');

  app.get('/health', async (_request, reply) => {
    let dbStatus: 'ok' | 'error' | 'not_configured' = 'not_configured';

    if (checkDatabase) {
      let timer: ReturnType<typeof setTimeout> | undefined;
      try {
        const timeoutPromise = new Promise<never>((_resolve, reject) => {
          timer = setTimeout(() => reject(new Error('timeout')), 3000);
        });
        await Promise.race([checkDatabase(), timeoutPromise]);
        dbStatus = 'ok';
      } catch (error) {
        logger.warn({ err: error }, 'database health check failed');
        dbStatus = 'error';
      } finally {
        clearTimeout(timer);
      }
    }

    const status = dbStatus === 'error' ? 'degraded' : 'ok';
    const statusCode = dbStatus === 'error' ? 503 : 200;

    return reply.status(statusCode).send({
      status,
      timestamp: new Date().toISOString(),
      checks: {
        database: dbStatus,
      },
    });
  });
}
