import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import fastifyJwt from '@fastify/jwt';
import { AuthenticationError } from '@requisition/core';
import type { JwtPayload } from './types.js';

export interface JwtAuthOptions {
  jwtSecret?: string;
}

async function jwtAuthPlugin(app: FastifyInstance, opts: JwtAuthOptions): Promise<void> {
  if (!opts.jwtSecret) {
    // auth disabled (dev mode)
    return;
  }

  await app.register(fastifyJwt, {
    secret: opts.jwtSecret,
  });

  app.decorate('authenticate', async (request: FastifyRequest, _reply: FastifyReply) => {
    try {
      await request.jwtVerify();
    } catch (error) {
      throw new AuthenticationError('Invalid or missing authentication token', { cause: error });
    }
  });
}

export default fp(jwtAuthPlugin, {
  name: 'jwt-auth',
});

/** Verified token payload; undefined when auth is not configured. */
export function getJwtPayload(request: FastifyRequest): JwtPayload | undefined {
  const user: JwtPayload | undefined = request.user;
  return user;
}

/** Requires a valid token on the route when auth is configured. */
export async function authenticateIfEnabled(
  app: FastifyInstance,
  request: FastifyRequest,
  reply: FastifyReply,
): Promise<void> {
  if (app.hasDecorator('authenticate')) {
    await app.authenticate(request, reply);
  }
}

export function authPreHandler(app: FastifyInstance) {
  return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    await authenticateIfEnabled(app, request, reply);
  };
}
