import type { FastifyReply, FastifyRequest } from 'fastify';
import type { IntentActor } from '@requisition/intent';

/** Claims of a bearer token; `sub` is the identity whose role is resolved. */
export interface JwtPayload {
  sub: string;
  name: string;
  actor_type: IntentActor['type'];
}

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: JwtPayload;
    user: JwtPayload;
  }
}

declare module 'fastify' {
  interface FastifyInstance {
    authenticate(request: FastifyRequest, reply: FastifyReply): Promise<void>;
  }
}
