import type { FastifyRequest } from 'fastify';
import { AuthenticationError } from '@requisition/core';
import type { IntentActor } from '@requisition/intent';
import { getJwtPayload } from './jwt-auth.js';

export const ACTOR_HEADER = 'x-actor-id';

/**
 * The caller of a read route: the token subject, or in dev mode the
 * x-actor-id header.
 */
export function requestActorId(request: FastifyRequest): string {
  const payload = getJwtPayload(request);
  if (payload) return payload.sub;

  const header = request.headers[ACTOR_HEADER];
  if (typeof header === 'string' && header.trim() !== '') {
    return header.trim();
  }
  throw new AuthenticationError(`Missing ${ACTOR_HEADER} header`);
}

export function actorFromToken(request: FastifyRequest): IntentActor | undefined {
  const payload = getJwtPayload(request);
  if (!payload) return undefined;
  return { type: payload.actor_type, id: payload.sub, name: payload.name };
}
