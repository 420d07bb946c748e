export { default as jwtAuthPlugin, getJwtPayload, authenticateIfEnabled, authPreHandler } from './jwt-auth.js';
export { requestActorId, actorFromToken, ACTOR_HEADER } from './actor.js';
export type { JwtPayload } from './types.js';
export type { JwtAuthOptions } from './jwt-auth.js';
