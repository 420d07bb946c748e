import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createTestServer } from './helpers/test-server.js';
import { createTestToken, createExpiredToken, TEST_JWT_SECRET } from './helpers/test-auth.js';

describe('JWT authentication', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = createTestServer({ jwtSecret: TEST_JWT_SECRET }).app;
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  const submit = {
    type: 'procurement.request.submit',
    data: { title: 'Pens', items: [{ description: 'Pens', quantity: 10, unit_price: 2 }] },
  };

  it('should return 401 without token', async () => {
    const response = await app.inject({ method: 'POST', url: '/intents', payload: submit });

    expect(response.statusCode).toBe(401);
    expect(response.json().error).toBe('Unauthorized');
  });

  it('should return 401 with an expired token', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/intents',
      headers: { authorization: `Bearer ${createExpiredToken()}` },
      payload: submit,
    });

    expect(response.statusCode).toBe(401);
  });

  it('should return 401 with an invalid token', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/requests',
      headers: { authorization: 'Bearer not-a-valid-token' },
    });

    expect(response.statusCode).toBe(401);
  });

  it('should take the actor from the token and ignore the body actor', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/intents',
      headers: { authorization: `Bearer ${createTestToken({ sub: 'alice' })}` },
      payload: { ...submit, actor: { type: 'human', id: 'bob' } },
    });

    expect(response.statusCode).toBe(201);
    expect(response.json().result.requester_id).toBe('alice');
  });

  it('should ignore the dev-mode actor header when auth is on', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/requests',
      headers: {
        authorization: `Bearer ${createTestToken({ sub: 'dave', name: 'Dave' })}`,
        'x-actor-id': 'alice',
      },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual([]);
  });

  it('should deny a token subject without a procurement role', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/intents',
      headers: { authorization: `Bearer ${createTestToken({ sub: 'mallory' })}` },
      payload: submit,
    });

    expect(response.statusCode).toBe(403);
    expect(response.json()).toMatchObject({ code: 'PERMISSION_DENIED', precondition: 'role' });
  });

  it('should leave health open', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
  });
});
