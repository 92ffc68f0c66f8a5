import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { getEnv } from '@infobox-query/config';
import { buildApp } from '../app.js';

describe('Health routes', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildApp({ table: [] });
  });

  afterAll(async () => {
    await app.close();
  });

  it('reports status and version', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    const body = response.json<{ status: string; service: string; timestamp: string; version: string }>();
    expect(body).toMatchObject({ status: 'ok', service: getEnv().SERVICE_NAME, version: getEnv().APP_VERSION });
    expect(new Date(body.timestamp).toString()).not.toBe('Invalid Date');
  });

  it('answers the liveness probe', async () => {
    const response = await app.inject({ method: 'GET', url: '/health/live' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'alive' });
  });
});
