import { FastifyPluginAsync } from 'fastify';
import { getEnv } from '@infobox-query/config';

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get(
    '/',
    {
      schema: {
        tags: ['health'],
        summary: 'Service status and version',
        response: {
          200: {
            type: 'object',
            properties: {
              status: { type: 'string' },
              service: { type: 'string' },
              timestamp: { type: 'string' },
              version: { type: 'string' },
            },
          },
        },
      },
    },
    async () => {
      const env = getEnv();
      return {
        status: 'ok',
        service: env.SERVICE_NAME,
        timestamp: new Date().toISOString(),
        version: env.APP_VERSION,
      };
    }
  );

  app.get(
    '/live',
    {
      schema: {
        tags: ['health'],
        summary: 'Liveness probe',
        response: {
          200: {
            type: 'object',
            properties: {
              status: { type: 'string' },
            },
          },
        },
      },
    },
    async () => {
      return { status: 'alive' };
    }
  );
};
