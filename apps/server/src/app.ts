import { randomUUID } from 'node:crypto';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import sensible from '@fastify/sensible';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ZodError } from 'zod';
import { getEnv, loadQueryTable } from '@infobox-query/config';
import { createDefaultActions, createPatternTable, type PatternTable } from '@infobox-query/core';
import {
  createWikipediaFieldLookup,
  isLookupError,
  LookupErrorCode,
} from '@infobox-query/integrations';
import { createLogger } from '@infobox-query/utils';
import { healthRoutes } from './routes/health.js';
import { queryRoutes } from './routes/query.js';

const logger = createLogger({ service: 'app' });

export interface BuildAppOptions {
  // Defaults to the configured query table backed by Wikipedia
  table?: PatternTable;
}

function loadPatternTable(): PatternTable {
  const config = loadQueryTable(getEnv().QUERY_TABLE_PATH);
  return createPatternTable(config.entries, createDefaultActions(createWikipediaFieldLookup()));
}

const lookupStatus = {
  [LookupErrorCode.TOPIC_NOT_FOUND]: 404,
  [LookupErrorCode.FIELD_NOT_FOUND]: 404,
  [LookupErrorCode.LOOKUP_UNAVAILABLE]: 503,
} as const satisfies Record<LookupErrorCode, number>;

export async function buildApp(options: BuildAppOptions = {}) {
  const env = getEnv();
  const table = options.table ?? loadPatternTable();

  const app = Fastify({
    logger:
      env.NODE_ENV === 'test'
        ? false
        : {
            level: env.LOG_LEVEL,
            ...(env.NODE_ENV === 'development' && {
              transport: {
                target: 'pino-pretty',
                options: { colorize: true },
              },
            }),
          },
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
  });

  // Security plugins
  await app.register(helmet, {
    contentSecurityPolicy: env.NODE_ENV === 'production',
  });

  await app.register(cors, {
    origin: env.NODE_ENV === 'production' ? false : true,
    credentials: true,
  });

  await app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
  });

  // Utility plugin
  await app.register(sensible);

  // API documentation
  await app.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: 'Infobox Query API',
        description: 'Answers simple questions from Wikipedia infoboxes',
        version: env.APP_VERSION,
      },
      servers: [
        {
          url: `http://${env.HOST}:${env.PORT}`,
          description: 'Local server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'query', description: 'Query answering' },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: false,
    },
  });

  // Global error handler; set before the routes so their contexts inherit it
  app.setErrorHandler((error, request, reply) => {
    if (isLookupError(error)) {
      logger.warn({ code: error.code, topic: error.topic, requestId: request.id }, error.message);
      return reply.status(lookupStatus[error.code]).send({
        error: error.name,
        code: error.code,
        message: error.message,
      });
    }

    if (error.validation) {
      return reply.status(400).send({
        error: 'Validation Error',
        message: 'Invalid request parameters',
        details: error.validation,
      });
    }

    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'Validation Error',
        message: 'Invalid request parameters',
        details: error.issues,
      });
    }

    logger.error({ error, requestId: request.id }, 'Request error');

    const statusCode = error.statusCode ?? 500;
    return reply.status(statusCode).send({
      error: error.name,
      message: env.NODE_ENV === 'production' ? 'An error occurred' : error.message,
    });
  });

  // Register routes
  await app.register(healthRoutes, { prefix: '/health' });
  await app.register(queryRoutes, { prefix: '/api/query', table });

  return app;
}
