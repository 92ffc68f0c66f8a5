import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { dispatch, tokenizeQuery, type PatternTable } from '@infobox-query/core';
import { createRequestLogger } from '@infobox-query/utils';

export const MAX_QUERY_LENGTH = 500;

const queryBodySchema = z.object({
  query: z.string().min(1).max(MAX_QUERY_LENGTH),
});

export interface QueryRoutesOptions {
  table: PatternTable;
}

export const queryRoutes: FastifyPluginAsync<QueryRoutesOptions> = async (app, { table }) => {
  // Answer a natural-language query
  app.post(
    '/',
    {
      schema: {
        tags: ['query'],
        summary: 'Answer a query',
        body: {
          type: 'object',
          required: ['query'],
          properties: {
            query: { type: 'string', minLength: 1, maxLength: MAX_QUERY_LENGTH },
          },
        },
        response: {
          200: {
            type: 'object',
            properties: {
              kind: { type: 'string', enum: ['answers', 'terminate'] },
              answers: { type: 'array', items: { type: 'string' } },
            },
          },
        },
      },
    },
    async (request) => {
      const { query } = queryBodySchema.parse(request.body);
      const log = createRequestLogger(request.id, { service: 'query-route' });

      const outcome = await dispatch(table, tokenizeQuery(query));
      log.info({ kind: outcome.kind }, 'Query answered');

      return outcome;
    }
  );
};
