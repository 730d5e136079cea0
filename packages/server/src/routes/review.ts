import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { decideInputSchema } from '@stratamem/core';
import { pendingQueryStringSchema } from '../schemas/memory.js';

export async function reviewRoutes(app: FastifyInstance) {
  const server = app.withTypeProvider<ZodTypeProvider>();

  server.get('/api/v1/review/pending', {
    schema: { querystring: pendingQueryStringSchema },
  }, async (request) => {
    return app.lifecycle.listPending(request.query);
  });

  server.post('/api/v1/review/decide', {
    schema: { body: decideInputSchema },
  }, async (request) => {
    return app.lifecycle.decide(request.body);
  });
}
