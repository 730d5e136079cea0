import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { recallInputSchema, rememberInputSchema } from '@stratamem/core';
import { expandQuerySchema, memoryParamsSchema, statsQuerySchema } from '../schemas/memory.js';

export async function memoryRoutes(app: FastifyInstance) {
  const server = app.withTypeProvider<ZodTypeProvider>();

  server.post('/api/v1/remember', {
    schema: { body: rememberInputSchema },
  }, async (request, reply) => {
    const memoryId = await app.engine.remember(request.body);
    return reply.code(201).send({ success: true, memoryId });
  });

  server.post('/api/v1/recall', {
    schema: { body: recallInputSchema },
  }, async (request) => {
    const results = await app.engine.recall(request.body);
    return { results };
  });

  server.get('/api/v1/memory/:id', {
    schema: { params: memoryParamsSchema, querystring: expandQuerySchema },
  }, async (request) => {
    return app.engine.expand(request.params.id, request.query.layer);
  });

  server.delete('/api/v1/memory/:id', {
    schema: { params: memoryParamsSchema },
  }, async (request) => {
    return app.lifecycle.decide({
      memoryId: request.params.id,
      decision: 'delete',
      reason: 'deleted through the API',
    });
  });

  server.get('/api/v1/stats', {
    schema: { querystring: statsQuerySchema },
  }, async (request) => {
    return app.engine.stats(request.query.agentName);
  });
}
