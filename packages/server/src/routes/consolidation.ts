import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { sleepBodySchema } from '../schemas/memory.js';

export async function consolidationRoutes(app: FastifyInstance) {
  const server = app.withTypeProvider<ZodTypeProvider>();

  server.post('/api/v1/sleep', {
    schema: { body: sleepBodySchema },
  }, async (request, reply) => {
    if (!app.sleepCycle) {
      return reply.code(503).send({
        error: 'CONSOLIDATION_UNAVAILABLE',
        message: 'No decision service configured; set ANTHROPIC_API_KEY to enable the sleep cycle.',
      });
    }
    return app.sleepCycle.run(request.body);
  });
}
