import type { FastifyError, FastifyInstance } from 'fastify';
import { isMemoryError } from '@stratamem/core';

export interface ErrorBody {
  error: string;
  message: string;
}

/**
 * Maps the core error taxonomy onto HTTP statuses. Anything unrecognized is
 * logged and answered with a generic 500.
 */
export function registerErrorHandler(app: FastifyInstance) {
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (isMemoryError(error)) {
      if (error.status >= 500) {
        request.log.warn({ err: error }, 'request failed on a dependency');
      }
      const body: ErrorBody = { error: error.code, message: error.message };
      return reply.code(error.status).send(body);
    }

    if (error.validation) {
      const body: ErrorBody = { error: 'VALIDATION_ERROR', message: error.message };
      return reply.code(400).send(body);
    }

    if (error.statusCode !== undefined && error.statusCode < 500) {
      const body: ErrorBody = { error: error.code || 'BAD_REQUEST', message: error.message };
      return reply.code(error.statusCode).send(body);
    }

    request.log.error({ err: error }, 'unhandled error');
    const body: ErrorBody = { error: 'INTERNAL_ERROR', message: 'Internal server error' };
    return reply.code(500).send(body);
  });

  app.setNotFoundHandler((request, reply) => {
    const body: ErrorBody = { error: 'NOT_FOUND', message: `Route ${request.method} ${request.url} not found` };
    return reply.code(404).send(body);
  });
}
