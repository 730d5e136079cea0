import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { ServerConfig } from '../config.js';

export async function registerCors(app: FastifyInstance, config: ServerConfig) {
  await app.register(cors, {
    origin: (origin, cb) => {
      // same-host tools and curl send no Origin
      if (!origin) {
        cb(null, true);
        return;
      }
      cb(null, config.corsOrigins.some(o => origin.startsWith(o)));
    },
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });
}
