import Fastify from 'fastify';
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from 'fastify-type-provider-zod';
import {
  LifecycleManager,
  MemoryEngine,
  SleepCycle,
  version,
  type DecisionService,
  type EmbeddingService,
  type MemoryStore,
} from '@stratamem/core';
import type { ServerConfig } from './config.js';
import { registerCors } from './plugins/cors.js';
import { registerErrorHandler } from './plugins/errors.js';
import { memoryRoutes } from './routes/memory.js';
import { reviewRoutes } from './routes/review.js';
import { consolidationRoutes } from './routes/consolidation.js';

declare module 'fastify' {
  interface FastifyInstance {
    config: ServerConfig;
    engine: MemoryEngine;
    lifecycle: LifecycleManager;
    /** Null when no decision service is configured. */
    sleepCycle: SleepCycle | null;
  }
}

export interface AppDependencies {
  store: MemoryStore;
  embeddings: EmbeddingService;
  decisions?: DecisionService | null;
  clock?: () => Date;
}

export async function buildApp(config: ServerConfig, deps: AppDependencies) {
  const app = Fastify({
    logger: config.nodeEnv !== 'test',
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  const engine = new MemoryEngine({
    store: deps.store,
    embeddings: deps.embeddings,
    logger: app.log.child({ module: 'engine' }),
    clock: deps.clock,
    defaultWorkingTtlHours: config.defaultWorkingTtlHours,
  });
  const lifecycle = new LifecycleManager({
    store: deps.store,
    logger: app.log.child({ module: 'lifecycle' }),
    clock: deps.clock,
  });
  const sleepCycle = deps.decisions
    ? new SleepCycle({ lifecycle, decisions: deps.decisions, logger: app.log.child({ module: 'sleep-cycle' }) })
    : null;

  app.decorate('config', config);
  app.decorate('engine', engine);
  app.decorate('lifecycle', lifecycle);
  app.decorate('sleepCycle', sleepCycle);

  await registerCors(app, config);
  registerErrorHandler(app);

  app.get('/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    version,
  }));

  await app.register(memoryRoutes);
  await app.register(reviewRoutes);
  await app.register(consolidationRoutes);

  return app;
}
