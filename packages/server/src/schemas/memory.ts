import { z } from 'zod';
import { contentLayerSchema, DEFAULT_AGENT_NAME } from '@stratamem/core';

export const memoryParamsSchema = z.object({
  id: z.string().min(1),
});

export const expandQuerySchema = z.object({
  layer: z.coerce.number().pipe(contentLayerSchema).default(3),
});

export const statsQuerySchema = z.object({
  agentName: z.string().min(1).default(DEFAULT_AGENT_NAME),
});

export const pendingQueryStringSchema = z.object({
  agentName: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(50),
});

export const sleepBodySchema = z.object({
  agentName: z.string().min(1).optional(),
  limit: z.number().int().min(1).max(1000).optional(),
  batchSize: z.number().int().min(1).max(100).optional(),
  dryRun: z.boolean().default(false),
}).default({});
