import { z } from 'zod';
import { MEMORY_DOMAINS, MEMORY_TYPES, TEMPORAL_LAYERS } from './types';
import { DEFAULT_WORKING_TTL_HOURS, MAX_TTL_HOURS } from './memory/temporal';

export const temporalLayerSchema = z.enum(TEMPORAL_LAYERS);
export const memoryTypeSchema = z.enum(MEMORY_TYPES);
export const memoryDomainSchema = z.enum(MEMORY_DOMAINS);
export const contentLayerSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

export const DEFAULT_AGENT_NAME = 'default';

export const rememberInputSchema = z.object({
  content: z.string().refine(value => value.trim().length > 0, 'content must not be empty'),
  agentName: z.string().min(1).default(DEFAULT_AGENT_NAME),
  tags: z.array(z.string()).default([]),
  sourceType: z.string().optional(),
  importanceScore: z.number().min(0).max(1).default(0.5),
  memoryType: memoryTypeSchema.optional(),
  temporalLayer: temporalLayerSchema.default('working'),
  ttlHours: z.number().positive().max(MAX_TTL_HOURS).optional(),
  domain: memoryDomainSchema.default('general'),
});

export const recallInputSchema = z.object({
  query: z.string().refine(value => value.trim().length > 0, 'query must not be empty'),
  agentName: z.string().min(1).default(DEFAULT_AGENT_NAME),
  tags: z.array(z.string()).optional(),
  memoryType: memoryTypeSchema.optional(),
  domain: memoryDomainSchema.optional(),
  temporalLayers: z.array(temporalLayerSchema).optional(),
  maxLayer: contentLayerSchema.default(2),
  limit: z.number().int().min(1).max(100).default(10),
  minScore: z.number().default(0.5),
  includeArchive: z.boolean().default(false),
});

/** `decision` stays a free string here; unknown values are rejected by the lifecycle manager. */
export const decideInputSchema = z.object({
  memoryId: z.string().min(1),
  decision: z.string(),
  newLayer: temporalLayerSchema.optional(),
  reason: z.string().optional(),
  ttlHours: z.number().positive().max(MAX_TTL_HOURS).optional(),
});

export const pendingQuerySchema = z.object({
  agentName: z.string().min(1).optional(),
  limit: z.number().int().min(1).max(1000).default(50),
});

export const bufferedMemorySchema = z.object({
  content: z.string(),
  domain: memoryDomainSchema,
  temporalLayer: temporalLayerSchema,
  ttlHours: z.number().positive().max(MAX_TTL_HOURS).default(DEFAULT_WORKING_TTL_HOURS),
  tags: z.array(z.string()),
  metadata: z.record(z.unknown()),
  timestamp: z.string(),
  queued: z.literal(true),
});

export type ParsedRememberInput = z.infer<typeof rememberInputSchema>;
export type ParsedRecallInput = z.infer<typeof recallInputSchema>;
export type ParsedDecideInput = z.infer<typeof decideInputSchema>;
export type PendingQuery = z.input<typeof pendingQuerySchema>;
export type BufferedMemory = z.infer<typeof bufferedMemorySchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
