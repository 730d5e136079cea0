import { sqliteTable, text, integer, real } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';
import {
  MEMORY_DOMAINS,
  MEMORY_STATUSES,
  MEMORY_TYPES,
  REVIEW_DECISIONS,
  TEMPORAL_LAYERS,
  type ContentLayer,
  type ReviewActor,
} from '@stratamem/core';

export const agents = sqliteTable('agents', {
  id: text('id').primaryKey(),
  name: text('name').notNull().unique(),
  metadata: text('metadata', { mode: 'json' }).$type<Record<string, unknown>>().notNull().default(sql`'{}'`),
  createdAt: text('created_at').notNull(),
});

export const memories = sqliteTable('memories', {
  id: text('id').primaryKey(),
  agentId: text('agent_id').notNull().references(() => agents.id, { onDelete: 'cascade' }),
  layer1: text('layer_1').notNull(),
  layer2: text('layer_2').notNull(),
  layer3: text('layer_3').notNull(),
  layer1Embedding: text('layer_1_embedding', { mode: 'json' }).$type<number[]>().notNull(),
  layer2Embedding: text('layer_2_embedding', { mode: 'json' }).$type<number[]>().notNull(),
  tags: text('tags', { mode: 'json' }).$type<string[]>().notNull().default(sql`'[]'`),
  importanceScore: real('importance_score').notNull().default(0.5),
  memoryType: text('memory_type', { enum: MEMORY_TYPES }).notNull(),
  temporalLayer: text('temporal_layer', { enum: TEMPORAL_LAYERS }).notNull().default('working'),
  status: text('status', { enum: MEMORY_STATUSES }).notNull().default('active'),
  domain: text('domain', { enum: MEMORY_DOMAINS }).notNull().default('general'),
  sourceType: text('source_type'),
  expiresAt: text('expires_at'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
  lastAccessed: text('last_accessed'),
  accessCount: integer('access_count').notNull().default(0),
});

export const memoryAccessLog = sqliteTable('memory_access_log', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  memoryId: text('memory_id').notNull().references(() => memories.id, { onDelete: 'cascade' }),
  agentId: text('agent_id').notNull().references(() => agents.id, { onDelete: 'cascade' }),
  layerAccessed: integer('layer_accessed').$type<ContentLayer>().notNull(),
  queryText: text('query_text').notNull(),
  relevanceScore: real('relevance_score').notNull(),
  accessedAt: text('accessed_at').notNull(),
});

export const reviewLog = sqliteTable('review_log', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  memoryId: text('memory_id').notNull().references(() => memories.id, { onDelete: 'cascade' }),
  decision: text('decision', { enum: REVIEW_DECISIONS }).notNull(),
  oldLayer: text('old_layer', { enum: TEMPORAL_LAYERS }).notNull(),
  newLayer: text('new_layer', { enum: TEMPORAL_LAYERS }).notNull(),
  reason: text('reason').notNull().default(''),
  reviewedBy: text('reviewed_by').$type<ReviewActor>().notNull(),
  reviewedAt: text('reviewed_at').notNull(),
});

export type AgentRow = typeof agents.$inferSelect;
export type MemoryRow = typeof memories.$inferSelect;
export type NewMemoryRow = typeof memories.$inferInsert;
export type AccessLogRow = typeof memoryAccessLog.$inferSelect;
export type ReviewLogRow = typeof reviewLog.$inferSelect;
