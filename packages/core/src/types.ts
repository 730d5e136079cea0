/**
 * Core types for the temporal memory lifecycle engine.
 *
 * Every entity the store owns has an explicit record type here; services never
 * pass loosely-typed dictionaries between layers.
 */

// ============================================================================
// ENUMERATIONS
// ============================================================================

export const TEMPORAL_LAYERS = ['working', 'short', 'long', 'archive'] as const;
export type TemporalLayer = typeof TEMPORAL_LAYERS[number];

export const MEMORY_STATUSES = ['active', 'expired', 'pending_review', 'archived', 'deleted'] as const;
export type MemoryStatus = typeof MEMORY_STATUSES[number];

export const MEMORY_TYPES = ['facts', 'experiences', 'skills', 'preferences', 'decisions', 'context'] as const;
export type MemoryType = typeof MEMORY_TYPES[number];

export const MEMORY_DOMAINS = ['self', 'user', 'projects', 'world', 'system', 'general'] as const;
export type MemoryDomain = typeof MEMORY_DOMAINS[number];

export const REVIEW_DECISIONS = ['promote', 'extend', 'archive', 'delete'] as const;
export type ReviewDecision = typeof REVIEW_DECISIONS[number];

/** Detail level requested by a reader: 1 = headline, 2 = context, 3 = full text. */
export type ContentLayer = 1 | 2 | 3;

// ============================================================================
// ENTITIES
// ============================================================================

export interface Agent {
  id: string;
  name: string;
  metadata: Record<string, unknown>;
  createdAt: string;
}

export interface MemoryLayers {
  layer1: string;
  layer2: string;
  layer3: string;
}

export interface MemoryRecord extends MemoryLayers {
  id: string;
  agentId: string;
  layer1Embedding: number[];
  layer2Embedding: number[];
  tags: string[];
  importanceScore: number;
  memoryType: MemoryType;
  temporalLayer: TemporalLayer;
  status: MemoryStatus;
  domain: MemoryDomain;
  sourceType: string | null;
  /** Only set while the memory can still lapse. */
  expiresAt: string | null;
  createdAt: string;
  updatedAt: string;
  lastAccessed: string | null;
  accessCount: number;
}

/** Fields supplied when a memory is first written; usage counters start at zero. */
export type MemoryDraft = Omit<MemoryRecord, 'id' | 'status' | 'updatedAt' | 'lastAccessed' | 'accessCount'>;

export interface AccessLogEntry {
  memoryId: string;
  agentId: string;
  layerAccessed: ContentLayer;
  queryText: string;
  relevanceScore: number;
  accessedAt: string;
}

export type ReviewActor = 'agent' | 'sleep-cycle';

export interface ReviewLogEntry {
  memoryId: string;
  decision: ReviewDecision;
  oldLayer: TemporalLayer;
  newLayer: TemporalLayer;
  reason: string;
  reviewedBy: ReviewActor;
  reviewedAt: string;
}

// ============================================================================
// OPERATION INPUTS / OUTPUTS
// ============================================================================

export interface RememberInput {
  content: string;
  agentName: string;
  tags?: string[];
  sourceType?: string;
  importanceScore?: number;
  memoryType?: MemoryType;
  temporalLayer?: TemporalLayer;
  /** Honored only for the working tier. */
  ttlHours?: number;
  domain?: MemoryDomain;
}

export interface RecallInput {
  query: string;
  agentName: string;
  tags?: string[];
  memoryType?: MemoryType;
  domain?: MemoryDomain;
  temporalLayers?: TemporalLayer[];
  maxLayer?: ContentLayer;
  limit?: number;
  minScore?: number;
  includeArchive?: boolean;
}

export interface RecallResult {
  id: string;
  content: string;
  tags: string[];
  importanceScore: number;
  accessCount: number;
  similarity: number;
  createdAt: string;
  memoryType: MemoryType;
  temporalLayer: TemporalLayer;
  expiresAt?: string;
  domain: MemoryDomain;
}

export interface ExpandedMemory {
  id: string;
  layer: ContentLayer;
  content: string;
  tags: string[];
  importanceScore: number;
  accessCount: number;
  memoryType: MemoryType;
  temporalLayer: TemporalLayer;
  status: MemoryStatus;
  domain: MemoryDomain;
  expiresAt: string | null;
  createdAt: string;
  lastAccessed: string | null;
}

export interface MemoryStats {
  totalMemories: number;
  averageImportance: number;
  totalAccesses: number;
  byTemporalLayer: Record<TemporalLayer, number>;
  byStatus: Record<MemoryStatus, number>;
}

export interface DecideInput {
  memoryId: string;
  decision: string;
  newLayer?: TemporalLayer;
  reason?: string;
  ttlHours?: number;
}

export interface TransitionSummary {
  memoryId: string;
  decision: ReviewDecision;
  oldLayer: TemporalLayer;
  newLayer: TemporalLayer;
  oldStatus: MemoryStatus;
  newStatus: MemoryStatus;
  expiresAt: string | null;
  importanceScore: number;
  reason: string;
}

export interface PendingMemory {
  id: string;
  content: string;
  domain: MemoryDomain;
  tags: string[];
  temporalLayer: TemporalLayer;
  status: MemoryStatus;
  importanceScore: number;
  accessCount: number;
  createdAt: string;
  expiresAt: string | null;
  ageHours: number;
  /** Null when the memory was never returned by a recall. */
  hoursSinceAccess: number | null;
}

export interface PendingReview {
  pendingCount: number;
  memories: PendingMemory[];
}
