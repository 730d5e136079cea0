/**
 * MemoryStore port: the only owner of agents, memories, access events and review entries.
 *
 * Implementations must make `applyTransition` and `recordAccess` atomic; nothing
 * above the store keeps a private mutable copy across calls.
 */

import type { Vector } from '../memory/embeddingService';
import type {
  AccessLogEntry,
  Agent,
  MemoryDraft,
  MemoryRecord,
  MemoryStats,
  MemoryStatus,
  ReviewLogEntry,
  TemporalLayer,
} from '../types';
import type { MemoryPredicate } from './predicates';

export interface ScoredMemory {
  memory: MemoryRecord;
  /** 1 − cosine distance between the query and `layer1Embedding`. */
  similarity: number;
}

export interface TransitionPatch {
  /** Conditional update: the write is refused when the stored status differs. */
  expectedStatus: MemoryStatus;
  temporalLayer: TemporalLayer;
  status: MemoryStatus;
  expiresAt: string | null;
  importanceScore: number;
  updatedAt: string;
}

export interface MemoryStore {
  upsertAgent(name: string, metadata?: Record<string, unknown>): Promise<Agent>;
  findAgent(name: string): Promise<Agent | undefined>;

  insertMemory(draft: MemoryDraft): Promise<MemoryRecord>;
  getMemory(id: string): Promise<MemoryRecord | undefined>;

  /** Candidates matching every predicate, ordered by similarity descending. */
  nearest(vector: Vector, predicates: MemoryPredicate[]): Promise<ScoredMemory[]>;

  /** Appends the entries and bumps `accessCount` / `lastAccessed` of each memory. */
  recordAccess(entries: AccessLogEntry[]): Promise<void>;

  /** Flips `active` memories whose `expiresAt` has passed to `expired`. Returns how many flipped. */
  sweepExpired(now: Date, agentId?: string): Promise<number>;
  /** `expired` and `pending_review` memories, oldest first. */
  listPending(limit: number, agentId?: string): Promise<MemoryRecord[]>;
  countPending(agentId?: string): Promise<number>;

  /**
   * Applies the patch and appends the review entry as one atomic write.
   * Throws InvalidTransitionError when the status no longer matches `expectedStatus`
   * and NotFoundError when the memory does not exist.
   */
  applyTransition(memoryId: string, patch: TransitionPatch, entry: ReviewLogEntry): Promise<MemoryRecord>;

  listReviewLog(memoryId: string): Promise<ReviewLogEntry[]>;
  listAccessLog(memoryId: string): Promise<AccessLogEntry[]>;
  stats(agentId: string): Promise<MemoryStats>;
}

export const PENDING_STATUSES: readonly MemoryStatus[] = ['expired', 'pending_review'];
