import { randomUUID } from 'crypto';
import { InvalidTransitionError, NotFoundError } from '../errors';
import { rankBySimilarity, type Vector } from '../memory/embeddingService';
import type {
  AccessLogEntry,
  Agent,
  MemoryDraft,
  MemoryRecord,
  MemoryStats,
  ReviewLogEntry,
} from '../types';
import { PENDING_STATUSES, type MemoryStore, type ScoredMemory, type TransitionPatch } from './memoryStore';
import { matchesAll, type MemoryPredicate } from './predicates';
import { emptyLayerCounts, emptyStatusCounts } from './stats';

export interface InMemoryStoreSnapshot {
  agents: Agent[];
  memories: MemoryRecord[];
  accessLog: AccessLogEntry[];
  reviewLog: ReviewLogEntry[];
}

/**
 * Process-local MemoryStore. Every read and write clones, so callers never share
 * a mutable record with the store.
 */
export class InMemoryMemoryStore implements MemoryStore {
  private readonly agents = new Map<string, Agent>();
  private readonly memories = new Map<string, MemoryRecord>();
  private readonly accessLog: AccessLogEntry[] = [];
  private readonly reviewLog: ReviewLogEntry[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async upsertAgent(name: string, metadata: Record<string, unknown> = {}): Promise<Agent> {
    const existing = this.agents.get(name);
    if (existing) {
      return clone(existing);
    }
    const agent: Agent = {
      id: randomUUID(),
      name,
      metadata: clone(metadata),
      createdAt: this.clock().toISOString(),
    };
    this.agents.set(name, agent);
    return clone(agent);
  }

  async findAgent(name: string): Promise<Agent | undefined> {
    const agent = this.agents.get(name);
    return agent ? clone(agent) : undefined;
  }

  async insertMemory(draft: MemoryDraft): Promise<MemoryRecord> {
    const record: MemoryRecord = {
      ...clone(draft),
      id: randomUUID(),
      status: 'active',
      updatedAt: draft.createdAt,
      lastAccessed: null,
      accessCount: 0,
    };
    this.memories.set(record.id, record);
    return clone(record);
  }

  async getMemory(id: string): Promise<MemoryRecord | undefined> {
    const record = this.memories.get(id);
    return record ? clone(record) : undefined;
  }

  async nearest(vector: Vector, predicates: MemoryPredicate[]): Promise<ScoredMemory[]> {
    const candidates = [...this.memories.values()].filter(record => matchesAll(record, predicates));
    return rankBySimilarity(vector, candidates, record => record.layer1Embedding).map(({ item, score }) => ({
      memory: clone(item),
      similarity: score,
    }));
  }

  async recordAccess(entries: AccessLogEntry[]): Promise<void> {
    for (const entry of entries) {
      this.accessLog.push(clone(entry));
      const record = this.memories.get(entry.memoryId);
      if (record) {
        record.accessCount += 1;
        record.lastAccessed = entry.accessedAt;
      }
    }
  }

  async sweepExpired(now: Date, agentId?: string): Promise<number> {
    const cutoff = now.toISOString();
    let flipped = 0;
    for (const record of this.memories.values()) {
      if (agentId !== undefined && record.agentId !== agentId) continue;
      if (record.status === 'active' && record.expiresAt !== null && record.expiresAt <= cutoff) {
        record.status = 'expired';
        record.updatedAt = cutoff;
        flipped++;
      }
    }
    return flipped;
  }

  async listPending(limit: number, agentId?: string): Promise<MemoryRecord[]> {
    return this.pending(agentId)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .slice(0, limit)
      .map(clone);
  }

  async countPending(agentId?: string): Promise<number> {
    return this.pending(agentId).length;
  }

  async applyTransition(memoryId: string, patch: TransitionPatch, entry: ReviewLogEntry): Promise<MemoryRecord> {
    const record = this.memories.get(memoryId);
    if (!record) {
      throw new NotFoundError('memory', memoryId);
    }
    if (record.status !== patch.expectedStatus) {
      throw new InvalidTransitionError(
        `Memory ${memoryId} changed concurrently: expected status ${patch.expectedStatus}, found ${record.status}`,
      );
    }

    record.temporalLayer = patch.temporalLayer;
    record.status = patch.status;
    record.expiresAt = patch.expiresAt;
    record.importanceScore = patch.importanceScore;
    record.updatedAt = patch.updatedAt;
    this.reviewLog.push(clone(entry));

    return clone(record);
  }

  async listReviewLog(memoryId: string): Promise<ReviewLogEntry[]> {
    return this.reviewLog.filter(entry => entry.memoryId === memoryId).map(clone);
  }

  async listAccessLog(memoryId: string): Promise<AccessLogEntry[]> {
    return this.accessLog.filter(entry => entry.memoryId === memoryId).map(clone);
  }

  async stats(agentId: string): Promise<MemoryStats> {
    const owned = [...this.memories.values()].filter(record => record.agentId === agentId);
    const byTemporalLayer = emptyLayerCounts();
    const byStatus = emptyStatusCounts();
    for (const record of owned) {
      byTemporalLayer[record.temporalLayer] += 1;
      byStatus[record.status] += 1;
    }
    const totalImportance = owned.reduce((sum, record) => sum + record.importanceScore, 0);

    return {
      totalMemories: owned.length,
      averageImportance: owned.length === 0 ? 0 : totalImportance / owned.length,
      totalAccesses: owned.reduce((sum, record) => sum + record.accessCount, 0),
      byTemporalLayer,
      byStatus,
    };
  }

  snapshot(): InMemoryStoreSnapshot {
    return {
      agents: [...this.agents.values()].map(clone),
      memories: [...this.memories.values()].map(clone),
      accessLog: this.accessLog.map(clone),
      reviewLog: this.reviewLog.map(clone),
    };
  }

  private pending(agentId?: string): MemoryRecord[] {
    return [...this.memories.values()].filter(
      record =>
        PENDING_STATUSES.includes(record.status) && (agentId === undefined || record.agentId === agentId),
    );
  }
}

function clone<T>(value: T): T {
  return structuredClone(value);
}
