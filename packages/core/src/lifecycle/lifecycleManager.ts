/**
 * LifecycleManager: review queue and decision application.
 *
 * The pending-review query is where expiry happens: `active` memories whose TTL
 * has passed are flipped to `expired` by the store as part of that query. There
 * is no background timer.
 */

import { NotFoundError, ValidationError } from '../errors';
import { createConsoleLogger, type Logger } from '../logger';
import { hoursBetween } from '../memory/temporal';
import { decideInputSchema, formatIssues, pendingQuerySchema, type PendingQuery } from '../schemas';
import type { MemoryStore } from '../store/memoryStore';
import type {
  DecideInput,
  MemoryRecord,
  PendingMemory,
  PendingReview,
  ReviewActor,
  TransitionSummary,
} from '../types';
import { parseReviewDecision, planTransition, summarizeTransition } from './transitions';

export interface LifecycleManagerOptions {
  store: MemoryStore;
  logger?: Logger;
  clock?: () => Date;
}

export class LifecycleManager {
  private readonly store: MemoryStore;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: LifecycleManagerOptions) {
    this.store = options.store;
    this.logger = options.logger ?? createConsoleLogger('Lifecycle');
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Apply one review decision. Appends exactly one review log entry.
   * Unknown decisions are rejected before the memory is even read.
   */
  async decide(input: DecideInput, reviewedBy: ReviewActor = 'agent'): Promise<TransitionSummary> {
    const parsed = decideInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(`Invalid decision: ${formatIssues(parsed.error)}`);
    }
    const decision = parseReviewDecision(parsed.data.decision);

    const memory = await this.store.getMemory(parsed.data.memoryId);
    if (!memory) {
      throw new NotFoundError('memory', parsed.data.memoryId);
    }

    const { patch, entry } = planTransition(
      memory,
      {
        decision,
        newLayer: parsed.data.newLayer,
        reason: parsed.data.reason,
        ttlHours: parsed.data.ttlHours,
        reviewedBy,
      },
      this.clock(),
    );
    const updated = await this.store.applyTransition(memory.id, patch, entry);

    this.logger.info(
      { memoryId: memory.id, decision, from: entry.oldLayer, to: entry.newLayer, reviewedBy },
      'memory transitioned',
    );
    return summarizeTransition(memory, updated, entry);
  }

  /**
   * Sweep lapsed memories, then list what awaits review, oldest first.
   * Without an agent name the whole backlog is reviewed.
   */
  async listPending(query: PendingQuery = {}): Promise<PendingReview> {
    const parsed = pendingQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new ValidationError(`Invalid pending query: ${formatIssues(parsed.error)}`);
    }
    const { agentName, limit } = parsed.data;

    let agentId: string | undefined;
    if (agentName !== undefined) {
      const agent = await this.store.findAgent(agentName);
      if (!agent) {
        return { pendingCount: 0, memories: [] };
      }
      agentId = agent.id;
    }

    const now = this.clock();
    const swept = await this.store.sweepExpired(now, agentId);
    if (swept > 0) {
      this.logger.debug({ swept, agentName }, 'expired memories moved to review');
    }

    const [pendingCount, memories] = await Promise.all([
      this.store.countPending(agentId),
      this.store.listPending(limit, agentId),
    ]);

    return {
      pendingCount,
      memories: memories.map(memory => toPendingMemory(memory, now)),
    };
  }
}

function toPendingMemory(memory: MemoryRecord, now: Date): PendingMemory {
  return {
    id: memory.id,
    content: memory.layer3,
    domain: memory.domain,
    tags: memory.tags,
    temporalLayer: memory.temporalLayer,
    status: memory.status,
    importanceScore: memory.importanceScore,
    accessCount: memory.accessCount,
    createdAt: memory.createdAt,
    expiresAt: memory.expiresAt,
    ageHours: hoursBetween(memory.createdAt, now),
    hoursSinceAccess: memory.lastAccessed === null ? null : hoursBetween(memory.lastAccessed, now),
  };
}
