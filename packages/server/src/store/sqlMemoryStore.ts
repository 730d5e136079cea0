import { randomUUID } from 'crypto';
import { and, asc, count, eq, inArray, isNotNull, lte, sql, type SQL } from 'drizzle-orm';
import {
  InvalidTransitionError,
  NotFoundError,
  PENDING_STATUSES,
  TransientIOError,
  emptyLayerCounts,
  emptyStatusCounts,
  isMemoryError,
  rankBySimilarity,
  type AccessLogEntry,
  type Agent,
  type MemoryDraft,
  type MemoryPredicate,
  type MemoryRecord,
  type MemoryStats,
  type MemoryStore,
  type ReviewLogEntry,
  type ScoredMemory,
  type TransitionPatch,
  type Vector,
} from '@stratamem/core';
import type { Database } from '../db/index.js';
import { agents, memories, memoryAccessLog, reviewLog } from '../db/schema.js';
import { compilePredicates } from './predicateCompiler.js';

/**
 * MemoryStore over libsql via drizzle.
 *
 * Multi-statement writes go through `db.batch`, which runs them in one implicit
 * transaction on the same connection. Driver failures surface as TransientIOError.
 */
export class SqlMemoryStore implements MemoryStore {
  constructor(private readonly db: Database) {}

  upsertAgent(name: string, metadata: Record<string, unknown> = {}): Promise<Agent> {
    return this.guard('upsertAgent', async () => {
      await this.db
        .insert(agents)
        .values({ id: randomUUID(), name, metadata, createdAt: new Date().toISOString() })
        .onConflictDoNothing({ target: agents.name });

      const [agent] = await this.db.select().from(agents).where(eq(agents.name, name)).limit(1);
      if (!agent) {
        throw new NotFoundError('agent', name);
      }
      return agent;
    });
  }

  findAgent(name: string): Promise<Agent | undefined> {
    return this.guard('findAgent', async () => {
      const [agent] = await this.db.select().from(agents).where(eq(agents.name, name)).limit(1);
      return agent;
    });
  }

  insertMemory(draft: MemoryDraft): Promise<MemoryRecord> {
    return this.guard('insertMemory', async () => {
      const [record] = await this.db
        .insert(memories)
        .values({
          ...draft,
          id: randomUUID(),
          status: 'active',
          updatedAt: draft.createdAt,
          lastAccessed: null,
          accessCount: 0,
        })
        .returning();
      return record;
    });
  }

  getMemory(id: string): Promise<MemoryRecord | undefined> {
    return this.guard('getMemory', async () => {
      const [record] = await this.db.select().from(memories).where(eq(memories.id, id)).limit(1);
      return record;
    });
  }

  /**
   * Predicates narrow the candidate set in SQL; similarity against
   * `layer1Embedding` is scored in process.
   */
  nearest(vector: Vector, predicates: MemoryPredicate[]): Promise<ScoredMemory[]> {
    return this.guard('nearest', async () => {
      const candidates = await this.db.select().from(memories).where(compilePredicates(predicates));
      return rankBySimilarity(vector, candidates, record => record.layer1Embedding).map(({ item, score }) => ({
        memory: item,
        similarity: score,
      }));
    });
  }

  recordAccess(entries: AccessLogEntry[]): Promise<void> {
    if (entries.length === 0) return Promise.resolve();

    return this.guard('recordAccess', async () => {
      const accessedAt = entries[0].accessedAt;
      await this.db.batch([
        this.db.insert(memoryAccessLog).values(entries),
        this.db
          .update(memories)
          .set({ accessCount: sql`${memories.accessCount} + 1`, lastAccessed: accessedAt })
          .where(inArray(memories.id, entries.map(entry => entry.memoryId))),
      ]);
    });
  }

  sweepExpired(now: Date, agentId?: string): Promise<number> {
    return this.guard('sweepExpired', async () => {
      const cutoff = now.toISOString();
      const result = await this.db
        .update(memories)
        .set({ status: 'expired', updatedAt: cutoff })
        .where(
          and(
            eq(memories.status, 'active'),
            isNotNull(memories.expiresAt),
            lte(memories.expiresAt, cutoff),
            agentId === undefined ? undefined : eq(memories.agentId, agentId),
          ),
        );
      return result.rowsAffected;
    });
  }

  listPending(limit: number, agentId?: string): Promise<MemoryRecord[]> {
    return this.guard('listPending', async () => {
      const rows = await this.db
        .select()
        .from(memories)
        .where(pendingFilter(agentId))
        .orderBy(asc(memories.createdAt))
        .limit(limit);
      return rows;
    });
  }

  countPending(agentId?: string): Promise<number> {
    return this.guard('countPending', async () => {
      const [row] = await this.db.select({ total: count() }).from(memories).where(pendingFilter(agentId));
      return row?.total ?? 0;
    });
  }

  /**
   * The review entry is inserted only if the memory still has the expected
   * status, and the update carries the same condition, so either both land or
   * neither does.
   */
  applyTransition(memoryId: string, patch: TransitionPatch, entry: ReviewLogEntry): Promise<MemoryRecord> {
    return this.guard('applyTransition', async () => {
      const [, update] = await this.db.batch([
        this.db.run(sql`
          INSERT INTO review_log (memory_id, decision, old_layer, new_layer, reason, reviewed_by, reviewed_at)
          SELECT ${entry.memoryId}, ${entry.decision}, ${entry.oldLayer}, ${entry.newLayer},
                 ${entry.reason}, ${entry.reviewedBy}, ${entry.reviewedAt}
          FROM memories
          WHERE id = ${memoryId} AND status = ${patch.expectedStatus}
        `),
        this.db
          .update(memories)
          .set({
            temporalLayer: patch.temporalLayer,
            status: patch.status,
            expiresAt: patch.expiresAt,
            importanceScore: patch.importanceScore,
            updatedAt: patch.updatedAt,
          })
          .where(and(eq(memories.id, memoryId), eq(memories.status, patch.expectedStatus))),
      ]);

      const current = await this.getMemory(memoryId);
      if (!current) {
        throw new NotFoundError('memory', memoryId);
      }
      if (update.rowsAffected === 0) {
        throw new InvalidTransitionError(
          `Memory ${memoryId} changed concurrently: expected status ${patch.expectedStatus}, found ${current.status}`,
        );
      }
      return current;
    });
  }

  listReviewLog(memoryId: string): Promise<ReviewLogEntry[]> {
    return this.guard('listReviewLog', async () => {
      const rows = await this.db
        .select()
        .from(reviewLog)
        .where(eq(reviewLog.memoryId, memoryId))
        .orderBy(asc(reviewLog.id));
      return rows.map(({ id: _id, ...entry }) => entry);
    });
  }

  listAccessLog(memoryId: string): Promise<AccessLogEntry[]> {
    return this.guard('listAccessLog', async () => {
      const rows = await this.db
        .select()
        .from(memoryAccessLog)
        .where(eq(memoryAccessLog.memoryId, memoryId))
        .orderBy(asc(memoryAccessLog.id));
      return rows.map(({ id: _id, ...entry }) => entry);
    });
  }

  stats(agentId: string): Promise<MemoryStats> {
    return this.guard('stats', async () => {
      const groups = await this.db
        .select({
          temporalLayer: memories.temporalLayer,
          status: memories.status,
          total: count(),
          importance: sql<number>`COALESCE(SUM(${memories.importanceScore}), 0)`,
          accesses: sql<number>`COALESCE(SUM(${memories.accessCount}), 0)`,
        })
        .from(memories)
        .where(eq(memories.agentId, agentId))
        .groupBy(memories.temporalLayer, memories.status);

      const byTemporalLayer = emptyLayerCounts();
      const byStatus = emptyStatusCounts();
      let totalMemories = 0;
      let totalImportance = 0;
      let totalAccesses = 0;
      for (const group of groups) {
        byTemporalLayer[group.temporalLayer] += group.total;
        byStatus[group.status] += group.total;
        totalMemories += group.total;
        totalImportance += Number(group.importance);
        totalAccesses += Number(group.accesses);
      }

      return {
        totalMemories,
        averageImportance: totalMemories === 0 ? 0 : totalImportance / totalMemories,
        totalAccesses,
        byTemporalLayer,
        byStatus,
      };
    });
  }

  private async guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      if (isMemoryError(err)) throw err;
      throw new TransientIOError(`Memory store ${operation} failed`, err);
    }
  }
}

function pendingFilter(agentId: string | undefined): SQL | undefined {
  return and(
    inArray(memories.status, [...PENDING_STATUSES]),
    agentId === undefined ? undefined : eq(memories.agentId, agentId),
  );
}
