import { describe, it, expect, beforeEach } from 'vitest';
import {
  InvalidTransitionError,
  NotFoundError,
  buildRecallPredicates,
  planTransition,
  type MemoryDraft,
} from '@stratamem/core';
import { initDatabase } from '../db/index.js';
import { SqlMemoryStore } from '../store/sqlMemoryStore.js';

const T0 = '2026-01-01T00:00:00.000Z';
const NOW = new Date('2026-01-01T02:00:00.000Z');
const ACTIVE_LAYERS = ['working' as const, 'short' as const, 'long' as const];

let store: SqlMemoryStore;
let agentId: string;

function draft(overrides: Partial<MemoryDraft> = {}): MemoryDraft {
  return {
    agentId,
    layer1: 'Postgres primary',
    layer2: 'Postgres primary',
    layer3: 'Postgres primary',
    layer1Embedding: [1, 0, 0],
    layer2Embedding: [1, 0, 0],
    tags: [],
    importanceScore: 0.5,
    memoryType: 'facts',
    temporalLayer: 'long',
    domain: 'general',
    sourceType: null,
    expiresAt: null,
    createdAt: T0,
    ...overrides,
  };
}

beforeEach(async () => {
  const db = await initDatabase(':memory:');
  store = new SqlMemoryStore(db);
  agentId = (await store.upsertAgent('atlas')).id;
});

describe('SqlMemoryStore', () => {
  describe('agents', () => {
    it('upserts by name', async () => {
      const again = await store.upsertAgent('atlas');
      expect(again.id).toBe(agentId);
      expect(again.metadata).toEqual({});
    });

    it('returns undefined for an unknown agent', async () => {
      expect(await store.findAgent('nobody')).toBeUndefined();
    });
  });

  describe('memories', () => {
    it('round-trips a record with its JSON columns', async () => {
      const created = await store.insertMemory(draft({ tags: ['ops', 'db'], sourceType: 'cli' }));

      const loaded = await store.getMemory(created.id);

      expect(loaded).toEqual({
        ...draft({ tags: ['ops', 'db'], sourceType: 'cli' }),
        id: created.id,
        status: 'active',
        updatedAt: T0,
        lastAccessed: null,
        accessCount: 0,
      });
    });

    it('returns undefined for an unknown id', async () => {
      expect(await store.getMemory('missing')).toBeUndefined();
    });
  });

  describe('nearest', () => {
    it('applies the tag predicate through json_each', async () => {
      const ops = await store.insertMemory(draft({ tags: ['ops'] }));
      await store.insertMemory(draft({ tags: ['hobby'] }));

      const predicates = buildRecallPredicates({ agentId, now: NOW, temporalLayers: ACTIVE_LAYERS, tags: ['ops', 'infra'] });
      const results = await store.nearest([1, 0, 0], predicates);

      expect(results.map(r => r.memory.id)).toEqual([ops.id]);
      expect(results[0].similarity).toBeCloseTo(1);
    });

    it('orders by similarity and leaves out archived, lapsed and deleted memories', async () => {
      const close = await store.insertMemory(draft());
      const far = await store.insertMemory(draft({ layer1Embedding: [0, 1, 0] }));
      await store.insertMemory(draft({ temporalLayer: 'archive' }));
      await store.insertMemory(draft({ temporalLayer: 'working', expiresAt: '2026-01-01T01:00:00.000Z' }));
      const deleted = await store.insertMemory(draft());
      const plan = planTransition(deleted, { decision: 'delete', reviewedBy: 'agent' }, NOW);
      await store.applyTransition(deleted.id, plan.patch, plan.entry);

      const predicates = buildRecallPredicates({ agentId, now: NOW, temporalLayers: ACTIVE_LAYERS });
      const results = await store.nearest([1, 0, 0], predicates);

      expect(results.map(r => r.memory.id)).toEqual([close.id, far.id]);
      expect(results[1].similarity).toBeCloseTo(0);
    });

    it('scopes to the agent', async () => {
      const other = await store.upsertAgent('other');
      await store.insertMemory(draft({ agentId: other.id }));

      const predicates = buildRecallPredicates({ agentId, now: NOW, temporalLayers: ACTIVE_LAYERS });
      expect(await store.nearest([1, 0, 0], predicates)).toEqual([]);
    });
  });

  describe('recordAccess', () => {
    it('logs the access and bumps the counters', async () => {
      const memory = await store.insertMemory(draft());

      await store.recordAccess([
        { memoryId: memory.id, agentId, layerAccessed: 2, queryText: 'postgres', relevanceScore: 1, accessedAt: NOW.toISOString() },
      ]);

      expect(await store.getMemory(memory.id)).toMatchObject({ accessCount: 1, lastAccessed: NOW.toISOString() });
      expect(await store.listAccessLog(memory.id)).toEqual([
        { memoryId: memory.id, agentId, layerAccessed: 2, queryText: 'postgres', relevanceScore: 1, accessedAt: NOW.toISOString() },
      ]);
    });
  });

  describe('review queue', () => {
    it('sweeps lapsed working memories and lists them oldest first', async () => {
      const lapsedLater = await store.insertMemory(
        draft({ temporalLayer: 'working', expiresAt: '2026-01-01T01:30:00.000Z', createdAt: '2026-01-01T00:30:00.000Z' }),
      );
      const lapsedFirst = await store.insertMemory(
        draft({ temporalLayer: 'working', expiresAt: '2026-01-01T01:00:00.000Z' }),
      );
      await store.insertMemory(draft({ temporalLayer: 'working', expiresAt: '2026-01-01T05:00:00.000Z' }));

      expect(await store.sweepExpired(NOW)).toBe(2);
      expect(await store.sweepExpired(NOW)).toBe(0);
      expect(await store.countPending()).toBe(2);

      const pending = await store.listPending(10, agentId);
      expect(pending.map(m => m.id)).toEqual([lapsedFirst.id, lapsedLater.id]);
      expect(pending[0].status).toBe('expired');
    });

    it('sweeps only the given agent', async () => {
      const other = await store.upsertAgent('other');
      await store.insertMemory(draft({ agentId: other.id, temporalLayer: 'working', expiresAt: T0 }));
      await store.insertMemory(draft({ temporalLayer: 'working', expiresAt: T0 }));

      expect(await store.sweepExpired(NOW, agentId)).toBe(1);
      expect(await store.countPending(agentId)).toBe(1);
      expect(await store.countPending(other.id)).toBe(0);
    });
  });

  describe('applyTransition', () => {
    it('updates the memory and appends one review entry', async () => {
      const memory = await store.insertMemory(draft({ temporalLayer: 'working', expiresAt: T0 }));
      await store.sweepExpired(NOW);
      const expired = await store.getMemory(memory.id);
      if (!expired) throw new Error('memory missing');

      const plan = planTransition(expired, { decision: 'promote', reason: 'keep', reviewedBy: 'agent' }, NOW);
      const updated = await store.applyTransition(memory.id, plan.patch, plan.entry);

      expect(updated).toMatchObject({
        temporalLayer: 'long',
        status: 'active',
        expiresAt: null,
        importanceScore: 0.7,
        updatedAt: NOW.toISOString(),
      });
      expect(await store.listReviewLog(memory.id)).toEqual([plan.entry]);
    });

    it('writes nothing when the status no longer matches', async () => {
      const memory = await store.insertMemory(draft());
      const first = planTransition(memory, { decision: 'archive', reviewedBy: 'agent' }, NOW);
      const stale = planTransition(memory, { decision: 'delete', reviewedBy: 'sleep-cycle' }, NOW);
      await store.applyTransition(memory.id, first.patch, first.entry);

      await expect(store.applyTransition(memory.id, stale.patch, stale.entry)).rejects.toBeInstanceOf(
        InvalidTransitionError,
      );
      expect((await store.getMemory(memory.id))?.status).toBe('archived');
      expect(await store.listReviewLog(memory.id)).toHaveLength(1);
    });

    it('throws for an unknown memory', async () => {
      const memory = await store.insertMemory(draft());
      const plan = planTransition(memory, { decision: 'archive', reviewedBy: 'agent' }, NOW);
      await expect(store.applyTransition('missing', plan.patch, plan.entry)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('stats', () => {
    it('aggregates per tier and status', async () => {
      await store.insertMemory(draft({ importanceScore: 0.2, temporalLayer: 'working' }));
      await store.insertMemory(draft({ importanceScore: 0.6 }));
      await store.insertMemory(draft({ importanceScore: 1 }));

      const stats = await store.stats(agentId);

      expect(stats.totalMemories).toBe(3);
      expect(stats.averageImportance).toBeCloseTo(0.6);
      expect(stats.totalAccesses).toBe(0);
      expect(stats.byTemporalLayer).toEqual({ working: 1, short: 0, long: 2, archive: 0 });
      expect(stats.byStatus).toEqual({ active: 3, expired: 0, pending_review: 0, archived: 0, deleted: 0 });
    });
  });
});
