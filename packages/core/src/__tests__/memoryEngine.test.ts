/**
 * MemoryEngine: write path, temporal-weighted recall, expansion and stats
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ExternalServiceError, NotFoundError, ValidationError } from '../errors';
import { LifecycleManager } from '../lifecycle/lifecycleManager';
import { silentLogger } from '../logger';
import { MemoryEngine } from '../memory/memoryEngine';
import { InMemoryMemoryStore } from '../store/inMemoryStore';
import { CONCEPTS, KeywordEmbeddingService, TestClock, createSpyLogger } from './fakes';

const AGENT = 'atlas';
const START = '2026-01-01T00:00:00.000Z';

let clock: TestClock;
let store: InMemoryMemoryStore;
let embeddings: KeywordEmbeddingService;
let engine: MemoryEngine;

beforeEach(() => {
  clock = new TestClock(START);
  store = new InMemoryMemoryStore(clock.now);
  embeddings = new KeywordEmbeddingService(CONCEPTS);
  engine = new MemoryEngine({ store, embeddings, logger: silentLogger, clock: clock.now });
});

describe('remember', () => {
  it('stores layers, classification and a working-tier expiry', async () => {
    const id = await engine.remember({ content: 'We decided to use Postgres as the primary database', agentName: AGENT });

    const stored = await store.getMemory(id);
    expect(stored).toMatchObject({
      layer1: 'We decided to use Postgres as the primary database',
      memoryType: 'decisions',
      temporalLayer: 'working',
      status: 'active',
      domain: 'general',
      importanceScore: 0.5,
      accessCount: 0,
      lastAccessed: null,
      expiresAt: '2026-01-01T02:00:00.000Z',
      createdAt: START,
    });
    expect(stored?.layer1Embedding).toEqual([1, 0, 0]);
  });

  it('embeds layer 1 and layer 2 in one batch', async () => {
    await engine.remember({ content: 'Release train leaves on Friday', agentName: AGENT });
    expect(embeddings.calls).toEqual(['Release train leaves on Friday', 'Release train leaves on Friday']);
  });

  it('honors ttlHours for the working tier', async () => {
    const id = await engine.remember({ content: 'Deploy window is open', agentName: AGENT, ttlHours: 5 });
    expect((await store.getMemory(id))?.expiresAt).toBe('2026-01-01T05:00:00.000Z');
  });

  it('rejects a ttl beyond a century or too short to lapse later', async () => {
    await expect(engine.remember({ content: 'Deploy window is open', agentName: AGENT, ttlHours: 1e12 })).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(engine.remember({ content: 'Deploy window is open', agentName: AGENT, ttlHours: 1e-9 })).rejects.toThrow(
      'too short',
    );
    expect(embeddings.calls).toEqual([]);
    expect(store.snapshot().memories).toHaveLength(0);
  });

  it('never sets an expiry outside the working tier', async () => {
    const id = await engine.remember({ content: 'Deploy window is open', agentName: AGENT, temporalLayer: 'long', ttlHours: 5 });
    expect((await store.getMemory(id))?.expiresAt).toBeNull();
  });

  it('keeps an explicit memory type', async () => {
    const id = await engine.remember({ content: 'I prefer dark themes', agentName: AGENT, memoryType: 'facts' });
    expect((await store.getMemory(id))?.memoryType).toBe('facts');
  });

  it('rejects blank content and out-of-range importance', async () => {
    await expect(engine.remember({ content: '   ', agentName: AGENT })).rejects.toBeInstanceOf(ValidationError);
    await expect(
      engine.remember({ content: 'fine', agentName: AGENT, importanceScore: 1.5 }),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(store.snapshot().memories).toHaveLength(0);
  });

  it('fails when the embedding service returns the wrong number of vectors', async () => {
    vi.spyOn(embeddings, 'embedBatch').mockResolvedValue([[1, 0, 0]]);
    await expect(engine.remember({ content: 'Postgres', agentName: AGENT })).rejects.toBeInstanceOf(ExternalServiceError);
    expect(store.snapshot().agents).toHaveLength(0);
  });
});

describe('recall', () => {
  it('finds the database decision by meaning', async () => {
    const id = await engine.remember({ content: 'We decided to use Postgres as the primary database', agentName: AGENT });
    await engine.remember({ content: 'Switched the dashboard theme to dark', agentName: AGENT });

    const results = await engine.recall({ query: 'what database did we choose', agentName: AGENT, minScore: 0.3 });

    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({ id, memoryType: 'decisions', temporalLayer: 'working' });
    expect(results[0].similarity).toBeCloseTo(1.5);
  });

  it('ranks working memories above long-term ones with the same base similarity', async () => {
    await engine.remember({ content: 'Postgres backup policy', agentName: AGENT, temporalLayer: 'long' });
    await engine.remember({ content: 'Postgres tuning notes', agentName: AGENT });

    const results = await engine.recall({ query: 'postgres', agentName: AGENT });

    expect(results.map(r => r.temporalLayer)).toEqual(['working', 'long']);
    expect(results[0].similarity).toBeCloseTo(1.5);
    expect(results[1].similarity).toBeCloseTo(1.0);
  });

  it('breaks similarity ties by importance', async () => {
    await engine.remember({ content: 'Postgres replica one', agentName: AGENT, temporalLayer: 'long', importanceScore: 0.4 });
    await engine.remember({ content: 'Postgres replica two', agentName: AGENT, temporalLayer: 'long', importanceScore: 0.9 });

    const results = await engine.recall({ query: 'postgres', agentName: AGENT });

    expect(results.map(r => r.importanceScore)).toEqual([0.9, 0.4]);
  });

  it('leaves the archive out unless asked', async () => {
    await engine.remember({ content: 'Old postgres cluster retired', agentName: AGENT, temporalLayer: 'archive' });

    expect(await engine.recall({ query: 'postgres', agentName: AGENT, minScore: 0.3 })).toEqual([]);

    const withArchive = await engine.recall({ query: 'postgres', agentName: AGENT, minScore: 0.3, includeArchive: true });
    expect(withArchive).toHaveLength(1);
    expect(withArchive[0].similarity).toBeCloseTo(0.5);
  });

  it('drops results below minScore after weighting', async () => {
    await engine.remember({ content: 'Postgres deploy checklist', agentName: AGENT, temporalLayer: 'long' });

    // base similarity 1/sqrt(2) ≈ 0.707
    expect(await engine.recall({ query: 'postgres', agentName: AGENT, minScore: 0.8 })).toEqual([]);
    expect(await engine.recall({ query: 'postgres', agentName: AGENT, minScore: 0.7 })).toHaveLength(1);
  });

  it('returns the requested detail layer', async () => {
    const content = 'Postgres runs with three replicas across two zones and nightly base backups to cold storage';
    await engine.remember({ content, agentName: AGENT });

    const [headline] = await engine.recall({ query: 'postgres', agentName: AGENT, maxLayer: 1 });
    expect(headline.content).toBe('Postgres runs with three replicas across two zones and nightly...');

    const [full] = await engine.recall({ query: 'postgres', agentName: AGENT, maxLayer: 3 });
    expect(full.content).toBe(content);
  });

  it('filters by tags, domain and memory type', async () => {
    await engine.remember({ content: 'Postgres on the ops cluster', agentName: AGENT, tags: ['ops'], domain: 'system' });
    await engine.remember({ content: 'Postgres for the side project', agentName: AGENT, tags: ['hobby'] });

    const byTag = await engine.recall({ query: 'postgres', agentName: AGENT, tags: ['ops'] });
    expect(byTag.map(r => r.content)).toEqual(['Postgres on the ops cluster']);

    const byDomain = await engine.recall({ query: 'postgres', agentName: AGENT, domain: 'system' });
    expect(byDomain.map(r => r.domain)).toEqual(['system']);

    expect(await engine.recall({ query: 'postgres', agentName: AGENT, memoryType: 'skills' })).toEqual([]);
  });

  it('skips memories whose expiry has passed even before the sweep', async () => {
    await engine.remember({ content: 'Postgres failover drill', agentName: AGENT, ttlHours: 1 });
    clock.advanceHours(2);

    expect(await engine.recall({ query: 'postgres', agentName: AGENT })).toEqual([]);
    expect(store.snapshot().memories[0].status).toBe('active');
  });

  it('skips deleted memories', async () => {
    const id = await engine.remember({ content: 'Postgres credentials rotated', agentName: AGENT });
    const lifecycle = new LifecycleManager({ store, logger: silentLogger, clock: clock.now });
    await lifecycle.decide({ memoryId: id, decision: 'delete' });

    expect(await engine.recall({ query: 'postgres', agentName: AGENT })).toEqual([]);
  });

  it('returns nothing for an unknown agent', async () => {
    expect(await engine.recall({ query: 'postgres', agentName: 'nobody' })).toEqual([]);
  });

  it('caps the number of results', async () => {
    for (const n of [1, 2, 3]) {
      await engine.remember({ content: `Postgres note ${n}`, agentName: AGENT });
    }
    expect(await engine.recall({ query: 'postgres', agentName: AGENT, limit: 2 })).toHaveLength(2);
  });

  it('logs each returned memory as accessed', async () => {
    const id = await engine.remember({ content: 'Postgres vacuum schedule', agentName: AGENT });
    clock.advanceHours(1);

    await engine.recall({ query: 'postgres', agentName: AGENT });

    const stored = await store.getMemory(id);
    expect(stored?.accessCount).toBe(1);
    expect(stored?.lastAccessed).toBe('2026-01-01T01:00:00.000Z');

    const log = await store.listAccessLog(id);
    expect(log).toHaveLength(1);
    expect(log[0]).toMatchObject({ layerAccessed: 2, queryText: 'postgres' });
    expect(log[0].relevanceScore).toBeCloseTo(1.5);
  });

  it('still returns results when access logging fails', async () => {
    const logger = createSpyLogger();
    engine = new MemoryEngine({ store, embeddings, logger, clock: clock.now });
    await engine.remember({ content: 'Postgres vacuum schedule', agentName: AGENT });
    vi.spyOn(store, 'recordAccess').mockRejectedValue(new Error('disk full'));

    const results = await engine.recall({ query: 'postgres', agentName: AGENT });

    expect(results).toHaveLength(1);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe('expand', () => {
  it('returns the requested layer with lifecycle fields', async () => {
    const content = 'Postgres runs with three replicas across two zones and nightly base backups to cold storage';
    const id = await engine.remember({ content, agentName: AGENT });

    const full = await engine.expand(id);
    expect(full).toMatchObject({ id, layer: 3, content, status: 'active', temporalLayer: 'working' });

    const headline = await engine.expand(id, 1);
    expect(headline.content).toBe('Postgres runs with three replicas across two zones and nightly...');
  });

  it('throws for an unknown id', async () => {
    await expect(engine.expand('missing')).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('stats', () => {
  it('counts memories per tier and status', async () => {
    await engine.remember({ content: 'Postgres a', agentName: AGENT, importanceScore: 0.2 });
    await engine.remember({ content: 'Postgres b', agentName: AGENT, importanceScore: 0.6, temporalLayer: 'long' });
    await engine.recall({ query: 'postgres', agentName: AGENT });

    const stats = await engine.stats(AGENT);

    expect(stats.totalMemories).toBe(2);
    expect(stats.averageImportance).toBeCloseTo(0.4);
    expect(stats.totalAccesses).toBe(2);
    expect(stats.byTemporalLayer).toEqual({ working: 1, short: 0, long: 1, archive: 0 });
    expect(stats.byStatus.active).toBe(2);
  });

  it('reports zeroes for an unknown agent', async () => {
    const stats = await engine.stats('nobody');
    expect(stats.totalMemories).toBe(0);
    expect(stats.byStatus).toEqual({ active: 0, expired: 0, pending_review: 0, archived: 0, deleted: 0 });
  });
});
