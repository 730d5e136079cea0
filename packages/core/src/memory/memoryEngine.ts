/**
 * MemoryEngine: write path, temporal-weighted recall, detail expansion and stats.
 *
 * Write:  classify + layer → embed layer1/layer2 → store
 * Read:   embed query once → store nearest (predicates) → tier weighting → ranked results → access log
 */

import { ExternalServiceError, NotFoundError, ValidationError } from '../errors';
import { createConsoleLogger, type Logger } from '../logger';
import {
  formatIssues,
  recallInputSchema,
  rememberInputSchema,
} from '../schemas';
import { buildRecallPredicates } from '../store/predicates';
import type { MemoryStore } from '../store/memoryStore';
import { emptyLayerCounts, emptyStatusCounts } from '../store/stats';
import type {
  AccessLogEntry,
  ContentLayer,
  ExpandedMemory,
  MemoryStats,
  RecallInput,
  RecallResult,
  RememberInput,
} from '../types';
import { classifyMemoryType } from './classifier';
import { toNumberArray, type EmbeddingService } from './embeddingService';
import { deriveLayers, selectLayerContent } from './layering';
import { DEFAULT_WORKING_TTL_HOURS, expiryAfter, resolveRecallLayers, weightedSimilarity } from './temporal';

export interface MemoryEngineOptions {
  store: MemoryStore;
  embeddings: EmbeddingService;
  logger?: Logger;
  clock?: () => Date;
  defaultWorkingTtlHours?: number;
}

export class MemoryEngine {
  private readonly store: MemoryStore;
  private readonly embeddings: EmbeddingService;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly defaultWorkingTtlHours: number;

  constructor(options: MemoryEngineOptions) {
    this.store = options.store;
    this.embeddings = options.embeddings;
    this.logger = options.logger ?? createConsoleLogger('MemoryEngine');
    this.clock = options.clock ?? (() => new Date());
    this.defaultWorkingTtlHours = options.defaultWorkingTtlHours ?? DEFAULT_WORKING_TTL_HOURS;
  }

  /**
   * Store a new memory. Returns its identifier.
   * `ttlHours` only applies to the working tier; other tiers never lapse on their own.
   */
  async remember(input: RememberInput): Promise<string> {
    const parsed = rememberInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(`Invalid memory: ${formatIssues(parsed.error)}`);
    }
    const data = parsed.data;
    const now = this.clock();

    const expiresAt = data.temporalLayer === 'working'
      ? expiryAfter(now, data.ttlHours ?? this.defaultWorkingTtlHours)
      : null;

    const layers = deriveLayers(data.content);
    const memoryType = data.memoryType ?? classifyMemoryType(data.content, data.tags);
    const vectors = await this.embeddings.embedBatch([layers.layer1, layers.layer2]);
    if (vectors.length !== 2) {
      throw new ExternalServiceError('embedding', `Expected 2 vectors, received ${vectors.length}`);
    }
    const [layer1Embedding, layer2Embedding] = vectors;

    const agent = await this.store.upsertAgent(data.agentName);
    const record = await this.store.insertMemory({
      agentId: agent.id,
      ...layers,
      layer1Embedding: toNumberArray(layer1Embedding),
      layer2Embedding: toNumberArray(layer2Embedding),
      tags: data.tags,
      importanceScore: data.importanceScore,
      memoryType,
      temporalLayer: data.temporalLayer,
      domain: data.domain,
      sourceType: data.sourceType ?? null,
      expiresAt,
      createdAt: now.toISOString(),
    });

    this.logger.debug(
      { memoryId: record.id, agent: data.agentName, memoryType, temporalLayer: data.temporalLayer },
      'memory stored',
    );
    return record.id;
  }

  async recall(input: RecallInput): Promise<RecallResult[]> {
    const parsed = recallInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(`Invalid recall: ${formatIssues(parsed.error)}`);
    }
    const query = parsed.data;

    const agent = await this.store.findAgent(query.agentName);
    if (!agent) {
      return [];
    }

    const now = this.clock();
    const queryVector = await this.embeddings.embed(query.query);
    const predicates = buildRecallPredicates({
      agentId: agent.id,
      now,
      temporalLayers: resolveRecallLayers(query.temporalLayers, query.includeArchive),
      tags: query.tags,
      memoryType: query.memoryType,
      domain: query.domain,
    });

    const candidates = await this.store.nearest(queryVector, predicates);
    const ranked = candidates
      .map(candidate => ({
        memory: candidate.memory,
        similarity: weightedSimilarity(candidate.similarity, candidate.memory.temporalLayer),
      }))
      .filter(candidate => candidate.similarity >= query.minScore)
      .sort((a, b) => b.similarity - a.similarity || b.memory.importanceScore - a.memory.importanceScore)
      .slice(0, query.limit);

    const results: RecallResult[] = ranked.map(({ memory, similarity }) => ({
      id: memory.id,
      content: selectLayerContent(memory, query.maxLayer),
      tags: memory.tags,
      importanceScore: memory.importanceScore,
      accessCount: memory.accessCount,
      similarity,
      createdAt: memory.createdAt,
      memoryType: memory.memoryType,
      temporalLayer: memory.temporalLayer,
      ...(memory.expiresAt !== null && { expiresAt: memory.expiresAt }),
      domain: memory.domain,
    }));

    await this.logAccess(results, agent.id, query.maxLayer, query.query, now);
    return results;
  }

  /**
   * Fetch one memory with the content of the requested detail layer.
   */
  async expand(memoryId: string, layer: ContentLayer = 3): Promise<ExpandedMemory> {
    const memory = await this.store.getMemory(memoryId);
    if (!memory) {
      throw new NotFoundError('memory', memoryId);
    }

    return {
      id: memory.id,
      layer,
      content: selectLayerContent(memory, layer),
      tags: memory.tags,
      importanceScore: memory.importanceScore,
      accessCount: memory.accessCount,
      memoryType: memory.memoryType,
      temporalLayer: memory.temporalLayer,
      status: memory.status,
      domain: memory.domain,
      expiresAt: memory.expiresAt,
      createdAt: memory.createdAt,
      lastAccessed: memory.lastAccessed,
    };
  }

  async stats(agentName: string): Promise<MemoryStats> {
    const agent = await this.store.findAgent(agentName);
    if (!agent) {
      return {
        totalMemories: 0,
        averageImportance: 0,
        totalAccesses: 0,
        byTemporalLayer: emptyLayerCounts(),
        byStatus: emptyStatusCounts(),
      };
    }
    return this.store.stats(agent.id);
  }

  /**
   * Best-effort: a logging failure never invalidates the recall that produced the results.
   */
  private async logAccess(
    results: RecallResult[],
    agentId: string,
    layer: ContentLayer,
    queryText: string,
    now: Date,
  ): Promise<void> {
    if (results.length === 0) return;

    const entries: AccessLogEntry[] = results.map(result => ({
      memoryId: result.id,
      agentId,
      layerAccessed: layer,
      queryText,
      relevanceScore: result.similarity,
      accessedAt: now.toISOString(),
    }));

    try {
      await this.store.recordAccess(entries);
    } catch (err) {
      this.logger.warn({ err, count: entries.length }, 'access logging failed; returning results anyway');
    }
  }
}
