/**
 * Structured recall predicates.
 *
 * A recall filter is an ordered list of typed predicates. The in-memory store
 * evaluates them with `matchesPredicate`; the SQL store compiles each one to a
 * parameterized clause. Optional filters simply contribute no predicate.
 */

import type { MemoryDomain, MemoryRecord, MemoryStatus, MemoryType, TemporalLayer } from '../types';

export type MemoryPredicate =
  | { kind: 'agent'; agentId: string }
  | { kind: 'notExpired'; now: string }
  | { kind: 'temporalLayers'; layers: TemporalLayer[] }
  | { kind: 'statusNot'; statuses: MemoryStatus[] }
  | { kind: 'tagsAny'; tags: string[] }
  | { kind: 'memoryType'; memoryType: MemoryType }
  | { kind: 'domain'; domain: MemoryDomain };

export type PredicateKind = MemoryPredicate['kind'];

export interface RecallFilter {
  agentId: string;
  now: Date;
  temporalLayers: TemporalLayer[];
  tags?: string[];
  memoryType?: MemoryType;
  domain?: MemoryDomain;
}

export function buildRecallPredicates(filter: RecallFilter): MemoryPredicate[] {
  const predicates: MemoryPredicate[] = [
    { kind: 'agent', agentId: filter.agentId },
    { kind: 'notExpired', now: filter.now.toISOString() },
    { kind: 'temporalLayers', layers: filter.temporalLayers },
    { kind: 'statusNot', statuses: ['deleted'] },
  ];

  if (filter.tags && filter.tags.length > 0) {
    predicates.push({ kind: 'tagsAny', tags: filter.tags });
  }
  if (filter.memoryType) {
    predicates.push({ kind: 'memoryType', memoryType: filter.memoryType });
  }
  if (filter.domain) {
    predicates.push({ kind: 'domain', domain: filter.domain });
  }

  return predicates;
}

export function matchesPredicate(record: MemoryRecord, predicate: MemoryPredicate): boolean {
  switch (predicate.kind) {
    case 'agent':
      return record.agentId === predicate.agentId;
    case 'notExpired':
      return record.expiresAt === null || record.expiresAt > predicate.now;
    case 'temporalLayers':
      return predicate.layers.includes(record.temporalLayer);
    case 'statusNot':
      return !predicate.statuses.includes(record.status);
    case 'tagsAny':
      return record.tags.some(tag => predicate.tags.includes(tag));
    case 'memoryType':
      return record.memoryType === predicate.memoryType;
    case 'domain':
      return record.domain === predicate.domain;
  }
}

export function matchesAll(record: MemoryRecord, predicates: readonly MemoryPredicate[]): boolean {
  return predicates.every(predicate => matchesPredicate(record, predicate));
}
