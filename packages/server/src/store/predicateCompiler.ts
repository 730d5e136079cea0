import { and, eq, inArray, notInArray, sql, type SQL } from 'drizzle-orm';
import type { MemoryPredicate } from '@stratamem/core';
import { memories } from '../db/schema.js';

/**
 * One parameterized clause per predicate. Values are always bound, never spliced
 * into the statement text.
 */
export function compilePredicate(predicate: MemoryPredicate): SQL {
  switch (predicate.kind) {
    case 'agent':
      return eq(memories.agentId, predicate.agentId);
    case 'notExpired':
      return sql`(${memories.expiresAt} IS NULL OR ${memories.expiresAt} > ${predicate.now})`;
    case 'temporalLayers':
      return inArray(memories.temporalLayer, predicate.layers);
    case 'statusNot':
      return notInArray(memories.status, predicate.statuses);
    case 'tagsAny':
      return sql`EXISTS (SELECT 1 FROM json_each(${memories.tags}) WHERE json_each.value IN (${sql.join(
        predicate.tags.map(tag => sql`${tag}`),
        sql`, `,
      )}))`;
    case 'memoryType':
      return eq(memories.memoryType, predicate.memoryType);
    case 'domain':
      return eq(memories.domain, predicate.domain);
  }
}

export function compilePredicates(predicates: readonly MemoryPredicate[]): SQL | undefined {
  return and(...predicates.map(compilePredicate));
}
