/**
 * Memory Type Classifier: ordered keyword rule table.
 *
 * PRECEDENCE: rules are evaluated top to bottom, first match wins.
 * Matching is case-insensitive substring containment, so "liked" matches "like".
 * Content rules look at the memory text; tag rules look at the tags joined with spaces.
 *
 * NO LLM CALLS. Deterministic.
 */

import type { MemoryType } from '../types';

export interface ClassificationRule {
  priority: number;
  label: MemoryType;
  source: 'content' | 'tags';
  keywords: readonly string[];
}

/**
 * Rule table (TUNABLE). Reordering changes precedence; keep priorities ascending.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    priority: 1,
    label: 'preferences',
    source: 'content',
    keywords: ['prefer', 'like', 'hate', 'love', 'dislike', 'values', 'style'],
  },
  {
    priority: 2,
    label: 'decisions',
    source: 'content',
    keywords: ['decided', 'decision', 'chose', 'will use', 'strategy'],
  },
  {
    priority: 3,
    label: 'experiences',
    source: 'content',
    keywords: ['built', 'created', 'today', 'yesterday', 'happened', 'did'],
  },
  {
    priority: 4,
    label: 'skills',
    source: 'content',
    keywords: ['how to', 'guide', 'tutorial', 'steps to', 'method'],
  },
  {
    priority: 5,
    label: 'context',
    source: 'tags',
    keywords: ['project', 'system', 'overview', 'about'],
  },
];

export const DEFAULT_MEMORY_TYPE: MemoryType = 'facts';

export interface ClassificationResult {
  memoryType: MemoryType;
  /** Null when the default applied. */
  rule: ClassificationRule | null;
  matchedKeyword: string | null;
}

export function classifyWithReason(
  content: string,
  tags: readonly string[] = [],
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES,
): ClassificationResult {
  const haystacks = {
    content: content.toLowerCase(),
    tags: tags.join(' ').toLowerCase(),
  };

  for (const rule of rules) {
    const text = haystacks[rule.source];
    const matchedKeyword = rule.keywords.find(keyword => text.includes(keyword));
    if (matchedKeyword !== undefined) {
      return { memoryType: rule.label, rule, matchedKeyword };
    }
  }

  return { memoryType: DEFAULT_MEMORY_TYPE, rule: null, matchedKeyword: null };
}

export function classifyMemoryType(content: string, tags: readonly string[] = []): MemoryType {
  return classifyWithReason(content, tags).memoryType;
}
