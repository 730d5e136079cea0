/**
 * Decision service contract for the sleep cycle.
 *
 * Request: a bounded list of { ordinal, domain, truncatedContent }.
 * Response: raw text that must be a JSON array with exactly one
 * { id, decision, reason } per request item, ids being the ordinals 1..n.
 *
 * Parsing fails closed: anything else yields zero decisions for the batch.
 * No fence stripping, no repair, no partial interpretation.
 */

import { z } from 'zod';
import type { MemoryDomain } from '../types';

export const PROMPT_CONTENT_CHARS = 100;

export const CONSOLIDATION_CATEGORIES = ['important', 'context', 'archive', 'forget'] as const;
export type ConsolidationCategory = typeof CONSOLIDATION_CATEGORIES[number];

export interface DecisionRequestItem {
  ordinal: number;
  domain: MemoryDomain;
  truncatedContent: string;
}

export interface DecisionRequest {
  items: DecisionRequestItem[];
  prompt: string;
}

export interface DecisionService {
  readonly modelName: string;
  /** Returns the collaborator's raw answer; transport failures throw ExternalServiceError. */
  decide(request: DecisionRequest): Promise<string>;
}

export const consolidationDecisionSchema = z
  .object({
    id: z.number().int().positive(),
    decision: z.enum(CONSOLIDATION_CATEGORIES),
    reason: z.string(),
  })
  .strict();

export const consolidationResponseSchema = z.array(consolidationDecisionSchema);

export type ConsolidationDecision = z.infer<typeof consolidationDecisionSchema>;

export type DecisionParseResult =
  | { success: true; decisions: ConsolidationDecision[] }
  | { success: false; error: string };

export function buildDecisionItems(memories: { domain: MemoryDomain; content: string }[]): DecisionRequestItem[] {
  return memories.map((memory, index) => ({
    ordinal: index + 1,
    domain: memory.domain,
    truncatedContent: memory.content.slice(0, PROMPT_CONTENT_CHARS),
  }));
}

export function buildConsolidationPrompt(items: DecisionRequestItem[]): string {
  const listing = items
    .map(item => `${item.ordinal}. [${item.domain}] ${item.truncatedContent}`)
    .join('\n');

  return `You are reviewing ${items.length} memories whose time in working or short-term memory has run out.

For each memory choose exactly one decision:
- important: promote to long-term memory (key learnings, decisions, insights needed later)
- context: keep in short-term memory for another week (ongoing work that may be needed soon)
- archive: move to the archive (finished tasks, history worth keeping but rarely needed)
- forget: delete (trivial actions, noise, redundant information)

Memories to review:
${listing}

Answer with ONLY a JSON array containing one object per memory, in this exact shape:
[{"id": 1, "decision": "important", "reason": "short justification"}]
Use the memory numbers above as ids. No markdown, no commentary.`;
}

export function parseDecisions(raw: string, expectedCount: number): DecisionParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw.trim());
  } catch (err) {
    return { success: false, error: `response is not JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const parsed = consolidationResponseSchema.safeParse(json);
  if (!parsed.success) {
    return { success: false, error: `response does not match the decision schema: ${parsed.error.message}` };
  }

  const decisions = parsed.data;
  if (decisions.length !== expectedCount) {
    return { success: false, error: `expected ${expectedCount} decisions, received ${decisions.length}` };
  }

  const ids = new Set(decisions.map(decision => decision.id));
  for (let ordinal = 1; ordinal <= expectedCount; ordinal++) {
    if (!ids.has(ordinal)) {
      return { success: false, error: `missing decision for memory ${ordinal}` };
    }
  }

  return { success: true, decisions: [...decisions].sort((a, b) => a.id - b.id) };
}
