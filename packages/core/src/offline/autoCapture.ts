/**
 * Auto-capture of agent events into working memory via the offline buffer.
 * Each event type carries its own lifetime and domain.
 */

import type { MemoryDomain } from '../types';
import type { OfflineBuffer } from './offlineBuffer';
import type { BufferedMemory } from '../schemas';

export const CAPTURE_TYPES = [
  'learning',
  'decision',
  'error',
  'user_feedback',
  'analysis',
  'tool_use',
  'file_read',
  'file_write',
  'task_complete',
  'question',
  'milestone',
] as const;
export type CaptureType = typeof CAPTURE_TYPES[number];

export interface CaptureRule {
  ttlHours: number;
  domain: MemoryDomain;
}

export const CAPTURE_RULES: Readonly<Record<CaptureType, CaptureRule>> = {
  learning: { ttlHours: 4, domain: 'self' },
  decision: { ttlHours: 3, domain: 'projects' },
  error: { ttlHours: 2, domain: 'system' },
  user_feedback: { ttlHours: 4, domain: 'user' },
  analysis: { ttlHours: 2, domain: 'general' },
  tool_use: { ttlHours: 1, domain: 'system' },
  file_read: { ttlHours: 1, domain: 'system' },
  file_write: { ttlHours: 2, domain: 'projects' },
  task_complete: { ttlHours: 3, domain: 'projects' },
  question: { ttlHours: 2, domain: 'general' },
  // a week in working memory; the sleep cycle decides whether it goes long-term
  milestone: { ttlHours: 168, domain: 'projects' },
};

export const AUTO_CAPTURE_TAG = 'auto-captured';

export interface CaptureOptions {
  context?: Record<string, unknown>;
  ttlHours?: number;
  domain?: MemoryDomain;
  tags?: string[];
}

export function captureEvent(
  buffer: OfflineBuffer,
  type: CaptureType,
  content: string,
  options: CaptureOptions = {},
): Promise<BufferedMemory> {
  const rule = CAPTURE_RULES[type];
  return buffer.enqueue({
    content,
    domain: options.domain ?? rule.domain,
    temporalLayer: 'working',
    ttlHours: options.ttlHours ?? rule.ttlHours,
    tags: [type, AUTO_CAPTURE_TAG, ...(options.tags ?? [])],
    metadata: { capturedAt: new Date().toISOString(), ...options.context },
  });
}
