/**
 * Lifecycle transitions (pure).
 *
 * STATES:
 *   active ──(expiresAt passed, swept on pending query)──▶ expired
 *   {active, expired, pending_review} ──promote──▶ active   (tier → long by default, no expiry, importance ≥ 0.7)
 *   {active, expired, pending_review} ──extend───▶ active   (tier unchanged by default, expiry = now + ttl)
 *   any non-terminal ──archive──▶ archived          (tier → archive, no expiry)
 *   any non-terminal ──delete───▶ deleted           (tier unchanged; soft delete)
 *
 * `deleted` is terminal. `archived` leaves only through delete. Promoting or
 * extending an `active` memory re-tiers it in place.
 */

import { InvalidTransitionError, ValidationError } from '../errors';
import { defaultExtendTtlHours, expiryAfter, MAX_TTL_HOURS, PROMOTION_IMPORTANCE_FLOOR } from '../memory/temporal';
import type { TransitionPatch } from '../store/memoryStore';
import {
  REVIEW_DECISIONS,
  type MemoryRecord,
  type ReviewActor,
  type ReviewDecision,
  type ReviewLogEntry,
  type TemporalLayer,
  type TransitionSummary,
} from '../types';

export interface TransitionRequest {
  decision: ReviewDecision;
  newLayer?: TemporalLayer;
  reason?: string;
  ttlHours?: number;
  reviewedBy: ReviewActor;
}

export interface TransitionPlan {
  patch: TransitionPatch;
  entry: ReviewLogEntry;
}

export function isReviewDecision(value: string): value is ReviewDecision {
  return REVIEW_DECISIONS.some(decision => decision === value);
}

export function parseReviewDecision(value: string): ReviewDecision {
  if (!isReviewDecision(value)) {
    throw new ValidationError(
      `Unknown decision "${value}". Expected one of: ${REVIEW_DECISIONS.join(', ')}`,
    );
  }
  return value;
}

export function planTransition(memory: MemoryRecord, request: TransitionRequest, now: Date): TransitionPlan {
  if (memory.status === 'deleted') {
    throw new InvalidTransitionError(`Memory ${memory.id} is deleted; no further transitions are allowed`);
  }
  if (memory.status === 'archived' && (request.decision === 'promote' || request.decision === 'extend')) {
    throw new InvalidTransitionError(`Memory ${memory.id} is archived; only archive or delete may follow`);
  }
  if (request.ttlHours !== undefined && !(request.ttlHours > 0 && request.ttlHours <= MAX_TTL_HOURS)) {
    throw new ValidationError(`ttlHours must be greater than 0 and at most ${MAX_TTL_HOURS}`);
  }

  const base = {
    expectedStatus: memory.status,
    temporalLayer: memory.temporalLayer,
    status: memory.status,
    expiresAt: memory.expiresAt,
    importanceScore: memory.importanceScore,
    updatedAt: now.toISOString(),
  };

  let patch: TransitionPatch;
  switch (request.decision) {
    case 'promote':
      patch = {
        ...base,
        temporalLayer: request.newLayer ?? 'long',
        status: 'active',
        expiresAt: null,
        importanceScore: Math.max(memory.importanceScore, PROMOTION_IMPORTANCE_FLOOR),
      };
      break;
    case 'extend': {
      const temporalLayer = request.newLayer ?? memory.temporalLayer;
      const ttlHours = request.ttlHours ?? defaultExtendTtlHours(temporalLayer);
      patch = {
        ...base,
        temporalLayer,
        status: 'active',
        expiresAt: expiryAfter(now, ttlHours),
      };
      break;
    }
    case 'archive':
      patch = { ...base, temporalLayer: 'archive', status: 'archived', expiresAt: null };
      break;
    case 'delete':
      patch = { ...base, status: 'deleted' };
      break;
  }

  return {
    patch,
    entry: {
      memoryId: memory.id,
      decision: request.decision,
      oldLayer: memory.temporalLayer,
      newLayer: patch.temporalLayer,
      reason: request.reason ?? '',
      reviewedBy: request.reviewedBy,
      reviewedAt: patch.updatedAt,
    },
  };
}

export function summarizeTransition(before: MemoryRecord, after: MemoryRecord, entry: ReviewLogEntry): TransitionSummary {
  return {
    memoryId: after.id,
    decision: entry.decision,
    oldLayer: entry.oldLayer,
    newLayer: entry.newLayer,
    oldStatus: before.status,
    newStatus: after.status,
    expiresAt: after.expiresAt,
    importanceScore: after.importanceScore,
    reason: entry.reason,
  };
}
