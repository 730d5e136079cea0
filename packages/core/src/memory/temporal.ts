/**
 * Temporal tiers: ranking weights, default search scope and TTL defaults.
 */

import { ValidationError } from '../errors';
import type { TemporalLayer } from '../types';

/** Multiplier applied to base similarity during recall. Not clamped: working matches may exceed 1.0. */
export const TIER_WEIGHTS: Readonly<Record<TemporalLayer, number>> = {
  working: 1.5,
  short: 1.2,
  long: 1.0,
  archive: 0.5,
};

export const DEFAULT_RECALL_LAYERS: readonly TemporalLayer[] = ['working', 'short', 'long'];

export const SHORT_TIER_TTL_HOURS = 168;
export const DEFAULT_EXTEND_TTL_HOURS = 24;
export const DEFAULT_WORKING_TTL_HOURS = 2;
export const PROMOTION_IMPORTANCE_FLOOR = 0.7;
/** 100 years. */
export const MAX_TTL_HOURS = 24 * 365 * 100;

const MS_PER_HOUR = 60 * 60 * 1000;

export function tierWeight(layer: TemporalLayer): number {
  return TIER_WEIGHTS[layer];
}

export function weightedSimilarity(baseSimilarity: number, layer: TemporalLayer): number {
  return baseSimilarity * tierWeight(layer);
}

/**
 * Effective tier filter for a recall: the explicit set when given, otherwise
 * working/short/long plus archive only when asked for.
 */
export function resolveRecallLayers(
  explicit: readonly TemporalLayer[] | undefined,
  includeArchive = false,
): TemporalLayer[] {
  if (explicit && explicit.length > 0) {
    return [...new Set(explicit)];
  }
  return includeArchive ? [...DEFAULT_RECALL_LAYERS, 'archive'] : [...DEFAULT_RECALL_LAYERS];
}

/** TTL used by an `extend` decision that names no explicit duration. */
export function defaultExtendTtlHours(targetLayer: TemporalLayer): number {
  return targetLayer === 'short' ? SHORT_TIER_TTL_HOURS : DEFAULT_EXTEND_TTL_HOURS;
}

export function addHours(from: Date, hours: number): Date {
  return new Date(from.getTime() + hours * MS_PER_HOUR);
}

/**
 * ISO expiry `hours` after `now`. Rejects a TTL beyond MAX_TTL_HOURS and one so
 * short that the expiry would not fall strictly after `now`.
 */
export function expiryAfter(now: Date, hours: number): string {
  if (!Number.isFinite(hours) || hours <= 0 || hours > MAX_TTL_HOURS) {
    throw new ValidationError(`ttlHours must be greater than 0 and at most ${MAX_TTL_HOURS}`);
  }
  const expiresAt = addHours(now, hours);
  if (expiresAt.getTime() <= now.getTime()) {
    throw new ValidationError(`ttlHours ${hours} is too short to set an expiry after ${now.toISOString()}`);
  }
  return expiresAt.toISOString();
}

export function hoursBetween(earlierIso: string, later: Date): number {
  return (later.getTime() - Date.parse(earlierIso)) / MS_PER_HOUR;
}
