import type { MemoryStatus, TemporalLayer } from '../types';

export function emptyLayerCounts(): Record<TemporalLayer, number> {
  return { working: 0, short: 0, long: 0, archive: 0 };
}

export function emptyStatusCounts(): Record<MemoryStatus, number> {
  return { active: 0, expired: 0, pending_review: 0, archived: 0, deleted: 0 };
}
