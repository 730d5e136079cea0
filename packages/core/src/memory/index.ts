/**
 * Memory: layering, classification, temporal weighting and the engine that ties them together.
 */

export {
  LAYER1_WORD_LIMIT,
  LAYER2_WORD_LIMIT,
  LAYER3_CHAR_LIMIT,
  ELLIPSIS,
  deriveLayers,
  selectLayerContent,
} from './layering';

export {
  CLASSIFICATION_RULES,
  DEFAULT_MEMORY_TYPE,
  classifyWithReason,
  classifyMemoryType,
} from './classifier';
export type { ClassificationRule, ClassificationResult } from './classifier';

export {
  cosineSimilarity,
  toNumberArray,
  rankBySimilarity,
} from './embeddingService';
export type { Vector, EmbeddingService, ScoredItem } from './embeddingService';

export {
  TIER_WEIGHTS,
  DEFAULT_RECALL_LAYERS,
  SHORT_TIER_TTL_HOURS,
  DEFAULT_EXTEND_TTL_HOURS,
  DEFAULT_WORKING_TTL_HOURS,
  PROMOTION_IMPORTANCE_FLOOR,
  MAX_TTL_HOURS,
  tierWeight,
  weightedSimilarity,
  resolveRecallLayers,
  defaultExtendTtlHours,
  addHours,
  expiryAfter,
  hoursBetween,
} from './temporal';

export { MemoryEngine } from './memoryEngine';
export type { MemoryEngineOptions } from './memoryEngine';
