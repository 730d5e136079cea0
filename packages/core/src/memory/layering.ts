/**
 * Layered content representation.
 *
 * Layer 1: headline, first 10 words
 * Layer 2: context, first 50 words
 * Layer 3: raw content, first 2000 characters
 *
 * Only layers 1 and 2 are embedded; layer 3 is kept for detail expansion.
 */

import type { ContentLayer, MemoryLayers } from '../types';

export const LAYER1_WORD_LIMIT = 10;
export const LAYER2_WORD_LIMIT = 50;
export const LAYER3_CHAR_LIMIT = 2000;
export const ELLIPSIS = '...';

function firstWords(words: string[], limit: number): string {
  const head = words.slice(0, limit).join(' ');
  return words.length > limit ? head + ELLIPSIS : head;
}

export function deriveLayers(content: string): MemoryLayers {
  const words = content.split(/\s+/).filter(Boolean);
  return {
    layer1: firstWords(words, LAYER1_WORD_LIMIT),
    layer2: firstWords(words, LAYER2_WORD_LIMIT),
    layer3: content.slice(0, LAYER3_CHAR_LIMIT),
  };
}

/**
 * Most detailed non-empty layer not exceeding `maxLayer`.
 */
export function selectLayerContent(layers: MemoryLayers, maxLayer: ContentLayer): string {
  if (maxLayer >= 3 && layers.layer3) return layers.layer3;
  if (maxLayer >= 2 && layers.layer2) return layers.layer2;
  return layers.layer1;
}
