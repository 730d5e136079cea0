import { TransientIOError } from '../errors';
import type { MemoryEngine } from '../memory/memoryEngine';
import type { RememberInput } from '../types';
import type { OfflineBuffer } from './offlineBuffer';

export type RememberOutcome =
  | { queued: false; memoryId: string }
  | { queued: true };

/**
 * Write path with fallback: when the store is unreachable the memory is kept
 * in the offline buffer for a later `sync`. Every other failure propagates.
 */
export async function rememberOrBuffer(
  engine: MemoryEngine,
  buffer: OfflineBuffer,
  input: RememberInput,
): Promise<RememberOutcome> {
  try {
    const memoryId = await engine.remember(input);
    return { queued: false, memoryId };
  } catch (err) {
    if (!(err instanceof TransientIOError)) throw err;

    await buffer.enqueue({
      content: input.content,
      domain: input.domain,
      temporalLayer: input.temporalLayer,
      ttlHours: input.ttlHours,
      tags: input.tags,
      metadata: {
        agentName: input.agentName,
        ...(input.sourceType !== undefined && { sourceType: input.sourceType }),
        ...(input.importanceScore !== undefined && { importanceScore: input.importanceScore }),
        ...(input.memoryType !== undefined && { memoryType: input.memoryType }),
      },
    });
    return { queued: true };
  }
}
