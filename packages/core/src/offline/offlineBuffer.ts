/**
 * OfflineBuffer: line-delimited local queue of writes made while the store is unreachable.
 *
 * - Append-only between syncs, fsync on every enqueue
 * - At-least-once: a record redelivered after a partial sync may be stored twice
 * - A sync first renames the live file to `<file>.syncing`; writes made while it
 *   delivers land in a fresh live file and are never overwritten
 * - Lines that do not parse are kept verbatim by sync and cleanup, and skipped
 * - Single process: file mutations are serialized in process, not across processes
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { TransientIOError, ValidationError } from '../errors';
import { createConsoleLogger, type Logger } from '../logger';
import type { MemoryEngine } from '../memory/memoryEngine';
import { DEFAULT_WORKING_TTL_HOURS } from '../memory/temporal';
import {
  bufferedMemorySchema,
  DEFAULT_AGENT_NAME,
  formatIssues,
  memoryTypeSchema,
  type BufferedMemory,
} from '../schemas';
import type { MemoryDomain, RememberInput, TemporalLayer } from '../types';

export interface EnqueueInput {
  content: string;
  domain?: MemoryDomain;
  temporalLayer?: TemporalLayer;
  ttlHours?: number;
  tags?: string[];
  metadata?: Record<string, unknown>;
}

/** Delivers one record; throwing marks it failed and keeps it buffered. */
export type BufferDelivery = (record: BufferedMemory) => Promise<void>;

export interface SyncResult {
  synced: number;
  failed: number;
  /** Lines that could not be parsed; left in the buffer untouched. */
  unreadable: number;
}

export interface RemoveByTagResult {
  removed: BufferedMemory[];
  remaining: number;
  dryRun: boolean;
}

type ParsedLine =
  | { ok: true; line: string; record: BufferedMemory }
  | { ok: false; line: string; reason: string; cause?: unknown };

const bufferMetadataSchema = z.object({
  agentName: z.string().min(1).optional().catch(undefined),
  sourceType: z.string().optional().catch(undefined),
  importanceScore: z.number().min(0).max(1).optional().catch(undefined),
  memoryType: memoryTypeSchema.optional().catch(undefined),
});

export class OfflineBuffer {
  private readonly logger: Logger;
  private readonly syncingPath: string;
  private mutations: Promise<unknown> = Promise.resolve();
  private inFlightSync: Promise<SyncResult> | null = null;

  constructor(readonly filePath: string, logger?: Logger) {
    this.logger = logger ?? createConsoleLogger('OfflineBuffer');
    this.syncingPath = `${filePath}.syncing`;
  }

  async enqueue(input: EnqueueInput): Promise<BufferedMemory> {
    const record: BufferedMemory = {
      content: input.content,
      domain: input.domain ?? 'general',
      temporalLayer: input.temporalLayer ?? 'working',
      ttlHours: input.ttlHours ?? DEFAULT_WORKING_TTL_HOURS,
      tags: input.tags ?? [],
      metadata: input.metadata ?? {},
      timestamp: new Date().toISOString(),
      queued: true,
    };

    await this.exclusive(async () => {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      const handle = await fs.promises.open(this.filePath, 'a');
      try {
        await handle.write(JSON.stringify(record) + '\n');
        await handle.sync();
      } finally {
        await handle.close();
      }
    });
    return record;
  }

  /** Readable records, including those claimed by a sync still in flight. */
  async count(): Promise<number> {
    const lines = await this.bufferedLines();
    return lines.map(parseLine).filter(parsed => parsed.ok).length;
  }

  /**
   * All buffered records, oldest first. A line that is not a valid record is
   * reported with its line number rather than dropped.
   */
  async readAll(): Promise<BufferedMemory[]> {
    const lines = await this.bufferedLines();
    return lines.map((line, index) => {
      const parsed = parseLine(line);
      if (!parsed.ok) {
        throw new ValidationError(`Buffer line ${index + 1} ${parsed.reason}`, parsed.cause);
      }
      return parsed.record;
    });
  }

  /**
   * Deliver every readable record in order. Afterwards the buffer holds the
   * records that failed and the unreadable lines, ahead of anything enqueued
   * during the sync; the buffer file is removed when nothing is left.
   * Concurrent calls share one run.
   */
  sync(target: string | BufferDelivery): Promise<SyncResult> {
    if (!this.inFlightSync) {
      const deliver = typeof target === 'string' ? createHttpDelivery(target) : target;
      this.inFlightSync = this.runSync(deliver).finally(() => {
        this.inFlightSync = null;
      });
    }
    return this.inFlightSync;
  }

  async clear(): Promise<void> {
    await this.exclusive(async () => {
      await fs.promises.rm(this.filePath, { force: true });
      await fs.promises.rm(this.syncingPath, { force: true });
    });
  }

  /**
   * Queue cleanup: drop records carrying `tag`. With `dryRun` nothing is written.
   * Records claimed by a sync in flight are not touched.
   */
  removeByTag(tag: string, options: { dryRun?: boolean } = {}): Promise<RemoveByTagResult> {
    const dryRun = options.dryRun ?? false;
    return this.exclusive(async () => {
      const parsed = (await readLinesOf(this.filePath)).map(parseLine);
      this.warnUnreadable(parsed);

      const removed: BufferedMemory[] = [];
      const keptLines: string[] = [];
      let remaining = 0;
      for (const entry of parsed) {
        if (entry.ok && entry.record.tags.includes(tag)) {
          removed.push(entry.record);
          continue;
        }
        keptLines.push(entry.line);
        if (entry.ok) remaining++;
      }

      if (dryRun) {
        return { removed, remaining: remaining + removed.length, dryRun };
      }
      if (removed.length > 0) {
        await replaceFile(this.filePath, keptLines);
        this.logger.info({ tag, removed: removed.length, remaining }, 'buffered memories removed');
      }
      return { removed, remaining, dryRun };
    });
  }

  private async runSync(deliver: BufferDelivery): Promise<SyncResult> {
    const parsed = (await this.exclusive(() => this.claimForSync())).map(parseLine);
    if (parsed.length === 0) {
      await this.exclusive(() => this.restoreAfterSync([]));
      return { synced: 0, failed: 0, unreadable: 0 };
    }
    this.warnUnreadable(parsed);

    const keptLines: string[] = [];
    let synced = 0;
    let failed = 0;
    for (const [index, entry] of parsed.entries()) {
      if (!entry.ok) {
        keptLines.push(entry.line);
        continue;
      }
      try {
        await deliver(entry.record);
        synced++;
      } catch (err) {
        failed++;
        keptLines.push(entry.line);
        this.logger.warn({ err, position: index + 1 }, 'buffered memory not delivered; keeping it');
      }
    }

    await this.exclusive(() => this.restoreAfterSync(keptLines));
    const result = { synced, failed, unreadable: parsed.length - synced - failed };
    this.logger.info(result, 'buffer sync finished');
    return result;
  }

  /**
   * Move the live file aside. A `.syncing` file left by an interrupted sync is
   * delivered first; the live file then waits for the next sync.
   */
  private async claimForSync(): Promise<string[]> {
    const leftover = await readLinesOf(this.syncingPath);
    if (leftover.length > 0) {
      return leftover;
    }
    try {
      await fs.promises.rename(this.filePath, this.syncingPath);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    return readLinesOf(this.syncingPath);
  }

  private async restoreAfterSync(keptLines: string[]): Promise<void> {
    const enqueuedSince = await readLinesOf(this.filePath);
    await replaceFile(this.filePath, [...keptLines, ...enqueuedSince]);
    await fs.promises.rm(this.syncingPath, { force: true });
  }

  private async bufferedLines(): Promise<string[]> {
    const claimed = await readLinesOf(this.syncingPath);
    const live = await readLinesOf(this.filePath);
    return [...claimed, ...live];
  }

  private warnUnreadable(parsed: ParsedLine[]): void {
    const lines = parsed.flatMap((entry, index) => (entry.ok ? [] : [index + 1]));
    if (lines.length > 0) {
      this.logger.warn({ lines, file: this.filePath }, 'unreadable buffer lines kept as they are');
    }
  }

  private exclusive<T>(run: () => Promise<T>): Promise<T> {
    const result = this.mutations.then(run);
    this.mutations = result.catch(() => undefined);
    return result;
  }
}

function parseLine(line: string): ParsedLine {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (err) {
    return { ok: false, line, reason: 'is not valid JSON', cause: err };
  }
  const parsed = bufferedMemorySchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, line, reason: `is not a buffered memory: ${formatIssues(parsed.error)}` };
  }
  return { ok: true, line, record: parsed.data };
}

async function readLinesOf(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return [];
    throw err;
  }
  return content.split('\n').filter(line => line.trim().length > 0);
}

/** Write to a temp file, then rename over the target; no file at all when empty. */
async function replaceFile(filePath: string, lines: string[]): Promise<void> {
  if (lines.length === 0) {
    await fs.promises.rm(filePath, { force: true });
    return;
  }
  const tempPath = `${filePath}.tmp`;
  await fs.promises.writeFile(tempPath, lines.map(line => line + '\n').join(''), 'utf8');
  await fs.promises.rename(tempPath, filePath);
}

/**
 * Turn a buffered record back into a remember request. The agent and the
 * optional write fields travel in `metadata`; unusable values are ignored.
 */
export function toRememberInput(record: BufferedMemory): RememberInput {
  const meta = bufferMetadataSchema.parse(record.metadata);
  return {
    content: record.content,
    agentName: meta.agentName ?? DEFAULT_AGENT_NAME,
    tags: record.tags,
    domain: record.domain,
    temporalLayer: record.temporalLayer,
    ttlHours: record.ttlHours,
    ...(meta.sourceType !== undefined && { sourceType: meta.sourceType }),
    ...(meta.importanceScore !== undefined && { importanceScore: meta.importanceScore }),
    ...(meta.memoryType !== undefined && { memoryType: meta.memoryType }),
  };
}

/** Delivery to a running server's `POST /api/v1/remember`. */
export function createHttpDelivery(baseUrl: string, fetchImpl: typeof fetch = fetch): BufferDelivery {
  const url = `${baseUrl.replace(/\/+$/, '')}/api/v1/remember`;
  return async record => {
    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(toRememberInput(record)),
      });
    } catch (err) {
      throw new TransientIOError(`Could not reach ${url}`, err);
    }
    if (!response.ok) {
      throw new TransientIOError(`Delivery to ${url} failed with HTTP ${response.status}`);
    }
  };
}

/** In-process delivery straight into an engine. */
export function engineDelivery(engine: MemoryEngine): BufferDelivery {
  return async record => {
    await engine.remember(toRememberInput(record));
  };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
