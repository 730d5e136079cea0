/**
 * Sleep Cycle: batch consolidation of the review backlog.
 *
 * 1. Fetch pending memories (this triggers the lazy active → expired sweep)
 * 2. Split into batches (default 20)
 * 3. Ask the decision service for one category per memory
 * 4. Map categories to lifecycle decisions and apply them (skipped in dry run)
 *
 * A batch whose answer cannot be parsed is skipped whole. Nothing is retried.
 * Two cycles must not run against the same backlog at once; nothing here prevents it.
 */

import { createConsoleLogger, type Logger } from '../logger';
import type { LifecycleManager } from '../lifecycle/lifecycleManager';
import type { DecideInput, PendingMemory, ReviewDecision, TemporalLayer } from '../types';
import {
  buildConsolidationPrompt,
  buildDecisionItems,
  parseDecisions,
  type ConsolidationCategory,
  type DecisionService,
} from './decisionService';

export const DEFAULT_BATCH_SIZE = 20;
export const DEFAULT_CYCLE_LIMIT = 100;

type OutcomeCounter = 'promoted' | 'extended' | 'archived' | 'forgotten';

interface CategoryMapping {
  decision: ReviewDecision;
  newLayer?: TemporalLayer;
  counter: OutcomeCounter;
}

export const CATEGORY_DECISIONS: Readonly<Record<ConsolidationCategory, CategoryMapping>> = {
  important: { decision: 'promote', newLayer: 'long', counter: 'promoted' },
  context: { decision: 'extend', newLayer: 'short', counter: 'extended' },
  archive: { decision: 'archive', counter: 'archived' },
  forget: { decision: 'delete', counter: 'forgotten' },
};

export interface SleepCycleRunOptions {
  agentName?: string;
  limit?: number;
  batchSize?: number;
  dryRun?: boolean;
}

export interface PlannedDecision {
  memoryId: string;
  category: ConsolidationCategory;
  decision: ReviewDecision;
  newLayer?: TemporalLayer;
  reason: string;
  applied: boolean;
}

export interface ConsolidationReport {
  promoted: number;
  extended: number;
  archived: number;
  forgotten: number;
  total: number;
  skippedBatches: number;
  failed: number;
  dryRun: boolean;
  decisions: PlannedDecision[];
}

export interface SleepCycleOptions {
  lifecycle: LifecycleManager;
  decisions: DecisionService;
  logger?: Logger;
}

export class SleepCycle {
  private readonly lifecycle: LifecycleManager;
  private readonly decisionService: DecisionService;
  private readonly logger: Logger;

  constructor(options: SleepCycleOptions) {
    this.lifecycle = options.lifecycle;
    this.decisionService = options.decisions;
    this.logger = options.logger ?? createConsoleLogger('SleepCycle');
  }

  async run(options: SleepCycleRunOptions = {}): Promise<ConsolidationReport> {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    const dryRun = options.dryRun ?? false;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
    }

    const { memories } = await this.lifecycle.listPending({
      agentName: options.agentName,
      limit: options.limit ?? DEFAULT_CYCLE_LIMIT,
    });

    const report: ConsolidationReport = {
      promoted: 0,
      extended: 0,
      archived: 0,
      forgotten: 0,
      total: memories.length,
      skippedBatches: 0,
      failed: 0,
      dryRun,
      decisions: [],
    };

    if (memories.length === 0) {
      this.logger.info({ dryRun }, 'no memories to review');
      return report;
    }

    const batches = chunk(memories, batchSize);
    this.logger.info(
      { total: memories.length, batches: batches.length, model: this.decisionService.modelName, dryRun },
      'sleep cycle started',
    );

    for (const [index, batch] of batches.entries()) {
      await this.processBatch(batch, index + 1, dryRun, report);
    }

    this.logger.info(
      {
        promoted: report.promoted,
        extended: report.extended,
        archived: report.archived,
        forgotten: report.forgotten,
        skippedBatches: report.skippedBatches,
        failed: report.failed,
      },
      'sleep cycle complete',
    );
    return report;
  }

  private async processBatch(
    batch: PendingMemory[],
    batchNumber: number,
    dryRun: boolean,
    report: ConsolidationReport,
  ): Promise<void> {
    const items = buildDecisionItems(batch);
    const prompt = buildConsolidationPrompt(items);

    let raw: string;
    try {
      raw = await this.decisionService.decide({ items, prompt });
    } catch (err) {
      report.skippedBatches++;
      this.logger.warn({ err, batchNumber, size: batch.length }, 'decision service failed; batch skipped');
      return;
    }

    const parsed = parseDecisions(raw, batch.length);
    if (!parsed.success) {
      report.skippedBatches++;
      this.logger.warn({ batchNumber, size: batch.length, error: parsed.error }, 'unparsable decisions; batch skipped');
      return;
    }

    for (const decision of parsed.decisions) {
      const memory = batch[decision.id - 1];
      const mapping = CATEGORY_DECISIONS[decision.decision];
      const planned: PlannedDecision = {
        memoryId: memory.id,
        category: decision.decision,
        decision: mapping.decision,
        ...(mapping.newLayer && { newLayer: mapping.newLayer }),
        reason: decision.reason,
        applied: false,
      };
      report.decisions.push(planned);

      if (dryRun) {
        report[mapping.counter]++;
        continue;
      }

      const input: DecideInput = {
        memoryId: memory.id,
        decision: mapping.decision,
        newLayer: mapping.newLayer,
        reason: decision.reason,
      };
      try {
        await this.lifecycle.decide(input, 'sleep-cycle');
        planned.applied = true;
        report[mapping.counter]++;
      } catch (err) {
        report.failed++;
        this.logger.warn({ err, memoryId: memory.id, decision: mapping.decision }, 'failed to apply decision');
      }
    }
  }
}

function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
