import { parseArgs } from 'node:util';
import { DEFAULT_BATCH_SIZE, DEFAULT_CYCLE_LIMIT, type ConsolidationReport } from '@stratamem/core';

export const SLEEP_HELP = `
stratamem-sleep - consolidate lapsed memories

Usage:
  npm run sleep -- [options]

Options:
  --dry-run            Preview decisions without applying them
  --batch-size <n>     Memories per decision request (default: ${DEFAULT_BATCH_SIZE})
  --limit <n>          Memories to review in this run (default: ${DEFAULT_CYCLE_LIMIT})
  --model <name>       Decision model (default: CONSOLIDATION_MODEL)
  --agent <name>       Only review this agent's memories (default: all agents)
  -h, --help           Show this help
`;

export interface SleepOptions {
  dryRun: boolean;
  batchSize: number;
  limit: number;
  model?: string;
  agentName?: string;
  help: boolean;
}

function positiveInteger(flag: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`--${flag} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function parseSleepArgs(argv: string[]): SleepOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      'dry-run': { type: 'boolean' },
      'batch-size': { type: 'string' },
      limit: { type: 'string' },
      model: { type: 'string' },
      agent: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  return {
    dryRun: values['dry-run'] ?? false,
    batchSize: positiveInteger('batch-size', values['batch-size'], DEFAULT_BATCH_SIZE),
    limit: positiveInteger('limit', values.limit, DEFAULT_CYCLE_LIMIT),
    model: values.model,
    agentName: values.agent,
    help: values.help ?? false,
  };
}

/**
 * 0 when there was nothing to review or something was kept (promoted or
 * extended); 1 when a non-empty backlog ended with nothing kept.
 */
export function exitCodeFor(report: ConsolidationReport): number {
  if (report.total === 0) return 0;
  return report.promoted + report.extended > 0 ? 0 : 1;
}

export function formatReport(report: ConsolidationReport): string {
  const lines = [
    `Total reviewed:      ${report.total}`,
    `Promoted (long):     ${report.promoted}`,
    `Extended (short):    ${report.extended}`,
    `Archived:            ${report.archived}`,
    `Forgotten:           ${report.forgotten}`,
    `Skipped batches:     ${report.skippedBatches}`,
    `Failed decisions:    ${report.failed}`,
  ];
  if (report.dryRun) {
    lines.push('', 'Dry run: nothing was changed. Run without --dry-run to apply.');
  }
  return lines.join('\n');
}
