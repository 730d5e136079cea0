import { parseArgs } from 'node:util';
import type { OfflineBuffer } from '@stratamem/core';

export const BUFFER_HELP = `
stratamem-buffer - inspect and replay the offline write buffer

Usage:
  npm run buffer -- <command> [options]

Commands:
  count                      Number of buffered records
  sync                       Deliver every record to the server, keeping failures
  clear                      Discard every buffered record
  remove-tag <tag>           Drop records carrying the tag

Options:
  --url <url>                Server for sync (default: STRATAMEM_URL or http://localhost:8080)
  --dry-run                  With remove-tag, only report what would be dropped
  -h, --help                 Show this help
`;

export type BufferCommand =
  | { kind: 'help' }
  | { kind: 'count' }
  | { kind: 'sync'; url: string }
  | { kind: 'clear' }
  | { kind: 'remove-tag'; tag: string; dryRun: boolean };

export function parseBufferArgs(argv: string[], defaultUrl: string): BufferCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      url: { type: 'string' },
      'dry-run': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const [command, ...rest] = positionals;
  if (values.help || command === undefined) return { kind: 'help' };

  switch (command) {
    case 'count':
    case 'clear':
      return { kind: command };
    case 'sync':
      return { kind: 'sync', url: values.url ?? defaultUrl };
    case 'remove-tag': {
      const [tag] = rest;
      if (!tag) throw new Error('remove-tag needs a tag');
      return { kind: 'remove-tag', tag, dryRun: values['dry-run'] ?? false };
    }
    default:
      throw new Error(`Unknown command "${command}"`);
  }
}

/** Runs one command and returns the text to print. */
export async function runBufferCommand(buffer: OfflineBuffer, command: BufferCommand): Promise<string> {
  switch (command.kind) {
    case 'help':
      return BUFFER_HELP;
    case 'count':
      return `${await buffer.count()} buffered record(s) in ${buffer.filePath}`;
    case 'sync': {
      const { synced, failed, unreadable } = await buffer.sync(command.url);
      return `Synced ${synced}, failed ${failed}, unreadable ${unreadable}`;
    }
    case 'clear':
      await buffer.clear();
      return `Cleared ${buffer.filePath}`;
    case 'remove-tag': {
      const { removed, remaining } = await buffer.removeByTag(command.tag, { dryRun: command.dryRun });
      const verb = command.dryRun ? 'Would remove' : 'Removed';
      return `${verb} ${removed.length} record(s) tagged "${command.tag}", ${remaining} remaining`;
    }
  }
}
