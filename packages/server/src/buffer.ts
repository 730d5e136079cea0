import 'dotenv/config';
import pino from 'pino';
import { OfflineBuffer } from '@stratamem/core';
import { resolveOfflineBufferPath } from './config.js';
import { parseBufferArgs, runBufferCommand } from './bufferCli.js';

async function main(): Promise<void> {
  const defaultUrl = process.env.STRATAMEM_URL || `http://localhost:${process.env.PORT || 8080}`;
  const command = parseBufferArgs(process.argv.slice(2), defaultUrl);

  const logger = pino({ level: process.env.LOG_LEVEL || 'info' });
  const buffer = new OfflineBuffer(resolveOfflineBufferPath(), logger.child({ module: 'offline-buffer' }));

  console.log(await runBufferCommand(buffer, command));
}

main().catch(err => {
  console.error('Buffer command failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
