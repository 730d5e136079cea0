import 'dotenv/config';
import pino from 'pino';
import { SleepCycle, LifecycleManager } from '@stratamem/core';
import { loadConfig } from './config.js';
import { initDatabase } from './db/index.js';
import { SqlMemoryStore } from './store/sqlMemoryStore.js';
import { AnthropicDecisionService } from './services/anthropicDecisionService.js';
import { SLEEP_HELP, exitCodeFor, formatReport, parseSleepArgs } from './sleepCli.js';

async function main(): Promise<number> {
  const options = parseSleepArgs(process.argv.slice(2));
  if (options.help) {
    console.log(SLEEP_HELP);
    return 0;
  }

  const config = loadConfig();
  const logger = pino({ level: process.env.LOG_LEVEL || 'info' });
  const db = await initDatabase(config.dbPath);
  const store = new SqlMemoryStore(db);

  const cycle = new SleepCycle({
    lifecycle: new LifecycleManager({ store, logger: logger.child({ module: 'lifecycle' }) }),
    decisions: new AnthropicDecisionService({
      apiKey: config.anthropicApiKey,
      model: options.model ?? config.consolidationModel,
    }),
    logger: logger.child({ module: 'sleep-cycle' }),
  });

  const report = await cycle.run({
    agentName: options.agentName,
    limit: options.limit,
    batchSize: options.batchSize,
    dryRun: options.dryRun,
  });

  console.log(formatReport(report));
  return exitCodeFor(report);
}

main().then(
  code => process.exit(code),
  err => {
    console.error('Sleep cycle failed:', err instanceof Error ? err.message : err);
    process.exit(1);
  },
);
