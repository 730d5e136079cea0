import 'dotenv/config';
import { loadConfig } from './config.js';
import { initDatabase } from './db/index.js';
import { buildApp } from './app.js';
import { SqlMemoryStore } from './store/sqlMemoryStore.js';
import { HttpEmbeddingService } from './services/httpEmbeddingService.js';
import { AnthropicDecisionService } from './services/anthropicDecisionService.js';

async function main() {
  const config = loadConfig();
  const db = await initDatabase(config.dbPath);
  const decisions = config.anthropicApiKey
    ? new AnthropicDecisionService({ apiKey: config.anthropicApiKey, model: config.consolidationModel })
    : null;

  const app = await buildApp(config, {
    store: new SqlMemoryStore(db),
    embeddings: new HttpEmbeddingService(config.embedding),
    decisions,
  });

  if (!decisions) {
    app.log.warn('ANTHROPIC_API_KEY not set; POST /api/v1/sleep is disabled');
  }

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

main().catch(err => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
