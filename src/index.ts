import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './app';
import { loadConfig } from './config';
import { createLogger } from './logger';
import { RunStore } from './screening/runs';
import { createServices } from './services';

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.log);

  logger.info('🔧 Initializing services...');
  const { store, llm, pipeline } = await createServices(config, logger);

  const app = createApp({
    pipeline,
    runs: new RunStore(),
    store,
    llm,
    logger: logger.child({ component: 'http' }),
  });

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info(`🚀 Server running on http://localhost:${info.port}`);
  });
}

main().catch((error) => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});
