/**
 * API server entry point
 */

// Load .env before any module reads the environment
import 'dotenv/config';
import { resolveCachePath } from '../config/defaults.js';
import { createInstrumentStore } from '../lookup/factory.js';
import { createLogger } from '../utils/log.js';
import { createApp } from './server.js';

const logger = createLogger('api-main');
const PORT = Number(process.env.PORT) || 3001;

const { store, cache } = createInstrumentStore({
  cache_path: resolveCachePath(),
  use_llm: true,
});

const server = createApp({ store })
  .listen(PORT, () => {
    console.log(`\nAPI Server running at http://localhost:${PORT}`);
    console.log(`   Health check: http://localhost:${PORT}/health`);
    console.log(`   OPENAI_API_KEY: ${process.env.OPENAI_API_KEY ? '✓ Set' : '✗ Not set'}\n`);
  })
  .on('error', (error) => {
    logger.error({ error }, 'Server startup error');
    console.error('Failed to start server:', error);
    process.exit(1);
  });

process.on('SIGINT', () => {
  server.close(() => {
    cache.close();
    process.exit(0);
  });
});
