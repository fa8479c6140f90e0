// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { getDatabase, closeDatabase } from './persistence/database.js';
import { ArticleRepository } from './persistence/repositories/ArticleRepository.js';
import { StoredCatalogAdapter } from './adapters/catalog/StoredCatalogAdapter.js';
import { JournalSessionRegistry } from './core/journal/JournalSessionRegistry.js';
import { SessionSweepJob } from './scheduler/SessionSweepJob.js';
import { scheduleSessionSweep } from './scheduler/index.js';
import { createApp, startServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting reading journal service');

  try {
    const config = loadConfig();

    const database = getDatabase(config.databasePath);
    const articleRepository = new ArticleRepository(database);
    const catalog = new StoredCatalogAdapter(articleRepository);
    const registry = new JournalSessionRegistry(catalog, {
      ttlMinutes: config.sessionTtlMinutes,
      wordsPerMinute: config.wordsPerMinute,
    });

    const sweepTask = scheduleSessionSweep(new SessionSweepJob(registry), config.sessionSweepCron);

    const app = createApp({ database, articleRepository, registry });
    const server = await startServer(app, config.port, config.host);

    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Shutting down');
      sweepTask.stop();
      server.close((error) => {
        if (error) {
          logger.error({ error }, 'Error while closing HTTP server');
        }
        closeDatabase();
        process.exit(error ? 1 : 0);
      });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    logger.info(
      { host: config.host, port: config.port, logLevel: config.logLevel },
      'Server started successfully'
    );
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
