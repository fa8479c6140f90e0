import express from 'express';
import type { Express } from 'express';
import type { Server } from 'node:http';
import type { Database } from 'better-sqlite3';
import { createLogger, createRequestLogger } from './utils/logger.js';
import { checkDatabase } from './persistence/database.js';
import type { ArticleRepository } from './persistence/repositories/ArticleRepository.js';
import type { JournalSessionRegistry } from './core/journal/JournalSessionRegistry.js';
import { createSessionRouter } from './adapters/http/sessionRouter.js';
import { createCatalogRouter } from './adapters/http/catalogRouter.js';

const logger = createLogger({ component: 'server' });

export interface AppDependencies {
  database: Database;
  articleRepository: ArticleRepository;
  registry: JournalSessionRegistry;
}

export function createApp({ database, articleRepository, registry }: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // Request logging middleware
  app.use((req, _res, next) => {
    const requestLogger = createRequestLogger(logger);
    requestLogger.info({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  // Routes
  app.use('/api/sessions', createSessionRouter(registry));
  app.use('/api/articles', createCatalogRouter(articleRepository));

  // Health checks
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  app.get('/db-check', (_req, res) => {
    if (checkDatabase(database)) {
      res.status(200).json({ database_status: 'healthy' });
      return;
    }
    res.status(503).json({ database_status: 'unhealthy' });
  });

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if ('type' in err && err.type === 'entity.parse.failed') {
      res.status(400).json({ status: 'error', errorKind: 'InvalidArgument', message: 'Malformed JSON body' });
      return;
    }
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ status: 'error', message: 'Internal server error' });
  });

  return app;
}

export async function startServer(
  app: Express,
  port: number,
  host: string = '0.0.0.0'
): Promise<Server> {
  return new Promise((resolve) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
  });
}
