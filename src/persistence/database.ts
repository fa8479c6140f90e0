import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { join, dirname as pathDirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { mkdirSync } from 'node:fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = pathDirname(__filename);

const logger = createLogger({ component: 'database' });

let db: Database.Database | null = null;

export function getDatabase(dbPath?: string): Database.Database {
  if (db) {
    return db;
  }
  db = openDatabase(dbPath ?? process.env.DATABASE_PATH ?? join(__dirname, '../../data', 'journal.db'));
  return db;
}

/**
 * Opens a database and brings its schema up to date. `:memory:` gives a
 * private in-process database.
 */
export function openDatabase(dbPath: string): Database.Database {
  logger.info({ dbPath }, 'Initializing database');

  if (dbPath !== ':memory:') {
    mkdirSync(pathDirname(dbPath), { recursive: true });
  }

  const database = new Database(dbPath);
  if (dbPath !== ':memory:') {
    database.pragma('journal_mode = WAL');
  }
  database.pragma('foreign_keys = ON');

  runMigrations(database);
  return database;
}

export function createArticlesTable(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS articles (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL DEFAULT '',
      author TEXT NOT NULL,
      title TEXT NOT NULL,
      url TEXT NOT NULL DEFAULT '',
      content TEXT NOT NULL DEFAULT '',
      published_at TEXT NOT NULL,
      reading_time_seconds INTEGER,
      read_count INTEGER NOT NULL DEFAULT 0,
      last_read_at TEXT,
      deleted INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER DEFAULT (strftime('%s', 'now')),
      UNIQUE(author, title, url)
    );

    CREATE INDEX IF NOT EXISTS idx_articles_key ON articles(author, title, published_at);
  `);
}

function runMigrations(database: Database.Database): void {
  logger.info('Running database migrations');

  createArticlesTable(database);

  // Databases created before reading-time estimates were stored
  const info = database.prepare('PRAGMA table_info(articles)').all() as Array<{ name: string }>;
  const columns = new Set(info.map((c) => c.name));
  if (!columns.has('reading_time_seconds')) {
    database.exec('ALTER TABLE articles ADD COLUMN reading_time_seconds INTEGER');
    logger.info('Added reading_time_seconds column to articles table');
  }
  if (!columns.has('last_read_at')) {
    database.exec('ALTER TABLE articles ADD COLUMN last_read_at TEXT');
    logger.info('Added last_read_at column to articles table');
  }

  logger.info('Database migrations completed');
}

export function checkDatabase(database: Database.Database): boolean {
  try {
    database.prepare('SELECT 1').get();
    return true;
  } catch (error) {
    logger.error({ error }, 'Database check failed');
    return false;
  }
}

export function closeDatabase(): void {
  if (db) {
    logger.info('Closing database connection');
    db.close();
    db = null;
  }
}
