import type { Database } from 'better-sqlite3';
import { getDatabase, createArticlesTable } from '../database.js';
import type { ArticleKey, ArticleRef } from '../../core/journal/ArticleRef.js';
import type { CatalogArticle } from '../../ports/CatalogPort.js';
import { CatalogError, NotFoundError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export type NewArticle = Omit<ArticleRef, 'id'> & { id?: number };

interface ArticleRow {
  id: number;
  name: string;
  author: string;
  title: string;
  url: string;
  content: string;
  published_at: string;
  reading_time_seconds: number | null;
  read_count: number;
  last_read_at: string | null;
  deleted: number;
}

function rowToArticle(row: ArticleRow): CatalogArticle {
  return {
    id: row.id,
    name: row.name,
    author: row.author,
    title: row.title,
    url: row.url,
    content: row.content,
    publishedAt: row.published_at,
    ...(row.reading_time_seconds !== null ? { readingTimeSeconds: row.reading_time_seconds } : {}),
    readCount: row.read_count,
    ...(row.last_read_at !== null ? { lastReadAt: row.last_read_at } : {}),
  };
}

function sqliteCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

export class ArticleRepository {
  private readonly db: Database;
  private readonly logger = createLogger({ repository: 'ArticleRepository' });

  constructor(db?: Database) {
    this.db = db || getDatabase();
  }

  create(article: NewArticle): CatalogArticle {
    const stmt = this.db.prepare(`
      INSERT INTO articles (id, name, author, title, url, content, published_at, reading_time_seconds)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    try {
      const result = stmt.run(
        article.id ?? null,
        article.name,
        article.author,
        article.title,
        article.url,
        article.content,
        article.publishedAt,
        article.readingTimeSeconds ?? null
      );
      const id = Number(result.lastInsertRowid);
      this.logger.info({ id, author: article.author, title: article.title }, 'Article created');
      return { ...article, id, readCount: 0 };
    } catch (error) {
      const code = sqliteCode(error);
      if (code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
        this.logger.warn({ id: article.id }, 'Duplicate article id');
        throw new CatalogError(`Article with id ${article.id} already exists`, { cause: error });
      }
      if (code === 'SQLITE_CONSTRAINT_UNIQUE') {
        this.logger.warn(
          { author: article.author, title: article.title, url: article.url },
          'Duplicate article'
        );
        throw new CatalogError(
          `Article by '${article.author}' titled '${article.title}' at ${article.url} already exists`,
          { cause: error }
        );
      }
      throw error;
    }
  }

  getById(id: number): CatalogArticle | null {
    const row = this.db
      .prepare('SELECT * FROM articles WHERE id = ? AND deleted = 0')
      .get(id) as ArticleRow | undefined;
    return row ? rowToArticle(row) : null;
  }

  getByKey(key: ArticleKey): CatalogArticle | null {
    const row = this.db
      .prepare(
        'SELECT * FROM articles WHERE author = ? AND title = ? AND published_at = ? AND deleted = 0 ORDER BY id LIMIT 1'
      )
      .get(key.author, key.title, key.publishedAt) as ArticleRow | undefined;
    return row ? rowToArticle(row) : null;
  }

  listAll(sortByReadCount = false): CatalogArticle[] {
    const order = sortByReadCount ? 'ORDER BY read_count DESC, id' : 'ORDER BY id';
    const rows = this.db
      .prepare(`SELECT * FROM articles WHERE deleted = 0 ${order}`)
      .all() as ArticleRow[];
    if (rows.length === 0) {
      this.logger.warn('The article catalog is empty');
    }
    return rows.map(rowToArticle);
  }

  softDelete(id: number): void {
    const row = this.db.prepare('SELECT deleted FROM articles WHERE id = ?').get(id) as
      | Pick<ArticleRow, 'deleted'>
      | undefined;
    if (!row) {
      throw new NotFoundError(`Article with id ${id} not found`);
    }
    if (row.deleted) {
      throw new CatalogError(`Article with id ${id} has already been deleted`);
    }
    this.db.prepare('UPDATE articles SET deleted = 1 WHERE id = ?').run(id);
    this.logger.info({ id }, 'Article marked as deleted');
  }

  incrementReadCount(id: number, readAt: Date = new Date()): void {
    const result = this.db
      .prepare(
        'UPDATE articles SET read_count = read_count + 1, last_read_at = ? WHERE id = ? AND deleted = 0'
      )
      .run(readAt.toISOString(), id);
    if (result.changes === 0) {
      throw new NotFoundError(`Article with id ${id} not found or deleted`);
    }
  }

  /** Drops every article, deleted or not. */
  clear(): void {
    this.db.exec('DROP TABLE IF EXISTS articles');
    createArticlesTable(this.db);
    this.logger.info('Catalog cleared');
  }
}
