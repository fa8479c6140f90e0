import type { ArticleKey, ArticleRef } from '../core/journal/ArticleRef.js';

export interface CatalogArticle extends ArticleRef {
  readCount: number;
  lastReadAt?: string; // ISO timestamp
}

/**
 * The article catalog the journal draws from. Calls are synchronous so a read
 * can record its side effect before reporting success.
 */
export interface CatalogPort {
  fetchArticleById(id: number): ArticleRef | null;
  fetchArticleByKey(key: ArticleKey): ArticleRef | null;
  /** Throws when the article is unknown, deleted, or the store fails. */
  incrementReadCount(id: number, readAt?: Date): void;
  softDelete(id: number): void;
  listAll(options?: { sortByReadCount?: boolean }): CatalogArticle[];
}
