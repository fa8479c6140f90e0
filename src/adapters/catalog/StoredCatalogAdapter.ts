import type { CatalogArticle, CatalogPort } from '../../ports/CatalogPort.js';
import type { ArticleRepository } from '../../persistence/repositories/ArticleRepository.js';
import type { ArticleKey, ArticleRef } from '../../core/journal/ArticleRef.js';

// Journal entries keep only the article snapshot, not catalog bookkeeping.
function toSnapshot(article: CatalogArticle): ArticleRef {
  const { readCount: _readCount, lastReadAt: _lastReadAt, ...snapshot } = article;
  return Object.freeze(snapshot);
}

export class StoredCatalogAdapter implements CatalogPort {
  constructor(private readonly articleRepository: ArticleRepository) {}

  fetchArticleById(id: number): ArticleRef | null {
    const article = this.articleRepository.getById(id);
    return article ? toSnapshot(article) : null;
  }

  fetchArticleByKey(key: ArticleKey): ArticleRef | null {
    const article = this.articleRepository.getByKey(key);
    return article ? toSnapshot(article) : null;
  }

  incrementReadCount(id: number, readAt?: Date): void {
    this.articleRepository.incrementReadCount(id, readAt);
  }

  softDelete(id: number): void {
    this.articleRepository.softDelete(id);
  }

  listAll(options: { sortByReadCount?: boolean } = {}): CatalogArticle[] {
    return this.articleRepository.listAll(options.sortByReadCount ?? false);
  }
}
