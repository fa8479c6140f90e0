import { type ArticleKey, type ArticleRef, matchesKey, toArticleRef } from './ArticleRef.js';
import {
  InvalidArgumentError,
  JournalExhaustedError,
  NotFoundError,
  OutOfRangeError,
} from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export interface JournalEntry {
  /** 1-based position; recomputed after every structural change. */
  articleNumber: number;
  article: ArticleRef;
}

/**
 * Ordered queue of articles with a read cursor.
 *
 * The cursor is the article number of the next unread entry and always lies in
 * [1, length + 1]; `length + 1` means the journal has been read to the end.
 * Article numbers are never stored, so they stay contiguous by construction.
 */
export class Journal {
  private readonly logger = createLogger({ component: 'Journal' });
  private articles: ArticleRef[] = [];
  private cursorPosition = 1;

  get cursor(): number {
    return this.cursorPosition;
  }

  length(): number {
    return this.articles.length;
  }

  isEmpty(): boolean {
    return this.articles.length === 0;
  }

  isExhausted(): boolean {
    return this.cursorPosition > this.articles.length;
  }

  entries(): JournalEntry[] {
    return this.articles.map((article, index) => ({ articleNumber: index + 1, article }));
  }

  // --- Article management ---

  append(ref: ArticleRef): number {
    const article = toArticleRef(ref);
    this.articles.push(article);
    this.logger.info(
      { articleId: article.id, articleNumber: this.articles.length },
      'Appended article to journal'
    );
    return this.articles.length;
  }

  removeByArticleNumber(articleNumber: number): ArticleRef {
    this.assertArticleNumber(articleNumber);
    const [removed] = this.articles.splice(articleNumber - 1, 1);
    if (removed === undefined) {
      throw new OutOfRangeError(`Invalid article number: ${articleNumber}`);
    }
    // At cursor == articleNumber the next entry slides into the cursor slot.
    if (this.cursorPosition > articleNumber) {
      this.cursorPosition -= 1;
    }
    this.logger.info(
      { articleId: removed.id, articleNumber, cursor: this.cursorPosition },
      'Removed article from journal'
    );
    return removed;
  }

  removeById(articleId: number): ArticleRef {
    return this.removeByArticleNumber(this.requireArticleNumberOf(articleId));
  }

  removeByKey(key: ArticleKey): ArticleRef {
    const index = this.articles.findIndex((article) => matchesKey(article, key));
    if (index === -1) {
      throw new NotFoundError(
        `No article by '${key.author}' titled '${key.title}' (${key.publishedAt}) in journal`
      );
    }
    return this.removeByArticleNumber(index + 1);
  }

  clear(): void {
    if (this.isEmpty()) {
      this.logger.warn('Clearing an empty journal');
    }
    this.articles = [];
    this.cursorPosition = 1;
    this.logger.info('Cleared journal');
  }

  // --- Retrieval ---

  getByArticleNumber(articleNumber: number): ArticleRef {
    this.assertArticleNumber(articleNumber);
    return this.at(articleNumber);
  }

  getById(articleId: number): ArticleRef {
    return this.at(this.requireArticleNumberOf(articleId));
  }

  /** Article number of the first entry with this id. */
  articleNumberOf(articleId: number): number | undefined {
    const index = this.articles.findIndex((article) => article.id === articleId);
    return index === -1 ? undefined : index + 1;
  }

  current(): JournalEntry {
    if (this.isExhausted()) {
      throw new JournalExhaustedError(
        this.isEmpty() ? 'Journal is empty' : 'Journal has been read to the end'
      );
    }
    return { articleNumber: this.cursorPosition, article: this.at(this.cursorPosition) };
  }

  // --- Reordering ---

  /**
   * Exchanges two slots. The cursor keeps its number and so may now point at a
   * different article.
   */
  swap(first: number, second: number): void {
    this.assertArticleNumber(first);
    this.assertArticleNumber(second);
    if (first === second) {
      throw new InvalidArgumentError(`Cannot swap article number ${first} with itself`);
    }
    const a = this.at(first);
    const b = this.at(second);
    this.articles[first - 1] = b;
    this.articles[second - 1] = a;
    this.logger.info({ first, second, cursor: this.cursorPosition }, 'Swapped articles');
  }

  /**
   * Moves one entry and shifts those in between by one slot. The cursor follows
   * the article it pointed at; an exhausted cursor stays exhausted.
   */
  moveToPosition(from: number, to: number): void {
    this.assertArticleNumber(from);
    this.assertArticleNumber(to);
    const [moved] = this.articles.splice(from - 1, 1);
    if (moved === undefined) {
      throw new OutOfRangeError(`Invalid article number: ${from}`);
    }
    this.articles.splice(to - 1, 0, moved);

    const cursor = this.cursorPosition;
    if (cursor === from) {
      this.cursorPosition = to;
    } else if (from < cursor && cursor <= to) {
      this.cursorPosition = cursor - 1;
    } else if (to <= cursor && cursor < from) {
      this.cursorPosition = cursor + 1;
    }
    this.logger.info(
      { articleId: moved.id, from, to, cursor: this.cursorPosition },
      'Moved article'
    );
  }

  moveToFront(articleNumber: number): void {
    this.moveToPosition(articleNumber, 1);
  }

  moveToEnd(articleNumber: number): void {
    this.moveToPosition(articleNumber, this.articles.length);
  }

  // --- Cursor ---

  goToArticleNumber(articleNumber: number): void {
    this.assertArticleNumber(articleNumber);
    this.cursorPosition = articleNumber;
    this.logger.info({ cursor: articleNumber }, 'Set current article number');
  }

  rewind(): void {
    this.cursorPosition = 1;
    this.logger.info('Rewound journal');
  }

  /** Steps past the current entry and returns it. */
  advance(): JournalEntry {
    const entry = this.current();
    this.cursorPosition += 1;
    return entry;
  }

  // --- Helpers ---

  private assertArticleNumber(articleNumber: number): void {
    if (
      !Number.isInteger(articleNumber) ||
      articleNumber < 1 ||
      articleNumber > this.articles.length
    ) {
      this.logger.warn(
        { articleNumber, length: this.articles.length },
        'Invalid article number'
      );
      throw new OutOfRangeError(
        `Invalid article number: ${articleNumber} (journal has ${this.articles.length} articles)`
      );
    }
  }

  private requireArticleNumberOf(articleId: number): number {
    const articleNumber = this.articleNumberOf(articleId);
    if (articleNumber === undefined) {
      this.logger.warn({ articleId }, 'Article not found in journal');
      throw new NotFoundError(`Article with id ${articleId} not found in journal`);
    }
    return articleNumber;
  }

  private at(articleNumber: number): ArticleRef {
    const article = this.articles[articleNumber - 1];
    if (article === undefined) {
      throw new OutOfRangeError(`Invalid article number: ${articleNumber}`);
    }
    return article;
  }
}
