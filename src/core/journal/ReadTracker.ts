import type { ArticleRef } from './ArticleRef.js';
import type { Journal } from './Journal.js';
import type { CatalogPort } from '../../ports/CatalogPort.js';
import { JournalExhaustedError, PartialFailureError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export interface ReadEvent {
  articleId: number;
  timestamp: Date;
}

export interface ReadOutcome {
  articles: ArticleRef[];
  events: ReadEvent[];
  /** Cursor after the read. */
  cursor: number;
}

export type ReadCountSink = Pick<CatalogPort, 'incrementReadCount'>;

/**
 * Moves a journal's cursor forward as articles are read and forwards a read
 * event per article to the catalog. The cursor moves before the event is sent;
 * a failed event surfaces as a PartialFailureError carrying the ReadOutcome.
 */
export class ReadTracker {
  private readonly logger = createLogger({ service: 'ReadTracker' });

  constructor(
    private readonly catalog: ReadCountSink,
    private readonly now: () => Date = () => new Date()
  ) {}

  readCurrent(journal: Journal): ArticleRef {
    const outcome = this.readFrom(journal, 1);
    const [article] = outcome.articles;
    if (article === undefined) {
      throw new JournalExhaustedError('Journal has been read to the end');
    }
    return article;
  }

  /** Rewinds, then reads every article. Only an empty journal is exhausted here. */
  readEntireJournal(journal: Journal): ReadOutcome {
    if (journal.isEmpty()) {
      throw new JournalExhaustedError('Journal is empty');
    }
    this.logger.info({ length: journal.length() }, 'Reading entire journal');
    journal.rewind();
    return this.readFrom(journal, journal.length());
  }

  readRestOfJournal(journal: Journal): ReadOutcome {
    const remaining = journal.length() - journal.cursor + 1;
    this.logger.info({ cursor: journal.cursor, remaining }, 'Reading rest of journal');
    return this.readFrom(journal, remaining);
  }

  rewind(journal: Journal): void {
    journal.rewind();
  }

  private readFrom(journal: Journal, count: number): ReadOutcome {
    if (journal.isExhausted()) {
      throw new JournalExhaustedError(
        journal.isEmpty() ? 'Journal is empty' : 'Journal has been read to the end'
      );
    }

    const articles: ArticleRef[] = [];
    const events: ReadEvent[] = [];
    const failures: Array<{ articleId: number; error: unknown }> = [];

    for (let i = 0; i < count && !journal.isExhausted(); i += 1) {
      const { article, articleNumber } = journal.advance();
      const event: ReadEvent = { articleId: article.id, timestamp: this.now() };
      articles.push(article);
      events.push(event);
      this.logger.info(
        { articleId: article.id, title: article.title, articleNumber, cursor: journal.cursor },
        'Read article'
      );

      try {
        this.catalog.incrementReadCount(article.id, event.timestamp);
      } catch (error) {
        this.logger.error({ articleId: article.id, error }, 'Failed to record read count');
        failures.push({ articleId: article.id, error });
      }
    }

    const outcome: ReadOutcome = { articles, events, cursor: journal.cursor };
    if (failures.length > 0) {
      const failedArticleIds = failures.map((failure) => failure.articleId);
      throw new PartialFailureError<ReadOutcome>(
        `Read ${articles.length} article(s) but failed to record read count for ${failedArticleIds.join(', ')}`,
        { outcome, failedArticleIds },
        { cause: failures.length === 1 ? failures[0]?.error : failures.map((f) => f.error) }
      );
    }
    return outcome;
  }
}
