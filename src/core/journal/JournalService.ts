import { z } from 'zod';
import {
  type ArticleRef,
  articleKeySchema,
  formatIssues,
  toArticleRef,
  wholeNumberInput,
} from './ArticleRef.js';
import { Journal, type JournalEntry } from './Journal.js';
import { ReadTracker, type ReadOutcome } from './ReadTracker.js';
import {
  computeJournalStats,
  DEFAULT_WORDS_PER_MINUTE,
  type JournalStats,
} from './JournalStats.js';
import type { CatalogPort } from '../../ports/CatalogPort.js';
import {
  InvalidArgumentError,
  JournalOperationError,
  NotFoundError,
  PartialFailureError,
  type JournalErrorKind,
} from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export interface JournalFailure {
  status: 'error';
  errorKind: JournalErrorKind;
  message: string;
}

export type MutationResult =
  | { status: 'success'; articleNumber?: number }
  | (JournalFailure & { articleNumber?: number });

export interface ReadSuccess {
  status: 'success';
  article?: ArticleRef;
  articles?: ArticleRef[];
  cursor: number;
}

export type ReadResult =
  | ReadSuccess
  | (JournalFailure & { article?: ArticleRef; articles?: ArticleRef[]; cursor: number });

export interface StatsResult extends JournalStats {
  status: 'success';
}

export interface EntriesResult {
  status: 'success';
  entries: JournalEntry[];
  cursor: number;
  length: number;
}

export interface JournalServiceOptions {
  wordsPerMinute?: number;
}

const articleNumberSchema = wholeNumberInput(z.number().int('article number must be an integer'));
const articleIdSchema = wholeNumberInput(
  z.number().int('article id must be an integer').positive('article id must be positive')
);

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, label: string): T {
  if (input === null || input === undefined || input === '') {
    throw new InvalidArgumentError(`${label} is required`);
  }
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new InvalidArgumentError(`Invalid ${label}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function parseKey(input: unknown): z.infer<typeof articleKeySchema> {
  const result = articleKeySchema.safeParse(input);
  if (!result.success) {
    throw new InvalidArgumentError(`Invalid article key: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Boundary façade over one session's journal. Accepts loosely typed input,
 * delegates to the journal core and reports every journal error as a result
 * value. Errors outside the journal's vocabulary are rethrown.
 */
export class JournalService {
  private readonly logger = createLogger({ service: 'JournalService' });
  private readonly wordsPerMinute: number;

  constructor(
    private readonly catalog: CatalogPort,
    private readonly journal: Journal = new Journal(),
    private readonly readTracker: ReadTracker = new ReadTracker(catalog),
    options: JournalServiceOptions = {}
  ) {
    this.wordsPerMinute = options.wordsPerMinute ?? DEFAULT_WORDS_PER_MINUTE;
  }

  // --- Mutations ---

  addArticle(input: unknown): MutationResult {
    return this.mutate('addArticle', () => ({
      articleNumber: this.journal.append(toArticleRef(input)),
    }));
  }

  addArticleById(id: unknown): MutationResult {
    return this.mutate('addArticleById', () => {
      const articleId = parse(articleIdSchema, id, 'article id');
      const article = this.catalog.fetchArticleById(articleId);
      if (!article) {
        throw new NotFoundError(`Article with id ${articleId} not found in catalog`);
      }
      return { articleNumber: this.journal.append(article) };
    });
  }

  addArticleByKey(key: unknown): MutationResult {
    return this.mutate('addArticleByKey', () => {
      const parsed = parseKey(key);
      const article = this.catalog.fetchArticleByKey(parsed);
      if (!article) {
        throw new NotFoundError(
          `Article by '${parsed.author}' titled '${parsed.title}' (${parsed.publishedAt}) not found in catalog`
        );
      }
      return { articleNumber: this.journal.append(article) };
    });
  }

  removeByArticleNumber(articleNumber: unknown): MutationResult {
    return this.mutate('removeByArticleNumber', () => {
      this.journal.removeByArticleNumber(parse(articleNumberSchema, articleNumber, 'article number'));
      return {};
    });
  }

  removeById(id: unknown): MutationResult {
    return this.mutate('removeById', () => {
      this.journal.removeById(parse(articleIdSchema, id, 'article id'));
      return {};
    });
  }

  removeByKey(key: unknown): MutationResult {
    return this.mutate('removeByKey', () => {
      this.journal.removeByKey(parseKey(key));
      return {};
    });
  }

  swap(first: unknown, second: unknown): MutationResult {
    return this.mutate('swap', () => {
      this.journal.swap(
        parse(articleNumberSchema, first, 'article number'),
        parse(articleNumberSchema, second, 'article number')
      );
      return {};
    });
  }

  moveToPosition(from: unknown, to: unknown): MutationResult {
    return this.mutate('moveToPosition', () => {
      const source = parse(articleNumberSchema, from, 'article number');
      const target = parse(articleNumberSchema, to, 'article number');
      this.journal.moveToPosition(source, target);
      return { articleNumber: target };
    });
  }

  moveToFront(articleNumber: unknown): MutationResult {
    return this.mutate('moveToFront', () => {
      this.journal.moveToFront(parse(articleNumberSchema, articleNumber, 'article number'));
      return { articleNumber: 1 };
    });
  }

  moveToEnd(articleNumber: unknown): MutationResult {
    return this.mutate('moveToEnd', () => {
      this.journal.moveToEnd(parse(articleNumberSchema, articleNumber, 'article number'));
      return { articleNumber: this.journal.length() };
    });
  }

  goToArticleNumber(articleNumber: unknown): MutationResult {
    return this.mutate('goToArticleNumber', () => {
      const target = parse(articleNumberSchema, articleNumber, 'article number');
      this.journal.goToArticleNumber(target);
      return { articleNumber: target };
    });
  }

  clear(): MutationResult {
    return this.mutate('clear', () => {
      this.journal.clear();
      return {};
    });
  }

  // --- Reads ---

  readCurrent(): ReadResult {
    return this.read('readCurrent', () => {
      const article = this.readTracker.readCurrent(this.journal);
      return { article };
    });
  }

  readEntireJournal(): ReadResult {
    return this.read('readEntireJournal', () => ({
      articles: this.readTracker.readEntireJournal(this.journal).articles,
    }));
  }

  readRestOfJournal(): ReadResult {
    return this.read('readRestOfJournal', () => ({
      articles: this.readTracker.readRestOfJournal(this.journal).articles,
    }));
  }

  rewind(): ReadResult {
    return this.read('rewind', () => {
      this.readTracker.rewind(this.journal);
      return {};
    });
  }

  currentArticle(): ReadResult {
    return this.read('currentArticle', () => ({ article: this.journal.current().article }));
  }

  // --- Queries ---

  listEntries(): EntriesResult {
    return {
      status: 'success',
      entries: this.journal.entries(),
      cursor: this.journal.cursor,
      length: this.journal.length(),
    };
  }

  stats(): StatsResult {
    return {
      status: 'success',
      ...computeJournalStats(this.journal, { wordsPerMinute: this.wordsPerMinute }),
    };
  }

  // --- Error mapping ---

  private mutate(
    operation: string,
    run: () => { articleNumber?: number }
  ): MutationResult {
    try {
      const { articleNumber } = run();
      this.logger.info({ operation, articleNumber, cursor: this.journal.cursor }, 'Journal updated');
      return articleNumber === undefined ? { status: 'success' } : { status: 'success', articleNumber };
    } catch (error) {
      return this.toFailure(operation, error);
    }
  }

  private read(
    operation: string,
    run: () => { article?: ArticleRef; articles?: ArticleRef[] }
  ): ReadResult {
    try {
      return { status: 'success', ...run(), cursor: this.journal.cursor };
    } catch (error) {
      const failure = this.toFailure(operation, error);
      if (error instanceof PartialFailureError && isReadOutcome(error.outcome)) {
        const { articles } = error.outcome;
        return operation === 'readCurrent'
          ? { ...failure, article: articles[0], cursor: this.journal.cursor }
          : { ...failure, articles, cursor: this.journal.cursor };
      }
      return { ...failure, cursor: this.journal.cursor };
    }
  }

  private toFailure(operation: string, error: unknown): JournalFailure {
    if (!(error instanceof JournalOperationError)) {
      this.logger.error({ operation, error }, 'Unexpected error in journal operation');
      throw error;
    }
    const level = error.kind === 'PartialFailure' ? 'error' : 'warn';
    this.logger[level]({ operation, errorKind: error.kind, err: error }, 'Journal operation failed');
    return { status: 'error', errorKind: error.kind, message: error.message };
  }
}

function isReadOutcome(value: unknown): value is ReadOutcome {
  return (
    typeof value === 'object' &&
    value !== null &&
    'articles' in value &&
    Array.isArray(value.articles)
  );
}
