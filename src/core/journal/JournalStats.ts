import type { ArticleRef } from './ArticleRef.js';
import type { Journal } from './Journal.js';

export const DEFAULT_WORDS_PER_MINUTE = 200;

export interface JournalStats {
  length: number;
  /** Estimated reading time of the whole journal, in seconds. */
  duration: number;
  /** Estimated reading time from the cursor to the end, in seconds. */
  remainingDuration: number;
}

export interface StatsOptions {
  wordsPerMinute?: number;
}

export function countWords(content: string): number {
  const trimmed = content.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}

export function estimateReadingSeconds(
  article: ArticleRef,
  wordsPerMinute: number = DEFAULT_WORDS_PER_MINUTE
): number {
  if (article.readingTimeSeconds !== undefined) {
    return article.readingTimeSeconds;
  }
  return Math.ceil((countWords(article.content) / wordsPerMinute) * 60);
}

export function computeJournalStats(journal: Journal, options: StatsOptions = {}): JournalStats {
  const wordsPerMinute = options.wordsPerMinute ?? DEFAULT_WORDS_PER_MINUTE;
  let duration = 0;
  let remainingDuration = 0;

  for (const { articleNumber, article } of journal.entries()) {
    const seconds = estimateReadingSeconds(article, wordsPerMinute);
    duration += seconds;
    if (articleNumber >= journal.cursor) {
      remainingDuration += seconds;
    }
  }

  return { length: journal.length(), duration, remainingDuration };
}
