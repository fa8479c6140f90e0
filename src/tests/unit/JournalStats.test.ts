import { describe, it, expect } from 'vitest';
import { Journal } from '../../core/journal/Journal.js';
import {
  computeJournalStats,
  countWords,
  estimateReadingSeconds,
} from '../../core/journal/JournalStats.js';
import { makeArticle } from '../fixtures/articles.js';

describe('JournalStats', () => {
  it('counts whitespace-separated words', () => {
    expect(countWords('  alpha  beta\ngamma ')).toBe(3);
    expect(countWords('   ')).toBe(0);
  });

  it('prefers the catalog reading time over the word count', () => {
    expect(estimateReadingSeconds(makeArticle(1, { readingTimeSeconds: 90 }))).toBe(90);
    expect(estimateReadingSeconds(makeArticle(1, { content: 'one' }))).toBe(1);
  });

  it('reports zeros for an empty journal', () => {
    expect(computeJournalStats(new Journal())).toEqual({
      length: 0,
      duration: 0,
      remainingDuration: 0,
    });
  });

  it('sums durations and the part still ahead of the cursor', () => {
    const journal = new Journal();
    journal.append(makeArticle(1, { content: 'word '.repeat(400) }));
    journal.append(makeArticle(2, { readingTimeSeconds: 30 }));
    journal.append(makeArticle(3, { content: '' }));

    expect(computeJournalStats(journal)).toEqual({
      length: 3,
      duration: 150,
      remainingDuration: 150,
    });

    journal.advance();
    expect(computeJournalStats(journal).remainingDuration).toBe(30);
  });

  it('uses the configured reading speed', () => {
    const journal = new Journal();
    journal.append(makeArticle(1, { content: 'word '.repeat(400) }));

    expect(computeJournalStats(journal, { wordsPerMinute: 100 }).duration).toBe(240);
  });
});
