import { describe, it, expect } from 'vitest';
import { toArticleRef } from '../../core/journal/ArticleRef.js';
import { InvalidArgumentError } from '../../utils/errors.js';

describe('toArticleRef', () => {
  const valid = {
    id: '7',
    name: 'Daily Planet',
    author: ' Lois Lane ',
    title: 'City Hall Report',
    url: 'https://example.com/city-hall',
    content: 'Council met today.',
    publishedAt: '2001-01-01T01:01:01Z',
  };

  it('coerces the id, trims names and freezes the snapshot', () => {
    const article = toArticleRef(valid);

    expect(article.id).toBe(7);
    expect(article.author).toBe('Lois Lane');
    expect(Object.isFrozen(article)).toBe(true);
  });

  it('fills optional text fields with empty strings', () => {
    const article = toArticleRef({ id: 1, author: 'A', title: 'T', publishedAt: '2020-02-02' });

    expect(article.name).toBe('');
    expect(article.url).toBe('');
    expect(article.content).toBe('');
    expect(article.readingTimeSeconds).toBeUndefined();
  });

  it.each([
    ['a missing title', { ...valid, title: undefined }],
    ['an empty author', { ...valid, author: '' }],
    ['a zero id', { ...valid, id: 0 }],
    ['a non-numeric id', { ...valid, id: 'seven' }],
    ['a boolean id', { ...valid, id: true }],
    ['an id wrapped in an array', { ...valid, id: [7] }],
    ['a blank id', { ...valid, id: '  ' }],
    ['a day past the end of the month', { ...valid, publishedAt: '2024-02-31' }],
    ['a thirteenth month', { ...valid, publishedAt: '2024-13-01' }],
    ['a year not after 1900', { ...valid, publishedAt: '1900-06-01' }],
    ['an unparseable date', { ...valid, publishedAt: 'yesterday' }],
  ])('rejects %s', (_label, input) => {
    expect(() => toArticleRef(input)).toThrow(InvalidArgumentError);
  });

  it('accepts a leap day', () => {
    expect(toArticleRef({ ...valid, publishedAt: '2024-02-29' }).publishedAt).toBe('2024-02-29');
  });

  it('names the failing field', () => {
    expect(() => toArticleRef({ ...valid, title: '' })).toThrow(
      'Invalid article: title: title is required'
    );
  });
});
