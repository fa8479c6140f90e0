import { describe, it, expect, vi, beforeEach } from 'vitest';
import { JournalService } from '../../core/journal/JournalService.js';
import type { CatalogPort } from '../../ports/CatalogPort.js';
import { ids, makeArticle } from '../fixtures/articles.js';

describe('JournalService', () => {
  const a = makeArticle(1);
  const b = makeArticle(2);
  const c = makeArticle(3);
  let catalog: CatalogPort;
  let service: JournalService;

  beforeEach(() => {
    catalog = {
      fetchArticleById: vi.fn((id: number) => [a, b, c].find((article) => article.id === id) ?? null),
      fetchArticleByKey: vi.fn().mockReturnValue(null),
      incrementReadCount: vi.fn(),
      softDelete: vi.fn(),
      listAll: vi.fn().mockReturnValue([]),
    };
    service = new JournalService(catalog);
  });

  function fillABC(): void {
    service.addArticle(a);
    service.addArticle(b);
    service.addArticle(c);
  }

  function journalIds(): number[] {
    return ids(service.listEntries().entries.map((entry) => entry.article));
  }

  describe('adding articles', () => {
    it('appends a full article', () => {
      expect(service.addArticle(a)).toEqual({ status: 'success', articleNumber: 1 });
      expect(service.addArticle(b)).toEqual({ status: 'success', articleNumber: 2 });
    });

    it('reports a malformed article as InvalidArgument', () => {
      const result = service.addArticle({ id: 9, author: 'Someone' });

      expect(result).toMatchObject({ status: 'error', errorKind: 'InvalidArgument' });
      expect(service.listEntries().length).toBe(0);
    });

    it('resolves an id through the catalog', () => {
      expect(service.addArticleById('2')).toEqual({ status: 'success', articleNumber: 1 });
      expect(catalog.fetchArticleById).toHaveBeenCalledWith(2);
      expect(journalIds()).toEqual([2]);
    });

    it('reports an unknown id as NotFound', () => {
      expect(service.addArticleById(99)).toEqual({
        status: 'error',
        errorKind: 'NotFound',
        message: 'Article with id 99 not found in catalog',
      });
    });

    it('rejects a non-numeric id before asking the catalog', () => {
      expect(service.addArticleById('abc')).toMatchObject({
        status: 'error',
        errorKind: 'InvalidArgument',
      });
      expect(catalog.fetchArticleById).not.toHaveBeenCalled();
    });

    it.each([[true], [[2]], ['  ']])('rejects id %j without asking the catalog', (id) => {
      expect(service.addArticleById(id)).toMatchObject({ status: 'error', errorKind: 'InvalidArgument' });
      expect(catalog.fetchArticleById).not.toHaveBeenCalled();
    });

    it('resolves an author, title and date through the catalog', () => {
      catalog.fetchArticleByKey = vi.fn().mockReturnValue(c);

      const result = service.addArticleByKey({
        author: ' Author 3 ',
        title: 'Title 3',
        publishedAt: '2001-01-03',
      });

      expect(result).toEqual({ status: 'success', articleNumber: 1 });
      expect(catalog.fetchArticleByKey).toHaveBeenCalledWith({
        author: 'Author 3',
        title: 'Title 3',
        publishedAt: '2001-01-03',
      });
    });
  });

  describe('mutations', () => {
    beforeEach(fillABC);

    it('removes by article number given as a string', () => {
      expect(service.removeByArticleNumber('2')).toEqual({ status: 'success' });
      expect(journalIds()).toEqual([1, 3]);
    });

    it.each([
      [0, 'OutOfRange'],
      [4, 'OutOfRange'],
      ['two', 'InvalidArgument'],
      [1.5, 'InvalidArgument'],
      [null, 'InvalidArgument'],
      ['', 'InvalidArgument'],
      ['  ', 'InvalidArgument'],
      [true, 'InvalidArgument'],
      [[2], 'InvalidArgument'],
    ])('maps article number %j to %s', (input, errorKind) => {
      expect(service.removeByArticleNumber(input)).toMatchObject({ status: 'error', errorKind });
      expect(service.listEntries().length).toBe(3);
    });

    it('removes by id and by key', () => {
      expect(service.removeById(1)).toEqual({ status: 'success' });
      expect(
        service.removeByKey({ author: 'Author 3', title: 'Title 3', publishedAt: '2001-01-03' })
      ).toEqual({ status: 'success' });
      expect(journalIds()).toEqual([2]);
      expect(service.removeById(1)).toMatchObject({ status: 'error', errorKind: 'NotFound' });
    });

    it('leaves the journal alone when given non-numeric values', () => {
      expect(service.swap(true, 2)).toMatchObject({ status: 'error', errorKind: 'InvalidArgument' });
      expect(service.moveToFront([3])).toMatchObject({ status: 'error', errorKind: 'InvalidArgument' });
      expect(service.goToArticleNumber('  ')).toMatchObject({
        status: 'error',
        errorKind: 'InvalidArgument',
      });
      expect(journalIds()).toEqual([1, 2, 3]);
      expect(service.listEntries().cursor).toBe(1);
    });

    it('refuses to swap an article with itself', () => {
      expect(service.swap(2, '2')).toEqual({
        status: 'error',
        errorKind: 'InvalidArgument',
        message: 'Cannot swap article number 2 with itself',
      });
    });

    it('reports a swap outside the journal as OutOfRange', () => {
      expect(service.swap(1, 5)).toMatchObject({ status: 'error', errorKind: 'OutOfRange' });
    });

    it('moves and reports the new article number', () => {
      expect(service.moveToPosition(3, 1)).toEqual({ status: 'success', articleNumber: 1 });
      expect(journalIds()).toEqual([3, 1, 2]);
      expect(service.moveToEnd(1)).toEqual({ status: 'success', articleNumber: 3 });
      expect(journalIds()).toEqual([1, 2, 3]);
      expect(service.moveToFront(2)).toEqual({ status: 'success', articleNumber: 1 });
      expect(journalIds()).toEqual([2, 1, 3]);
    });

    it('clears the journal', () => {
      service.goToArticleNumber(3);

      expect(service.clear()).toEqual({ status: 'success' });
      expect(service.listEntries()).toEqual({ status: 'success', entries: [], cursor: 1, length: 0 });
    });
  });

  describe('reads', () => {
    it('reports reading an empty journal as JournalExhausted', () => {
      expect(service.readCurrent()).toEqual({
        status: 'error',
        errorKind: 'JournalExhausted',
        message: 'Journal is empty',
        cursor: 1,
      });
    });

    it('returns the article and the new cursor', () => {
      fillABC();

      expect(service.readCurrent()).toEqual({ status: 'success', article: a, cursor: 2 });
      expect(service.currentArticle()).toEqual({ status: 'success', article: b, cursor: 2 });
      expect(service.readRestOfJournal()).toEqual({
        status: 'success',
        articles: [b, c],
        cursor: 4,
      });
      expect(service.readRestOfJournal()).toMatchObject({
        status: 'error',
        errorKind: 'JournalExhausted',
        cursor: 4,
      });
      expect(service.rewind()).toEqual({ status: 'success', cursor: 1 });
      expect(service.readEntireJournal()).toEqual({
        status: 'success',
        articles: [a, b, c],
        cursor: 4,
      });
      expect(catalog.incrementReadCount).toHaveBeenCalledTimes(6);
    });

    it('reports a failed read count as PartialFailure with the article read', () => {
      fillABC();
      catalog.incrementReadCount = vi.fn(() => {
        throw new Error('Article with id 1 has been deleted');
      });

      expect(service.readCurrent()).toEqual({
        status: 'error',
        errorKind: 'PartialFailure',
        message: 'Read 1 article(s) but failed to record read count for 1',
        article: a,
        cursor: 2,
      });
    });

    it('reports a failed bulk read with every article read', () => {
      fillABC();
      catalog.incrementReadCount = vi.fn((id: number) => {
        if (id !== 2) {
          throw new Error('catalog unavailable');
        }
      });

      expect(service.readEntireJournal()).toEqual({
        status: 'error',
        errorKind: 'PartialFailure',
        message: 'Read 3 article(s) but failed to record read count for 1, 3',
        articles: [a, b, c],
        cursor: 4,
      });
    });
  });

  it('computes stats for the journal', () => {
    service.addArticle(makeArticle(1, { readingTimeSeconds: 60 }));
    service.addArticle(makeArticle(2, { readingTimeSeconds: 45 }));
    service.readCurrent();

    expect(service.stats()).toEqual({
      status: 'success',
      length: 2,
      duration: 105,
      remainingDuration: 45,
    });
  });

  it('rethrows errors that are not journal errors', () => {
    catalog.fetchArticleById = vi.fn(() => {
      throw new Error('database is locked');
    });

    expect(() => service.addArticleById(1)).toThrow('database is locked');
  });
});
