import { describe, it, expect, vi, beforeEach } from 'vitest';
import { JournalSessionRegistry } from '../../core/journal/JournalSessionRegistry.js';
import { SessionSweepJob } from '../../scheduler/SessionSweepJob.js';
import type { CatalogPort } from '../../ports/CatalogPort.js';
import { makeArticle } from '../fixtures/articles.js';

describe('JournalSessionRegistry', () => {
  const start = new Date('2026-05-01T09:00:00.000Z');
  const minutes = (n: number): Date => new Date(start.getTime() + n * 60 * 1000);
  let current: Date;
  let registry: JournalSessionRegistry;

  beforeEach(() => {
    current = start;
    let counter = 0;
    const catalog: CatalogPort = {
      fetchArticleById: vi.fn().mockReturnValue(null),
      fetchArticleByKey: vi.fn().mockReturnValue(null),
      incrementReadCount: vi.fn(),
      softDelete: vi.fn(),
      listAll: vi.fn().mockReturnValue([]),
    };
    registry = new JournalSessionRegistry(catalog, {
      ttlMinutes: 10,
      now: () => current,
      generateId: () => `session-${++counter}`,
    });
  });

  it('gives every session its own journal', () => {
    const first = registry.open('reader-1');
    const second = registry.open('reader-2');

    first.service.addArticle(makeArticle(1));

    expect(first.sessionId).toBe('session-1');
    expect(second.sessionId).toBe('session-2');
    expect(registry.get('session-1')?.service.listEntries().length).toBe(1);
    expect(registry.get('session-2')?.service.listEntries().length).toBe(0);
  });

  it('closes a session once', () => {
    registry.open('reader-1');

    expect(registry.close('session-1')).toBe(true);
    expect(registry.close('session-1')).toBe(false);
    expect(registry.get('session-1')).toBeUndefined();
  });

  it('expires sessions idle longer than the ttl', () => {
    registry.open('reader-1');
    registry.open('reader-2');

    current = minutes(5);
    registry.get('session-2');

    expect(registry.sweepExpired(minutes(14))).toBe(1);
    expect(registry.get('session-1')).toBeUndefined();
    expect(registry.size()).toBe(1);

    current = minutes(14);
    registry.get('session-2');
    expect(registry.sweepExpired(minutes(16))).toBe(0);
    expect(registry.size()).toBe(1);
  });

  it('does not hand out a session past its ttl before the sweep runs', () => {
    registry.open('reader-1');

    current = minutes(10);
    expect(registry.get('session-1')?.sessionId).toBe('session-1');

    current = minutes(21);
    expect(registry.get('session-1')).toBeUndefined();
    expect(registry.size()).toBe(0);
  });

  it('runs the sweep from the scheduled job', () => {
    registry.open('reader-1');

    const job = new SessionSweepJob(registry, () => minutes(11));

    expect(job.run()).toBe(1);
    expect(registry.size()).toBe(0);
  });
});
