import { randomUUID } from 'node:crypto';
import { JournalService } from './JournalService.js';
import type { CatalogPort } from '../../ports/CatalogPort.js';
import { createLogger } from '../../utils/logger.js';

export interface JournalSession {
  sessionId: string;
  userId: string;
  createdAt: Date;
  lastSeenAt: Date;
  service: JournalService;
}

export interface JournalSessionRegistryOptions {
  ttlMinutes: number;
  wordsPerMinute?: number;
  now?: () => Date;
  generateId?: () => string;
}

/**
 * Owns one journal per logged-in session. Sessions are opened on login and
 * closed on logout or after `ttlMinutes` without activity.
 */
export class JournalSessionRegistry {
  private readonly logger = createLogger({ service: 'JournalSessionRegistry' });
  private readonly sessions = new Map<string, JournalSession>();
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly catalog: CatalogPort,
    private readonly options: JournalSessionRegistryOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  open(userId: string): JournalSession {
    const sessionId = this.generateId();
    const createdAt = this.now();
    const service = new JournalService(this.catalog, undefined, undefined, {
      wordsPerMinute: this.options.wordsPerMinute,
    });
    const session: JournalSession = { sessionId, userId, createdAt, lastSeenAt: createdAt, service };
    this.sessions.set(sessionId, session);
    this.logger.info({ sessionId, userId }, 'Opened journal session');
    return session;
  }

  /** Looks up a live session and marks it active. An idle one is closed instead. */
  get(sessionId: string): JournalSession | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return undefined;
    }
    const at = this.now();
    if (this.isExpired(session, at)) {
      this.expire(session);
      return undefined;
    }
    session.lastSeenAt = at;
    return session;
  }

  close(sessionId: string): boolean {
    const closed = this.sessions.delete(sessionId);
    if (closed) {
      this.logger.info({ sessionId }, 'Closed journal session');
    }
    return closed;
  }

  sweepExpired(at: Date = this.now()): number {
    let removed = 0;
    for (const session of [...this.sessions.values()]) {
      if (this.isExpired(session, at)) {
        this.expire(session);
        removed += 1;
      }
    }
    return removed;
  }

  size(): number {
    return this.sessions.size;
  }

  private isExpired(session: JournalSession, at: Date): boolean {
    return session.lastSeenAt.getTime() < at.getTime() - this.options.ttlMinutes * 60 * 1000;
  }

  private expire(session: JournalSession): void {
    this.sessions.delete(session.sessionId);
    this.logger.info(
      { sessionId: session.sessionId, userId: session.userId },
      'Expired journal session'
    );
  }
}
