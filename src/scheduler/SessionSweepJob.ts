import type { JournalSessionRegistry } from '../core/journal/JournalSessionRegistry.js';
import { createLogger, createRequestLogger } from '../utils/logger.js';

export class SessionSweepJob {
  private readonly logger = createLogger({ job: 'SessionSweepJob' });

  constructor(
    private readonly registry: JournalSessionRegistry,
    private readonly now: () => Date = () => new Date()
  ) {}

  run(): number {
    const logger = createRequestLogger(this.logger);
    const removed = this.registry.sweepExpired(this.now());
    logger.info({ removed, active: this.registry.size() }, 'Session sweep completed');
    return removed;
  }
}
