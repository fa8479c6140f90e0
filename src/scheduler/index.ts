import cron, { type ScheduledTask } from 'node-cron';
import { createLogger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import type { SessionSweepJob } from './SessionSweepJob.js';

const logger = createLogger({ component: 'scheduler' });

export function scheduleSessionSweep(job: SessionSweepJob, cronExpression: string): ScheduledTask {
  if (!cron.validate(cronExpression)) {
    throw new ConfigError(`Invalid SESSION_SWEEP_CRON expression: ${cronExpression}`);
  }

  logger.info({ cronExpression }, 'Scheduling session sweep job');

  return cron.schedule(cronExpression, () => {
    try {
      job.run();
    } catch (error) {
      logger.error({ error }, 'Session sweep job failed');
    }
  });
}
