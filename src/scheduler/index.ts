import cron from 'node-cron';
import { createLogger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import type { CatalogSyncJob } from './CatalogSyncJob.js';

const logger = createLogger({ component: 'scheduler' });

export function scheduleCatalogSync(job: CatalogSyncJob, cronExpression: string, timezone: string): cron.ScheduledTask {
  if (!cron.validate(cronExpression)) {
    throw new ConfigError(`Invalid CATALOG_SYNC_CRON expression: ${cronExpression}`);
  }

  logger.info({ cronExpression, timezone }, 'Scheduling catalog sync job');

  return cron.schedule(
    cronExpression,
    () => {
      try {
        job.run();
      } catch (error) {
        logger.error({ error }, 'Catalog sync job failed');
      }
    },
    { timezone }
  );
}
