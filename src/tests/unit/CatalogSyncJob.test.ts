import { describe, it, expect, vi } from 'vitest';
import { CatalogSyncJob } from '../../scheduler/CatalogSyncJob.js';
import { scheduleCatalogSync } from '../../scheduler/index.js';
import { createMemoryDatabase } from '../../persistence/database.js';
import { CatalogRepository } from '../../persistence/repositories/CatalogRepository.js';
import { ConfigError } from '../../utils/errors.js';

describe('CatalogSyncJob', () => {
  it('renames chats whose MAX title changed and syncs pipelines', () => {
    const catalog = new CatalogRepository(createMemoryDatabase());
    catalog.add('-100');
    catalog.add('-200', 'Sport');
    const coordinator = { sync: vi.fn() };
    const titles = new Map([
      ['-100', 'News'],
      ['-300', 'Unknown chat'],
    ]);

    new CatalogSyncJob(catalog, coordinator, () => titles).run();

    expect(catalog.listAll().map((entry) => [entry.chatId, entry.displayName])).toEqual([
      ['-100', 'News'],
      ['-200', 'Sport'],
    ]);
    expect(coordinator.sync).toHaveBeenCalledTimes(1);
  });
});

describe('scheduleCatalogSync', () => {
  it('rejects an invalid cron expression', () => {
    const job = new CatalogSyncJob(
      new CatalogRepository(createMemoryDatabase()),
      { sync: vi.fn() },
      () => new Map()
    );

    expect(() => scheduleCatalogSync(job, 'every minute', 'UTC')).toThrow(ConfigError);
  });
});
