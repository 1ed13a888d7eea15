import type { CatalogRepository } from '../persistence/repositories/CatalogRepository.js';
import type { RelayCoordinator } from '../core/relay/RelayCoordinator.js';
import { createLogger } from '../utils/logger.js';

/**
 * Refreshes catalog labels from the MAX chat titles and brings the running
 * pipelines in line with the catalog.
 */
export class CatalogSyncJob {
  private readonly logger = createLogger({ job: 'CatalogSyncJob' });

  constructor(
    private readonly catalog: Pick<CatalogRepository, 'listAll' | 'updateDisplayName'>,
    private readonly coordinator: Pick<RelayCoordinator, 'sync'>,
    private readonly chatTitles: () => Map<string, string>
  ) {}

  run(): void {
    const logger = this.logger.child({ method: 'run' });
    const titles = this.chatTitles();

    let renamed = 0;
    for (const entry of this.catalog.listAll()) {
      const title = titles.get(entry.chatId);
      if (title && title !== entry.displayName) {
        this.catalog.updateDisplayName(entry.chatId, title);
        renamed++;
      }
    }

    this.coordinator.sync();
    logger.debug({ renamed }, 'Catalog synchronised');
  }
}
