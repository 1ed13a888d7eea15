import type { RelayRoute } from '../../config/index.js';
import type { CatalogEntry } from '../../persistence/repositories/CatalogRepository.js';
import { createLogger } from '../../utils/logger.js';
import { ChatPipeline, type ChatPipelineDeps, type PipelineStatus } from './ChatPipeline.js';

export interface RelayCoordinatorDeps extends Omit<ChatPipelineDeps, 'recipientsFor' | 'catalog'> {
  catalog: {
    get(chatId: string): CatalogEntry | null;
    listActive(): CatalogEntry[];
  };
  subscribers: { getSubscribers(chatId: string): string[] };
  routes: RelayRoute[];
}

/**
 * Runs one pipeline per active catalog chat and keeps the set of running
 * pipelines in line with the catalog.
 */
export class RelayCoordinator {
  private readonly logger = createLogger({ service: 'RelayCoordinator' });
  private readonly pipelines = new Map<string, ChatPipeline>();
  /** Pipelines of deactivated chats still finishing their message in flight */
  private readonly stopping = new Map<string, ChatPipeline>();
  private stopped = false;

  constructor(private readonly deps: RelayCoordinatorDeps) {}

  start(): void {
    this.stopped = false;
    this.sync();
  }

  /**
   * Starts pipelines for newly active chats and stops those for chats that
   * left the catalog. Failed pipelines are left as they are so the failure
   * stays visible in the status. A chat is not restarted while its previous
   * pipeline is still stopping.
   */
  sync(): void {
    if (this.stopped) return;
    const logger = this.logger.child({ method: 'sync' });
    const active = new Set(this.deps.catalog.listActive().map((entry) => entry.chatId));

    for (const chatId of active) {
      const existing = this.pipelines.get(chatId);
      if (existing && existing.currentState !== 'stopped') continue;
      if (this.stopping.has(chatId)) {
        logger.debug({ chatId }, 'Previous pipeline still stopping; restart deferred');
        continue;
      }

      const pipeline = new ChatPipeline(chatId, {
        ...this.deps,
        recipientsFor: (id) => this.recipientsFor(id),
      });
      this.pipelines.set(chatId, pipeline);
      pipeline.start();
      logger.info({ chatId }, 'Pipeline started');
    }

    for (const [chatId, pipeline] of this.pipelines) {
      if (active.has(chatId)) continue;
      this.pipelines.delete(chatId);
      this.stopping.set(chatId, pipeline);
      logger.info({ chatId }, 'Stopping pipeline for deactivated chat');
      pipeline
        .stop()
        .then(() => {
          this.stopping.delete(chatId);
          // Picks the chat up again if it was reactivated meanwhile
          this.sync();
        })
        .catch((error: unknown) => logger.error({ error, chatId }, 'Failed to stop pipeline'));
    }
  }

  /** Static route target first, then subscribers, without duplicates. */
  recipientsFor(chatId: string): string[] {
    const recipients = new Set<string>();
    for (const route of this.deps.routes) {
      if (route.sourceChatId === chatId && route.telegramChatId) recipients.add(route.telegramChatId);
    }
    for (const recipientId of this.deps.subscribers.getSubscribers(chatId)) {
      recipients.add(recipientId);
    }
    return [...recipients];
  }

  getStatus(): PipelineStatus[] {
    return [...this.pipelines.values()].map((pipeline) => pipeline.status);
  }

  /** Resolves once every current or stopping pipeline has stopped or failed. */
  async whenSettled(): Promise<void> {
    const all = [...this.pipelines.values(), ...this.stopping.values()];
    await Promise.all(all.map((pipeline) => pipeline.whenDone()));
  }

  async stop(): Promise<void> {
    this.stopped = true;
    for (const pipeline of this.pipelines.values()) {
      pipeline.requestStop();
    }
    await this.whenSettled();
    this.logger.info({ pipelines: this.pipelines.size }, 'All pipelines stopped');
  }
}
