import type { InboundMessage, SourcePort } from '../../ports/SourcePort.js';
import type { CatalogEntry } from '../../persistence/repositories/CatalogRepository.js';
import { compareOffsets, type OffsetWriter } from '../../persistence/OffsetStore.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import type { ContentResolver } from './ContentResolver.js';
import type { DeliveryDispatcher } from './DeliveryDispatcher.js';
import type { PipelineState } from './types.js';

export interface ChatPipelineDeps {
  source: SourcePort;
  resolver: Pick<ContentResolver, 'resolve'>;
  dispatcher: Pick<DeliveryDispatcher, 'deliver'>;
  offsets: OffsetWriter;
  catalog: { get(chatId: string): CatalogEntry | null };
  /** Current recipients for a chat, looked up per message */
  recipientsFor: (chatId: string) => string[];
  /** Messages relayed on first start and fetched on catch-up */
  startupHistory: number;
}

export interface PipelineStatus {
  chatId: string;
  state: PipelineState;
  offset: string | null;
  relayed: number;
  error?: string;
}

/**
 * `aborted` means shutdown interrupted the relay before it settled; the
 * offset must not move past that message.
 */
type RelayOutcome = 'relayed' | 'deactivated' | 'aborted';

/**
 * Relays one source chat: subscribe live, backfill or catch up from history,
 * then process live messages in order. The offset for a message is written
 * only after its delivery has settled.
 */
export class ChatPipeline {
  private readonly logger: Logger;
  private readonly abort = new AbortController();
  private state: PipelineState = 'uninitialized';
  private relayed = 0;
  private lastError: Error | null = null;
  private run: Promise<void> | null = null;

  constructor(
    readonly chatId: string,
    private readonly deps: ChatPipelineDeps
  ) {
    this.logger = createLogger({ component: 'ChatPipeline', chatId });
  }

  get currentState(): PipelineState {
    return this.state;
  }

  get status(): PipelineStatus {
    const status: PipelineStatus = {
      chatId: this.chatId,
      state: this.state,
      offset: this.deps.offsets.get(this.chatId) ?? null,
      relayed: this.relayed,
    };
    if (this.lastError) status.error = this.lastError.message;
    return status;
  }

  start(): void {
    if (this.run) return;
    this.run = this.execute();
  }

  /** Resolves once the pipeline has stopped or failed. */
  whenDone(): Promise<void> {
    return this.run ?? Promise.resolve();
  }

  /** Aborts the subscription and any fetch or send in flight. */
  requestStop(): void {
    this.abort.abort();
  }

  async stop(): Promise<void> {
    this.requestStop();
    await this.whenDone();
  }

  private async execute(): Promise<void> {
    const signal = this.abort.signal;
    // Subscribe before reading history so nothing published meanwhile is lost
    const live = this.deps.source.subscribeLive(this.chatId, signal);

    try {
      const offset = this.deps.offsets.get(this.chatId);
      const outcome = offset === undefined ? await this.backfill() : await this.catchUp(offset);
      if (outcome !== 'relayed') {
        this.state = 'stopped';
        this.logger.info({ outcome, relayed: this.relayed }, 'Pipeline stopped');
        return;
      }

      this.state = 'live';
      this.logger.info({ offset: this.deps.offsets.get(this.chatId) ?? null }, 'Listening for live messages');

      for await (const message of live) {
        if (signal.aborted) break;
        if (!this.isNew(message)) {
          this.logger.debug({ position: message.position }, 'Skipping already relayed message');
          continue;
        }
        if ((await this.relay(message)) !== 'relayed') break;
        await this.deps.offsets.set(this.chatId, message.position);
      }

      this.state = 'stopped';
      this.logger.info({ relayed: this.relayed }, 'Pipeline stopped');
    } catch (error) {
      this.state = 'failed';
      this.lastError = error instanceof Error ? error : new Error(String(error));
      this.logger.error({ error }, 'Pipeline failed');
    } finally {
      this.abort.abort();
    }
  }

  /** First start: relay the latest messages and persist the newest offset. */
  private async backfill(): Promise<RelayOutcome> {
    this.state = 'backfilling';
    const history = await this.fetchHistory();
    if (history.length === 0) return 'relayed';

    this.logger.info({ count: history.length }, 'Backfilling latest messages');
    let last: InboundMessage | undefined;
    let outcome: RelayOutcome = 'relayed';
    for (const message of history) {
      outcome = this.abort.signal.aborted ? 'aborted' : await this.relay(message);
      if (outcome !== 'relayed') break;
      last = message;
    }
    // Only messages whose relay settled count as processed
    if (last) await this.deps.offsets.set(this.chatId, last.position);
    return outcome;
  }

  /** Restart: relay whatever recent history is newer than the stored offset. */
  private async catchUp(offset: string): Promise<RelayOutcome> {
    const missed = (await this.fetchHistory()).filter((message) => compareOffsets(message.position, offset) > 0);
    if (missed.length > 0) {
      this.logger.info({ count: missed.length, offset }, 'Catching up on messages missed while offline');
    }
    for (const message of missed) {
      const outcome = this.abort.signal.aborted ? 'aborted' : await this.relay(message);
      if (outcome !== 'relayed') return outcome;
      await this.deps.offsets.set(this.chatId, message.position);
    }
    return 'relayed';
  }

  private async fetchHistory(): Promise<InboundMessage[]> {
    try {
      return await this.deps.source.fetchHistory(this.chatId, this.deps.startupHistory);
    } catch (error) {
      this.logger.warn({ error }, 'Could not fetch history; continuing with live messages');
      return [];
    }
  }

  private isNew(message: InboundMessage): boolean {
    const offset = this.deps.offsets.get(this.chatId);
    return offset === undefined || compareOffsets(message.position, offset) > 0;
  }

  private async relay(message: InboundMessage): Promise<RelayOutcome> {
    const entry = this.deps.catalog.get(this.chatId);
    if (!entry || !entry.active) {
      this.logger.info({ position: message.position }, 'Chat is no longer in the active catalog');
      return 'deactivated';
    }

    const logger = this.logger.child({ position: message.position });
    try {
      const content = await this.deps.resolver.resolve(message, entry.displayName, this.abort.signal);
      const recipients = this.deps.recipientsFor(this.chatId);
      if (recipients.length === 0) {
        logger.debug('No recipients; message not delivered');
      } else {
        const attempts = await this.deps.dispatcher.deliver(content, recipients, this.abort.signal);
        const failed = attempts.filter((attempt) => attempt.status === 'failed').length;
        logger.info(
          { kind: content.kind, recipients: attempts.length, failed, skippedMedia: content.skipped.length },
          'Message relayed'
        );
      }
    } catch (error) {
      logger.error({ error }, 'Failed to relay message');
    }

    // Fetches and sends cut short by shutdown leave the message unsettled
    if (this.abort.signal.aborted) {
      logger.info('Relay interrupted by shutdown; message will be redelivered');
      return 'aborted';
    }

    this.relayed++;
    return 'relayed';
  }
}
