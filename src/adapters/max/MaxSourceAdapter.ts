import { z } from 'zod';
import type { ConnectionState, InboundMessage, MediaRef, SourcePort } from '../../ports/SourcePort.js';
import { AsyncQueue } from '../../utils/AsyncQueue.js';
import { ConnectionLostError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { compareOffsets } from '../../persistence/OffsetStore.js';
import type { MaxClient } from './MaxClient.js';
import { parseMaxMessage } from './maxMessageParser.js';
import { idSchema, Opcode, toWireId, type MaxFrame } from './protocol.js';

/** The part of MaxClient the source adapter depends on. */
export type MaxTransport = Pick<MaxClient, 'request' | 'onPush' | 'onConnectionChange' | 'chats'>;

export interface MaxSourceAdapterOptions {
  /** Messages fetched per chat after a reconnect to cover the outage. */
  recoveryDepth: number;
}

interface LiveSubscription {
  queue: AsyncQueue<InboundMessage>;
  recovering: boolean;
  buffer: InboundMessage[];
}

const notificationSchema = z.object({ chatId: idSchema, message: z.unknown() }).passthrough();

const contactSchema = z
  .object({
    id: idSchema,
    names: z
      .array(
        z
          .object({
            name: z.string().nullish(),
            firstName: z.string().nullish(),
            lastName: z.string().nullish(),
          })
          .passthrough()
      )
      .nullish(),
  })
  .passthrough();

export function pickVideoUrl(payload: Record<string, unknown>): string | null {
  const urls = Object.entries(payload).filter(
    (entry): entry is [string, string] =>
      entry[0] !== 'EXTERNAL' && typeof entry[1] === 'string' && /^https?:\/\//.test(entry[1])
  );
  const preferred = urls.find(([key]) => key === 'MP4_720') ?? urls.find(([key]) => key.startsWith('MP4_')) ?? urls[0];
  return preferred ? preferred[1] : null;
}

/**
 * Source listener over the MAX client: per-chat live subscriptions fed from
 * message notifications, history queries, and recovery of the outage gap
 * after a reconnect.
 */
export class MaxSourceAdapter implements SourcePort {
  private readonly logger = createLogger({ adapter: 'MaxSourceAdapter' });
  private readonly subscriptions = new Map<string, Set<LiveSubscription>>();
  private readonly connectionListeners: Array<(state: ConnectionState) => void> = [];
  private disconnected = false;

  constructor(
    private readonly client: MaxTransport,
    private readonly options: MaxSourceAdapterOptions
  ) {
    client.onPush(Opcode.NOTIF_MESSAGE, (frame) => this.handleNotification(frame));
    client.onConnectionChange((state) => this.handleConnectionChange(state));
  }

  subscribeLive(chatId: string, signal?: AbortSignal): AsyncIterable<InboundMessage> {
    const subscription: LiveSubscription = {
      queue: new AsyncQueue<InboundMessage>(signal),
      recovering: false,
      buffer: [],
    };

    const subs = this.subscriptions.get(chatId) ?? new Set<LiveSubscription>();
    subs.add(subscription);
    this.subscriptions.set(chatId, subs);

    signal?.addEventListener('abort', () => this.unsubscribe(chatId, subscription), { once: true });
    this.logger.debug({ chatId }, 'Live subscription opened');
    return subscription.queue;
  }

  async fetchHistory(chatId: string, count: number): Promise<InboundMessage[]> {
    if (count <= 0) return [];

    const payload = await this.client.request(Opcode.CHAT_HISTORY, {
      chatId: toWireId(chatId),
      from: Date.now(),
      forward: 0,
      backward: count,
      getMessages: true,
    });

    const raw = Array.isArray(payload['messages']) ? payload['messages'] : [];
    const messages = raw
      .map((item: unknown) => parseMaxMessage(chatId, item))
      .filter((message): message is InboundMessage => message !== null)
      .sort((a, b) => compareOffsets(a.position, b.position));

    this.logger.debug({ chatId, requested: count, received: messages.length }, 'History fetched');
    return messages.slice(-count);
  }

  async resolveMediaUrl(message: InboundMessage, ref: MediaRef): Promise<string | null> {
    if (ref.url) return ref.url;
    if (!ref.id) return null;

    const target = {
      chatId: toWireId(message.chatId),
      messageId: toWireId(message.position),
    };

    if (ref.kind === 'video') {
      const payload = await this.client.request(Opcode.VIDEO_PLAY, { ...target, videoId: toWireId(ref.id) });
      return pickVideoUrl(payload);
    }
    if (ref.kind === 'file') {
      const payload = await this.client.request(Opcode.FILE_DOWNLOAD, { ...target, fileId: toWireId(ref.id) });
      const url = payload['url'];
      return typeof url === 'string' && url ? url : null;
    }
    return null;
  }

  async getUserName(userId: string): Promise<string | null> {
    const payload = await this.client.request(Opcode.CONTACT_INFO, { contactIds: [toWireId(userId)] });
    const contacts = Array.isArray(payload['contacts']) ? payload['contacts'] : [];

    for (const item of contacts) {
      const parsed = contactSchema.safeParse(item);
      if (!parsed.success || parsed.data.id !== userId) continue;
      const names = parsed.data.names?.[0];
      if (!names) return null;
      const full = [names.firstName, names.lastName].filter(Boolean).join(' ');
      return names.name || full || null;
    }
    return null;
  }

  getChatTitles(): Map<string, string> {
    const titles = new Map<string, string>();
    for (const chat of this.client.chats) {
      if (chat.title) titles.set(chat.id, chat.title);
    }
    return titles;
  }

  onConnectionChange(listener: (state: ConnectionState) => void): void {
    this.connectionListeners.push(listener);
  }

  private unsubscribe(chatId: string, subscription: LiveSubscription): void {
    const subs = this.subscriptions.get(chatId);
    if (!subs) return;
    subs.delete(subscription);
    if (subs.size === 0) this.subscriptions.delete(chatId);
    this.logger.debug({ chatId }, 'Live subscription closed');
  }

  private handleNotification(frame: MaxFrame): void {
    const parsed = notificationSchema.safeParse(frame.payload);
    if (!parsed.success) {
      this.logger.warn({ opcode: frame.opcode }, 'Ignoring malformed message notification');
      return;
    }

    const { chatId } = parsed.data;
    const subs = this.subscriptions.get(chatId);
    if (!subs || subs.size === 0) return;

    const message = parseMaxMessage(chatId, parsed.data.message);
    if (!message) return;

    for (const sub of subs) {
      if (sub.recovering) {
        sub.buffer.push(message);
      } else {
        sub.queue.push(message);
      }
    }
  }

  private handleConnectionChange(state: ConnectionState): void {
    if (state === 'disconnected') {
      this.disconnected = true;
      this.logger.warn({ chats: this.subscriptions.size }, 'MAX connection lost; live delivery paused');
    } else if (state === 'connected' && this.disconnected) {
      this.disconnected = false;
      for (const [chatId, subs] of this.subscriptions) {
        this.recover(chatId, [...subs]).catch((error: unknown) => {
          this.logger.error({ error, chatId }, 'Gap recovery failed');
        });
      }
    } else if (state === 'closed') {
      const error = new ConnectionLostError('MAX connection lost and reconnect attempts exhausted');
      for (const subs of this.subscriptions.values()) {
        for (const sub of subs) sub.queue.fail(error);
      }
      this.subscriptions.clear();
    }

    for (const listener of this.connectionListeners) {
      listener(state);
    }
  }

  /**
   * Pushes the chat's recent history ahead of anything that arrived live
   * while the history request was in flight. Consumers drop what they have
   * already processed.
   */
  private async recover(chatId: string, subs: LiveSubscription[]): Promise<void> {
    for (const sub of subs) sub.recovering = true;

    let history: InboundMessage[] = [];
    try {
      history = await this.fetchHistory(chatId, this.options.recoveryDepth);
      this.logger.info({ chatId, count: history.length }, 'Recovered messages after reconnect');
    } catch (error) {
      this.logger.warn({ error, chatId }, 'Could not fetch history after reconnect; gap not recovered');
    } finally {
      for (const sub of subs) {
        for (const message of history) sub.queue.push(message);
        for (const message of sub.buffer) sub.queue.push(message);
        sub.buffer = [];
        sub.recovering = false;
      }
    }
  }
}
