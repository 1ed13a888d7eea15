import type { CallbackAction, IncomingMessage, Keyboard, MessagePort } from '../../ports/MessagePort.js';
import type { CatalogRepository } from '../../persistence/repositories/CatalogRepository.js';
import type { Recipient, SubscriberRepository } from '../../persistence/repositories/SubscriberRepository.js';
import { escapeHtml } from '../relay/messageFormatter.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';

export const MENU_TEXT = 'Choose the MAX chats you want to receive:';
export const ADMIN_MENU_TEXT = 'Admin menu';
export const ACCESS_DENIED = 'Access denied';
export const NUMERIC_ID_REQUIRED = 'A numeric MAX chat id is required.';
export const NO_SUBSCRIPTIONS = 'No subscriptions.';

const chatIdPattern = /^-?\d+$/;

type PendingInput = 'add' | 'hide' | 'broadcast';

export interface SubscriptionBotDependencies {
  messagePort: MessagePort;
  catalog: Pick<CatalogRepository, 'get' | 'listActive' | 'add' | 'deactivate'>;
  subscribers: Pick<
    SubscriberRepository,
    'ensureRecipient' | 'subscribe' | 'unsubscribe' | 'getRecipientChats' | 'listRecipients'
  >;
  adminChatId?: string;
  /** Known MAX chat title, used when the admin adds a chat */
  chatTitle?: (chatId: string) => string | undefined;
  /** Called after the admin changes the catalog */
  onCatalogChanged?: () => void;
}

function recipientLabel(recipient: Recipient): string {
  if (recipient.name && recipient.username) return `${recipient.name} (@${recipient.username})`;
  if (recipient.name) return recipient.name;
  if (recipient.username) return `@${recipient.username}`;
  return recipient.recipientId;
}

/**
 * Telegram bot through which users pick the MAX chats they receive, and
 * through which the admin curates the catalog.
 */
export class SubscriptionBot {
  private readonly logger = createLogger({ service: 'SubscriptionBot' });
  private readonly pendingInput = new Map<string, PendingInput>();

  constructor(private readonly deps: SubscriptionBotDependencies) {
    deps.messagePort.onMessage((message) => this.handleMessage(message));
    deps.messagePort.onCallback((action) => this.handleCallback(action));
  }

  isAdmin(userId: string): boolean {
    return this.deps.adminChatId !== undefined && this.deps.adminChatId === userId;
  }

  mainKeyboard(userId: string): Keyboard {
    const subscribed = new Set(this.deps.subscribers.getRecipientChats(userId));
    const keyboard: Keyboard = this.deps.catalog.listActive().map((entry) =>
      subscribed.has(entry.chatId)
        ? { text: `✅ ${entry.displayName}`, data: `unsub:${entry.chatId}` }
        : { text: `➕ ${entry.displayName}`, data: `sub:${entry.chatId}` }
    );
    keyboard.push({ text: 'My subscriptions', data: 'my' });
    if (this.isAdmin(userId)) keyboard.push({ text: 'Admin', data: 'admin' });
    return keyboard;
  }

  adminKeyboard(): Keyboard {
    return [
      { text: 'Add chat', data: 'admin_add' },
      { text: 'Hide chat', data: 'admin_hide' },
      { text: 'Users', data: 'admin_users' },
      { text: 'Broadcast', data: 'admin_broadcast' },
      { text: 'Back', data: 'back' },
    ];
  }

  async handleMessage(message: IncomingMessage): Promise<void> {
    const logger = this.logger.child({ method: 'handleMessage', from: message.from, requestId: generateCorrelationId() });
    const text = message.text.trim();

    if (text === '/start' || text.startsWith('/start ')) {
      this.deps.subscribers.ensureRecipient(message.from, message.username, message.fullName);
      this.pendingInput.delete(message.from);
      await this.deps.messagePort.sendMessage(message.from, MENU_TEXT, this.mainKeyboard(message.from));
      logger.info('Menu shown');
      return;
    }

    const pending = this.pendingInput.get(message.from);
    if (!pending || !this.isAdmin(message.from)) return;

    if (pending === 'broadcast') {
      this.pendingInput.delete(message.from);
      await this.broadcast(message.from, text);
      return;
    }

    if (!chatIdPattern.test(text)) {
      await this.deps.messagePort.sendMessage(message.from, NUMERIC_ID_REQUIRED);
      return;
    }
    this.pendingInput.delete(message.from);

    if (pending === 'add') {
      const entry = this.deps.catalog.add(text, this.deps.chatTitle?.(text));
      logger.info({ chatId: text }, 'Chat added to catalog');
      await this.deps.messagePort.sendMessage(message.from, `Chat <b>${escapeHtml(entry.displayName)}</b> added.`);
    } else {
      const hidden = this.deps.catalog.deactivate(text);
      logger.info({ chatId: text, hidden }, 'Chat hide requested');
      await this.deps.messagePort.sendMessage(
        message.from,
        hidden ? `Chat <code>${text}</code> hidden.` : `Chat <code>${text}</code> is not in the catalog.`
      );
    }
    this.deps.onCatalogChanged?.();
  }

  async handleCallback(action: CallbackAction): Promise<void> {
    const logger = this.logger.child({ method: 'handleCallback', from: action.from, data: action.data });
    const { messagePort } = this.deps;
    const [command = '', argument] = action.data.split(':', 2);

    if (command.startsWith('admin') && !this.isAdmin(action.from)) {
      logger.warn('Admin action refused');
      await messagePort.answerCallback(action.id, ACCESS_DENIED, true);
      return;
    }

    switch (command) {
      case 'sub':
      case 'unsub': {
        if (!argument) break;
        await this.toggle(action, command === 'sub' ? 'sub' : 'unsub', argument);
        return;
      }
      case 'my': {
        await messagePort.editMessage(action.chatId, action.messageId, this.subscriptionsText(action.from), [
          { text: 'Back', data: 'back' },
        ]);
        break;
      }
      case 'back': {
        await messagePort.editMessage(action.chatId, action.messageId, MENU_TEXT, this.mainKeyboard(action.from));
        break;
      }
      case 'admin': {
        await messagePort.editMessage(action.chatId, action.messageId, ADMIN_MENU_TEXT, this.adminKeyboard());
        break;
      }
      case 'admin_add':
      case 'admin_hide':
      case 'admin_broadcast': {
        const input: PendingInput = command === 'admin_add' ? 'add' : command === 'admin_hide' ? 'hide' : 'broadcast';
        this.pendingInput.set(action.from, input);
        await messagePort.sendMessage(
          action.from,
          input === 'broadcast' ? 'Send the message to broadcast.' : `Send the MAX chat id to ${input}.`
        );
        break;
      }
      case 'admin_users': {
        await messagePort.sendMessage(action.from, this.usersText());
        break;
      }
      default:
        logger.debug('Unknown callback');
    }

    await messagePort.answerCallback(action.id);
  }

  private async toggle(action: CallbackAction, command: 'sub' | 'unsub', chatId: string): Promise<void> {
    const { messagePort, subscribers } = this.deps;
    const entry = this.deps.catalog.get(chatId);

    if (command === 'sub') {
      if (!entry || !entry.active) {
        await messagePort.answerCallback(action.id, 'This chat is no longer available', true);
        return;
      }
      subscribers.ensureRecipient(action.from, action.username, action.fullName);
      subscribers.subscribe(action.from, chatId);
      this.logger.info({ from: action.from, chatId }, 'Subscribed');
    } else {
      subscribers.unsubscribe(action.from, chatId);
      this.logger.info({ from: action.from, chatId }, 'Unsubscribed');
    }

    await messagePort.editKeyboard(action.chatId, action.messageId, this.mainKeyboard(action.from));
    await messagePort.answerCallback(action.id, command === 'sub' ? 'Subscribed' : 'Unsubscribed');

    if (command === 'sub' && entry) {
      await this.notifyAdmin(action, entry.displayName);
    }
  }

  private async notifyAdmin(action: CallbackAction, label: string): Promise<void> {
    const adminChatId = this.deps.adminChatId;
    if (!adminChatId || adminChatId === action.from) return;

    const who = recipientLabel({
      recipientId: action.from,
      ...(action.username ? { username: action.username } : {}),
      ...(action.fullName ? { name: action.fullName } : {}),
    });
    try {
      await this.deps.messagePort.sendMessage(
        adminChatId,
        `${escapeHtml(who)} subscribed to <b>${escapeHtml(label)}</b>`
      );
    } catch (error) {
      this.logger.warn({ error }, 'Failed to notify admin');
    }
  }

  subscriptionsText(userId: string): string {
    const labels = this.deps.subscribers
      .getRecipientChats(userId)
      .map((chatId) => this.deps.catalog.get(chatId)?.displayName ?? chatId);
    if (labels.length === 0) return NO_SUBSCRIPTIONS;
    return ['Your subscriptions:', ...labels.map((label) => `• ${escapeHtml(label)}`)].join('\n');
  }

  usersText(): string {
    const recipients = this.deps.subscribers.listRecipients();
    if (recipients.length === 0) return 'No users.';

    const lines = recipients.map((recipient) => {
      const chats = this.deps.subscribers
        .getRecipientChats(recipient.recipientId)
        .map((chatId) => this.deps.catalog.get(chatId)?.displayName ?? chatId);
      return `• ${escapeHtml(recipientLabel(recipient))}: ${chats.length > 0 ? escapeHtml(chats.join(', ')) : '-'}`;
    });
    return [`Users (${recipients.length}):`, ...lines].join('\n');
  }

  private async broadcast(adminId: string, text: string): Promise<void> {
    const recipients = this.deps.subscribers.listRecipients();
    let sent = 0;
    for (const recipient of recipients) {
      try {
        await this.deps.messagePort.sendMessage(recipient.recipientId, escapeHtml(text));
        sent++;
      } catch (error) {
        this.logger.warn({ error, recipientId: recipient.recipientId }, 'Broadcast message not delivered');
      }
    }
    this.logger.info({ sent, total: recipients.length }, 'Broadcast finished');
    await this.deps.messagePort.sendMessage(adminId, `Broadcast sent to ${sent} of ${recipients.length} users.`);
  }
}
