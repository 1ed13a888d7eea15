import TelegramBot from 'node-telegram-bot-api';
import { z } from 'zod';
import type { CallbackAction, IncomingMessage, Keyboard, MessagePort } from '../../ports/MessagePort.js';
import type { DeliveryPort, OutgoingFile } from '../../ports/DeliveryPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { TelegramError } from '../../utils/errors.js';
import { isMessageNotModified, toDeliveryError } from './telegramErrors.js';

export type TelegramAdapterConfig = Pick<Config, 'telegramBotToken' | 'telegramWebhookUrl'>;

const userSchema = z.object({
  id: z.number(),
  username: z.string().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
});

const messageSchema = z.object({
  message_id: z.number(),
  date: z.number(),
  chat: z.object({ id: z.number() }),
  from: userSchema.optional(),
  text: z.string().optional(),
});

const callbackQuerySchema = z.object({
  id: z.string(),
  from: userSchema,
  data: z.string().optional(),
  message: z.object({ message_id: z.number(), chat: z.object({ id: z.number() }) }).optional(),
});

const updateSchema = z.object({
  message: messageSchema.optional(),
  callback_query: callbackQuerySchema.optional(),
});

type TelegramUser = z.infer<typeof userSchema>;
type TelegramMessage = z.infer<typeof messageSchema>;
type TelegramCallbackQuery = z.infer<typeof callbackQuerySchema>;

function fullName(user: TelegramUser | undefined): string | undefined {
  if (!user) return undefined;
  const name = [user.first_name, user.last_name].filter(Boolean).join(' ');
  return name || undefined;
}

function toInlineKeyboard(keyboard: Keyboard): TelegramBot.InlineKeyboardMarkup {
  return { inline_keyboard: keyboard.map((button) => [{ text: button.text, callback_data: button.data }]) };
}

/**
 * Telegram Bot API over node-telegram-bot-api. Serves as the relay's
 * delivery destination and as the transport of the subscription bot.
 */
export class TelegramAdapter implements MessagePort, DeliveryPort {
  private readonly logger = createLogger({ adapter: 'TelegramAdapter' });
  private readonly bot: TelegramBot;
  private readonly messageHandlers: Array<(message: IncomingMessage) => Promise<void>> = [];
  private readonly callbackHandlers: Array<(action: CallbackAction) => Promise<void>> = [];

  constructor(private readonly config: TelegramAdapterConfig) {
    // Use polling if no webhook URL is set, otherwise webhook mode
    const options: TelegramBot.ConstructorOptions = config.telegramWebhookUrl
      ? { webHook: false }
      : { polling: { interval: 300, autoStart: false } };
    this.bot = new TelegramBot(config.telegramBotToken, options);
  }

  async initialize(): Promise<void> {
    const logger = this.logger.child({ method: 'initialize' });
    logger.info('Initializing Telegram bot adapter');

    try {
      const me = await this.bot.getMe();
      logger.info({ botId: me.id, botUsername: me.username }, 'Telegram bot verified');

      this.setupHandlers();

      if (this.config.telegramWebhookUrl) {
        await this.setupWebhook(this.config.telegramWebhookUrl);
      } else {
        logger.info('No webhook URL configured, using polling mode');
        await this.bot.startPolling();
      }
    } catch (error) {
      logger.error({ error }, 'Failed to initialize Telegram adapter');
      throw new TelegramError('Failed to initialize Telegram adapter', { cause: error });
    }
  }

  async shutdown(): Promise<void> {
    if (this.bot.isPolling()) {
      await this.bot.stopPolling();
    }
  }

  private setupHandlers(): void {
    this.bot.on('message', (msg: TelegramBot.Message) => {
      this.dispatchMessage(msg).catch((error: unknown) => {
        this.logger.error({ error, chatId: msg.chat.id }, 'Error processing message');
      });
    });

    this.bot.on('callback_query', (query: TelegramBot.CallbackQuery) => {
      this.dispatchCallback(query).catch((error: unknown) => {
        this.logger.error({ error, callbackId: query.id }, 'Error processing callback');
      });
    });

    this.bot.on('error', (error: Error) => {
      this.logger.error({ error }, 'Telegram bot error');
    });

    // Polling errors (network blips, 409 if another poll is active, etc.) are usually transient
    this.bot.on('polling_error', (error: Error) => {
      this.logger.warn({ error }, 'Telegram polling error (polling will retry)');
    });
  }

  private async setupWebhook(webhookUrl: string): Promise<void> {
    const logger = this.logger.child({ method: 'setupWebhook' });
    try {
      await this.bot.setWebHook(webhookUrl);
      logger.info({ webhookUrl }, 'Webhook set successfully');
    } catch (error) {
      // Keep running so the HTTP server can receive updates once the URL is fixed
      logger.error({ error, webhookUrl }, 'Failed to set webhook');
    }
  }

  // DeliveryPort

  async sendText(recipientId: string, html: string): Promise<void> {
    try {
      await this.bot.sendMessage(recipientId, html, { parse_mode: 'HTML', disable_web_page_preview: true });
    } catch (error) {
      throw toDeliveryError(recipientId, error);
    }
  }

  async sendPhoto(recipientId: string, file: OutgoingFile): Promise<void> {
    try {
      await this.bot.sendPhoto(recipientId, file.data, {}, this.fileOptions(file));
    } catch (error) {
      throw toDeliveryError(recipientId, error);
    }
  }

  async sendDocument(recipientId: string, file: OutgoingFile): Promise<void> {
    try {
      await this.bot.sendDocument(recipientId, file.data, {}, this.fileOptions(file));
    } catch (error) {
      throw toDeliveryError(recipientId, error);
    }
  }

  async sendVideo(recipientId: string, file: OutgoingFile): Promise<void> {
    try {
      await this.bot.sendVideo(recipientId, file.data, {}, this.fileOptions(file));
    } catch (error) {
      throw toDeliveryError(recipientId, error);
    }
  }

  private fileOptions(file: OutgoingFile): TelegramBot.FileOptions {
    return file.contentType ? { filename: file.filename, contentType: file.contentType } : { filename: file.filename };
  }

  // MessagePort

  async sendMessage(to: string, text: string, keyboard?: Keyboard): Promise<void> {
    const logger = this.logger.child({ method: 'sendMessage', to });
    const options: TelegramBot.SendMessageOptions = { parse_mode: 'HTML' };
    if (keyboard) options.reply_markup = toInlineKeyboard(keyboard);

    try {
      const sent = await this.bot.sendMessage(to, text, options);
      logger.debug({ messageId: sent.message_id }, 'Message sent');
    } catch (error) {
      logger.error({ error }, 'Failed to send message');
      throw new TelegramError('Failed to send message', { cause: error });
    }
  }

  async editMessage(chatId: string, messageId: number, text: string, keyboard?: Keyboard): Promise<void> {
    const options: TelegramBot.EditMessageTextOptions = { chat_id: chatId, message_id: messageId, parse_mode: 'HTML' };
    if (keyboard) options.reply_markup = toInlineKeyboard(keyboard);

    try {
      await this.bot.editMessageText(text, options);
    } catch (error) {
      if (isMessageNotModified(error)) return;
      throw new TelegramError('Failed to edit message', { cause: error });
    }
  }

  async editKeyboard(chatId: string, messageId: number, keyboard: Keyboard): Promise<void> {
    try {
      await this.bot.editMessageReplyMarkup(toInlineKeyboard(keyboard), { chat_id: chatId, message_id: messageId });
    } catch (error) {
      if (isMessageNotModified(error)) return;
      throw new TelegramError('Failed to edit keyboard', { cause: error });
    }
  }

  async answerCallback(callbackId: string, text?: string, showAlert = false): Promise<void> {
    try {
      await this.bot.answerCallbackQuery(callbackId, text ? { text, show_alert: showAlert } : {});
    } catch (error) {
      throw new TelegramError('Failed to answer callback', { cause: error });
    }
  }

  onMessage(handler: (message: IncomingMessage) => Promise<void>): void {
    this.messageHandlers.push(handler);
  }

  onCallback(handler: (action: CallbackAction) => Promise<void>): void {
    this.callbackHandlers.push(handler);
  }

  async handleWebhook(update: unknown): Promise<void> {
    const logger = this.logger.child({ method: 'handleWebhook' });
    const parsed = updateSchema.safeParse(update);
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues }, 'Ignoring malformed webhook update');
      return;
    }

    if (parsed.data.message) {
      await this.dispatchMessage(parsed.data.message);
    } else if (parsed.data.callback_query) {
      await this.dispatchCallback(parsed.data.callback_query);
    } else {
      logger.debug('Webhook update carries neither a message nor a callback');
    }
  }

  private async dispatchMessage(msg: TelegramMessage): Promise<void> {
    const message = this.parseTelegramMessage(msg);
    if (!message) return;
    await Promise.all(this.messageHandlers.map((handler) => handler(message)));
  }

  private async dispatchCallback(query: TelegramCallbackQuery): Promise<void> {
    if (!query.data || !query.message) return;

    const action: CallbackAction = {
      id: query.id,
      from: String(query.from.id),
      chatId: String(query.message.chat.id),
      messageId: query.message.message_id,
      data: query.data,
    };
    if (query.from.username) action.username = query.from.username;
    const name = fullName(query.from);
    if (name) action.fullName = name;

    await Promise.all(this.callbackHandlers.map((handler) => handler(action)));
  }

  private parseTelegramMessage(msg: TelegramMessage): IncomingMessage | null {
    if (!msg.text) return null;

    const message: IncomingMessage = {
      id: String(msg.message_id),
      from: String(msg.chat.id),
      text: msg.text,
      timestamp: new Date(msg.date * 1000),
    };
    if (msg.from?.username) message.username = msg.from.username;
    const name = fullName(msg.from);
    if (name) message.fullName = name;
    return message;
  }
}
