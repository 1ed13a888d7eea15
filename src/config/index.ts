import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const chatIdPattern = /^-?\d+$/;

export interface RelayRoute {
  sourceChatId: string;
  telegramChatId?: string;
}

/**
 * Parses `RELAY_ROUTES`, a comma separated list of `maxChatId[:telegramChatId]`.
 */
export function parseRoutes(raw: string | undefined): RelayRoute[] {
  if (!raw) return [];

  const routes: RelayRoute[] = [];
  for (const part of raw.split(',')) {
    const item = part.trim();
    if (!item) continue;

    const [source, target] = item.split(':').map((s) => s.trim());
    if (!source || !chatIdPattern.test(source)) {
      throw new ConfigError(`Invalid RELAY_ROUTES entry "${item}": MAX chat id must be an integer`);
    }
    if (target !== undefined && !chatIdPattern.test(target)) {
      throw new ConfigError(`Invalid RELAY_ROUTES entry "${item}": Telegram chat id must be an integer`);
    }
    routes.push(target ? { sourceChatId: source, telegramChatId: target } : { sourceChatId: source });
  }
  return routes;
}

const configSchema = z.object({
  // Telegram
  telegramBotToken: z.string().min(1),
  telegramWebhookUrl: z.string().url().optional(), // Optional: if not set, uses polling
  adminChatId: z.string().regex(chatIdPattern).optional(),

  // MAX
  maxToken: z.string().min(1),
  maxPhone: z.string().optional(),
  maxAppVersion: z.string().default('25.12.13'),
  maxWsUrl: z.string().url().default('wss://ws-api.oneme.ru/websocket'),
  maxDeviceId: z.string().uuid().optional(),
  maxReconnectAttempts: z.coerce.number().int().min(0).default(10),

  // Relay
  routes: z.array(z.object({ sourceChatId: z.string(), telegramChatId: z.string().optional() })),
  startupHistory: z.coerce.number().int().min(0).max(100).default(3),
  statePath: z.string().default('data/state.json'),
  databasePath: z.string().default('data/relay.db'),
  mediaFetchTimeoutMs: z.coerce.number().int().positive().default(30_000),
  mediaFetchAttempts: z.coerce.number().int().min(1).default(2),
  deliveryAttempts: z.coerce.number().int().min(1).default(3),
  mediaSendDelayMs: z.coerce.number().int().min(0).default(500),
  catalogSyncCron: z.string().default('*/1 * * * *'),

  // App
  timezone: z.string().default('UTC'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(5000),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    telegramBotToken: env('TELEGRAM_BOT_TOKEN'),
    telegramWebhookUrl: env('TELEGRAM_WEBHOOK_URL'),
    adminChatId: env('ADMIN_CHAT_ID'),
    maxToken: env('MAX_TOKEN'),
    maxPhone: env('MAX_PHONE'),
    maxAppVersion: env('MAX_APP_VERSION'),
    maxWsUrl: env('MAX_WS_URL'),
    maxDeviceId: env('MAX_DEVICE_ID'),
    maxReconnectAttempts: env('MAX_RECONNECT_ATTEMPTS'),
    routes: parseRoutes(env('RELAY_ROUTES')),
    startupHistory: env('STARTUP_HISTORY'),
    statePath: env('STATE_PATH'),
    databasePath: env('DATABASE_PATH'),
    mediaFetchTimeoutMs: env('MEDIA_FETCH_TIMEOUT_MS'),
    mediaFetchAttempts: env('MEDIA_FETCH_ATTEMPTS'),
    deliveryAttempts: env('DELIVERY_ATTEMPTS'),
    mediaSendDelayMs: env('MEDIA_SEND_DELAY_MS'),
    catalogSyncCron: env('CATALOG_SYNC_CRON'),
    timezone: env('TIMEZONE'),
    logLevel: env('LOG_LEVEL'),
    host: env('HOST'),
    port: env('PORT'),
  };

  try {
    return configSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}
