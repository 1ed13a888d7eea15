// Load environment variables first
import 'dotenv/config';

import type { Server } from 'node:http';
import type { ScheduledTask } from 'node-cron';
import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { OffsetStore } from './persistence/OffsetStore.js';
import { closeDatabase, getDatabase } from './persistence/database.js';
import { CatalogRepository } from './persistence/repositories/CatalogRepository.js';
import { SubscriberRepository } from './persistence/repositories/SubscriberRepository.js';
import { MaxClient } from './adapters/max/MaxClient.js';
import { MaxSourceAdapter } from './adapters/max/MaxSourceAdapter.js';
import { TelegramAdapter } from './adapters/telegram/TelegramAdapter.js';
import { createHttpFetcher } from './adapters/http/mediaFetcher.js';
import { ContentResolver } from './core/relay/ContentResolver.js';
import { DeliveryDispatcher } from './core/relay/DeliveryDispatcher.js';
import { RelayCoordinator } from './core/relay/RelayCoordinator.js';
import { SubscriptionBot } from './core/subscriptions/SubscriptionBot.js';
import { CatalogSyncJob } from './scheduler/CatalogSyncJob.js';
import { scheduleCatalogSync } from './scheduler/index.js';
import { startServer } from './server.js';

const logger = createLogger({ component: 'index' });

function maskPhone(phone: string): string {
  return phone.length <= 4 ? '****' : `${'*'.repeat(phone.length - 4)}${phone.slice(-4)}`;
}

async function main(): Promise<void> {
  const config = loadConfig();
  logger.info(
    { routes: config.routes.length, startupHistory: config.startupHistory, ...(config.maxPhone ? { phone: maskPhone(config.maxPhone) } : {}) },
    'Starting MAX to Telegram relay'
  );

  const offsets = new OffsetStore(config.statePath);
  await offsets.load();

  const db = getDatabase(config.databasePath);
  const catalog = new CatalogRepository(db);
  const subscribers = new SubscriberRepository(db);
  const seeded = catalog.seed(config.routes.map((route) => route.sourceChatId));
  if (seeded > 0) logger.info({ seeded }, 'Catalog seeded from RELAY_ROUTES');

  const maxClient = new MaxClient({
    url: config.maxWsUrl,
    token: config.maxToken,
    appVersion: config.maxAppVersion,
    maxReconnectAttempts: config.maxReconnectAttempts,
    ...(config.maxDeviceId ? { deviceId: config.maxDeviceId } : {}),
  });
  const source = new MaxSourceAdapter(maxClient, { recoveryDepth: config.startupHistory });
  await maxClient.start();

  const telegram = new TelegramAdapter(config);
  await telegram.initialize();

  // Chat titles from the login response become catalog labels
  for (const [chatId, title] of source.getChatTitles()) {
    catalog.updateDisplayName(chatId, title);
  }

  const coordinator = new RelayCoordinator({
    source,
    resolver: new ContentResolver(source, createHttpFetcher({ timeoutMs: config.mediaFetchTimeoutMs }), {
      timeZone: config.timezone,
      fetchAttempts: config.mediaFetchAttempts,
    }),
    dispatcher: new DeliveryDispatcher(telegram, {
      maxAttempts: config.deliveryAttempts,
      mediaSendDelayMs: config.mediaSendDelayMs,
    }),
    offsets,
    catalog,
    subscribers,
    routes: config.routes,
    startupHistory: config.startupHistory,
  });

  new SubscriptionBot({
    messagePort: telegram,
    catalog,
    subscribers,
    ...(config.adminChatId ? { adminChatId: config.adminChatId } : {}),
    chatTitle: (chatId) => source.getChatTitles().get(chatId),
    onCatalogChanged: () => coordinator.sync(),
  });

  const syncJob = new CatalogSyncJob(catalog, coordinator, () => source.getChatTitles());
  coordinator.start();
  const syncTask = scheduleCatalogSync(syncJob, config.catalogSyncCron, config.timezone);

  const server = await startServer(
    { telegram, status: () => coordinator.getStatus(), sourceConnected: () => maxClient.isOpen },
    config.port,
    config.host
  );

  let shuttingDown = false;
  const shutdown = async (reason: string, exitCode: number): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ reason }, 'Shutting down');

    await stopAll({ syncTask, server, coordinator, offsets, telegram, maxClient }).catch((error: unknown) => {
      logger.error({ error }, 'Error during shutdown');
      exitCode = 1;
    });
    closeDatabase();
    process.exit(exitCode);
  };

  source.onConnectionChange((state) => {
    if (state === 'closed') {
      logger.fatal('MAX connection could not be re-established; exiting');
      shutdown('source connection lost', 1).catch((error: unknown) => logger.error({ error }, 'Shutdown failed'));
    }
  });
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal, 0).catch((error: unknown) => logger.error({ error }, 'Shutdown failed'));
    });
  }

  logger.info({ host: config.host, port: config.port, pipelines: coordinator.getStatus().length }, 'Relay started');
}

async function stopAll(parts: {
  syncTask: ScheduledTask;
  server: Server;
  coordinator: RelayCoordinator;
  offsets: OffsetStore;
  telegram: TelegramAdapter;
  maxClient: MaxClient;
}): Promise<void> {
  parts.syncTask.stop();
  await new Promise<void>((resolve) => parts.server.close(() => resolve()));
  await parts.coordinator.stop();
  await parts.offsets.flush();
  await parts.telegram.shutdown();
  await parts.maxClient.stop();
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start application');
  closeDatabase();
  process.exit(1);
});
