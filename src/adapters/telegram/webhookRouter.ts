import express, { type Router } from 'express';
import type { TelegramAdapter } from './TelegramAdapter.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';

const logger = createLogger({ component: 'webhookRouter' });

function updateId(body: unknown): number | undefined {
  if (typeof body !== 'object' || body === null || !('update_id' in body)) return undefined;
  return typeof body.update_id === 'number' ? body.update_id : undefined;
}

/** Receives Bot API updates at `POST /telegram` when the bot runs in webhook mode. */
export function createWebhookRouter(adapter: Pick<TelegramAdapter, 'handleWebhook'>): Router {
  const router = express.Router();

  router.post('/telegram', express.json({ limit: '1mb' }), async (req, res) => {
    const requestLogger = logger.child({ requestId: generateCorrelationId(), updateId: updateId(req.body) });

    try {
      await adapter.handleWebhook(req.body);
      requestLogger.debug('Webhook update handled');
    } catch (error) {
      requestLogger.error({ error }, 'Error processing webhook update');
    }

    // Any non-2xx answer makes Telegram redeliver the same update
    res.status(200).json({ ok: true });
  });

  return router;
}
