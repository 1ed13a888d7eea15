import express from 'express';
import type { Server } from 'node:http';
import { createLogger } from './utils/logger.js';
import type { TelegramAdapter } from './adapters/telegram/TelegramAdapter.js';
import type { PipelineStatus } from './core/relay/ChatPipeline.js';
import { createWebhookRouter } from './adapters/telegram/webhookRouter.js';

const logger = createLogger({ component: 'server' });

export interface ServerDeps {
  telegram: Pick<TelegramAdapter, 'handleWebhook'>;
  /** Current state of every relay pipeline */
  status: () => PipelineStatus[];
  /** Whether the MAX connection is up */
  sourceConnected: () => boolean;
}

export interface HealthReport {
  status: 'ok' | 'degraded';
  source: 'connected' | 'disconnected';
  pipelines: PipelineStatus[];
  timestamp: string;
}

/** Degraded when the source is down or any pipeline has failed. */
export function healthReport(deps: Pick<ServerDeps, 'status' | 'sourceConnected'>, now = new Date()): HealthReport {
  const pipelines = deps.status();
  const connected = deps.sourceConnected();
  const healthy = connected && pipelines.every((pipeline) => pipeline.state !== 'failed');
  return {
    status: healthy ? 'ok' : 'degraded',
    source: connected ? 'connected' : 'disconnected',
    pipelines,
    timestamp: now.toISOString(),
  };
}

export function createApp(deps: ServerDeps): express.Express {
  const app = express();

  app.use((req, _res, next) => {
    logger.debug({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  app.use('/webhook', createWebhookRouter(deps.telegram));

  app.get('/health', (_req, res) => {
    const report = healthReport(deps);
    res.status(report.status === 'ok' ? 200 : 503).json(report);
  });

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export function startServer(deps: ServerDeps, port: number, host = '0.0.0.0'): Promise<Server> {
  const app = createApp(deps);
  return new Promise((resolve) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
  });
}
