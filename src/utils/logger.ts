import pino from 'pino';

export type Logger = pino.Logger;

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

// One id per process, shared by every logger
const processCorrelationId = generateCorrelationId();

// Credentials can show up inside logged config or error objects
const REDACT_PATHS = ['token', '*.token', 'config.telegramBotToken', 'config.maxToken'];

function loggerOptions(): pino.LoggerOptions {
  const options: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    base: { service: 'max-telegram-relay', pid: process.pid },
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
    // Call sites log errors under `error`; pino only serialises `err` by default
    serializers: { error: pino.stdSerializers.err },
  };

  if (process.env.NODE_ENV === 'development') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname,service',
      },
    };
  }
  return options;
}

let root: Logger | undefined;

/**
 * Child of the process-wide logger tagged with `context`, e.g.
 * `{ adapter: 'MaxClient' }` or `{ job: 'CatalogSyncJob' }`.
 */
export function createLogger(context: Record<string, unknown> = {}): Logger {
  root ??= pino(loggerOptions()).child({ correlationId: processCorrelationId });
  return root.child(context);
}
