import type { DeliveryPort } from '../../ports/DeliveryPort.js';
import { createLogger } from '../../utils/logger.js';
import { DeliveryFailedError } from '../../utils/errors.js';
import { sleep, withRetry } from '../../utils/retry.js';
import type { DeliveryAttempt, ResolvedContent, ResolvedMedia } from './types.js';

export interface DeliveryDispatcherOptions {
  /** Total attempts per send for transient destination errors */
  maxAttempts: number;
  retryBaseDelayMs?: number;
  /** Pause before each media item */
  mediaSendDelayMs: number;
}

function isPermanent(error: unknown): boolean {
  return error instanceof DeliveryFailedError && error.permanent;
}

/**
 * Fans resolved content out to recipients. Every recipient gets its own
 * sequence of sends (text, then media in order) and its own outcome.
 */
export class DeliveryDispatcher {
  private readonly logger = createLogger({ service: 'DeliveryDispatcher' });

  constructor(
    private readonly port: DeliveryPort,
    private readonly options: DeliveryDispatcherOptions
  ) {}

  async deliver(content: ResolvedContent, recipients: Iterable<string>, signal?: AbortSignal): Promise<DeliveryAttempt[]> {
    const unique = [...new Set(recipients)];
    return Promise.all(unique.map((recipientId) => this.deliverTo(content, recipientId, signal)));
  }

  private async deliverTo(content: ResolvedContent, recipientId: string, signal?: AbortSignal): Promise<DeliveryAttempt> {
    const logger = this.logger.child({ method: 'deliverTo', recipientId, chatId: content.chatId, position: content.position });
    const attempt: DeliveryAttempt = { recipientId, status: 'pending', attempts: 0 };

    try {
      await this.send(attempt, () => this.port.sendText(recipientId, content.text), signal);
      for (const media of content.media) {
        await sleep(this.options.mediaSendDelayMs, signal);
        await this.send(attempt, () => this.sendMedia(recipientId, media), signal);
      }
      attempt.status = 'sent';
    } catch (error) {
      attempt.status = 'failed';
      attempt.error = error instanceof Error ? error : new Error(String(error));
      attempt.permanent = isPermanent(error);
      logger.error({ error, permanent: attempt.permanent, attempts: attempt.attempts }, 'Delivery failed');
    }

    return attempt;
  }

  private send(attempt: DeliveryAttempt, fn: () => Promise<void>, signal?: AbortSignal): Promise<void> {
    return withRetry(
      () => {
        attempt.attempts++;
        return fn();
      },
      {
        maxAttempts: this.options.maxAttempts,
        baseDelayMs: this.options.retryBaseDelayMs ?? 1_000,
        shouldRetry: (error) => !isPermanent(error),
        delayFor: (error) => (error instanceof DeliveryFailedError ? error.retryAfterMs : undefined),
        onRetry: (error, n, delayMs) =>
          this.logger.warn({ error, recipientId: attempt.recipientId, attempt: n, delayMs }, 'Retrying send'),
        ...(signal ? { signal } : {}),
      }
    );
  }

  private sendMedia(recipientId: string, media: ResolvedMedia): Promise<void> {
    const file = media.contentType
      ? { data: media.data, filename: media.filename, contentType: media.contentType }
      : { data: media.data, filename: media.filename };

    switch (media.kind) {
      case 'photo':
        return this.port.sendPhoto(recipientId, file);
      case 'video':
        return this.port.sendVideo(recipientId, file);
      case 'file':
        return this.port.sendDocument(recipientId, file);
    }
  }
}
