import { describe, it, expect } from 'vitest';
import { describeTelegramError, isMessageNotModified, toDeliveryError } from '../../adapters/telegram/telegramErrors.js';

function apiError(status: number, description: string, retryAfter?: number) {
  return {
    code: 'ETELEGRAM',
    message: `ETELEGRAM: ${status} ${description}`,
    response: {
      statusCode: status,
      body: {
        error_code: status,
        description,
        ...(retryAfter === undefined ? {} : { parameters: { retry_after: retryAfter } }),
      },
    },
  };
}

describe('describeTelegramError', () => {
  it('reads status, description and retry-after from API errors', () => {
    expect(describeTelegramError(apiError(429, 'Too Many Requests: retry after 5', 5))).toEqual({
      code: 'ETELEGRAM',
      status: 429,
      description: 'Too Many Requests: retry after 5',
      retryAfterMs: 5000,
    });
  });

  it('falls back to the message of unknown errors', () => {
    expect(describeTelegramError(new Error('socket hang up'))).toEqual({ code: 'UNKNOWN', description: 'socket hang up' });
  });
});

describe('toDeliveryError', () => {
  it('treats 4xx other than 429 as permanent', () => {
    const error = toDeliveryError('1', apiError(400, 'Bad Request: chat not found'));

    expect(error.permanent).toBe(true);
    expect(error.message).toBe('Telegram 400: Bad Request: chat not found');
  });

  it('treats rate limits and server errors as transient', () => {
    const limited = toDeliveryError('1', apiError(429, 'Too Many Requests', 2));
    expect(limited.permanent).toBe(false);
    expect(limited.retryAfterMs).toBe(2000);

    expect(toDeliveryError('1', apiError(502, 'Bad Gateway')).permanent).toBe(false);
  });

  it('treats network failures as transient', () => {
    const error = toDeliveryError('1', { code: 'EFATAL', message: 'EFATAL: Error: read ECONNRESET' });

    expect(error.permanent).toBe(false);
    expect(error.message).toBe('Telegram EFATAL: EFATAL: Error: read ECONNRESET');
  });
});

describe('isMessageNotModified', () => {
  it('matches only the unchanged-content response', () => {
    expect(isMessageNotModified(apiError(400, 'Bad Request: message is not modified'))).toBe(true);
    expect(isMessageNotModified(apiError(400, 'Bad Request: message to edit not found'))).toBe(false);
  });
});
