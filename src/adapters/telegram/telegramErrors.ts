import { z } from 'zod';
import { DeliveryFailedError } from '../../utils/errors.js';

// Shape of errors raised by node-telegram-bot-api (EFATAL, EPARSE, ETELEGRAM)
const botApiErrorSchema = z.object({
  code: z.string(),
  message: z.string().optional(),
  response: z
    .object({
      statusCode: z.number().optional(),
      body: z
        .object({
          error_code: z.number().optional(),
          description: z.string().optional(),
          parameters: z.object({ retry_after: z.number().optional() }).optional(),
        })
        .optional(),
    })
    .optional(),
});

export interface TelegramFailure {
  code: string;
  status?: number;
  description: string;
  retryAfterMs?: number;
}

export function describeTelegramError(error: unknown): TelegramFailure {
  const parsed = botApiErrorSchema.safeParse(error);
  if (!parsed.success) {
    return { code: 'UNKNOWN', description: error instanceof Error ? error.message : String(error) };
  }

  const { code, message, response } = parsed.data;
  const failure: TelegramFailure = {
    code,
    description: response?.body?.description ?? message ?? code,
  };
  const status = response?.body?.error_code ?? response?.statusCode;
  if (status !== undefined) failure.status = status;
  const retryAfter = response?.body?.parameters?.retry_after;
  if (retryAfter !== undefined) failure.retryAfterMs = retryAfter * 1000;
  return failure;
}

/**
 * 429 and 5xx responses, network failures and unknown errors are transient;
 * any other 4xx (blocked bot, chat not found, bad request) is permanent.
 */
export function toDeliveryError(recipientId: string, error: unknown): DeliveryFailedError {
  const failure = describeTelegramError(error);
  const status = failure.status;
  const permanent = status !== undefined && status >= 400 && status < 500 && status !== 429;

  const details: { permanent: boolean; retryAfterMs?: number } = { permanent };
  if (status === 429 && failure.retryAfterMs !== undefined) details.retryAfterMs = failure.retryAfterMs;

  const prefix = status !== undefined ? `Telegram ${status}` : `Telegram ${failure.code}`;
  return new DeliveryFailedError(recipientId, `${prefix}: ${failure.description}`, details, { cause: error });
}

export function isMessageNotModified(error: unknown): boolean {
  const failure = describeTelegramError(error);
  return failure.status === 400 && failure.description.includes('message is not modified');
}
