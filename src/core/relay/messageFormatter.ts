import type { InboundMessage } from '../../ports/SourcePort.js';

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** `YYYY-MM-DD HH:MM:SS` in the given IANA time zone. */
export function formatTimestamp(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '00';
  return `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}:${part('second')}`;
}

/** Telegram rejects longer message texts. */
export const TELEGRAM_TEXT_LIMIT = 4096;
export const TRUNCATION_MARKER = '\n…[truncated]';

/** Escapes `body`, cutting it so the escaped result fits in `budget`. Entities are never split. */
function fitBody(body: string, budget: number): string {
  const escaped = escapeHtml(body);
  if (escaped.length <= budget) return escaped;

  const room = budget - TRUNCATION_MARKER.length;
  let low = 0;
  let high = body.length;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (escapeHtml(body.slice(0, mid)).length <= room) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }

  let cut = body.slice(0, low);
  // Keep surrogate pairs whole
  if (/[\uD800-\uDBFF]$/.test(cut)) cut = cut.slice(0, -1);
  return `${escapeHtml(cut)}${TRUNCATION_MARKER}`;
}

/**
 * Renders the relay header (group label, timestamp, author) followed by the
 * message body as Telegram HTML. Bodies that would push the text past
 * Telegram's limit are truncated with a marker.
 */
export function formatMessageText(
  message: Pick<InboundMessage, 'text' | 'timestamp'>,
  label: string,
  author: string | null,
  timeZone: string
): string {
  const header = [
    `<b>${escapeHtml(label)}</b>`,
    `<code>${formatTimestamp(message.timestamp, timeZone)}</code>`,
    `From: ${author ? escapeHtml(author) : 'unknown'}`,
  ].join('\n');

  if (!message.text) return header;
  const body = fitBody(message.text, TELEGRAM_TEXT_LIMIT - header.length - 2);
  return `${header}\n\n${body}`;
}
