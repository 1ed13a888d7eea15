import { describe, it, expect, vi } from 'vitest';
import { ContentResolver } from '../../core/relay/ContentResolver.js';
import type { FetchBytes } from '../../core/relay/types.js';
import type { InboundMessage, MediaRef, SourcePort } from '../../ports/SourcePort.js';
import { FetchFailedError } from '../../utils/errors.js';

const timestamp = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

function message(overrides: Partial<InboundMessage> = {}): InboundMessage {
  return { chatId: '-100', position: '10', text: 'hello', timestamp, attachments: [], ...overrides };
}

function setup() {
  const source = {
    resolveMediaUrl: vi.fn<SourcePort['resolveMediaUrl']>(async (_message: InboundMessage, ref: MediaRef) => ref.url ?? null),
    getUserName: vi.fn<SourcePort['getUserName']>().mockResolvedValue(null),
  };
  const fetchBytes = vi.fn<FetchBytes>();
  const resolver = new ContentResolver(source, fetchBytes, {
    timeZone: 'UTC',
    fetchAttempts: 2,
    retryBaseDelayMs: 1,
  });
  return { source, fetchBytes, resolver };
}

describe('ContentResolver', () => {
  it('formats a text message with the resolved author', async () => {
    const { source, resolver } = setup();
    source.getUserName.mockResolvedValue('Ivan');

    const content = await resolver.resolve(message({ senderId: '42' }), 'News');

    expect(content).toEqual({
      chatId: '-100',
      position: '10',
      kind: 'text',
      text: '<b>News</b>\n<code>2024-01-02 03:04:05</code>\nFrom: Ivan\n\nhello',
      media: [],
      skipped: [],
    });
  });

  it('caches author names', async () => {
    const { source, resolver } = setup();
    source.getUserName.mockResolvedValue('Ivan');

    await resolver.resolve(message({ senderId: '42' }), 'News');
    await resolver.resolve(message({ senderId: '42', position: '11' }), 'News');

    expect(source.getUserName).toHaveBeenCalledTimes(1);
  });

  it('falls back to the sender id when the lookup fails', async () => {
    const { source, resolver } = setup();
    source.getUserName.mockRejectedValue(new Error('lookup failed'));

    const content = await resolver.resolve(message({ senderId: '42' }), 'News');

    expect(content.text).toBe('<b>News</b>\n<code>2024-01-02 03:04:05</code>\nFrom: 42\n\nhello');
  });

  it('shows unknown without a sender', async () => {
    const { resolver } = setup();

    const content = await resolver.resolve(message({ text: '' }), 'News');

    expect(content.text).toBe('<b>News</b>\n<code>2024-01-02 03:04:05</code>\nFrom: unknown');
  });

  it('fetches photo bytes with a default filename', async () => {
    const { fetchBytes, resolver } = setup();
    fetchBytes.mockResolvedValue({ data: Buffer.from('img'), contentType: 'image/jpeg' });

    const content = await resolver.resolve(
      message({ text: '', attachments: [{ kind: 'photo', url: 'https://cdn.example/p' }] }),
      'News'
    );

    expect(content.kind).toBe('photo');
    expect(content.media).toEqual([
      { kind: 'photo', data: Buffer.from('img'), filename: 'photo.jpg', contentType: 'image/jpeg' },
    ]);
    expect(fetchBytes).toHaveBeenCalledWith('https://cdn.example/p', undefined);
  });

  it('keeps the source file name over the downloaded one', async () => {
    const { source, fetchBytes, resolver } = setup();
    source.resolveMediaUrl.mockResolvedValue('https://files.example/download');
    fetchBytes.mockResolvedValue({ data: Buffer.from('pdf'), filename: 'download' });

    const content = await resolver.resolve(
      message({ attachments: [{ kind: 'file', id: '9', name: 'report.pdf' }] }),
      'News'
    );

    expect(content.media.map((media) => media.filename)).toEqual(['report.pdf']);
  });

  it('retries transient fetch failures', async () => {
    const { fetchBytes, resolver } = setup();
    fetchBytes
      .mockRejectedValueOnce(new FetchFailedError('https://cdn.example/p', 'HTTP 503', { status: 503, permanent: false }))
      .mockResolvedValueOnce({ data: Buffer.from('img') });

    const content = await resolver.resolve(
      message({ attachments: [{ kind: 'photo', url: 'https://cdn.example/p' }] }),
      'News'
    );

    expect(fetchBytes).toHaveBeenCalledTimes(2);
    expect(content.media).toHaveLength(1);
    expect(content.skipped).toEqual([]);
  });

  it('skips attachments that fail permanently without retrying', async () => {
    const { fetchBytes, resolver } = setup();
    const gone = new FetchFailedError('https://cdn.example/p', 'HTTP 404', { status: 404, permanent: true });
    fetchBytes.mockRejectedValue(gone);

    const content = await resolver.resolve(
      message({ attachments: [{ kind: 'photo', url: 'https://cdn.example/p' }] }),
      'News'
    );

    expect(fetchBytes).toHaveBeenCalledTimes(1);
    expect(content.media).toEqual([]);
    expect(content.skipped).toEqual([{ kind: 'photo', error: gone }]);
    expect(content.text).toBe('<b>News</b>\n<code>2024-01-02 03:04:05</code>\nFrom: unknown\n\nhello');
  });

  it('gives up after the configured attempts on transient failures', async () => {
    const { fetchBytes, resolver } = setup();
    fetchBytes.mockRejectedValue(new FetchFailedError('https://cdn.example/v', 'timed out', { permanent: false }));

    const content = await resolver.resolve(
      message({ attachments: [{ kind: 'video', url: 'https://cdn.example/v' }] }),
      'News'
    );

    expect(fetchBytes).toHaveBeenCalledTimes(2);
    expect(content.skipped.map((skipped) => skipped.error.permanent)).toEqual([false]);
  });

  it('skips media the source cannot locate', async () => {
    const { fetchBytes, resolver } = setup();

    const content = await resolver.resolve(message({ attachments: [{ kind: 'video', id: '9' }] }), 'News');

    expect(fetchBytes).not.toHaveBeenCalled();
    expect(content.skipped).toHaveLength(1);
    expect(content.skipped[0]?.error.permanent).toBe(true);
  });
});
