import { describe, it, expect } from 'vitest';
import { parseMaxMessage } from '../../adapters/max/maxMessageParser.js';

describe('parseMaxMessage', () => {
  it('parses a text message with its sender', () => {
    const message = parseMaxMessage('-100', { id: '115', time: 1700000000000, text: 'hello', sender: 42 });

    expect(message).toEqual({
      chatId: '-100',
      position: '115',
      text: 'hello',
      timestamp: new Date(1700000000000),
      attachments: [],
      senderId: '42',
    });
  });

  it('maps photo, video and file attachments', () => {
    const message = parseMaxMessage('-100', {
      id: 7,
      time: 1700000000000,
      attaches: [
        { _type: 'PHOTO', baseUrl: 'https://cdn.example/p.jpg', photoId: 11 },
        { _type: 'VIDEO', videoId: 12 },
        { _type: 'FILE', fileId: 13, name: 'report.pdf' },
        { _type: 'STICKER', stickerId: 14 },
      ],
    });

    expect(message?.text).toBe('');
    expect(message?.attachments).toEqual([
      { kind: 'photo', url: 'https://cdn.example/p.jpg', id: '11' },
      { kind: 'video', id: '12' },
      { kind: 'file', id: '13', name: 'report.pdf' },
    ]);
  });

  it('keeps messages without text or supported attachments', () => {
    expect(parseMaxMessage('-100', { id: 8, time: 1, attaches: [{ _type: 'STICKER' }] })).toEqual({
      chatId: '-100',
      position: '8',
      text: '',
      timestamp: new Date(1),
      attachments: [],
    });
    expect(parseMaxMessage('-100', { id: 9, time: 1, text: null })?.text).toBe('');
  });

  it('drops malformed messages', () => {
    expect(parseMaxMessage('-100', { id: 10, text: 'no time' })).toBeNull();
    expect(parseMaxMessage('-100', 'garbage')).toBeNull();
  });
});
