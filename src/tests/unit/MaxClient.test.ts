import { describe, it, expect, vi, afterEach } from 'vitest';
import { EventEmitter } from 'node:events';
import type WebSocket from 'ws';
import { MaxClient, type MaxClientOptions } from '../../adapters/max/MaxClient.js';
import { Opcode } from '../../adapters/max/protocol.js';
import { ConnectionLostError, MaxError } from '../../utils/errors.js';
import type { ConnectionState } from '../../ports/SourcePort.js';

interface SentFrame {
  ver: number;
  cmd: number;
  seq: number;
  opcode: number;
  payload: Record<string, unknown>;
}

type Responder = (frame: SentFrame) => Record<string, unknown> | 'error' | null;

/** In-process stand-in for the MAX server side of one socket. */
class FakeSocket extends EventEmitter {
  readyState = 1;
  readonly sent: SentFrame[] = [];

  constructor(private readonly respond: Responder) {
    super();
  }

  send(data: string): void {
    const frame: SentFrame = JSON.parse(data);
    this.sent.push(frame);
    const reply = this.respond(frame);
    if (reply === null) return;
    queueMicrotask(() => {
      const body =
        reply === 'error'
          ? { ver: 11, cmd: 3, seq: frame.seq, opcode: frame.opcode, payload: { message: 'bad request' } }
          : { ver: 11, cmd: 1, seq: frame.seq, opcode: frame.opcode, payload: reply };
      this.emit('message', Buffer.from(JSON.stringify(body)));
    });
  }

  close(): void {
    if (this.readyState === 3) return;
    this.readyState = 3;
    this.emit('close', 1000, Buffer.from(''));
  }

  /** Server push */
  push(opcode: number, payload: Record<string, unknown>): void {
    this.emit('message', Buffer.from(JSON.stringify({ ver: 11, cmd: 0, seq: 0, opcode, payload })));
  }
}

const handshake: Responder = (frame) => {
  if (frame.opcode === Opcode.LOGIN) return { chats: [{ id: -100, title: 'News' }, { id: -200 }] };
  if (frame.opcode === Opcode.CHAT_HISTORY) return 'error';
  return {};
};

function createClient(
  overrides: Partial<MaxClientOptions> = {},
  behaviour: (index: number) => 'open' | 'refuse' = () => 'open'
): { client: MaxClient; sockets: FakeSocket[] } {
  const sockets: FakeSocket[] = [];
  const client = new MaxClient({
    url: 'wss://max.test/websocket',
    token: 'test-secret',
    appVersion: '1.0.0',
    deviceId: 'device-1',
    maxReconnectAttempts: 3,
    baseBackoffMs: 1,
    wsFactory: () => {
      const socket = new FakeSocket(handshake);
      const mode = behaviour(sockets.length);
      sockets.push(socket);
      queueMicrotask(() => (mode === 'open' ? socket.emit('open') : socket.close()));
      return socket as unknown as WebSocket;
    },
    ...overrides,
  });
  return { client, sockets };
}

describe('MaxClient', () => {
  let active: MaxClient | null = null;

  afterEach(async () => {
    await active?.stop();
    active = null;
  });

  it('initialises the session and logs in on connect', async () => {
    const { client, sockets } = createClient();
    active = client;
    const states: ConnectionState[] = [];
    client.onConnectionChange((state) => states.push(state));

    await client.start();

    const sent = sockets[0]?.sent ?? [];
    expect(sent.map((frame) => frame.opcode)).toEqual([Opcode.SESSION_INIT, Opcode.LOGIN]);
    expect(sent[0]?.payload['deviceId']).toBe('device-1');
    expect(sent[1]?.payload['token']).toBe('test-secret');
    expect(client.isOpen).toBe(true);
    expect(client.chats).toEqual([
      { id: '-100', title: 'News' },
      { id: '-200', title: null },
    ]);
    expect(states).toEqual(['connected']);
  });

  it('rejects error responses with MaxError', async () => {
    const { client } = createClient();
    active = client;
    await client.start();

    const request = client.request(Opcode.CHAT_HISTORY, { chatId: -100 });

    await expect(request).rejects.toBeInstanceOf(MaxError);
    await expect(request).rejects.toThrow('MAX request failed (opcode 49): bad request');
  });

  it('refuses requests while disconnected', async () => {
    const { client } = createClient();

    await expect(client.request(Opcode.PING, {})).rejects.toBeInstanceOf(ConnectionLostError);
  });

  it('hands server pushes to registered handlers', async () => {
    const { client, sockets } = createClient();
    active = client;
    const handler = vi.fn();
    client.onPush(Opcode.NOTIF_MESSAGE, handler);
    await client.start();

    sockets[0]?.push(Opcode.NOTIF_MESSAGE, { chatId: -100, message: { id: 1 } });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0]?.[0]).toMatchObject({ opcode: 128, payload: { chatId: -100 } });
  });

  it('reconnects after an unexpected close', async () => {
    const { client, sockets } = createClient();
    active = client;
    const states: ConnectionState[] = [];
    client.onConnectionChange((state) => states.push(state));
    await client.start();

    sockets[0]?.close();

    await vi.waitFor(() => expect(states).toEqual(['connected', 'disconnected', 'connected']));
    expect(sockets).toHaveLength(2);
    expect(client.isOpen).toBe(true);
  });

  it('reports closed once reconnect attempts are exhausted', async () => {
    const { client, sockets } = createClient({ maxReconnectAttempts: 2 }, (index) => (index === 0 ? 'open' : 'refuse'));
    active = client;
    const states: ConnectionState[] = [];
    client.onConnectionChange((state) => states.push(state));
    await client.start();

    sockets[0]?.close();

    await vi.waitFor(() => expect(states).toEqual(['connected', 'disconnected', 'closed']));
    expect(sockets).toHaveLength(3);
    expect(client.isOpen).toBe(false);
  });

  it('fails start when the first connection is refused', async () => {
    const { client } = createClient({}, () => 'refuse');

    await expect(client.start()).rejects.toBeInstanceOf(MaxError);
  });
});
