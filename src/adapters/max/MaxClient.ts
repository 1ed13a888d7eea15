import { randomUUID } from 'node:crypto';
import WebSocket from 'ws';
import { z } from 'zod';
import { createLogger } from '../../utils/logger.js';
import { ConnectionLostError, MaxError } from '../../utils/errors.js';
import { backoffDelay } from '../../utils/retry.js';
import type { ConnectionState } from '../../ports/SourcePort.js';
import {
  Command,
  decodeFrame,
  encodeFrame,
  idSchema,
  Opcode,
  PROTOCOL_VERSION,
  type MaxFrame,
  type OpcodeValue,
} from './protocol.js';

const PING_INTERVAL_MS = 30_000;
const REQUEST_TIMEOUT_MS = 20_000;
const BASE_BACKOFF_MS = 1_000;
const MAX_BACKOFF_MS = 60_000;

export interface MaxChat {
  id: string;
  title: string | null;
}

export interface MaxClientOptions {
  url: string;
  token: string;
  appVersion: string;
  deviceId?: string;
  maxReconnectAttempts: number;
  requestTimeoutMs?: number;
  pingIntervalMs?: number;
  baseBackoffMs?: number;
  /** Override WebSocket constructor for testing. */
  wsFactory?: (url: string, headers: Record<string, string>) => WebSocket;
}

type PendingRequest = {
  opcode: number;
  resolve: (payload: Record<string, unknown>) => void;
  reject: (error: unknown) => void;
  timer: NodeJS.Timeout;
};

type PushHandler = (frame: MaxFrame) => void;

/**
 * Connection to the MAX messenger WebSocket API. Requests are matched to
 * responses by sequence number; pushes are handed to registered handlers.
 * An unexpected close triggers reconnects with exponential backoff until
 * `maxReconnectAttempts` is exhausted, after which the client reports `closed`.
 */
export class MaxClient {
  private readonly logger = createLogger({ adapter: 'MaxClient' });
  private readonly deviceId: string;
  private readonly wsFactory: (url: string, headers: Record<string, string>) => WebSocket;
  private readonly requestTimeoutMs: number;
  private readonly pingIntervalMs: number;
  private readonly baseBackoffMs: number;

  private ws: WebSocket | null = null;
  private state: 'idle' | 'connecting' | 'open' | 'stopped' = 'idle';
  private seq = 0;
  private retryCount = 0;
  private pingTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly pushHandlers = new Map<number, PushHandler[]>();
  private readonly connectionListeners: Array<(state: ConnectionState) => void> = [];
  private chatList: MaxChat[] = [];

  constructor(private readonly options: MaxClientOptions) {
    this.deviceId = options.deviceId ?? randomUUID();
    this.requestTimeoutMs = options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS;
    this.pingIntervalMs = options.pingIntervalMs ?? PING_INTERVAL_MS;
    this.baseBackoffMs = options.baseBackoffMs ?? BASE_BACKOFF_MS;
    this.wsFactory = options.wsFactory ?? ((url, headers) => new WebSocket(url, { headers }));
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  /** Chats reported by the last successful login. */
  get chats(): MaxChat[] {
    return this.chatList;
  }

  async start(): Promise<void> {
    if (this.state === 'open' || this.state === 'connecting') return;
    const logger = this.logger.child({ method: 'start' });
    logger.info({ url: this.options.url }, 'Connecting to MAX');

    this.retryCount = 0;
    try {
      await this.connect();
    } catch (error) {
      this.state = 'stopped';
      throw new MaxError('Failed to connect to MAX', { cause: error });
    }
  }

  async stop(): Promise<void> {
    if (this.state === 'stopped') return;
    this.state = 'stopped';
    this.clearTimers();
    this.rejectPending(new ConnectionLostError('MAX client stopped'));
    this.ws?.close();
    this.ws = null;
    this.logger.info('MAX client stopped');
  }

  onPush(opcode: OpcodeValue, handler: PushHandler): void {
    const handlers = this.pushHandlers.get(opcode) ?? [];
    handlers.push(handler);
    this.pushHandlers.set(opcode, handlers);
  }

  onConnectionChange(listener: (state: ConnectionState) => void): void {
    this.connectionListeners.push(listener);
  }

  async request(opcode: OpcodeValue, payload: Record<string, unknown>): Promise<Record<string, unknown>> {
    if (this.state !== 'open') {
      throw new ConnectionLostError(`MAX connection is not open (opcode ${opcode})`);
    }
    return this.send(opcode, payload);
  }

  private send(opcode: OpcodeValue, payload: Record<string, unknown>): Promise<Record<string, unknown>> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ConnectionLostError('MAX socket is not open'));
    }

    const seq = ++this.seq;
    const frame = encodeFrame({ ver: PROTOCOL_VERSION, cmd: Command.REQUEST, seq, opcode, payload });

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(seq);
        reject(new MaxError(`MAX request timed out (opcode ${opcode})`));
      }, this.requestTimeoutMs);
      this.pending.set(seq, { opcode, resolve, reject, timer });
      ws.send(frame);
    });
  }

  private connect(): Promise<void> {
    this.state = 'connecting';

    return new Promise<void>((resolve, reject) => {
      const ws = this.wsFactory(this.options.url, {
        Origin: 'https://web.max.ru',
        'User-Agent': `Mozilla/5.0 (X11; Linux x86_64) MaxRelay/${this.options.appVersion}`,
      });
      this.ws = ws;
      let settled = false;
      let handshakeError: unknown;

      ws.on('open', () => {
        this.handshake()
          .then(() => {
            settled = true;
            this.state = 'open';
            this.retryCount = 0;
            this.startPing();
            this.logger.info({ chats: this.chatList.length }, 'MAX session established');
            this.emitConnection('connected');
            resolve();
          })
          .catch((error: unknown) => {
            // The close handler rejects the connect attempt
            handshakeError = error;
            this.logger.error({ error }, 'MAX handshake failed');
            ws.close();
          });
      });

      ws.on('message', (data: WebSocket.RawData) => {
        this.handleMessage(Buffer.isBuffer(data) ? data.toString('utf8') : String(data));
      });

      ws.on('error', (error: Error) => {
        this.logger.error({ error: error.message }, 'MAX WebSocket error');
      });

      ws.on('close', (code: number, reason: Buffer) => {
        if (this.ws === ws) this.ws = null;
        this.clearPing();
        this.rejectPending(new ConnectionLostError(`MAX connection closed (code ${code})`));

        if (!settled) {
          settled = true;
          reject(
            handshakeError ??
              new ConnectionLostError(`MAX socket closed during connect: code=${code} reason=${reason.toString()}`)
          );
          return;
        }
        if (this.state === 'stopped') return;

        this.state = 'connecting';
        this.emitConnection('disconnected');
        this.scheduleReconnect();
      });
    });
  }

  private async handshake(): Promise<void> {
    await this.send(Opcode.SESSION_INIT, {
      userAgent: {
        deviceType: 'WEB',
        locale: 'ru',
        deviceLocale: 'ru',
        osVersion: 'Linux',
        deviceName: 'Chrome',
        appVersion: this.options.appVersion,
        screen: '1080x1920 1.0x',
        timezone: 'Europe/Moscow',
      },
      deviceId: this.deviceId,
    });

    const login = await this.send(Opcode.LOGIN, {
      interactive: true,
      token: this.options.token,
      chatsSync: 0,
      contactsSync: 0,
      presenceSync: 0,
      draftsSync: 0,
      chatsCount: 40,
    });
    this.chatList = parseChats(login['chats']);
  }

  private handleMessage(raw: string): void {
    let frame: MaxFrame;
    try {
      frame = decodeFrame(raw);
    } catch (error) {
      this.logger.warn({ error }, 'Dropping malformed MAX frame');
      return;
    }

    const pending = frame.cmd !== Command.REQUEST ? this.pending.get(frame.seq) : undefined;
    if (pending && pending.opcode === frame.opcode) {
      this.pending.delete(frame.seq);
      clearTimeout(pending.timer);
      if (frame.cmd === Command.ERROR) {
        const detail = frame.payload['message'] ?? frame.payload['error'];
        pending.reject(new MaxError(`MAX request failed (opcode ${frame.opcode}): ${String(detail ?? 'unknown error')}`));
      } else {
        pending.resolve(frame.payload);
      }
      return;
    }

    for (const handler of this.pushHandlers.get(frame.opcode) ?? []) {
      try {
        handler(frame);
      } catch (error) {
        this.logger.error({ error, opcode: frame.opcode }, 'MAX push handler failed');
      }
    }
  }

  private scheduleReconnect(): void {
    if (this.retryCount >= this.options.maxReconnectAttempts) {
      this.logger.error({ retries: this.retryCount }, 'MAX reconnect attempts exhausted');
      this.state = 'stopped';
      this.emitConnection('closed');
      return;
    }

    this.retryCount++;
    const delay = backoffDelay(this.retryCount, this.baseBackoffMs, MAX_BACKOFF_MS);
    this.logger.warn(
      { attempt: this.retryCount, maxRetries: this.options.maxReconnectAttempts, delayMs: delay },
      'MAX reconnecting after unexpected close'
    );

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.state === 'stopped') return;
      this.connect().catch((error: unknown) => {
        this.logger.error({ error }, 'MAX reconnect failed');
        if (this.state !== 'stopped') this.scheduleReconnect();
      });
    }, delay);
  }

  private startPing(): void {
    this.clearPing();
    this.pingTimer = setInterval(() => {
      this.send(Opcode.PING, { interactive: false }).catch((error: unknown) => {
        this.logger.warn({ error }, 'MAX ping failed');
      });
    }, this.pingIntervalMs);
  }

  private clearPing(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }

  private clearTimers(): void {
    this.clearPing();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private rejectPending(error: Error): void {
    for (const [seq, request] of this.pending) {
      clearTimeout(request.timer);
      request.reject(error);
      this.pending.delete(seq);
    }
  }

  private emitConnection(state: ConnectionState): void {
    for (const listener of this.connectionListeners) {
      try {
        listener(state);
      } catch (error) {
        this.logger.error({ error, state }, 'Connection listener failed');
      }
    }
  }
}

const chatSchema = z.object({ id: idSchema, title: z.string().nullish() }).passthrough();

function parseChats(value: unknown): MaxChat[] {
  if (!Array.isArray(value)) return [];
  const chats: MaxChat[] = [];
  for (const item of value) {
    const parsed = chatSchema.safeParse(item);
    if (!parsed.success) continue;
    chats.push({ id: parsed.data.id, title: parsed.data.title || null });
  }
  return chats;
}
