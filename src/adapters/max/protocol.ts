import { z } from 'zod';

export const PROTOCOL_VERSION = 11;

export const Opcode = {
  PING: 1,
  SESSION_INIT: 6,
  LOGIN: 19,
  CONTACT_INFO: 32,
  CHAT_HISTORY: 49,
  VIDEO_PLAY: 83,
  FILE_DOWNLOAD: 88,
  NOTIF_MESSAGE: 128,
} as const;

export type OpcodeValue = (typeof Opcode)[keyof typeof Opcode];

export const Command = {
  REQUEST: 0,
  OK: 1,
  ERROR: 3,
} as const;

const frameSchema = z.object({
  ver: z.number().optional(),
  cmd: z.number(),
  seq: z.number(),
  opcode: z.number(),
  payload: z.record(z.unknown()).nullish(),
});

export interface MaxFrame {
  ver?: number;
  cmd: number;
  seq: number;
  opcode: number;
  payload: Record<string, unknown>;
}

const BIGINT_MARKER = '__bigint__';

/**
 * Serialises a frame. Bigint values (message ids) are written as bare JSON
 * integers so no precision is lost on the way out.
 */
export function encodeFrame(frame: MaxFrame): string {
  const json = JSON.stringify(frame, (_key, value: unknown) =>
    typeof value === 'bigint' ? `${BIGINT_MARKER}${value.toString()}` : value
  );
  return json.replace(new RegExp(`"${BIGINT_MARKER}(-?\\d+)"`, 'g'), '$1');
}

/**
 * Wraps integer literals too long to survive a float64 in quotes, leaving the
 * contents of JSON strings untouched.
 */
export function quoteLargeIntegers(json: string, minDigits = 16): string {
  let out = '';
  let i = 0;
  while (i < json.length) {
    const ch = json.charAt(i);
    if (ch === '"') {
      let j = i + 1;
      while (j < json.length && json.charAt(j) !== '"') {
        j += json.charAt(j) === '\\' ? 2 : 1;
      }
      out += json.slice(i, j + 1);
      i = j + 1;
      continue;
    }
    if (ch === '-' || (ch >= '0' && ch <= '9')) {
      let j = ch === '-' ? i + 1 : i;
      while (j < json.length && json.charAt(j) >= '0' && json.charAt(j) <= '9') j++;
      const isInteger = !/[.eE]/.test(json.charAt(j));
      const digits = j - (ch === '-' ? i + 1 : i);
      const literal = json.slice(i, j);
      out += isInteger && digits >= minDigits ? `"${literal}"` : literal;
      i = j;
      continue;
    }
    out += ch;
    i++;
  }
  return out;
}

export function decodeFrame(raw: string): MaxFrame {
  const parsed = frameSchema.parse(JSON.parse(quoteLargeIntegers(raw)));
  const frame: MaxFrame = {
    cmd: parsed.cmd,
    seq: parsed.seq,
    opcode: parsed.opcode,
    payload: parsed.payload ?? {},
  };
  if (parsed.ver !== undefined) frame.ver = parsed.ver;
  return frame;
}

/** Accepts ids as JSON numbers or as strings produced by quoteLargeIntegers. */
export const idSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

/** Turns a decimal id back into a wire value without losing precision. */
export function toWireId(id: string): bigint | string {
  return /^-?\d+$/.test(id) ? BigInt(id) : id;
}
