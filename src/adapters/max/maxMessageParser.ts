import { z } from 'zod';
import type { InboundMessage, MediaRef } from '../../ports/SourcePort.js';
import { idSchema } from './protocol.js';

const attachSchema = z
  .object({
    _type: z.string(),
    baseUrl: z.string().optional(),
    photoId: idSchema.optional(),
    videoId: idSchema.optional(),
    fileId: idSchema.optional(),
    name: z.string().optional(),
  })
  .passthrough();

export const rawMessageSchema = z
  .object({
    id: idSchema,
    time: z.number(),
    text: z.string().nullish(),
    sender: idSchema.nullish(),
    attaches: z.array(z.unknown()).nullish(),
  })
  .passthrough();

export type RawMaxMessage = z.infer<typeof rawMessageSchema>;

function toMediaRef(value: unknown): MediaRef | null {
  const parsed = attachSchema.safeParse(value);
  if (!parsed.success) return null;
  const attach = parsed.data;

  switch (attach._type) {
    case 'PHOTO':
      if (!attach.baseUrl) return null;
      return attach.photoId
        ? { kind: 'photo', url: attach.baseUrl, id: attach.photoId }
        : { kind: 'photo', url: attach.baseUrl };
    case 'VIDEO':
      return attach.videoId ? { kind: 'video', id: attach.videoId } : null;
    case 'FILE':
      if (!attach.fileId) return null;
      return attach.name
        ? { kind: 'file', id: attach.fileId, name: attach.name }
        : { kind: 'file', id: attach.fileId };
    default:
      // Stickers, contacts and the like carry no fetchable media; the message is still relayed
      return null;
  }
}

/**
 * Converts a raw MAX message into the relay's inbound shape. Returns null only
 * when the message is malformed; one without text or supported attachments is
 * relayed with the header alone.
 */
export function parseMaxMessage(chatId: string, value: unknown): InboundMessage | null {
  const parsed = rawMessageSchema.safeParse(value);
  if (!parsed.success) return null;
  const raw = parsed.data;

  const attachments = (raw.attaches ?? [])
    .map(toMediaRef)
    .filter((ref): ref is MediaRef => ref !== null);
  const text = raw.text ?? '';

  const message: InboundMessage = {
    chatId,
    position: raw.id,
    text,
    timestamp: new Date(raw.time),
    attachments,
  };
  if (raw.sender) {
    message.senderId = raw.sender;
  }
  return message;
}
