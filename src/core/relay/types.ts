import type { MediaKind, MessageKind } from '../../ports/SourcePort.js';
import type { FetchFailedError } from '../../utils/errors.js';

export interface FetchedFile {
  data: Buffer;
  /** Name suggested by the server or the URL, if any */
  filename?: string;
  contentType?: string;
}

/** Retrieves bytes from a URL; rejects with FetchFailedError. */
export type FetchBytes = (url: string, signal?: AbortSignal) => Promise<FetchedFile>;

export interface ResolvedMedia {
  kind: MediaKind;
  data: Buffer;
  filename: string;
  contentType?: string;
}

export interface SkippedMedia {
  kind: MediaKind;
  error: FetchFailedError;
}

export interface ResolvedContent {
  chatId: string;
  position: string;
  kind: MessageKind;
  /** Telegram HTML */
  text: string;
  media: ResolvedMedia[];
  skipped: SkippedMedia[];
}

export type DeliveryStatus = 'pending' | 'sent' | 'failed';

export interface DeliveryAttempt {
  recipientId: string;
  status: DeliveryStatus;
  /** Send calls made for this recipient, retries included */
  attempts: number;
  error?: Error;
  permanent?: boolean;
}

export type PipelineState = 'uninitialized' | 'backfilling' | 'live' | 'stopped' | 'failed';
