import type { InboundMessage, MediaKind, MediaRef, SourcePort } from '../../ports/SourcePort.js';
import { messageKind } from '../../ports/SourcePort.js';
import { createLogger } from '../../utils/logger.js';
import { FetchFailedError } from '../../utils/errors.js';
import { withRetry } from '../../utils/retry.js';
import { formatMessageText } from './messageFormatter.js';
import type { FetchBytes, ResolvedContent, ResolvedMedia, SkippedMedia } from './types.js';

const DEFAULT_FILENAMES: Record<MediaKind, string> = {
  photo: 'photo.jpg',
  video: 'video.mp4',
  file: 'file',
};

export interface ContentResolverOptions {
  timeZone: string;
  /** Total attempts per attachment for transient fetch failures */
  fetchAttempts: number;
  retryBaseDelayMs?: number;
}

/**
 * Turns an inbound message into deliverable content: the formatted text plus
 * the bytes of every attachment that could be fetched.
 */
export class ContentResolver {
  private readonly logger = createLogger({ service: 'ContentResolver' });
  private readonly names = new Map<string, string>();

  constructor(
    private readonly source: Pick<SourcePort, 'resolveMediaUrl' | 'getUserName'>,
    private readonly fetchBytes: FetchBytes,
    private readonly options: ContentResolverOptions
  ) {}

  async resolve(message: InboundMessage, label: string, signal?: AbortSignal): Promise<ResolvedContent> {
    const author = await this.resolveAuthor(message);
    const content: ResolvedContent = {
      chatId: message.chatId,
      position: message.position,
      kind: messageKind(message),
      text: formatMessageText(message, label, author, this.options.timeZone),
      media: [],
      skipped: [],
    };

    for (const ref of message.attachments) {
      try {
        content.media.push(await this.fetchMedia(message, ref, signal));
      } catch (error) {
        const failure = toFetchFailure(error);
        content.skipped.push({ kind: ref.kind, error: failure } satisfies SkippedMedia);
        this.logger.warn(
          { chatId: message.chatId, position: message.position, kind: ref.kind, permanent: failure.permanent, error: failure },
          'Skipping attachment that could not be fetched'
        );
      }
    }

    return content;
  }

  /** Best effort: a failed lookup falls back to the sender id. */
  async resolveAuthor(message: InboundMessage): Promise<string | null> {
    if (message.senderName) return message.senderName;
    if (!message.senderId) return null;

    const cached = this.names.get(message.senderId);
    if (cached) return cached;

    try {
      const name = await this.source.getUserName(message.senderId);
      if (name) {
        this.names.set(message.senderId, name);
        return name;
      }
    } catch (error) {
      this.logger.warn({ error, senderId: message.senderId }, 'Failed to resolve author');
    }
    return message.senderId;
  }

  private fetchMedia(message: InboundMessage, ref: MediaRef, signal?: AbortSignal): Promise<ResolvedMedia> {
    return withRetry(
      async () => {
        let url: string | null;
        try {
          url = await this.source.resolveMediaUrl(message, ref);
        } catch (error) {
          throw new FetchFailedError(ref.id ?? '', `Could not resolve ${ref.kind} URL`, { permanent: false }, { cause: error });
        }
        if (!url) {
          throw new FetchFailedError(ref.id ?? '', `No download URL for ${ref.kind}`, { permanent: true });
        }

        const file = await this.fetchBytes(url, signal);
        const media: ResolvedMedia = {
          kind: ref.kind,
          data: file.data,
          filename: ref.name || file.filename || DEFAULT_FILENAMES[ref.kind],
        };
        if (file.contentType) media.contentType = file.contentType;
        return media;
      },
      {
        maxAttempts: this.options.fetchAttempts,
        baseDelayMs: this.options.retryBaseDelayMs ?? 1_000,
        shouldRetry: (error) => !(error instanceof FetchFailedError && error.permanent),
        onRetry: (error, attempt, delayMs) =>
          this.logger.debug({ error, attempt, delayMs, kind: ref.kind }, 'Retrying media fetch'),
        ...(signal ? { signal } : {}),
      }
    );
  }
}

function toFetchFailure(error: unknown): FetchFailedError {
  if (error instanceof FetchFailedError) return error;
  return new FetchFailedError('', 'Unexpected media fetch failure', { permanent: false }, { cause: error });
}
