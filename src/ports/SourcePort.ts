export type MediaKind = 'photo' | 'file' | 'video';

export type MessageKind = 'text' | MediaKind;

/**
 * A media attachment as the source platform describes it. Photos usually carry a
 * direct URL; videos and files carry an id the source resolves on demand.
 */
export interface MediaRef {
  kind: MediaKind;
  url?: string;
  id?: string;
  name?: string;
}

export interface InboundMessage {
  chatId: string;
  /** Source message id, a decimal string; orders messages within one chat. */
  position: string;
  senderId?: string;
  senderName?: string;
  text: string;
  timestamp: Date;
  attachments: MediaRef[];
}

export type ConnectionState = 'connected' | 'disconnected' | 'closed';

export interface SourcePort {
  /**
   * Live messages for one chat in arrival order. The sequence never restarts:
   * a new subscription starts from "now". It ends when `signal` aborts and
   * throws ConnectionLostError once the source gives up reconnecting.
   */
  subscribeLive(chatId: string, signal?: AbortSignal): AsyncIterable<InboundMessage>;
  /** The most recent `count` messages, oldest first. */
  fetchHistory(chatId: string, count: number): Promise<InboundMessage[]>;
  resolveMediaUrl(message: InboundMessage, ref: MediaRef): Promise<string | null>;
  getUserName(userId: string): Promise<string | null>;
  getChatTitles(): Map<string, string>;
  onConnectionChange(listener: (state: ConnectionState) => void): void;
}

export function messageKind(message: Pick<InboundMessage, 'attachments'>): MessageKind {
  return message.attachments[0]?.kind ?? 'text';
}
