export interface OutgoingFile {
  data: Buffer;
  filename: string;
  contentType?: string;
}

/**
 * Sends relayed content to one destination recipient. Failures reject with
 * DeliveryFailedError, classified as transient or permanent.
 */
export interface DeliveryPort {
  sendText(recipientId: string, html: string): Promise<void>;
  sendPhoto(recipientId: string, file: OutgoingFile): Promise<void>;
  sendDocument(recipientId: string, file: OutgoingFile): Promise<void>;
  sendVideo(recipientId: string, file: OutgoingFile): Promise<void>;
}
