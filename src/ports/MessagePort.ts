export interface IncomingMessage {
  id: string;
  from: string; // Telegram chat ID
  text: string;
  timestamp: Date;
  username?: string;
  fullName?: string;
}

export interface CallbackAction {
  id: string;
  from: string;
  /** Chat and message holding the keyboard that was pressed */
  chatId: string;
  messageId: number;
  data: string;
  username?: string;
  fullName?: string;
}

export interface KeyboardButton {
  text: string;
  data: string;
}

/** One button per row */
export type Keyboard = KeyboardButton[];

export interface MessagePort {
  sendMessage(to: string, text: string, keyboard?: Keyboard): Promise<void>;
  editMessage(chatId: string, messageId: number, text: string, keyboard?: Keyboard): Promise<void>;
  editKeyboard(chatId: string, messageId: number, keyboard: Keyboard): Promise<void>;
  answerCallback(callbackId: string, text?: string, showAlert?: boolean): Promise<void>;
  onMessage(handler: (message: IncomingMessage) => Promise<void>): void;
  onCallback(handler: (action: CallbackAction) => Promise<void>): void;
}
