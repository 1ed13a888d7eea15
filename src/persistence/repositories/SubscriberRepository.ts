import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';

export interface Recipient {
  recipientId: string;
  username?: string;
  name?: string;
}

export class SubscriberRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  /** Registers a recipient, refreshing username and name when they are given. */
  ensureRecipient(recipientId: string, username?: string, name?: string): void {
    this.db
      .prepare(
        `INSERT INTO recipients (recipient_id, username, name)
         VALUES (?, ?, ?)
         ON CONFLICT(recipient_id) DO UPDATE SET
           username = COALESCE(excluded.username, recipients.username),
           name = COALESCE(excluded.name, recipients.name)`
      )
      .run(recipientId, username ?? null, name ?? null);
  }

  subscribe(recipientId: string, chatId: string): void {
    this.ensureRecipient(recipientId);
    this.db
      .prepare('INSERT OR IGNORE INTO subscriptions (recipient_id, chat_id) VALUES (?, ?)')
      .run(recipientId, chatId);
  }

  unsubscribe(recipientId: string, chatId: string): boolean {
    const result = this.db
      .prepare('DELETE FROM subscriptions WHERE recipient_id = ? AND chat_id = ?')
      .run(recipientId, chatId);
    return result.changes > 0;
  }

  getRecipientChats(recipientId: string): string[] {
    const rows = this.db
      .prepare('SELECT chat_id FROM subscriptions WHERE recipient_id = ? ORDER BY created_at, chat_id')
      .all(recipientId) as { chat_id: string }[];
    return rows.map((r) => r.chat_id);
  }

  getSubscribers(chatId: string): string[] {
    const rows = this.db
      .prepare('SELECT recipient_id FROM subscriptions WHERE chat_id = ? ORDER BY recipient_id')
      .all(chatId) as { recipient_id: string }[];
    return rows.map((r) => r.recipient_id);
  }

  listRecipients(): Recipient[] {
    const rows = this.db
      .prepare('SELECT recipient_id, username, name FROM recipients ORDER BY created_at, recipient_id')
      .all() as { recipient_id: string; username: string | null; name: string | null }[];

    return rows.map((row) => {
      const recipient: Recipient = { recipientId: row.recipient_id };
      if (row.username) recipient.username = row.username;
      if (row.name) recipient.name = row.name;
      return recipient;
    });
  }
}
