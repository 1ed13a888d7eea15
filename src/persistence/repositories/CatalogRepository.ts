import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';

export interface CatalogEntry {
  chatId: string;
  displayName: string;
  active: boolean;
  createdAt: number;
  updatedAt: number;
}

interface CatalogRow {
  chat_id: string;
  display_name: string | null;
  active: number;
  created_at: number;
  updated_at: number;
}

function toEntry(row: CatalogRow): CatalogEntry {
  return {
    chatId: row.chat_id,
    displayName: row.display_name ?? row.chat_id,
    active: row.active === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/** Source chats eligible for relay. */
export class CatalogRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  get(chatId: string): CatalogEntry | null {
    const row = this.db
      .prepare('SELECT chat_id, display_name, active, created_at, updated_at FROM catalog WHERE chat_id = ?')
      .get(chatId) as CatalogRow | undefined;
    return row ? toEntry(row) : null;
  }

  listActive(): CatalogEntry[] {
    const rows = this.db
      .prepare(
        'SELECT chat_id, display_name, active, created_at, updated_at FROM catalog WHERE active = 1 ORDER BY created_at, chat_id'
      )
      .all() as CatalogRow[];
    return rows.map(toEntry);
  }

  listAll(): CatalogEntry[] {
    const rows = this.db
      .prepare('SELECT chat_id, display_name, active, created_at, updated_at FROM catalog ORDER BY created_at, chat_id')
      .all() as CatalogRow[];
    return rows.map(toEntry);
  }

  /** Adds a chat, or reactivates it when it was hidden. */
  add(chatId: string, displayName?: string): CatalogEntry {
    this.db
      .prepare(
        `INSERT INTO catalog (chat_id, display_name, active)
         VALUES (?, ?, 1)
         ON CONFLICT(chat_id) DO UPDATE SET
           active = 1,
           display_name = COALESCE(excluded.display_name, catalog.display_name),
           updated_at = strftime('%s', 'now')`
      )
      .run(chatId, displayName ?? null);

    const entry = this.get(chatId);
    if (!entry) {
      throw new Error(`Catalog entry ${chatId} missing after insert`);
    }
    return entry;
  }

  /** Adds chats that are not in the catalog yet; existing entries keep their state. */
  seed(chatIds: string[]): number {
    const insert = this.db.prepare('INSERT OR IGNORE INTO catalog (chat_id, active) VALUES (?, 1)');
    const seedAll = this.db.transaction((ids: string[]) => {
      let added = 0;
      for (const id of ids) {
        added += insert.run(id).changes;
      }
      return added;
    });
    return seedAll(chatIds);
  }

  /** Soft-deactivates a chat. Returns false when the chat is unknown. */
  deactivate(chatId: string): boolean {
    const result = this.db
      .prepare(`UPDATE catalog SET active = 0, updated_at = strftime('%s', 'now') WHERE chat_id = ?`)
      .run(chatId);
    return result.changes > 0;
  }

  updateDisplayName(chatId: string, displayName: string): void {
    this.db
      .prepare(
        `UPDATE catalog SET display_name = ?, updated_at = strftime('%s', 'now')
         WHERE chat_id = ? AND (display_name IS NULL OR display_name != ?)`
      )
      .run(displayName, chatId, displayName);
  }
}
