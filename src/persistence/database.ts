import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';

const logger = createLogger({ component: 'database' });

let db: Database.Database | null = null;

export function getDatabase(dbPath = process.env.DATABASE_PATH || 'data/relay.db'): Database.Database {
  if (db) {
    return db;
  }

  logger.info({ dbPath }, 'Initializing database');
  mkdirSync(dirname(dbPath), { recursive: true });

  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  runMigrations(db);

  return db;
}

/** Opens a private in-memory database with the schema applied. */
export function createMemoryDatabase(): Database.Database {
  const memory = new Database(':memory:');
  memory.pragma('foreign_keys = ON');
  runMigrations(memory);
  return memory;
}

export function runMigrations(database: Database.Database): void {
  logger.debug('Running database migrations');

  // Catalog entries are never deleted, only deactivated
  database.exec(`
    CREATE TABLE IF NOT EXISTS catalog (
      chat_id TEXT PRIMARY KEY,
      display_name TEXT,
      active INTEGER NOT NULL DEFAULT 1,
      created_at INTEGER DEFAULT (strftime('%s', 'now')),
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );
  `);

  database.exec(`
    CREATE TABLE IF NOT EXISTS recipients (
      recipient_id TEXT PRIMARY KEY,
      username TEXT,
      name TEXT,
      created_at INTEGER DEFAULT (strftime('%s', 'now'))
    );

    CREATE TABLE IF NOT EXISTS subscriptions (
      recipient_id TEXT NOT NULL REFERENCES recipients(recipient_id),
      chat_id TEXT NOT NULL,
      created_at INTEGER DEFAULT (strftime('%s', 'now')),
      PRIMARY KEY (recipient_id, chat_id)
    );

    CREATE INDEX IF NOT EXISTS idx_subscriptions_chat ON subscriptions(chat_id);
  `);
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database closed');
  }
}
