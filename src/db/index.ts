import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import * as schema from './schema';

export type DB = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: DB;
  sqlite: Database.Database;
  close(): void;
}

/**
 * Open (or create) the SQLite database and make sure every table exists.
 * Pass ':memory:' for an ephemeral store.
 */
export function openDatabase(path: string): DatabaseHandle {
  const sqlite = new Database(path);
  if (path !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');
  initializeSchema(sqlite);

  const db = drizzle(sqlite, { schema });
  console.log(`[DB] Opened ${path === ':memory:' ? 'in-memory database' : path}`);

  return {
    db,
    sqlite,
    close: () => sqlite.close(),
  };
}

function initializeSchema(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS credit_accounts (
      user_id TEXT PRIMARY KEY,
      balance INTEGER NOT NULL DEFAULT 0 CHECK (balance >= 0),
      total_purchased INTEGER NOT NULL DEFAULT 0,
      total_spent INTEGER NOT NULL DEFAULT 0,
      starter_grant_used INTEGER NOT NULL DEFAULT 0,
      plan TEXT NOT NULL DEFAULT 'free',
      version INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      archived_at TEXT,
      CHECK (balance = total_purchased - total_spent)
    );

    CREATE TABLE IF NOT EXISTS ledger_transactions (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL REFERENCES credit_accounts(user_id),
      type TEXT NOT NULL,
      amount INTEGER NOT NULL,
      balance_after INTEGER NOT NULL,
      source_event_id TEXT UNIQUE,
      request_id TEXT,
      description TEXT,
      created_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS ledger_transactions_user_idx
      ON ledger_transactions (user_id, created_at);

    CREATE TABLE IF NOT EXISTS idempotency_records (
      scope TEXT NOT NULL,
      key TEXT NOT NULL,
      request_hash TEXT NOT NULL,
      status TEXT NOT NULL,
      result TEXT,
      created_at TEXT NOT NULL,
      completed_at TEXT,
      PRIMARY KEY (scope, key)
    );

    CREATE TABLE IF NOT EXISTS webhook_events (
      id TEXT PRIMARY KEY,
      event_id TEXT NOT NULL,
      provider TEXT NOT NULL,
      type TEXT NOT NULL,
      outcome TEXT NOT NULL,
      error TEXT,
      received_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS api_keys (
      key_hash TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      plan TEXT NOT NULL DEFAULT 'free',
      is_active INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL
    );
  `);
}

export { schema };
