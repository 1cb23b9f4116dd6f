import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';
import fs from 'fs';
import path from 'path';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

// Global state
let db: AppDatabase | null = null;
let sqlite: Database.Database | null = null;

const IN_MEMORY = ':memory:';

/**
 * Create tables if they do not exist
 */
function runMigrations(connection: Database.Database): void {
  connection.exec(`
    CREATE TABLE IF NOT EXISTS validation_settings (
      id INTEGER PRIMARY KEY,
      document TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
  `);
}

/**
 * Open the SQLite database (WAL mode) and run inline migrations.
 * `:memory:` opens a private in-process database.
 */
export function initializeDatabase(dbPath: string): AppDatabase {
  if (dbPath !== IN_MEMORY) {
    // Ensure data directory exists with restrictive permissions
    const dataDir = path.dirname(dbPath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true, mode: 0o700 });
    }
  }

  sqlite = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('busy_timeout = 5000');

  if (dbPath !== IN_MEMORY && process.platform !== 'win32') {
    // The settings document may hold a client secret
    fs.chmodSync(dbPath, 0o600);
  }

  runMigrations(sqlite);
  db = drizzle(sqlite, { schema });
  return db;
}

export function getDatabase(): AppDatabase {
  if (!db) {
    throw new Error('Database not initialized. Call initializeDatabase() first.');
  }
  return db;
}

export function closeDatabase(): void {
  if (sqlite) {
    sqlite.close();
    sqlite = null;
    db = null;
  }
}

export { schema };
