// Database connection and initialization

import Database from 'better-sqlite3';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { createLogger } from '../shared/logger.js';

const log = createLogger('Database');

let db: Database.Database | null = null;

export interface DatabaseConfig {
  path?: string;
  verbose?: boolean;
}

export const getDatabase = (config: DatabaseConfig = {}): Database.Database => {
  if (db) return db;

  const dbPath = config.path || path.resolve('data', 'db', 'main.sqlite');

  db = new Database(dbPath, {
    verbose: config.verbose ? (message?: unknown) => log.debug(String(message)) : undefined
  });

  db.pragma('journal_mode = WAL');

  return db;
};

export const initializeDatabase = async (config: DatabaseConfig = {}): Promise<Database.Database> => {
  const dbPath = config.path || path.resolve('data', 'db', 'main.sqlite');

  // Ensure directory exists
  await fs.mkdir(path.dirname(dbPath), { recursive: true });

  const database = getDatabase(config);

  runMigrations(database);

  return database;
};

export const runMigrations = (database: Database.Database): void => {
  database.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  for (const migration of getMigrations()) {
    const applied = database.prepare('SELECT 1 FROM migrations WHERE name = ?').get(migration.name);

    if (!applied) {
      log.info(`Applying migration: ${migration.name}`);
      database.transaction(() => {
        database.exec(migration.sql);
        database.prepare('INSERT INTO migrations (name) VALUES (?)').run(migration.name);
      })();
    }
  }
};

interface Migration {
  name: string;
  sql: string;
}

const getMigrations = (): Migration[] => [
  {
    name: '001_create_refinement_sessions',
    sql: `
      CREATE TABLE refinement_sessions (
        id TEXT PRIMARY KEY,
        status TEXT NOT NULL,
        is_complete INTEGER NOT NULL DEFAULT 0,
        iteration_count INTEGER NOT NULL DEFAULT 0,
        error_count INTEGER NOT NULL DEFAULT 0,
        state TEXT NOT NULL,
        version INTEGER NOT NULL DEFAULT 1,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE INDEX idx_sessions_status ON refinement_sessions(status);
      CREATE INDEX idx_sessions_updated ON refinement_sessions(updated_at);
    `
  }
];

export const closeDatabase = (): void => {
  if (db) {
    db.close();
    db = null;
  }
};

export default {
  getDatabase,
  initializeDatabase,
  closeDatabase
};
