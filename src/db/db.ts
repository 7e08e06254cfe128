import Database from 'better-sqlite3';
import { createTables } from './schema.js';

/**
 * Open (or create) the account database and initialize all tables.
 * Uses WAL mode so several mapper processes can write to one file.
 */
export function getDb(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  createTables(db);
  return db;
}
