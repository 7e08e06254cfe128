import type Database from 'better-sqlite3';

const CREATE_PERSONAS = `
CREATE TABLE IF NOT EXISTS personas (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
)`;

const CREATE_SERVICES = `
CREATE TABLE IF NOT EXISTS services (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  more TEXT NOT NULL DEFAULT '{}'
)`;

const CREATE_SERVICE_URLS = `
CREATE TABLE IF NOT EXISTS service_urls (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  service_id INTEGER NOT NULL REFERENCES services(id),
  url TEXT NOT NULL,
  UNIQUE (service_id, url)
)`;

const CREATE_ACCOUNTS = `
CREATE TABLE IF NOT EXISTS accounts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  service_id INTEGER NOT NULL REFERENCES services(id),
  external_id TEXT NOT NULL,
  persona_id INTEGER NOT NULL REFERENCES personas(id),
  seen_at TEXT NOT NULL,
  UNIQUE (service_id, external_id)
)`;

const CREATE_NAMES = `
CREATE TABLE IF NOT EXISTS names (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  account_id INTEGER NOT NULL REFERENCES accounts(id),
  name TEXT NOT NULL,
  UNIQUE (account_id, name)
)`;

const CREATE_INDEXES = [
  `CREATE INDEX IF NOT EXISTS idx_accounts_persona ON accounts(persona_id)`,
  `CREATE INDEX IF NOT EXISTS idx_names_name ON names(name)`,
];

export function createTables(db: Database.Database): void {
  db.exec(CREATE_PERSONAS);
  db.exec(CREATE_SERVICES);
  db.exec(CREATE_SERVICE_URLS);
  db.exec(CREATE_ACCOUNTS);
  db.exec(CREATE_NAMES);
  for (const idx of CREATE_INDEXES) {
    db.exec(idx);
  }
}
