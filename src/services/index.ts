import type Database from 'better-sqlite3';

/**
 * How a service's accounts are recognized: its display name, the sites it
 * lives on, and how a username or profile link maps to a stable external id.
 */
export interface ServiceDefinition {
  name: string;
  urls: string[];
  externalId(username: string): string;
  /** Store `urls` as given instead of reducing them to scheme and host. */
  keepUrls?: boolean;
}

export interface ServiceRecord {
  id: number;
  name: string;
  more: Record<string, unknown>;
}

export interface AccountRecord {
  id: number;
  serviceId: number;
  externalId: string;
  personaId: number;
  seenAt: string;
}

export interface InsertUserOptions {
  /** Attach the account to this persona, merging its current persona in. */
  personaId?: number;
  when?: Date;
}

/**
 * Reduce a URL to `http://<host>`. Bare hostnames are accepted.
 */
export function normalizeUrl(url: string): string {
  const parsed = /^[a-z][a-z0-9+.-]*:\/\//i.test(url) ? new URL(url) : new URL(`http://${url}`);
  return `http://${parsed.host}`;
}

/**
 * Get or create the service row, keeping its pretty name and URLs current.
 */
export function ensureService(db: Database.Database, service: ServiceDefinition): ServiceRecord {
  const name = service.name.toLowerCase();

  db.prepare('INSERT OR IGNORE INTO services (name) VALUES (?)').run(name);
  const row = db.prepare('SELECT id, name, more FROM services WHERE name = ?').get(name) as {
    id: number;
    name: string;
    more: string;
  };

  const more = JSON.parse(row.more) as Record<string, unknown>;
  if (!('pretty_name' in more)) {
    more.pretty_name = service.name;
    db.prepare('UPDATE services SET more = ? WHERE id = ?').run(JSON.stringify(more), row.id);
  }

  const insertUrl = db.prepare('INSERT OR IGNORE INTO service_urls (service_id, url) VALUES (?, ?)');
  for (const url of service.urls) {
    insertUrl.run(row.id, service.keepUrls ? url : normalizeUrl(url));
  }

  return { id: row.id, name: row.name, more };
}

/**
 * Record that `username` has an account on `service`. The account is
 * created on first sight with a fresh persona; later sightings update its
 * timestamp. The raw username is kept as one of the account's names.
 */
export function insertUser(
  db: Database.Database,
  service: ServiceDefinition,
  username: string,
  options: InsertUserOptions = {},
): AccountRecord {
  const seenAt = (options.when ?? new Date()).toISOString();

  return db.transaction(() => {
    const svc = ensureService(db, service);
    const externalId = service.externalId(username);

    let account = findAccount(db, svc.id, externalId);
    if (!account) {
      const personaId = options.personaId ?? createPersona(db);
      db.prepare(
        'INSERT INTO accounts (service_id, external_id, persona_id, seen_at) VALUES (?, ?, ?, ?)',
      ).run(svc.id, externalId, personaId, seenAt);
    } else {
      db.prepare('UPDATE accounts SET seen_at = ? WHERE id = ?').run(seenAt, account.id);
      if (options.personaId !== undefined && options.personaId !== account.personaId) {
        mergePersonas(db, options.personaId, account.personaId);
      }
    }

    account = findAccount(db, svc.id, externalId);
    if (!account) {
      throw new Error(`Account ${externalId} vanished during insert`);
    }

    db.prepare('INSERT OR IGNORE INTO names (account_id, name) VALUES (?, ?)').run(account.id, username);
    return account;
  })();
}

/**
 * Move every account of persona `from` onto persona `into`, then drop `from`.
 */
export function mergePersonas(db: Database.Database, into: number, from: number): void {
  db.prepare('UPDATE accounts SET persona_id = ? WHERE persona_id = ?').run(into, from);
  db.prepare('DELETE FROM personas WHERE id = ?').run(from);
}

function createPersona(db: Database.Database): number {
  const result = db.prepare('INSERT INTO personas DEFAULT VALUES').run();
  return Number(result.lastInsertRowid);
}

function findAccount(db: Database.Database, serviceId: number, externalId: string): AccountRecord | undefined {
  const row = db
    .prepare('SELECT id, service_id, external_id, persona_id, seen_at FROM accounts WHERE service_id = ? AND external_id = ?')
    .get(serviceId, externalId) as
    | { id: number; service_id: number; external_id: string; persona_id: number; seen_at: string }
    | undefined;

  if (!row) return undefined;
  return {
    id: row.id,
    serviceId: row.service_id,
    externalId: row.external_id,
    personaId: row.persona_id,
    seenAt: row.seen_at,
  };
}
