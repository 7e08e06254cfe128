import type Database from 'better-sqlite3';
import { getDb } from '../db/db.js';
import { insertUser } from '../services/index.js';
import { github } from '../services/github.js';
import type { Target, TargetContext } from '../targets/types.js';

export interface GithubUserItem {
  username: string;
  /** ISO timestamp of when the user was seen; defaults to now. */
  when?: string;
}

/**
 * Accepts either a bare username / profile URL or `{ username, when? }`.
 */
export function parseGithubUserItem(item: unknown): GithubUserItem {
  if (typeof item === 'string' && item !== '') {
    return { username: item };
  }
  if (typeof item === 'object' && item !== null && 'username' in item && typeof item.username === 'string') {
    const when = 'when' in item && typeof item.when === 'string' ? item.when : undefined;
    return { username: item.username, when };
  }
  throw new Error(`Expected a GitHub username or { username }, got ${JSON.stringify(item)}`);
}

/**
 * Targets that file GitHub users into the account database named by the
 * worker's `database` option. Databases stay open across items and are
 * closed by `dispose()`.
 */
export function createGithubTargets(): Record<string, Target> {
  const databases = new Map<string, Database.Database>();

  function databaseFor(ctx: TargetContext): Database.Database {
    const path = ctx.options.database;
    if (typeof path !== 'string' || path === '') {
      throw new Error(`Worker "${ctx.worker}" needs a "database" option naming the account database file`);
    }
    let db = databases.get(path);
    if (!db) {
      db = getDb(path);
      databases.set(path, db);
    }
    return db;
  }

  return {
    'skrode.services.github:insert_user': {
      kind: 'consumer',
      consume(item, ctx) {
        const { username, when } = parseGithubUserItem(item);
        const account = insertUser(databaseFor(ctx), github, username, {
          when: when ? new Date(when) : undefined,
        });
        ctx.logger.debug('Stored GitHub account', { externalId: account.externalId, accountId: account.id });
        return account;
      },
      dispose() {
        for (const db of databases.values()) db.close();
        databases.clear();
      },
    },
  };
}
