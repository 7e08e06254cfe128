import { join } from 'node:path';
import { mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { createLogger, type Logger } from './logger.js';

export function makeTmpDir(): string {
  const dir = join(tmpdir(), `skrode-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

/** Logger that keeps its entries in memory instead of printing them. */
export function makeTestLogger(): { logger: Logger; entries: Record<string, unknown>[] } {
  const entries: Record<string, unknown>[] = [];
  const logger = createLogger({
    level: 'debug',
    write: (line) => entries.push(JSON.parse(line) as Record<string, unknown>),
  });
  return { logger, entries };
}
