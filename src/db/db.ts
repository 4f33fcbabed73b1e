import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type Db = Database.Database;

/**
 * Open a connection with the pragmas every caller expects. The handle is
 * returned to the caller and passed along explicitly; nothing is cached here.
 */
export function openDb(dbPath: string): Db {
  const resolved = dbPath === ':memory:' ? ':memory:' : resolvePath(dbPath);

  if (resolved !== ':memory:') {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
  }

  try {
    const db = new Database(resolved);
    if (resolved !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');

    logger.debug({ path: resolved }, 'Database opened');
    return db;
  } catch (err) {
    throw new DbError(`Failed to open database at ${resolved}`, {
      path: resolved,
      cause: errorMessage(err),
    });
  }
}

export function closeDb(db: Db): void {
  if (db.open) {
    db.close();
  }
}
