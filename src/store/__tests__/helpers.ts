import { openDb, type Db } from '../../db/db.js';
import { runMigrations } from '../../db/migrate.js';

export const OLD_TIMESTAMP = '2020-01-01 00:00:00.000';

export function createTestDb(): Db {
  const db = openDb(':memory:');
  runMigrations(db);
  return db;
}

/**
 * Push a row's timestamps into the past. Writing updated_at directly keeps
 * the trigger from firing, so later updates are guaranteed to move it.
 */
export function backdate(
  db: Db,
  table: 'articles' | 'threats' | 'snapshots' | 'podcast_episodes',
  id: number,
): void {
  db.prepare(`UPDATE ${table} SET created_at = ?, updated_at = ? WHERE id = ?`).run(
    OLD_TIMESTAMP,
    OLD_TIMESTAMP,
    id,
  );
}
