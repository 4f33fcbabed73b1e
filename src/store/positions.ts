import type { Db } from '../db/db.js';

/** Tables whose rows carry a manual `position`. */
export type PositionedTable = 'articles' | 'snapshots';

export function nextPosition(db: Db, table: PositionedTable): number {
  const row = db.prepare(`SELECT MAX(position) AS max_pos FROM ${table}`).get() as {
    max_pos: number | null;
  };
  return (row.max_pos ?? 0) + 1;
}

/**
 * Renumber non-archived rows 1..n in their current order. Rows already at
 * the right position are not written, so their updated_at stays put.
 */
export function compactPositions(db: Db, table: PositionedTable): void {
  const rows = db
    .prepare(
      `SELECT id FROM ${table} WHERE status != 'archived'
       ORDER BY position IS NULL, position ASC, id ASC`,
    )
    .all() as Array<{ id: number }>;

  const update = db.prepare(`UPDATE ${table} SET position = ? WHERE id = ? AND position IS NOT ?`);
  rows.forEach((row, i) => {
    update.run(i + 1, row.id, i + 1);
  });
}

/**
 * Give every row without a position one after the current maximum, oldest
 * first. Returns how many rows were numbered.
 */
export function assignMissingPositions(db: Db, table: PositionedTable): number {
  const assign = db.transaction(() => {
    const missing = db
      .prepare(`SELECT id FROM ${table} WHERE position IS NULL ORDER BY created_at ASC, id ASC`)
      .all() as Array<{ id: number }>;

    let position = nextPosition(db, table);
    const update = db.prepare(`UPDATE ${table} SET position = ? WHERE id = ?`);
    for (const row of missing) {
      update.run(position, row.id);
      position++;
    }
    return missing.length;
  });

  return assign();
}
