import type { Db } from '../db/db.js';
import type { Snapshot, SnapshotCreate, SnapshotStatus, SnapshotUpdate } from './schema.js';
import { buildAssignments, isUniqueViolation } from './sqlite.js';
import { compactPositions, nextPosition } from './positions.js';
import { ConflictError, DbError, NotFoundError, errorMessage } from '../shared/errors.js';

function conflict(url: string): ConflictError {
  return new ConflictError(`Snapshot with URL ${url} already exists.`, { url });
}

export function createSnapshot(db: Db, input: SnapshotCreate): Snapshot {
  const position = input.position ?? nextPosition(db, 'snapshots');

  let id: number;
  try {
    const result = db
      .prepare(
        `INSERT INTO snapshots (url, title, source, original_content, highlight, status, position)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.url,
        input.title ?? null,
        input.source ?? 'Manual',
        input.original_content ?? null,
        input.highlight ?? null,
        input.status ?? 'pending',
        position,
      );
    id = Number(result.lastInsertRowid);
  } catch (err) {
    if (isUniqueViolation(err)) throw conflict(input.url);
    throw new DbError(`Failed to add snapshot: ${errorMessage(err)}`, { url: input.url });
  }

  return getSnapshot(db, id);
}

export function listSnapshots(db: Db, opts: { status?: SnapshotStatus } = {}): Snapshot[] {
  const where = opts.status ? 'WHERE status = ?' : '';
  const params = opts.status ? [opts.status] : [];
  return db
    .prepare(`SELECT * FROM snapshots ${where} ORDER BY position IS NULL, position ASC, id ASC`)
    .all(...params) as Snapshot[];
}

export function findSnapshot(db: Db, id: number): Snapshot | undefined {
  return db.prepare('SELECT * FROM snapshots WHERE id = ?').get(id) as Snapshot | undefined;
}

export function getSnapshot(db: Db, id: number): Snapshot {
  const snapshot = findSnapshot(db, id);
  if (!snapshot) {
    throw new NotFoundError('Snapshot not found.', { id });
  }
  return snapshot;
}

export function updateSnapshot(db: Db, id: number, updates: SnapshotUpdate): Snapshot {
  const current = getSnapshot(db, id);

  const { sets, values } = buildAssignments({
    url: updates.url,
    title: updates.title,
    source: updates.source,
    original_content: updates.original_content,
    highlight: updates.highlight,
    status: updates.status,
    position: updates.position,
  });

  if (sets.length === 0) return current;

  try {
    db.prepare(`UPDATE snapshots SET ${sets.join(', ')} WHERE id = ?`).run(...values, id);
  } catch (err) {
    if (isUniqueViolation(err) && updates.url !== undefined) throw conflict(updates.url);
    throw new DbError(`Failed to update snapshot: ${errorMessage(err)}`, { id });
  }

  return getSnapshot(db, id);
}

export function deleteSnapshot(db: Db, id: number): void {
  const remove = db.transaction(() => {
    const result = db.prepare('DELETE FROM snapshots WHERE id = ?').run(id);
    if (result.changes === 0) {
      throw new NotFoundError('Snapshot not found.', { id });
    }
    compactPositions(db, 'snapshots');
  });
  remove();
}
