import type { Db } from '../db/db.js';
import {
  OperatorsSchema,
  SpecificationsSchema,
  type Threat,
  type ThreatCreate,
  type ThreatStatus,
  type ThreatUpdate,
} from './schema.js';
import { buildAssignments, decodeJson, encodeJson } from './sqlite.js';
import { DbError, NotFoundError, errorMessage } from '../shared/errors.js';

/** Row as stored: the structured columns are JSON text. */
interface ThreatRow extends Omit<Threat, 'specifications' | 'operators'> {
  specifications: string | null;
  operators: string | null;
}

function toThreat(row: ThreatRow): Threat {
  return {
    ...row,
    specifications: decodeJson(row.specifications, SpecificationsSchema, { id: row.id, column: 'specifications' }),
    operators: decodeJson(row.operators, OperatorsSchema, { id: row.id, column: 'operators' }),
  };
}

export function createThreat(db: Db, input: ThreatCreate): Threat {
  let id: number;
  try {
    const result = db
      .prepare(
        `INSERT INTO threats
           (name, type, country_of_origin, description, specifications, ioc_year,
            operators, image_url, tod_summary, status)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.name,
        input.type ?? null,
        input.country_of_origin ?? null,
        input.description ?? null,
        encodeJson(input.specifications) ?? null,
        input.ioc_year ?? null,
        encodeJson(input.operators) ?? null,
        input.image_url ?? null,
        input.tod_summary ?? null,
        input.status ?? 'draft',
      );
    id = Number(result.lastInsertRowid);
  } catch (err) {
    throw new DbError(`Failed to add threat: ${errorMessage(err)}`, { name: input.name });
  }

  return getThreat(db, id);
}

export function listThreats(db: Db, opts: { status?: ThreatStatus } = {}): Threat[] {
  const where = opts.status ? 'WHERE status = ?' : '';
  const params = opts.status ? [opts.status] : [];
  const rows = db.prepare(`SELECT * FROM threats ${where} ORDER BY id ASC`).all(...params) as ThreatRow[];
  return rows.map(toThreat);
}

export function getThreat(db: Db, id: number): Threat {
  const row = db.prepare('SELECT * FROM threats WHERE id = ?').get(id) as ThreatRow | undefined;
  if (!row) {
    throw new NotFoundError('Threat not found.', { id });
  }
  return toThreat(row);
}

export function updateThreat(db: Db, id: number, updates: ThreatUpdate): Threat {
  const current = getThreat(db, id);

  const { sets, values } = buildAssignments({
    name: updates.name,
    type: updates.type,
    country_of_origin: updates.country_of_origin,
    description: updates.description,
    specifications: encodeJson(updates.specifications),
    ioc_year: updates.ioc_year,
    operators: encodeJson(updates.operators),
    image_url: updates.image_url,
    tod_summary: updates.tod_summary,
    status: updates.status,
  });

  if (sets.length === 0) return current;

  try {
    db.prepare(`UPDATE threats SET ${sets.join(', ')} WHERE id = ?`).run(...values, id);
  } catch (err) {
    throw new DbError(`Failed to update threat: ${errorMessage(err)}`, { id });
  }

  return getThreat(db, id);
}

export function deleteThreat(db: Db, id: number): void {
  const result = db.prepare('DELETE FROM threats WHERE id = ?').run(id);
  if (result.changes === 0) {
    throw new NotFoundError('Threat not found.', { id });
  }
}
