import type { z } from 'zod';
import { DbError, errorMessage } from '../shared/errors.js';

export type SqlValue = string | number | null;

export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

/**
 * Build the SET clause for a partial update. Keys whose value is undefined
 * are left out; null clears the column.
 */
export function buildAssignments(fields: Record<string, SqlValue | undefined>): {
  sets: string[];
  values: SqlValue[];
} {
  const sets: string[] = [];
  const values: SqlValue[] = [];
  for (const [column, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    sets.push(`${column} = ?`);
    values.push(value);
  }
  return { sets, values };
}

/** Empty objects and arrays are stored as NULL, like a missing value. */
export function encodeJson(value: object | null | undefined): string | null | undefined {
  if (value === undefined) return undefined;
  if (value === null) return null;
  if (Array.isArray(value) ? value.length === 0 : Object.keys(value).length === 0) return null;
  return JSON.stringify(value);
}

export function decodeJson<T>(
  text: string | null,
  schema: z.ZodType<T>,
  context: Record<string, unknown>,
): T | null {
  if (text === null) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new DbError('Stored JSON column is malformed', { ...context, cause: errorMessage(err) });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new DbError('Stored JSON column has an unexpected shape', {
      ...context,
      errors: result.error.flatten().formErrors,
    });
  }
  return result.data;
}
