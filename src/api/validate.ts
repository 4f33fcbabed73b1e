import type { Context } from 'hono';
import { z } from 'zod';
import { ValidationError } from '../shared/errors.js';

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'body'}: ${issue.message}`)
    .join('; ');
}

/** Parse the JSON body against a schema, or throw a 422-mapped ValidationError. */
export async function readBody<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<z.output<S>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    throw new ValidationError('Request body must be valid JSON.');
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(describeIssues(result.error), {
      errors: result.error.flatten().fieldErrors,
    });
  }
  return result.data;
}

export function parseQuery<S extends z.ZodTypeAny>(schema: S, value: unknown, name: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`${name}: ${result.error.issues.map((i) => i.message).join('; ')}`);
  }
  return result.data;
}

const IdSchema = z.coerce.number().int().positive();

export function parseId(c: Context, param = 'id'): number {
  return parseQuery(IdSchema, c.req.param(param), param);
}

export const ArticleIdBodySchema = z.object({ article_id: z.number().int().positive() });
export const ManualSummarizeBodySchema = ArticleIdBodySchema.extend({ manual_content: z.string() });
export const SnapshotIdBodySchema = z.object({ snapshot_id: z.number().int().positive() });
export const ManualHighlightBodySchema = SnapshotIdBodySchema.extend({ manual_content: z.string() });
