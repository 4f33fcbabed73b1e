import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import {
  createSnapshot,
  deleteSnapshot,
  getSnapshot,
  listSnapshots,
  updateSnapshot,
} from '../../store/snapshotDb.js';
import { SnapshotCreateSchema, SnapshotStatusSchema, SnapshotUpdateSchema } from '../../store/schema.js';
import { parseId, parseQuery, readBody } from '../validate.js';

export function snapshotRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  app.get('/snapshots', (c) => {
    const status = parseQuery(SnapshotStatusSchema.optional(), c.req.query('status'), 'status');
    return c.json(listSnapshots(ctx.db, { status }));
  });

  app.get('/snapshots/:id', (c) => c.json(getSnapshot(ctx.db, parseId(c))));

  app.post('/snapshots', async (c) => {
    const body = await readBody(c, SnapshotCreateSchema);
    return c.json(createSnapshot(ctx.db, body), 201);
  });

  app.patch('/snapshots/:id', async (c) => {
    const id = parseId(c);
    const body = await readBody(c, SnapshotUpdateSchema);
    return c.json(updateSnapshot(ctx.db, id, body));
  });

  app.delete('/snapshots/:id', (c) => {
    deleteSnapshot(ctx.db, parseId(c));
    return c.body(null, 204);
  });

  return app;
}
