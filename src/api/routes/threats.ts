import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { createThreat, deleteThreat, getThreat, listThreats, updateThreat } from '../../store/threatDb.js';
import { ThreatCreateSchema, ThreatStatusSchema, ThreatUpdateSchema } from '../../store/schema.js';
import { parseId, parseQuery, readBody } from '../validate.js';

export function threatRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  app.get('/threats', (c) => {
    const status = parseQuery(ThreatStatusSchema.optional(), c.req.query('status'), 'status');
    return c.json(listThreats(ctx.db, { status }));
  });

  app.get('/threats/:id', (c) => c.json(getThreat(ctx.db, parseId(c))));

  // POST /threats: `threat_type` is accepted in place of `type`
  app.post('/threats', async (c) => {
    const body = await readBody(c, ThreatCreateSchema);
    return c.json(createThreat(ctx.db, body), 201);
  });

  app.patch('/threats/:id', async (c) => {
    const id = parseId(c);
    const body = await readBody(c, ThreatUpdateSchema);
    return c.json(updateThreat(ctx.db, id, body));
  });

  app.delete('/threats/:id', (c) => {
    deleteThreat(ctx.db, parseId(c));
    return c.body(null, 204);
  });

  return app;
}
