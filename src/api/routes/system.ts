import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { assignMissingPositions } from '../../store/positions.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  app.get('/', (c) => c.json({ message: 'Welcome to The Lowdown API' }));

  app.get('/health', (c) => c.json({ status: 'healthy', service: 'The Lowdown API' }));

  // POST /positions/renumber: number rows that have no position yet
  app.post('/positions/renumber', (c) => {
    return c.json({
      articles: assignMissingPositions(ctx.db, 'articles'),
      snapshots: assignMissingPositions(ctx.db, 'snapshots'),
    });
  });

  return app;
}
