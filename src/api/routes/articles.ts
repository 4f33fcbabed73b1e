import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import {
  createArticle,
  deleteArticle,
  getArticle,
  listArticles,
  updateArticle,
} from '../../store/articleDb.js';
import { ArticleCreateSchema, ArticleStatusSchema, ArticleUpdateSchema } from '../../store/schema.js';
import { parseId, parseQuery, readBody } from '../validate.js';

export function articleRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /articles: ordered by position, optional ?status=
  app.get('/articles', (c) => {
    const status = parseQuery(ArticleStatusSchema.optional(), c.req.query('status'), 'status');
    return c.json(listArticles(ctx.db, { status }));
  });

  app.get('/articles/:id', (c) => {
    return c.json(getArticle(ctx.db, parseId(c)));
  });

  // POST /articles: 409 when the URL is already stored
  app.post('/articles', async (c) => {
    const body = await readBody(c, ArticleCreateSchema);
    return c.json(createArticle(ctx.db, body), 201);
  });

  app.patch('/articles/:id', async (c) => {
    const id = parseId(c);
    const body = await readBody(c, ArticleUpdateSchema);
    return c.json(updateArticle(ctx.db, id, body));
  });

  app.delete('/articles/:id', (c) => {
    deleteArticle(ctx.db, parseId(c));
    return c.body(null, 204);
  });

  return app;
}
