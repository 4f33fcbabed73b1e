import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import {
  highlightSnapshot,
  highlightSnapshotFromContent,
  summarizeArticle,
  summarizeArticleFromContent,
} from '../../curation/workflow.js';
import {
  ArticleIdBodySchema,
  ManualHighlightBodySchema,
  ManualSummarizeBodySchema,
  SnapshotIdBodySchema,
  readBody,
} from '../validate.js';

export function curationRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /summarize: scrape, summarize, store; 502 if the scrape or summary fails
  app.post('/summarize', async (c) => {
    const { article_id } = await readBody(c, ArticleIdBodySchema);
    return c.json(await summarizeArticle(ctx, article_id));
  });

  app.post('/summarize-manual', async (c) => {
    const { article_id, manual_content } = await readBody(c, ManualSummarizeBodySchema);
    return c.json(await summarizeArticleFromContent(ctx, article_id, manual_content));
  });

  app.post('/highlight', async (c) => {
    const { snapshot_id } = await readBody(c, SnapshotIdBodySchema);
    return c.json(await highlightSnapshot(ctx, snapshot_id));
  });

  app.post('/highlight-manual', async (c) => {
    const { snapshot_id, manual_content } = await readBody(c, ManualHighlightBodySchema);
    return c.json(await highlightSnapshotFromContent(ctx, snapshot_id, manual_content));
  });

  return app;
}
