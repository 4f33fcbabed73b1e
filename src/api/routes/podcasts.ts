import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import {
  createPodcastEpisode,
  deletePodcastEpisode,
  getPodcastEpisode,
  listPodcastEpisodes,
  updatePodcastEpisode,
} from '../../store/podcastDb.js';
import { PodcastEpisodeCreateSchema, PodcastEpisodeUpdateSchema } from '../../store/schema.js';
import { parseId, readBody } from '../validate.js';

export function podcastRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  app.get('/podcasts', (c) => c.json(listPodcastEpisodes(ctx.db)));

  app.get('/podcasts/:id', (c) => c.json(getPodcastEpisode(ctx.db, parseId(c))));

  app.post('/podcasts', async (c) => {
    const body = await readBody(c, PodcastEpisodeCreateSchema);
    return c.json(createPodcastEpisode(ctx.db, body), 201);
  });

  app.patch('/podcasts/:id', async (c) => {
    const id = parseId(c);
    const body = await readBody(c, PodcastEpisodeUpdateSchema);
    return c.json(updatePodcastEpisode(ctx.db, id, body));
  });

  app.delete('/podcasts/:id', (c) => {
    deletePodcastEpisode(ctx.db, parseId(c));
    return c.body(null, 204);
  });

  return app;
}
