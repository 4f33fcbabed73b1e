import fs from 'node:fs';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { Config } from '../shared/config.js';
import { LowdownError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { openDb, closeDb, type Db } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { getDefaultConfigPath, loadConfig, writeDefaultConfig } from '../shared/config.js';
import { JsdomScraper, type WebScraper } from '../curation/scraper.js';
import { StubSummarizer, type Summarizer } from '../curation/summarizer.js';
import { systemRoutes } from './routes/system.js';
import { articleRoutes } from './routes/articles.js';
import { threatRoutes } from './routes/threats.js';
import { snapshotRoutes } from './routes/snapshots.js';
import { podcastRoutes } from './routes/podcasts.js';
import { curationRoutes } from './routes/curation.js';

/** Everything a request handler may touch, passed in at construction. */
export interface AppContext {
  db: Db;
  config: Config;
  scraper: WebScraper;
  summarizer: Summarizer;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.route('/', systemRoutes(ctx));
  app.route('/', articleRoutes(ctx));
  app.route('/', threatRoutes(ctx));
  app.route('/', snapshotRoutes(ctx));
  app.route('/', podcastRoutes(ctx));
  app.route('/', curationRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof LowdownError) {
      const status = errorCodeToHttpStatus(err.code);
      if (status >= 500) {
        logger.error({ code: err.code, error: err.message, details: err.details }, 'Request failed');
      }
      return c.json({ detail: err.message, code: err.code, details: err.details }, status);
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ detail: 'Internal server error' }, 500);
  });

  app.notFound((c) => {
    return c.json({ detail: 'Not found' }, 404);
  });

  return app;
}

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'VALIDATION_ERROR':
      return 422;
    case 'CONFLICT':
      return 409;
    case 'NOT_FOUND':
      return 404;
    case 'UPSTREAM_ERROR':
      return 502;
    case 'CONFIG_ERROR':
    case 'DB_ERROR':
    default:
      return 500;
  }
}

export function createDefaultCollaborators(config: Config): Pick<AppContext, 'scraper' | 'summarizer'> {
  return {
    scraper: new JsdomScraper({
      timeoutMs: config.scraper.timeout_ms,
      userAgent: config.scraper.user_agent,
      minLineChars: config.scraper.min_line_chars,
    }),
    summarizer: new StubSummarizer(config.summarizer.excerpt_chars),
  };
}

export async function startServer(opts: { port?: number } = {}): Promise<void> {
  const configPath = getDefaultConfigPath();
  if (!process.env['LOWDOWN_CONFIG'] && !fs.existsSync(configPath)) {
    writeDefaultConfig(configPath);
    logger.info({ configPath }, 'First run: wrote default config');
  }

  const config = await loadConfig();
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const db = openDb(config.db.path);
  runMigrations(db);

  const app = createApp({ db, config, ...createDefaultCollaborators(config) });

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ port: info.port, host }, 'The Lowdown API listening');
  });

  const shutdown = () => {
    logger.info('Shutting down...');
    server.close(() => {
      closeDb(db);
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
