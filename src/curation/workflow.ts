import type { Db } from '../db/db.js';
import type { Article, Snapshot } from '../store/schema.js';
import type { WebScraper } from './scraper.js';
import type { Summarizer } from './summarizer.js';
import { getArticle, updateArticle } from '../store/articleDb.js';
import { getSnapshot, updateSnapshot } from '../store/snapshotDb.js';
import { UpstreamError, ValidationError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface CurationDeps {
  db: Db;
  scraper: WebScraper;
  summarizer: Summarizer;
}

/**
 * Run one collaborator call. Every failure surfaces as UpstreamError so the
 * caller aborts before writing anything.
 */
async function callUpstream<T>(step: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    logger.warn({ step, error: errorMessage(err) }, 'Upstream call failed, nothing written');
    if (err instanceof UpstreamError) throw err;
    throw new UpstreamError(`${step} failed: ${errorMessage(err)}`);
  }
}

function requireContent(content: string): string {
  if (content.trim() === '') {
    throw new ValidationError('Manual content cannot be empty.');
  }
  return content;
}

async function summarizeWithContent(
  deps: CurationDeps,
  article: Article,
  content: string,
): Promise<Article> {
  const summary = await callUpstream('Summarization', () =>
    deps.summarizer.summarize({ title: article.title, url: article.url, content }),
  );

  const updated = updateArticle(deps.db, article.id, {
    original_content: content,
    summary,
    status: 'summarized',
  });
  logger.info({ articleId: article.id }, 'Article summarized');
  return updated;
}

/** Scrape the article's URL, summarize the text and mark it summarized. */
export async function summarizeArticle(deps: CurationDeps, articleId: number): Promise<Article> {
  const article = getArticle(deps.db, articleId);
  logger.info({ articleId, url: article.url }, 'Summarizing article');

  const content = await callUpstream('Web scraping', () => deps.scraper.fetchText(article.url));
  return summarizeWithContent(deps, article, content);
}

/** Same as summarizeArticle, with text pasted in by an editor instead of scraped. */
export async function summarizeArticleFromContent(
  deps: CurationDeps,
  articleId: number,
  manualContent: string,
): Promise<Article> {
  const article = getArticle(deps.db, articleId);
  return summarizeWithContent(deps, article, requireContent(manualContent));
}

async function highlightWithContent(
  deps: CurationDeps,
  snapshot: Snapshot,
  content: string,
): Promise<Snapshot> {
  const highlight = await callUpstream('Highlighting', () =>
    deps.summarizer.highlight({ title: snapshot.title, url: snapshot.url, content }),
  );

  const updated = updateSnapshot(deps.db, snapshot.id, {
    original_content: content,
    highlight,
    status: 'highlighted',
  });
  logger.info({ snapshotId: snapshot.id }, 'Snapshot highlighted');
  return updated;
}

export async function highlightSnapshot(deps: CurationDeps, snapshotId: number): Promise<Snapshot> {
  const snapshot = getSnapshot(deps.db, snapshotId);
  logger.info({ snapshotId, url: snapshot.url }, 'Highlighting snapshot');

  const content = await callUpstream('Web scraping', () => deps.scraper.fetchText(snapshot.url));
  return highlightWithContent(deps, snapshot, content);
}

export async function highlightSnapshotFromContent(
  deps: CurationDeps,
  snapshotId: number,
  manualContent: string,
): Promise<Snapshot> {
  const snapshot = getSnapshot(deps.db, snapshotId);
  return highlightWithContent(deps, snapshot, requireContent(manualContent));
}
