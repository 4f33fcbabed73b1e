import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import type { Hono } from 'hono';
import type { Db } from '../../db/db.js';
import { createApp, errorCodeToHttpStatus } from '../server.js';
import { generateDefaultConfig } from '../../shared/config.js';
import { StubSummarizer } from '../../curation/summarizer.js';
import { UpstreamError } from '../../shared/errors.js';
import { listArticles } from '../../store/articleDb.js';
import { createTestDb } from '../../store/__tests__/helpers.js';

const SCRAPED = 'This is a long article content that needs to be summarized.';

let db: Db;
let app: Hono;
let fetchText: Mock<(url: string) => Promise<string>>;

beforeEach(() => {
  db = createTestDb();
  fetchText = vi.fn<(url: string) => Promise<string>>().mockResolvedValue(SCRAPED);
  app = createApp({
    db,
    config: generateDefaultConfig(),
    scraper: { fetchText },
    summarizer: new StubSummarizer(),
  });
});

afterEach(() => {
  db.close();
});

function send(method: string, path: string, body?: unknown): Promise<Response> {
  return Promise.resolve(
    app.request(path, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    }),
  );
}

describe('root and health', () => {
  it('GET / returns the welcome message', async () => {
    const res = await send('GET', '/');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ message: 'Welcome to The Lowdown API' });
  });

  it('GET /health reports healthy', async () => {
    const res = await send('GET', '/health');
    expect(await res.json()).toEqual({ status: 'healthy', service: 'The Lowdown API' });
  });

  it('unknown routes return 404 with a detail', async () => {
    const res = await send('GET', '/nope');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ detail: 'Not found' });
  });
});

describe('empty store', () => {
  it.each(['/articles', '/threats', '/snapshots', '/podcasts'])('GET %s returns []', async (path) => {
    const res = await send('GET', path);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual([]);
  });
});

describe('articles', () => {
  const ARTICLE = { url: 'http://test-article.com/1', title: 'Test Article 1' };

  it('creates and lists an article', async () => {
    const created = await send('POST', '/articles', ARTICLE);
    expect(created.status).toBe(201);
    const body = await created.json();
    expect(body).toMatchObject({ ...ARTICLE, status: 'pending', source: 'Manual', position: 1 });
    expect(body.updated_at).toBe(body.created_at);

    const list = await send('GET', '/articles');
    const articles = await list.json();
    expect(articles).toHaveLength(1);
    expect(articles[0]).toEqual(body);
  });

  it('returns 409 for a duplicate URL and keeps one row', async () => {
    await send('POST', '/articles', ARTICLE);
    const res = await send('POST', '/articles', ARTICLE);

    expect(res.status).toBe(409);
    const body = await res.json();
    expect(body.detail).toBe('Article with URL http://test-article.com/1 already exists.');
    expect(body.code).toBe('CONFLICT');
    expect(listArticles(db)).toHaveLength(1);
  });

  it('returns 422 when url is missing', async () => {
    const res = await send('POST', '/articles', { title: 'No URL' });
    expect(res.status).toBe(422);
    const body = await res.json();
    expect(body.detail).toBe('url: Required');
    expect(body.details).toEqual({ errors: { url: ['Required'] } });
  });

  it('returns 422 for malformed JSON', async () => {
    const res = await app.request('/articles', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{not json',
    });
    expect(res.status).toBe(422);
    expect((await res.json()).detail).toBe('Request body must be valid JSON.');
  });

  it('returns 422 for an unknown status value', async () => {
    const res = await send('POST', '/articles', { ...ARTICLE, status: 'published' });
    expect(res.status).toBe(422);
  });

  it('filters the list by status', async () => {
    await send('POST', '/articles', ARTICLE);
    await send('POST', '/articles', { url: 'http://test-article.com/2', status: 'accepted' });

    const res = await send('GET', '/articles?status=accepted');
    const articles = await res.json();
    expect(articles.map((a: { url: string }) => a.url)).toEqual(['http://test-article.com/2']);

    const bad = await send('GET', '/articles?status=bogus');
    expect(bad.status).toBe(422);
  });

  it('fetches, updates and deletes by id', async () => {
    const { id } = await (await send('POST', '/articles', ARTICLE)).json();

    const fetched = await send('GET', `/articles/${id}`);
    expect((await fetched.json()).title).toBe('Test Article 1');

    const patched = await send('PATCH', `/articles/${id}`, { title: 'Updated Title' });
    expect(patched.status).toBe(200);
    expect((await patched.json()).title).toBe('Updated Title');

    const deleted = await send('DELETE', `/articles/${id}`);
    expect(deleted.status).toBe(204);

    const gone = await send('GET', `/articles/${id}`);
    expect(gone.status).toBe(404);
    expect((await gone.json()).detail).toBe('Article not found.');
  });

  it('returns 422 for a non-numeric id', async () => {
    const res = await send('GET', '/articles/abc');
    expect(res.status).toBe(422);
  });
});

describe('threats', () => {
  it('creates a threat with structured fields', async () => {
    const res = await send('POST', '/threats', {
      name: 'S-400 Triumf',
      type: 'SAM',
      country_of_origin: 'Russia',
      specifications: { range: '400 km' },
      operators: ['Russia', 'China'],
    });
    expect(res.status).toBe(201);
    const threat = await res.json();
    expect(threat.specifications.range).toBe('400 km');
    expect(threat.operators).toEqual(['Russia', 'China']);
    expect(threat.status).toBe('draft');

    const list = await (await send('GET', '/threats')).json();
    expect(list).toHaveLength(1);
    expect(list[0].name).toBe('S-400 Triumf');
  });

  it('accepts threat_type for type', async () => {
    const res = await send('POST', '/threats', { name: 'T-14 Armata', threat_type: 'Tank' });
    expect((await res.json()).type).toBe('Tank');
  });

  it('returns 422 when specifications is not an object', async () => {
    const res = await send('POST', '/threats', { name: 'X', specifications: ['range'] });
    expect(res.status).toBe(422);
  });

  it('promotes status through PATCH', async () => {
    const { id } = await (await send('POST', '/threats', { name: 'J-20' })).json();
    const res = await send('PATCH', `/threats/${id}`, { status: 'published' });
    expect((await res.json()).status).toBe('published');
  });
});

describe('podcasts', () => {
  const EPISODE = {
    title: 'Episode 1: The Future of Air Combat',
    podcast_url: 'http://example.com/podcast/1',
    description: 'A discussion about sixth-generation fighters.',
    published_date: '2026-06-26',
    image_url: 'http://example.com/image.jpg',
  };

  it('creates and lists an episode', async () => {
    const res = await send('POST', '/podcasts', EPISODE);
    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject(EPISODE);

    const list = await (await send('GET', '/podcasts')).json();
    expect(list).toHaveLength(1);
  });

  it('returns 409 for a duplicate podcast_url', async () => {
    await send('POST', '/podcasts', EPISODE);
    const res = await send('POST', '/podcasts', EPISODE);
    expect(res.status).toBe(409);
    expect((await res.json()).detail).toBe('Podcast episode with URL http://example.com/podcast/1 already exists.');
  });

  it('returns 422 without podcast_url', async () => {
    const res = await send('POST', '/podcasts', { title: 'Lonely' });
    expect(res.status).toBe(422);
    expect((await res.json()).detail).toBe('podcast_url: Required');
  });
});

describe('snapshots', () => {
  it('creates a snapshot with 201', async () => {
    const res = await send('POST', '/snapshots', { url: 'http://example.com/snap', title: 'Snap' });
    expect(res.status).toBe(201);
    expect((await res.json()).status).toBe('pending');
  });
});

describe('POST /summarize', () => {
  it('summarizes an existing article', async () => {
    const { id } = await (
      await send('POST', '/articles', { url: 'http://example.com/article1', title: 'For Summarization' })
    ).json();

    const res = await send('POST', '/summarize', { article_id: id });

    expect(res.status).toBe(200);
    const article = await res.json();
    expect(article.id).toBe(id);
    expect(article.status).toBe('summarized');
    expect(article.original_content).toBe(SCRAPED);
    expect(article.summary).toContain('🎯');
  });

  it('returns 404 for an unknown article', async () => {
    const res = await send('POST', '/summarize', { article_id: 404 });
    expect(res.status).toBe(404);
    expect(fetchText).not.toHaveBeenCalled();
  });

  it('returns 502 and leaves the article pending when scraping fails', async () => {
    const { id } = await (await send('POST', '/articles', { url: 'http://example.com/down' })).json();
    fetchText.mockRejectedValue(new UpstreamError('Web scraping failed: HTTP 503'));

    const res = await send('POST', '/summarize', { article_id: id });

    expect(res.status).toBe(502);
    expect(await res.json()).toMatchObject({ detail: 'Web scraping failed: HTTP 503', code: 'UPSTREAM_ERROR' });
    const article = await (await send('GET', `/articles/${id}`)).json();
    expect(article.status).toBe('pending');
    expect(article.summary).toBeNull();
  });

  it('returns 422 without article_id', async () => {
    const res = await send('POST', '/summarize', {});
    expect(res.status).toBe(422);
    expect((await res.json()).detail).toBe('article_id: Required');
  });
});

describe('manual and highlight endpoints', () => {
  it('POST /summarize-manual rejects blank content', async () => {
    const { id } = await (await send('POST', '/articles', { url: 'http://example.com/m' })).json();
    const res = await send('POST', '/summarize-manual', { article_id: id, manual_content: ' ' });
    expect(res.status).toBe(422);
    expect((await res.json()).detail).toBe('Manual content cannot be empty.');
  });

  it('POST /summarize-manual summarizes pasted text', async () => {
    const { id } = await (await send('POST', '/articles', { url: 'http://example.com/m' })).json();
    const res = await send('POST', '/summarize-manual', { article_id: id, manual_content: 'Pasted.' });
    expect(res.status).toBe(200);
    expect((await res.json()).original_content).toBe('Pasted.');
  });

  it('POST /highlight highlights a snapshot', async () => {
    const { id } = await (await send('POST', '/snapshots', { url: 'http://example.com/s' })).json();
    const res = await send('POST', '/highlight', { snapshot_id: id });
    expect(res.status).toBe(200);
    const snapshot = await res.json();
    expect(snapshot.status).toBe('highlighted');
    expect(snapshot.highlight).toBe(`🚩 ${SCRAPED} ([more](http://example.com/s))`);
  });

  it('POST /highlight-manual highlights pasted text', async () => {
    const { id } = await (await send('POST', '/snapshots', { url: 'http://example.com/s' })).json();
    const res = await send('POST', '/highlight-manual', { snapshot_id: id, manual_content: 'One. Two.' });
    expect((await res.json()).highlight).toBe('🚩 One. ([more](http://example.com/s))');
  });
});

describe('POST /positions/renumber', () => {
  it('numbers rows without a position', async () => {
    await send('POST', '/articles', { url: 'http://example.com/a' });
    db.prepare('UPDATE articles SET position = NULL').run();

    const res = await send('POST', '/positions/renumber');
    expect(await res.json()).toEqual({ articles: 1, snapshots: 0 });
  });
});

describe('errorCodeToHttpStatus', () => {
  it('maps error codes to statuses', () => {
    expect(errorCodeToHttpStatus('VALIDATION_ERROR')).toBe(422);
    expect(errorCodeToHttpStatus('CONFLICT')).toBe(409);
    expect(errorCodeToHttpStatus('NOT_FOUND')).toBe(404);
    expect(errorCodeToHttpStatus('UPSTREAM_ERROR')).toBe(502);
    expect(errorCodeToHttpStatus('DB_ERROR')).toBe(500);
  });
});
