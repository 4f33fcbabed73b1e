import type { Db } from '../db/db.js';
import type { Article, ArticleCreate, ArticleStatus, ArticleUpdate } from './schema.js';
import { buildAssignments, isUniqueViolation } from './sqlite.js';
import { compactPositions, nextPosition } from './positions.js';
import { ConflictError, DbError, NotFoundError, errorMessage } from '../shared/errors.js';

function conflict(url: string): ConflictError {
  return new ConflictError(`Article with URL ${url} already exists.`, { url });
}

export function createArticle(db: Db, input: ArticleCreate): Article {
  const position = input.position ?? nextPosition(db, 'articles');

  let id: number;
  try {
    const result = db
      .prepare(
        `INSERT INTO articles (url, title, source, original_content, summary, status, position)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.url,
        input.title ?? null,
        input.source ?? 'Manual',
        input.original_content ?? null,
        input.summary ?? null,
        input.status ?? 'pending',
        position,
      );
    id = Number(result.lastInsertRowid);
  } catch (err) {
    if (isUniqueViolation(err)) throw conflict(input.url);
    throw new DbError(`Failed to add article: ${errorMessage(err)}`, { url: input.url });
  }

  return getArticle(db, id);
}

export function listArticles(db: Db, opts: { status?: ArticleStatus } = {}): Article[] {
  const where = opts.status ? 'WHERE status = ?' : '';
  const params = opts.status ? [opts.status] : [];
  return db
    .prepare(`SELECT * FROM articles ${where} ORDER BY position IS NULL, position ASC, id ASC`)
    .all(...params) as Article[];
}

export function findArticle(db: Db, id: number): Article | undefined {
  return db.prepare('SELECT * FROM articles WHERE id = ?').get(id) as Article | undefined;
}

export function getArticle(db: Db, id: number): Article {
  const article = findArticle(db, id);
  if (!article) {
    throw new NotFoundError('Article not found.', { id });
  }
  return article;
}

export function updateArticle(db: Db, id: number, updates: ArticleUpdate): Article {
  const current = getArticle(db, id);

  const { sets, values } = buildAssignments({
    url: updates.url,
    title: updates.title,
    source: updates.source,
    original_content: updates.original_content,
    summary: updates.summary,
    status: updates.status,
    position: updates.position,
  });

  if (sets.length === 0) return current;

  try {
    db.prepare(`UPDATE articles SET ${sets.join(', ')} WHERE id = ?`).run(...values, id);
  } catch (err) {
    if (isUniqueViolation(err) && updates.url !== undefined) throw conflict(updates.url);
    throw new DbError(`Failed to update article: ${errorMessage(err)}`, { id });
  }

  return getArticle(db, id);
}

export function deleteArticle(db: Db, id: number): void {
  const remove = db.transaction(() => {
    const result = db.prepare('DELETE FROM articles WHERE id = ?').run(id);
    if (result.changes === 0) {
      throw new NotFoundError('Article not found.', { id });
    }
    compactPositions(db, 'articles');
  });
  remove();
}
