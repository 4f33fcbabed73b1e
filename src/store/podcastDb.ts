import type { Db } from '../db/db.js';
import type { PodcastEpisode, PodcastEpisodeCreate, PodcastEpisodeUpdate } from './schema.js';
import { buildAssignments, isUniqueViolation } from './sqlite.js';
import { ConflictError, DbError, NotFoundError, errorMessage } from '../shared/errors.js';

function conflict(podcastUrl: string): ConflictError {
  return new ConflictError(`Podcast episode with URL ${podcastUrl} already exists.`, {
    podcast_url: podcastUrl,
  });
}

export function createPodcastEpisode(db: Db, input: PodcastEpisodeCreate): PodcastEpisode {
  let id: number;
  try {
    const result = db
      .prepare(
        `INSERT INTO podcast_episodes
           (title, episode_number, podcast_url, description, published_date, image_url)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.title,
        input.episode_number ?? null,
        input.podcast_url,
        input.description ?? null,
        input.published_date ?? null,
        input.image_url ?? null,
      );
    id = Number(result.lastInsertRowid);
  } catch (err) {
    if (isUniqueViolation(err)) throw conflict(input.podcast_url);
    throw new DbError(`Failed to add podcast episode: ${errorMessage(err)}`, {
      podcast_url: input.podcast_url,
    });
  }

  return getPodcastEpisode(db, id);
}

export function listPodcastEpisodes(db: Db): PodcastEpisode[] {
  return db.prepare('SELECT * FROM podcast_episodes ORDER BY id ASC').all() as PodcastEpisode[];
}

export function getPodcastEpisode(db: Db, id: number): PodcastEpisode {
  const episode = db.prepare('SELECT * FROM podcast_episodes WHERE id = ?').get(id) as
    | PodcastEpisode
    | undefined;
  if (!episode) {
    throw new NotFoundError('Podcast episode not found.', { id });
  }
  return episode;
}

export function updatePodcastEpisode(
  db: Db,
  id: number,
  updates: PodcastEpisodeUpdate,
): PodcastEpisode {
  const current = getPodcastEpisode(db, id);

  const { sets, values } = buildAssignments({
    title: updates.title,
    episode_number: updates.episode_number,
    podcast_url: updates.podcast_url,
    description: updates.description,
    published_date: updates.published_date,
    image_url: updates.image_url,
  });

  if (sets.length === 0) return current;

  try {
    db.prepare(`UPDATE podcast_episodes SET ${sets.join(', ')} WHERE id = ?`).run(...values, id);
  } catch (err) {
    if (isUniqueViolation(err) && updates.podcast_url !== undefined) throw conflict(updates.podcast_url);
    throw new DbError(`Failed to update podcast episode: ${errorMessage(err)}`, { id });
  }

  return getPodcastEpisode(db, id);
}

export function deletePodcastEpisode(db: Db, id: number): void {
  const result = db.prepare('DELETE FROM podcast_episodes WHERE id = ?').run(id);
  if (result.changes === 0) {
    throw new NotFoundError('Podcast episode not found.', { id });
  }
}
