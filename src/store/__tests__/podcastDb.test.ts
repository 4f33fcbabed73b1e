import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Db } from '../../db/db.js';
import {
  createPodcastEpisode,
  deletePodcastEpisode,
  getPodcastEpisode,
  listPodcastEpisodes,
  updatePodcastEpisode,
} from '../podcastDb.js';
import { PodcastEpisodeCreateSchema } from '../schema.js';
import { ConflictError, NotFoundError } from '../../shared/errors.js';
import { createTestDb, backdate, OLD_TIMESTAMP } from './helpers.js';

let db: Db;

beforeEach(() => {
  db = createTestDb();
});

afterEach(() => {
  db.close();
});

const EPISODE = {
  title: 'Episode 1: Air Combat Futures',
  podcast_url: 'https://example.com/podcast/1',
  episode_number: 1,
  description: 'Sixth-generation fighter programs.',
  published_date: '2026-06-26',
  image_url: 'https://example.com/ep1.jpg',
};

describe('podcast episode store', () => {
  it('creates an episode', () => {
    const episode = createPodcastEpisode(db, EPISODE);
    expect(episode).toMatchObject({ id: 1, ...EPISODE });
    expect(episode.updated_at).toBe(episode.created_at);
    expect(listPodcastEpisodes(db)).toHaveLength(1);
  });

  it('rejects a duplicate podcast_url', () => {
    createPodcastEpisode(db, EPISODE);
    expect(() => createPodcastEpisode(db, { ...EPISODE, title: 'Again' })).toThrow(
      new ConflictError('Podcast episode with URL https://example.com/podcast/1 already exists.'),
    );
    expect(listPodcastEpisodes(db)).toHaveLength(1);
  });

  it('updates fields and refreshes updated_at', () => {
    const episode = createPodcastEpisode(db, EPISODE);
    backdate(db, 'podcast_episodes', episode.id);

    const updated = updatePodcastEpisode(db, episode.id, { title: 'Retitled', episode_number: 2 });
    expect(updated.title).toBe('Retitled');
    expect(updated.episode_number).toBe(2);
    expect(updated.created_at).toBe(OLD_TIMESTAMP);
    expect(updated.updated_at).not.toBe(OLD_TIMESTAMP);
  });

  it('moves updated_at forward on an update right after create', () => {
    for (let i = 0; i < 50; i++) {
      const episode = createPodcastEpisode(db, { title: `Ep ${i}`, podcast_url: `https://example.com/burst/${i}` });
      const updated = updatePodcastEpisode(db, episode.id, { title: 'x' });
      expect(updated.updated_at > episode.created_at).toBe(true);
    }
  });

  it('rejects moving onto another episode URL', () => {
    createPodcastEpisode(db, EPISODE);
    const second = createPodcastEpisode(db, { title: 'Two', podcast_url: 'https://example.com/podcast/2' });
    expect(() =>
      updatePodcastEpisode(db, second.id, { podcast_url: 'https://example.com/podcast/1' }),
    ).toThrow(ConflictError);
  });

  it('deletes an episode', () => {
    const episode = createPodcastEpisode(db, EPISODE);
    deletePodcastEpisode(db, episode.id);
    expect(() => getPodcastEpisode(db, episode.id)).toThrow(NotFoundError);
    expect(() => deletePodcastEpisode(db, episode.id)).toThrow('Podcast episode not found.');
  });
});

describe('PodcastEpisodeCreateSchema', () => {
  it('requires title and podcast_url', () => {
    expect(PodcastEpisodeCreateSchema.safeParse({ title: 'x' }).success).toBe(false);
    expect(PodcastEpisodeCreateSchema.safeParse({ podcast_url: 'x' }).success).toBe(false);
  });

  it('checks the published_date format', () => {
    const result = PodcastEpisodeCreateSchema.safeParse({ ...EPISODE, published_date: '26/06/2026' });
    expect(result.success).toBe(false);
  });
});
