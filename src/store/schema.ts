import { z } from 'zod';
import { isRecord } from '../shared/utils.js';

// ================================================================
// Status vocabularies
// ================================================================

export const ARTICLE_STATUSES = ['pending', 'summarized', 'accepted', 'archived'] as const;
export const THREAT_STATUSES = ['draft', 'recommended', 'published'] as const;
export const SNAPSHOT_STATUSES = ['pending', 'highlighted', 'accepted', 'archived'] as const;

export const ArticleStatusSchema = z.enum(ARTICLE_STATUSES);
export const ThreatStatusSchema = z.enum(THREAT_STATUSES);
export const SnapshotStatusSchema = z.enum(SNAPSHOT_STATUSES);

export type ArticleStatus = z.infer<typeof ArticleStatusSchema>;
export type ThreatStatus = z.infer<typeof ThreatStatusSchema>;
export type SnapshotStatus = z.infer<typeof SnapshotStatusSchema>;

const optionalText = z.string().nullish();
const requiredText = z.string().trim().min(1, 'must not be empty');

// ================================================================
// Articles
// ================================================================

export const ArticleCreateSchema = z.object({
  url: requiredText,
  title: optionalText,
  source: optionalText,
  original_content: optionalText,
  summary: optionalText,
  status: ArticleStatusSchema.optional(),
  position: z.number().int().nullish(),
});

export const ArticleUpdateSchema = ArticleCreateSchema.partial();

export type ArticleCreate = z.infer<typeof ArticleCreateSchema>;
export type ArticleUpdate = z.infer<typeof ArticleUpdateSchema>;

export interface Article {
  id: number;
  url: string;
  title: string | null;
  source: string | null;
  original_content: string | null;
  summary: string | null;
  status: ArticleStatus;
  position: number | null;
  created_at: string;
  updated_at: string;
}

// ================================================================
// Threats
// ================================================================

/** Free-form technical data such as range, speed or crew. */
export const SpecificationsSchema = z.record(z.string(), z.unknown());
/** Nations operating the system, in the order given. */
export const OperatorsSchema = z.array(z.string());

export type Specifications = z.infer<typeof SpecificationsSchema>;

const ThreatFieldsSchema = z.object({
  name: requiredText,
  type: optionalText,
  country_of_origin: optionalText,
  description: optionalText,
  specifications: SpecificationsSchema.nullish(),
  ioc_year: z.number().int().nullish(),
  operators: OperatorsSchema.nullish(),
  image_url: optionalText,
  tod_summary: optionalText,
  status: ThreatStatusSchema.optional(),
});

/** Older clients send the threat type as `threat_type`. */
function foldThreatType(raw: unknown): unknown {
  if (!isRecord(raw) || !('threat_type' in raw)) return raw;
  const { threat_type, ...rest } = raw;
  return rest['type'] === undefined ? { ...rest, type: threat_type } : rest;
}

export const ThreatCreateSchema = z.preprocess(foldThreatType, ThreatFieldsSchema);
export const ThreatUpdateSchema = z.preprocess(foldThreatType, ThreatFieldsSchema.partial());

export type ThreatCreate = z.infer<typeof ThreatCreateSchema>;
export type ThreatUpdate = z.infer<typeof ThreatUpdateSchema>;

export interface Threat {
  id: number;
  name: string;
  type: string | null;
  country_of_origin: string | null;
  description: string | null;
  specifications: Specifications | null;
  ioc_year: number | null;
  operators: string[] | null;
  image_url: string | null;
  tod_summary: string | null;
  status: ThreatStatus;
  created_at: string;
  updated_at: string;
}

// ================================================================
// Snapshots
// ================================================================

export const SnapshotCreateSchema = z.object({
  url: requiredText,
  title: optionalText,
  source: optionalText,
  original_content: optionalText,
  highlight: optionalText,
  status: SnapshotStatusSchema.optional(),
  position: z.number().int().nullish(),
});

export const SnapshotUpdateSchema = SnapshotCreateSchema.partial();

export type SnapshotCreate = z.infer<typeof SnapshotCreateSchema>;
export type SnapshotUpdate = z.infer<typeof SnapshotUpdateSchema>;

export interface Snapshot {
  id: number;
  url: string;
  title: string | null;
  source: string | null;
  original_content: string | null;
  highlight: string | null;
  status: SnapshotStatus;
  position: number | null;
  created_at: string;
  updated_at: string;
}

// ================================================================
// Podcast episodes
// ================================================================

const PodcastFieldsSchema = z.object({
  title: requiredText,
  podcast_url: requiredText,
  episode_number: z.number().int().nullish(),
  description: optionalText,
  published_date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a YYYY-MM-DD date')
    .nullish(),
  image_url: optionalText,
});

export const PodcastEpisodeCreateSchema = PodcastFieldsSchema;
export const PodcastEpisodeUpdateSchema = PodcastFieldsSchema.partial();

export type PodcastEpisodeCreate = z.infer<typeof PodcastEpisodeCreateSchema>;
export type PodcastEpisodeUpdate = z.infer<typeof PodcastEpisodeUpdateSchema>;

export interface PodcastEpisode {
  id: number;
  title: string;
  episode_number: number | null;
  podcast_url: string | null;
  description: string | null;
  published_date: string | null;
  image_url: string | null;
  created_at: string;
  updated_at: string;
}
