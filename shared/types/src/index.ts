// Facet vocabularies (closed sets; catalog entries outside these are rejected)
export const MOODS = [
  'bittersweet',
  'chill',
  'confident',
  'dreamy',
  'empowered',
  'energetic',
  'euphoric',
  'hopeful',
  'lonely',
  'melancholic',
  'moody',
  'nostalgic',
  'peaceful',
  'playful',
  'restless',
  'romantic',
  'tender',
] as const;

export const ACTIVITIES = [
  'cooking',
  'commuting',
  'dancing',
  'driving',
  'focus',
  'getting-ready',
  'late-night-walk',
  'party',
  'rainy-day',
  'relaxing',
  'road-trip',
  'sleeping',
  'studying',
  'working-out',
] as const;

export const GENRES = [
  'alternative',
  'classical',
  'country',
  'dance',
  'dream-pop',
  'electronic',
  'folk',
  'funk',
  'hip-hop',
  'house',
  'indie',
  'indie-pop',
  'jazz',
  'k-pop',
  'latin',
  'lo-fi',
  'pop',
  'r&b',
  'rap',
  'rock',
  'shoegaze',
  'soul',
] as const;

export const VIBE_TAGS = [
  'anthemic',
  'cinematic',
  'city-lights',
  'coming-of-age',
  'cozy',
  'ethereal',
  'golden-hour',
  'gritty',
  'hazy',
  'heartbreak',
  'late-night',
  'lush',
  'main-character',
  'minimal',
  'rainy',
  'retro',
  'slow-burn',
  'summer',
  'sunset',
  'warm',
  'wistful',
  'yearning',
] as const;

export const ENERGY_LEVELS = ['low', 'medium', 'high'] as const;

export type Mood = (typeof MOODS)[number];
export type Activity = (typeof ACTIVITIES)[number];
export type Genre = (typeof GENRES)[number];
export type VibeTag = (typeof VIBE_TAGS)[number];
export type Energy = (typeof ENERGY_LEVELS)[number];

/** Multi-valued facets, in the order they appear in embedding text */
export const MULTI_FACETS = ['mood', 'activity', 'genre', 'vibe_tags'] as const;
export type MultiFacet = (typeof MULTI_FACETS)[number];

/** Every filterable dimension, including single-valued energy */
export const FACET_DIMENSIONS = [...MULTI_FACETS, 'energy'] as const;
export type FacetDimension = (typeof FACET_DIMENSIONS)[number];

export interface FacetValueMap {
  mood: Mood;
  activity: Activity;
  genre: Genre;
  vibe_tags: VibeTag;
  energy: Energy;
}

export type FacetValue = FacetValueMap[FacetDimension];

export const FACET_VOCABULARY: { readonly [D in FacetDimension]: readonly FacetValueMap[D][] } = {
  mood: MOODS,
  activity: ACTIVITIES,
  genre: GENRES,
  vibe_tags: VIBE_TAGS,
  energy: ENERGY_LEVELS,
};

export function isFacetDimension(value: string): value is FacetDimension {
  return FACET_DIMENSIONS.some(dimension => dimension === value);
}

export function isFacetValue<D extends FacetDimension>(
  dimension: D,
  value: string
): value is FacetValueMap[D] {
  const vocabulary: readonly string[] = FACET_VOCABULARY[dimension];
  return vocabulary.includes(value);
}

// Catalog wire format (songs.json entries, as authored)
export interface CatalogEntry {
  title: string;
  artist: string | string[];
  mood: string[];
  activity: string[];
  energy: string;
  genre: string[];
  vibe_tags: string[];
  description: string;
}

// API response types
export interface SongView {
  id: string;
  title: string;
  artist: string[];
  mood: Mood[];
  activity: Activity[];
  genre: Genre[];
  vibe_tags: VibeTag[];
  energy: Energy;
  description: string;
}

export type MatchStrength = 'very-strong' | 'good' | 'weak' | 'irrelevant' | 'dissimilar';

export interface QueryHit {
  song: SongView;
  score: number | null;
  strength: MatchStrength | null;
}

export type QueryMode = 'semantic' | 'browse';

export interface QueryResponse {
  hits: QueryHit[];
  count: number;
  total: number;
  snapshotId: string;
  mode: QueryMode;
}

export interface FacetOption {
  value: string;
  count: number;
}

export type FacetOptions = { [D in FacetDimension]: FacetOption[] };

export interface SnapshotInfo {
  id: string;
  sequence: number;
  recordCount: number;
  catalogHash: string;
  model: string;
  dimensions: number;
  embedded: number;
  reused: number;
  publishedAt: string;
}

export interface ValidationIssue {
  index: number;
  field: string;
  reason: string;
}

export interface ApiError {
  error: string;
  message: string;
  statusCode: number;
  timestamp: string;
  details?: Record<string, unknown>;
}
