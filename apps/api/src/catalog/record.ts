import { createHash } from 'crypto';
import type {
  Activity,
  Energy,
  Genre,
  Mood,
  MultiFacet,
  SongView,
  VibeTag,
} from '@moodshelf/shared-types';

export interface SongRecord {
  readonly id: string;
  readonly title: string;
  readonly artist: readonly string[];
  readonly mood: readonly Mood[];
  readonly activity: readonly Activity[];
  readonly genre: readonly Genre[];
  readonly vibe_tags: readonly VibeTag[];
  readonly energy: Energy;
  readonly description: string;
}

function normalizeIdentity(text: string): string {
  return text.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Stable record id: a truncated sha256 of the normalized title and artists.
 * Case and spacing changes keep the id; any other edit to title or artist
 * produces a new one. Position in the catalog never matters.
 */
export function deriveRecordId(title: string, artists: readonly string[]): string {
  const identity = [
    normalizeIdentity(title),
    artists.map(normalizeIdentity).join('\u001e'),
  ].join('\u001f');

  return createHash('sha256').update(identity, 'utf8').digest('hex').slice(0, 16);
}

const EMBEDDED_FACETS: ReadonlyArray<readonly [MultiFacet, string]> = [
  ['mood', 'mood'],
  ['activity', 'activity'],
  ['genre', 'genre'],
  ['vibe_tags', 'vibe'],
];

/**
 * Text sent to the embedder for a record: one tag line with the multi-valued
 * facets in fixed order (values sorted), then the description. Energy, title
 * and artist are left out.
 */
export function buildEmbeddingText(record: Pick<SongRecord, MultiFacet | 'description'>): string {
  const tags = EMBEDDED_FACETS
    .map(([facet, label]) => `${label}: ${[...record[facet]].sort().join(', ')}`)
    .join(' | ');

  return `${tags}\n${record.description.trim()}`;
}

export function toSongView(record: SongRecord): SongView {
  return {
    id: record.id,
    title: record.title,
    artist: [...record.artist],
    mood: [...record.mood],
    activity: [...record.activity],
    genre: [...record.genre],
    vibe_tags: [...record.vibe_tags],
    energy: record.energy,
    description: record.description,
  };
}
