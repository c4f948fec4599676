/**
 * Catalog entry schema
 *
 * Validates one authored songs.json entry and normalizes it: facet values are
 * trimmed, lowercased and space-joined with hyphens before being checked
 * against their closed vocabulary, then deduplicated and sorted.
 */

import { z } from 'zod';
import {
  MOODS,
  ACTIVITIES,
  GENRES,
  VIBE_TAGS,
  ENERGY_LEVELS,
} from '@moodshelf/shared-types';

type Vocabulary = readonly [string, ...string[]];

export function normalizeFacetValue(value: unknown): unknown {
  return typeof value === 'string'
    ? value.trim().toLowerCase().replace(/[\s_]+/g, '-')
    : value;
}

function asList(value: unknown): unknown {
  return typeof value === 'string' ? [value] : value;
}

function requiredText(label: string) {
  return z
    .string({
      required_error: 'is required',
      invalid_type_error: `${label} must be a string`,
    })
    .trim()
    .min(1, `${label} must not be empty`);
}

function vocabularyValue<T extends Vocabulary>(values: T, label: string) {
  return z.preprocess(
    normalizeFacetValue,
    z.enum(values, {
      errorMap: (issue, ctx) => ({
        message: issue.code === 'invalid_enum_value'
          ? `"${String(issue.received)}" is not an allowed ${label}`
          : issue.code === 'invalid_type'
            ? issue.received === 'undefined' ? 'is required' : `${label} values must be strings`
            : ctx.defaultError,
      }),
    })
  );
}

function facetSet<T extends Vocabulary>(values: T, label: string) {
  return z.preprocess(
    asList,
    z
      .array(vocabularyValue(values, label), {
        required_error: 'is required',
        invalid_type_error: `${label} must be a list of values`,
      })
      .min(1, `at least one ${label} is required`)
      .transform(list => [...new Set(list)].sort())
  );
}

export const CatalogEntrySchema = z.object({
  title: requiredText('title'),
  artist: z.preprocess(
    asList,
    z
      .array(requiredText('artist'), {
        required_error: 'is required',
        invalid_type_error: 'artist must be a name or a list of names',
      })
      .min(1, 'at least one artist is required')
  ),
  mood: facetSet(MOODS, 'mood'),
  activity: facetSet(ACTIVITIES, 'activity'),
  genre: facetSet(GENRES, 'genre'),
  vibe_tags: facetSet(VIBE_TAGS, 'vibe tag'),
  energy: vocabularyValue(ENERGY_LEVELS, 'energy level'),
  description: requiredText('description'),
});

export type ParsedCatalogEntry = z.infer<typeof CatalogEntrySchema>;
