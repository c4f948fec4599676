import type { MatchStrength } from '@moodshelf/shared-types';

/**
 * Coarse label for a cosine score:
 * - >= 0.45 : very strong semantic match
 * - 0.30-0.45: good / relevant match
 * - 0.20-0.30: weak but related
 * - 0.00-0.20: likely irrelevant
 * - < 0.0   : actively dissimilar
 */
export function matchStrength(score: number | null): MatchStrength | null {
  if (score === null) return null;
  if (score >= 0.45) return 'very-strong';
  if (score >= 0.30) return 'good';
  if (score >= 0.20) return 'weak';
  if (score >= 0) return 'irrelevant';
  return 'dissimilar';
}
