/**
 * API Schemas with Zod validation
 *
 * Defines request schemas for HTTP endpoints with validation
 */

import { z } from 'zod';
import type { ApiError } from '@moodshelf/shared-types';

// Query endpoint schemas
const FilterValuesSchema = z
  .union([z.string(), z.array(z.string())])
  .transform(values => (typeof values === 'string' ? [values] : values));

export const QueryRequestSchema = z.object({
  text: z.string().max(1000, 'Text too long').nullish(),
  // Dimension names are checked by the facet index so unknown ones surface as InvalidFacet
  filters: z.record(FilterValuesSchema).optional().default({}),
  match: z.enum(['any', 'all']).optional().default('any'),
  limit: z.number().int().min(0).max(1000).optional(),
});

// Admin endpoint schemas: either { catalog: [...] } or the bare array
export const PublishRequestSchema = z
  .union([
    z.array(z.unknown()),
    z.object({ catalog: z.unknown() }),
  ])
  .transform(body => (Array.isArray(body) ? body : body.catalog));

export const SongParamsSchema = z.object({
  id: z.string().regex(/^[0-9a-f]{16}$/, 'Song id must be 16 hex characters'),
});

// Type exports
export type QueryRequestBody = z.infer<typeof QueryRequestSchema>;

// Validation helpers
export function validateQueryRequest(data: unknown): QueryRequestBody {
  return QueryRequestSchema.parse(data);
}

export function validatePublishRequest(data: unknown): unknown {
  return PublishRequestSchema.parse(data);
}

export function createErrorResponse(
  error: string,
  message: string,
  statusCode: number = 400,
  details?: Record<string, unknown>
): ApiError {
  return {
    error,
    message,
    statusCode,
    timestamp: new Date().toISOString(),
    ...(details ? { details } : {}),
  };
}
