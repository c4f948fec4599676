import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  SongParamsSchema,
  createErrorResponse,
  validatePublishRequest,
  validateQueryRequest,
} from './api.js';

describe('validateQueryRequest', () => {
  it('should default filters and match mode', () => {
    expect(validateQueryRequest({})).toEqual({ filters: {}, match: 'any' });
  });

  it('should turn single filter values into lists', () => {
    const body = validateQueryRequest({ text: 'rainy', filters: { mood: 'chill', genre: ['jazz', 'lo-fi'] }, limit: 3 });

    expect(body).toEqual({
      text: 'rainy',
      filters: { mood: ['chill'], genre: ['jazz', 'lo-fi'] },
      match: 'any',
      limit: 3,
    });
  });

  it('should keep unknown filter dimensions for the facet index to reject', () => {
    expect(validateQueryRequest({ filters: { tempo: 'fast' } }).filters).toEqual({ tempo: ['fast'] });
  });

  it('should accept a null text', () => {
    expect(validateQueryRequest({ text: null }).text).toBeNull();
  });

  it.each([
    { limit: -1 },
    { limit: 1.5 },
    { limit: 5000 },
    { limit: '5' },
    { match: 'some' },
    { filters: { mood: 3 } },
    { text: 'x'.repeat(1001) },
  ])('should reject %j', body => {
    expect(() => validateQueryRequest(body)).toThrow(ZodError);
  });
});

describe('validatePublishRequest', () => {
  it('should accept a bare catalog array', () => {
    expect(validatePublishRequest([{ title: 'One' }])).toEqual([{ title: 'One' }]);
  });

  it('should unwrap a { catalog } body without checking its shape', () => {
    expect(validatePublishRequest({ catalog: [{ title: 'One' }] })).toEqual([{ title: 'One' }]);
    expect(validatePublishRequest({ catalog: 'not a list' })).toBe('not a list');
  });

  it('should reject other bodies', () => {
    expect(() => validatePublishRequest('songs')).toThrow(ZodError);
  });
});

describe('SongParamsSchema', () => {
  it('should accept 16 hex characters only', () => {
    expect(SongParamsSchema.safeParse({ id: '0123456789abcdef' }).success).toBe(true);
    expect(SongParamsSchema.safeParse({ id: '0123456789ABCDEF' }).success).toBe(false);
    expect(SongParamsSchema.safeParse({ id: 'abc' }).success).toBe(false);
  });
});

describe('createErrorResponse', () => {
  it('should include details only when given', () => {
    const bare = createErrorResponse('NotFound', 'No song', 404);
    const detailed = createErrorResponse('InvalidFacet', 'Unknown facet dimension: tempo', 400, { dimension: 'tempo' });

    expect(bare).toEqual({ error: 'NotFound', message: 'No song', statusCode: 404, timestamp: expect.any(String) });
    expect(detailed.details).toEqual({ dimension: 'tempo' });
  });
});
