import { describe, it, expect } from 'vitest';
import { parseServerEnv } from './env.js';
import { buildConfig } from './index.js';

describe('parseServerEnv', () => {
  it('should apply defaults to an empty environment', () => {
    const env = parseServerEnv({});

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      PORT: 4000,
      HOST: '0.0.0.0',
      CATALOG_PATH: 'data/songs.json',
      EMBEDDING_PROVIDER: 'hashing',
      EMBEDDING_DIMENSIONS: 384,
      EMBED_BATCH_SIZE: 16,
      EMBED_CONCURRENCY: 4,
      EMBED_TIMEOUT_MS: 10000,
      QUERY_DEFAULT_LIMIT: 5,
    });
    expect(env.ADMIN_TOKEN).toBeUndefined();
  });

  it('should coerce numeric settings from strings', () => {
    const env = parseServerEnv({ PORT: '8080', EMBED_CONCURRENCY: '2', QUERY_DEFAULT_LIMIT: '0' });

    expect(env.PORT).toBe(8080);
    expect(env.EMBED_CONCURRENCY).toBe(2);
    expect(env.QUERY_DEFAULT_LIMIT).toBe(0);
  });

  it('should reject invalid values', () => {
    expect(() => parseServerEnv({ EMBED_CONCURRENCY: '0' })).toThrow(/^Missing\/invalid server env: /);
    expect(() => parseServerEnv({ EMBEDDING_PROVIDER: 'word2vec' })).toThrow(/EMBEDDING_PROVIDER/);
  });

  it('should require an API key for the openai provider', () => {
    expect(() => parseServerEnv({ EMBEDDING_PROVIDER: 'openai' }))
      .toThrow('OPENAI_API_KEY is required when EMBEDDING_PROVIDER=openai');
    expect(parseServerEnv({ EMBEDDING_PROVIDER: 'openai', OPENAI_API_KEY: 'test-secret' }).EMBEDDING_PROVIDER)
      .toBe('openai');
  });
});

describe('buildConfig', () => {
  it('should map the environment onto the config tree', () => {
    const config = buildConfig(parseServerEnv({
      NODE_ENV: 'test',
      PORT: '5000',
      EMBEDDING_DIMENSIONS: '64',
      EMBED_BATCH_SIZE: '8',
      ADMIN_TOKEN: 'test-secret',
    }));

    expect(config).toMatchObject({
      server: { port: 5000 },
      catalog: { path: 'data/songs.json' },
      embedding: {
        provider: 'hashing',
        timeoutMs: 10000,
        hashing: { model: 'hashing-64', dimensions: 64 },
      },
      build: { batchSize: 8, concurrency: 4 },
      query: { defaultLimit: 5 },
      admin: { token: 'test-secret' },
      nodeEnv: 'test',
    });
    expect(config.embedding.openai).toBeUndefined();
  });

  it('should include OpenAI settings only when a key is present', () => {
    const config = buildConfig(parseServerEnv({
      EMBEDDING_PROVIDER: 'openai',
      OPENAI_API_KEY: 'test-secret',
      OPENAI_EMBEDDING_MODEL: 'text-embedding-3-large',
      EMBEDDING_DIMENSIONS: '256',
    }));

    expect(config.embedding.openai).toEqual({
      apiKey: 'test-secret',
      model: 'text-embedding-3-large',
      dimensions: 256,
    });
  });
});
