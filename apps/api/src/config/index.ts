import { loadServerEnv, type ServerEnv } from './env.js';
import { logger } from '../utils/logger.js';
import type { EmbeddingServiceConfig } from '../embeddings/types.js';

export interface Config {
  server: {
    port: number;
    host: string;
    frontendOrigin: string;
  };
  catalog: {
    path: string;
  };
  embedding: EmbeddingServiceConfig;
  build: {
    batchSize: number;
    concurrency: number;
  };
  query: {
    defaultLimit: number;
  };
  admin: {
    token?: string;
  };
  nodeEnv: 'development' | 'production' | 'test';
}

export function buildConfig(env: ServerEnv): Config {
  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      frontendOrigin: env.FRONTEND_ORIGIN,
    },
    catalog: {
      path: env.CATALOG_PATH,
    },
    embedding: {
      provider: env.EMBEDDING_PROVIDER,
      timeoutMs: env.EMBED_TIMEOUT_MS,
      openai: env.OPENAI_API_KEY ? {
        apiKey: env.OPENAI_API_KEY,
        model: env.OPENAI_EMBEDDING_MODEL,
        dimensions: env.EMBEDDING_DIMENSIONS,
      } : undefined,
      hashing: {
        model: `hashing-${env.EMBEDDING_DIMENSIONS}`,
        dimensions: env.EMBEDDING_DIMENSIONS,
      },
    },
    build: {
      batchSize: env.EMBED_BATCH_SIZE,
      concurrency: env.EMBED_CONCURRENCY,
    },
    query: {
      defaultLimit: env.QUERY_DEFAULT_LIMIT,
    },
    admin: {
      token: env.ADMIN_TOKEN,
    },
    nodeEnv: env.NODE_ENV,
  };
}

// Lazy-loaded configuration - doesn't evaluate env at import time
let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = buildConfig(loadServerEnv());

  // Log configuration on startup
  logger.info({
    server: {
      port: cachedConfig.server.port,
      host: cachedConfig.server.host,
    },
    catalogPath: cachedConfig.catalog.path,
    embeddingProvider: cachedConfig.embedding.provider,
    embedConcurrency: cachedConfig.build.concurrency,
    nodeEnv: cachedConfig.nodeEnv,
    hasOpenAIKey: !!cachedConfig.embedding.openai?.apiKey,
    hasAdminToken: !!cachedConfig.admin.token,
  }, 'Configuration loaded');

  return cachedConfig;
}

export { logger } from '../utils/logger.js';
