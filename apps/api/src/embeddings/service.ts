import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/async.js';
import {
  Embedder,
  EmbeddingServiceConfig,
  EmbedderProvider,
  EmbeddingError,
} from './types.js';
import { OpenAIEmbedder } from './providers/openai.js';
import { HashingEmbedder } from './providers/hashing.js';

/**
 * Wraps the configured provider with a per-call timeout. Every call made
 * through the service either resolves within `timeoutMs` or rejects with an
 * EmbeddingError whose cause is the provider error or a TimeoutError.
 */
export class EmbeddingService implements Embedder {
  private embedder: Embedder;
  private config: EmbeddingServiceConfig;

  constructor(config: EmbeddingServiceConfig, embedder?: Embedder) {
    this.config = config;
    this.embedder = embedder ?? createEmbedder(config.provider, config);

    logger.info({
      provider: config.provider,
      model: this.embedder.getModel(),
      dimensions: this.embedder.getDimensions(),
      timeoutMs: config.timeoutMs
    }, 'Embedding service initialized');
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (!texts.length) {
      return [];
    }

    try {
      return await withTimeout(
        this.embedder.embed(texts),
        this.config.timeoutMs,
        `${this.config.provider} embedding`
      );
    } catch (error) {
      logger.warn({
        error,
        provider: this.config.provider,
        textsCount: texts.length
      }, 'Embedding request failed');

      if (error instanceof EmbeddingError) {
        throw error;
      }
      throw new EmbeddingError(
        `Embedding failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        this.config.provider,
        error instanceof Error ? error : undefined
      );
    }
  }

  async embedSingle(text: string): Promise<number[]> {
    const [embedding] = await this.embed([text]);
    if (!embedding) {
      throw new EmbeddingError('Provider returned no embedding', this.config.provider);
    }
    return embedding;
  }

  getModel(): string {
    return this.embedder.getModel();
  }

  getDimensions(): number {
    return this.embedder.getDimensions();
  }

  async isAvailable(): Promise<boolean> {
    try {
      return await withTimeout(this.embedder.isAvailable(), this.config.timeoutMs, 'Availability check');
    } catch (error) {
      logger.warn({ error, provider: this.config.provider }, 'Embedder availability check failed');
      return false;
    }
  }
}

export function createEmbedder(provider: EmbedderProvider, config: EmbeddingServiceConfig): Embedder {
  switch (provider) {
    case 'openai':
      if (!config.openai) {
        throw new EmbeddingError('OpenAI config required', provider);
      }
      return new OpenAIEmbedder(config.openai);

    case 'hashing':
      return new HashingEmbedder(config.hashing);

    default: {
      const unknown: never = provider;
      throw new EmbeddingError(`Unknown provider: ${String(unknown)}`, provider);
    }
  }
}
