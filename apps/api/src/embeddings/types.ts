/**
 * Core embedding system interfaces and types
 */

export interface Embedder {
  /**
   * Generate embeddings for multiple texts, in input order
   */
  embed(texts: string[]): Promise<number[][]>;

  /**
   * Generate embedding for a single text
   */
  embedSingle(text: string): Promise<number[]>;

  /**
   * Get the model name
   */
  getModel(): string;

  /**
   * Get the embedding dimensions
   */
  getDimensions(): number;

  /**
   * Check if the embedder is available/initialized
   */
  isAvailable(): Promise<boolean>;
}

export interface EmbedderConfig {
  model: string;
  dimensions: number;
  batchSize?: number;
}

export interface OpenAIEmbedderConfig extends EmbedderConfig {
  apiKey: string;
  baseUrl?: string;
}

export interface HashingEmbedderConfig extends EmbedderConfig {
  /** Also hash adjacent word pairs into the vector */
  bigrams?: boolean;
}

export type EmbedderProvider = 'openai' | 'hashing';

export interface EmbeddingServiceConfig {
  provider: EmbedderProvider;
  /** Upper bound for a single provider call */
  timeoutMs: number;
  openai?: OpenAIEmbedderConfig;
  hashing?: HashingEmbedderConfig;
}

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public provider: EmbedderProvider,
    public cause?: Error
  ) {
    super(message);
    this.name = 'EmbeddingError';
  }
}

/**
 * Vector similarity utilities
 */
export interface VectorUtils {
  cosineSimilarity(a: readonly number[], b: readonly number[]): number;
  dotProduct(a: readonly number[], b: readonly number[]): number;
  normalize(vector: readonly number[]): number[];
  magnitude(vector: readonly number[]): number;
}
