import { logger } from '../../utils/logger.js';
import {
  Embedder,
  HashingEmbedderConfig,
  EmbeddingError
} from '../types.js';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(token: string, seed: number = FNV_OFFSET): number {
  let hash = seed;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}&']+/gu) ?? [];
}

/**
 * Local feature-hashing embedder.
 *
 * Each token is hashed into one of `dimensions` slots with a hashed sign, and
 * the result is normalized to unit length. Output is fully deterministic and
 * needs no model download, which makes it the default for development and
 * tests. Texts that share words score higher; there is no notion of synonyms.
 */
export class HashingEmbedder implements Embedder {
  private config: Required<HashingEmbedderConfig>;

  constructor(config: Partial<HashingEmbedderConfig> = {}) {
    const dimensions = config.dimensions ?? 384;
    this.config = {
      model: `hashing-${dimensions}`,
      batchSize: 64,
      bigrams: false,
      ...config,
      dimensions,
    };

    if (!Number.isInteger(this.config.dimensions) || this.config.dimensions <= 0) {
      throw new EmbeddingError(`Invalid hashing dimensions: ${this.config.dimensions}`, 'hashing');
    }
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (!texts.length) {
      return [];
    }

    const embeddings = texts.map(text => this.vectorize(text));

    logger.debug({
      model: this.config.model,
      textsCount: texts.length
    }, 'Generated hashing embeddings');

    return embeddings;
  }

  async embedSingle(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  getModel(): string {
    return this.config.model;
  }

  getDimensions(): number {
    return this.config.dimensions;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.config.dimensions).fill(0);
    const tokens = tokenize(text);

    for (const token of tokens) {
      this.accumulate(vector, token, 1);
    }

    if (this.config.bigrams) {
      for (let i = 1; i < tokens.length; i++) {
        this.accumulate(vector, `${tokens[i - 1]} ${tokens[i]}`, 0.5);
      }
    }

    let norm = 0;
    for (const component of vector) {
      norm += component * component;
    }
    norm = Math.sqrt(norm);

    return norm === 0 ? vector : vector.map(component => component / norm);
  }

  private accumulate(vector: number[], feature: string, weight: number): void {
    const slot = fnv1a(feature) % this.config.dimensions;
    // Independent hash for the sign keeps collisions from always adding up
    const sign = fnv1a(feature, 0x9747b28c) & 1 ? 1 : -1;
    vector[slot] += sign * weight;
  }
}
