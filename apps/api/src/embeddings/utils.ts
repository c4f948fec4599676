import { VectorUtils } from './types.js';

/**
 * Vector similarity and utility functions for embeddings
 */
export class VectorUtilities implements VectorUtils {

  /**
   * Calculate cosine similarity between two vectors
   * Returns a value between -1 and 1, where 1 means identical direction.
   * A zero vector has no direction and scores 0 against anything.
   */
  cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
      throw new RangeError('Vectors must have the same dimensions');
    }

    const dotProd = this.dotProduct(a, b);
    const magnitudeA = this.magnitude(a);
    const magnitudeB = this.magnitude(b);

    if (magnitudeA === 0 || magnitudeB === 0) {
      return 0;
    }

    // Clamp floating point drift so scores stay inside [-1, 1]
    return Math.max(-1, Math.min(1, dotProd / (magnitudeA * magnitudeB)));
  }

  /**
   * Calculate dot product of two vectors
   */
  dotProduct(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
      throw new RangeError('Vectors must have the same dimensions');
    }

    let sum = 0;
    for (let i = 0; i < a.length; i++) {
      sum += a[i] * b[i];
    }

    return sum;
  }

  /**
   * Normalize a vector to unit length
   */
  normalize(vector: readonly number[]): number[] {
    const mag = this.magnitude(vector);
    if (mag === 0) {
      return vector.slice(); // Return copy of zero vector
    }

    return vector.map(component => component / mag);
  }

  /**
   * Calculate the magnitude (length) of a vector
   */
  magnitude(vector: readonly number[]): number {
    let sum = 0;
    for (const component of vector) {
      sum += component * component;
    }
    return Math.sqrt(sum);
  }

  /**
   * True when the value is a non-empty array of finite numbers
   */
  isValidVector(value: unknown): value is number[] {
    return Array.isArray(value)
      && value.length > 0
      && value.every(component => typeof component === 'number' && Number.isFinite(component));
  }
}

// Export singleton instance
export const vectorUtils = new VectorUtilities();

// Export individual functions for convenience
export const cosineSimilarity = (a: readonly number[], b: readonly number[]): number => vectorUtils.cosineSimilarity(a, b);
export const dotProduct = (a: readonly number[], b: readonly number[]): number => vectorUtils.dotProduct(a, b);
export const normalize = (vector: readonly number[]): number[] => vectorUtils.normalize(vector);
export const magnitude = (vector: readonly number[]): number => vectorUtils.magnitude(vector);
