/**
 * Embedding subsystem - Pluggable provider interface for generating text embeddings
 *
 * Providers are interchangeable behind the Embedder interface; the service adds
 * timeouts and uniform error reporting on top of whichever one is configured.
 */

// Core interfaces and types
export * from './types.js';

// Embedding providers
export { OpenAIEmbedder } from './providers/openai.js';
export { HashingEmbedder, tokenize } from './providers/hashing.js';

// Main service
export { EmbeddingService, createEmbedder } from './service.js';

// Vector utilities and similarity functions
export { VectorUtilities, vectorUtils, cosineSimilarity, dotProduct, normalize, magnitude } from './utils.js';
