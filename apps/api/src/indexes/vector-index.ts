/**
 * Vector Index
 *
 * One embedding per record, computed from the record's embedding text, and
 * exact cosine nearest-neighbour search over a candidate subset. The catalog
 * is small enough that a linear scan over the candidates is the whole search.
 */

import { logger } from '../utils/logger.js';
import { runBounded, splitIntoBatches, withTimeout } from '../utils/async.js';
import { EmbedderError } from '../errors.js';
import { vectorUtils } from '../embeddings/utils.js';
import type { Embedder } from '../embeddings/types.js';
import type { CatalogStore } from '../catalog/store.js';

export interface VectorHit {
  id: string;
  score: number;
}

export interface VectorIndexBuildOptions {
  /** Texts per embedder call */
  batchSize?: number;
  /** Embedder calls in flight at once */
  concurrency?: number;
  /** Deadline for each embedder call; a batch that misses it fails the build */
  timeoutMs?: number;
  /** Index from the previous snapshot; unchanged texts reuse its vectors */
  previous?: VectorIndex;
}

interface StoredVector {
  text: string;
  vector: readonly number[];
}

export class VectorIndex {
  private constructor(
    private readonly entries: ReadonlyMap<string, StoredVector>,
    readonly model: string,
    readonly dimensions: number,
    readonly stats: { readonly embedded: number; readonly reused: number }
  ) {}

  /**
   * Embed every record of the catalog.
   *
   * Failure policy is abort: once any embedder call fails or returns a bad
   * vector no further batches are started, in-flight batches are awaited, and
   * a single EmbedderError naming every affected record is thrown.
   */
  static async build(
    catalog: CatalogStore,
    embedder: Embedder,
    options: VectorIndexBuildOptions = {}
  ): Promise<VectorIndex> {
    const batchSize = options.batchSize ?? 16;
    const concurrency = options.concurrency ?? 4;
    const model = embedder.getModel();
    const startTime = Date.now();

    const entries = new Map<string, StoredVector>();
    const pending: Array<{ id: string; text: string }> = [];

    for (const id of catalog.ids()) {
      const text = catalog.embeddingText(id);
      if (text === undefined) {
        throw new Error(`Catalog has no embedding text for ${id}`);
      }

      const reusable = options.previous?.reusableVector(id, text, model);
      if (reusable) {
        entries.set(id, { text, vector: reusable });
      } else {
        pending.push({ id, text });
      }
    }

    const reused = entries.size;
    const batches = splitIntoBatches(pending, batchSize);

    const outcome = await runBounded(batches, concurrency, async batch => {
      const pendingVectors = embedder.embed(batch.map(item => item.text));
      const vectors = options.timeoutMs === undefined
        ? await pendingVectors
        : await withTimeout(pendingVectors, options.timeoutMs, 'Embedding batch');
      if (vectors.length !== batch.length) {
        throw new Error(`Embedder returned ${vectors.length} vectors for ${batch.length} texts`);
      }
      const invalid = vectors.findIndex(vector => !vectorUtils.isValidVector(vector));
      if (invalid !== -1) {
        throw new Error(`Embedder returned an invalid vector for record ${batch[invalid].id}`);
      }
      return vectors;
    });

    if (!outcome.ok) {
      const failedIds = outcome.failures.flatMap(failure => failure.item.map(item => item.id));
      const causes = outcome.failures.map(failure => failure.error);

      logger.error({
        failedBatches: outcome.failures.length,
        completedBatches: outcome.completed,
        failedIds,
        model
      }, 'Vector index build aborted');

      const firstCause = causes[0];
      throw new EmbedderError(
        `Embedding failed for ${failedIds.length} record(s): ${firstCause instanceof Error ? firstCause.message : String(firstCause)}`,
        failedIds,
        causes
      );
    }

    outcome.results.forEach((vectors, batchIndex) => {
      batches[batchIndex].forEach((item, i) => {
        entries.set(item.id, { text: item.text, vector: Object.freeze([...vectors[i]]) });
      });
    });

    const dimensions = VectorIndex.sharedDimension(entries);

    logger.info({
      records: entries.size,
      embedded: pending.length,
      reused,
      model,
      dimensions,
      durationMs: Date.now() - startTime
    }, 'Vector index built');

    return new VectorIndex(entries, model, dimensions, { embedded: pending.length, reused });
  }

  get size(): number {
    return this.entries.size;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  vectorOf(id: string): readonly number[] | undefined {
    return this.entries.get(id)?.vector;
  }

  textOf(id: string): string | undefined {
    return this.entries.get(id)?.text;
  }

  /**
   * Top `k` candidates by cosine similarity to `queryVector`, best first.
   * Equal scores are ordered by ascending id. Ids not in the index are skipped.
   */
  nearest(queryVector: readonly number[], candidateIds: Iterable<string>, k: number): VectorHit[] {
    if (!Number.isInteger(k) || k < 0) {
      throw new RangeError(`k must be a non-negative integer, got ${k}`);
    }
    if (k === 0) {
      return [];
    }
    if (this.entries.size > 0 && queryVector.length !== this.dimensions) {
      throw new RangeError(
        `Query vector has ${queryVector.length} dimensions, index has ${this.dimensions}`
      );
    }

    const hits: VectorHit[] = [];
    const seen = new Set<string>();

    for (const id of candidateIds) {
      const entry = this.entries.get(id);
      if (!entry || seen.has(id)) continue;
      seen.add(id);
      hits.push({ id, score: vectorUtils.cosineSimilarity(queryVector, entry.vector) });
    }

    hits.sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return hits.slice(0, k);
  }

  private reusableVector(id: string, text: string, model: string): readonly number[] | undefined {
    if (model !== this.model) return undefined;
    const entry = this.entries.get(id);
    return entry && entry.text === text ? entry.vector : undefined;
  }

  private static sharedDimension(entries: ReadonlyMap<string, StoredVector>): number {
    let dimensions = 0;
    for (const [id, entry] of entries) {
      if (dimensions === 0) {
        dimensions = entry.vector.length;
      } else if (entry.vector.length !== dimensions) {
        throw new EmbedderError(
          `Embedding dimension mismatch: record ${id} has ${entry.vector.length}, expected ${dimensions}`,
          [id]
        );
      }
    }
    return dimensions;
  }
}
