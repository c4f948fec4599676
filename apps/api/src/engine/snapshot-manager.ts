/**
 * Snapshot Manager
 *
 * Builds immutable (catalog, facet index, vector index) bundles and publishes
 * them by swapping a single reference. Queries grab the reference once, so an
 * in-flight query finishes on the bundle it started with.
 */

import { createHash } from 'crypto';
import type { SnapshotInfo } from '@moodshelf/shared-types';
import { logger } from '../utils/logger.js';
import { NoSnapshot } from '../errors.js';
import { CatalogStore } from '../catalog/store.js';
import { FacetIndex } from '../indexes/facet-index.js';
import { VectorIndex } from '../indexes/vector-index.js';
import type { Embedder } from '../embeddings/types.js';

export interface Snapshot {
  readonly info: SnapshotInfo;
  readonly catalog: CatalogStore;
  readonly facets: FacetIndex;
  readonly vectors: VectorIndex;
}

export interface SnapshotSource {
  current(): Snapshot;
}

export interface SnapshotBuildOptions {
  batchSize?: number;
  concurrency?: number;
  timeoutMs?: number;
}

/**
 * Content hash of a validated catalog: ids, energy and embedding texts in id
 * order, independent of entry order. Ids are derived from normalised title and
 * artists, so revisions that differ only in their case or spacing share a hash.
 */
export function catalogHash(catalog: CatalogStore): string {
  const rows = catalog.records().map(record => [
    record.id,
    record.energy,
    catalog.embeddingText(record.id) ?? '',
  ]);
  return createHash('sha256').update(JSON.stringify(rows), 'utf8').digest('hex');
}

/**
 * Validate and index one catalog revision. Throws ValidationError or
 * EmbedderError; nothing is published here.
 */
export async function buildSnapshot(
  revision: unknown,
  embedder: Embedder,
  options: SnapshotBuildOptions & { sequence: number; previous?: Snapshot }
): Promise<Snapshot> {
  const catalog = CatalogStore.load(revision);
  const facets = FacetIndex.build(catalog.records());
  const vectors = await VectorIndex.build(catalog, embedder, {
    batchSize: options.batchSize,
    concurrency: options.concurrency,
    timeoutMs: options.timeoutMs,
    previous: options.previous?.vectors,
  });

  const hash = catalogHash(catalog);

  return Object.freeze({
    info: Object.freeze({
      id: `snap-${options.sequence}-${hash.slice(0, 12)}`,
      sequence: options.sequence,
      recordCount: catalog.size,
      catalogHash: hash,
      model: vectors.model,
      dimensions: vectors.dimensions,
      embedded: vectors.stats.embedded,
      reused: vectors.stats.reused,
      publishedAt: new Date().toISOString(),
    }),
    catalog,
    facets,
    vectors,
  });
}

export class SnapshotManager implements SnapshotSource {
  private active: Snapshot | undefined;
  private sequence = 0;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly embedder: Embedder,
    private readonly options: SnapshotBuildOptions = {}
  ) {}

  /**
   * Build a snapshot from `revision` and make it current.
   *
   * Publishes run one at a time in call order, each reusing vectors from the
   * snapshot current when it starts. A failed build leaves the current
   * snapshot serving.
   */
  publish(revision: unknown): Promise<SnapshotInfo> {
    const run = this.queue.then(() => this.buildAndSwap(revision));
    // Keep the chain alive; the failure itself reaches the caller through `run`
    this.queue = run.catch(() => undefined);
    return run;
  }

  current(): Snapshot {
    if (!this.active) {
      throw new NoSnapshot();
    }
    return this.active;
  }

  tryCurrent(): Snapshot | undefined {
    return this.active;
  }

  info(): SnapshotInfo | undefined {
    return this.active?.info;
  }

  private async buildAndSwap(revision: unknown): Promise<SnapshotInfo> {
    const startTime = Date.now();
    const previous = this.active;

    try {
      const snapshot = await buildSnapshot(revision, this.embedder, {
        ...this.options,
        sequence: this.sequence + 1,
        previous,
      });

      this.sequence = snapshot.info.sequence;
      this.active = snapshot;

      logger.info({
        snapshotId: snapshot.info.id,
        previousId: previous?.info.id,
        records: snapshot.info.recordCount,
        embedded: snapshot.info.embedded,
        reused: snapshot.info.reused,
        durationMs: Date.now() - startTime
      }, 'Snapshot published');

      return snapshot.info;
    } catch (error) {
      logger.warn({
        error,
        servingId: previous?.info.id ?? null,
        durationMs: Date.now() - startTime
      }, 'Snapshot build failed; keeping current snapshot');
      throw error;
    }
  }
}
