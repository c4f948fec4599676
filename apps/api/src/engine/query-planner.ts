/**
 * Query Planner
 *
 * Facet filters narrow the candidate set; free text, when present, ranks the
 * candidates by embedding similarity. Without text the query is a plain facet
 * browse in ascending id order and never touches the embedder.
 */

import type { MatchStrength, QueryMode } from '@moodshelf/shared-types';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/async.js';
import { RetrievalUnavailable } from '../errors.js';
import { vectorUtils } from '../embeddings/utils.js';
import type { Embedder } from '../embeddings/types.js';
import type { SongRecord } from '../catalog/record.js';
import type { FacetConstraints, FacetMatchMode } from '../indexes/facet-index.js';
import type { Snapshot, SnapshotSource } from './snapshot-manager.js';
import { matchStrength } from './match-strength.js';

export interface QueryRequest {
  text?: string | null;
  filters?: FacetConstraints;
  match?: FacetMatchMode;
  /** Maximum hits; browse returns every candidate when omitted */
  limit?: number;
}

export interface RankedHit {
  record: SongRecord;
  score: number | null;
  strength: MatchStrength | null;
}

export interface QueryResult {
  hits: RankedHit[];
  count: number;
  /** Candidates that passed the facet filters */
  total: number;
  snapshotId: string;
  mode: QueryMode;
}

export interface QueryPlannerOptions {
  /** Semantic hit count when the request gives no limit */
  defaultLimit?: number;
  /** Deadline for embedding the query text */
  timeoutMs?: number;
}

export class QueryPlanner {
  private readonly defaultLimit: number;

  constructor(
    private readonly snapshots: SnapshotSource,
    private readonly embedder: Embedder,
    private readonly options: QueryPlannerOptions = {}
  ) {
    this.defaultLimit = options.defaultLimit ?? 5;
  }

  async query(request: QueryRequest): Promise<QueryResult> {
    const startTime = Date.now();
    const snapshot = this.snapshots.current();
    const { limit } = request;

    if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
      throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
    }

    const candidates = snapshot.facets.filter(request.filters ?? {}, { match: request.match });
    const text = (request.text ?? '').trim();

    const result = text
      ? await this.rank(snapshot, text, candidates, limit ?? this.defaultLimit)
      : this.browse(snapshot, candidates, limit);

    logger.debug({
      snapshotId: snapshot.info.id,
      mode: result.mode,
      hasText: text.length > 0,
      filters: request.filters,
      total: result.total,
      count: result.count,
      processingTime: Date.now() - startTime
    }, 'Query completed');

    return result;
  }

  private browse(snapshot: Snapshot, candidates: Set<string>, limit: number | undefined): QueryResult {
    const ids = [...candidates].sort();
    const page = limit === undefined ? ids : ids.slice(0, limit);
    const hits = page.map(id => ({ record: this.recordOf(snapshot, id), score: null, strength: null }));

    return {
      hits,
      count: hits.length,
      total: candidates.size,
      snapshotId: snapshot.info.id,
      mode: 'browse',
    };
  }

  private async rank(
    snapshot: Snapshot,
    text: string,
    candidates: Set<string>,
    limit: number
  ): Promise<QueryResult> {
    const empty: QueryResult = {
      hits: [],
      count: 0,
      total: candidates.size,
      snapshotId: snapshot.info.id,
      mode: 'semantic',
    };

    // Nothing to rank; the embedder is not consulted
    if (candidates.size === 0 || limit === 0) {
      return empty;
    }

    const queryVector = await this.embedQuery(text);
    if (!vectorUtils.isValidVector(queryVector)) {
      throw new RetrievalUnavailable(`Query embedding from ${this.embedder.getModel()} is not a finite vector`);
    }
    if (queryVector.length !== snapshot.vectors.dimensions) {
      throw new RetrievalUnavailable(
        `Query embedding has ${queryVector.length} dimensions but snapshot ${snapshot.info.id} uses ${snapshot.vectors.dimensions}`
      );
    }

    const hits = snapshot.vectors.nearest(queryVector, candidates, limit).map(hit => ({
      record: this.recordOf(snapshot, hit.id),
      score: hit.score,
      strength: matchStrength(hit.score),
    }));

    return { ...empty, hits, count: hits.length };
  }

  private async embedQuery(text: string): Promise<number[]> {
    try {
      const pending = this.embedder.embedSingle(text);
      return this.options.timeoutMs === undefined
        ? await pending
        : await withTimeout(pending, this.options.timeoutMs, 'Query embedding');
    } catch (error) {
      logger.warn({ error, textLength: text.length }, 'Query embedding failed');
      throw new RetrievalUnavailable(
        `Semantic search is unavailable: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  private recordOf(snapshot: Snapshot, id: string): SongRecord {
    const record = snapshot.catalog.get(id);
    if (!record) {
      throw new Error(`Snapshot ${snapshot.info.id} has no record ${id}`);
    }
    return record;
  }
}
