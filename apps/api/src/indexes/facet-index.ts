/**
 * Facet Index
 *
 * Inverted index from facet value to record ids, one posting map per
 * dimension. Filtering is AND across dimensions; within a dimension the
 * required values are OR-ed by default, or AND-ed with `match: 'all'`.
 */

import {
  FACET_DIMENSIONS,
  isFacetDimension,
  type FacetDimension,
  type FacetOptions,
} from '@moodshelf/shared-types';
import { InvalidFacet } from '../errors.js';
import { normalizeFacetValue } from '../catalog/schema.js';
import type { SongRecord } from '../catalog/record.js';

export type FacetMatchMode = 'any' | 'all';

/** Dimension name → required values. Dimension names are checked at filter time. */
export type FacetConstraints = Readonly<Record<string, readonly string[] | undefined>>;

type Postings = Map<string, Set<string>>;

const EMPTY: ReadonlySet<string> = new Set();

function valuesOf(record: SongRecord, dimension: FacetDimension): readonly string[] {
  return dimension === 'energy' ? [record.energy] : record[dimension];
}

export class FacetIndex {
  private constructor(
    private readonly postings: Record<FacetDimension, Postings>,
    private readonly allIds: readonly string[]
  ) {}

  static build(records: readonly SongRecord[]): FacetIndex {
    const postings: Record<FacetDimension, Postings> = {
      mood: new Map(),
      activity: new Map(),
      genre: new Map(),
      vibe_tags: new Map(),
      energy: new Map(),
    };

    const ids = records.map(record => record.id).sort();

    for (const record of records) {
      for (const dimension of FACET_DIMENSIONS) {
        for (const value of valuesOf(record, dimension)) {
          const holders = postings[dimension].get(value) ?? new Set<string>();
          holders.add(record.id);
          postings[dimension].set(value, holders);
        }
      }
    }

    return new FacetIndex(postings, Object.freeze(ids));
  }

  get size(): number {
    return this.allIds.length;
  }

  /**
   * Ids matching every constrained dimension, in ascending order.
   *
   * A dimension with an empty value list adds no constraint. A value nothing
   * carries (including one outside the vocabulary) matches no record; an
   * unknown dimension name throws InvalidFacet.
   */
  filter(constraints: FacetConstraints, options: { match?: FacetMatchMode } = {}): Set<string> {
    const match = options.match ?? 'any';
    const active: Array<[FacetDimension, string[]]> = [];

    for (const [dimension, values] of Object.entries(constraints)) {
      if (!isFacetDimension(dimension)) {
        throw new InvalidFacet(dimension);
      }
      if (values && values.length > 0) {
        active.push([dimension, values.map(value => String(normalizeFacetValue(value)))]);
      }
    }

    if (active.length === 0) {
      return new Set(this.allIds);
    }

    const dimensionSets = active.map(([dimension, values]) =>
      match === 'all'
        ? this.intersectValues(dimension, values)
        : this.unionValues(dimension, values)
    );

    // Intersect starting from the smallest set
    dimensionSets.sort((a, b) => a.size - b.size);
    const [smallest, ...rest] = dimensionSets;

    return new Set(
      this.allIds.filter(id => smallest.has(id) && rest.every(set => set.has(id)))
    );
  }

  /** Ids carrying `value` in `dimension` */
  idsFor(dimension: FacetDimension, value: string): ReadonlySet<string> {
    return this.postings[dimension].get(value) ?? EMPTY;
  }

  /** Values present in the catalog for a dimension, ascending */
  valuesOf(dimension: FacetDimension): string[] {
    return [...this.postings[dimension].keys()].sort();
  }

  /** Per-dimension pick lists with record counts */
  options(): FacetOptions {
    const pickList = (dimension: FacetDimension) =>
      this.valuesOf(dimension).map(value => ({
        value,
        count: this.idsFor(dimension, value).size,
      }));

    return {
      mood: pickList('mood'),
      activity: pickList('activity'),
      genre: pickList('genre'),
      vibe_tags: pickList('vibe_tags'),
      energy: pickList('energy'),
    };
  }

  /** Plain, ordered copy of the index contents */
  toJSON(): Record<FacetDimension, Record<string, string[]>> {
    const postingList = (dimension: FacetDimension) =>
      Object.fromEntries(
        this.valuesOf(dimension).map(value => [value, [...this.idsFor(dimension, value)].sort()])
      );

    return {
      mood: postingList('mood'),
      activity: postingList('activity'),
      genre: postingList('genre'),
      vibe_tags: postingList('vibe_tags'),
      energy: postingList('energy'),
    };
  }

  private unionValues(dimension: FacetDimension, values: readonly string[]): Set<string> {
    const union = new Set<string>();
    for (const value of values) {
      for (const id of this.idsFor(dimension, value)) {
        union.add(id);
      }
    }
    return union;
  }

  private intersectValues(dimension: FacetDimension, values: readonly string[]): Set<string> {
    const [first, ...rest] = values.map(value => this.idsFor(dimension, value));
    return new Set([...first].filter(id => rest.every(set => set.has(id))));
  }
}
