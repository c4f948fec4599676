import { describe, it, expect, beforeAll } from 'vitest';
import { FACET_DIMENSIONS } from '@moodshelf/shared-types';
import { FacetIndex, type FacetConstraints } from '../facet-index.js';
import { CatalogStore } from '../../catalog/store.js';
import { InvalidFacet } from '../../errors.js';
import { entry, idOf, threeSongCatalog } from '../../../test/fixtures.js';

describe('FacetIndex', () => {
  let store: CatalogStore;
  let index: FacetIndex;
  let a: string;
  let b: string;
  let c: string;

  beforeAll(() => {
    store = CatalogStore.load(threeSongCatalog());
    index = FacetIndex.build(store.records());
    a = idOf(store, 'A');
    b = idOf(store, 'B');
    c = idOf(store, 'C');
  });

  const sorted = (...ids: string[]) => [...ids].sort();

  describe('filter', () => {
    it('should return every id when there are no constraints', () => {
      expect([...index.filter({})]).toEqual(store.ids());
    });

    it('should intersect across dimensions', () => {
      expect([...index.filter({ mood: ['dreamy'], genre: ['pop'] })]).toEqual([a]);
    });

    it('should union values within a dimension by default', () => {
      expect([...index.filter({ mood: ['dreamy', 'energetic'] })]).toEqual(sorted(a, b, c));
      expect([...index.filter({ genre: ['rock', 'pop'], mood: ['dreamy'] })]).toEqual(sorted(a, c));
    });

    it('should require every value within a dimension with match "all"', () => {
      const catalog = CatalogStore.load([
        entry({ title: 'Both', mood: ['dreamy', 'nostalgic'] }),
        entry({ title: 'One', mood: ['dreamy'] }),
      ]);
      const facets = FacetIndex.build(catalog.records());

      expect([...facets.filter({ mood: ['dreamy', 'nostalgic'] }, { match: 'all' })])
        .toEqual([idOf(catalog, 'Both')]);
      expect([...facets.filter({ mood: ['dreamy', 'nostalgic'] })])
        .toEqual(catalog.ids());
    });

    it('should return ids in ascending order', () => {
      const ids = [...index.filter({ genre: ['pop'] })];
      expect(ids).toEqual(sorted(a, b));
    });

    it('should match nothing for a value no record carries', () => {
      expect(index.filter({ mood: ['euphoric'] }).size).toBe(0);
      expect(index.filter({ mood: ['not-a-mood'] }).size).toBe(0);
    });

    it('should return an empty set, not an error, for a genre nobody has', () => {
      expect(index.filter({ genre: ['jazz'] })).toEqual(new Set());
    });

    it('should still match the known values of a dimension that includes an unknown one', () => {
      expect([...index.filter({ genre: ['rock', 'polka'] })]).toEqual([c]);
    });

    it('should treat an empty value list as no constraint', () => {
      expect([...index.filter({ mood: [], genre: ['rock'] })]).toEqual([c]);
      expect(index.filter({ mood: [] }).size).toBe(3);
    });

    it('should throw InvalidFacet for an unknown dimension', () => {
      expect(() => index.filter({ tempo: ['fast'] })).toThrow(InvalidFacet);
      expect(() => index.filter({ tempo: ['fast'] })).toThrow('Unknown facet dimension: tempo');
    });

    it('should validate dimensions even when their value list is empty', () => {
      expect(() => index.filter({ tempo: [] })).toThrow(InvalidFacet);
    });

    it('should normalize requested values the way catalog values are normalized', () => {
      expect([...index.filter({ genre: [' POP '] })]).toEqual(sorted(a, b));
    });

    it('should filter on the single-valued energy dimension', () => {
      const catalog = CatalogStore.load([
        entry({ title: 'Quiet', energy: 'low' }),
        entry({ title: 'Loud', energy: 'high' }),
        entry({ title: 'Middle', energy: 'medium' }),
      ]);
      const facets = FacetIndex.build(catalog.records());

      expect([...facets.filter({ energy: ['high'] })]).toEqual([idOf(catalog, 'Loud')]);
      expect([...facets.filter({ energy: ['high', 'low'] })])
        .toEqual(sorted(idOf(catalog, 'Loud'), idOf(catalog, 'Quiet')));
      expect(facets.filter({ energy: ['high', 'low'] }, { match: 'all' }).size).toBe(0);
    });

    it('should only return records satisfying every constraint', () => {
      const catalog = CatalogStore.load([
        entry({ title: 'S1', mood: ['chill', 'dreamy'], genre: ['lo-fi'], activity: ['studying'] }),
        entry({ title: 'S2', mood: ['dreamy'], genre: ['pop', 'lo-fi'], activity: ['relaxing'] }),
        entry({ title: 'S3', mood: ['energetic'], genre: ['lo-fi'], activity: ['studying'] }),
        entry({ title: 'S4', mood: ['chill'], genre: ['jazz'], activity: ['studying', 'focus'] }),
      ]);
      const facets = FacetIndex.build(catalog.records());
      const constraints = { mood: ['chill', 'dreamy'], genre: ['lo-fi'], activity: ['studying'] } satisfies FacetConstraints;

      const matched = [...facets.filter(constraints)];

      expect(matched).toEqual([idOf(catalog, 'S1')]);
      for (const record of catalog.records()) {
        const satisfies = record.mood.some(mood => constraints.mood.includes(mood))
          && record.genre.some(genre => constraints.genre.includes(genre))
          && record.activity.some(activity => constraints.activity.includes(activity));
        expect(matched.includes(record.id)).toBe(satisfies);
      }
    });
  });

  describe('lookups', () => {
    it('should expose the ids carrying a value', () => {
      expect(sorted(...index.idsFor('mood', 'dreamy'))).toEqual(sorted(a, c));
      expect(index.idsFor('mood', 'lonely').size).toBe(0);
    });

    it('should list values present per dimension in ascending order', () => {
      expect(index.valuesOf('mood')).toEqual(['dreamy', 'energetic']);
      expect(index.valuesOf('genre')).toEqual(['pop', 'rock']);
      expect(index.size).toBe(3);
    });
  });

  describe('options', () => {
    it('should count records per value for every dimension', () => {
      expect(index.options()).toEqual({
        mood: [{ value: 'dreamy', count: 2 }, { value: 'energetic', count: 1 }],
        activity: [{ value: 'relaxing', count: 3 }],
        genre: [{ value: 'pop', count: 2 }, { value: 'rock', count: 1 }],
        vibe_tags: [{ value: 'hazy', count: 3 }],
        energy: [{ value: 'low', count: 3 }],
      });
    });

    it('should return empty pick lists for an empty catalog', () => {
      const empty = FacetIndex.build([]);
      for (const dimension of FACET_DIMENSIONS) {
        expect(empty.options()[dimension]).toEqual([]);
      }
      expect(empty.filter({ mood: ['chill'] }).size).toBe(0);
    });
  });

  describe('toJSON', () => {
    it('should be identical for catalogs that differ only in entry order', () => {
      const reversed = CatalogStore.load([...threeSongCatalog()].reverse());
      expect(FacetIndex.build(reversed.records()).toJSON()).toEqual(index.toJSON());
    });

    it('should list sorted posting lists per value', () => {
      expect(index.toJSON().genre).toEqual({ pop: sorted(a, b), rock: [c] });
    });
  });
});
