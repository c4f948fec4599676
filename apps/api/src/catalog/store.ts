/**
 * CatalogStore
 *
 * Validates a raw catalog revision and holds the resulting records, keyed and
 * ordered by their derived id. A store never changes after `load` returns.
 */

import type { ValidationIssue } from '@moodshelf/shared-types';
import { ValidationError } from '../errors.js';
import { CatalogEntrySchema } from './schema.js';
import { buildEmbeddingText, deriveRecordId, type SongRecord } from './record.js';

export class CatalogStore {
  private readonly byId: ReadonlyMap<string, SongRecord>;
  private readonly orderedIds: readonly string[];
  private readonly texts: ReadonlyMap<string, string>;

  private constructor(records: SongRecord[]) {
    const sorted = [...records].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    this.byId = new Map(sorted.map(record => [record.id, record]));
    this.orderedIds = Object.freeze(sorted.map(record => record.id));
    this.texts = new Map(sorted.map(record => [record.id, buildEmbeddingText(record)]));
  }

  /**
   * Validate every entry and build the store.
   *
   * Issues from all entries are accumulated; if there are any, a single
   * ValidationError listing them in entry order is thrown and nothing is built.
   */
  static load(rawEntries: unknown): CatalogStore {
    if (!Array.isArray(rawEntries)) {
      throw new ValidationError([{ index: -1, field: 'catalog', reason: 'catalog must be a list of entries' }]);
    }

    const issues: ValidationIssue[] = [];
    const records: SongRecord[] = [];
    const firstIndexById = new Map<string, number>();

    rawEntries.forEach((raw: unknown, index: number) => {
      const parsed = CatalogEntrySchema.safeParse(raw);

      if (!parsed.success) {
        for (const issue of parsed.error.issues) {
          issues.push({
            index,
            field: issue.path.length > 0 ? String(issue.path[0]) : 'entry',
            reason: issue.path.length > 0 ? issue.message : 'entry must be an object',
          });
        }
        return;
      }

      const entry = parsed.data;
      const id = deriveRecordId(entry.title, entry.artist);
      const seenAt = firstIndexById.get(id);

      if (seenAt !== undefined) {
        issues.push({
          index,
          field: 'title',
          reason: `duplicate of entry ${seenAt} (same title and artist)`,
        });
        return;
      }
      firstIndexById.set(id, index);

      records.push(Object.freeze({
        id,
        title: entry.title,
        artist: Object.freeze(entry.artist),
        mood: Object.freeze(entry.mood),
        activity: Object.freeze(entry.activity),
        genre: Object.freeze(entry.genre),
        vibe_tags: Object.freeze(entry.vibe_tags),
        energy: entry.energy,
        description: entry.description,
      }));
    });

    if (issues.length > 0) {
      throw new ValidationError(issues);
    }

    return new CatalogStore(records);
  }

  get size(): number {
    return this.orderedIds.length;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  get(id: string): SongRecord | undefined {
    return this.byId.get(id);
  }

  /** Record ids in ascending order */
  ids(): readonly string[] {
    return this.orderedIds;
  }

  /** Records in ascending id order */
  records(): SongRecord[] {
    return this.orderedIds.map(id => this.require(id));
  }

  embeddingText(id: string): string | undefined {
    return this.texts.get(id);
  }

  private require(id: string): SongRecord {
    const record = this.byId.get(id);
    if (!record) {
      throw new Error(`Catalog invariant broken: missing record ${id}`);
    }
    return record;
  }
}
