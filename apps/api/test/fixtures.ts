/**
 * Shared test fixtures: catalog entries and a controllable in-process embedder.
 */

import type { CatalogEntry } from '@moodshelf/shared-types';
import type { Embedder } from '../src/embeddings/types.js';
import type { CatalogStore } from '../src/catalog/store.js';

export function entry(overrides: Partial<CatalogEntry> = {}): CatalogEntry {
  return {
    title: 'Untitled',
    artist: 'Test Artist',
    mood: ['chill'],
    activity: ['relaxing'],
    energy: 'low',
    genre: ['pop'],
    vibe_tags: ['hazy'],
    description: 'placeholder description',
    ...overrides,
  };
}

/** A(dreamy, pop), B(energetic, pop), C(dreamy, rock) */
export function threeSongCatalog(): CatalogEntry[] {
  return [
    entry({ title: 'A', mood: ['dreamy'], genre: ['pop'], description: 'ocean' }),
    entry({ title: 'B', mood: ['energetic'], genre: ['pop'], description: 'fire' }),
    entry({ title: 'C', mood: ['dreamy'], genre: ['rock'], description: 'forest' }),
  ];
}

export function idOf(store: CatalogStore, title: string): string {
  const record = store.records().find(candidate => candidate.title === title);
  if (!record) {
    throw new Error(`No record titled ${title}`);
  }
  return record.id;
}

export const KEYWORD_AXES = ['ocean', 'fire', 'forest', 'stone'] as const;

/** One axis per keyword; the component is how often the word appears in the text. */
export function keywordVector(text: string): number[] {
  const words = text.toLowerCase().split(/[^a-z]+/);
  return KEYWORD_AXES.map(axis => words.filter(word => word === axis).length);
}

export interface FakeEmbedderOptions {
  model?: string;
  vectorFor?: (text: string) => number[];
  /** Throw for any text this returns true for */
  failWhen?: (text: string) => boolean;
  /** Delay before each call resolves */
  delayMs?: number;
}

/**
 * Deterministic embedder with call accounting. Vectors come from keyword
 * counts unless `vectorFor` is given.
 */
export class FakeEmbedder implements Embedder {
  readonly calls: string[][] = [];
  inFlight = 0;
  maxInFlight = 0;
  private options: FakeEmbedderOptions;

  constructor(options: FakeEmbedderOptions = {}) {
    this.options = options;
  }

  setFailure(failWhen: ((text: string) => boolean) | undefined): void {
    this.options = { ...this.options, failWhen };
  }

  setDelay(delayMs: number | undefined): void {
    this.options = { ...this.options, delayMs };
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      if (this.options.delayMs) {
        await new Promise(resolve => setTimeout(resolve, this.options.delayMs));
      }
      const failing = texts.find(text => this.options.failWhen?.(text));
      if (failing !== undefined) {
        throw new Error(`embedder refused: ${failing.split('\n').pop()}`);
      }
      const vectorFor = this.options.vectorFor ?? keywordVector;
      return texts.map(text => vectorFor(text));
    } finally {
      this.inFlight--;
    }
  }

  async embedSingle(text: string): Promise<number[]> {
    const [vector] = await this.embed([text]);
    return vector;
  }

  getModel(): string {
    return this.options.model ?? 'fake-keywords';
  }

  getDimensions(): number {
    return KEYWORD_AXES.length;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  get textsEmbedded(): number {
    return this.calls.reduce((sum, batch) => sum + batch.length, 0);
  }
}
