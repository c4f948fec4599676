/**
 * Engine error taxonomy. Each error carries a stable `code` that the HTTP
 * layer maps to a status code.
 */

import type { ValidationIssue } from '@moodshelf/shared-types';

export type RetrievalErrorCode =
  | 'ValidationError'
  | 'EmbedderError'
  | 'RetrievalUnavailable'
  | 'InvalidFacet'
  | 'NoSnapshot';

export abstract class RetrievalError extends Error {
  abstract readonly code: RetrievalErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * One or more catalog entries failed validation. All issues are collected
 * before this is thrown; `index`, `field` and `reason` mirror the first one.
 */
export class ValidationError extends RetrievalError {
  readonly code = 'ValidationError';
  readonly index: number;
  readonly field: string;
  readonly reason: string;

  constructor(public readonly issues: ValidationIssue[]) {
    const first = issues[0] ?? { index: -1, field: 'catalog', reason: 'invalid catalog' };
    const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : '';
    super(`Invalid catalog entry at index ${first.index}, field "${first.field}": ${first.reason}${more}`);
    this.index = first.index;
    this.field = first.field;
    this.reason = first.reason;
  }
}

/** Embedding failed while building a snapshot; the build is aborted. */
export class EmbedderError extends RetrievalError {
  readonly code = 'EmbedderError';

  constructor(
    message: string,
    public readonly failedIds: string[] = [],
    public readonly causes: unknown[] = []
  ) {
    super(message, { cause: causes[0] });
  }
}

/** The embedder could not serve a live semantic query. */
export class RetrievalUnavailable extends RetrievalError {
  readonly code = 'RetrievalUnavailable';
}

/** A query named a facet dimension that does not exist. */
export class InvalidFacet extends RetrievalError {
  readonly code = 'InvalidFacet';

  constructor(public readonly dimension: string) {
    super(`Unknown facet dimension: ${dimension}`);
  }
}

export class NoSnapshot extends RetrievalError {
  readonly code = 'NoSnapshot';

  constructor() {
    super('No catalog snapshot has been published yet');
  }
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}
