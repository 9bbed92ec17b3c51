/**
 * Input checks run at the client boundary, before any request is made.
 */

import { ValidationError } from '@paperhub/shared';
import type { ArxivSortField, SortOrder } from '@paperhub/shared';
import { QueryBuilder } from './query-builder';
import type { QueryInput } from './types';

export interface ResolvedQuery {
  query: string;
  sortBy?: ArxivSortField;
  sortOrder?: SortOrder;
}

/** Accept a plain string or a builder and tag it. */
export function toQueryInput(query: string | QueryBuilder | QueryInput): QueryInput {
  if (typeof query === 'string') {
    return { kind: 'raw', query };
  }
  if (query instanceof QueryBuilder) {
    return { kind: 'built', builder: query };
  }
  return query;
}

/** Turn a tagged query into the string sent to the provider, plus any sort settings. */
export function resolveQuery(input: QueryInput): ResolvedQuery {
  switch (input.kind) {
    case 'raw': {
      if (!input.query.trim()) {
        throw new ValidationError('Query must be a non-empty string');
      }
      return { query: input.query };
    }
    case 'built': {
      const query = input.builder.build();
      if (!query.trim()) {
        throw new ValidationError('Query builder produced an empty query');
      }
      return { query, sortBy: input.builder.sortBy, sortOrder: input.builder.sortOrder };
    }
  }
}

export interface PaginationLimits {
  /** Largest maxResults a single call accepts */
  maxResultsCap: number;
  /** Extra hint appended to the cap error */
  capHint?: string;
}

export function validatePagination(
  start: number,
  maxResults: number,
  limits: PaginationLimits
): void {
  if (!Number.isInteger(start) || start < 0) {
    throw new ValidationError(`start must be a non-negative integer, got ${start}`);
  }
  if (!Number.isInteger(maxResults) || maxResults < 0) {
    throw new ValidationError(`maxResults must be a non-negative integer, got ${maxResults}`);
  }
  if (maxResults > limits.maxResultsCap) {
    const hint = limits.capHint ? `; ${limits.capHint}` : '';
    throw new ValidationError(
      `maxResults must be <= ${limits.maxResultsCap}, got ${maxResults}${hint}`
    );
  }
}

export function validateTimeout(timeoutMs: number): void {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ValidationError(`timeoutMs must be a positive number, got ${timeoutMs}`);
  }
}
