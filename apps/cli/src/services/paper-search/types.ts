/**
 * Paper Search - client-facing types shared by the arXiv and Semantic Scholar clients
 */

import type { PaperRecord, ResultSet } from '@paperhub/shared';
import type { Logger } from '../logger';
import type { FetchFn, RetryPolicy, SleepFn } from './http';
import type { QueryBuilder } from './query-builder';

/**
 * A search query is either a raw provider string or a builder. Resolved
 * explicitly at the client boundary (see toQueryInput / resolveQuery).
 */
export type QueryInput =
  | { kind: 'raw'; query: string }
  | { kind: 'built'; builder: QueryBuilder };

export interface RequestOptions {
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
}

export interface SearchOptions extends RequestOptions {
  /** Zero-based offset of the first result */
  start?: number;
  maxResults?: number;
}

export interface DownloadOptions extends RequestOptions {
  /** Re-download even when the target file already exists */
  overwrite?: boolean;
  /** Write size in bytes when streaming the body to disk */
  chunkSize?: number;
}

/**
 * Operations every provider client exposes.
 */
export interface PaperSearchClient<Q, T extends PaperRecord> {
  readonly id: string;
  search(query: Q, options?: SearchOptions): Promise<ResultSet<T>>;
  getById(id: string, options?: RequestOptions): Promise<T | null>;
  download(record: T, destDir: string, options?: DownloadOptions): Promise<string>;
}

/** Result of decoding a single entry; entry parsers never throw. */
export type EntryParseResult<T> =
  | { ok: true; record: T }
  | { ok: false; index: number; message: string };

/** Constructor options common to both provider clients. */
export interface ProviderClientOptions {
  baseUrl?: string;
  userAgent?: string;
  /** Minimum delay between request starts on this instance */
  minIntervalMs?: number;
  /** Requests allowed in flight at once (default 1) */
  maxConcurrent?: number;
  retry?: Partial<RetryPolicy>;
  searchTimeoutMs?: number;
  downloadTimeoutMs?: number;
  chunkSize?: number;
  fetch?: FetchFn;
  sleep?: SleepFn;
  now?: () => number;
  logger?: Logger;
}
