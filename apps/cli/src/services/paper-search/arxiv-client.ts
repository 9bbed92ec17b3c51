/**
 * ArxivClient - arXiv Atom feed API
 *
 * search() and getById() share one HttpTransport, so both count against the
 * same rate limit (3 s between requests by default, as arXiv asks).
 */

import { CLIENT_VERSION, ValidationError, createResultSet } from '@paperhub/shared';
import type { ArxivPaper, ResultSet } from '@paperhub/shared';
import { getConfig, type AppConfig } from '../config';
import { downloadPaper, DEFAULT_CHUNK_SIZE, DEFAULT_DOWNLOAD_TIMEOUT_MS } from '../downloads';
import { createLogger, type Logger } from '../logger';
import { extractArxivId, isValidArxivId } from './arxiv-ids';
import { parseArxivFeed } from './arxiv-parser';
import { providerOptionsFromConfig } from './client-config';
import { buildUserAgent, HttpTransport } from './http';
import type { QueryBuilder } from './query-builder';
import type {
  DownloadOptions,
  PaperSearchClient,
  ProviderClientOptions,
  QueryInput,
  RequestOptions,
  SearchOptions,
} from './types';
import { resolveQuery, toQueryInput, validatePagination, validateTimeout } from './validation';

export const ARXIV_API_URL = 'https://export.arxiv.org/api/query';
export const ARXIV_MIN_INTERVAL_MS = 3000;
export const ARXIV_MAX_RESULTS = 2000;
export const DEFAULT_SEARCH_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_RESULTS = 10;

export type ArxivQuery = string | QueryBuilder | QueryInput;

export class ArxivClient implements PaperSearchClient<ArxivQuery, ArxivPaper> {
  readonly id = 'arxiv';
  readonly transport: HttpTransport;
  private readonly baseUrl: string;
  private readonly searchTimeoutMs: number;
  private readonly downloadTimeoutMs: number;
  private readonly chunkSize: number;
  private readonly logger: Logger;

  constructor(options: ProviderClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? ARXIV_API_URL;
    this.searchTimeoutMs = options.searchTimeoutMs ?? DEFAULT_SEARCH_TIMEOUT_MS;
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.logger = options.logger ?? createLogger('ArxivClient');
    this.transport = new HttpTransport({
      userAgent: options.userAgent ?? buildUserAgent({ appName: 'PaperHub', version: CLIENT_VERSION }),
      minIntervalMs: options.minIntervalMs ?? ARXIV_MIN_INTERVAL_MS,
      maxConcurrent: options.maxConcurrent,
      retry: options.retry,
      fetch: options.fetch,
      sleep: options.sleep,
      now: options.now,
      logger: this.logger,
    });
  }

  /**
   * Run a search. A builder's sort settings are sent along with its query.
   */
  async search(query: ArxivQuery, options: SearchOptions = {}): Promise<ResultSet<ArxivPaper>> {
    const resolved = resolveQuery(toQueryInput(query));
    const start = options.start ?? 0;
    const maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    validatePagination(start, maxResults, {
      maxResultsCap: ARXIV_MAX_RESULTS,
      capHint: `page through larger result sets with start in slices of at most ${ARXIV_MAX_RESULTS}`,
    });
    const timeoutMs = options.timeoutMs ?? this.searchTimeoutMs;
    validateTimeout(timeoutMs);

    this.logger.info(`Searching: ${resolved.query} (start=${start}, max_results=${maxResults})`);
    const xml = await this.transport.getText(this.baseUrl, {
      query: {
        search_query: resolved.query,
        start,
        max_results: maxResults,
        sortBy: resolved.sortBy,
        sortOrder: resolved.sortOrder,
      },
      timeoutMs,
      label: 'arXiv search',
    });

    const feed = parseArxivFeed(xml, this.logger);
    return createResultSet({
      entries: feed.entries,
      totalResults: feed.totalResults,
      startIndex: feed.startIndex,
      itemsPerPage: feed.itemsPerPage,
      query: resolved.query,
      sortBy: resolved.sortBy,
      sortOrder: resolved.sortOrder,
    });
  }

  /**
   * Fetch one paper by id ("2101.00001", "2101.00001v2", "hep-th/9901001" or
   * an abs/pdf URL). Returns null when arXiv has no such paper.
   */
  async getById(id: string, options: RequestOptions = {}): Promise<ArxivPaper | null> {
    const arxivId = extractArxivId(id.trim());
    if (!arxivId || !isValidArxivId(arxivId)) {
      throw new ValidationError(`Invalid arXiv id format: ${JSON.stringify(id)}`);
    }
    const timeoutMs = options.timeoutMs ?? this.searchTimeoutMs;
    validateTimeout(timeoutMs);

    const xml = await this.transport.getText(this.baseUrl, {
      query: { id_list: arxivId },
      timeoutMs,
      label: 'arXiv lookup',
    });
    const feed = parseArxivFeed(xml, this.logger);
    return feed.entries[0] ?? null;
  }

  async download(record: ArxivPaper, destDir: string, options: DownloadOptions = {}): Promise<string> {
    return downloadPaper(
      record,
      destDir,
      {
        overwrite: options.overwrite,
        timeoutMs: options.timeoutMs ?? this.downloadTimeoutMs,
        chunkSize: options.chunkSize ?? this.chunkSize,
      },
      { transport: this.transport, logger: this.logger }
    );
  }
}

export function createArxivClient(
  config: AppConfig = getConfig(),
  overrides: ProviderClientOptions = {}
): ArxivClient {
  return new ArxivClient({ ...providerOptionsFromConfig(config, config.arxiv), ...overrides });
}
