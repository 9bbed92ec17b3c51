/**
 * SemanticScholarClient - Semantic Scholar Academic Graph API
 * Documentation: https://api.semanticscholar.org/api-docs/graph
 *
 * Sends x-api-key when a key is configured; without one the public
 * (rate-limited) tier is used.
 */

import { ApiError, CLIENT_VERSION, ValidationError, createResultSet } from '@paperhub/shared';
import type { PaperRef, ResultSet, SemanticScholarPaper } from '@paperhub/shared';
import { getConfig, type AppConfig } from '../config';
import { downloadPaper, DEFAULT_CHUNK_SIZE, DEFAULT_DOWNLOAD_TIMEOUT_MS } from '../downloads';
import { createLogger, type Logger } from '../logger';
import { providerOptionsFromConfig } from './client-config';
import { buildUserAgent, HttpTransport, type TransportRequest } from './http';
import {
  parseAuthor,
  parseAuthorList,
  parseAutocomplete,
  parseBatch,
  parseEdges,
  parsePaperList,
  parseSearchEnvelope,
  parseSemanticScholarPaper,
  type ScholarAuthor,
} from './semantic-scholar-parser';
import { collectEntries } from './parse-results';
import type {
  DownloadOptions,
  PaperSearchClient,
  ProviderClientOptions,
  RequestOptions,
  SearchOptions,
} from './types';
import { resolveQuery, toQueryInput, validatePagination, validateTimeout } from './validation';

export const SEMANTIC_SCHOLAR_API_URL = 'https://api.semanticscholar.org/graph/v1';
export const SEMANTIC_SCHOLAR_MIN_INTERVAL_MS = 1000;
/** Page limit of /paper/search */
export const SEMANTIC_SCHOLAR_MAX_RESULTS = 100;
/** Id limit of /paper/batch */
export const SEMANTIC_SCHOLAR_MAX_BATCH = 500;

const DEFAULT_SEARCH_TIMEOUT_MS = 10_000;

export const SEARCH_FIELDS = [
  'paperId',
  'title',
  'abstract',
  'url',
  'venue',
  'year',
  'publicationDate',
  'authors',
  'externalIds',
  'citationCount',
  'influentialCitationCount',
  'openAccessPdf',
].join(',');

export const DETAIL_FIELDS = [
  SEARCH_FIELDS,
  'tldr',
  'references.paperId',
  'references.title',
  'citations.paperId',
  'citations.title',
].join(',');

const AUTHOR_SEARCH_FIELDS = 'authorId,name,url,affiliations,paperCount,citationCount,hIndex';
const AUTHOR_DETAIL_FIELDS = `${AUTHOR_SEARCH_FIELDS},papers.paperId,papers.title`;

const PAPER_ID = /^[0-9a-f]{40}$/i;
const PREFIXED_PAPER_ID = /^(?:DOI|ARXIV|CORPUSID|MAG|ACL|PMID|PMCID|URL):\S.*$/i;
const AUTHOR_ID = /^\d+$/;

export function isValidPaperId(id: string): boolean {
  const value = id.trim();
  return PAPER_ID.test(value) || PREFIXED_PAPER_ID.test(value);
}

/** Keep ':' and '/' readable in prefixed ids such as DOI:10.1000/xyz. */
function encodePathId(id: string): string {
  return encodeURIComponent(id).replace(/%3A/gi, ':').replace(/%2F/gi, '/');
}

export interface SemanticScholarSearchOptions extends SearchOptions {
  /** Publication year or range, e.g. "2020" or "2018-2022" */
  year?: string;
  /** Only papers with an open-access PDF */
  openAccessOnly?: boolean;
}

export interface SemanticScholarClientOptions extends ProviderClientOptions {
  /** Falls back to SEMANTIC_SCHOLAR_API_KEY when undefined; null means no key */
  apiKey?: string | null;
}

export interface PageOptions extends RequestOptions {
  offset?: number;
  limit?: number;
}

export class SemanticScholarClient implements PaperSearchClient<string, SemanticScholarPaper> {
  readonly id = 'semantic_scholar';
  readonly transport: HttpTransport;
  private readonly baseUrl: string;
  private readonly searchTimeoutMs: number;
  private readonly downloadTimeoutMs: number;
  private readonly chunkSize: number;
  private readonly logger: Logger;

  constructor(options: SemanticScholarClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? SEMANTIC_SCHOLAR_API_URL).replace(/\/+$/, '');
    this.searchTimeoutMs = options.searchTimeoutMs ?? DEFAULT_SEARCH_TIMEOUT_MS;
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.logger = options.logger ?? createLogger('SemanticScholarClient');

    const apiKey =
      options.apiKey === undefined ? process.env.SEMANTIC_SCHOLAR_API_KEY : options.apiKey;
    if (!apiKey) {
      this.logger.debug('No API key configured; using the public rate-limited tier');
    }

    this.transport = new HttpTransport({
      userAgent: options.userAgent ?? buildUserAgent({ appName: 'PaperHub', version: CLIENT_VERSION }),
      headers: apiKey ? { 'x-api-key': apiKey } : undefined,
      minIntervalMs: options.minIntervalMs ?? SEMANTIC_SCHOLAR_MIN_INTERVAL_MS,
      maxConcurrent: options.maxConcurrent,
      retry: options.retry,
      fetch: options.fetch,
      sleep: options.sleep,
      now: options.now,
      logger: this.logger,
    });
  }

  private request(
    query: TransportRequest['query'],
    options: RequestOptions,
    label: string
  ): TransportRequest {
    const timeoutMs = options.timeoutMs ?? this.searchTimeoutMs;
    validateTimeout(timeoutMs);
    return { query, timeoutMs, label };
  }

  private validatePaperId(id: string): string {
    const value = id.trim();
    if (!isValidPaperId(value)) {
      throw new ValidationError(
        `Invalid Semantic Scholar paper id: ${JSON.stringify(id)} (expected a 40-character hex id or a DOI:/ARXIV:/CorpusId:/MAG:/ACL:/PMID:/PMCID:/URL: prefixed id)`
      );
    }
    return value;
  }

  private validatePage(options: PageOptions): { offset: number; limit: number } {
    const offset = options.offset ?? 0;
    const limit = options.limit ?? 10;
    validatePagination(offset, limit, { maxResultsCap: SEMANTIC_SCHOLAR_MAX_RESULTS });
    return { offset, limit };
  }

  /** GET that maps 404 to null */
  private async getJsonOrNull(url: string, request: TransportRequest): Promise<unknown> {
    try {
      return await this.transport.getJson(url, request);
    } catch (error) {
      if (error instanceof ApiError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  async search(
    query: string,
    options: SemanticScholarSearchOptions = {}
  ): Promise<ResultSet<SemanticScholarPaper>> {
    const resolved = resolveQuery(toQueryInput(query));
    const start = options.start ?? 0;
    const maxResults = options.maxResults ?? 10;
    validatePagination(start, maxResults, {
      maxResultsCap: SEMANTIC_SCHOLAR_MAX_RESULTS,
      capHint: `the Semantic Scholar search API returns at most ${SEMANTIC_SCHOLAR_MAX_RESULTS} results per page; page through larger result sets with start`,
    });

    this.logger.info(`Searching: ${resolved.query} (offset=${start}, limit=${maxResults})`);
    const body = await this.transport.getJson(
      `${this.baseUrl}/paper/search`,
      this.request(
        {
          query: resolved.query,
          offset: start,
          limit: maxResults,
          fields: SEARCH_FIELDS,
          year: options.year,
          openAccessPdf: options.openAccessOnly ? '' : undefined,
        },
        options,
        'Semantic Scholar search'
      )
    );

    const envelope = parseSearchEnvelope(body);
    const entries = parsePaperList(envelope.data, this.logger);
    return createResultSet({
      entries,
      totalResults: envelope.total,
      startIndex: envelope.offset ?? start,
      itemsPerPage: entries.length,
      query: resolved.query,
    });
  }

  /** Paper with tldr, references and citations; null when unknown. */
  async getById(id: string, options: RequestOptions = {}): Promise<SemanticScholarPaper | null> {
    const paperId = this.validatePaperId(id);
    const body = await this.getJsonOrNull(
      `${this.baseUrl}/paper/${encodePathId(paperId)}`,
      this.request({ fields: DETAIL_FIELDS }, options, 'Semantic Scholar paper lookup')
    );
    if (body === null) {
      return null;
    }
    const [paper] = collectEntries([parseSemanticScholarPaper(body, 0)], this.logger);
    return paper ?? null;
  }

  /**
   * Look up many papers at once. The result lines up with `ids`; ids the API
   * cannot resolve give null.
   */
  async batchGetPapers(
    ids: string[],
    options: RequestOptions = {}
  ): Promise<Array<SemanticScholarPaper | null>> {
    if (ids.length === 0) {
      return [];
    }
    if (ids.length > SEMANTIC_SCHOLAR_MAX_BATCH) {
      throw new ValidationError(
        `batchGetPapers takes at most ${SEMANTIC_SCHOLAR_MAX_BATCH} ids, got ${ids.length}`
      );
    }
    const paperIds = ids.map((id) => this.validatePaperId(id));
    const request = this.request({ fields: SEARCH_FIELDS }, options, 'Semantic Scholar batch');
    const body = await this.transport.getJson(`${this.baseUrl}/paper/batch`, {
      ...request,
      method: 'POST',
      json: { ids: paperIds },
    });
    return parseBatch(body, this.logger);
  }

  async getCitations(paperId: string, options: PageOptions = {}): Promise<PaperRef[]> {
    const id = this.validatePaperId(paperId);
    const { offset, limit } = this.validatePage(options);
    const body = await this.transport.getJson(
      `${this.baseUrl}/paper/${encodePathId(id)}/citations`,
      this.request({ offset, limit, fields: 'paperId,title' }, options, 'Semantic Scholar citations')
    );
    return parseEdges(body, 'citingPaper');
  }

  async getReferences(paperId: string, options: PageOptions = {}): Promise<PaperRef[]> {
    const id = this.validatePaperId(paperId);
    const { offset, limit } = this.validatePage(options);
    const body = await this.transport.getJson(
      `${this.baseUrl}/paper/${encodePathId(id)}/references`,
      this.request({ offset, limit, fields: 'paperId,title' }, options, 'Semantic Scholar references')
    );
    return parseEdges(body, 'citedPaper');
  }

  async searchAuthors(query: string, options: PageOptions = {}): Promise<ScholarAuthor[]> {
    const resolved = resolveQuery(toQueryInput(query));
    const { offset, limit } = this.validatePage(options);
    const body = await this.transport.getJson(
      `${this.baseUrl}/author/search`,
      this.request(
        { query: resolved.query, offset, limit, fields: AUTHOR_SEARCH_FIELDS },
        options,
        'Semantic Scholar author search'
      )
    );
    return parseAuthorList(parseSearchEnvelope(body).data);
  }

  async getAuthor(authorId: string, options: RequestOptions = {}): Promise<ScholarAuthor | null> {
    const id = authorId.trim();
    if (!AUTHOR_ID.test(id)) {
      throw new ValidationError(`Invalid Semantic Scholar author id: ${JSON.stringify(authorId)}`);
    }
    const body = await this.getJsonOrNull(
      `${this.baseUrl}/author/${id}`,
      this.request({ fields: AUTHOR_DETAIL_FIELDS }, options, 'Semantic Scholar author lookup')
    );
    return body === null ? null : parseAuthor(body);
  }

  /** Title suggestions for a partial query. */
  async autocomplete(query: string, options: RequestOptions = {}): Promise<string[]> {
    const resolved = resolveQuery(toQueryInput(query));
    const body = await this.transport.getJson(
      `${this.baseUrl}/paper/autocomplete`,
      this.request({ query: resolved.query }, options, 'Semantic Scholar autocomplete')
    );
    return parseAutocomplete(body);
  }

  async download(
    record: SemanticScholarPaper,
    destDir: string,
    options: DownloadOptions = {}
  ): Promise<string> {
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

export function createSemanticScholarClient(
  config: AppConfig = getConfig(),
  overrides: SemanticScholarClientOptions = {}
): SemanticScholarClient {
  return new SemanticScholarClient({
    ...providerOptionsFromConfig(config, config.semanticScholar),
    apiKey: config.semanticScholar.apiKey,
    ...overrides,
  });
}
