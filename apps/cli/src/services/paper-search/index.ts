/**
 * Paper Search - arXiv and Semantic Scholar clients, query building and PDF
 * URL resolution. Downloads go through ../downloads.
 */

export * from './types';
export { QueryBuilder, quoteValue } from './query-builder';
export { parseUtcDate, expandToPeriodEnd, formatArxivTimestamp, DATE_FORMATS } from './date-parser';
export { isValidArxivId, stripArxivVersion, extractArxivId, arxivVersion } from './arxiv-ids';
export { toQueryInput, resolveQuery, validatePagination } from './validation';
export type { ResolvedQuery, PaginationLimits } from './validation';
export {
  HttpTransport,
  RequestGate,
  withRetry,
  isTransportError,
  buildUserAgent,
  DEFAULT_RETRY_POLICY,
} from './http';
export type { RetryPolicy, FetchFn, SleepFn, HttpTransportOptions, TransportRequest } from './http';
export { parseArxivFeed, parseArxivEntry } from './arxiv-parser';
export type { ArxivFeed } from './arxiv-parser';
export {
  ArxivClient,
  createArxivClient,
  ARXIV_API_URL,
  ARXIV_MAX_RESULTS,
  ARXIV_MIN_INTERVAL_MS,
} from './arxiv-client';
export type { ArxivQuery } from './arxiv-client';
export { parseSemanticScholarPaper } from './semantic-scholar-parser';
export type { ScholarAuthor } from './semantic-scholar-parser';
export {
  SemanticScholarClient,
  createSemanticScholarClient,
  isValidPaperId,
  SEMANTIC_SCHOLAR_API_URL,
  SEMANTIC_SCHOLAR_MAX_RESULTS,
} from './semantic-scholar-client';
export type {
  SemanticScholarClientOptions,
  SemanticScholarSearchOptions,
  PageOptions,
} from './semantic-scholar-client';
export { resolvePdfUrl, pdfUrlCandidates, normalizePdfHref } from './pdf-url';
export { defaultUserAgent, providerOptionsFromConfig } from './client-config';
