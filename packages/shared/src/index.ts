// ============ Paper Types ============

export type PaperSource = 'arxiv' | 'semantic_scholar';

export interface Author {
  name: string;
  affiliations: string[];
}

export interface PaperLink {
  href: string;
  /** MIME type, e.g. 'application/pdf' */
  type?: string;
  /** Link relation, e.g. 'alternate' or 'related' */
  rel?: string;
  title?: string;
}

/** Lightweight pointer to another paper (citation graph edges) */
export interface PaperRef {
  paperId: string;
  title?: string;
}

export interface OpenAccessPdf {
  url: string;
  status?: string;
}

interface PaperRecordBase {
  /** Provider-native identifier; never empty */
  id: string;
  title: string;
  /** Abstract */
  summary: string;
  authors: Author[];
  published?: Date;
  updated?: Date;
  links: PaperLink[];
  doi?: string;
}

export interface ArxivPaper extends PaperRecordBase {
  source: 'arxiv';
  primaryCategory?: string;
  categories: string[];
  comment?: string;
  journalRef?: string;
}

export interface SemanticScholarPaper extends PaperRecordBase {
  source: 'semantic_scholar';
  url?: string;
  venue?: string;
  year?: number;
  citationCount?: number;
  influentialCitationCount?: number;
  openAccessPdf?: OpenAccessPdf;
  /** External ids keyed by provider, e.g. { DOI, ArXiv, CorpusId } */
  externalIds: Record<string, string>;
  references: PaperRef[];
  citations: PaperRef[];
  tldr?: string;
}

export type PaperRecord = ArxivPaper | SemanticScholarPaper;

// ============ Search Types ============

export type ArxivSortField = 'relevance' | 'lastUpdatedDate' | 'submittedDate';
export type SortOrder = 'ascending' | 'descending';

export interface ResultSet<T extends PaperRecord = PaperRecord> {
  readonly entries: readonly T[];
  readonly totalResults?: number;
  readonly startIndex?: number;
  readonly itemsPerPage?: number;
  /** Query string as sent to the provider */
  readonly query: string;
  readonly sortBy?: ArxivSortField;
  readonly sortOrder?: SortOrder;
}

/**
 * Build an immutable result set. Entries are copied so later changes to the
 * caller's array do not leak in.
 */
export function createResultSet<T extends PaperRecord>(init: {
  entries: T[];
  query: string;
  totalResults?: number;
  startIndex?: number;
  itemsPerPage?: number;
  sortBy?: ArxivSortField;
  sortOrder?: SortOrder;
}): ResultSet<T> {
  return Object.freeze({
    ...init,
    entries: Object.freeze([...init.entries]),
  });
}

// ============ Download Types ============

export interface DownloadedPaper {
  /** Absolute path of the PDF */
  pdfPath: string;
  /** Path relative to the downloads hub, e.g. CS_LG/some_title-2101.00001v2.pdf */
  relativePath: string;
  /** Category folder the PDF lives in */
  category: string;
  /** Parsed JSON sidecar; null when missing or unreadable */
  metadata: PaperRecord | null;
}

export * from './errors';
export * from './categories';
export * from './paper-schema';

export const CLIENT_VERSION = '0.1.0';
