/**
 * JSON decoding for the Semantic Scholar Graph API.
 *
 * Each paper object is checked with zod and mapped onto SemanticScholarPaper.
 * Fields the API reports as null become absent.
 */

import { z } from 'zod';
import { isValid, parseISO } from 'date-fns';
import { ParseError } from '@paperhub/shared';
import type { Author, PaperLink, PaperRef, SemanticScholarPaper } from '@paperhub/shared';
import type { Logger } from '../logger';
import { collectEntries } from './parse-results';
import type { EntryParseResult } from './types';

const refSchema = z.object({
  paperId: z.string().nullish(),
  title: z.string().nullish(),
});

const authorSchema = z.object({
  authorId: z.string().nullish(),
  name: z.string(),
  affiliations: z.array(z.string()).nullish(),
});

const paperSchema = z.object({
  paperId: z.string().min(1),
  title: z.string().nullish(),
  abstract: z.string().nullish(),
  url: z.string().nullish(),
  venue: z.string().nullish(),
  year: z.number().int().nullish(),
  publicationDate: z.string().nullish(),
  citationCount: z.number().int().nullish(),
  influentialCitationCount: z.number().int().nullish(),
  openAccessPdf: z
    .object({ url: z.string().nullish(), status: z.string().nullish() })
    .nullish(),
  // CorpusId comes back as a number
  externalIds: z.record(z.union([z.string(), z.number()])).nullish(),
  authors: z.array(authorSchema).nullish(),
  references: z.array(refSchema).nullish(),
  citations: z.array(refSchema).nullish(),
  tldr: z.object({ text: z.string().nullish() }).nullish(),
});

type RawPaper = z.infer<typeof paperSchema>;

const searchEnvelopeSchema = z.object({
  total: z.number().int().nonnegative().nullish(),
  offset: z.number().int().nonnegative().nullish(),
  data: z.array(z.unknown()).nullish(),
});

const authorDetailSchema = z.object({
  authorId: z.string().min(1),
  name: z.string(),
  url: z.string().nullish(),
  affiliations: z.array(z.string()).nullish(),
  paperCount: z.number().int().nullish(),
  citationCount: z.number().int().nullish(),
  hIndex: z.number().int().nullish(),
  papers: z.array(refSchema).nullish(),
});

const edgeEnvelopeSchema = z.object({
  data: z
    .array(
      z.object({
        citingPaper: refSchema.nullish(),
        citedPaper: refSchema.nullish(),
      })
    )
    .nullish(),
});

const autocompleteSchema = z.object({
  matches: z.array(z.object({ id: z.string().nullish(), title: z.string().nullish() })).nullish(),
});

export interface ScholarAuthor {
  authorId: string;
  name: string;
  url?: string;
  affiliations: string[];
  paperCount?: number;
  citationCount?: number;
  hIndex?: number;
  papers: PaperRef[];
}

export interface SearchEnvelope {
  total?: number;
  offset?: number;
  data: unknown[];
}

function orUndefined<T>(value: T | null | undefined): T | undefined {
  return value === null || value === undefined ? undefined : value;
}

function describeIssues(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid value';
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${location}: ${issue.message}`;
}

function toRefs(refs: RawPaper['references']): PaperRef[] {
  const result: PaperRef[] = [];
  for (const ref of refs ?? []) {
    // Unresolved references have no paperId
    if (!ref.paperId) continue;
    result.push({ paperId: ref.paperId, title: orUndefined(ref.title) });
  }
  return result;
}

function toExternalIds(ids: RawPaper['externalIds']): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(ids ?? {})) {
    result[key] = String(value);
  }
  return result;
}

function mapPaper(raw: RawPaper): SemanticScholarPaper | string {
  let published: Date | undefined;
  if (raw.publicationDate) {
    published = parseISO(raw.publicationDate);
    if (!isValid(published)) {
      return `publicationDate is not a valid date: ${raw.publicationDate}`;
    }
  }

  const authors: Author[] = (raw.authors ?? []).map((author) => ({
    name: author.name,
    affiliations: author.affiliations ?? [],
  }));
  const links: PaperLink[] = raw.url ? [{ href: raw.url, rel: 'alternate', type: 'text/html' }] : [];
  const externalIds = toExternalIds(raw.externalIds);
  const pdfUrl = raw.openAccessPdf?.url;

  return {
    source: 'semantic_scholar',
    id: raw.paperId,
    title: (raw.title ?? '').trim(),
    summary: (raw.abstract ?? '').trim(),
    authors,
    published,
    links,
    doi: externalIds.DOI,
    url: orUndefined(raw.url),
    venue: raw.venue ? raw.venue : undefined,
    year: orUndefined(raw.year),
    citationCount: orUndefined(raw.citationCount),
    influentialCitationCount: orUndefined(raw.influentialCitationCount),
    openAccessPdf: pdfUrl
      ? { url: pdfUrl, status: orUndefined(raw.openAccessPdf?.status) }
      : undefined,
    externalIds,
    references: toRefs(raw.references),
    citations: toRefs(raw.citations),
    tldr: orUndefined(raw.tldr?.text),
  };
}

/** Decode one paper object. Never throws. */
export function parseSemanticScholarPaper(
  value: unknown,
  index: number
): EntryParseResult<SemanticScholarPaper> {
  const parsed = paperSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, index, message: describeIssues(parsed.error) };
  }
  const mapped = mapPaper(parsed.data);
  if (typeof mapped === 'string') {
    return { ok: false, index, message: mapped };
  }
  return { ok: true, record: mapped };
}

export function parsePaperList(items: unknown[], logger: Logger): SemanticScholarPaper[] {
  return collectEntries(
    items.map((item, index) => parseSemanticScholarPaper(item, index)),
    logger
  );
}

export function parseSearchEnvelope(value: unknown): SearchEnvelope {
  const parsed = searchEnvelopeSchema.safeParse(value);
  if (!parsed.success) {
    throw new ParseError(`Unexpected search response: ${describeIssues(parsed.error)}`);
  }
  return {
    total: orUndefined(parsed.data.total),
    offset: orUndefined(parsed.data.offset),
    data: parsed.data.data ?? [],
  };
}

/**
 * Batch responses keep a null in place of every id the API could not
 * resolve; those stay null.
 */
export function parseBatch(value: unknown, logger: Logger): Array<SemanticScholarPaper | null> {
  if (!Array.isArray(value)) {
    throw new ParseError('Unexpected batch response: expected an array');
  }
  const results: EntryParseResult<SemanticScholarPaper>[] = [];
  const slots: Array<number | null> = value.map((item, index) => {
    if (item === null) return null;
    results.push(parseSemanticScholarPaper(item, index));
    return results.length - 1;
  });
  const papers = collectEntries(results, logger);
  return slots.map((slot) => (slot === null ? null : (papers[slot] ?? null)));
}

export function parseAuthor(value: unknown): ScholarAuthor {
  const parsed = authorDetailSchema.safeParse(value);
  if (!parsed.success) {
    throw new ParseError(`Unexpected author response: ${describeIssues(parsed.error)}`);
  }
  const raw = parsed.data;
  return {
    authorId: raw.authorId,
    name: raw.name,
    url: orUndefined(raw.url),
    affiliations: raw.affiliations ?? [],
    paperCount: orUndefined(raw.paperCount),
    citationCount: orUndefined(raw.citationCount),
    hIndex: orUndefined(raw.hIndex),
    papers: toRefs(raw.papers),
  };
}

export function parseAuthorList(items: unknown[]): ScholarAuthor[] {
  return items.map((item) => parseAuthor(item));
}

/** Citation/reference edges; `side` picks citingPaper or citedPaper. */
export function parseEdges(value: unknown, side: 'citingPaper' | 'citedPaper'): PaperRef[] {
  const parsed = edgeEnvelopeSchema.safeParse(value);
  if (!parsed.success) {
    throw new ParseError(`Unexpected ${side} response: ${describeIssues(parsed.error)}`);
  }
  return toRefs(
    (parsed.data.data ?? []).flatMap((edge) => {
      const ref = edge[side];
      return ref ? [ref] : [];
    })
  );
}

export function parseAutocomplete(value: unknown): string[] {
  const parsed = autocompleteSchema.safeParse(value);
  if (!parsed.success) {
    throw new ParseError(`Unexpected autocomplete response: ${describeIssues(parsed.error)}`);
  }
  return (parsed.data.matches ?? [])
    .map((match) => match.title ?? '')
    .filter((title) => title.length > 0);
}
