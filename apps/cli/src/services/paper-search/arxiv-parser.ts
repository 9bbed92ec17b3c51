/**
 * Atom/OpenSearch feed decoding for the arXiv API.
 *
 * The XML is turned into plain objects by fast-xml-parser; each <entry> is then
 * normalized into an ArxivPaper by parseArxivEntry, which reports problems as
 * a result value instead of throwing.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { parseISO, isValid } from 'date-fns';
import { ParseError } from '@paperhub/shared';
import type { ArxivPaper, Author, PaperLink } from '@paperhub/shared';
import { createLogger, type Logger } from '../logger';
import { collectEntries, isRecord } from './parse-results';
import type { EntryParseResult } from './types';

const ARRAY_TAGS = new Set(['entry', 'author', 'link', 'category', 'affiliation']);

function createFeedParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    removeNSPrefix: true,
    parseTagValue: false,
    isArray: (tagName) => ARRAY_TAGS.has(tagName.replace(/^arxiv:/, '')),
  });
}

export interface ArxivFeed {
  entries: ArxivPaper[];
  totalResults?: number;
  startIndex?: number;
  itemsPerPage?: number;
}

class EntryShapeError extends Error {}

// ============ Node helpers ============

/** Text content of an element; elements with attributes carry it in #text. */
function textOf(node: unknown): string | undefined {
  if (typeof node === 'string') return node;
  if (typeof node === 'number' || typeof node === 'boolean') return String(node);
  if (isRecord(node)) {
    const text = node['#text'];
    if (typeof text === 'string') return text;
    if (typeof text === 'number') return String(text);
  }
  return undefined;
}

function attributeOf(node: unknown, name: string): string | undefined {
  if (!isRecord(node)) return undefined;
  const value = node[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
}

function asList(node: unknown): unknown[] {
  if (node === undefined || node === null) return [];
  return Array.isArray(node) ? node : [node];
}

function optionalText(node: unknown): string | undefined {
  const text = textOf(node)?.trim();
  return text ? text : undefined;
}

function parseFeedDate(node: unknown, field: string): Date | undefined {
  const text = optionalText(node);
  if (text === undefined) return undefined;
  const date = parseISO(text);
  if (!isValid(date)) {
    throw new EntryShapeError(`${field} is not a valid timestamp: ${text}`);
  }
  return date;
}

// ============ Entry ============

function parseAuthors(node: unknown): Author[] {
  return asList(node).map((author, i) => {
    const name = isRecord(author) ? optionalText(author.name) : undefined;
    if (!name) {
      throw new EntryShapeError(`author[${i}] has no name`);
    }
    const affiliations = isRecord(author)
      ? asList(author.affiliation)
          .map((affiliation) => optionalText(affiliation))
          .filter((value): value is string => value !== undefined)
      : [];
    return { name, affiliations };
  });
}

function parseLinks(node: unknown): PaperLink[] {
  return asList(node).map((link, i) => {
    const href = attributeOf(link, 'href');
    if (!href) {
      throw new EntryShapeError(`link[${i}] has no href`);
    }
    const parsed: PaperLink = { href };
    const type = attributeOf(link, 'type');
    const rel = attributeOf(link, 'rel');
    const title = attributeOf(link, 'title');
    if (type) parsed.type = type;
    if (rel) parsed.rel = rel;
    if (title) parsed.title = title;
    return parsed;
  });
}

function normalizeEntry(entry: unknown): ArxivPaper {
  if (!isRecord(entry)) {
    throw new EntryShapeError('entry is not an element');
  }
  const id = optionalText(entry.id);
  if (!id) {
    throw new EntryShapeError('entry has no id');
  }

  const categories = asList(entry.category)
    .map((category) => attributeOf(category, 'term'))
    .filter((term): term is string => Boolean(term));

  return {
    source: 'arxiv',
    id,
    title: (textOf(entry.title) ?? '').replace(/\s+/g, ' ').trim(),
    summary: (textOf(entry.summary) ?? '').trim(),
    authors: parseAuthors(entry.author),
    published: parseFeedDate(entry.published, 'published'),
    updated: parseFeedDate(entry.updated, 'updated'),
    links: parseLinks(entry.link),
    doi: optionalText(entry.doi),
    primaryCategory: attributeOf(entry.primary_category, 'term'),
    categories,
    comment: optionalText(entry.comment),
    journalRef: optionalText(entry.journal_ref),
  };
}

/** Normalize one decoded <entry>. Never throws. */
export function parseArxivEntry(entry: unknown, index: number): EntryParseResult<ArxivPaper> {
  try {
    return { ok: true, record: normalizeEntry(entry) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, index, message };
  }
}

// ============ Feed ============

function parseCounter(node: unknown, name: string, logger: Logger): number | undefined {
  if (node === undefined) return undefined;
  const text = textOf(node)?.trim() ?? '';
  if (!/^\d+$/.test(text)) {
    logger.warn(`Ignoring malformed opensearch:${name} value: ${JSON.stringify(text)}`);
    return undefined;
  }
  return Number.parseInt(text, 10);
}

/**
 * Decode a whole feed. Throws ParseError when the document is not XML, has no
 * <feed>, or any entry is malformed.
 */
export function parseArxivFeed(xml: string, logger: Logger = createLogger('ArxivParser')): ArxivFeed {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new ParseError(
      `Response is not valid XML (line ${validation.err.line}): ${validation.err.msg}`
    );
  }

  let document: unknown;
  try {
    document = createFeedParser().parse(xml);
  } catch (error) {
    throw new ParseError(
      `Response is not valid XML: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const feed = isRecord(document) ? document.feed : undefined;
  if (!isRecord(feed)) {
    throw new ParseError('Response has no <feed> element');
  }

  const results = asList(feed.entry).map((entry, index) => parseArxivEntry(entry, index));

  return {
    entries: collectEntries(results, logger),
    totalResults: parseCounter(feed.totalResults, 'totalResults', logger),
    startIndex: parseCounter(feed.startIndex, 'startIndex', logger),
    itemsPerPage: parseCounter(feed.itemsPerPage, 'itemsPerPage', logger),
  };
}
