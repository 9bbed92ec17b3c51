/**
 * Shared test fixtures: a queue-backed fetch stand-in, a silent logger and
 * small Atom feed builders.
 */

import { vi } from 'vitest';
import type { ArxivPaper, SemanticScholarPaper } from '@paperhub/shared';
import type { Logger } from '../../../apps/cli/src/services/logger';

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: string | undefined;
}

/** Each call consumes the next step: a Response is returned, an Error thrown. */
export function queueFetch(...steps: Array<Response | Error>) {
  const requests: RecordedRequest[] = [];
  const fetch = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    requests.push({
      url: String(input),
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : undefined,
    });
    const step = steps.shift();
    if (step === undefined) {
      throw new Error(`Unexpected request to ${String(input)}`);
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  });
  return { fetch, requests };
}

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

export const noSleep = async (_ms: number): Promise<void> => {};

// ============ Atom ============

export interface AtomEntryInit {
  id?: string;
  title?: string;
  summary?: string;
  published?: string;
  updated?: string;
  authors?: Array<{ name?: string; affiliation?: string }>;
  primaryCategory?: string;
  categories?: string[];
  links?: Array<{ href: string; rel?: string; type?: string; title?: string }>;
  doi?: string;
  comment?: string;
  journalRef?: string;
}

function attrs(values: Record<string, string | undefined>): string {
  return Object.entries(values)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => ` ${key}="${value}"`)
    .join('');
}

export function atomEntry(init: AtomEntryInit): string {
  const parts: string[] = ['<entry>'];
  if (init.id !== undefined) parts.push(`<id>${init.id}</id>`);
  if (init.updated) parts.push(`<updated>${init.updated}</updated>`);
  if (init.published) parts.push(`<published>${init.published}</published>`);
  if (init.title !== undefined) parts.push(`<title>${init.title}</title>`);
  if (init.summary !== undefined) parts.push(`<summary>${init.summary}</summary>`);
  for (const author of init.authors ?? []) {
    parts.push('<author>');
    if (author.name !== undefined) parts.push(`<name>${author.name}</name>`);
    if (author.affiliation) {
      parts.push(
        `<arxiv:affiliation xmlns:arxiv="http://arxiv.org/schemas/atom">${author.affiliation}</arxiv:affiliation>`
      );
    }
    parts.push('</author>');
  }
  if (init.doi) parts.push(`<arxiv:doi xmlns:arxiv="http://arxiv.org/schemas/atom">${init.doi}</arxiv:doi>`);
  if (init.comment) {
    parts.push(`<arxiv:comment xmlns:arxiv="http://arxiv.org/schemas/atom">${init.comment}</arxiv:comment>`);
  }
  if (init.journalRef) {
    parts.push(
      `<arxiv:journal_ref xmlns:arxiv="http://arxiv.org/schemas/atom">${init.journalRef}</arxiv:journal_ref>`
    );
  }
  for (const link of init.links ?? []) {
    parts.push(`<link${attrs(link)}/>`);
  }
  if (init.primaryCategory) {
    parts.push(
      `<arxiv:primary_category xmlns:arxiv="http://arxiv.org/schemas/atom" term="${init.primaryCategory}" scheme="http://arxiv.org/schemas/atom"/>`
    );
  }
  for (const category of init.categories ?? []) {
    parts.push(`<category term="${category}" scheme="http://arxiv.org/schemas/atom"/>`);
  }
  parts.push('</entry>');
  return parts.join('\n');
}

export function atomFeed(
  entries: string[],
  counters: { totalResults?: string; startIndex?: string; itemsPerPage?: string } = {}
): string {
  const counterTags = Object.entries(counters)
    .filter(([, value]) => value !== undefined)
    .map(
      ([name, value]) =>
        `<opensearch:${name} xmlns:opensearch="http://a9.com/-/spec/opensearch/1.1/">${value}</opensearch:${name}>`
    );
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<feed xmlns="http://www.w3.org/2005/Atom">',
    '<title type="html">ArXiv Query: search_query=all:test</title>',
    '<id>http://arxiv.org/api/test</id>',
    '<updated>2024-01-01T00:00:00-05:00</updated>',
    ...counterTags,
    ...entries,
    '</feed>',
  ].join('\n');
}

export function goodEntry(n: number): string {
  return atomEntry({
    id: `http://arxiv.org/abs/2101.0000${n}v1`,
    title: `Paper number ${n}`,
    summary: `Abstract ${n}`,
    published: '2021-01-01T00:00:00Z',
    updated: '2021-01-02T00:00:00Z',
    authors: [{ name: `Author ${n}` }],
    primaryCategory: 'cs.LG',
    categories: ['cs.LG'],
  });
}

// ============ Records ============

export function arxivRecord(overrides: Partial<ArxivPaper> = {}): ArxivPaper {
  return {
    source: 'arxiv',
    id: 'http://arxiv.org/abs/2101.00001v2',
    title: 'Attention Is Not All: A Study',
    summary: 'We study attention.',
    authors: [{ name: 'Ada Lovelace', affiliations: [] }],
    published: new Date('2021-01-01T00:00:00Z'),
    links: [
      { href: 'http://arxiv.org/abs/2101.00001v2', rel: 'alternate', type: 'text/html' },
      { href: 'http://arxiv.org/pdf/2101.00001v2', rel: 'related', type: 'application/pdf', title: 'pdf' },
    ],
    primaryCategory: 'cs.LG',
    categories: ['cs.LG', 'stat.ML'],
    ...overrides,
  };
}

export function semanticScholarRecord(
  overrides: Partial<SemanticScholarPaper> = {}
): SemanticScholarPaper {
  return {
    source: 'semantic_scholar',
    id: '649def34f8be52c8b66281af98ae884c09aef38b',
    title: 'Graph Methods',
    summary: '',
    authors: [],
    links: [],
    venue: 'NeurIPS',
    externalIds: {},
    references: [],
    citations: [],
    ...overrides,
  };
}
