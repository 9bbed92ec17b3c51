/**
 * ArxivClient Tests
 * All requests go to a queued fetch stand-in.
 */

import { describe, it, expect } from 'vitest';
import { ApiError, ParseError, ValidationError } from '@paperhub/shared';
import { ArxivClient } from '../../apps/cli/src/services/paper-search/arxiv-client';
import { parseArxivFeed } from '../../apps/cli/src/services/paper-search/arxiv-parser';
import { QueryBuilder } from '../../apps/cli/src/services/paper-search/query-builder';
import {
  atomEntry,
  atomFeed,
  createTestLogger,
  goodEntry,
  noSleep,
  queueFetch,
} from './helpers/fixtures';

function createClient(...responses: Array<Response | Error>) {
  const { fetch, requests } = queueFetch(...responses);
  const logger = createTestLogger();
  const client = new ArxivClient({
    fetch,
    sleep: noSleep,
    minIntervalMs: 0,
    userAgent: 'PaperHub-test/0.1.0',
    logger,
  });
  return { client, fetch, requests, logger };
}

describe('ArxivClient', () => {
  describe('search validation', () => {
    it('rejects an empty query without making a request', async () => {
      const { client, fetch } = createClient();
      await expect(client.search('   ')).rejects.toThrow('Query must be a non-empty string');
      await expect(client.search(new QueryBuilder())).rejects.toThrow(
        'Query builder produced an empty query'
      );
      expect(fetch).not.toHaveBeenCalled();
    });

    it('rejects a negative start', async () => {
      const { client, fetch } = createClient();
      await expect(client.search('all:x', { start: -1 })).rejects.toThrow(
        'start must be a non-negative integer, got -1'
      );
      expect(fetch).not.toHaveBeenCalled();
    });

    it('rejects maxResults above the per-call cap with a paging hint', async () => {
      const { client, fetch } = createClient();
      const error = await client.search('all:x', { maxResults: 3000 }).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toHaveProperty(
        'message',
        'maxResults must be <= 2000, got 3000; page through larger result sets with start in slices of at most 2000'
      );
      expect(fetch).not.toHaveBeenCalled();
    });

    it('rejects a non-positive timeout', async () => {
      const { client } = createClient();
      await expect(client.search('all:x', { timeoutMs: 0 })).rejects.toThrow(
        'timeoutMs must be a positive number, got 0'
      );
    });
  });

  describe('search', () => {
    it('sends the query, paging and user agent', async () => {
      const { client, requests } = createClient(new Response(atomFeed([goodEntry(1)])));
      await client.search('all:electron', { start: 20, maxResults: 5 });

      const url = new URL(requests[0]?.url ?? '');
      expect(`${url.origin}${url.pathname}`).toBe('https://export.arxiv.org/api/query');
      expect(url.searchParams.get('search_query')).toBe('all:electron');
      expect(url.searchParams.get('start')).toBe('20');
      expect(url.searchParams.get('max_results')).toBe('5');
      expect(url.searchParams.has('sortBy')).toBe(false);
      expect(requests[0]?.headers.get('user-agent')).toBe('PaperHub-test/0.1.0');
    });

    it('sends the sort settings of a builder', async () => {
      const { client, requests } = createClient(new Response(atomFeed([])));
      const query = new QueryBuilder().category('cs.LG').sort('submittedDate', 'descending');
      const result = await client.search(query);

      const url = new URL(requests[0]?.url ?? '');
      expect(url.searchParams.get('search_query')).toBe('cat:"cs.LG"');
      expect(url.searchParams.get('sortBy')).toBe('submittedDate');
      expect(url.searchParams.get('sortOrder')).toBe('descending');
      expect(url.searchParams.get('max_results')).toBe('10');
      expect(result.sortBy).toBe('submittedDate');
      expect(result.query).toBe('cat:"cs.LG"');
    });

    it('returns a frozen result set with the feed counters', async () => {
      const { client } = createClient(
        new Response(
          atomFeed([goodEntry(1), goodEntry(2)], { totalResults: '42', startIndex: '0', itemsPerPage: '2' })
        )
      );
      const result = await client.search('all:paper');

      expect(result.entries.map((paper) => paper.id)).toEqual([
        'http://arxiv.org/abs/2101.00001v1',
        'http://arxiv.org/abs/2101.00002v1',
      ]);
      expect(result.totalResults).toBe(42);
      expect(result.startIndex).toBe(0);
      expect(result.itemsPerPage).toBe(2);
      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.entries)).toBe(true);
    });

    it('fails the whole page when one entry is malformed', async () => {
      const feed = atomFeed([goodEntry(1), goodEntry(2), atomEntry({ title: 'Broken' }), goodEntry(3)]);
      const { client, logger } = createClient(new Response(feed));

      const error = await client.search('all:paper').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ParseError);
      if (!(error instanceof ParseError)) return;
      expect(error.message).toBe('1 of 4 entries failed to parse (first at index 2): entry has no id');
      expect(error.failureCount).toBe(1);
      expect(error.totalCount).toBe(4);
      expect(logger.warn).toHaveBeenCalledWith('Entry 2 failed to parse: entry has no id');
    });

    it('surfaces HTTP errors without retrying', async () => {
      const { client, fetch } = createClient(new Response('Service Unavailable', { status: 503 }));
      await expect(client.search('all:x')).rejects.toBeInstanceOf(ApiError);
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('waits out the minimum interval between consecutive requests', async () => {
      let clock = 0;
      const sleeps: number[] = [];
      const { fetch } = queueFetch(new Response(atomFeed([])), new Response(atomFeed([])));
      const client = new ArxivClient({
        fetch,
        logger: createTestLogger(),
        now: () => clock,
        sleep: async (ms) => {
          sleeps.push(ms);
          clock += ms;
        },
      });

      await client.search('all:a');
      await client.search('all:b');
      expect(sleeps).toEqual([3000]);
    });
  });

  describe('getById', () => {
    it('looks up a bare id with id_list', async () => {
      const { client, requests } = createClient(new Response(atomFeed([goodEntry(1)])));
      const paper = await client.getById('2101.00001v1');

      expect(paper?.title).toBe('Paper number 1');
      expect(new URL(requests[0]?.url ?? '').searchParams.get('id_list')).toBe('2101.00001v1');
      expect(new URL(requests[0]?.url ?? '').searchParams.has('search_query')).toBe(false);
    });

    it('accepts abs and pdf URLs', async () => {
      const { client, requests } = createClient(
        new Response(atomFeed([goodEntry(1)])),
        new Response(atomFeed([goodEntry(1)]))
      );
      await client.getById('https://arxiv.org/abs/hep-th/9901001v1');
      await client.getById('https://arxiv.org/pdf/2101.00001.pdf');
      expect(new URL(requests[0]?.url ?? '').searchParams.get('id_list')).toBe('hep-th/9901001v1');
      expect(new URL(requests[1]?.url ?? '').searchParams.get('id_list')).toBe('2101.00001');
    });

    it('returns null when the feed is empty', async () => {
      const { client } = createClient(new Response(atomFeed([], { totalResults: '0' })));
      await expect(client.getById('2101.99999')).resolves.toBeNull();
    });

    it('rejects malformed ids before any request', async () => {
      const { client, fetch } = createClient();
      await expect(client.getById('not an id')).rejects.toThrow('Invalid arXiv id format: "not an id"');
      expect(fetch).not.toHaveBeenCalled();
    });
  });
});

describe('parseArxivFeed', () => {
  const logger = createTestLogger();

  it('maps every entry field', () => {
    const feed = parseArxivFeed(
      atomFeed([
        atomEntry({
          id: 'http://arxiv.org/abs/2101.00001v2',
          title: 'A   Title\n  Split Over Lines',
          summary: '\n  The abstract.  \n',
          published: '2021-01-01T10:00:00Z',
          updated: '2021-02-01T10:00:00Z',
          authors: [{ name: 'Ada Lovelace', affiliation: 'Analytical Engines Ltd' }, { name: 'Alan Turing' }],
          doi: '10.1000/xyz',
          comment: '12 pages',
          journalRef: 'J. Test 1 (2021)',
          links: [
            { href: 'http://arxiv.org/abs/2101.00001v2', rel: 'alternate', type: 'text/html' },
            { href: 'http://arxiv.org/pdf/2101.00001v2', rel: 'related', type: 'application/pdf', title: 'pdf' },
          ],
          primaryCategory: 'cs.LG',
          categories: ['cs.LG', 'stat.ML'],
        }),
      ]),
      logger
    );

    expect(feed.entries).toHaveLength(1);
    const [paper] = feed.entries;
    expect(paper).toEqual({
      source: 'arxiv',
      id: 'http://arxiv.org/abs/2101.00001v2',
      title: 'A Title Split Over Lines',
      summary: 'The abstract.',
      authors: [
        { name: 'Ada Lovelace', affiliations: ['Analytical Engines Ltd'] },
        { name: 'Alan Turing', affiliations: [] },
      ],
      published: new Date('2021-01-01T10:00:00Z'),
      updated: new Date('2021-02-01T10:00:00Z'),
      links: [
        { href: 'http://arxiv.org/abs/2101.00001v2', rel: 'alternate', type: 'text/html' },
        { href: 'http://arxiv.org/pdf/2101.00001v2', rel: 'related', type: 'application/pdf', title: 'pdf' },
      ],
      doi: '10.1000/xyz',
      primaryCategory: 'cs.LG',
      categories: ['cs.LG', 'stat.ML'],
      comment: '12 pages',
      journalRef: 'J. Test 1 (2021)',
    });
  });

  it('reports an invalid timestamp as an entry failure', () => {
    const xml = atomFeed([atomEntry({ id: 'http://arxiv.org/abs/2101.00001v1', published: 'not-a-date' })]);
    expect(() => parseArxivFeed(xml, logger)).toThrow(
      '1 of 1 entries failed to parse (first at index 0): published is not a valid timestamp: not-a-date'
    );
  });

  it('reports an author without a name', () => {
    const xml = atomFeed([atomEntry({ id: 'http://arxiv.org/abs/2101.00001v1', authors: [{ affiliation: 'Lab' }] })]);
    expect(() => parseArxivFeed(xml, logger)).toThrow('author[0] has no name');
  });

  it('drops a malformed counter with a warning', () => {
    const warnLogger = createTestLogger();
    const feed = parseArxivFeed(atomFeed([], { totalResults: 'many' }), warnLogger);
    expect(feed.totalResults).toBeUndefined();
    expect(warnLogger.warn).toHaveBeenCalledWith('Ignoring malformed opensearch:totalResults value: "many"');
  });

  it('rejects documents that are not XML', () => {
    expect(() => parseArxivFeed('<feed><entry>', logger)).toThrow(/^Response is not valid XML/);
  });

  it('rejects XML without a feed element', () => {
    expect(() => parseArxivFeed('<html><body/></html>', logger)).toThrow('Response has no <feed> element');
  });
});
