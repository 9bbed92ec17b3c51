/**
 * paperhub command line
 * Usage:
 *  paperhub search <terms> [--title=..] [--author=..] [--abstract=..] [--category=cs.LG]
 *                          [--from=2023-01 --to=2023-06 | --today]
 *                          [--sort=submittedDate] [--order=descending] [--max=10] [--start=0]
 *  paperhub s2-search <terms> [--year=2020-2023] [--open-access] [--max=10] [--start=0]
 *  paperhub get <arxiv id | semantic scholar id>
 *  paperhub download <id> [--dest=./data] [--overwrite]
 *  paperhub downloads [--dest=./data]
 *  paperhub categories
 */

import fs from 'fs';
import { ARXIV_CATEGORIES, PaperHubError, ValidationError } from '@paperhub/shared';
import type { ArxivSortField, DownloadedPaper, SortOrder } from '@paperhub/shared';
import { listDownloads } from './services/downloads';
import { extractArxivId, isValidArxivId } from './services/paper-search/arxiv-ids';
import type { ArxivClient } from './services/paper-search/arxiv-client';
import { QueryBuilder } from './services/paper-search/query-builder';
import {
  isValidPaperId,
  type SemanticScholarClient,
} from './services/paper-search/semantic-scholar-client';
import {
  formatDownloadsList,
  formatPaperDetails,
  formatResultsTable,
} from './ui/format';

export const USAGE = `Usage:
  paperhub search <terms> [--title=] [--author=] [--abstract=] [--category=] [--from= --to= | --today] [--sort=] [--order=] [--max=] [--start=]
  paperhub s2-search <terms> [--year=] [--open-access] [--max=] [--start=]
  paperhub get <id>
  paperhub download <id> [--dest=] [--overwrite]
  paperhub downloads [--dest=]
  paperhub categories`;

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  flags: Map<string, string | true>;
}

export interface CliDeps {
  arxiv: Pick<ArxivClient, 'search' | 'getById' | 'download'>;
  semanticScholar: Pick<SemanticScholarClient, 'search' | 'getById' | 'download'>;
  downloadsDir: string;
  write: (text: string) => void;
  listDownloads?: (hubDir: string) => Promise<DownloadedPaper[]>;
}

/** "--max=5" -> max: "5"; "--today" -> today: true */
export function parseCliArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();
  for (const arg of argv) {
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      if (eq === -1) {
        flags.set(arg.slice(2), true);
      } else {
        flags.set(arg.slice(2, eq), arg.slice(eq + 1));
      }
    } else {
      positionals.push(arg);
    }
  }
  const [command, ...rest] = positionals;
  return { command, positionals: rest, flags };
}

function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function intFlag(args: ParsedArgs, name: string): number | undefined {
  const value = stringFlag(args, name);
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`--${name} must be a non-negative integer, got ${JSON.stringify(value)}`);
  }
  return Number.parseInt(value, 10);
}

const SORT_FIELDS: readonly ArxivSortField[] = ['relevance', 'lastUpdatedDate', 'submittedDate'];
const SORT_ORDERS: readonly SortOrder[] = ['ascending', 'descending'];

function sortField(value: string): ArxivSortField {
  const field = SORT_FIELDS.find((candidate) => candidate === value);
  if (!field) {
    throw new ValidationError(`--sort must be one of ${SORT_FIELDS.join(', ')}`);
  }
  return field;
}

function sortOrder(value: string): SortOrder {
  const order = SORT_ORDERS.find((candidate) => candidate === value);
  if (!order) {
    throw new ValidationError(`--order must be one of ${SORT_ORDERS.join(', ')}`);
  }
  return order;
}

/** Free-text terms plus field flags, ANDed together in that order. */
export function buildSearchQuery(args: ParsedArgs, now?: () => Date): QueryBuilder {
  const builder = new QueryBuilder(now);
  const clauses: Array<(b: QueryBuilder) => void> = [];

  const terms = args.positionals.join(' ').trim();
  if (terms) clauses.push((b) => b.all(terms));

  const title = stringFlag(args, 'title');
  const author = stringFlag(args, 'author');
  const abstract = stringFlag(args, 'abstract');
  const category = stringFlag(args, 'category');
  if (title) clauses.push((b) => b.title(title));
  if (author) clauses.push((b) => b.author(author));
  if (abstract) clauses.push((b) => b.abstract(abstract));
  if (category) clauses.push((b) => b.category(category));

  const from = stringFlag(args, 'from');
  const to = stringFlag(args, 'to');
  if (from !== undefined || to !== undefined) {
    if (from === undefined || to === undefined) {
      throw new ValidationError('--from and --to must be given together');
    }
    clauses.push((b) => b.dateRange(from, to));
  }
  if (args.flags.get('today') === true) {
    clauses.push((b) => b.today());
  }

  clauses.forEach((apply, index) => {
    if (index > 0) builder.and();
    apply(builder);
  });

  const sort = stringFlag(args, 'sort');
  if (sort) {
    builder.sort(sortField(sort), sortOrder(stringFlag(args, 'order') ?? 'descending'));
  }
  return builder;
}

type Provider = 'arxiv' | 'semantic_scholar';

export function detectProvider(id: string): Provider {
  const arxivId = extractArxivId(id.trim());
  if (arxivId && isValidArxivId(arxivId)) return 'arxiv';
  if (isValidPaperId(id)) return 'semantic_scholar';
  throw new ValidationError(`Not an arXiv or Semantic Scholar id: ${JSON.stringify(id)}`);
}

function requireId(args: ParsedArgs): string {
  const [id] = args.positionals;
  if (!id) {
    throw new ValidationError('An id is required');
  }
  return id;
}

async function runCommand(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const { write } = deps;

  switch (args.command) {
    case 'search': {
      const results = await deps.arxiv.search(buildSearchQuery(args), {
        start: intFlag(args, 'start'),
        maxResults: intFlag(args, 'max'),
      });
      write(formatResultsTable(results.entries));
      if (results.totalResults !== undefined) {
        write(`\n${results.entries.length} of ${results.totalResults} results`);
      }
      return 0;
    }

    case 's2-search': {
      const results = await deps.semanticScholar.search(args.positionals.join(' '), {
        start: intFlag(args, 'start'),
        maxResults: intFlag(args, 'max'),
        year: stringFlag(args, 'year'),
        openAccessOnly: args.flags.get('open-access') === true,
      });
      write(formatResultsTable(results.entries));
      return 0;
    }

    case 'get': {
      const id = requireId(args);
      const paper =
        detectProvider(id) === 'arxiv'
          ? await deps.arxiv.getById(id)
          : await deps.semanticScholar.getById(id);
      if (!paper) {
        write(`Paper not found: ${id}`);
        return 1;
      }
      write(formatPaperDetails(paper));
      return 0;
    }

    case 'download': {
      const id = requireId(args);
      const dest = stringFlag(args, 'dest') ?? deps.downloadsDir;
      const overwrite = args.flags.get('overwrite') === true;
      // The hub is created here; the pipeline itself only creates category folders.
      fs.mkdirSync(dest, { recursive: true });

      let savedTo: string | undefined;
      if (detectProvider(id) === 'arxiv') {
        const paper = await deps.arxiv.getById(id);
        if (paper) savedTo = await deps.arxiv.download(paper, dest, { overwrite });
      } else {
        const paper = await deps.semanticScholar.getById(id);
        if (paper) savedTo = await deps.semanticScholar.download(paper, dest, { overwrite });
      }
      if (!savedTo) {
        write(`Paper not found: ${id}`);
        return 1;
      }
      write(`Saved to ${savedTo}`);
      return 0;
    }

    case 'downloads': {
      const dest = stringFlag(args, 'dest') ?? deps.downloadsDir;
      const list = deps.listDownloads ?? listDownloads;
      write(formatDownloadsList(await list(dest)));
      return 0;
    }

    case 'categories': {
      for (const [code, description] of Object.entries(ARXIV_CATEGORIES)) {
        write(`${code.padEnd(10)} ${description}`);
      }
      return 0;
    }

    case undefined:
    case 'help':
      write(USAGE);
      return 0;

    default:
      write(`Unknown command: ${args.command}\n\n${USAGE}`);
      return 2;
  }
}

/**
 * Run one command. Library errors are printed and mapped to exit code 1;
 * anything else propagates.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  try {
    return await runCommand(parseCliArgs(argv), deps);
  } catch (error) {
    if (error instanceof PaperHubError) {
      deps.write(`${error.name}: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
