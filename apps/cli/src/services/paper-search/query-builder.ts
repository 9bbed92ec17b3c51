/**
 * QueryBuilder - fluent builder for arXiv search_query strings
 *
 * Tokens are appended in call order and joined with single spaces by build().
 * Boolean sequences are not validated; a malformed query is sent verbatim and
 * the API decides what it means.
 *
 * Example:
 *   new QueryBuilder().title('graph neural networks').and().category('cs.LG').build()
 *   // => ti:"graph neural networks" AND cat:"cs.LG"
 */

import { ValidationError } from '@paperhub/shared';
import type { ArxivSortField, SortOrder } from '@paperhub/shared';
import { expandToPeriodEnd, formatArxivTimestamp, parseUtcDate } from './date-parser';

/** Wrap a value in double quotes, escaping interior quotes. No other tokenization. */
export function quoteValue(text: string): string {
  return `"${text.replace(/"/g, '\\"')}"`;
}

export class QueryBuilder {
  private readonly parts: string[] = [];
  private sortField?: ArxivSortField;
  private order?: SortOrder;
  private todayUsed = false;
  private dateRangeUsed = false;

  constructor(private readonly now: () => Date = () => new Date()) {}

  get sortBy(): ArxivSortField | undefined {
    return this.sortField;
  }

  get sortOrder(): SortOrder | undefined {
    return this.order;
  }

  private field(prefix: string, value: string): this {
    this.parts.push(`${prefix}:${quoteValue(value)}`);
    return this;
  }

  title(text: string): this {
    return this.field('ti', text);
  }

  author(name: string): this {
    return this.field('au', name);
  }

  abstract(text: string): this {
    return this.field('abs', text);
  }

  comment(text: string): this {
    return this.field('co', text);
  }

  journalRef(text: string): this {
    return this.field('jr', text);
  }

  category(code: string): this {
    return this.field('cat', code);
  }

  reportNumber(value: string): this {
    return this.field('rn', value);
  }

  /** Match any field */
  all(text: string): this {
    return this.field('all', text);
  }

  id(arxivId: string): this {
    return this.field('id', arxivId);
  }

  and(): this {
    this.parts.push('AND');
    return this;
  }

  or(): this {
    this.parts.push('OR');
    return this;
  }

  andNot(): this {
    this.parts.push('ANDNOT');
    return this;
  }

  /** Parenthesized subgroup; a nested builder is built immediately. */
  group(inner: QueryBuilder | string): this {
    const text = typeof inner === 'string' ? inner : inner.build();
    this.parts.push(`(${text})`);
    return this;
  }

  sort(field: ArxivSortField, order: SortOrder): this {
    this.sortField = field;
    this.order = order;
    return this;
  }

  /**
   * Restrict to a submittedDate window. With endInclusive, a bare year or
   * year-month end is widened to the last minute of that period.
   */
  dateRange(start: string, end: string, endInclusive = true): this {
    const startDate = parseUtcDate(start);
    let endDate = parseUtcDate(end);
    if (endInclusive) {
      endDate = expandToPeriodEnd(end, endDate);
    }
    if (startDate.getTime() > endDate.getTime()) {
      throw new ValidationError('start date must be <= end date');
    }
    this.parts.push(
      `submittedDate:[${formatArxivTimestamp(startDate)} TO ${formatArxivTimestamp(endDate)}]`
    );
    this.dateRangeUsed = true;
    return this;
  }

  /** Papers submitted during the current UTC day. */
  today(): this {
    const now = this.now();
    const startOfDay = new Date(
      Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), 0, 0)
    );
    const endOfDay = new Date(
      Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), 23, 59)
    );
    this.parts.push(
      `submittedDate:[${formatArxivTimestamp(startOfDay)} TO ${formatArxivTimestamp(endOfDay)}]`
    );
    this.todayUsed = true;
    return this;
  }

  build(): string {
    if (this.todayUsed && this.dateRangeUsed) {
      throw new ValidationError('Cannot use both today() and dateRange() in the same query');
    }
    return this.parts.join(' ');
  }
}
