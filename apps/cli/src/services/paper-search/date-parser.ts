/**
 * Date parsing for arXiv submittedDate ranges. All results are UTC.
 */

import { UTCDate } from '@date-fns/utc';
import { isValid, parse, parseISO } from 'date-fns';
import { ValidationError } from '@paperhub/shared';

/** Accepted input formats, tried in order. Values without a zone are read as UTC. */
export const DATE_FORMATS = [
  'yyyy-MM-dd HH:mm',
  'yyyy/MM/dd HH:mm',
  'yyyyMMdd HH:mm',
  'yyyy-MM-dd',
  'yyyy/MM/dd',
  'yyyyMMdd',
  'yyyy-MM',
  'yyyy',
] as const;

const EXPLICIT_ZONE = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

export function parseUtcDate(input: string): Date {
  const value = input.trim();

  // Parsing against a UTCDate keeps the host timezone out of the result.
  for (const format of DATE_FORMATS) {
    const parsed = parse(value, format, new UTCDate(0));
    if (isValid(parsed)) {
      return new Date(parsed.getTime());
    }
  }

  // ISO-8601 timestamps, e.g. 2023-01-01T10:00:00+02:00
  const iso = parseISO(EXPLICIT_ZONE.test(value) ? value : `${value}${value.includes('T') ? '' : 'T00:00'}Z`);
  if (isValid(iso)) {
    return iso;
  }

  throw new ValidationError(`Unrecognized date format: ${input}`);
}

/** Last minute of the period when the input is a bare year or year-month. */
export function expandToPeriodEnd(input: string, parsed: Date): Date {
  const value = input.trim();
  if (/^\d{4}$/.test(value)) {
    return new Date(Date.UTC(parsed.getUTCFullYear(), 11, 31, 23, 59));
  }
  if (/^\d{4}-\d{2}$/.test(value)) {
    // Day 0 of the following month is the last day of this one.
    return new Date(Date.UTC(parsed.getUTCFullYear(), parsed.getUTCMonth() + 1, 0, 23, 59));
  }
  return parsed;
}

/** Compact YYYYMMDDHHMM form used inside submittedDate ranges. */
export function formatArxivTimestamp(date: Date): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes())
  );
}
