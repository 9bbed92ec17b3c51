import { ParseError, type EntryParseFailure } from '@paperhub/shared';
import type { Logger } from '../logger';
import type { EntryParseResult } from './types';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Unwrap per-entry results. One bad entry fails the whole batch, even when
 * the others decoded fine; each failure is logged first.
 */
export function collectEntries<T>(
  results: EntryParseResult<T>[],
  logger: Logger
): T[] {
  const records: T[] = [];
  const failures: EntryParseFailure[] = [];

  for (const result of results) {
    if (result.ok) {
      records.push(result.record);
    } else {
      logger.warn(`Entry ${result.index} failed to parse: ${result.message}`);
      failures.push({ index: result.index, message: result.message });
    }
  }

  if (failures.length > 0) {
    throw ParseError.fromFailures(failures, results.length);
  }
  return records;
}
