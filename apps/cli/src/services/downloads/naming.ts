/**
 * Deterministic on-disk names for downloaded papers:
 *   <hub>/<CATEGORY>/<slug>[-<id>].pdf  (+ .json sidecar)
 */

import type { PaperRecord } from '@paperhub/shared';

export const MAX_SLUG_LENGTH = 80;
export const UNKNOWN_CATEGORY = 'UNKNOWN';

/**
 * ASCII, lowercase, underscores between words. Idempotent; input with no
 * letters or digits gives ''.
 */
export function slugify(text: string, maxLength = MAX_SLUG_LENGTH): string {
  const slug = text
    .normalize('NFKD')
    .replace(/[^\x00-\x7F]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug.slice(0, maxLength).replace(/_+$/, '');
}

function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^[._]+|_+$/g, '');
}

/**
 * Provider id part of the filename: the arXiv /abs/ tail (or last path
 * segment), or the Semantic Scholar paper id.
 */
export function idSuffix(record: PaperRecord): string {
  if (record.source === 'semantic_scholar') {
    return safeSegment(record.id);
  }
  const absTail = record.id.match(/\/abs\/(.+?)\/?$/);
  const raw = absTail ? absTail[1] : (record.id.split('/').filter(Boolean).pop() ?? '');
  return safeSegment(raw.replace(/\//g, '_'));
}

export function pdfFileName(record: PaperRecord): string {
  const stem = [slugify(record.title), idSuffix(record)].filter(Boolean).join('-');
  return `${stem || 'paper'}.pdf`;
}

/** "cs.LG" -> "CS_LG"; "NeurIPS 2023" -> "NEURIPS_2023" */
export function categoryFolder(record: PaperRecord): string {
  const raw =
    record.source === 'arxiv'
      ? (record.primaryCategory ?? record.categories[0] ?? '')
      : (record.venue ?? '');
  const folder = raw
    .trim()
    .replace(/\./g, '_')
    .replace(/[^A-Za-z0-9_-]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .toUpperCase();
  return folder || UNKNOWN_CATEGORY;
}

export function sidecarPath(pdfPath: string): string {
  return pdfPath.replace(/\.pdf$/i, '.json');
}
