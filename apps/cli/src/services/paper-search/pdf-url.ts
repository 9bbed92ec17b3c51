/**
 * PDF URL resolution. The URL is derived from a record on demand, never stored.
 *
 * Candidates, in order:
 *   1. Semantic Scholar openAccessPdf.url
 *   2. links typed application/pdf
 *   3. links with rel="related"
 *   4. an /abs/<tail> id, rewritten to https://arxiv.org/pdf/<tail>.pdf
 *   5. Semantic Scholar externalIds.ArXiv
 * Anything that is not an http(s) URL is skipped.
 */

import type { PaperLink, PaperRecord } from '@paperhub/shared';

const PDF_MIME = 'application/pdf';
const ARXIV_PDF_BASE = 'https://arxiv.org/pdf/';

function parseHttpUrl(href: string): URL | undefined {
  let url: URL;
  try {
    url = new URL(href.trim());
  } catch {
    return undefined;
  }
  return url.protocol === 'http:' || url.protocol === 'https:' ? url : undefined;
}

function looksLikeArxivPdfPath(url: URL): boolean {
  if (url.pathname.includes('/pdf/')) return true;
  const lastSegment = url.pathname.split('/').filter(Boolean).pop() ?? '';
  return (
    /^\d{4}/.test(lastSegment) ||
    lastSegment.startsWith('arXiv') ||
    lastSegment.startsWith('v') ||
    /\d{4}\.\d{4,5}/.test(url.href)
  );
}

/** Append ".pdf" to arXiv-shaped paths that lack it; reject non-http(s). */
export function normalizePdfHref(href: string): string | undefined {
  const url = parseHttpUrl(href);
  if (!url) return undefined;
  if (!url.pathname.toLowerCase().endsWith('.pdf') && looksLikeArxivPdfPath(url)) {
    url.pathname = `${url.pathname.replace(/\/+$/, '')}.pdf`;
  }
  return url.toString();
}

function fromLinks(links: PaperLink[], matches: (link: PaperLink) => boolean): string[] {
  return links.filter(matches).map((link) => link.href);
}

function fromAbsId(id: string): string | undefined {
  const match = id.match(/\/abs\/(.+?)\/?$/);
  return match ? `${ARXIV_PDF_BASE}${match[1]}.pdf` : undefined;
}

export function pdfUrlCandidates(record: PaperRecord): string[] {
  const candidates: Array<string | undefined> = [];

  if (record.source === 'semantic_scholar') {
    candidates.push(record.openAccessPdf?.url);
  }
  const linkCandidates = [
    ...fromLinks(record.links, (link) => link.type?.toLowerCase() === PDF_MIME),
    ...fromLinks(record.links, (link) => link.rel === 'related'),
  ];
  candidates.push(...linkCandidates.map(normalizePdfHref));
  candidates.push(fromAbsId(record.id));
  if (record.source === 'semantic_scholar' && record.externalIds.ArXiv) {
    candidates.push(`${ARXIV_PDF_BASE}${record.externalIds.ArXiv}.pdf`);
  }

  return candidates.filter((candidate): candidate is string => {
    return candidate !== undefined && parseHttpUrl(candidate) !== undefined;
  });
}

/** First usable PDF URL for a record, or undefined. */
export function resolvePdfUrl(record: PaperRecord): string | undefined {
  return pdfUrlCandidates(record)[0];
}
