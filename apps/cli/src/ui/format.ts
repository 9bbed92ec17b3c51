/**
 * Plain-text rendering of papers for the terminal front end.
 */

import { getCategoryDescription } from '@paperhub/shared';
import type { Author, DownloadedPaper, PaperRecord } from '@paperhub/shared';

export const TITLE_WIDTH = 50;
const NOT_AVAILABLE = 'N/A';

export interface ResultRow {
  id: string;
  title: string;
  authors: string;
  date: string;
  category: string;
}

export function truncateTitle(title: string, width = TITLE_WIDTH): string {
  return title.length > width ? `${title.slice(0, width)}...` : title;
}

/** First two names, then "et al." */
export function formatAuthors(authors: Author[]): string {
  const names = authors.slice(0, 2).map((author) => author.name).join(', ');
  return authors.length > 2 ? `${names} et al.` : names;
}

export function formatDate(date: Date | undefined): string {
  return date ? date.toISOString().slice(0, 10) : NOT_AVAILABLE;
}

export function formatResultRow(paper: PaperRecord): ResultRow {
  let date = formatDate(paper.published);
  let category: string;
  if (paper.source === 'arxiv') {
    category = paper.primaryCategory ?? NOT_AVAILABLE;
  } else {
    category = paper.venue ?? NOT_AVAILABLE;
    if (!paper.published && paper.year !== undefined) {
      date = String(paper.year);
    }
  }
  return {
    id: paper.id,
    title: truncateTitle(paper.title),
    authors: formatAuthors(paper.authors),
    date,
    category,
  };
}

function renderTable(header: string[], rows: string[][]): string {
  const widths = header.map((cell, column) =>
    Math.max(cell.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  const line = (cells: string[]) =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? 0))
      .join('  ')
      .trimEnd();
  return [line(header), line(widths.map((width) => '-'.repeat(width))), ...rows.map(line)].join('\n');
}

export function formatResultsTable(papers: readonly PaperRecord[]): string {
  if (papers.length === 0) {
    return 'No results.';
  }
  const rows = papers.map((paper, index) => {
    const row = formatResultRow(paper);
    return [String(index + 1), row.title, row.authors, row.date, row.category];
  });
  return renderTable(['#', 'Title', 'Authors', 'Date', 'Category'], rows);
}

export function formatPaperDetails(paper: PaperRecord): string {
  const lines = [
    `Title: ${paper.title || NOT_AVAILABLE}`,
    `ID: ${paper.id}`,
    `Authors: ${paper.authors.map((author) => author.name).join(', ') || NOT_AVAILABLE}`,
    `Published: ${formatDate(paper.published)}`,
  ];

  if (paper.source === 'arxiv') {
    lines.push(`Updated: ${formatDate(paper.updated)}`);
    const primary = paper.primaryCategory;
    const description = primary ? getCategoryDescription(primary) : undefined;
    lines.push(
      `Category: ${primary ? (description ? `${primary} (${description})` : primary) : NOT_AVAILABLE}`
    );
    if (paper.categories.length > 0) lines.push(`Categories: ${paper.categories.join(', ')}`);
    if (paper.comment) lines.push(`Comment: ${paper.comment}`);
    if (paper.journalRef) lines.push(`Journal ref: ${paper.journalRef}`);
  } else {
    lines.push(`Venue: ${paper.venue ?? NOT_AVAILABLE}`);
    lines.push(`Year: ${paper.year ?? NOT_AVAILABLE}`);
    lines.push(`Citations: ${paper.citationCount ?? NOT_AVAILABLE}`);
    if (paper.tldr) lines.push(`TL;DR: ${paper.tldr}`);
  }

  lines.push(`DOI: ${paper.doi ?? NOT_AVAILABLE}`);
  lines.push('', paper.summary || '(no abstract)');
  return lines.join('\n');
}

export function formatDownloadsList(papers: readonly DownloadedPaper[]): string {
  if (papers.length === 0) {
    return 'No downloaded papers.';
  }
  const rows = papers.map((paper) => [
    paper.category,
    paper.metadata ? truncateTitle(paper.metadata.title) : '(no metadata)',
    paper.relativePath,
  ]);
  return renderTable(['Category', 'Title', 'File'], rows);
}
