import { describe, it, expect } from 'vitest';
import {
  normalizePdfHref,
  pdfUrlCandidates,
  resolvePdfUrl,
} from '../../apps/cli/src/services/paper-search/pdf-url';
import { arxivRecord, semanticScholarRecord } from './helpers/fixtures';

describe('resolvePdfUrl', () => {
  it('appends .pdf to a typed PDF link without an extension', () => {
    const record = arxivRecord({
      links: [{ href: 'http://arxiv.org/pdf/2101.00001v2', type: 'application/pdf' }],
    });
    expect(resolvePdfUrl(record)).toBe('http://arxiv.org/pdf/2101.00001v2.pdf');
  });

  it('leaves hrefs that already end in .pdf alone', () => {
    const record = arxivRecord({
      links: [{ href: 'https://example.org/files/paper.pdf', type: 'application/pdf' }],
    });
    expect(resolvePdfUrl(record)).toBe('https://example.org/files/paper.pdf');
  });

  it('does not add a suffix to paths that do not look like arXiv ids', () => {
    expect(normalizePdfHref('https://example.org/download?id=7')).toBe('https://example.org/download?id=7');
  });

  it('prefers a typed PDF link over a related link', () => {
    const record = arxivRecord({
      links: [
        { href: 'https://mirror.example.org/pdf/2101.00001v2', rel: 'related' },
        { href: 'https://arxiv.org/pdf/2101.00001v2', type: 'application/pdf', rel: 'alternate' },
      ],
    });
    expect(resolvePdfUrl(record)).toBe('https://arxiv.org/pdf/2101.00001v2.pdf');
  });

  it('falls back to a related link', () => {
    const record = arxivRecord({
      links: [{ href: 'https://export.arxiv.org/abs/arXiv2101', rel: 'related' }],
    });
    expect(resolvePdfUrl(record)).toBe('https://export.arxiv.org/abs/arXiv2101.pdf');
  });

  it('derives the URL from an /abs/ id when there are no links', () => {
    const record = arxivRecord({ id: 'http://arxiv.org/abs/2101.00001v2', links: [] });
    expect(resolvePdfUrl(record)).toBe('https://arxiv.org/pdf/2101.00001v2.pdf');
  });

  it('skips an ftp link and falls back to the id', () => {
    const record = arxivRecord({
      id: 'http://arxiv.org/abs/2101.00001v2',
      links: [{ href: 'ftp://arxiv.org/pdf/2101.00001v2', type: 'application/pdf' }],
    });
    expect(resolvePdfUrl(record)).toBe('https://arxiv.org/pdf/2101.00001v2.pdf');
  });

  it('returns undefined with no links and an unparseable id', () => {
    expect(resolvePdfUrl(arxivRecord({ id: 'not-a-url', links: [] }))).toBeUndefined();
  });

  it('keeps old-style ids intact', () => {
    const record = arxivRecord({ id: 'http://arxiv.org/abs/hep-th/9901001v1', links: [] });
    expect(resolvePdfUrl(record)).toBe('https://arxiv.org/pdf/hep-th/9901001v1.pdf');
  });

  describe('Semantic Scholar records', () => {
    it('uses the open-access PDF first', () => {
      const record = semanticScholarRecord({
        openAccessPdf: { url: 'https://example.org/oa/paper.pdf', status: 'GREEN' },
        externalIds: { ArXiv: '2101.00001' },
      });
      expect(pdfUrlCandidates(record)).toEqual([
        'https://example.org/oa/paper.pdf',
        'https://arxiv.org/pdf/2101.00001.pdf',
      ]);
    });

    it('falls back to the arXiv external id', () => {
      const record = semanticScholarRecord({ externalIds: { ArXiv: '2101.00001' } });
      expect(resolvePdfUrl(record)).toBe('https://arxiv.org/pdf/2101.00001.pdf');
    });

    it('has no URL without open access or an arXiv id', () => {
      expect(resolvePdfUrl(semanticScholarRecord({ externalIds: { DOI: '10.1000/x' } }))).toBeUndefined();
    });
  });
});
