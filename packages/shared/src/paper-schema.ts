import { z } from 'zod';
import type { PaperRecord } from './index';

// ============ Sidecar Schemas ============
// Shapes of PaperRecord after a JSON round trip (dates become ISO strings).

const authorSchema = z.object({
  name: z.string(),
  affiliations: z.array(z.string()).default([]),
});

const linkSchema = z.object({
  href: z.string(),
  type: z.string().optional(),
  rel: z.string().optional(),
  title: z.string().optional(),
});

const paperRefSchema = z.object({
  paperId: z.string(),
  title: z.string().optional(),
});

const baseShape = {
  id: z.string().min(1),
  title: z.string().default(''),
  summary: z.string().default(''),
  authors: z.array(authorSchema).default([]),
  published: z.coerce.date().optional(),
  updated: z.coerce.date().optional(),
  links: z.array(linkSchema).default([]),
  doi: z.string().optional(),
};

const arxivPaperSchema = z.object({
  ...baseShape,
  source: z.literal('arxiv'),
  primaryCategory: z.string().optional(),
  categories: z.array(z.string()).default([]),
  comment: z.string().optional(),
  journalRef: z.string().optional(),
});

const semanticScholarPaperSchema = z.object({
  ...baseShape,
  source: z.literal('semantic_scholar'),
  url: z.string().optional(),
  venue: z.string().optional(),
  year: z.number().int().optional(),
  citationCount: z.number().int().optional(),
  influentialCitationCount: z.number().int().optional(),
  openAccessPdf: z.object({ url: z.string(), status: z.string().optional() }).optional(),
  externalIds: z.record(z.string()).default({}),
  references: z.array(paperRefSchema).default([]),
  citations: z.array(paperRefSchema).default([]),
  tldr: z.string().optional(),
});

export const paperRecordSchema: z.ZodType<PaperRecord, z.ZodTypeDef, unknown> =
  z.discriminatedUnion('source', [arxivPaperSchema, semanticScholarPaperSchema]);

/** Parse a record previously written with JSON.stringify. */
export function parsePaperRecord(value: unknown): PaperRecord {
  return paperRecordSchema.parse(value);
}
