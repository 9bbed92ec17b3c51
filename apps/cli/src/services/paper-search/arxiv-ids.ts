/**
 * arXiv identifier helpers
 *
 * ID formats:
 * - New (2007+): YYMM.NNNN or YYMM.NNNNN, optional version (e.g. "2101.00001v2")
 * - Old (pre-2007): archive[.SUB]/YYMMNNN, optional version (e.g. "hep-th/9901001")
 */

const NEW_FORMAT = /^\d{4}\.\d{4,5}(v\d+)?$/;
const OLD_FORMAT = /^[a-z-]+(\.[A-Za-z-]+)?\/\d{7}(v\d+)?$/;

export function isValidArxivId(arxivId: string): boolean {
  const cleanId = arxivId.trim();
  return NEW_FORMAT.test(cleanId) || OLD_FORMAT.test(cleanId);
}

/** Drop a trailing version marker: "2101.00001v2" -> "2101.00001" */
export function stripArxivVersion(arxivId: string): string {
  return arxivId.trim().replace(/v\d+$/, '');
}

/**
 * Pull the id out of an abs/pdf URL or an Atom entry id.
 * "http://arxiv.org/abs/2101.00001v2" -> "2101.00001v2"
 */
export function extractArxivId(value: string): string | null {
  const match = value.match(/\/(?:abs|pdf)\/(.+?)(?:\.pdf)?\/?$/);
  if (match) {
    return match[1];
  }
  return isValidArxivId(value) ? value.trim() : null;
}

/** Numeric version from a trailing "v<N>", if any. */
export function arxivVersion(id: string): number | undefined {
  const match = id.match(/v(\d+)$/);
  return match ? Number.parseInt(match[1], 10) : undefined;
}
