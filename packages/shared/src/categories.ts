// ============ arXiv Categories ============
// Curated subset of the arXiv taxonomy; extend as needed.

export const ARXIV_CATEGORIES = {
  'cs.AI': 'Computer Science - Artificial Intelligence',
  'cs.LG': 'Computer Science - Machine Learning',
  'cs.CV': 'Computer Science - Computer Vision and Pattern Recognition',
  'cs.CL': 'Computer Science - Computation and Language (NLP)',
  'cs.NE': 'Computer Science - Neural and Evolutionary Computing',
  'cs.CR': 'Computer Science - Cryptography and Security',
  'math.PR': 'Mathematics - Probability',
  'math.NA': 'Mathematics - Numerical Analysis',
  'stat.ML': 'Statistics - Machine Learning',
  'hep-th': 'High Energy Physics - Theory',
  'hep-ph': 'High Energy Physics - Phenomenology',
  'astro-ph': 'Astrophysics',
  'nucl-th': 'Nuclear Theory',
  'q-bio': 'Quantitative Biology',
  'q-fin': 'Quantitative Finance',
  'cond-mat': 'Condensed Matter',
  eess: 'Electrical Engineering and Systems Science',
} as const satisfies Record<string, string>;

export type ArxivCategory = keyof typeof ARXIV_CATEGORIES;

export function isArxivCategory(code: string): code is ArxivCategory {
  return Object.prototype.hasOwnProperty.call(ARXIV_CATEGORIES, code);
}

export function getCategoryDescription(code: string): string | undefined {
  return isArxivCategory(code) ? ARXIV_CATEGORIES[code] : undefined;
}
