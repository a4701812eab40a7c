/**
 * Keyword document-type detection used by the heuristic analyzers and as the
 * LLM analyzer's fallback. Rules are checked in order; the first hit wins.
 */

import type { DocumentType } from '../types';

const RULES: ReadonlyArray<[RegExp, DocumentType]> = [
  [/\bform\s+10-k\b|annual report pursuant to section 13/i, '10-K'],
  [/\bform\s+10-q\b|quarterly report pursuant to section 13/i, '10-Q'],
  [/\brent\s+roll\b/i, 'rent_roll'],
  [/\boffering\s+memorandum\b/i, 'offering_memorandum'],
  [/\bterm\s+sheet\b/i, 'term_sheet'],
  [/\bannual\s+report\b/i, 'annual_report'],
  [
    /\bbalance\s+sheets?\b|\bincome\s+statements?\b|\bstatements?\s+of\s+(operations|income|cash\s+flows|financial\s+position)\b/i,
    'financial_statement',
  ],
];

export function detectDocumentType(text: string): DocumentType {
  for (const [pattern, documentType] of RULES) {
    if (pattern.test(text)) return documentType;
  }
  return 'other';
}
