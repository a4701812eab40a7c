/**
 * Label Normalization
 *
 * Text normalization and tokenization shared by the taxonomy loader and the
 * label mapper, so taxonomy keys and incoming labels are compared in the
 * same form.
 */

const STOP_WORDS: ReadonlySet<string> = new Set([
  'and',
  'the',
  'of',
  'or',
  'in',
  'for',
  'to',
  'from',
  'at',
  'on',
  'by',
  'net',
  'total',
]);

/**
 * Lower-case, collapse whitespace, drop currency symbols and punctuation,
 * strip trailing footnote markers and stray edge characters.
 *
 * "Total Revenue (1)" -> "total revenue", "Net Sales, $:" -> "net sales"
 */
export function normalizeLabel(label: string): string {
  let normalized = label.toLowerCase().trim();
  normalized = normalized.replace(/\s+/g, ' ');
  normalized = normalized.replace(/\s*\(\d+\)\s*$/, '');
  normalized = normalized.replace(/[,.:$€£¥₹()]/g, '');
  normalized = normalized.replace(/\s*\d+$/, '');
  normalized = normalized.replace(/^[-_ ]+|[-_ ]+$/g, '');
  return normalized.trim();
}

/**
 * Split a label into meaningful tokens for fuzzy matching.
 */
export function tokenizeLabel(label: string): Set<string> {
  const tokens = new Set<string>();
  for (const token of label.toLowerCase().split(/[\s&/\-_]+/)) {
    if (token !== '' && !STOP_WORDS.has(token)) {
      tokens.add(token);
    }
  }
  return tokens;
}

/**
 * Jaccard overlap of two token sets; 0 when either side is empty.
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;

  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) intersection++;
  }
  const union = a.size + b.size - intersection;
  return union === 0 ? 0 : intersection / union;
}
