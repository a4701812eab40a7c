/**
 * Numeric Cell Parsing
 *
 * Converts a financial table cell to a number:
 *   "$1,234.56" -> 1234.56    "(1,234)" -> -1234    "12.5%" -> 12.5
 *   "-" -> 0                  "n/a" -> null         "" -> null
 */

const DASHES: ReadonlySet<string> = new Set(['-', '—', '–', '−']);

const NOT_AVAILABLE: ReadonlySet<string> = new Set(['n/a', 'na', 'nm', 'n/m', 'nil']);

const NUMBER_PATTERN = /^(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export function cleanNumeric(value: string | null | undefined): number | null {
  if (!value || value.trim() === '') return null;

  let text = value.trim();

  if (DASHES.has(text)) return 0;
  if (NOT_AVAILABLE.has(text.toLowerCase())) return null;

  let negative = false;
  if (text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    text = text.slice(1, -1);
  }

  text = text.replace(/[$€£¥₹\s%,]/g, '');

  if (text.startsWith('-') || text.startsWith('−')) {
    negative = true;
    text = text.slice(1);
  }

  if (!NUMBER_PATTERN.test(text)) return null;

  const parsed = Number(text);
  return negative ? -parsed : parsed;
}

export function isNumericCell(value: string | null | undefined): boolean {
  return cleanNumeric(value) !== null;
}

export function parseNumericRows(rows: readonly (readonly string[])[]): Array<Array<number | null>> {
  return rows.map((row) => row.map((cell) => cleanNumeric(cell)));
}
