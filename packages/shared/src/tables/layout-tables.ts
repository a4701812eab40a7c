/**
 * Layout Table Detection
 *
 * Finds borderless financial tables in page text whose columns are separated
 * by runs of two or more spaces (or tabs), as produced by the PDF text
 * extractor. A table is a run of at least MIN_TABLE_ROWS consecutive data
 * rows: a text label followed by one or more numeric cells. The line right
 * above the run is taken as the header when its cells look like period
 * labels.
 */

import type { ExtractedTable, PageText } from '../types';
import { cleanNumeric, parseNumericRows } from './clean-numeric';

export const MIN_TABLE_ROWS = 2;

const CELL_SEPARATOR = /\s{2,}|\t+/;
const CURRENCY_ONLY = /^[$€£¥₹]$/;
const PERIOD_HINT = /\b(19|20)\d{2}\b|\bfy\s?\d{2,4}\b|\bq[1-4]\b|\b(ytd|ttm|ltm)\b/i;

export const DEFAULT_LABEL_HEADER = 'Line Item';

/**
 * Split a text line into cells. A lone currency symbol is folded into the
 * cell after it.
 */
export function splitCells(line: string): string[] {
  const raw = line.trim().split(CELL_SEPARATOR).filter((c) => c !== '');
  const cells: string[] = [];
  for (let i = 0; i < raw.length; i++) {
    if (CURRENCY_ONLY.test(raw[i]) && i + 1 < raw.length) {
      cells.push(`${raw[i]}${raw[i + 1]}`);
      i++;
    } else {
      cells.push(raw[i]);
    }
  }
  return cells;
}

function isPeriodCell(cell: string): boolean {
  return PERIOD_HINT.test(cell);
}

/** All cells, or all cells after the label column, look like period labels. */
function isHeaderRow(cells: readonly string[]): boolean {
  if (cells.length === 0) return false;
  return cells.every(isPeriodCell) || (cells.length >= 2 && cells.slice(1).every(isPeriodCell));
}

function isDataRow(cells: readonly string[]): boolean {
  if (cells.length < 2 || isHeaderRow(cells)) return false;
  if (cleanNumeric(cells[0]) !== null) return false;
  return cells.slice(1).some((cell) => cleanNumeric(cell) !== null);
}

function buildHeaders(headerCells: readonly string[] | null, width: number): string[] {
  if (!headerCells) {
    return [DEFAULT_LABEL_HEADER, ...Array.from({ length: width - 1 }, (_, i) => `Column ${i + 1}`)];
  }
  // a header made only of period labels has no label column
  const cells = headerCells.every(isPeriodCell)
    ? [DEFAULT_LABEL_HEADER, ...headerCells]
    : [...headerCells];
  while (cells.length < width) cells.push('');
  return cells;
}

function padRow(cells: readonly string[], width: number): string[] {
  const row = [...cells];
  while (row.length < width) row.push('');
  return row;
}

interface RowRun {
  header: string[] | null;
  rows: string[][];
}

function collectRuns(lines: readonly string[]): RowRun[] {
  const runs: RowRun[] = [];
  let current: RowRun | null = null;
  let previous: string[] | null = null;

  for (const line of lines) {
    const cells = splitCells(line);

    if (isDataRow(cells)) {
      if (!current) {
        current = {
          header: previous && isHeaderRow(previous) ? previous : null,
          rows: [],
        };
      }
      current.rows.push(cells);
    } else if (current) {
      runs.push(current);
      current = null;
    }

    previous = cells.length > 0 ? cells : previous;
  }

  if (current) runs.push(current);
  return runs.filter((run) => run.rows.length >= MIN_TABLE_ROWS);
}

/**
 * Detect tables on every page. Table ids are assigned in page order.
 */
export function detectLayoutTables(pages: readonly PageText[]): ExtractedTable[] {
  const tables: ExtractedTable[] = [];

  for (const page of pages) {
    for (const run of collectRuns(page.text.split(/\r?\n/))) {
      const width = Math.max(
        run.header ? run.header.length : 0,
        ...run.rows.map((r) => r.length)
      );
      const headers = buildHeaders(run.header, width);
      const rows = run.rows.map((r) => padRow(r, headers.length));

      tables.push({
        table_id: `t${tables.length}`,
        page_number: page.pageNumber,
        headers,
        rows,
        numeric_rows: parseNumericRows(rows),
        method: 'layout',
      });
    }
  }

  return tables;
}
