/**
 * Table Merge
 *
 * Flattens the extracted tables into the label list and per-period value
 * columns the spreader takes. Tables suggested by the agent analysis are
 * used when the hints point at real tables; otherwise every table is used.
 */

import type { ExtractedTable, TableHints } from '../types';

export interface SpreadInput {
  labels: string[];
  /** Period headers in the order they were first seen. */
  periods: string[];
  /** Keyed by period, in `periods` order. */
  valuesByPeriod: Map<string, Array<number | null>>;
}

/**
 * Hinted table indices (income, balance, cash flow order) that point at an
 * existing table, without repeats.
 */
export function selectHintedTables(
  hints: TableHints | null,
  tables: readonly ExtractedTable[]
): ExtractedTable[] {
  if (!hints) return [...tables];

  const indices: number[] = [];
  for (const index of [hints.income_statement, hints.balance_sheet, hints.cash_flow]) {
    if (
      index !== null &&
      Number.isInteger(index) &&
      index >= 0 &&
      index < tables.length &&
      !indices.includes(index)
    ) {
      indices.push(index);
    }
  }

  return indices.length > 0 ? indices.map((i) => tables[i]) : [...tables];
}

/**
 * Period columns of a table: header text -> column index. Column 0 is the
 * label column; blank headers are skipped and a repeated header keeps its
 * first column.
 */
function periodColumns(table: ExtractedTable): Map<string, number> {
  const columns = new Map<string, number>();
  table.headers.forEach((header, col) => {
    if (col === 0) return;
    const period = header.trim();
    if (period !== '' && !columns.has(period)) {
      columns.set(period, col);
    }
  });
  return columns;
}

/**
 * Every period column stays the same length as the label list: rows from a
 * table that lacks a period get null for it, and a period first seen in a
 * later table is back-filled with null for earlier rows.
 */
export function mergeTablesForSpreading(
  hints: TableHints | null,
  tables: readonly ExtractedTable[]
): SpreadInput {
  const labels: string[] = [];
  const valuesByPeriod = new Map<string, Array<number | null>>();

  for (const table of selectHintedTables(hints, tables)) {
    if (table.headers.length === 0) continue;

    const columns = periodColumns(table);
    for (const period of columns.keys()) {
      if (!valuesByPeriod.has(period)) {
        valuesByPeriod.set(period, new Array<number | null>(labels.length).fill(null));
      }
    }

    table.rows.forEach((row, i) => {
      labels.push(row[0] ?? '');
      const numericRow = table.numeric_rows[i] ?? [];
      for (const [period, values] of valuesByPeriod) {
        const col = columns.get(period);
        values.push(col === undefined ? null : numericRow[col] ?? null);
      }
    });
  }

  return { labels, periods: Array.from(valuesByPeriod.keys()), valuesByPeriod };
}

