/**
 * Statement Spreader
 *
 * Turns extracted labels and per-period value columns into normalized line
 * items grouped by statement type.
 */

import type {
  MappingStats,
  NormalizedLineItem,
  PeriodValues,
  SpreadResult,
  StatementsDict,
} from '../types';
import { getDefaultTaxonomy, type Taxonomy } from '../taxonomy/loader';
import { createLabelMapper } from './label-mapper';

export const UNMAPPED_SUGGESTION = 'Review manually or add to mapping';

/**
 * Value columns keyed by period. Periods come out in the map's insertion
 * order, so year headers such as "2024" keep the order they were given in.
 */
export type ValuesByPeriod = ReadonlyMap<string, ReadonlyArray<number | null>>;

function emptyStats(): MappingStats {
  return { exact: 0, prefix: 0, xbrl_tag: 0, fuzzy: 0, unmapped: 0 };
}

export function spreadFinancialData(
  labels: readonly string[],
  valuesByPeriod: ValuesByPeriod,
  taxonomy: Taxonomy = getDefaultTaxonomy()
): SpreadResult {
  const mapLabel = createLabelMapper(taxonomy);
  const periods = Array.from(valuesByPeriod.keys());

  const result: SpreadResult = {
    income_statement: [],
    balance_sheet: [],
    cash_flow: [],
    unmapped_items: [],
    periods,
    mapping_stats: emptyStats(),
  };

  labels.forEach((label, index) => {
    if (!label || label.trim() === '') return;

    const values: PeriodValues = {};
    for (const [period, column] of valuesByPeriod) {
      if (index < column.length) {
        values[period] = column[index];
      }
    }

    const mapping = mapLabel(label);

    if (
      mapping.canonical_key !== null &&
      mapping.statement_type !== 'unknown' &&
      mapping.match_method !== 'none'
    ) {
      const item: NormalizedLineItem = Object.freeze({
        original_label: label,
        canonical_label: mapping.canonical_key,
        values: Object.freeze(values),
        statement_type: mapping.statement_type,
        confidence: mapping.confidence,
        match_method: mapping.match_method,
      });
      result[mapping.statement_type].push(item);
      result.mapping_stats[mapping.match_method]++;
    } else {
      result.unmapped_items.push({ label, values, suggestion: UNMAPPED_SUGGESTION });
      result.mapping_stats.unmapped++;
    }
  });

  return result;
}

/**
 * Flatten a spread into canonical_label -> period -> value. Items are taken
 * income statement first, then balance sheet, then cash flow; a later item
 * with the same canonical label replaces an earlier one.
 */
export function buildStatementsDict(spread: SpreadResult): StatementsDict {
  const statements: StatementsDict = {};
  for (const item of [...spread.income_statement, ...spread.balance_sheet, ...spread.cash_flow]) {
    statements[item.canonical_label] = { ...item.values };
  }
  return statements;
}

export function mappedItemCount(spread: SpreadResult): number {
  return spread.income_statement.length + spread.balance_sheet.length + spread.cash_flow.length;
}
