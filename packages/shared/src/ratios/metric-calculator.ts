/**
 * Metric Calculator
 *
 * Derives financial ratios from a statements dict. Missing or zero
 * denominators give null for that period; nothing here throws.
 */

import type { MetricsMap, PeriodValues, StatementsDict } from '../types';
import { growth, round4, safeDivide, safeSubtract } from './safe-math';

type PeriodGetter = (key: string) => number | null;

type PeriodMetric = (get: PeriodGetter) => number | null;

function ebitda(get: PeriodGetter): number | null {
  const direct = get('ebitda');
  if (direct !== null) return direct;

  const operatingIncome = get('operating_income');
  const da = get('depreciation_amortization');
  if (operatingIncome === null || da === null) return null;
  return operatingIncome + Math.abs(da);
}

export const PERIOD_METRICS: Readonly<Record<string, PeriodMetric>> = Object.freeze({
  gross_margin: (get) => safeDivide(get('gross_profit'), get('total_revenue')),
  ebitda_margin: (get) => safeDivide(ebitda(get), get('total_revenue')),
  operating_margin: (get) => safeDivide(get('operating_income'), get('total_revenue')),
  net_margin: (get) => safeDivide(get('net_income'), get('total_revenue')),
  return_on_equity: (get) => safeDivide(get('net_income'), get('total_equity')),
  return_on_assets: (get) => safeDivide(get('net_income'), get('total_assets')),
  current_ratio: (get) => safeDivide(get('total_current_assets'), get('total_current_liabilities')),
  quick_ratio: (get) => {
    const currentAssets = get('total_current_assets');
    if (currentAssets === null) return null;
    return safeDivide(
      safeSubtract(currentAssets, get('inventories') ?? 0),
      get('total_current_liabilities')
    );
  },
  debt_to_equity: (get) => safeDivide(get('total_liabilities'), get('total_equity')),
  debt_to_assets: (get) => safeDivide(get('total_liabilities'), get('total_assets')),
  interest_coverage: (get) => {
    const interest = get('interest_expense');
    return safeDivide(get('operating_income'), interest === null ? null : Math.abs(interest));
  },
});

/** growth metric -> statement line it tracks */
export const GROWTH_METRICS: Readonly<Record<string, string>> = Object.freeze({
  revenue_growth: 'total_revenue',
  net_income_growth: 'net_income',
  operating_cf_growth: 'operating_cash_flow',
});

function lookup(statements: StatementsDict, key: string, period: string): number | null {
  const value = statements[key]?.[period];
  return typeof value === 'number' ? value : null;
}

/**
 * Compute every per-period metric for every period, plus growth metrics for
 * each period after the first against the one before it in the given order.
 * No periods gives an empty map.
 */
export function calculateMetrics(statements: StatementsDict, periods: readonly string[]): MetricsMap {
  const metrics: MetricsMap = {};
  if (periods.length === 0) return metrics;

  for (const [name, compute] of Object.entries(PERIOD_METRICS)) {
    const values: PeriodValues = {};
    for (const period of periods) {
      values[period] = round4(compute((key) => lookup(statements, key, period)));
    }
    metrics[name] = values;
  }

  if (periods.length >= 2) {
    for (const [name, key] of Object.entries(GROWTH_METRICS)) {
      const values: PeriodValues = {};
      for (let i = 1; i < periods.length; i++) {
        const current = lookup(statements, key, periods[i]);
        const previous = lookup(statements, key, periods[i - 1]);
        values[periods[i]] = round4(growth(current, previous));
      }
      metrics[name] = values;
    }
  }

  return metrics;
}
