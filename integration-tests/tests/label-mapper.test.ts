/**
 * Label mapper: tier order, precedence and fuzzy scoring
 */

import {
  buildTaxonomy,
  createLabelMapper,
  mapLabel,
  normalizeLabel,
  type LabelMapping,
  type StatementType,
} from '@finspread/shared';
import incomeStatementLabels from '../../packages/shared/src/taxonomy/data/income-statement.json';
import balanceSheetLabels from '../../packages/shared/src/taxonomy/data/balance-sheet.json';
import cashFlowLabels from '../../packages/shared/src/taxonomy/data/cash-flow.json';
import xbrlTags from '../../packages/shared/src/taxonomy/data/xbrl-tags.json';
import { testTaxonomy } from './helpers';

const BUNDLED_MAPPINGS: Array<[StatementType, Record<string, string>]> = [
  ['income_statement', incomeStatementLabels],
  ['balance_sheet', balanceSheetLabels],
  ['cash_flow', cashFlowLabels],
];

describe('Label mapper', () => {
  const map = createLabelMapper(testTaxonomy());

  describe('XBRL tags', () => {
    it('should map a namespaced tag', () => {
      expect(map('us-gaap:Revenues')).toEqual<LabelMapping>({
        canonical_key: 'total_revenue',
        statement_type: 'income_statement',
        match_method: 'xbrl_tag',
        confidence: 1.0,
      });
    });

    it('should map a bare tag', () => {
      expect(map('Assets').match_method).toBe('xbrl_tag');
      expect(map('Assets').canonical_key).toBe('total_assets');
    });

    it('should compare tags case-sensitively', () => {
      // falls through to the prefix tier on "revenue"
      expect(map('revenues')).toEqual<LabelMapping>({
        canonical_key: 'total_revenue',
        statement_type: 'income_statement',
        match_method: 'prefix',
        confidence: 0.9,
      });
    });
  });

  describe('exact matches', () => {
    it('should match after normalization', () => {
      expect(map('Total Revenue (1)')).toEqual<LabelMapping>({
        canonical_key: 'total_revenue',
        statement_type: 'income_statement',
        match_method: 'exact',
        confidence: 1.0,
      });
    });

    it('should prefer the income statement over the cash flow statement', () => {
      expect(map('Net Income').canonical_key).toBe('net_income');
      expect(map('Depreciation and amortization').canonical_key).toBe('depreciation_amortization');
    });

    it('should reach the cash flow mapping when earlier mappings have no exact key', () => {
      const result = map('Cash at end of period');
      expect(result.canonical_key).toBe('cash');
      expect(result.statement_type).toBe('cash_flow');
      expect(result.match_method).toBe('exact');
    });
  });

  describe('prefix matches', () => {
    it('should map a label that extends a known label', () => {
      const result = map('Total assets held for sale');
      expect(result.canonical_key).toBe('total_assets');
      expect(result.match_method).toBe('prefix');
      expect(result.confidence).toBe(0.9);
    });
  });

  describe('fuzzy matches', () => {
    it('should match reordered words with full confidence', () => {
      expect(map('Profit gross')).toEqual<LabelMapping>({
        canonical_key: 'gross_profit',
        statement_type: 'income_statement',
        match_method: 'fuzzy',
        confidence: 1,
      });
    });

    it('should round the overlap score to two decimals', () => {
      // {gross, trading, profit} vs {gross, profit} = 2/3
      const result = map('Gross trading profit');
      expect(result.canonical_key).toBe('gross_profit');
      expect(result.match_method).toBe('fuzzy');
      expect(result.confidence).toBe(0.67);
    });

    it('should round a tied overlap score to the even digit', () => {
      const tied = createLabelMapper(
        buildTaxonomy({
          income_statement: {
            'alpha beta gamma delta epsilon': 'five_words',
            'one two three four five six seven': 'seven_words',
          },
          balance_sheet: {},
          cash_flow: {},
          xbrl_tags: {},
        })
      );

      // 5 of 8 tokens shared = 0.625
      expect(tied('zeta eta theta alpha beta gamma delta epsilon')).toEqual<LabelMapping>({
        canonical_key: 'five_words',
        statement_type: 'income_statement',
        match_method: 'fuzzy',
        confidence: 0.62,
      });
      // 7 of 8 tokens shared = 0.875
      expect(tied('eight one two three four five six seven').confidence).toBe(0.88);
    });

    it('should leave a weak overlap unmapped', () => {
      // {gross, margin, adjustments} vs {gross, profit} = 1/4
      expect(map('Gross margin adjustments').match_method).toBe('none');
    });
  });

  it('should return the no-match result for an unknown or empty label', () => {
    const noMatch: LabelMapping = {
      canonical_key: null,
      statement_type: 'unknown',
      match_method: 'none',
      confidence: 0,
    };
    expect(map('Widget royalties')).toEqual(noMatch);
    expect(map('')).toEqual(noMatch);
  });

  describe('with the bundled taxonomy', () => {
    it('should map common statement lines', () => {
      expect(mapLabel('Revenue').canonical_key).toBe('total_revenue');
      expect(mapLabel('Net income').canonical_key).toBe('net_income');
      expect(mapLabel('Total current liabilities').canonical_key).toBe('total_current_liabilities');
      expect(mapLabel('Net cash used in investing activities')).toEqual<LabelMapping>({
        canonical_key: 'investing_cash_flow',
        statement_type: 'cash_flow',
        match_method: 'exact',
        confidence: 1.0,
      });
    });

    it('should map a namespaced XBRL tag', () => {
      expect(mapLabel('us-gaap:GrossProfit').match_method).toBe('xbrl_tag');
      expect(mapLabel('us-gaap:GrossProfit').canonical_key).toBe('gross_profit');
    });

    it('should match a parenthesized key exactly', () => {
      const result = mapLabel('Gross profit (loss)');
      expect(result.canonical_key).toBe('gross_profit');
      expect(result.match_method).toBe('exact');
    });

    it('should leave a label with no close entry unmapped', () => {
      expect(mapLabel('Segment Operating Margin')).toEqual<LabelMapping>({
        canonical_key: null,
        statement_type: 'unknown',
        match_method: 'none',
        confidence: 0,
      });
    });

    it('should map every label to its own entry unless an earlier mapping has it', () => {
      const owner = new Map<string, LabelMapping>();
      const collisions: string[] = [];

      for (const [statementType, labels] of BUNDLED_MAPPINGS) {
        for (const [label, key] of Object.entries(labels)) {
          const normalized = normalizeLabel(label);
          const claimed = owner.get(normalized);
          if (claimed === undefined) {
            owner.set(normalized, { canonical_key: key, statement_type: statementType, match_method: 'exact', confidence: 1.0 });
          } else if (claimed.statement_type !== statementType) {
            collisions.push(`${statementType}:${label}`);
          }
          expect(mapLabel(label)).toEqual(owner.get(normalized));
        }
      }

      expect(collisions).toEqual([
        'balance_sheet:minority interest',
        'cash_flow:net income',
        'cash_flow:net income (loss)',
        'cash_flow:depreciation and amortization',
        'cash_flow:depreciation & amortization',
        'cash_flow:stock-based compensation',
        'cash_flow:stock based compensation',
        'cash_flow:share-based compensation',
        'cash_flow:impairment charges',
        'cash_flow:accounts receivable',
        'cash_flow:inventories',
        'cash_flow:accounts payable',
        'cash_flow:accrued liabilities',
        'cash_flow:deferred revenue',
      ]);
    });

    it('should map every XBRL tag with and without a namespace', () => {
      for (const [tag, entry] of Object.entries(xbrlTags)) {
        const expected = {
          canonical_key: entry.key,
          statement_type: entry.statement_type,
          match_method: 'xbrl_tag',
          confidence: 1.0,
        };
        expect(mapLabel(tag)).toEqual(expected);
        expect(mapLabel(`us-gaap:${tag}`)).toEqual(expected);
      }
    });
  });
});
