/**
 * Extraction record assembly and final status
 */

import {
  buildStatementsDict,
  spreadFinancialData,
  validateExtractionRecord,
  validateStatements,
  UNMAPPED_SUGGESTION,
  type ValidationSummary,
} from '@finspread/shared';
import type { PipelineStatus } from '../../services/worker-extraction/src/lib/pipeline';
import {
  buildExtractionRecord,
  EMPTY_VALIDATION,
  resolveStatus,
} from '../../services/worker-extraction/src/lib/record';
import { testTaxonomy } from './helpers';

const TIMESTAMP = '2026-01-01T00:00:00.000Z';

function summary(overrides: Partial<ValidationSummary>): ValidationSummary {
  return { ...EMPTY_VALIDATION, flags: [], quality_score: 100, ...overrides };
}

describe('resolveStatus', () => {
  it('should complete a clean run above the threshold', () => {
    expect(resolveStatus({ stage: 'complete' }, summary({ quality_score: 80 }), 70)).toBe('completed');
  });

  it('should ask for review below the threshold', () => {
    expect(resolveStatus({ stage: 'complete' }, summary({ quality_score: 60 }), 70)).toBe('needs_review');
  });

  it('should ask for review on any error flag', () => {
    const validation = summary({
      quality_score: 90,
      flags: [{ severity: 'error', check: 'balance_sheet', message: 'unbalanced', details: {} }],
    });
    expect(resolveStatus({ stage: 'complete' }, validation, 70)).toBe('needs_review');
  });

  it('should fail a run that did not complete or was never validated', () => {
    expect(resolveStatus({ stage: 'failed' }, summary({}), 70)).toBe('failed');
    expect(resolveStatus({ stage: 'complete' }, undefined, 70)).toBe('failed');
  });
});

describe('buildExtractionRecord', () => {
  function completedStatus(): PipelineStatus {
    const spread = spreadFinancialData(
      ['Revenue', 'Total assets', 'Cash at end of period', 'Widget royalties'],
      new Map([['FY24', [100, 500, 20, 3]]]),
      testTaxonomy()
    );
    return {
      document_id: 'doc-1',
      stage: 'complete',
      progress: 100,
      started_at: TIMESTAMP,
      finished_at: TIMESTAMP,
      errors: ['Failed to extract text: page 4 unreadable'],
      results: {
        analysis: {
          agent_type: 'context_archivist',
          document_type: 'annual_report',
          table_hints: { income_statement: 0, balance_sheet: 1, cash_flow: 2 },
          confidence: 0.95,
          agent_notes: 'test',
        },
        spread,
        periods: spread.periods,
        validation: validateStatements(buildStatementsDict(spread), spread.periods),
        metrics: { gross_margin: { FY24: null } },
      },
    };
  }

  const input = {
    extractionId: 'ext-1',
    documentId: 'doc-1',
    agentType: 'context_archivist' as const,
    reviewThreshold: 70,
    timestamp: TIMESTAMP,
  };

  it('should lay out line items by statement', () => {
    const record = buildExtractionRecord(completedStatus(), input);

    expect(record.statements).toEqual({
      income_statement: {
        periods: ['FY24'],
        line_items: [
          { label: 'Revenue', canonical_label: 'total_revenue', values: { FY24: 100 }, confidence: 1, match_method: 'exact' },
        ],
      },
      balance_sheet: {
        periods: ['FY24'],
        line_items: [
          { label: 'Total assets', canonical_label: 'total_assets', values: { FY24: 500 }, confidence: 1, match_method: 'exact' },
        ],
      },
      cash_flow_statement: {
        periods: ['FY24'],
        line_items: [
          {
            label: 'Cash at end of period',
            canonical_label: 'cash',
            values: { FY24: 20 },
            confidence: 1,
            match_method: 'exact',
          },
        ],
      },
    });
  });

  it('should carry the analysis, scores and errors', () => {
    const record = buildExtractionRecord(completedStatus(), input);

    expect(record.schema_version).toBe('1.0');
    expect(record.extraction_id).toBe('ext-1');
    expect(record.extraction_timestamp).toBe(TIMESTAMP);
    expect(record.document_type_detected).toBe('annual_report');
    expect(record.selected_agent).toBe('context_archivist');
    // liabilities missing (-5) and all three checks unknown (-18)
    expect(record.quality_score).toBe(77);
    expect(record.status).toBe('completed');
    expect(record.unmapped_items).toEqual([
      { label: 'Widget royalties', values: { FY24: 3 }, suggestion: UNMAPPED_SUGGESTION },
    ]);
    expect(record.mapping_stats).toEqual({ exact: 3, prefix: 0, xbrl_tag: 0, fuzzy: 0, unmapped: 1 });
    expect(record.calculated_metrics).toEqual({ gross_margin: { FY24: null } });
    expect(record.errors).toEqual(['Failed to extract text: page 4 unreadable']);
  });

  it('should match the record contract', () => {
    expect(validateExtractionRecord(buildExtractionRecord(completedStatus(), input))).toEqual({ valid: true });
  });

  it('should build an empty failed record when the run stopped early', () => {
    const status: PipelineStatus = {
      document_id: 'doc-1',
      stage: 'failed',
      progress: 0,
      started_at: TIMESTAMP,
      finished_at: TIMESTAMP,
      errors: ['Pipeline failed: boom'],
      results: { totalPages: 2 },
    };

    const record = buildExtractionRecord(status, input);

    expect(record.status).toBe('failed');
    expect(record.quality_score).toBe(0);
    expect(record.document_type_detected).toBeNull();
    expect(record.statements.balance_sheet).toEqual({ periods: [], line_items: [] });
    expect(record.mapping_stats).toEqual({ exact: 0, prefix: 0, xbrl_tag: 0, fuzzy: 0, unmapped: 0 });
    expect(record.calculated_metrics).toEqual({});
    expect(record.validation).toEqual(EMPTY_VALIDATION);
    expect(record.errors).toEqual(['Pipeline failed: boom']);
    expect(validateExtractionRecord(record)).toEqual({ valid: true });
  });
});
