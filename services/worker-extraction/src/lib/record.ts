/**
 * Extraction Record Assembly
 *
 * Turns a finished pipeline run into the record stored on the extraction.
 */

import type {
  AgentType,
  ExtractionRecord,
  MappingStats,
  NormalizedLineItem,
  ProcessingStatus,
  StatementRecord,
  ValidationSummary,
} from '@finspread/shared';
import type { PipelineStatus } from './pipeline';

export const EMPTY_VALIDATION: ValidationSummary = Object.freeze({
  balance_sheet_balanced: null,
  income_statement_valid: null,
  cash_flow_reconciled: null,
  cross_statement_consistent: true,
  flags: [],
  items_flagged_for_review: 0,
  quality_score: 0,
});

/**
 * 'failed' when the run did not complete; 'needs_review' when validation
 * raised an error or the score is under the threshold; else 'completed'.
 */
export function resolveStatus(
  status: Pick<PipelineStatus, 'stage'>,
  validation: ValidationSummary | undefined,
  reviewThreshold: number
): ProcessingStatus {
  if (status.stage !== 'complete' || !validation) return 'failed';
  const hasError = validation.flags.some((f) => f.severity === 'error');
  if (hasError || validation.quality_score < reviewThreshold) return 'needs_review';
  return 'completed';
}

function toStatementRecord(items: readonly NormalizedLineItem[], periods: string[]): StatementRecord {
  return {
    periods,
    line_items: items.map((item) => ({
      label: item.original_label,
      canonical_label: item.canonical_label,
      values: { ...item.values },
      confidence: item.confidence,
      match_method: item.match_method,
    })),
  };
}

function emptyStats(): MappingStats {
  return { exact: 0, prefix: 0, xbrl_tag: 0, fuzzy: 0, unmapped: 0 };
}

export interface BuildRecordInput {
  extractionId: string;
  documentId: string;
  agentType: AgentType;
  reviewThreshold: number;
  /** Defaults to now */
  timestamp?: string;
}

export function buildExtractionRecord(status: PipelineStatus, input: BuildRecordInput): ExtractionRecord {
  const { spread, validation, metrics, analysis } = status.results;
  const periods = spread?.periods ?? [];

  return {
    schema_version: '1.0',
    extraction_id: input.extractionId,
    document_id: input.documentId,
    extraction_timestamp: input.timestamp ?? new Date().toISOString(),
    document_type_detected: analysis?.document_type ?? null,
    selected_agent: input.agentType,
    quality_score: validation?.quality_score ?? 0,
    statements: {
      income_statement: toStatementRecord(spread?.income_statement ?? [], periods),
      balance_sheet: toStatementRecord(spread?.balance_sheet ?? [], periods),
      cash_flow_statement: toStatementRecord(spread?.cash_flow ?? [], periods),
    },
    unmapped_items: spread?.unmapped_items ?? [],
    mapping_stats: spread?.mapping_stats ?? emptyStats(),
    calculated_metrics: metrics ?? {},
    validation: validation ?? { ...EMPTY_VALIDATION, flags: [] },
    errors: [...status.errors],
    status: resolveStatus(status, validation, input.reviewThreshold),
  };
}
