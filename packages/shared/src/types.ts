/**
 * Shared TypeScript Types
 *
 * Types for the financial spreading pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Statements & Taxonomy
// ============================================================================

export type StatementType = 'income_statement' | 'balance_sheet' | 'cash_flow';

export const STATEMENT_TYPES: readonly StatementType[] = [
  'income_statement',
  'balance_sheet',
  'cash_flow',
] as const;

export type MatchMethod = 'exact' | 'prefix' | 'xbrl_tag' | 'fuzzy';

/** Value per period; null when the cell was present but unparsable or blank. */
export type PeriodValues = Record<string, number | null>;

export interface LabelMapping {
  canonical_key: string | null;
  statement_type: StatementType | 'unknown';
  match_method: MatchMethod | 'none';
  confidence: number;
}

export interface NormalizedLineItem {
  readonly original_label: string;
  readonly canonical_label: string;
  readonly values: Readonly<PeriodValues>;
  readonly statement_type: StatementType;
  readonly confidence: number;
  readonly match_method: MatchMethod;
}

export interface UnmappedItem {
  label: string;
  values: PeriodValues;
  suggestion: string;
}

export type MappingStats = Record<MatchMethod | 'unmapped', number>;

export interface SpreadResult {
  income_statement: NormalizedLineItem[];
  balance_sheet: NormalizedLineItem[];
  cash_flow: NormalizedLineItem[];
  unmapped_items: UnmappedItem[];
  periods: string[];
  mapping_stats: MappingStats;
}

/** canonical_label -> period -> value */
export type StatementsDict = Record<string, PeriodValues>;

// ============================================================================
// Validation
// ============================================================================

export type FlagSeverity = 'error' | 'warning' | 'info';

export type ValidationCheck = 'balance_sheet' | 'income_statement' | 'cash_flow';

export interface ValidationFlag {
  severity: FlagSeverity;
  check: ValidationCheck;
  message: string;
  details: Record<string, number | string | null>;
}

export interface ValidationSummary {
  balance_sheet_balanced: boolean | null;
  income_statement_valid: boolean | null;
  cash_flow_reconciled: boolean | null;
  cross_statement_consistent: boolean;
  flags: ValidationFlag[];
  items_flagged_for_review: number;
  quality_score: number;
}

// ============================================================================
// Metrics
// ============================================================================

export type MetricsMap = Record<string, PeriodValues>;

// ============================================================================
// Documents, Agents & Status
// ============================================================================

export type ProcessingStatus = 'pending' | 'processing' | 'completed' | 'failed' | 'needs_review';

export type DocumentType =
  | '10-K'
  | '10-Q'
  | 'annual_report'
  | 'rent_roll'
  | 'offering_memorandum'
  | 'term_sheet'
  | 'contract'
  | 'financial_statement'
  | 'other';

export type FileType = 'pdf' | 'docx' | 'xlsx' | 'csv' | 'image';

export type AgentType =
  | 'precision_specialist'
  | 'context_archivist'
  | 'quant_mathematician'
  | 'trend_forecaster';

export const AGENT_TYPES: readonly AgentType[] = [
  'precision_specialist',
  'context_archivist',
  'quant_mathematician',
  'trend_forecaster',
] as const;

export function isAgentType(value: unknown): value is AgentType {
  return AGENT_TYPES.some((agentType) => agentType === value);
}

export interface TableHints {
  income_statement: number | null;
  balance_sheet: number | null;
  cash_flow: number | null;
}

export interface AgentAnalysis {
  agent_type: AgentType;
  document_type: DocumentType;
  table_hints: TableHints;
  confidence: number;
  agent_notes: string;
}

export type PipelineStage =
  | 'pending'
  | 'ocr'
  | 'tables'
  | 'ner'
  | 'normalization'
  | 'validation'
  | 'metrics'
  | 'complete'
  | 'failed';

export const STAGE_PROGRESS: Record<PipelineStage, number> = {
  pending: 0,
  ocr: 15,
  tables: 30,
  ner: 50,
  normalization: 70,
  validation: 85,
  metrics: 95,
  complete: 100,
  failed: 0,
};

// ============================================================================
// Upstream Extraction Output
// ============================================================================

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface TextExtractionResult {
  pages: PageText[];
  totalPages: number;
  errors: string[];
}

export type TableMethod = 'layout' | 'external';

export interface ExtractedTable {
  table_id: string;
  page_number: number;
  /** First row; column 0 is the label column. */
  headers: string[];
  rows: string[][];
  /** Parsed form of each row cell; same shape as rows. */
  numeric_rows: Array<Array<number | null>>;
  method: TableMethod;
}

export interface TableExtractionResult {
  tables: ExtractedTable[];
  errors: string[];
}

// ============================================================================
// Persisted Records
// ============================================================================

export interface StatementLineItemRecord {
  label: string;
  canonical_label: string;
  values: PeriodValues;
  confidence: number;
  match_method: MatchMethod;
}

export interface StatementRecord {
  periods: string[];
  line_items: StatementLineItemRecord[];
}

export interface ExtractionRecord {
  schema_version: '1.0';
  extraction_id: string;
  document_id: string;
  extraction_timestamp: string;
  document_type_detected: DocumentType | null;
  selected_agent: AgentType;
  quality_score: number;
  statements: {
    income_statement: StatementRecord;
    balance_sheet: StatementRecord;
    cash_flow_statement: StatementRecord;
  };
  unmapped_items: UnmappedItem[];
  mapping_stats: MappingStats;
  calculated_metrics: MetricsMap;
  validation: ValidationSummary;
  errors: string[];
  status: ProcessingStatus;
}

export interface DocumentRecord {
  document_id: string;
  filename: string;
  file_type: FileType;
  file_size_bytes: number;
  storage_path: string;
  uploaded_by: string | null;
  organization_id: string | null;
  document_type: DocumentType | null;
  company_name: string | null;
  fiscal_period: string | null;
  currency: string;
  created_at: string;
}

export interface ExtractionProgress {
  extraction_id: string;
  document_id: string;
  status: ProcessingStatus;
  current_stage: PipelineStage;
  progress: number;
  selected_agent: AgentType;
  quality_score: number | null;
  result: ExtractionRecord | null;
  errors: string[];
  created_at: string;
  updated_at: string;
}

// ============================================================================
// API Responses
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}

export interface DocumentListResponse {
  items: DocumentRecord[];
  limit: number;
  offset: number;
}
