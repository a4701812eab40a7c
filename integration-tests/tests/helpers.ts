/**
 * Test Helpers
 *
 * Small taxonomies, table builders and an in-memory repository for unit
 * and pipeline tests.
 */

import {
  buildTaxonomy,
  parseNumericRows,
  type AuditEntry,
  type DocumentRecord,
  type ExtractedTable,
  type ExtractionProgress,
  type ExtractionRecord,
  type ExtractionRepository,
  type ListDocumentsQuery,
  type NewDocument,
  type NewExtraction,
  type ProgressUpdate,
  type Taxonomy,
} from '@finspread/shared';

/**
 * A compact taxonomy with known precedence cases:
 * "net income" and "depreciation and amortization" exist in both the
 * income statement and the cash flow mapping.
 */
export function testTaxonomy(): Taxonomy {
  return buildTaxonomy({
    income_statement: {
      revenue: 'total_revenue',
      'total revenue': 'total_revenue',
      'cost of revenue': 'cost_of_revenue',
      'gross profit': 'gross_profit',
      'operating income': 'operating_income',
      'depreciation and amortization': 'depreciation_amortization',
      'net income': 'net_income',
    },
    balance_sheet: {
      cash: 'cash',
      'total assets': 'total_assets',
      'total liabilities': 'total_liabilities',
      'total equity': 'total_equity',
    },
    cash_flow: {
      'net income': 'cf_net_income',
      'depreciation and amortization': 'cf_depreciation_amortization',
      'cash at end of period': 'cash',
      'net cash provided by operating activities': 'operating_cash_flow',
    },
    xbrl_tags: {
      Revenues: { key: 'total_revenue', statement_type: 'income_statement' },
      Assets: { key: 'total_assets', statement_type: 'balance_sheet' },
    },
  });
}

export function makeTable(
  headers: string[],
  rows: string[][],
  overrides: Partial<ExtractedTable> = {}
): ExtractedTable {
  return {
    table_id: 't0',
    page_number: 1,
    headers,
    rows,
    numeric_rows: parseNumericRows(rows),
    method: 'layout',
    ...overrides,
  };
}

/**
 * ExtractionRepository kept in memory. Every call is recorded so tests can
 * assert the order of writes.
 */
export class InMemoryExtractionRepository implements ExtractionRepository {
  readonly documents = new Map<string, DocumentRecord>();
  readonly extractions = new Map<string, ExtractionProgress>();
  readonly audit: AuditEntry[] = [];
  readonly calls: string[] = [];
  failProgressWrites = false;
  failDocumentSaves = false;

  async saveDocument(doc: NewDocument): Promise<DocumentRecord> {
    this.calls.push('saveDocument');
    if (this.failDocumentSaves) {
      throw new Error('insert rejected');
    }
    const record: DocumentRecord = {
      ...doc,
      document_type: null,
      company_name: null,
      fiscal_period: null,
      currency: 'USD',
      created_at: '2026-01-01T00:00:00.000Z',
    };
    this.documents.set(doc.document_id, record);
    return record;
  }

  async getDocument(documentId: string): Promise<DocumentRecord | null> {
    return this.documents.get(documentId) ?? null;
  }

  async listDocuments(query: ListDocumentsQuery): Promise<DocumentRecord[]> {
    return Array.from(this.documents.values())
      .filter((d) => !query.organizationId || d.organization_id === query.organizationId)
      .slice(query.offset, query.offset + query.limit);
  }

  async createExtraction(input: NewExtraction): Promise<ExtractionProgress> {
    this.calls.push('createExtraction');
    const progress: ExtractionProgress = {
      ...input,
      status: 'processing',
      current_stage: 'pending',
      progress: 0,
      quality_score: null,
      result: null,
      errors: [],
      created_at: '2026-01-01T00:00:00.000Z',
      updated_at: '2026-01-01T00:00:00.000Z',
    };
    this.extractions.set(input.extraction_id, progress);
    return progress;
  }

  async updateProgress(extractionId: string, update: ProgressUpdate): Promise<void> {
    this.calls.push(`updateProgress:${update.stage}`);
    if (this.failProgressWrites) {
      throw new Error('connection refused');
    }
    const current = this.extractions.get(extractionId);
    if (current && current.status === 'processing') {
      current.current_stage = update.stage;
      current.progress = update.progress;
    }
  }

  async saveExtractionResult(record: ExtractionRecord): Promise<void> {
    this.calls.push('saveExtractionResult');
    const current = this.extractions.get(record.extraction_id);
    if (current) {
      current.status = record.status;
      current.current_stage = 'complete';
      current.progress = 100;
      current.quality_score = record.quality_score;
      current.result = record;
      current.errors = record.errors;
    }
  }

  async markFailed(extractionId: string, errors: string[]): Promise<void> {
    this.calls.push('markFailed');
    const current = this.extractions.get(extractionId);
    if (current) {
      current.status = 'failed';
      current.current_stage = 'failed';
      current.progress = 0;
      current.errors = errors;
    }
  }

  async getExtraction(extractionId: string): Promise<ExtractionProgress | null> {
    return this.extractions.get(extractionId) ?? null;
  }

  async logAudit(entry: AuditEntry): Promise<void> {
    this.calls.push('logAudit');
    this.audit.push(entry);
  }
}
