/**
 * Extraction Repository
 *
 * Postgres persistence for documents, extractions and the audit log. The
 * pool is injected so the API and the worker each own their connection
 * lifecycle, and tests can swap in an in-memory implementation.
 */

import type { Pool, PoolClient } from 'pg';
import { logger } from './logger';
import { dbQueryDurationHistogram } from './metrics';
import type {
  AgentType,
  DocumentRecord,
  DocumentType,
  ExtractionProgress,
  ExtractionRecord,
  FileType,
  PipelineStage,
  ProcessingStatus,
} from './types';

// ============================================================================
// Inputs
// ============================================================================

export interface NewDocument {
  document_id: string;
  filename: string;
  file_type: FileType;
  file_size_bytes: number;
  storage_path: string;
  uploaded_by: string | null;
  organization_id: string | null;
}

export interface NewExtraction {
  extraction_id: string;
  document_id: string;
  selected_agent: AgentType;
}

export interface ProgressUpdate {
  stage: PipelineStage;
  progress: number;
}

export interface ListDocumentsQuery {
  organizationId?: string;
  limit: number;
  offset: number;
}

export type AuditAction = 'read' | 'write' | 'update' | 'delete';

export interface AuditEntry {
  user_id: string | null;
  action: AuditAction;
  resource_type: 'document' | 'extraction';
  resource_id: string;
  context?: Record<string, unknown>;
}

export interface ExtractionRepository {
  saveDocument(doc: NewDocument): Promise<DocumentRecord>;
  getDocument(documentId: string): Promise<DocumentRecord | null>;
  listDocuments(query: ListDocumentsQuery): Promise<DocumentRecord[]>;
  createExtraction(input: NewExtraction): Promise<ExtractionProgress>;
  /** Only applies while the extraction is still processing. */
  updateProgress(extractionId: string, update: ProgressUpdate): Promise<void>;
  saveExtractionResult(record: ExtractionRecord): Promise<void>;
  markFailed(extractionId: string, errors: string[]): Promise<void>;
  getExtraction(extractionId: string): Promise<ExtractionProgress | null>;
  /** Never throws; failures are logged. */
  logAudit(entry: AuditEntry): Promise<void>;
}

// ============================================================================
// Row Mapping
// ============================================================================

type DocumentRow = {
  id: string;
  filename: string;
  file_type: FileType;
  file_size_bytes: string;
  storage_path: string;
  uploaded_by: string | null;
  organization_id: string | null;
  document_type: DocumentType | null;
  company_name: string | null;
  fiscal_period: string | null;
  currency: string;
  created_at: Date;
};

type ExtractionRow = {
  extraction_id: string;
  document_id: string;
  status: ProcessingStatus;
  current_stage: PipelineStage;
  progress: number;
  selected_agent: AgentType;
  quality_score: number | null;
  structured_data: ExtractionRecord | null;
  errors: string[];
  created_at: Date;
  updated_at: Date;
};

const DOCUMENT_COLUMNS = `id, filename, file_type, file_size_bytes, storage_path, uploaded_by,
  organization_id, document_type, company_name, fiscal_period, currency, created_at`;

const EXTRACTION_COLUMNS = `extraction_id, document_id, status, current_stage, progress,
  selected_agent, quality_score, structured_data, errors, created_at, updated_at`;

function toDocumentRecord(row: DocumentRow): DocumentRecord {
  return {
    document_id: row.id,
    filename: row.filename,
    file_type: row.file_type,
    // BIGINT comes back as a string
    file_size_bytes: Number(row.file_size_bytes),
    storage_path: row.storage_path,
    uploaded_by: row.uploaded_by,
    organization_id: row.organization_id,
    document_type: row.document_type,
    company_name: row.company_name,
    fiscal_period: row.fiscal_period,
    currency: row.currency,
    created_at: row.created_at.toISOString(),
  };
}

function toExtractionProgress(row: ExtractionRow): ExtractionProgress {
  return {
    extraction_id: row.extraction_id,
    document_id: row.document_id,
    status: row.status,
    current_stage: row.current_stage,
    progress: row.progress,
    selected_agent: row.selected_agent,
    quality_score: row.quality_score,
    result: row.structured_data,
    errors: row.errors,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  };
}

// ============================================================================
// Postgres Implementation
// ============================================================================

export class PgExtractionRepository implements ExtractionRepository {
  constructor(private readonly pool: Pool) {}

  private async timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    try {
      return await fn();
    } finally {
      dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
    }
  }

  async saveDocument(doc: NewDocument): Promise<DocumentRecord> {
    return this.timed('save_document', async () => {
      const result = await this.pool.query<DocumentRow>(
        `INSERT INTO documents (id, filename, file_type, file_size_bytes, storage_path, uploaded_by, organization_id)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING ${DOCUMENT_COLUMNS}`,
        [
          doc.document_id,
          doc.filename,
          doc.file_type,
          doc.file_size_bytes,
          doc.storage_path,
          doc.uploaded_by,
          doc.organization_id,
        ]
      );
      logger.info('Document saved', { document_id: doc.document_id, file_type: doc.file_type });
      return toDocumentRecord(result.rows[0]);
    });
  }

  async getDocument(documentId: string): Promise<DocumentRecord | null> {
    return this.timed('get_document', async () => {
      const result = await this.pool.query<DocumentRow>(
        `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id = $1`,
        [documentId]
      );
      return result.rows.length > 0 ? toDocumentRecord(result.rows[0]) : null;
    });
  }

  async listDocuments(query: ListDocumentsQuery): Promise<DocumentRecord[]> {
    return this.timed('list_documents', async () => {
      const conditions: string[] = [];
      const params: Array<string | number> = [];

      if (query.organizationId) {
        params.push(query.organizationId);
        conditions.push(`organization_id = $${params.length}`);
      }

      params.push(query.limit);
      const limitParam = params.length;
      params.push(query.offset);
      const offsetParam = params.length;

      const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
      const result = await this.pool.query<DocumentRow>(
        `SELECT ${DOCUMENT_COLUMNS} FROM documents ${where}
         ORDER BY created_at DESC, id
         LIMIT $${limitParam} OFFSET $${offsetParam}`,
        params
      );
      return result.rows.map(toDocumentRecord);
    });
  }

  async createExtraction(input: NewExtraction): Promise<ExtractionProgress> {
    return this.timed('create_extraction', async () => {
      const result = await this.pool.query<ExtractionRow>(
        `INSERT INTO extractions (extraction_id, document_id, status, current_stage, progress, selected_agent)
         VALUES ($1, $2, 'processing', 'pending', 0, $3)
         RETURNING ${EXTRACTION_COLUMNS}`,
        [input.extraction_id, input.document_id, input.selected_agent]
      );
      return toExtractionProgress(result.rows[0]);
    });
  }

  async updateProgress(extractionId: string, update: ProgressUpdate): Promise<void> {
    await this.timed('update_progress', async () => {
      await this.pool.query(
        `UPDATE extractions
         SET current_stage = $2, progress = $3, updated_at = NOW()
         WHERE extraction_id = $1 AND status = 'processing'`,
        [extractionId, update.stage, update.progress]
      );
    });
  }

  /**
   * Store the final record and copy the detected document type onto the
   * document, in one transaction.
   */
  async saveExtractionResult(record: ExtractionRecord): Promise<void> {
    await this.timed('save_extraction_result', async () => {
      const client: PoolClient = await this.pool.connect();
      try {
        await client.query('BEGIN');

        await client.query(
          `UPDATE extractions
           SET status = $2, current_stage = 'complete', progress = 100, quality_score = $3,
               structured_data = $4, errors = $5, updated_at = NOW()
           WHERE extraction_id = $1`,
          [
            record.extraction_id,
            record.status,
            record.quality_score,
            JSON.stringify(record),
            JSON.stringify(record.errors),
          ]
        );

        if (record.document_type_detected) {
          await client.query(
            `UPDATE documents SET document_type = $2, updated_at = NOW() WHERE id = $1`,
            [record.document_id, record.document_type_detected]
          );
        }

        await client.query('COMMIT');

        logger.info('Extraction result saved', {
          extraction_id: record.extraction_id,
          status: record.status,
          quality_score: record.quality_score,
        });
      } catch (error) {
        await client.query('ROLLBACK');
        logger.error('Failed to save extraction result', error, {
          extraction_id: record.extraction_id,
        });
        throw error;
      } finally {
        client.release();
      }
    });
  }

  async markFailed(extractionId: string, errors: string[]): Promise<void> {
    await this.timed('mark_failed', async () => {
      await this.pool.query(
        `UPDATE extractions
         SET status = 'failed', current_stage = 'failed', progress = 0, errors = $2, updated_at = NOW()
         WHERE extraction_id = $1`,
        [extractionId, JSON.stringify(errors)]
      );
      logger.warn('Extraction marked failed', { extraction_id: extractionId, error_count: errors.length });
    });
  }

  async getExtraction(extractionId: string): Promise<ExtractionProgress | null> {
    return this.timed('get_extraction', async () => {
      const result = await this.pool.query<ExtractionRow>(
        `SELECT ${EXTRACTION_COLUMNS} FROM extractions WHERE extraction_id = $1`,
        [extractionId]
      );
      return result.rows.length > 0 ? toExtractionProgress(result.rows[0]) : null;
    });
  }

  async logAudit(entry: AuditEntry): Promise<void> {
    try {
      await this.timed('log_audit', async () => {
        await this.pool.query(
          `INSERT INTO audit_logs (user_id, action, resource_type, resource_id, context)
           VALUES ($1, $2, $3, $4, $5)`,
          [entry.user_id, entry.action, entry.resource_type, entry.resource_id, JSON.stringify(entry.context ?? {})]
        );
      });
    } catch (error) {
      logger.warn('Audit logging failed', {
        action: entry.action,
        resource_id: entry.resource_id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
