/**
 * Extraction Pipeline
 *
 * Runs one document through text extraction, table detection, agent
 * analysis, statement spreading, validation and metric calculation.
 *
 * Upstream stage errors are collected and the run continues; an exception
 * stops the run and leaves it in the 'failed' stage.
 */

import {
  logger,
  getAnalyzerOrThrow,
  mergeTablesForSpreading,
  spreadFinancialData,
  buildStatementsDict,
  mappedItemCount,
  validateStatements,
  calculateMetrics,
  pipelineStageDurationHistogram,
  STAGE_PROGRESS,
  type AgentAnalyzer,
  type AgentAnalysis,
  type AgentType,
  type AnalyzerContext,
  type MetricsMap,
  type PageText,
  type PipelineStage,
  type SpreadResult,
  type StatementsDict,
  type TableExtractionResult,
  type Taxonomy,
  type TextExtractionResult,
  type ValidationSummary,
} from '@finspread/shared';
import type { ProgressSink } from './progress';

// ============================================================================
// Stage Dependencies
// ============================================================================

export interface TextExtractor {
  extract(filePath: string): Promise<TextExtractionResult>;
}

export interface TableExtractor {
  extract(filePath: string, pages: readonly PageText[]): Promise<TableExtractionResult>;
}

export type AnalyzerLookup = (agentType: AgentType) => AgentAnalyzer;

export interface PipelineDeps {
  textExtractor: TextExtractor;
  tableExtractor: TableExtractor;
  /** Defaults to the analyzer registry */
  analyzers?: AnalyzerLookup;
  /** Defaults to the bundled (or TAXONOMY_DIR) taxonomy */
  taxonomy?: Taxonomy;
}

// ============================================================================
// Run State
// ============================================================================

export interface PipelineRequest {
  documentId: string;
  filePath: string;
  agentType: AgentType;
  analyzerContext: AnalyzerContext;
}

export interface PipelineResults {
  totalPages?: number;
  tableCount?: number;
  analysis?: AgentAnalysis;
  spread?: SpreadResult;
  statements?: StatementsDict;
  periods?: string[];
  validation?: ValidationSummary;
  metrics?: MetricsMap;
}

export interface PipelineStatus {
  document_id: string;
  stage: PipelineStage;
  progress: number;
  started_at: string;
  finished_at: string | null;
  errors: string[];
  results: PipelineResults;
}

export class ExtractionPipeline {
  private readonly analyzers: AnalyzerLookup;

  constructor(private readonly deps: PipelineDeps) {
    this.analyzers = deps.analyzers ?? getAnalyzerOrThrow;
  }

  async run(request: PipelineRequest, progress?: ProgressSink): Promise<PipelineStatus> {
    const status: PipelineStatus = {
      document_id: request.documentId,
      stage: 'pending',
      progress: STAGE_PROGRESS.pending,
      started_at: new Date().toISOString(),
      finished_at: null,
      errors: [],
      results: {},
    };

    const enter = (stage: PipelineStage): void => {
      status.stage = stage;
      status.progress = STAGE_PROGRESS[stage];
      logger.info('Pipeline stage', { stage, progress: status.progress });
      progress?.report({ stage, progress: status.progress });
    };

    logger.info('Starting extraction pipeline', {
      document_id: request.documentId,
      agent_type: request.agentType,
      file_path: request.filePath,
    });

    try {
      enter('ocr');
      const text = await this.timeStage('ocr', () => this.deps.textExtractor.extract(request.filePath));
      status.errors.push(...text.errors);
      status.results.totalPages = text.totalPages;

      enter('tables');
      const tables = await this.timeStage('tables', () =>
        this.deps.tableExtractor.extract(request.filePath, text.pages)
      );
      status.errors.push(...tables.errors);
      status.results.tableCount = tables.tables.length;

      enter('ner');
      const analysis = await this.timeStage('ner', () =>
        this.analyzers(request.agentType).analyze(
          { documentId: request.documentId, pages: text.pages, tables: tables.tables },
          request.analyzerContext
        )
      );
      status.results.analysis = analysis;

      enter('normalization');
      const spread = await this.timeStage('normalization', async () => {
        const input = mergeTablesForSpreading(analysis.table_hints, tables.tables);
        return spreadFinancialData(input.labels, input.valuesByPeriod, this.deps.taxonomy);
      });
      const statements = buildStatementsDict(spread);
      status.results.spread = spread;
      status.results.statements = statements;
      status.results.periods = spread.periods;
      logger.info('Statements normalized', {
        mapped_items: mappedItemCount(spread),
        unmapped_items: spread.unmapped_items.length,
        periods: spread.periods,
      });

      enter('validation');
      const validation = await this.timeStage('validation', async () =>
        validateStatements(statements, spread.periods)
      );
      status.results.validation = validation;

      enter('metrics');
      status.results.metrics = await this.timeStage('metrics', async () =>
        calculateMetrics(statements, spread.periods)
      );

      enter('complete');
      logger.info('Extraction pipeline complete', {
        document_id: request.documentId,
        quality_score: validation.quality_score,
        error_count: status.errors.length,
      });
    } catch (error) {
      const message = `Pipeline failed: ${error instanceof Error ? error.message : String(error)}`;
      logger.error(message, error, { document_id: request.documentId, stage: status.stage });
      status.errors.push(message);
      status.stage = 'failed';
      status.progress = STAGE_PROGRESS.failed;
    }

    status.finished_at = new Date().toISOString();
    return status;
  }

  private async timeStage<T>(stage: PipelineStage, fn: () => Promise<T>): Promise<T> {
    const end = pipelineStageDurationHistogram.startTimer({ stage });
    try {
      return await fn();
    } finally {
      end();
    }
  }
}
