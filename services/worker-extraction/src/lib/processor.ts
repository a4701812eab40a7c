/**
 * extract_document Job Processor
 *
 * Runs the pipeline for one extraction, saves the resulting record and
 * records job metrics. A pipeline failure is stored on the extraction and
 * the job still completes; only unexpected errors fail the job.
 */

import type { Job } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  validateExtractionRecord,
  QUEUE_NAMES,
  jobsProcessedCounter,
  jobDurationHistogram,
  documentsProcessedCounter,
  labelMappingsCounter,
  qualityScoreHistogram,
  type ExtractDocumentJob,
  type ExtractionRecord,
  type ExtractionRepository,
  type MappingStats,
} from '@finspread/shared';
import type { ExtractionPipeline } from './pipeline';
import { ProgressReporter } from './progress';
import { buildExtractionRecord } from './record';

export interface ProcessorDeps {
  pipeline: ExtractionPipeline;
  repository: ExtractionRepository;
  /** Defaults to config.reviewQualityThreshold */
  reviewQualityThreshold?: number;
}

export type ExtractDocumentProcessor = (
  job: Pick<Job<ExtractDocumentJob, ExtractionRecord>, 'id' | 'data'>
) => Promise<ExtractionRecord>;

function recordMappingStats(stats: MappingStats): void {
  for (const [method, count] of Object.entries(stats)) {
    if (count > 0) labelMappingsCounter.inc({ method }, count);
  }
}

export function createExtractionProcessor(deps: ProcessorDeps): ExtractDocumentProcessor {
  const reviewThreshold = deps.reviewQualityThreshold ?? config.reviewQualityThreshold;
  const queue = QUEUE_NAMES.EXTRACT_DOCUMENT;

  return async function processExtractDocument(job) {
    const { correlation_id, document_id, extraction_id, file_path, agent_type } = job.data;

    return runWithContextAsync(
      { correlationId: correlation_id, documentId: document_id, extractionId: extraction_id },
      async () => {
        const startTime = Date.now();
        const progress = new ProgressReporter((update) =>
          deps.repository.updateProgress(extraction_id, update)
        );

        logger.info('Processing extract_document', { jobId: job.id, agent_type, file_path });

        try {
          const status = await deps.pipeline.run(
            {
              documentId: document_id,
              filePath: file_path,
              agentType: agent_type,
              analyzerContext: { correlationId: correlation_id },
            },
            progress
          );

          // a late progress write must not land after the final status
          await progress.flush();

          const record = buildExtractionRecord(status, {
            extractionId: extraction_id,
            documentId: document_id,
            agentType: agent_type,
            reviewThreshold,
          });

          const validation = validateExtractionRecord(record);
          if (!validation.valid) {
            logger.warn('ExtractionRecord does not match its contract', { errors: validation.errors });
          }

          if (record.status === 'failed') {
            await deps.repository.markFailed(extraction_id, record.errors);
          } else {
            await deps.repository.saveExtractionResult(record);
            recordMappingStats(record.mapping_stats);
            qualityScoreHistogram.observe(record.quality_score);
          }

          await deps.repository.logAudit({
            user_id: null,
            action: 'write',
            resource_type: 'extraction',
            resource_id: extraction_id,
            context: { status: record.status, quality_score: record.quality_score },
          });

          const duration = (Date.now() - startTime) / 1000;
          jobsProcessedCounter.inc({ queue, status: 'success' });
          jobDurationHistogram.observe({ queue, status: 'success' }, duration);
          documentsProcessedCounter.inc({ agent_type, status: record.status });

          logger.info('Extraction finished', {
            status: record.status,
            quality_score: record.quality_score,
            error_count: record.errors.length,
            duration_ms: Date.now() - startTime,
          });

          return record;
        } catch (error) {
          jobsProcessedCounter.inc({ queue, status: 'failed' });
          jobDurationHistogram.observe({ queue, status: 'failed' }, (Date.now() - startTime) / 1000);
          documentsProcessedCounter.inc({ agent_type, status: 'failed' });

          await progress.flush();
          const message = `Processing failed: ${error instanceof Error ? error.message : String(error)}`;
          try {
            await deps.repository.markFailed(extraction_id, [message]);
          } catch (markError) {
            logger.error('Failed to mark extraction as failed', markError);
          }
          throw error;
        }
      }
    );
  };
}
