/**
 * Extraction Worker
 *
 * Consumes the extract_document queue: runs the spreading pipeline for each
 * requested extraction and stores the result in Postgres.
 */

import { Pool } from 'pg';
import {
  logger,
  config,
  createWorker,
  serveMetrics,
  PgExtractionRepository,
  QUEUE_NAMES,
  type ExtractDocumentJob,
  type ExtractionRecord,
} from '@finspread/shared';
import { ExtractionPipeline } from './lib/pipeline';
import { FileTextExtractor } from './lib/pdf';
import { LayoutTableExtractor } from './lib/tables';
import { createExtractionProcessor } from './lib/processor';

const pool = new Pool({ connectionString: config.databaseUrl });

pool.on('error', (err) => {
  logger.error('Unexpected database pool error', err);
});

const pipeline = new ExtractionPipeline({
  textExtractor: new FileTextExtractor(),
  tableExtractor: new LayoutTableExtractor(),
});

const worker = createWorker<ExtractDocumentJob, ExtractionRecord>(
  QUEUE_NAMES.EXTRACT_DOCUMENT,
  createExtractionProcessor({ pipeline, repository: new PgExtractionRepository(pool) })
);

const metricsServer = serveMetrics(parseInt(process.env.METRICS_PORT || '9464', 10));

logger.info('Extraction worker started', {
  concurrency: config.workerConcurrency,
  review_quality_threshold: config.reviewQualityThreshold,
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  metricsServer.close();
  await pool.end();
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((err: unknown) => {
    logger.error('Shutdown failed', err);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
