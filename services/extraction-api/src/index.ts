/**
 * Extraction API server
 */

import { Pool } from 'pg';
import {
  logger,
  config,
  createQueue,
  PgExtractionRepository,
  QUEUE_NAMES,
  type ExtractDocumentJob,
  type ExtractionRecord,
} from '@finspread/shared';
import { createApp } from './app';

const port = parseInt(process.env.PORT || '8080', 10);

const pool = new Pool({ connectionString: config.databaseUrl });

pool.on('error', (err) => {
  logger.error('Unexpected database pool error', err);
});

const queue = createQueue<ExtractDocumentJob, ExtractionRecord>(QUEUE_NAMES.EXTRACT_DOCUMENT);

const app = createApp({
  repository: new PgExtractionRepository(pool),
  queue,
  checkDatabase: async () => {
    await pool.query('SELECT 1');
  },
});

// Start server
const server = app.listen(port, () => {
  logger.info('Extraction API started', { port, upload_dir: config.uploadDir });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await queue.close();
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
