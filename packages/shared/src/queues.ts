/**
 * BullMQ Queue Definitions
 *
 * Queue names, job interfaces, and queue factory functions.
 */

import { Queue, Worker, Job, ConnectionOptions } from 'bullmq';
import { config } from './config';
import { logger } from './logger';
import type { AgentType } from './types';

// ============================================================================
// Queue Names
// ============================================================================

export const QUEUE_NAMES = {
  EXTRACT_DOCUMENT: 'extract_document',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// ============================================================================
// Job Payloads
// ============================================================================

/**
 * extract_document - Enqueued by the extraction API once the extraction row exists
 */
export interface ExtractDocumentJob {
  event_type: 'extraction.requested';
  correlation_id: string;
  document_id: string;
  extraction_id: string;
  file_path: string;
  agent_type: AgentType;
  requested_at: string;
}

// ============================================================================
// Redis Connection
// ============================================================================

export function getRedisConnection(): ConnectionOptions {
  if (config.redisUrl.startsWith('redis://')) {
    try {
      const url = new URL(config.redisUrl);
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        maxRetriesPerRequest: null, // Required for BullMQ
      };
    } catch (err) {
      logger.warn('Invalid REDIS_URL, using REDIS_HOST/REDIS_PORT', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  return {
    host: config.redisHost,
    port: config.redisPort,
    maxRetriesPerRequest: null,
  };
}

// ============================================================================
// Queue Factory
// ============================================================================

// A failed extraction is recorded as failed; it is never retried
const defaultJobOptions = {
  attempts: 1,
  removeOnComplete: 100,
  removeOnFail: 1000,
};

export function createQueue<TData, TResult>(queueName: QueueName): Queue<TData, TResult> {
  return new Queue<TData, TResult>(queueName, {
    connection: getRedisConnection(),
    defaultJobOptions,
  });
}

// ============================================================================
// Worker Factory
// ============================================================================

export interface WorkerOptions {
  concurrency?: number;
}

export function createWorker<TData, TResult>(
  queueName: QueueName,
  processor: (job: Job<TData, TResult>) => Promise<TResult>,
  options: WorkerOptions = {}
): Worker<TData, TResult> {
  const concurrency = options.concurrency || config.workerConcurrency;
  const worker = new Worker<TData, TResult>(queueName, processor, {
    connection: getRedisConnection(),
    concurrency,
  });

  worker.on('completed', (job) => {
    logger.info('Job completed', { queue: queueName, jobId: job.id });
  });

  worker.on('failed', (job, err) => {
    logger.error('Job failed', err, {
      queue: queueName,
      jobId: job?.id,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Worker error', err, { queue: queueName });
  });

  logger.info('Worker started', { queue: queueName, concurrency });

  return worker;
}

// ============================================================================
// Queue Metrics
// ============================================================================

/** The job counters read for queue metrics. */
export type QueueCounts = Pick<
  Queue,
  'getWaitingCount' | 'getActiveCount' | 'getCompletedCount' | 'getFailedCount' | 'getDelayedCount'
>;

export async function getQueueMetrics(queue: QueueCounts): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}> {
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);

  return { waiting, active, completed, failed, delayed };
}
