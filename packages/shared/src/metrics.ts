/**
 * Prometheus Metrics
 *
 * Queue, pipeline, mapping-quality, LLM, HTTP and database metrics.
 */

import http from 'node:http';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { getQueueMetrics, type QueueCounts } from './queues';

export const register = new promClient.Registry();

// Default metrics can fail on restricted hosts; the service still runs without them
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueDepthGauge = new promClient.Gauge({
  name: 'finspread_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

export const queueMetricsGauge = new promClient.Gauge({
  name: 'finspread_queue_metrics',
  help: 'Queue metrics by state',
  labelNames: ['queue', 'state'],
  registers: [register],
});

// ============================================================================
// Job Processing Metrics
// ============================================================================

export const jobDurationHistogram = new promClient.Histogram({
  name: 'finspread_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'finspread_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'finspread_documents_processed_total',
  help: 'Total number of documents processed through the pipeline',
  labelNames: ['agent_type', 'status'],
  registers: [register],
});

export const pipelineStageDurationHistogram = new promClient.Histogram({
  name: 'finspread_pipeline_stage_duration_seconds',
  help: 'Duration of each pipeline stage',
  labelNames: ['stage'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

export const labelMappingsCounter = new promClient.Counter({
  name: 'finspread_label_mappings_total',
  help: 'Line-item labels mapped, by match method',
  labelNames: ['method'],
  registers: [register],
});

export const qualityScoreHistogram = new promClient.Histogram({
  name: 'finspread_quality_score',
  help: 'Validation quality score of completed extractions',
  buckets: [20, 40, 60, 70, 80, 90, 95, 100],
  registers: [register],
});

export const llmRequestsCounter = new promClient.Counter({
  name: 'finspread_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'finspread_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'finspread_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'finspread_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

// ============================================================================
// Database Metrics
// ============================================================================

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'finspread_db_query_duration_seconds',
  help: 'Duration of database queries',
  labelNames: ['operation'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2],
  registers: [register],
});

/**
 * Report queue depths and state metrics to Prometheus gauges.
 * Call before getMetrics() so scrapes include current queue state.
 */
export async function reportQueueMetrics(
  queues: Array<{ name: string; queue: QueueCounts }>
): Promise<void> {
  for (const { name, queue } of queues) {
    try {
      const m = await getQueueMetrics(queue);
      queueDepthGauge.set({ queue: name }, m.waiting + m.active);
      queueMetricsGauge.set({ queue: name, state: 'waiting' }, m.waiting);
      queueMetricsGauge.set({ queue: name, state: 'active' }, m.active);
      queueMetricsGauge.set({ queue: name, state: 'completed' }, m.completed);
      queueMetricsGauge.set({ queue: name, state: 'failed' }, m.failed);
      queueMetricsGauge.set({ queue: name, state: 'delayed' }, m.delayed);
    } catch (err) {
      logger.warn('Queue metrics unavailable', {
        queue: name,
        error: err instanceof Error ? err.message : String(err),
      });
      queueDepthGauge.set({ queue: name }, -1);
    }
  }
}

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 */
export function serveMetrics(port: number): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', getMetricsContentType());
          res.end(body);
        })
        .catch((err: unknown) => {
          logger.error('Failed to render metrics', err);
          res.statusCode = 500;
          res.end();
        });
    } else {
      res.statusCode = 404;
      res.end();
    }
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
